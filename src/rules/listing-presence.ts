import { ExtractionRule, ListingPresenceResult } from './types';
import { cellAt, findSection, NameMatch } from './section-lookup';

export interface ListingPresenceOptions {
  name: string;
  description: string;
  section: string;
  match?: NameMatch;
  /** Entries that must all appear, compared case-insensitively */
  expected: string[];
  /** Column holding the entry names */
  column?: number;
  passNote?: string;
}

/**
 * Reads the first table of one section (header row skipped) and checks that
 * every expected entry is listed.
 */
export function createListingPresenceRule(options: ListingPresenceOptions): ExtractionRule<ListingPresenceResult> {
  const { name, description, section: sectionName, match = 'exact', expected, column = 0, passNote } = options;

  return {
    name,
    description,
    extract(document) {
      const section = findSection(document, sectionName, match);
      const table = section?.tables[0];
      const listed = new Set(
        (table?.rows.slice(1) ?? []).map(row => cellAt(row, column).trim().toLowerCase())
      );

      const found = expected.filter(item => listed.has(item.toLowerCase()));
      const missing = expected.filter(item => !listed.has(item.toLowerCase()));

      return {
        kind: 'listing-presence',
        section: section ? section.name : null,
        found,
        missing,
        ...(passNote ? { passNote } : {}),
      };
    },
  };
}
