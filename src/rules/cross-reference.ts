import { ParsedDocument } from '../types';
import { CrossReferenceResult, ExtractionRule } from './types';
import { RowLabelQuery, sectionValue } from './free-floating-value';

/** Asset identifiers such as MCW-01 or CWST-2: letters, hyphen, digits */
export const IDENTIFIER_PATTERN = /\b([A-Za-z]+)-(\d+)\b/g;

export function collectIdentifiers(document: ParsedDocument): string[] {
  const seen = new Set<string>();

  for (const section of document.sections) {
    for (const table of section.tables) {
      for (const row of table.rows) {
        for (const cell of row) {
          for (const match of cell.matchAll(IDENTIFIER_PATTERN)) {
            seen.add(match[0].toUpperCase());
          }
        }
      }
    }
  }

  return [...seen];
}

export function isExcluded(identifier: string, excludedPrefixes: string[]): boolean {
  return excludedPrefixes.some(prefix => identifier.startsWith(`${prefix.toUpperCase()}-`));
}

export interface CrossReferenceOptions {
  name: string;
  description: string;
  narrativeSection: (heading: string) => boolean;
  narrativeRow: RowLabelQuery;
  excludedPrefixes: string[];
}

/**
 * Gathers the identifiers used in the document's tables and the narrative
 * they should be compared with. Whether the narrative covers them is left
 * to the semantic judge.
 */
export function createCrossReferenceRule(options: CrossReferenceOptions): ExtractionRule<CrossReferenceResult> {
  const { name, description, narrativeSection, narrativeRow, excludedPrefixes } = options;

  return {
    name,
    description,
    extract(document) {
      const observedIdentifiers = collectIdentifiers(document);
      const sections = document.sections.filter(section => narrativeSection(section.name));

      return {
        kind: 'cross-reference',
        observedIdentifiers,
        comparedIdentifiers: observedIdentifiers.filter(id => !isExcluded(id, excludedPrefixes)),
        excludedPrefixes: [...excludedPrefixes],
        narrativeLabel: narrativeRow.label,
        narrative: sectionValue(sections, narrativeRow) ?? '',
      };
    },
  };
}
