import { Section } from '../types';
import { ExtractionRule, FreeFloatingValueResult } from './types';
import { cellAt, NameMatch } from './section-lookup';

export interface RowLabelQuery {
  label: string;
  match: NameMatch;
  /** Drop all spaces before comparing, so "Property Site / Description" still matches */
  ignoreSpaces?: boolean;
}

function normaliseLabel(value: string, ignoreSpaces: boolean): string {
  const lowered = value.trim().toLowerCase();
  return ignoreSpaces ? lowered.replace(/\s+/g, '') : lowered;
}

/**
 * Trimmed text of the cell next to the first row whose label matches, in
 * any table of the section; null when no row matches.
 */
export function labelledValue(section: Section, query: RowLabelQuery): string | null {
  const ignoreSpaces = query.ignoreSpaces ?? false;
  const wanted = normaliseLabel(query.label, ignoreSpaces);

  for (const table of section.tables) {
    for (const row of table.rows) {
      if (row.length < 2) {
        continue;
      }
      const label = normaliseLabel(cellAt(row, 0), ignoreSpaces);
      const matches = query.match === 'exact' ? label === wanted : label.startsWith(wanted);
      if (matches) {
        return cellAt(row, 1).trim();
      }
    }
  }
  return null;
}

export function joinedParagraphs(section: Section): string {
  return section.paragraphs
    .map(paragraph => paragraph.trim())
    .filter(paragraph => paragraph.length > 0)
    .join(' ');
}

/**
 * Value of a labelled row in the first matching section that has one,
 * falling back to that section's paragraph text.
 */
export function sectionValue(sections: Section[], query: RowLabelQuery): string | null {
  for (const section of sections) {
    const value = labelledValue(section, query);
    if (value !== null) {
      return value;
    }
    const paragraphs = joinedParagraphs(section);
    if (paragraphs) {
      return paragraphs;
    }
  }
  return null;
}

export interface FreeFloatingValueOptions {
  name: string;
  description: string;
  /** Selects the candidate sections by heading */
  section: (heading: string) => boolean;
  row: RowLabelQuery;
}

export function createFreeFloatingValueRule(options: FreeFloatingValueOptions): ExtractionRule<FreeFloatingValueResult> {
  const { name, description, section: selectSection, row } = options;

  return {
    name,
    description,
    extract(document) {
      const sections = document.sections.filter(section => selectSection(section.name));
      return {
        kind: 'free-floating-value',
        label: row.label,
        sectionFound: sections.length > 0,
        value: sectionValue(sections, row) ?? '',
      };
    },
  };
}
