import { ParsedDocument, Section } from '../types';

export type NameMatch = 'exact' | 'prefix';

/**
 * First section in document order whose heading matches. Headings are
 * compared as-is; callers that want case-insensitive matching use
 * findSectionWhere.
 */
export function findSection(document: ParsedDocument, name: string, match: NameMatch = 'exact'): Section | null {
  return findSectionWhere(document, heading => (match === 'exact' ? heading === name : heading.startsWith(name)));
}

export function findSectionWhere(document: ParsedDocument, predicate: (heading: string) => boolean): Section | null {
  return document.sections.find(section => predicate(section.name)) ?? null;
}

export function sectionsWithPrefix(document: ParsedDocument, prefix: string): Section[] {
  return document.sections.filter(section => section.name.startsWith(prefix));
}

/**
 * Best-effort integer parse. Returns null for anything that is not a plain
 * signed integer once trimmed, so garbled cells are skipped rather than
 * counted as zero.
 */
export function parseCount(value: string | undefined): number | null {
  if (value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return null;
  }
  return Number.parseInt(trimmed, 10);
}

export function cellAt(row: string[], column: number): string {
  return row[column] ?? '';
}

export function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === '';
}
