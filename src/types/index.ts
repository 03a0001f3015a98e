/**
 * A table reconstructed from one TABLE fragment
 */
export interface Table {
  /** Id of the source TABLE fragment */
  id: string;
  page: number;
  /** Top coordinate of the source fragment on its page */
  top: number;
  /** Rows of cell text; every row has the same length */
  rows: string[][];
}

/**
 * A named region of a document, opened by a heading line
 */
export interface Section {
  name: string;
  /** Page the heading was found on */
  page: number;
  paragraphs: string[];
  tables: Table[];
}

/**
 * Result of one parse pass over a source file
 */
export interface ParsedDocument {
  /** External key of the source file */
  sourceKey: string;
  sections: Section[];
}

/**
 * Interchange shape written to storage and read back by the rule sets
 */
export interface SerializedTable {
  id?: string;
  page?: number | null;
  rows: string[][];
}

export interface SerializedSection {
  name: string;
  paragraphs: string[];
  tables: SerializedTable[];
}

export interface SerializedDocument {
  source_key?: string;
  sections: SerializedSection[];
}

export type ChecklistId = 'hsa' | 'fra';

export type VerdictToken = 'PASS' | 'FAIL';
