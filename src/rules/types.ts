import { ParsedDocument } from '../types';

/**
 * Where a finding was detected: page of the table (null when unknown),
 * 1-based table number within its section, 1-based row number within the
 * table (header row included).
 */
export interface FindingLocation {
  page: number | null;
  table: number;
  row: number;
}

export interface Finding {
  location: FindingLocation;
  /** Label of the row whose value is missing or malformed */
  label: string;
  reason: 'blank' | 'pattern';
}

export interface ListingPresenceResult {
  kind: 'listing-presence';
  /** Heading of the matched section, or null when absent */
  section: string | null;
  found: string[];
  missing: string[];
  /** Follow-up for the reader, appended to a passing answer */
  passNote?: string;
}

export interface RemedialCount {
  area: string;
  count: number;
}

export interface CountReconciliationResult {
  kind: 'count-reconciliation';
  remedialBySection: RemedialCount[];
  remedialTotal: number;
  sigItemCount: number;
}

export interface CompletenessResult {
  kind: 'completeness';
  section: string;
  findings: Finding[];
}

export interface CrossReferenceResult {
  kind: 'cross-reference';
  /** Every identifier seen in any table, in first-seen order */
  observedIdentifiers: string[];
  /** Observed identifiers left after the exclusions */
  comparedIdentifiers: string[];
  excludedPrefixes: string[];
  narrativeLabel: string;
  /** Empty when the narrative section is absent */
  narrative: string;
}

export interface FreeFloatingValueResult {
  kind: 'free-floating-value';
  label: string;
  sectionFound: boolean;
  /** Adjacent cell or joined paragraphs; empty string when not found */
  value: string;
}

export interface BlankCell {
  row: number;
  col: number;
}

export interface TableIntegrityResult {
  kind: 'table-integrity';
  section: string;
  status: 'ok' | 'incomplete' | 'missing';
  message: string;
  blankCells: BlankCell[];
  rows: string[][];
}

export interface RatingStatementResult {
  kind: 'rating-statement';
  section: string;
  /** Rating read from the section, or null when no statement was found */
  value: string | null;
}

export interface SectionContentResult {
  kind: 'section-content';
  populated: boolean;
  /** Headings of the sections that were checked */
  checkedSections: string[];
  /** Headings of the sections holding an empty table */
  emptyTableSections: string[];
}

export interface FloorLocation {
  raw: string;
  floor: string | null;
}

export interface FloorLocationsResult {
  kind: 'floor-locations';
  locations: FloorLocation[];
  unresolved: string[];
}

export type ExtractionResult =
  | ListingPresenceResult
  | CountReconciliationResult
  | CompletenessResult
  | CrossReferenceResult
  | FreeFloatingValueResult
  | TableIntegrityResult
  | RatingStatementResult
  | SectionContentResult
  | FloorLocationsResult;

/**
 * A pure function answering one checklist question from a parsed document.
 * Rules never throw for data-shape reasons; missing sections or malformed
 * rows resolve to empty results.
 */
export interface ExtractionRule<R extends ExtractionResult = ExtractionResult> {
  name: string;
  description: string;
  extract(document: ParsedDocument): R;
}
