/**
 * Fragment types for OCR document-analysis output.
 * A fragment is one primitive detected by the OCR engine; fragments form a
 * tree through their child ids (TABLE → CELL → WORD | SELECTION_MARK).
 */

export type FragmentKind = 'LINE' | 'TABLE' | 'CELL' | 'WORD' | 'SELECTION_MARK';

/**
 * Position on the page, normalised to [0, 1]
 */
export interface BoundingBox {
  top: number;
  left: number;
  width: number;
  height: number;
}

interface FragmentBase {
  /** Unique identifier assigned by the OCR engine */
  id: string;
  /** Page number (1-indexed) */
  page: number;
  box: BoundingBox;
  /** Ids of child fragments, in the order the engine declared them */
  childIds: string[];
}

export interface LineFragment extends FragmentBase {
  kind: 'LINE';
  text: string;
}

export interface TableFragment extends FragmentBase {
  kind: 'TABLE';
}

export interface CellFragment extends FragmentBase {
  kind: 'CELL';
  /** Id of the TABLE that owns this cell, or null when no table claims it */
  tableId: string | null;
  /** 1-based grid row assigned by the engine */
  rowIndex: number;
  /** 1-based grid column assigned by the engine */
  columnIndex: number;
}

export interface WordFragment extends FragmentBase {
  kind: 'WORD';
  text: string;
}

export interface SelectionMarkFragment extends FragmentBase {
  kind: 'SELECTION_MARK';
  selected: boolean;
}

export type Fragment =
  | LineFragment
  | TableFragment
  | CellFragment
  | WordFragment
  | SelectionMarkFragment;
