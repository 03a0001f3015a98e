import { Table } from '../types';
import { CellFragment, TableFragment } from '../types/ocr';
import { FragmentIndex } from './text-index';

export const SELECTED_MARK = '[X]';

/**
 * Text of one cell: its words space-joined, then one marker per selected
 * selection mark.
 */
export function cellText(index: FragmentIndex, cell: CellFragment): string {
  const words: string[] = [];
  const marks: string[] = [];

  for (const child of index.childrenOf(cell)) {
    if (child.kind === 'WORD') {
      words.push(child.text);
    } else if (child.kind === 'SELECTION_MARK' && child.selected) {
      marks.push(SELECTED_MARK);
    }
  }

  return [...words, ...marks].join(' ');
}

function isGridIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 1;
}

/**
 * Rebuild the grid of one TABLE fragment from the cells it owns.
 *
 * Rows run from the smallest row index present to the largest; columns run
 * 1..max column index. Positions with no cell are empty strings. A table
 * with no readable cells yields an empty grid.
 */
export function reconstructTable(index: FragmentIndex, table: TableFragment): Table {
  const grid = new Map<number, Map<number, string>>();
  let minRow = Number.POSITIVE_INFINITY;
  let maxRow = 0;
  let maxColumn = 0;

  for (const cell of index.cellsOf(table.id)) {
    if (!isGridIndex(cell.rowIndex) || !isGridIndex(cell.columnIndex)) {
      continue;
    }

    minRow = Math.min(minRow, cell.rowIndex);
    maxRow = Math.max(maxRow, cell.rowIndex);
    maxColumn = Math.max(maxColumn, cell.columnIndex);

    const row = grid.get(cell.rowIndex) ?? new Map<number, string>();
    const text = cellText(index, cell);
    const existing = row.get(cell.columnIndex);
    // Two cells claiming one position keep both texts
    row.set(cell.columnIndex, existing ? [existing, text].filter(Boolean).join(' ') : text);
    grid.set(cell.rowIndex, row);
  }

  const rows: string[][] = [];
  if (maxRow > 0) {
    for (let r = minRow; r <= maxRow; r++) {
      const row = grid.get(r);
      const cells: string[] = [];
      for (let c = 1; c <= maxColumn; c++) {
        cells.push(row?.get(c) ?? '');
      }
      rows.push(cells);
    }
  }

  return {
    id: table.id,
    page: table.page,
    top: table.box.top,
    rows,
  };
}
