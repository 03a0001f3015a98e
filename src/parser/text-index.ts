import {
  CellFragment,
  Fragment,
  LineFragment,
  TableFragment,
} from '../types/ocr';

/**
 * Sort by top coordinate. Array.prototype.sort is stable, so fragments with
 * equal tops keep their traversal order.
 */
function byTop<T extends Fragment>(fragments: T[]): T[] {
  return [...fragments].sort((a, b) => a.box.top - b.box.top);
}

/**
 * Read-only index over one document's fragments: children in
 * declared order, cells by owning table, and lines/tables by page.
 */
export class FragmentIndex {
  private readonly byId = new Map<string, Fragment>();
  private readonly cellsByTable = new Map<string, CellFragment[]>();
  private readonly linesByPage = new Map<number, LineFragment[]>();
  private readonly tablesByPage = new Map<number, TableFragment[]>();

  constructor(fragments: Fragment[]) {
    const lines = new Map<number, LineFragment[]>();
    const tables = new Map<number, TableFragment[]>();

    for (const fragment of fragments) {
      if (!this.byId.has(fragment.id)) {
        this.byId.set(fragment.id, fragment);
      }

      switch (fragment.kind) {
        case 'LINE':
          pushTo(lines, fragment.page, fragment);
          break;
        case 'TABLE':
          pushTo(tables, fragment.page, fragment);
          break;
        case 'CELL':
          if (fragment.tableId !== null) {
            pushTo(this.cellsByTable, fragment.tableId, fragment);
          }
          break;
        case 'WORD':
        case 'SELECTION_MARK':
          break;
        default: {
          const unreachable: never = fragment;
          throw new Error(`Unhandled fragment: ${JSON.stringify(unreachable)}`);
        }
      }
    }

    for (const [page, pageLines] of lines) {
      this.linesByPage.set(page, byTop(pageLines));
    }
    for (const [page, pageTables] of tables) {
      this.tablesByPage.set(page, byTop(pageTables));
    }
  }

  /**
   * Children of a fragment in declared order; ids with no fragment are skipped
   */
  childrenOf(fragment: Fragment): Fragment[] {
    const children: Fragment[] = [];
    for (const childId of fragment.childIds) {
      const child = this.byId.get(childId);
      if (child) {
        children.push(child);
      }
    }
    return children;
  }

  cellsOf(tableId: string): CellFragment[] {
    return this.cellsByTable.get(tableId) ?? [];
  }

  /**
   * Page numbers holding lines or tables, ascending
   */
  pages(): number[] {
    const pages = new Set<number>([...this.linesByPage.keys(), ...this.tablesByPage.keys()]);
    return [...pages].sort((a, b) => a - b);
  }

  /**
   * Lines on a page, sorted by top
   */
  linesOn(page: number): LineFragment[] {
    return this.linesByPage.get(page) ?? [];
  }

  /**
   * Tables on a page, sorted by top
   */
  tablesOn(page: number): TableFragment[] {
    return this.tablesByPage.get(page) ?? [];
  }
}

function pushTo<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}
