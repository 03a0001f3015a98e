import { BlankCell, ExtractionRule, TableIntegrityResult } from './types';
import { findSection, isBlank } from './section-lookup';

export interface TableIntegrityOptions {
  name: string;
  description: string;
  section: string;
}

/**
 * The first table of the named section must exist and have no blank cell.
 */
export function createTableIntegrityRule(options: TableIntegrityOptions): ExtractionRule<TableIntegrityResult> {
  const { name, description, section: sectionName } = options;

  return {
    name,
    description,
    extract(document) {
      const base = { kind: 'table-integrity' as const, section: sectionName };
      const section = findSection(document, sectionName);
      if (!section) {
        return { ...base, status: 'missing', message: `Section '${sectionName}' not found`, blankCells: [], rows: [] };
      }

      const table = section.tables[0];
      if (!table) {
        return { ...base, status: 'missing', message: `No '${sectionName}' table present`, blankCells: [], rows: [] };
      }

      if (table.rows.length === 0) {
        return { ...base, status: 'incomplete', message: `'${sectionName}' table has no readable cells`, blankCells: [], rows: [] };
      }

      const blankCells: BlankCell[] = [];
      table.rows.forEach((row, r) => {
        row.forEach((cell, c) => {
          if (isBlank(cell)) {
            blankCells.push({ row: r + 1, col: c + 1 });
          }
        });
      });

      if (blankCells.length > 0) {
        return {
          ...base,
          status: 'incomplete',
          message: `Found blank cells in ${sectionName} table`,
          blankCells,
          rows: table.rows,
        };
      }

      return { ...base, status: 'ok', message: `${sectionName} table complete`, blankCells, rows: table.rows };
    },
  };
}
