import { CompletenessResult, ExtractionRule, Finding } from './types';
import { cellAt, isBlank } from './section-lookup';

export const DATE_DD_MM_YYYY = /\b\d{2}\/\d{2}\/\d{4}\b/;

export interface CompletenessOptions {
  name: string;
  description: string;
  /** Exact heading; every section carrying it is checked */
  section: string;
  requiredLabels: string[];
  /** Labels whose value must also match a pattern */
  patterns?: Record<string, RegExp>;
  labelColumn?: number;
  valueColumn?: number;
}

/**
 * Checks every row of every table under the section (title row skipped).
 * A required label with a blank value, or a value failing its pattern,
 * yields one finding for that row.
 */
export function createCompletenessRule(options: CompletenessOptions): ExtractionRule<CompletenessResult> {
  const {
    name,
    description,
    section: sectionName,
    requiredLabels,
    patterns = {},
    labelColumn = 0,
    valueColumn = 1,
  } = options;
  const required = new Set(requiredLabels);

  return {
    name,
    description,
    extract(document) {
      const findings: Finding[] = [];

      for (const section of document.sections) {
        if (section.name !== sectionName) {
          continue;
        }

        section.tables.forEach((table, tableIndex) => {
          table.rows.forEach((row, rowIndex) => {
            if (rowIndex === 0) {
              return;
            }

            const label = cellAt(row, labelColumn).trim();
            if (!required.has(label)) {
              return;
            }

            const location = {
              page: table.page > 0 ? table.page : null,
              table: tableIndex + 1,
              row: rowIndex + 1,
            };
            const value = cellAt(row, valueColumn);
            const pattern = patterns[label];

            if (isBlank(value)) {
              findings.push({ location, label, reason: 'blank' });
            } else if (pattern && !pattern.test(value)) {
              findings.push({ location, label, reason: 'pattern' });
            }
          });
        });
      }

      return { kind: 'completeness', section: sectionName, findings };
    },
  };
}
