import { CountReconciliationResult, ExtractionRule, RemedialCount } from './types';
import { cellAt, findSection, parseCount, sectionsWithPrefix } from './section-lookup';

export interface CountReconciliationOptions {
  name: string;
  description: string;
  /** Heading prefix of the sections holding per-area action counts */
  remedialPrefix: string;
  /** Heading prefix of the section whose tables are the findings */
  findingsPrefix: string;
  labelColumn?: number;
  countColumn?: number;
}

/**
 * Sums the count column of every table under the remedial sections (header
 * rows skipped, unparseable counts skipped) and counts the tables of the
 * first findings section.
 */
export function createCountReconciliationRule(options: CountReconciliationOptions): ExtractionRule<CountReconciliationResult> {
  const { name, description, remedialPrefix, findingsPrefix, labelColumn = 0, countColumn = 1 } = options;

  return {
    name,
    description,
    extract(document) {
      const remedialBySection: RemedialCount[] = [];
      let remedialTotal = 0;

      for (const section of sectionsWithPrefix(document, remedialPrefix)) {
        for (const table of section.tables) {
          for (const row of table.rows.slice(1)) {
            const count = parseCount(row[countColumn]);
            if (count === null) {
              continue;
            }
            remedialBySection.push({ area: cellAt(row, labelColumn), count });
            remedialTotal += count;
          }
        }
      }

      const findings = findSection(document, findingsPrefix, 'prefix');

      return {
        kind: 'count-reconciliation',
        remedialBySection,
        remedialTotal,
        sigItemCount: findings ? findings.tables.length : 0,
      };
    },
  };
}
