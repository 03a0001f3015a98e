import { ExtractionRule, RatingStatementResult } from './types';
import { findSectionWhere } from './section-lookup';

const RATING_STATEMENT = /is[:\s]+(.+)/i;

export interface RatingStatementOptions {
  name: string;
  description: string;
  /** Heading prefix, compared case-insensitively */
  sectionPrefix: string;
}

/**
 * Reads "... is: <rating>" from the paragraphs of the first section whose
 * heading starts with the prefix. Only the first matching paragraph counts.
 */
export function createRatingStatementRule(options: RatingStatementOptions): ExtractionRule<RatingStatementResult> {
  const { name, description, sectionPrefix } = options;
  const prefix = sectionPrefix.toLowerCase();

  return {
    name,
    description,
    extract(document) {
      const section = findSectionWhere(document, heading => heading.toLowerCase().startsWith(prefix));
      let value: string | null = null;

      for (const paragraph of section?.paragraphs ?? []) {
        const match = RATING_STATEMENT.exec(paragraph);
        if (match) {
          value = match[1].trim() || null;
          break;
        }
      }

      return { kind: 'rating-statement', section: section?.name ?? sectionPrefix, value };
    },
  };
}
