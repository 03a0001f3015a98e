import fs from 'fs/promises';
import { z } from 'zod';
import { parseJSON } from '../utils/validation';

export const HeadingVocabularySchema = z.object({
  version: z.string().min(1),
  headings: z.array(z.string()),
  /** Anchored patterns for numbered sub-headings, e.g. "^\\d+\\.\\d+ Photos$" */
  patterns: z.array(z.string()).default([]),
});

export type HeadingVocabulary = z.infer<typeof HeadingVocabularySchema>;

export type HeadingMatcher = (text: string) => boolean;

/**
 * Build the matcher used by the section builder. A line is a heading when
 * its trimmed text equals a vocabulary entry, or failing that, fully
 * matches one of the patterns.
 */
export function createHeadingMatcher(vocabulary: Pick<HeadingVocabulary, 'headings'> & { patterns?: string[] }): HeadingMatcher {
  const exact = new Set(vocabulary.headings);
  const patterns = (vocabulary.patterns ?? []).map(source => new RegExp(source));

  return (text: string) => {
    const trimmed = text.trim();
    if (exact.has(trimmed)) {
      return true;
    }
    return patterns.some(pattern => {
      const match = pattern.exec(trimmed);
      return match !== null && match[0] === trimmed;
    });
  };
}

export async function loadHeadingVocabulary(filePath: string): Promise<HeadingVocabulary> {
  const content = await fs.readFile(filePath, 'utf-8');
  return parseJSON(HeadingVocabularySchema, content);
}
