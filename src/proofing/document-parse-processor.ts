import { z } from 'zod';
import { HeadingMatcher } from '../parser/headings';
import { parseDocument, serializeDocument } from '../parser/document';
import { ReportStore } from '../storage/report-store';
import { toFragments } from '../textract/blocks';
import { logger } from '../utils/logger';
import { parseJSON, validate } from '../utils/validation';

export const DocumentParseRequestSchema = z.object({
  sourceKey: z.string().min(1),
  outputKey: z.string().min(1).optional(),
});

export type DocumentParseRequest = z.infer<typeof DocumentParseRequestSchema>;

export interface DocumentParseSummary {
  sourceKey: string;
  outputKey: string;
  fragments: number;
  sections: number;
  tables: number;
  paragraphs: number;
}

export interface DocumentParseProcessorOptions {
  store: ReportStore;
  isHeading: HeadingMatcher;
  ocrBucket: string;
  documentBucket: string;
}

export function defaultDocumentKey(sourceKey: string): string {
  return `${sourceKey.replace(/\.json$/i, '')}.sections.json`;
}

/**
 * OCR output in, section model out: reads the analysis JSON from the OCR
 * bucket and writes the interchange document to the document bucket.
 */
export class DocumentParseProcessor {
  constructor(private options: DocumentParseProcessorOptions) {}

  async process(request: unknown): Promise<DocumentParseSummary> {
    const { sourceKey, outputKey = defaultDocumentKey(sourceKey) } = validate(DocumentParseRequestSchema, request);
    const { store, isHeading, ocrBucket, documentBucket } = this.options;

    logger.info({ sourceKey, outputKey }, 'Parsing OCR output');

    const raw = parseJSON(z.unknown(), await store.readText(ocrBucket, sourceKey));
    const fragments = toFragments(raw);
    const document = parseDocument(fragments, sourceKey, isHeading);

    await store.writeJson(documentBucket, outputKey, serializeDocument(document));

    const summary: DocumentParseSummary = {
      sourceKey,
      outputKey,
      fragments: fragments.length,
      sections: document.sections.length,
      tables: document.sections.reduce((sum, section) => sum + section.tables.length, 0),
      paragraphs: document.sections.reduce((sum, section) => sum + section.paragraphs.length, 0),
    };

    logger.info(summary, 'Document parsed');
    return summary;
  }
}
