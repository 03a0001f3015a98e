import { z } from 'zod';
import {
  ParsedDocument,
  SerializedDocument,
  Table,
} from '../types';
import { Fragment } from '../types/ocr';
import { HeadingMatcher } from './headings';
import { buildSections } from './section-builder';
import { FragmentIndex } from './text-index';

/**
 * Run one parse pass: index the fragments, rebuild the tables and group
 * everything into sections.
 */
export function parseDocument(fragments: Fragment[], sourceKey: string, isHeading: HeadingMatcher): ParsedDocument {
  const index = new FragmentIndex(fragments);
  return {
    sourceKey,
    sections: buildSections(index, isHeading),
  };
}

export function serializeDocument(document: ParsedDocument): SerializedDocument {
  return {
    source_key: document.sourceKey,
    sections: document.sections.map(section => ({
      name: section.name,
      paragraphs: [...section.paragraphs],
      tables: section.tables.map(table => ({
        id: table.id,
        page: table.page,
        rows: table.rows.map(row => [...row]),
      })),
    })),
  };
}

const CellSchema = z.unknown().transform(value => (typeof value === 'string' ? value : ''));

const SerializedTableSchema = z.object({
  id: z.string().optional().catch(undefined),
  page: z.number().nullable().optional().catch(null),
  rows: z.array(z.array(CellSchema).catch([])).catch([]).default([]),
});

const SerializedSectionSchema = z.object({
  name: z.string().catch('').default(''),
  paragraphs: z.array(z.string().catch('')).catch([]).default([]),
  tables: z.array(SerializedTableSchema.catch({ rows: [] })).catch([]).default([]),
});

const SerializedDocumentSchema = z.object({
  source_key: z.string().optional().catch(undefined),
  sections: z.array(SerializedSectionSchema.catch({ name: '', paragraphs: [], tables: [] })).catch([]).default([]),
}).catch({ sections: [] });

/**
 * Read the interchange shape back into a document. Absent or malformed
 * parts become empty values; this never throws.
 */
export function deserializeDocument(raw: unknown, sourceKey?: string): ParsedDocument {
  const parsed = SerializedDocumentSchema.parse(raw);

  return {
    sourceKey: sourceKey ?? parsed.source_key ?? '',
    sections: parsed.sections.map(section => ({
      name: section.name,
      page: firstTablePage(section.tables) ?? 0,
      paragraphs: section.paragraphs,
      tables: section.tables.map((table, tableIndex): Table => ({
        id: table.id ?? `table-${tableIndex + 1}`,
        page: table.page ?? 0,
        top: 0,
        rows: table.rows,
      })),
    })),
  };
}

function firstTablePage(tables: Array<{ page?: number | null }>): number | null {
  for (const table of tables) {
    if (typeof table.page === 'number') {
      return table.page;
    }
  }
  return null;
}
