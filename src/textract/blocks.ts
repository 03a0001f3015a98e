/**
 * Textract AnalyzeDocument adapter.
 * Converts raw Textract output into fragments. Every block is validated on
 * its own; blocks that fail validation or carry an unsupported type are
 * skipped rather than failing the whole document.
 */

import { z } from 'zod';
import {
  BoundingBox,
  Fragment,
  FragmentKind,
} from '../types/ocr';

const BoundingBoxSchema = z.object({
  Top: z.number().catch(0).default(0),
  Left: z.number().catch(0).default(0),
  Width: z.number().catch(0).default(0),
  Height: z.number().catch(0).default(0),
});

const RelationshipSchema = z.object({
  Type: z.string().optional(),
  Ids: z.array(z.string()).catch([]).default([]),
});

export const BlockSchema = z.object({
  BlockType: z.string(),
  Id: z.string().optional(),
  Page: z.number().int().positive().optional(),
  Text: z.string().optional(),
  SelectionStatus: z.string().optional(),
  RowIndex: z.number().int().optional(),
  ColumnIndex: z.number().int().optional(),
  Geometry: z.object({
    BoundingBox: BoundingBoxSchema.optional(),
  }).passthrough().optional(),
  Relationships: z.array(RelationshipSchema).catch([]).default([]),
}).passthrough();

export type TextractBlock = z.infer<typeof BlockSchema>;

const SUPPORTED_KINDS: ReadonlySet<string> = new Set<FragmentKind>([
  'LINE',
  'TABLE',
  'CELL',
  'WORD',
  'SELECTION_MARK',
]);

function isFragmentKind(value: string): value is FragmentKind {
  return SUPPORTED_KINDS.has(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Collect the raw block objects from an AnalyzeDocument response, an array
 * of paginated responses, or a bare block array.
 */
export function collectRawBlocks(raw: unknown): unknown[] {
  if (Array.isArray(raw)) {
    return raw.flatMap(item => (isRecord(item) && 'Blocks' in item ? collectRawBlocks(item) : [item]));
  }
  if (isRecord(raw) && Array.isArray(raw.Blocks)) {
    return raw.Blocks;
  }
  return [];
}

export function parseBlocks(raw: unknown): TextractBlock[] {
  const blocks: TextractBlock[] = [];
  collectRawBlocks(raw).forEach((candidate, index) => {
    const result = BlockSchema.safeParse(candidate);
    if (!result.success) {
      return;
    }
    const block = result.data;
    blocks.push(block.Id ? block : { ...block, Id: `${block.BlockType}-${index}` });
  });
  return blocks;
}

function toBox(block: TextractBlock): BoundingBox {
  const box = block.Geometry?.BoundingBox;
  return {
    top: box?.Top ?? 0,
    left: box?.Left ?? 0,
    width: box?.Width ?? 0,
    height: box?.Height ?? 0,
  };
}

function childIdsOf(block: TextractBlock): string[] {
  return block.Relationships
    .filter(relationship => relationship.Type === 'CHILD')
    .flatMap(relationship => relationship.Ids);
}

/**
 * Convert Textract output into fragments, in the order the blocks appear.
 */
export function toFragments(raw: unknown): Fragment[] {
  const blocks = parseBlocks(raw);

  // A CELL's owning table is the TABLE block that lists it as a child
  const owningTable = new Map<string, string>();
  for (const block of blocks) {
    if (block.BlockType === 'TABLE' && block.Id) {
      for (const childId of childIdsOf(block)) {
        if (!owningTable.has(childId)) {
          owningTable.set(childId, block.Id);
        }
      }
    }
  }

  const fragments: Fragment[] = [];
  for (const block of blocks) {
    const kind = block.BlockType;
    if (!isFragmentKind(kind) || !block.Id) {
      continue;
    }

    const base = {
      id: block.Id,
      page: block.Page ?? 1,
      box: toBox(block),
      childIds: childIdsOf(block),
    };

    switch (kind) {
      case 'LINE':
        fragments.push({ ...base, kind, text: block.Text ?? '' });
        break;
      case 'WORD':
        fragments.push({ ...base, kind, text: block.Text ?? '' });
        break;
      case 'TABLE':
        fragments.push({ ...base, kind });
        break;
      case 'CELL':
        fragments.push({
          ...base,
          kind,
          tableId: owningTable.get(block.Id) ?? null,
          rowIndex: block.RowIndex ?? 0,
          columnIndex: block.ColumnIndex ?? 0,
        });
        break;
      case 'SELECTION_MARK':
        fragments.push({ ...base, kind, selected: block.SelectionStatus === 'SELECTED' });
        break;
      default: {
        const unreachable: never = kind;
        throw new Error(`Unhandled fragment kind: ${String(unreachable)}`);
      }
    }
  }

  return fragments;
}
