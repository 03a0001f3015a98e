import { deserializeDocument, parseDocument, serializeDocument } from '../document';
import { createHeadingMatcher } from '../headings';
import { line, table } from './fragments';

const isHeading = createHeadingMatcher({ headings: ['Overall Risk Rating'] });

describe('document interchange', () => {
  it('should serialize sections with snake_case source key and table rows', () => {
    const document = parseDocument(
      [
        line('h1', 'Overall Risk Rating', 3, 0.1),
        line('p1', 'Rating table follows', 3, 0.2),
        ...table('t1', 3, 0.3, [['Risk', 'Low']]),
      ],
      'ocr/wo-1.json',
      isHeading
    );

    expect(serializeDocument(document)).toEqual({
      source_key: 'ocr/wo-1.json',
      sections: [
        {
          name: 'Overall Risk Rating',
          paragraphs: ['Rating table follows'],
          tables: [{ id: 't1', page: 3, rows: [['Risk', 'Low']] }],
        },
      ],
    });
  });

  it('should read back what it wrote', () => {
    const document = parseDocument(
      [
        line('h1', 'Overall Risk Rating', 2, 0.1),
        line('p1', 'text', 2, 0.2),
        ...table('t1', 2, 0.3, [['Risk', 'Low']]),
      ],
      'k',
      isHeading
    );

    const restored = deserializeDocument(JSON.parse(JSON.stringify(serializeDocument(document))));

    expect(restored.sourceKey).toBe('k');
    expect(restored.sections[0]).toEqual({
      name: 'Overall Risk Rating',
      page: 2,
      paragraphs: ['text'],
      tables: [{ id: 't1', page: 2, top: 0, rows: [['Risk', 'Low']] }],
    });
  });

  it('should accept the minimal shape without ids or pages', () => {
    const restored = deserializeDocument({
      sections: [{ name: 'Significant Findings and Action Plan', paragraphs: [], tables: [{ rows: [['Observation', 'x']] }] }],
    }, 'override');

    expect(restored.sourceKey).toBe('override');
    expect(restored.sections[0].page).toBe(0);
    expect(restored.sections[0].tables[0]).toEqual({ id: 'table-1', page: 0, top: 0, rows: [['Observation', 'x']] });
  });

  it('should turn malformed parts into empty values', () => {
    const restored = deserializeDocument({
      sections: [
        { name: 7, paragraphs: 'oops', tables: [{ rows: [['a', 3, null]] }, 'bad'] },
      ],
    });

    expect(restored.sections).toEqual([
      {
        name: '',
        page: 0,
        paragraphs: [],
        tables: [
          { id: 'table-1', page: 0, top: 0, rows: [['a', '', '']] },
          { id: 'table-2', page: 0, top: 0, rows: [] },
        ],
      },
    ]);
  });

  it('should return no sections for input that is not a document', () => {
    expect(deserializeDocument(null).sections).toEqual([]);
    expect(deserializeDocument('text').sections).toEqual([]);
    expect(deserializeDocument({}).sections).toEqual([]);
  });
});
