import { createHeadingMatcher } from '../headings';
import { buildSections } from '../section-builder';
import { FragmentIndex } from '../text-index';
import { Fragment } from '../../types/ocr';
import { line, table } from './fragments';

const isHeading = createHeadingMatcher({
  headings: ['1.1 Areas Identified', 'Significant Findings and Action Plan', 'Overall Risk Rating'],
});

const build = (fragments: Fragment[]) => buildSections(new FragmentIndex(fragments), isHeading);

describe('buildSections', () => {
  it('should drop text before the first heading', () => {
    const sections = build([
      line('l1', 'Cover page', 1, 0.05),
      line('l2', '1.1 Areas Identified', 1, 0.1),
      line('l3', 'Two areas need work', 1, 0.2),
    ]);

    expect(sections).toHaveLength(1);
    expect(sections[0]).toMatchObject({ name: '1.1 Areas Identified', page: 1, paragraphs: ['Two areas need work'] });
  });

  it('should sort lines by top and match headings on trimmed text', () => {
    const sections = build([
      line('l3', 'second paragraph', 1, 0.3),
      line('l1', '  Overall Risk Rating  ', 1, 0.1),
      line('l2', 'first paragraph', 1, 0.2),
    ]);

    expect(sections).toEqual([
      { name: 'Overall Risk Rating', page: 1, paragraphs: ['first paragraph', 'second paragraph'], tables: [] },
    ]);
  });

  it('should attach a table lying below a paragraph line to the open section', () => {
    const sections = build([
      line('h1', '1.1 Areas Identified', 1, 0.1),
      line('p1', 'Summary', 1, 0.2),
      ...table('t1', 1, 0.25, [['Area', 'Count'], ['Roof', '2']]),
      line('h2', 'Significant Findings and Action Plan', 1, 0.5),
      line('p2', 'Item one', 1, 0.6),
    ]);

    expect(sections.map(section => section.name)).toEqual(['1.1 Areas Identified', 'Significant Findings and Action Plan']);
    expect(sections[0].tables.map(t => t.id)).toEqual(['t1']);
    expect(sections[1].tables).toEqual([]);
  });

  it('should give leftover tables at the end of a page to the last section', () => {
    const sections = build([
      line('h1', '1.1 Areas Identified', 1, 0.1),
      line('h2', 'Significant Findings and Action Plan', 1, 0.2),
      ...table('t1', 1, 0.3, [['Observation', 'Loose lid']]),
      ...table('t2', 1, 0.6, [['Observation', 'Corrosion']]),
    ]);

    expect(sections[0].tables).toEqual([]);
    expect(sections[1].tables.map(t => t.id)).toEqual(['t1', 't2']);
  });

  it('should keep a section open across pages', () => {
    const sections = build([
      line('h1', 'Significant Findings and Action Plan', 1, 0.8),
      line('p1', 'continued', 2, 0.1),
      ...table('t1', 2, 0.2, [['Observation', 'Loose lid']]),
    ]);

    expect(sections).toHaveLength(1);
    expect(sections[0].paragraphs).toEqual(['continued']);
    expect(sections[0].tables.map(t => t.page)).toEqual([2]);
  });

  it('should drop tables on pages before any heading', () => {
    const sections = build([
      ...table('t0', 1, 0.2, [['Client', 'Example']]),
      line('h1', 'Overall Risk Rating', 2, 0.1),
    ]);

    expect(sections).toEqual([{ name: 'Overall Risk Rating', page: 2, paragraphs: [], tables: [] }]);
  });

  it('should attach tables lying above the next paragraph at the end of the page', () => {
    const sections = build([
      line('h1', 'Overall Risk Rating', 1, 0.1),
      ...table('t1', 1, 0.15, [['A']]),
      ...table('t2', 1, 0.18, [['B']]),
      line('p1', 'after tables', 1, 0.5),
    ]);

    expect(sections[0].paragraphs).toEqual(['after tables']);
    expect(sections[0].tables.map(t => t.id)).toEqual(['t1', 't2']);
  });

  it('should attach every table below a paragraph line even past a later heading on the page', () => {
    const sections = build([
      line('h1', '1.1 Areas Identified', 1, 0.1),
      line('p1', 'Summary', 1, 0.2),
      ...table('t1', 1, 0.3, [['Roof', '2']]),
      line('h2', 'Overall Risk Rating', 1, 0.5),
      line('p2', 'Rating follows', 1, 0.6),
      ...table('t2', 1, 0.7, [['Low']]),
    ]);

    expect(sections[0].tables.map(t => t.id)).toEqual(['t1', 't2']);
    expect(sections[1].tables).toEqual([]);
  });

  it('should produce identical output when run twice on the same input', () => {
    const fragments = [
      line('h1', '1.1 Areas Identified', 1, 0.1),
      line('p1', 'same top a', 1, 0.2),
      line('p2', 'same top b', 1, 0.2),
      ...table('t1', 1, 0.3, [['Area', 'Count']]),
      line('p3', 'end', 1, 0.4),
    ];

    const first = JSON.stringify(build(fragments));
    const second = JSON.stringify(build(fragments));

    expect(second).toBe(first);
    expect(build(fragments)[0].paragraphs).toEqual(['same top a', 'same top b', 'end']);
  });

  it('should return sections in heading order with no shared tables', () => {
    const sections = build([
      line('h1', '1.1 Areas Identified', 1, 0.1),
      line('p1', 'x', 1, 0.15),
      ...table('t1', 1, 0.2, [['Roof', '1']]),
      line('h2', 'Overall Risk Rating', 2, 0.1),
      line('p2', 'y', 2, 0.15),
      ...table('t2', 2, 0.2, [['Low']]),
    ]);

    expect(sections.map(section => section.name)).toEqual(['1.1 Areas Identified', 'Overall Risk Rating']);
    expect(sections[0].tables.map(t => t.id)).toEqual(['t1']);
    expect(sections[1].tables.map(t => t.id)).toEqual(['t2']);
  });
});
