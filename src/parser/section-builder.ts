import { Section, Table } from '../types';
import { HeadingMatcher } from './headings';
import { reconstructTable } from './table-reconstructor';
import { FragmentIndex } from './text-index';

/**
 * Walk pages in order and group lines and tables into sections.
 *
 * A heading line opens a section that stays current, across pages, until
 * the next heading. Lines before the first heading are dropped. Before each
 * paragraph line is stored, the page's unattached tables lying below that
 * line (table top > line top) are attached to the current section, in table
 * order, stopping at the first table that is not below it. Tables still
 * unattached at the end of the page go to the last opened section, or are
 * dropped when no section has been opened yet.
 *
 * Multi-column layouts are not handled: a table that sits above the text it
 * belongs to can land in the preceding section.
 */
export function buildSections(index: FragmentIndex, isHeading: HeadingMatcher): Section[] {
  const sections: Section[] = [];
  let current: Section | null = null;

  for (const page of index.pages()) {
    const tables: Table[] = index.tablesOn(page).map(table => reconstructTable(index, table));
    let cursor = 0;

    for (const line of index.linesOn(page)) {
      if (isHeading(line.text)) {
        current = { name: line.text.trim(), page, paragraphs: [], tables: [] };
        sections.push(current);
        continue;
      }

      if (!current) {
        continue;
      }

      while (cursor < tables.length && tables[cursor].top > line.box.top) {
        current.tables.push(tables[cursor]);
        cursor++;
      }

      current.paragraphs.push(line.text);
    }

    if (current) {
      while (cursor < tables.length) {
        current.tables.push(tables[cursor]);
        cursor++;
      }
    }
  }

  return sections;
}
