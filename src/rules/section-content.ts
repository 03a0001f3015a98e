import { Section } from '../types';
import { ExtractionRule, SectionContentResult } from './types';

const MAJOR_NUMBER = /^(\d+)\.\d+/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function hasContent(section: Section): boolean {
  return section.tables.some(table => table.rows.length > 0)
    || section.paragraphs.some(paragraph => paragraph.trim().length > 0);
}

export interface SectionContentOptions {
  name: string;
  description: string;
  /** Title following "N.0 " in the root heading, e.g. "Building Description" */
  rootTitle: string;
}

/**
 * Finds every "N.0 <root title>" heading, gathers all "N.x" sections under
 * those majors, and fails when a section holding content also holds an
 * empty table. No root heading, or no section with content, passes.
 */
export function createSectionContentRule(options: SectionContentOptions): ExtractionRule<SectionContentResult> {
  const { name, description, rootTitle } = options;
  const root = new RegExp(`^(\\d+)\\.0\\s+${escapeRegExp(rootTitle)}`, 'i');

  return {
    name,
    description,
    extract(document) {
      const majors = new Set<string>();
      for (const section of document.sections) {
        const match = root.exec(section.name);
        if (match) {
          majors.add(match[1]);
        }
      }

      const withContent = document.sections.filter(section => {
        const match = MAJOR_NUMBER.exec(section.name);
        return match !== null && majors.has(match[1]) && hasContent(section);
      });

      const emptyTableSections = withContent
        .filter(section => section.tables.some(table => table.rows.length === 0))
        .map(section => section.name);

      return {
        kind: 'section-content',
        populated: emptyTableSections.length === 0,
        checkedSections: withContent.map(section => section.name),
        emptyTableSections,
      };
    },
  };
}
