import { ExtractionRule, FloorLocation, FloorLocationsResult } from './types';
import { cellAt } from './section-lookup';

export function ordinal(n: number): string {
  const lastTwo = n % 100;
  if (lastTwo >= 11 && lastTwo <= 20) {
    return `${n}th`;
  }
  switch (n % 10) {
    case 1:
      return `${n}st`;
    case 2:
      return `${n}nd`;
    case 3:
      return `${n}rd`;
    default:
      return `${n}th`;
  }
}

type Canonicalizer = (match: RegExpExecArray) => string;

interface FloorPattern {
  pattern: RegExp;
  canonical: Canonicalizer;
}

const numbered = (match: RegExpExecArray): number => Number.parseInt(match[1], 10);

const floorFromNumber: Canonicalizer = match => {
  const n = numbered(match);
  return n === 0 ? 'Ground Floor' : `${ordinal(n)} Floor`;
};

// First match wins. Fixed phrases come before the generic numeric forms.
const FLOOR_PATTERNS: FloorPattern[] = [
  { pattern: /\bbasement\s+mezzanine\s+b?(\d+)\b/i, canonical: m => `Basement Mezzanine B${numbered(m)}` },
  { pattern: /\bbasement\s+mezzanine\b/i, canonical: () => 'Basement Mezzanine' },
  { pattern: /\b(?:grd|ground)\s+mezzanine\b/i, canonical: () => 'Grd Mezzanine' },
  { pattern: /\b(\d+)(?:st|nd|rd|th)?\s+mezzanine\b/i, canonical: m => `${ordinal(numbered(m))} Mezzanine` },
  { pattern: /\bexternal\s+walls?\b/i, canonical: () => 'External Wall' },
  { pattern: /\broof/i, canonical: () => 'Roof' },
  { pattern: /\b(?:lower\s+ground|lgf)\b/i, canonical: () => 'Lower Ground Floor' },
  { pattern: /\b(?:upper\s+ground|ugf)\b/i, canonical: () => 'Upper Ground Floor' },
  { pattern: /\b(?:ground|grd|gf)\b/i, canonical: () => 'Ground Floor' },
  { pattern: /\bbasement\s*(?:level\s*)?(\d+)\b/i, canonical: m => `Basement ${numbered(m)}` },
  { pattern: /\bB(\d{1,2})\b/, canonical: m => `Basement ${numbered(m)}` },
  { pattern: /\bbasement\b/i, canonical: () => 'Basement' },
  { pattern: /\blevel\s*(\d+)\b/i, canonical: floorFromNumber },
  { pattern: /\b(\d+)(?:st|nd|rd|th)\b/i, canonical: floorFromNumber },
  { pattern: /\b(?:floor|flr|fl)\s*(\d+)\b/i, canonical: floorFromNumber },
  { pattern: /\bexternal(?:ly)?\b/i, canonical: () => 'External' },
];

/**
 * Canonical floor label for a free-text location, or null when nothing in
 * the text names a floor.
 */
export function canonicalizeFloorLabel(text: string): string | null {
  const trimmed = text.trim();
  if (!trimmed) {
    return null;
  }

  for (const { pattern, canonical } of FLOOR_PATTERNS) {
    const match = pattern.exec(trimmed);
    if (match) {
      return canonical(match);
    }
  }
  return null;
}

export interface FloorLocationsOptions {
  name: string;
  description: string;
  /** Exact heading; every section carrying it is read */
  section: string;
  rowLabel: string;
  labelColumn?: number;
  valueColumn?: number;
}

/**
 * Resolves the value of every row labelled rowLabel (title rows skipped)
 * to a floor. Blank values count as unresolved.
 */
export function createFloorLocationsRule(options: FloorLocationsOptions): ExtractionRule<FloorLocationsResult> {
  const { name, description, section: sectionName, rowLabel, labelColumn = 0, valueColumn = 1 } = options;
  const wanted = rowLabel.toLowerCase();

  return {
    name,
    description,
    extract(document) {
      const locations: FloorLocation[] = [];

      for (const section of document.sections) {
        if (section.name !== sectionName) {
          continue;
        }
        for (const table of section.tables) {
          for (const row of table.rows.slice(1)) {
            if (cellAt(row, labelColumn).trim().toLowerCase() !== wanted) {
              continue;
            }
            const raw = cellAt(row, valueColumn).trim();
            locations.push({ raw, floor: canonicalizeFloorLabel(raw) });
          }
        }
      }

      return {
        kind: 'floor-locations',
        locations,
        unresolved: locations.filter(location => location.floor === null).map(location => location.raw),
      };
    },
  };
}
