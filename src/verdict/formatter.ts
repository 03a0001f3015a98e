import {
  CompletenessResult,
  CountReconciliationResult,
  CrossReferenceResult,
  ExtractionResult,
  FloorLocationsResult,
  FreeFloatingValueResult,
  ListingPresenceResult,
  RatingStatementResult,
  SectionContentResult,
  TableIntegrityResult,
} from '../rules/types';
import { VerdictToken } from '../types';

export type VerdictPlan =
  | { mode: 'local'; answer: string }
  | { mode: 'judge'; prompt: string };

const PASS: VerdictToken = 'PASS';
const FAIL: VerdictToken = 'FAIL';

const local = (answer: string): VerdictPlan => ({ mode: 'local', answer });
const fail = (detail: string): VerdictPlan => local(`${FAIL}: ${detail}`);

function listingPresence(result: ListingPresenceResult): VerdictPlan {
  if (result.section === null) {
    return fail('listing section not found');
  }
  if (result.missing.length === 0) {
    return local(result.passNote ? `${PASS}\n${result.passNote}` : PASS);
  }
  return fail(`${result.section} is missing ${result.missing.join('; ')}`);
}

function countReconciliation(result: CountReconciliationResult): VerdictPlan {
  if (result.remedialBySection.length === 0 && result.sigItemCount === 0) {
    return fail('no Section 1.1 counts or Significant Findings items found');
  }
  const breakdown = result.remedialBySection.map(({ area, count }) => `${area}: ${count}`).join(', ');
  const summary = `Section 1.1 counts: ${breakdown || 'none'} (Total = ${result.remedialTotal})\n`
    + `Significant Findings items found: ${result.sigItemCount}`;

  if (result.remedialTotal === result.sigItemCount) {
    return local(`${PASS}\n${summary}`);
  }
  return fail(`Section 1.1 totals ${result.remedialTotal} but Significant Findings and Action Plan lists ${result.sigItemCount}\n${summary}`);
}

function completeness(result: CompletenessResult): VerdictPlan {
  if (result.findings.length === 0) {
    return local(PASS);
  }
  const detail = result.findings
    .map(({ location, label, reason }) => {
      const page = location.page === null ? 'unknown' : String(location.page);
      return reason === 'blank' ? `page ${page} missing ${label}` : `page ${page} invalid ${label}`;
    })
    .join('; ');
  return fail(detail);
}

function crossReference(questionId: number, result: CrossReferenceResult): VerdictPlan {
  if (!result.narrative.trim()) {
    return fail(`no ${result.narrativeLabel} description found`);
  }
  const identifiers = result.comparedIdentifiers.join(', ') || 'none';
  return {
    mode: 'judge',
    prompt:
      `Question ${questionId}: Compare the plant identifiers recorded in the report's tables with the ${result.narrativeLabel} description.\n\n`
      + `— Identifiers found: ${identifiers}\n`
      + `— Not compared (outlets): ${result.excludedPrefixes.join(', ') || 'none'}\n`
      + `— ${result.narrativeLabel} description: ${result.narrative}\n\n`
      + 'If every identifier is described, reply “PASS”. Otherwise list each identifier missing from the description.',
  };
}

function freeFloatingValue(questionId: number, result: FreeFloatingValueResult): VerdictPlan {
  if (!result.sectionFound) {
    return fail(`no section holding ${result.label} found`);
  }
  if (!result.value.trim()) {
    return fail(`${result.label} is empty`);
  }
  return {
    mode: 'judge',
    prompt:
      `Question ${questionId}: Read the ${result.label}, ensure that there is content within\n\n`
      + `${result.value}\n\n`
      + 'If it’s good and there is content, reply “PASS”. Otherwise reply “FAIL” and list each problem.',
  };
}

function tableIntegrity(result: TableIntegrityResult): VerdictPlan {
  if (result.status === 'ok') {
    return local(PASS);
  }
  if (result.blankCells.length === 0) {
    return fail(result.message);
  }
  const cells = result.blankCells.map(({ row, col }) => `row ${row} column ${col}`).join('; ');
  return fail(`${result.message}: ${cells}`);
}

function ratingStatement(result: RatingStatementResult): VerdictPlan {
  if (result.value === null) {
    return fail(`no rating stated under ${result.section}`);
  }
  return local(`${PASS}\nRating: ${result.value}`);
}

function sectionContent(result: SectionContentResult): VerdictPlan {
  if (result.populated) {
    return local(PASS);
  }
  return fail(`empty table in ${result.emptyTableSections.join('; ')}`);
}

function floorLocations(result: FloorLocationsResult): VerdictPlan {
  if (result.unresolved.length === 0) {
    return local(PASS);
  }
  const locations = result.unresolved.map(raw => (raw ? `'${raw}'` : '(blank)')).join('; ');
  return fail(`no floor recognised in ${locations}`);
}

/**
 * Decides a rule's answer locally, or builds the prompt for the semantic
 * judge when the answer needs reading of free text. Never returns PASS for
 * a result carrying findings.
 */
export function formatVerdict(questionId: number, result: ExtractionResult): VerdictPlan {
  switch (result.kind) {
    case 'listing-presence':
      return listingPresence(result);
    case 'count-reconciliation':
      return countReconciliation(result);
    case 'completeness':
      return completeness(result);
    case 'cross-reference':
      return crossReference(questionId, result);
    case 'free-floating-value':
      return freeFloatingValue(questionId, result);
    case 'table-integrity':
      return tableIntegrity(result);
    case 'rating-statement':
      return ratingStatement(result);
    case 'section-content':
      return sectionContent(result);
    case 'floor-locations':
      return floorLocations(result);
    default: {
      const unhandled: never = result;
      throw new Error(`Unhandled result ${JSON.stringify(unhandled)}`);
    }
  }
}

export function firstLineVerdict(answer: string): string {
  return (answer.trim().split(/\r?\n/)[0] ?? '').trim().toUpperCase();
}

export function overallOutcome(answers: string[]): VerdictToken {
  return answers.every(answer => firstLineVerdict(answer) === PASS) ? PASS : FAIL;
}
