import { ChecklistId } from '../types';
import { RuleRegistry } from './registry';
import { createListingPresenceRule } from './listing-presence';
import { createCountReconciliationRule } from './count-reconciliation';
import { createCompletenessRule, DATE_DD_MM_YYYY } from './completeness';
import { createFreeFloatingValueRule } from './free-floating-value';
import { createCrossReferenceRule } from './cross-reference';
import { createTableIntegrityRule } from './table-integrity';
import { createRatingStatementRule } from './rating-statement';
import { createSectionContentRule } from './section-content';
import { createFloorLocationsRule } from './floor-labels';

export const ACTION_PLAN_SECTION = 'Significant Findings and Action Plan';
const REMEDIAL_PREFIX = '1.1 Areas';
const FINDINGS_PREFIX = 'Significant Findings';

export interface WorkOrderMeta {
  workOrderId: string;
  workOrderNumber: string;
  buildingName: string;
  workTypeRef: string;
  /** Assessor's full name; the first word is used in the greeting */
  resourceName?: string;
}

export interface Checklist {
  id: ChecklistId;
  title: string;
  registry: RuleRegistry;
  /** Email heading per question, in the order the email lists them */
  headings: Map<number, string>;
  subject(meta: WorkOrderMeta, outcome: string): string;
  /** Whether the email links to the proofreading changes CSV */
  changesLink: boolean;
}

const countReconciliation = () =>
  createCountReconciliationRule({
    name: 'remedial-count-reconciliation',
    description: 'Section 1.1 remedial action totals against the action plan items',
    remedialPrefix: REMEDIAL_PREFIX,
    findingsPrefix: FINDINGS_PREFIX,
  });

const actionPlanCompleteness = () =>
  createCompletenessRule({
    name: 'action-plan-completeness',
    description: 'Every action plan item has an observation, a target date and an action',
    section: ACTION_PLAN_SECTION,
    requiredLabels: ['Observation', 'Target Date', 'Action Required'],
    patterns: { 'Target Date': DATE_DD_MM_YYYY },
  });

export function createHsaChecklist(): Checklist {
  const registry = new RuleRegistry()
    .register(2, createListingPresenceRule({
      name: 'risk-dashboard-listing',
      description: 'Risk dashboard lists every required risk measure',
      section: '2.0 Risk Dashboard',
      // Legionella Inherent Risk is not printed as a table row
      expected: ['Risk Rating Levels', 'Management Control of Legionella Risk'],
      passNote: 'Check Legionella Inherent Risk manually',
    }))
    .register(3, countReconciliation())
    .register(4, createFreeFloatingValueRule({
      name: 'property-description',
      description: 'Property site description has content',
      section: heading => {
        const lowered = heading.toLowerCase();
        return lowered.endsWith('property description') || lowered.includes('property site/description');
      },
      row: { label: 'Property Site/Description', match: 'prefix', ignoreSpaces: true },
    }))
    .register(6, createCrossReferenceRule({
      name: 'core-plant-cross-reference',
      description: 'Plant identifiers used in the tables are described under Core Plant',
      narrativeSection: heading => heading.toLowerCase().includes('water system description'),
      narrativeRow: { label: 'Core Plant', match: 'prefix' },
      excludedPrefixes: ['SHOWER', 'TAP', 'TMV'],
    }))
    .register(9, createTableIntegrityRule({
      name: 'overall-risk-rating',
      description: 'Overall risk rating table is fully filled in',
      section: 'Overall Risk Rating',
    }))
    .register(11, actionPlanCompleteness());

  return {
    id: 'hsa',
    title: 'Water Hygiene Risk Assessment',
    registry,
    headings: new Map([
      [2, 'Risk Dashboard listing check'],
      [3, 'Totals consistency check (Section 1.1 vs Significant Findings and Action Plan)'],
      [4, 'Building Description completeness assessment'],
      [6, 'Core Plant cross-reference check'],
      [9, 'Risk Rating & Management Control review'],
      [11, 'Verify Content listed in Significant Findings and Action Plan is complete'],
    ]),
    subject: (meta, outcome) =>
      `AI || ${meta.workOrderNumber}/${meta.workOrderId} || ${meta.buildingName} || ${meta.workTypeRef} || ${outcome}`,
    changesLink: false,
  };
}

export function createFraChecklist(): Checklist {
  const registry = new RuleRegistry()
    .register(3, countReconciliation())
    .register(4, createSectionContentRule({
      name: 'building-description-content',
      description: 'Building description sections holding content have no empty table',
      rootTitle: 'Building Description',
    }))
    .register(9, createRatingStatementRule({
      name: 'life-safety-risk-rating',
      description: 'Life safety risk rating is stated',
      sectionPrefix: 'Life Safety Risk Rating at this Premises',
    }))
    .register(11, actionPlanCompleteness())
    .register(12, createFloorLocationsRule({
      name: 'action-plan-floor-locations',
      description: 'Every action plan location names a floor',
      section: ACTION_PLAN_SECTION,
      rowLabel: 'Location',
    }));

  return {
    id: 'fra',
    title: 'Fire Risk Assessment',
    registry,
    headings: new Map([
      [3, 'Totals consistency check (Section 1.1 vs Significant Findings and Action Plan)'],
      [4, 'Building Description completeness assessment'],
      [9, 'Life Safety Risk Rating at this Premises review'],
      [11, 'Verify Content listed in Significant Findings and Action Plan is complete'],
      [12, 'Action Plan floor locations check'],
    ]),
    subject: (meta, outcome) =>
      `${outcome} || ${meta.workOrderNumber}/${meta.workOrderId} || ${meta.buildingName} || ${meta.workTypeRef}`,
    changesLink: true,
  };
}

export function createChecklist(id: ChecklistId): Checklist {
  switch (id) {
    case 'hsa':
      return createHsaChecklist();
    case 'fra':
      return createFraChecklist();
    default: {
      const unknown: never = id;
      throw new Error(`Unknown checklist ${String(unknown)}`);
    }
  }
}
