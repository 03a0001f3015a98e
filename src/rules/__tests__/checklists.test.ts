import { createChecklist, createFraChecklist, createHsaChecklist, WorkOrderMeta } from '../checklists';
import { formatVerdict } from '../../verdict/formatter';
import { document, section } from './documents';

const meta: WorkOrderMeta = {
  workOrderId: 'WO-ID-1',
  workOrderNumber: '00012345',
  buildingName: 'Example House',
  workTypeRef: 'HSA',
};

describe('checklists', () => {
  it('should register the HSA questions with an email heading each', () => {
    const hsa = createHsaChecklist();

    expect(hsa.registry.questionIds()).toEqual([2, 3, 4, 6, 9, 11]);
    expect([...hsa.headings.keys()]).toEqual([2, 3, 4, 6, 9, 11]);
    expect(hsa.subject(meta, 'PASS')).toBe('AI || 00012345/WO-ID-1 || Example House || HSA || PASS');
    expect(hsa.changesLink).toBe(false);
  });

  it('should register the FRA questions with the outcome first in the subject', () => {
    const fra = createFraChecklist();

    expect(fra.registry.questionIds()).toEqual([3, 4, 9, 11, 12]);
    expect(fra.headings.get(9)).toBe('Life Safety Risk Rating at this Premises review');
    expect(fra.subject(meta, 'FAIL')).toBe('FAIL || 00012345/WO-ID-1 || Example House || HSA');
    expect(fra.changesLink).toBe(true);
  });

  it('should build a fresh registry per checklist', () => {
    expect(createChecklist('hsa').registry).not.toBe(createChecklist('hsa').registry);
    expect(createChecklist('fra').id).toBe('fra');
  });

  it('should pass a risk dashboard without an inherent risk row and ask for a manual check', () => {
    const outcome = createHsaChecklist().registry.evaluate(2, document(
      section('2.0 Risk Dashboard', [[
        ['Measure', 'Rating'],
        ['Risk Rating Levels', 'Medium'],
        ['Management Control of Legionella Risk', 'Good'],
      ]])
    ));

    expect(outcome).toMatchObject({
      status: 'ok',
      result: { kind: 'listing-presence', missing: [], passNote: 'Check Legionella Inherent Risk manually' },
    });
    if (outcome.status !== 'ok') {
      throw new Error(outcome.error);
    }
    expect(formatVerdict(2, outcome.result)).toEqual({
      mode: 'local',
      answer: 'PASS\nCheck Legionella Inherent Risk manually',
    });
  });

  it('should read the HSA property description from the labelled row', () => {
    const outcome = createHsaChecklist().registry.evaluate(4, document(
      section('Property Site/Description', [[['Property Site/Description', 'Detached office building']]])
    ));

    expect(outcome).toMatchObject({
      status: 'ok',
      result: { kind: 'free-floating-value', sectionFound: true, value: 'Detached office building' },
    });
  });

  it('should check action plan target dates for DD/MM/YYYY', () => {
    const outcome = createFraChecklist().registry.evaluate(11, document(
      section('Significant Findings and Action Plan', [[
        ['Item 1', ''],
        ['Observation', 'Wedged door'],
        ['Target Date', 'Within 1 month'],
        ['Action Required', 'Remove wedge'],
      ]], [], 7)
    ));

    expect(outcome).toMatchObject({
      status: 'ok',
      result: { findings: [{ location: { page: 7, table: 1, row: 3 }, label: 'Target Date', reason: 'pattern' }] },
    });
  });
});
