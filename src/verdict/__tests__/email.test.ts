import { createFraChecklist, createHsaChecklist, WorkOrderMeta } from '../../rules/checklists';
import { composeEmail, escapeHtml, firstName } from '../email';

const meta: WorkOrderMeta = {
  workOrderId: 'WO-ID-9',
  workOrderNumber: '00067890',
  buildingName: 'Smith & Sons <Depot>',
  workTypeRef: 'FRA',
  resourceName: 'Alex Example',
};

describe('composeEmail', () => {
  it('should greet, list every question and sign off', () => {
    const email = composeEmail(
      createFraChecklist(),
      meta,
      new Map([
        [3, 'PASS'],
        [4, 'FAIL: empty table in 5.2 Number of Floors'],
        [9, 'PASS\nRating: Moderate'],
        [11, 'PASS'],
      ]),
      'FAIL'
    );

    expect(email.subject).toBe('FAIL || 00067890/WO-ID-9 || Smith & Sons <Depot> || FRA');
    expect(email.html.split('\n')).toEqual([
      '<p>Hello Alex,</p>',
      "<p>Below are the proofing outputs for '<strong>Smith &amp; Sons &lt;Depot&gt;</strong>' (Work Order #00067890):</p>",
      '<p><strong>Totals consistency check (Section 1.1 vs Significant Findings and Action Plan):</strong><br>PASS</p>',
      '<p><strong>Building Description completeness assessment:</strong><br>FAIL: empty table in 5.2 Number of Floors</p>',
      '<p><strong>Life Safety Risk Rating at this Premises review:</strong><br>PASS<br>Rating: Moderate</p>',
      '<p><strong>Verify Content listed in Significant Findings and Action Plan is complete:</strong><br>PASS</p>',
      '<p><strong>Action Plan floor locations check:</strong><br>(no result)</p>',
      '<p>Regards,<br>Digital Validation</p>',
    ]);
  });

  it('should add the links it is given', () => {
    const email = composeEmail(createFraChecklist(), meta, new Map(), 'FAIL', {
      workOrderUrl: 'https://example.test/wo/WO-ID-9',
      pdfUrl: 'https://example.test/report.pdf',
      changesUrl: 'https://example.test/changes.csv?a=1&b=2',
    });
    const lines = email.html.split('\n');

    expect(lines.slice(-3)).toEqual([
      '<p>Link to Work Order can be accessed: <a href="https://example.test/wo/WO-ID-9">here</a></p>',
      '<p>Link to the PDF can be accessed: <a href="https://example.test/report.pdf">here</a></p>',
      '<p>Link to the spelling/grammar changes made to the Building Description &amp; Actions can be found: '
        + '<a href="https://example.test/changes.csv?a=1&amp;b=2">here</a></p>',
    ]);
  });

  it('should leave the changes link out of checklists without one', () => {
    const email = composeEmail(createHsaChecklist(), meta, new Map(), 'PASS', { changesUrl: 'https://example.test/c.csv' });

    expect(email.html).not.toContain('c.csv');
    expect(email.subject).toBe('AI || 00067890/WO-ID-9 || Smith & Sons <Depot> || FRA || PASS');
  });

  it('should escape answers from the judge', () => {
    const email = composeEmail(createHsaChecklist(), meta, new Map([[4, 'FAIL\n<script>x</script>']]), 'FAIL');

    expect(email.html).toContain('<p><strong>Building Description completeness assessment:</strong><br>FAIL<br>&lt;script&gt;x&lt;/script&gt;</p>');
  });
});

describe('email helpers', () => {
  it('should default the greeting name', () => {
    expect(firstName(undefined)).toBe('there');
    expect(firstName('   ')).toBe('there');
    expect(firstName(' Sam  Taylor')).toBe('Sam');
  });

  it('should escape quotes', () => {
    expect(escapeHtml(`"it's"`)).toBe('&quot;it&#39;s&quot;');
  });
});
