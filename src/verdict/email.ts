import { Checklist, WorkOrderMeta } from '../rules/checklists';

export interface EmailLinks {
  workOrderUrl?: string;
  pdfUrl?: string;
  changesUrl?: string;
}

export interface ComposedEmail {
  subject: string;
  html: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

export function firstName(resourceName: string | undefined): string {
  const first = resourceName?.trim().split(/\s+/)[0];
  return first ? first : 'there';
}

function link(text: string, url: string): string {
  return `<p>${text}: <a href="${escapeHtml(url)}">here</a></p>`;
}

/**
 * Subject line and HTML body for one proofing run. Questions without an
 * answer are listed as "(no result)".
 */
export function composeEmail(
  checklist: Checklist,
  meta: WorkOrderMeta,
  answers: Map<number, string>,
  outcome: string,
  links: EmailLinks = {}
): ComposedEmail {
  const lines: string[] = [
    `<p>Hello ${escapeHtml(firstName(meta.resourceName))},</p>`,
    `<p>Below are the proofing outputs for '<strong>${escapeHtml(meta.buildingName)}</strong>' `
      + `(Work Order #${escapeHtml(meta.workOrderNumber)}):</p>`,
  ];

  for (const [questionId, heading] of checklist.headings) {
    const answer = answers.get(questionId) ?? '(no result)';
    const body = answer.split(/\r?\n/).map(escapeHtml).join('<br>');
    lines.push(`<p><strong>${escapeHtml(heading)}:</strong><br>${body}</p>`);
  }

  lines.push('<p>Regards,<br>Digital Validation</p>');

  if (links.workOrderUrl) {
    lines.push(link('Link to Work Order can be accessed', links.workOrderUrl));
  }
  if (links.pdfUrl) {
    lines.push(link('Link to the PDF can be accessed', links.pdfUrl));
  }
  if (checklist.changesLink && links.changesUrl) {
    lines.push(link('Link to the spelling/grammar changes made to the Building Description &amp; Actions can be found', links.changesUrl));
  }

  return {
    subject: checklist.subject(meta, outcome),
    html: lines.join('\n'),
  };
}
