import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { deserializeDocument } from '../parser/document';
import { Checklist, WorkOrderMeta } from '../rules/checklists';
import { RuleOutcome } from '../rules/registry';
import { ExtractionResult } from '../rules/types';
import { SemanticJudge } from '../judge/semantic-judge';
import { ReportStore } from '../storage/report-store';
import { ChecklistId, VerdictToken } from '../types';
import { composeEmail, ComposedEmail, EmailLinks } from '../verdict/email';
import { formatVerdict, overallOutcome } from '../verdict/formatter';
import { logger } from '../utils/logger';
import { errorMessage, parseJSON, validate } from '../utils/validation';

export const ProofingEventSchema = z.object({
  /** Parsed document JSON; the bucket defaults to the document bucket */
  textract_bucket: z.string().min(1).optional(),
  textract_key: z.string().min(1),
  /** Assessment PDF; the bucket defaults to the document bucket */
  bucket_name: z.string().min(1).optional(),
  document_key: z.string().min(1).optional(),
  workOrderId: z.string().min(1),
  workOrderNumber: z.string().min(1),
  buildingName: z.string().default(''),
  workTypeRef: z.string().default(''),
  resourceName: z.string().optional(),
});

export type ProofingEvent = z.infer<typeof ProofingEventSchema>;

export type AnswerMode = 'local' | 'judge' | 'error';

export interface QuestionAnswer {
  questionId: number;
  rule: string;
  mode: AnswerMode;
  answer: string;
  result?: ExtractionResult;
}

export interface ProofingReport {
  runId: string;
  checklist: ChecklistId;
  workOrderId: string;
  documentKey: string;
  outcome: VerdictToken;
  answers: QuestionAnswer[];
  email: ComposedEmail;
  reportKey: string;
  createdAt: string;
}

export interface ChecklistProofingProcessorOptions {
  store: ReportStore;
  judge: SemanticJudge;
  documentBucket: string;
  reportBucket: string;
  signedUrlExpirySeconds: number;
  /** "{id}" is replaced with the work order id */
  workOrderUrlTemplate?: string;
}

export function changesKey(workOrderId: string): string {
  return `changes/${workOrderId}_changes.csv`;
}

/**
 * Runs one checklist over a parsed document. Every question gets an
 * answer: a rule or judge failure becomes an "ERROR: ..." answer and the
 * remaining questions still run.
 */
export class ChecklistProofingProcessor {
  constructor(private options: ChecklistProofingProcessorOptions) {}

  async process(checklist: Checklist, rawEvent: unknown): Promise<ProofingReport> {
    const event = validate(ProofingEventSchema, rawEvent);
    const runId = uuidv4();
    const { store, documentBucket, reportBucket } = this.options;

    logger.info({ runId, checklist: checklist.id, workOrderId: event.workOrderId, documentKey: event.textract_key }, 'Proofing started');

    const raw = parseJSON(z.unknown(), await store.readText(event.textract_bucket ?? documentBucket, event.textract_key));
    const document = deserializeDocument(raw, event.textract_key);

    const answers: QuestionAnswer[] = [];
    for (const outcome of checklist.registry.evaluateAll(document)) {
      answers.push(await this.answer(outcome, runId));
    }

    const outcome = overallOutcome(answers.map(answer => answer.answer));
    const meta: WorkOrderMeta = {
      workOrderId: event.workOrderId,
      workOrderNumber: event.workOrderNumber,
      buildingName: event.buildingName,
      workTypeRef: event.workTypeRef,
      resourceName: event.resourceName,
    };
    const links = await this.links(checklist, event);
    const email = composeEmail(
      checklist,
      meta,
      new Map(answers.map(answer => [answer.questionId, answer.answer])),
      outcome,
      links
    );

    const reportKey = `${checklist.id}/${event.workOrderId}/${runId}.json`;
    const report: ProofingReport = {
      runId,
      checklist: checklist.id,
      workOrderId: event.workOrderId,
      documentKey: event.textract_key,
      outcome,
      answers,
      email,
      reportKey,
      createdAt: new Date().toISOString(),
    };

    await store.writeJson(reportBucket, reportKey, report);

    logger.info({ runId, checklist: checklist.id, workOrderId: event.workOrderId, outcome }, 'Proofing complete');
    return report;
  }

  private async answer(outcome: RuleOutcome, runId: string): Promise<QuestionAnswer> {
    const { questionId, rule } = outcome;

    if (outcome.status === 'error') {
      logger.warn({ runId, questionId, rule, error: outcome.error }, 'Rule failed');
      return { questionId, rule, mode: 'error', answer: `ERROR: ${outcome.error}` };
    }

    const plan = formatVerdict(questionId, outcome.result);
    if (plan.mode === 'local') {
      return { questionId, rule, mode: 'local', answer: plan.answer, result: outcome.result };
    }

    try {
      logger.info({ runId, questionId, rule }, 'Asking semantic judge');
      const reply = await this.options.judge.judge(plan.prompt);
      return { questionId, rule, mode: 'judge', answer: reply.trim() || '(empty response)', result: outcome.result };
    } catch (error) {
      logger.warn({ runId, questionId, rule, error: errorMessage(error) }, 'Semantic judge failed');
      return { questionId, rule, mode: 'error', answer: `ERROR: ${errorMessage(error)}`, result: outcome.result };
    }
  }

  private async links(checklist: Checklist, event: ProofingEvent): Promise<EmailLinks> {
    const { store, documentBucket, reportBucket, signedUrlExpirySeconds, workOrderUrlTemplate } = this.options;
    const links: EmailLinks = {};

    if (workOrderUrlTemplate) {
      links.workOrderUrl = workOrderUrlTemplate.replace('{id}', encodeURIComponent(event.workOrderId));
    }

    try {
      if (event.document_key) {
        links.pdfUrl = await store.createSignedUrl(event.bucket_name ?? documentBucket, event.document_key, signedUrlExpirySeconds);
      }

      const changes = changesKey(event.workOrderId);
      if (checklist.changesLink && await store.exists(reportBucket, changes)) {
        links.changesUrl = await store.createSignedUrl(reportBucket, changes, signedUrlExpirySeconds);
      }
    } catch (error) {
      logger.warn({ workOrderId: event.workOrderId, error: errorMessage(error) }, 'Could not sign report links');
    }

    return links;
  }
}
