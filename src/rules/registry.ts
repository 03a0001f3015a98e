import { ParsedDocument } from '../types';
import { errorMessage } from '../utils/validation';
import { ExtractionResult, ExtractionRule } from './types';

export type RuleOutcome =
  | { questionId: number; status: 'ok'; rule: string; result: ExtractionResult }
  | { questionId: number; status: 'error'; rule: string; error: string };

/**
 * Question number to rule. Evaluation of one rule never affects another:
 * a throwing rule is recorded as an error outcome.
 */
export class RuleRegistry {
  private readonly rules = new Map<number, ExtractionRule>();

  register(questionId: number, rule: ExtractionRule): this {
    if (this.rules.has(questionId)) {
      throw new Error(`Question ${questionId} already has a rule`);
    }
    this.rules.set(questionId, rule);
    return this;
  }

  get(questionId: number): ExtractionRule | undefined {
    return this.rules.get(questionId);
  }

  questionIds(): number[] {
    return [...this.rules.keys()].sort((a, b) => a - b);
  }

  evaluate(questionId: number, document: ParsedDocument): RuleOutcome {
    const rule = this.rules.get(questionId);
    if (!rule) {
      return { questionId, status: 'error', rule: 'unknown', error: `No rule registered for question ${questionId}` };
    }

    try {
      return { questionId, status: 'ok', rule: rule.name, result: rule.extract(document) };
    } catch (error) {
      return { questionId, status: 'error', rule: rule.name, error: errorMessage(error) };
    }
  }

  evaluateAll(document: ParsedDocument): RuleOutcome[] {
    return this.questionIds().map(questionId => this.evaluate(questionId, document));
  }
}
