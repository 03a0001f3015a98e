import { GoogleGenerativeAI, GenerativeModel } from '@google/generative-ai';
import { logger } from '../utils/logger';
import { RetryOptions, withRetry } from '../utils/retry';
import { errorMessage, JudgeError } from '../utils/validation';
import { SemanticJudge } from './semantic-judge';

export interface GeminiJudgeOptions {
  apiKey: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  maxAttempts: number;
  /** Backoff overrides; maxAttempts above always wins */
  retry?: Partial<RetryOptions>;
}

const SYSTEM_INSTRUCTION =
  'You proof building compliance reports. Answer in British English. '
  + 'Start your reply with PASS or FAIL on its own line.';

export class GeminiJudge implements SemanticJudge {
  private model: GenerativeModel;
  private retry: Partial<RetryOptions>;

  constructor(options: GeminiJudgeOptions) {
    if (!options.apiKey) {
      throw new Error('Gemini API key is required');
    }

    const genAI = new GoogleGenerativeAI(options.apiKey);
    this.model = genAI.getGenerativeModel({
      model: options.model,
      systemInstruction: SYSTEM_INSTRUCTION,
      generationConfig: {
        temperature: options.temperature,
        maxOutputTokens: options.maxOutputTokens,
      },
    });
    this.retry = { ...options.retry, maxAttempts: options.maxAttempts };

    logger.info({ model: options.model }, 'Gemini judge initialized');
  }

  async judge(prompt: string): Promise<string> {
    try {
      logger.info({ promptLength: prompt.length }, 'Sending prompt to Gemini judge');

      const result = await withRetry(
        () => this.model.generateContent(prompt),
        'gemini-judge',
        this.retry
      );
      const text = result.response.text().trim();

      logger.info({ replyLength: text.length }, 'Gemini judge replied');
      return text;
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Gemini judge call failed');
      throw new JudgeError(`Gemini judge failed: ${errorMessage(error)}`);
    }
  }
}
