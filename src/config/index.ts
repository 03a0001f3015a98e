import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  // Object storage
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_KEY: z.string().min(1).optional(),
  OCR_BUCKET: z.string().default('ocr-output'),
  DOCUMENT_BUCKET: z.string().default('document-models'),
  REPORT_BUCKET: z.string().default('reports'),
  SIGNED_URL_EXPIRY_SECONDS: z.string().transform(Number).default('604800'),

  API_PORT: z.string().transform(Number).default('3000'),
  API_HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Semantic judge
  GEMINI_API_KEY: z.string().optional(),
  JUDGE_MODEL: z.string().default('gemini-1.5-pro'),
  JUDGE_TEMPERATURE: z.string().transform(Number).default('0'),
  JUDGE_MAX_OUTPUT_TOKENS: z.string().transform(Number).default('1000'),
  JUDGE_MAX_ATTEMPTS: z.string().transform(Number).default('3'),

  HEADINGS_FILE: z.string().default(path.resolve(__dirname, '../../config/headings.json')),
  WORK_ORDER_URL_TEMPLATE: z.string().optional(),
});

const env = envSchema.parse(process.env);

export const config = {
  supabase: {
    url: env.SUPABASE_URL,
    serviceKey: env.SUPABASE_SERVICE_KEY,
  },
  storage: {
    ocrBucket: env.OCR_BUCKET,
    documentBucket: env.DOCUMENT_BUCKET,
    reportBucket: env.REPORT_BUCKET,
    signedUrlExpirySeconds: env.SIGNED_URL_EXPIRY_SECONDS,
  },
  api: {
    port: env.API_PORT,
    host: env.API_HOST,
  },
  logging: {
    level: env.LOG_LEVEL,
  },
  judge: {
    apiKey: env.GEMINI_API_KEY,
    model: env.JUDGE_MODEL,
    temperature: env.JUDGE_TEMPERATURE,
    maxOutputTokens: env.JUDGE_MAX_OUTPUT_TOKENS,
    maxAttempts: env.JUDGE_MAX_ATTEMPTS,
  },
  parser: {
    headingsFile: env.HEADINGS_FILE,
  },
  links: {
    // {id} is replaced with the work order id
    workOrderUrlTemplate: env.WORK_ORDER_URL_TEMPLATE,
  },
  env: env.NODE_ENV,
  isDevelopment: env.NODE_ENV === 'development',
  isProduction: env.NODE_ENV === 'production',
  isTest: env.NODE_ENV === 'test',
};
