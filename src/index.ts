import { createApp } from './api';
import { config } from './config';
import { GeminiJudge } from './judge/gemini-judge';
import { createHeadingMatcher, loadHeadingVocabulary } from './parser/headings';
import { ChecklistProofingProcessor } from './proofing/checklist-proofing-processor';
import { DocumentParseProcessor } from './proofing/document-parse-processor';
import { SupabaseReportStore } from './storage/report-store';
import { logger } from './utils/logger';
import { createSupabaseClient } from './utils/supabase';

async function main(): Promise<void> {
  const vocabulary = await loadHeadingVocabulary(config.parser.headingsFile);
  logger.info({ version: vocabulary.version, headings: vocabulary.headings.length }, 'Heading vocabulary loaded');

  const store = new SupabaseReportStore(createSupabaseClient(config.supabase));
  const judge = new GeminiJudge({
    apiKey: config.judge.apiKey ?? '',
    model: config.judge.model,
    temperature: config.judge.temperature,
    maxOutputTokens: config.judge.maxOutputTokens,
    maxAttempts: config.judge.maxAttempts,
  });

  const app = createApp({
    parser: new DocumentParseProcessor({
      store,
      isHeading: createHeadingMatcher(vocabulary),
      ocrBucket: config.storage.ocrBucket,
      documentBucket: config.storage.documentBucket,
    }),
    proofing: new ChecklistProofingProcessor({
      store,
      judge,
      documentBucket: config.storage.documentBucket,
      reportBucket: config.storage.reportBucket,
      signedUrlExpirySeconds: config.storage.signedUrlExpirySeconds,
      workOrderUrlTemplate: config.links.workOrderUrlTemplate,
    }),
    exposeErrors: config.isDevelopment,
  });

  const server = app.listen(config.api.port, config.api.host, () => {
    logger.info({
      port: config.api.port,
      host: config.api.host,
      env: config.env,
    }, 'API server started');
  });

  process.on('SIGTERM', () => {
    logger.info('SIGTERM received, shutting down gracefully');
    server.close(() => process.exit(0));
  });
}

main().catch(error => {
  logger.fatal({ error: error instanceof Error ? error.message : String(error) }, 'Failed to start');
  process.exit(1);
});
