import { z } from 'zod';
import { Server } from 'http';
import { createApp } from '..';
import { createHeadingMatcher } from '../../parser/headings';
import { ChecklistProofingProcessor } from '../../proofing/checklist-proofing-processor';
import { DocumentParseProcessor } from '../../proofing/document-parse-processor';
import { MemoryReportStore } from '../../proofing/__tests__/memory-store';

jest.mock('../../utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const ReportSchema = z.object({
  checklist: z.string(),
  outcome: z.string(),
  answers: z.array(z.object({ questionId: z.number(), answer: z.string() })),
});

describe('API', () => {
  let server: Server;
  let baseUrl: string;
  const store = new MemoryReportStore();

  beforeAll(async () => {
    const app = createApp({
      parser: new DocumentParseProcessor({
        store,
        isHeading: createHeadingMatcher({ headings: ['Overall Risk Rating'] }),
        ocrBucket: 'ocr',
        documentBucket: 'documents',
      }),
      proofing: new ChecklistProofingProcessor({
        store,
        judge: { judge: async () => 'PASS' },
        documentBucket: 'documents',
        reportBucket: 'reports',
        signedUrlExpirySeconds: 60,
      }),
      exposeErrors: false,
    });

    await new Promise<void>(resolve => {
      server = app.listen(0, '127.0.0.1', () => resolve());
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
  });

  const post = (path: string, body: unknown) =>
    fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
    });

  it('should report health', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'ok' });
  });

  it('should canonicalize floor labels', async () => {
    const response = await post('/api/floor-labels', { locations: ['B5', 'Kitchen'] });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      labels: [
        { raw: 'B5', floor: 'Basement 5' },
        { raw: 'Kitchen', floor: null },
      ],
    });
  });

  it('should reject an unknown checklist with 400', async () => {
    const response = await post('/api/proofing/xyz', {});

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: 'Validation error' });
  });

  it('should return 500 without details when storage fails', async () => {
    const response = await post('/api/documents/parse', { sourceKey: 'missing.json' });

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'Internal server error' });
  });

  it('should run a checklist', async () => {
    store.put('documents', 'doc.json', JSON.stringify({
      sections: [{ name: 'Life Safety Risk Rating at this Premises', paragraphs: ['Overall it is Low'], tables: [] }],
    }));

    const response = await post('/api/proofing/fra', {
      textract_key: 'doc.json',
      workOrderId: 'WO-2',
      workOrderNumber: '00000002',
    });
    const report = ReportSchema.parse(await response.json());

    expect(response.status).toBe(200);
    expect(report.checklist).toBe('fra');
    expect(report.outcome).toBe('FAIL');
    expect(report.answers.find(answer => answer.questionId === 9)?.answer).toBe('PASS\nRating: Low');
  });
});
