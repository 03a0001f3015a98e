import express, { Express, NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { DocumentParseProcessor } from '../proofing/document-parse-processor';
import { ChecklistProofingProcessor } from '../proofing/checklist-proofing-processor';
import { createChecklist } from '../rules/checklists';
import { canonicalizeFloorLabel } from '../rules/floor-labels';
import { logger } from '../utils/logger';
import { validate, ValidationError } from '../utils/validation';

export interface AppDependencies {
  parser: DocumentParseProcessor;
  proofing: ChecklistProofingProcessor;
  /** Include error messages in 500 responses */
  exposeErrors: boolean;
}

const checklistParamSchema = z.enum(['hsa', 'fra']);

const floorLabelsSchema = z.object({
  locations: z.array(z.string()).max(500),
});

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(express.json({ limit: '5mb' }));
  app.use((req, _res, next) => {
    logger.info({
      method: req.method,
      url: req.url,
      ip: req.ip,
    }, 'API Request');
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Parse OCR output into the section model
  app.post('/api/documents/parse', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const summary = await deps.parser.process(req.body);
      res.status(201).json(summary);
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/proofing/:checklist', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const checklistId = validate(checklistParamSchema, req.params.checklist);
      const report = await deps.proofing.process(createChecklist(checklistId), req.body);
      res.json(report);
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/floor-labels', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { locations } = validate(floorLabelsSchema, req.body);
      res.json({
        labels: locations.map(raw => ({ raw, floor: canonicalizeFloorLabel(raw) })),
      });
    } catch (error) {
      next(error);
    }
  });

  // Error handler middleware
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error({ error: err.message, name: err.name, url: req.url }, 'API Error');

    if (err instanceof ValidationError) {
      return res.status(400).json({
        error: 'Validation error',
        details: err.issues,
        message: err.message,
      });
    }

    if (err instanceof z.ZodError) {
      return res.status(400).json({
        error: 'Validation error',
        details: err.errors,
      });
    }

    return res.status(500).json({
      error: 'Internal server error',
      message: deps.exposeErrors ? err.message : undefined,
    });
  });

  return app;
}
