import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import { z } from 'zod';
import { MatchingService, createMatchingService } from './services/MatchingService';
import { loadEngineConfig } from './utils/config';
import { EngineError, errorMessage } from './utils/errors';

const MAX_RESUMES_PER_BATCH = 500;

const weightsSchema = z
  .object({
    lexical: z.number().positive().optional(),
    semantic: z.number().min(0).optional(),
    ai: z.number().min(0).optional()
  })
  .strict();

const matchRequestSchema = z.object({
  job: z.object({
    text: z.string().min(1, 'job.text is required'),
    title: z.string().optional(),
    required: z.array(z.string()).optional(),
    preferred: z.array(z.string()).optional(),
    weights: weightsSchema.optional()
  }),
  resumes: z
    .array(
      z.object({
        submissionId: z.string().min(1).optional(),
        text: z.string(),
        fileName: z.string().min(1),
        size: z.number().int().min(0).optional(),
        uploadedAt: z.string().datetime({ offset: true }).optional()
      })
    )
    .min(1, 'at least one resume is required')
    .max(MAX_RESUMES_PER_BATCH),
  recompute: z.boolean().optional(),
  override: z.boolean().optional()
});

const STATUS_BY_CODE: Record<string, number> = {
  InconsistentScoreRequest: 409,
  ResultNotFound: 404,
  ConfigurationError: 400,
  DuplicateThresholdInvalid: 400,
  OperationCancelled: 499
};

function sendError(res: Response, error: unknown, context: string): Response {
  if (error instanceof EngineError) {
    const status = STATUS_BY_CODE[error.code] ?? 500;
    if (status >= 500) {
      console.error(`[Server] ERROR: ${context}:`, error.message);
    } else {
      console.warn(`[Server] ${context}: ${error.code}: ${error.message}`);
    }
    return res.status(status).json({ error: error.code, message: error.message });
  }
  console.error(`[Server] ERROR: ${context}:`, error);
  return res.status(500).json({ error: context, message: errorMessage(error) });
}

export function createApp(matchingService: MatchingService): Express {
  const app = express();

  const allowedOrigins = [/^http:\/\/localhost(:\d+)?$/, /^http:\/\/127\.0\.0\.1(:\d+)?$/];
  app.use(
    cors({
      origin: (origin, callback) => {
        // Requests without an origin (curl, server-to-server) are allowed
        if (!origin) return callback(null, true);
        if (allowedOrigins.some(pattern => pattern.test(origin))) {
          callback(null, true);
        } else {
          callback(new Error('Not allowed by CORS'));
        }
      },
      credentials: true
    })
  );
  app.use(express.json({ limit: '16mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  app.post('/api/match', async (req: Request, res: Response) => {
    const parsed = matchRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const message = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      console.warn(`[Server] Match request rejected: ${message}`);
      return res.status(400).json({ error: 'Invalid request', message });
    }

    // Client disconnect cancels the batch; locked results already written stay.
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const { job, resumes, recompute, override } = parsed.data;
      const batch = await matchingService.matchTexts(job, resumes, {
        recompute,
        override,
        signal: controller.signal
      });
      console.log(`[Server] Batch ${batch.batchId} completed for ${resumes.length} resume(s)`);

      return res.json({
        success: true,
        batchId: batch.batchId,
        jobId: batch.jobId,
        cancelled: batch.cancelled,
        summary: batch.summary,
        results: matchingService.toExportView(batch),
        clusters: batch.clusters.filter(cluster => cluster.members.length > 1)
      });
    } catch (error) {
      return sendError(res, error, 'Match failed');
    }
  });

  app.get('/api/jobs/:jobId/results', async (req: Request, res: Response) => {
    try {
      const view = await matchingService.getStoredView(req.params.jobId);
      return res.json({ success: true, ...view });
    } catch (error) {
      return sendError(res, error, 'Failed to retrieve results');
    }
  });

  app.post('/api/jobs/:jobId/results/:fingerprint/finalize', async (req: Request, res: Response) => {
    try {
      const result = await matchingService.finalize(req.params.jobId, req.params.fingerprint);
      return res.json({ success: true, result });
    } catch (error) {
      return sendError(res, error, 'Finalize failed');
    }
  });

  app.use((error: Error, _req: Request, res: Response, _next: NextFunction) => {
    // Body parser failures carry their own 4xx status
    if ('status' in error && typeof error.status === 'number' && error.status < 500) {
      console.warn(`[Server] Request rejected: ${error.message}`);
      res.status(error.status).json({ error: 'Invalid request', message: error.message });
      return;
    }
    sendError(res, error, 'Request failed');
  });

  return app;
}

if (require.main === module) {
  dotenv.config();

  const config = loadEngineConfig();
  const matchingService = createMatchingService(config);
  const app = createApp(matchingService);

  const server = app.listen(config.server.port, () => {
    console.log(`[Server] Server started on port ${config.server.port}`);
    console.log(`[Server] Health check available at http://localhost:${config.server.port}/health`);
  });

  const shutdown = () => {
    server.close(() => {
      matchingService
        .close()
        .then(() => process.exit(0))
        .catch(err => {
          console.error('[Server] Shutdown failed:', err);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}
