/**
 * API Server for the agri-climate Q&A service
 * Thin HTTP layer over the orchestrator and the master table store
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { runOrchestrator } from './agent.js';
import { InvalidRequestError, ServiceError, type ErrorCode } from './errors.js';
import type { MasterTableStore } from './master-table.js';
import type { ModelBackend } from './tools/model-backend.js';

export interface ApiDeps {
  store: Pick<MasterTableStore, 'current' | 'getState' | 'load'>;
  backend: ModelBackend | null;
  sources: string[];
}

const AskRequestSchema = z.object({
  question: z.string().trim().min(1),
});

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  INVALID_REQUEST: 400,
  BACKEND_NOT_CONFIGURED: 500,
  SOURCE_UNAVAILABLE: 503,
  MALFORMED_SOURCE: 503,
  DATA_UNAVAILABLE: 503,
  BACKEND_FAILURE: 502,
};

export function statusForError(error: unknown): number {
  return error instanceof ServiceError ? STATUS_BY_CODE[error.code] : 500;
}

function sendError(res: Response, error: unknown): void {
  if (error instanceof ServiceError) {
    res.status(statusForError(error)).json({ error: { code: error.code, message: error.message } });
    return;
  }
  console.error('Unhandled error:', error);
  res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
}

function parseAskRequest(body: unknown): string {
  if (typeof body !== 'object' || body === null || Object.keys(body).length === 0) {
    throw new InvalidRequestError('Invalid request: No JSON body or incorrect Content-Type.');
  }
  const parsed = AskRequestSchema.safeParse(body);
  if (!parsed.success) {
    throw new InvalidRequestError("Invalid request: 'question' must be a non-empty string.");
  }
  return parsed.data.question;
}

export function createApp(deps: ApiDeps): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  app.post('/ask', async (req: Request, res: Response) => {
    try {
      const question = parseAskRequest(req.body);
      const result = await runOrchestrator(question, {
        backend: deps.backend,
        getSnapshot: () => deps.store.current(),
        getState: () => deps.store.getState(),
        sources: deps.sources,
      });
      res.json(result);
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/schema', (req: Request, res: Response) => {
    const snapshot = deps.store.current();
    if (!snapshot) {
      const state = deps.store.getState();
      res.status(503).json({
        error: {
          code: 'DATA_UNAVAILABLE',
          message: state.status === 'unavailable' ? state.reason : 'Data is not loaded',
        },
      });
      return;
    }
    res.json({
      version: snapshot.version,
      built_at: snapshot.builtAt.toISOString(),
      row_count: snapshot.rowCount,
      columns: snapshot.schema.columns,
      sources: snapshot.diagnostics,
    });
  });

  app.post('/reload', async (req: Request, res: Response) => {
    try {
      const state = await deps.store.load();
      if (state.status === 'ready') {
        res.json({ status: 'ready', version: state.snapshot.version, row_count: state.snapshot.rowCount });
      } else {
        res.status(503).json({ error: { code: 'DATA_UNAVAILABLE', message: state.reason } });
      }
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/health', (req: Request, res: Response) => {
    const snapshot = deps.store.current();
    res.json({
      status: 'ok',
      backend_configured: deps.backend !== null,
      data: snapshot
        ? { status: 'ready', version: snapshot.version, row_count: snapshot.rowCount }
        : { status: 'unavailable' },
    });
  });

  // Malformed JSON bodies from express.json()
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (error instanceof SyntaxError) {
      sendError(res, new InvalidRequestError('Invalid request: body is not valid JSON.'));
      return;
    }
    next(error);
  });

  return app;
}
