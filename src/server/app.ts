import express, { NextFunction, Request, Response } from 'express';
import { z } from 'zod';

import type { SolverClient } from '../host/solver_client';

export const SolveRequestSchema = z.object({
  field: z.string().max(4096),
  pieces: z.string().max(256),
  height: z.number().int().min(0),
});

export type SolveRequest = z.infer<typeof SolveRequestSchema>;

function parseBody(body: unknown, res: Response): SolveRequest | null {
  const result = SolveRequestSchema.safeParse(body);
  if (!result.success) {
    res.status(400).json({
      error: 'Invalid request body',
      details: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
    return null;
  }
  return result.data;
}

export function createServer(client: SolverClient) {
  const app = express();

  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.post('/api/find-path', (req, res) => {
    const body = parseBody(req.body, res);
    if (!body) {
      return;
    }
    const payload = client.findPath(body.field, body.pieces, body.height);
    res.type('application/json').send(payload);
  });

  app.post('/api/check-pc', (req, res) => {
    const body = parseBody(req.body, res);
    if (!body) {
      return;
    }
    res.json({ possible: client.checkPCPossible(body.field, body.pieces, body.height) });
  });

  app.use((_req, res) => {
    res.status(404).send('Not Found');
  });

  // express tells error handlers apart by their four parameters
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    // body-parser rejects malformed JSON with a SyntaxError
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    // eslint-disable-next-line no-console
    console.error('Request failed:', error);
    res.status(500).json({ error: 'Internal error', details: String(error) });
  });

  return app;
}
