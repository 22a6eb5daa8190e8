import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { z } from 'zod';
import { ConfigurationError, NotFoundError } from '../services/errors';

export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const parsed = schema.safeParse(body ?? {});
  if (parsed.success) return parsed.data;
  throw new ConfigurationError(
    parsed.error.issues.map(issue => ({
      kind: 'InvalidBody' as const,
      message: `${issue.path.join('.') || 'body'}: ${issue.message}`,
    })),
  );
}

export function sendError(res: Response, error: unknown, tag: string): void {
  if (error instanceof ConfigurationError) {
    res.status(400).json({ error: 'Invalid configuration', issues: error.issues });
    return;
  }
  if (error instanceof NotFoundError) {
    res.status(404).json({ error: 'Not found', message: error.message });
    return;
  }
  console.error(`[${tag}] Error:`, error);
  console.error(`[${tag}] Error stack:`, error instanceof Error ? error.stack : 'No stack');
  res.status(500).json({
    error: 'Request failed',
    message: error instanceof Error ? error.message : 'Unknown error',
  });
}

// Async route body with the shared error responses
export const route =
  (tag: string, handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req: Request, res: Response, _next: NextFunction) => {
    handler(req, res).catch(error => sendError(res, error, tag));
  };
