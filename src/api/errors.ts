import type { Response } from 'express';
import { ZodError } from 'zod';

import { type EngineErrorCategory, isEngineError } from '../engine/errors.js';

const STATUS_BY_CATEGORY: Record<EngineErrorCategory, number> = {
  validation: 400,
  invariant: 422,
  liquidation: 422,
  oracle: 503,
  transfer: 409,
  reentrancy: 409,
  rollback: 500
};

export function statusForCategory(category: EngineErrorCategory): number {
  return STATUS_BY_CATEGORY[category];
}

/**
 * Render an error thrown while handling a request. Engine errors keep their
 * code; request validation errors list the offending fields.
 */
export function sendError(res: Response, err: unknown) {
  if (isEngineError(err)) {
    return res.status(statusForCategory(err.category)).json({
      error: err.message,
      code: err.code,
      category: err.category
    });
  }

  if (err instanceof ZodError) {
    return res.status(400).json({
      error: 'Invalid request',
      issues: err.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`)
    });
  }

  return res.status(500).json({ error: 'Internal error' });
}
