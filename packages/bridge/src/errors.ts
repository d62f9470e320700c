// Map engine failures onto HTTP responses

import type { Response } from 'express';
import { z } from 'zod';
import { isGovernanceError, ValidationError, type GovernanceErrorCode } from '@civitas/governance';

export const ERROR_STATUS_MAP: Record<GovernanceErrorCode, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  NOT_AUTHORIZED: 403,
  WINDOW_CLOSED: 409,
  ALREADY_RECORDED: 409,
  CAP_EXCEEDED: 422,
};

export function sendError(res: Response, err: unknown, route: string): void {
  if (err instanceof z.ZodError) {
    res.status(400).json({ error: 'Invalid request', details: err.errors });
    return;
  }

  if (err instanceof ValidationError) {
    res.status(ERROR_STATUS_MAP[err.code]).json({ error: err.message, code: err.code, details: err.issues });
    return;
  }

  if (isGovernanceError(err)) {
    res.status(ERROR_STATUS_MAP[err.code]).json({ error: err.message, code: err.code });
    return;
  }

  console.error(`[bridge/${route}] Error:`, err);
  const errorMessage = err instanceof Error ? err.message : 'Request failed';
  res.status(500).json({ error: errorMessage });
}
