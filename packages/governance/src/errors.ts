/**
 * Governance errors
 *
 * Every rejected operation throws one of these before touching state. The
 * `code` discriminant is what hosts switch on (the bridge maps it to an HTTP
 * status); messages are for humans.
 */

export type GovernanceErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'NOT_AUTHORIZED'
  | 'WINDOW_CLOSED'
  | 'ALREADY_RECORDED'
  | 'CAP_EXCEEDED';

/** Field-level detail attached to validation failures */
export interface ValidationIssue {
  path: string;
  message: string;
}

export class GovernanceError extends Error {
  readonly code: GovernanceErrorCode;

  constructor(code: GovernanceErrorCode, message: string) {
    super(message);
    this.name = 'GovernanceError';
    this.code = code;
  }
}

/** Malformed input: empty title, bad selection set, out-of-range fraction, self-delegation */
export class ValidationError extends GovernanceError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class NotFoundError extends GovernanceError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

/** Missing or invalid presence proof, or a privileged call from someone else */
export class NotAuthorizedError extends GovernanceError {
  constructor(message: string) {
    super('NOT_AUTHORIZED', message);
    this.name = 'NotAuthorizedError';
  }
}

/** Vote before `start` or at/after `deadline` */
export class WindowClosedError extends GovernanceError {
  constructor(message: string) {
    super('WINDOW_CLOSED', message);
    this.name = 'WindowClosedError';
  }
}

/** Second vote from the same account, or second elevation of a temperature check */
export class AlreadyRecordedError extends GovernanceError {
  constructor(message: string) {
    super('ALREADY_RECORDED', message);
    this.name = 'AlreadyRecordedError';
  }
}

export class CapExceededError extends GovernanceError {
  constructor(message: string) {
    super('CAP_EXCEEDED', message);
    this.name = 'CapExceededError';
  }
}

export function isGovernanceError(err: unknown): err is GovernanceError {
  return err instanceof GovernanceError;
}
