/**
 * Error taxonomy.
 *
 * Validation errors are thrown before anything is appended to a case log.
 * Process-level outcomes (deadlocks, timeouts) are recorded as events instead;
 * TimeoutError only crosses the responder boundary and is converted there.
 * LowConfidence is a stage result, not an error.
 */

export type PipelineErrorCode =
  | 'INVALID_INPUT'
  | 'SEQUENCE_VIOLATION'
  | 'GATE_BLOCKED'
  | 'IRRECOVERABLE'
  | 'TIMEOUT'
  | 'CASE_NOT_FOUND';

export class PipelineError extends Error {
  public code: PipelineErrorCode;
  public details: Record<string, unknown>;

  constructor(code: PipelineErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.details = details;
  }
}

export class InvalidInputError extends PipelineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('INVALID_INPUT', message, details);
    this.name = 'InvalidInputError';
  }
}

export class SequenceViolationError extends PipelineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('SEQUENCE_VIOLATION', message, details);
    this.name = 'SequenceViolationError';
  }
}

export class GateBlockedError extends PipelineError {
  public blockers: string[];

  constructor(assessmentId: string, blockers: string[]) {
    super('GATE_BLOCKED', `Final compilation blocked for ${assessmentId}: ${blockers.join('; ')}`, { assessment_id: assessmentId });
    this.name = 'GateBlockedError';
    this.blockers = blockers;
  }
}

export class IrrecoverableError extends PipelineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('IRRECOVERABLE', message, details);
    this.name = 'IrrecoverableError';
  }
}

export class TimeoutError extends PipelineError {
  public budgetMs: number;

  constructor(what: string, budgetMs: number) {
    super('TIMEOUT', `${what} did not respond within ${budgetMs}ms`, { budget_ms: budgetMs });
    this.name = 'TimeoutError';
    this.budgetMs = budgetMs;
  }
}

export class CaseNotFoundError extends PipelineError {
  constructor(assessmentId: string) {
    super('CASE_NOT_FOUND', `Assessment ${assessmentId} not found`, { assessment_id: assessmentId });
    this.name = 'CaseNotFoundError';
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}
