import type { Stage } from './contracts';

export type WizardErrorCode =
  | 'NO_SELECTION'
  | 'NOT_YET_SUPPORTED'
  | 'FETCH_IN_PROGRESS'
  | 'FETCH_FAILED'
  | 'INVALID_CONFIGURATION'
  | 'SESSION_NOT_FOUND';

export class WizardError extends Error {
  constructor(
    public readonly code: WizardErrorCode,
    public readonly statusCode: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'WizardError';
  }
}

/** The user advanced without the input the stage requires. */
export class NoSelectionError extends WizardError {
  constructor(message: string) {
    super('NO_SELECTION', 422, message);
    this.name = 'NoSelectionError';
  }
}

export class NotYetSupportedError extends WizardError {
  constructor(message: string) {
    super('NOT_YET_SUPPORTED', 422, message);
    this.name = 'NotYetSupportedError';
  }
}

export class FetchInProgressError extends WizardError {
  constructor(public readonly stage: Stage) {
    super('FETCH_IN_PROGRESS', 409, `A fetch for ${stage} is already running.`);
    this.name = 'FetchInProgressError';
  }
}

export class FetchFailedError extends WizardError {
  constructor(
    public readonly stage: Stage,
    cause: unknown,
  ) {
    super('FETCH_FAILED', 502, `Fetch for ${stage} failed: ${describeCause(cause)}`, { cause });
    this.name = 'FetchFailedError';
  }
}

export class InvalidConfigurationError extends WizardError {
  constructor(message: string) {
    super('INVALID_CONFIGURATION', 400, message);
    this.name = 'InvalidConfigurationError';
  }
}

export class SessionNotFoundError extends WizardError {
  constructor(id: string) {
    super('SESSION_NOT_FOUND', 404, `Session ${id} not found.`);
    this.name = 'SessionNotFoundError';
  }
}

export class FetchTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'FetchTimeoutError';
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : 'Unknown error';
}
