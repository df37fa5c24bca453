/**
 * Error types
 * Per-message and per-window errors stay inside a session; StartupError is the
 * only kind that reaches the process boundary.
 */

export type ErrorCode =
  | 'DECODE_ERROR'
  | 'INVALID_WINDOW_LENGTH'
  | 'INFERENCE_ERROR'
  | 'EMPTY_CATEGORY'
  | 'NOT_FOUND'
  | 'STARTUP_ERROR';

export class DrumwatchError extends Error {
  constructor(readonly code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DecodeError extends DrumwatchError {
  constructor(message: string) {
    super('DECODE_ERROR', message);
  }
}

export class InvalidWindowLength extends DrumwatchError {
  constructor(readonly expected: number, readonly actual: number) {
    super('INVALID_WINDOW_LENGTH', `Window must hold ${expected} samples, got ${actual}`);
  }
}

export class InferenceError extends DrumwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INFERENCE_ERROR', message, options);
  }
}

export class EmptyCategory extends DrumwatchError {
  constructor(readonly category: string) {
    super('EMPTY_CATEGORY', `Sound category "${category}" has no assets`);
  }
}

export class NotFound extends DrumwatchError {
  constructor(what: string) {
    super('NOT_FOUND', `${what} not found`);
  }
}

export class StartupError extends DrumwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STARTUP_ERROR', message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
