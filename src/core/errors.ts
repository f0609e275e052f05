/**
 * Error taxonomy for the transcription pipeline
 */
export class TranscriptionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type ValidationReason = 'empty' | 'invalid-uri' | 'missing' | 'unsupported-format';

/**
 * Rejected at enqueue time; never reaches the queue
 */
export class ValidationError extends TranscriptionError {
  constructor(
    public readonly reason: ValidationReason,
    public readonly path: string,
    message: string
  ) {
    super(message);
  }
}

export class EngineError extends TranscriptionError {}

export class PersistenceError extends TranscriptionError {}

export class InitializationError extends TranscriptionError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
