/**
 * Application errors
 *
 * Every error raised on purpose extends AppError. The global error handler
 * in app.ts turns them into `{ ok: false, error: code, message }`.
 */

export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly statusCode = 500,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** External feed unreachable, non-2xx or unreadable */
export class FeedUnavailableError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('FEED_UNAVAILABLE', message, 502, details);
  }
}

export class StoreUnavailableError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('STORE_UNAVAILABLE', message, 503, details);
  }
}

export interface RejectedWrite {
  index: number;
  timestamp: string | null;
  reason: string;
}

/** One entry per record the store refused; the other records were still written */
export class StoreWriteRejectedError extends AppError {
  constructor(
    public readonly collection: string,
    public readonly rejected: RejectedWrite[],
  ) {
    super(
      'STORE_WRITE_REJECTED',
      `${rejected.length} write(s) rejected by ${collection}`,
      500,
      { collection, rejected },
    );
  }
}

export class ModelUnavailableError extends AppError {
  constructor(message: string) {
    super('MODEL_UNAVAILABLE', message, 503);
  }
}

/** Scoring function output outside the Prediction contract */
export class InvalidPredictionError extends AppError {
  constructor(message: string) {
    super('INVALID_PREDICTION', message, 500);
  }
}

export class AuthRejectedError extends AppError {
  constructor(message: string, statusCode: 401 | 403 = 401) {
    super('AUTH_REJECTED', message, statusCode);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, 400, details);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
