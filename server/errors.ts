/**
 * Request-level failure carrying the HTTP status and a stable error code.
 * Rendered by the error middleware as `{ error, code, message }`.
 */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
    readonly error: string = message,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/**
 * The hosted model could not produce a response.
 */
export class ModelInvocationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ModelInvocationError';
  }
}

export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'unknown error';
};
