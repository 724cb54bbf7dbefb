/**
 * Error types surfaced by the banner API.
 *
 * Every error carries the HTTP status it maps to; the message is what the
 * client sees in the `{ error }` body, so it must never contain internals.
 */
export class AppError extends Error {
  public readonly statusCode: number = 500;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AppError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Missing or malformed input. */
export class ValidationError extends AppError {
  public override readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends AppError {
  public override readonly statusCode = 404;

  constructor(message = "Banner not found") {
    super(message);
    this.name = "NotFoundError";
  }
}

/**
 * Unexpected fault. The original error rides along as `cause` for logging.
 */
export class InternalError extends AppError {
  public override readonly statusCode = 500;

  constructor(message = "Internal server error", options?: ErrorOptions) {
    super(message, options);
    this.name = "InternalError";
  }
}

export function toAppError(err: unknown, fallbackMessage: string): AppError {
  if (err instanceof AppError) return err;
  return new InternalError(fallbackMessage, { cause: err });
}
