export type ErrorDetails = Record<string, string>;

export class AppError extends Error {
  readonly status: number;
  readonly details?: ErrorDetails;

  constructor(status: number, message: string, details?: ErrorDetails) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(400, message, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found") {
    super(404, message);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(409, message);
  }
}

/** Unexpected failure inside a unit of work; the cause is kept for diagnostics. */
export class ProcessingError extends AppError {
  readonly causeMessage: string;

  constructor(message: string, cause: unknown) {
    const causeMessage = cause instanceof Error ? cause.message : String(cause);
    super(500, message, { cause: causeMessage });
    this.causeMessage = causeMessage;
  }
}

/** Raised by both store implementations when a unique index rejects a write. */
export class DuplicateKeyError extends Error {
  readonly collection: string;
  readonly fields: string[];

  constructor(collection: string, fields: string[]) {
    super(`Duplicate value for ${collection}.${fields.join("+") || "unknown"}`);
    this.name = "DuplicateKeyError";
    this.collection = collection;
    this.fields = fields;
  }
}
