import type { ZodError } from "zod";

export type ErrorDetail = {
  field: string;
  message: string;
};

export class AppError extends Error {
  readonly code: string;
  readonly status: number;
  readonly details?: ErrorDetail[];

  constructor(code: string, message: string, status = 400, details?: ErrorDetail[]) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.status = status;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): { message: string; code: string; details?: ErrorDetail[] } {
    return this.details
      ? { message: this.message, code: this.code, details: this.details }
      : { message: this.message, code: this.code };
  }
}

/** A required field is empty or a value is malformed. */
export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetail[]) {
    super("validation_error", message, 400, details);
    this.name = "ValidationError";
  }
}

/** A status change the pipeline does not allow, e.g. leaving Hired or Rejected. */
export class InvalidTransitionError extends AppError {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string, message: string) {
    super("invalid_transition", message, 409);
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}

export class NotFoundError extends AppError {
  readonly resourceId: string;

  constructor(resource: string, id: string) {
    super("not_found", `${resource} not found`, 404);
    this.name = "NotFoundError";
    this.resourceId = id;
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super("conflict", message, 409);
    this.name = "ConflictError";
  }
}

/**
 * Per-row import failure. Collected into the import report rather than
 * thrown, so one bad row never stops the batch.
 */
export class ImportRowError extends AppError {
  readonly row: number;

  constructor(row: number, reason: string, details?: ErrorDetail[]) {
    super("import_row_error", `Row ${row}: ${reason}`, 400, details);
    this.name = "ImportRowError";
    this.row = row;
  }
}

export function issuesToDetails(error: ZodError): ErrorDetail[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "input",
    message: issue.message
  }));
}

export function fromZodError(error: ZodError): ValidationError {
  const details = issuesToDetails(error);
  const message = details.map((detail) => detail.message).join("; ") || "Invalid input";
  return new ValidationError(message, details);
}
