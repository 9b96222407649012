export type ErrorCode =
  | "INSUFFICIENT_STOCK"
  | "PRESCRIPTION_REQUIRED"
  | "RECALLED_OR_EXPIRED"
  | "NO_ELIGIBLE_SUPPLIER"
  | "ALREADY_ACKNOWLEDGED"
  | "NOT_FOUND"
  | "CONCURRENCY_CONFLICT"
  | "VALIDATION"
  | "DUPLICATE_BATCH"
  | "REFERENTIAL_INTEGRITY"
  | "INVALID_TRANSITION"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "INTERNAL";

export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;
  code: ErrorCode;

  constructor(message: string = "Something went wrong", statusCode: number = 500, code: ErrorCode = "INTERNAL") {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class InsufficientStockError extends AppError {
  readonly available: number;
  readonly requested: number;

  constructor(available: number, requested: number) {
    super(`Insufficient stock. Available: ${available}, Requested: ${requested}`, 409, "INSUFFICIENT_STOCK");
    this.available = available;
    this.requested = requested;
  }
}

export class PrescriptionRequiredError extends AppError {
  constructor(medicineName: string, detail?: string) {
    super(`Prescription required for medicine: ${medicineName}${detail ? ` (${detail})` : ""}`, 422, "PRESCRIPTION_REQUIRED");
  }
}

export class RecalledOrExpiredError extends AppError {
  constructor(batchNumber: string, state: "recalled" | "expired") {
    super(`Batch ${batchNumber} is ${state} and cannot be sold`, 409, "RECALLED_OR_EXPIRED");
  }
}

export class NoEligibleSupplierError extends AppError {
  constructor(medicineName: string) {
    super(`No active supplier available to order ${medicineName}`, 409, "NO_ELIGIBLE_SUPPLIER");
  }
}

export class AlreadyAcknowledgedError extends AppError {
  constructor(alertId: string) {
    super(`Alert ${alertId} has already been acknowledged`, 409, "ALREADY_ACKNOWLEDGED");
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id: string) {
    super(`${entity} not found with ID: ${id}`, 404, "NOT_FOUND");
  }
}

/** Transient; the whole operation may be retried */
export class ConcurrencyConflictError extends AppError {
  constructor(operation: string) {
    super(`Concurrent update conflict in ${operation}, please retry`, 503, "CONCURRENCY_CONFLICT");
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, "VALIDATION");
  }
}

export class DuplicateBatchError extends AppError {
  constructor(batchNumber: string) {
    super(`Batch number ${batchNumber} already exists for this medicine`, 409, "DUPLICATE_BATCH");
  }
}

export class ReferentialIntegrityError extends AppError {
  constructor(message: string) {
    super(message, 409, "REFERENTIAL_INTEGRITY");
  }
}

export class InvalidTransitionError extends AppError {
  constructor(entity: string, from: string, to: string) {
    super(`${entity} cannot move from ${from} to ${to}`, 409, "INVALID_TRANSITION");
  }
}
