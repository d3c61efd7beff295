export type LifecycleErrorCode =
  | "CONFLICT"
  | "INVALID_STATE"
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_FUNDS"
  | "NO_EVALUATOR_AVAILABLE"
  | "ALREADY_COMPLETED"
  | "CHAIN_UNAVAILABLE"
  | "CHAIN_REJECTED"
  | "PAYMENT_UNAVAILABLE"
  | "NOT_FOUND"
  | "VALIDATION"
  | "INVALID_CERTIFICATE";

/**
 * Business-rule failure returned from a lifecycle operation. Anything that is
 * not a LifecycleError (a broken database, a bug) is thrown instead.
 */
export abstract class LifecycleError extends Error {
  abstract readonly code: LifecycleErrorCode;
  abstract readonly retryable: boolean;
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

/** Lost a compare-and-swap race; re-read and retry. */
export class ConflictError extends LifecycleError {
  readonly code = "CONFLICT" as const;
  readonly retryable = true;
}

export class InvalidStateError extends LifecycleError {
  readonly code = "INVALID_STATE" as const;
  readonly retryable = false;
}

export class InvalidAmountError extends LifecycleError {
  readonly code = "INVALID_AMOUNT" as const;
  readonly retryable = false;
}

export class InsufficientFundsError extends LifecycleError {
  readonly code = "INSUFFICIENT_FUNDS" as const;
  readonly retryable = false;
}

export class NoEvaluatorAvailableError extends LifecycleError {
  readonly code = "NO_EVALUATOR_AVAILABLE" as const;
  readonly retryable = true;
}

export class AlreadyCompletedError extends LifecycleError {
  readonly code = "ALREADY_COMPLETED" as const;
  readonly retryable = false;
}

export class ChainUnavailableError extends LifecycleError {
  readonly code = "CHAIN_UNAVAILABLE" as const;
  readonly retryable = true;
}

/** Fatal for this tokenization attempt; the contract needs an operator. */
export class ChainRejectedError extends LifecycleError {
  readonly code = "CHAIN_REJECTED" as const;
  readonly retryable = false;
}

export class PaymentUnavailableError extends LifecycleError {
  readonly code = "PAYMENT_UNAVAILABLE" as const;
  readonly retryable = true;
}

export class NotFoundError extends LifecycleError {
  readonly code = "NOT_FOUND" as const;
  readonly retryable = false;
}

export class ValidationError extends LifecycleError {
  readonly code = "VALIDATION" as const;
  readonly retryable = false;
}

export class InvalidCertificateError extends LifecycleError {
  readonly code = "INVALID_CERTIFICATE" as const;
  readonly retryable = false;
}
