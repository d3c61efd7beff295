import type { Money, TokenOperationPayload } from "@chrono/shared";
import type {
  ChainRejectedError,
  ChainUnavailableError,
  InsufficientFundsError,
  PaymentUnavailableError,
} from "./errors.js";
import type { Result } from "./result.js";

export interface EvaluatorRef {
  evaluatorId: string;
  tier: string;
  publicKeyHex?: string;    // Ed25519; when present, certificates must be signed
}

export interface EvaluatorDirectory {
  /** Resolves to null when nobody is eligible for the category right now. */
  findEligibleEvaluator(watchCategory: string): Promise<EvaluatorRef | null>;
}

export interface ChainReceipt {
  txRef: string;
}

export type ChainSubmitError = ChainUnavailableError | ChainRejectedError;

export interface ChainOperation {
  txRef: string;
  payload: TokenOperationPayload;
}

export interface ChainClient {
  /** Resubmitting the same operationRef must not produce a second chain effect. */
  submit(
    operationRef: string,
    payload: TokenOperationPayload,
  ): Promise<Result<ChainReceipt, ChainSubmitError>>;
  /** Resolves to null when the ledger never recorded `operationRef`. */
  lookup(operationRef: string): Promise<Result<ChainOperation | null, ChainUnavailableError>>;
}

export interface HoldRequest {
  idempotencyRef: string;
  payer: string;
  amount: Money;
}

export interface HoldReceipt {
  holdRef: string;
}

export interface PaymentTransfer {
  beneficiaryId: string;
  amount: Money;
  purpose: "SELLER_PROCEEDS" | "PLATFORM_COMMISSION" | "EVALUATOR_FEE";
}

export interface ReleaseRequest {
  idempotencyRef: string;
  holdRef: string;
  transfers: PaymentTransfer[];   // posted all together or not at all
}

export interface RefundRequest {
  idempotencyRef: string;
  holdRef: string;
  payer: string;
  amount: Money;
}

export interface SettlementReceipt {
  settlementRef: string;
}

export interface PaymentGateway {
  hold(
    request: HoldRequest,
  ): Promise<Result<HoldReceipt, InsufficientFundsError | PaymentUnavailableError>>;
  release(request: ReleaseRequest): Promise<Result<SettlementReceipt, PaymentUnavailableError>>;
  refund(request: RefundRequest): Promise<Result<SettlementReceipt, PaymentUnavailableError>>;
}
