import {
  InsufficientFundsError,
  PaymentUnavailableError,
  err,
  ok,
  type HoldReceipt,
  type HoldRequest,
  type PaymentGateway,
  type RefundRequest,
  type ReleaseRequest,
  type Result,
  type SettlementReceipt,
} from "@chrono/lifecycle";
import { getErrorMessage, requestJson, type HttpResult } from "./http.js";

function unavailable(operation: string, result: HttpResult<unknown>): PaymentUnavailableError {
  return new PaymentUnavailableError(
    result.status === 0
      ? `payment gateway unreachable during ${operation}`
      : `payment gateway ${operation} failed with ${result.status}`,
    { status: result.status, message: getErrorMessage(result.data) },
  );
}

/**
 * Client of the payment processor. Every call sends its idempotency reference
 * as the `idempotency-key` header, so retries never move money twice.
 */
export class HttpPaymentGateway implements PaymentGateway {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 10_000,
  ) {}

  async hold(
    request: HoldRequest,
  ): Promise<Result<HoldReceipt, InsufficientFundsError | PaymentUnavailableError>> {
    const result = await this.post<HoldReceipt>("/holds", request.idempotencyRef, {
      payer: request.payer,
      amount: request.amount,
    });
    if (result.status === 402) {
      return err(
        new InsufficientFundsError(getErrorMessage(result.data) || `payer ${request.payer} has insufficient funds`),
      );
    }
    if (!result.ok || typeof result.data?.holdRef !== "string") return err(unavailable("hold", result));
    return ok({ holdRef: result.data.holdRef });
  }

  async release(request: ReleaseRequest): Promise<Result<SettlementReceipt, PaymentUnavailableError>> {
    const result = await this.post<SettlementReceipt>(
      `/holds/${encodeURIComponent(request.holdRef)}/release`,
      request.idempotencyRef,
      { transfers: request.transfers },
    );
    return this.settlement("release", result);
  }

  async refund(request: RefundRequest): Promise<Result<SettlementReceipt, PaymentUnavailableError>> {
    const result = await this.post<SettlementReceipt>(
      `/holds/${encodeURIComponent(request.holdRef)}/refund`,
      request.idempotencyRef,
      { payer: request.payer, amount: request.amount },
    );
    return this.settlement("refund", result);
  }

  private settlement(
    operation: string,
    result: HttpResult<SettlementReceipt>,
  ): Result<SettlementReceipt, PaymentUnavailableError> {
    if (!result.ok || typeof result.data?.settlementRef !== "string") {
      return err(unavailable(operation, result));
    }
    return ok({ settlementRef: result.data.settlementRef });
  }

  private post<T>(path: string, idempotencyRef: string, body: unknown): Promise<HttpResult<T>> {
    return requestJson<T>(
      `${this.baseUrl}${path}`,
      {
        method: "POST",
        headers: { "content-type": "application/json", "idempotency-key": idempotencyRef },
        body: JSON.stringify(body),
      },
      this.timeoutMs,
    );
  }
}
