import {
  serviceAuthHeaders,
  type GetTokenOperationResponse,
  type SubmitTokenOperationRequest,
  type SubmitTokenOperationResponse,
  type TokenOperationPayload,
} from "@chrono/shared";
import {
  ChainRejectedError,
  ChainUnavailableError,
  err,
  ok,
  type ChainClient,
  type ChainOperation,
  type ChainReceipt,
  type ChainSubmitError,
  type Result,
} from "@chrono/lifecycle";
import { getErrorMessage, requestJson } from "./http.js";

// 4xx answers other than these mean the registry refused the operation itself.
const TRANSIENT_CLIENT_STATUSES = new Set([401, 403, 408, 429]);

/** Submits and looks up token operations on the ledger adapter service. */
export class HttpLedgerClient implements ChainClient {
  constructor(
    private readonly baseUrl: string,
    private readonly serviceAuthToken?: string,
    private readonly timeoutMs = 15_000,
  ) {}

  async submit(
    operationRef: string,
    payload: TokenOperationPayload,
  ): Promise<Result<ChainReceipt, ChainSubmitError>> {
    const request: SubmitTokenOperationRequest = { operationRef, payload };
    const result = await requestJson<SubmitTokenOperationResponse>(
      `${this.baseUrl}/tokens/submit`,
      {
        method: "POST",
        headers: {
          ...serviceAuthHeaders(this.serviceAuthToken),
          "content-type": "application/json",
        },
        body: JSON.stringify(request),
      },
      this.timeoutMs,
    );

    if (result.ok && typeof result.data?.txRef === "string") {
      return ok({ txRef: result.data.txRef });
    }

    const message = getErrorMessage(result.data);
    const details = { operationRef, status: result.status };
    if (
      result.ok ||
      result.status === 0 ||
      result.status >= 500 ||
      TRANSIENT_CLIENT_STATUSES.has(result.status)
    ) {
      return err(
        new ChainUnavailableError(message || `ledger adapter unavailable (${result.status})`, details),
      );
    }
    return err(new ChainRejectedError(message || `ledger adapter rejected ${operationRef}`, details));
  }

  async lookup(operationRef: string): Promise<Result<ChainOperation | null, ChainUnavailableError>> {
    const result = await requestJson<GetTokenOperationResponse>(
      `${this.baseUrl}/tokens/operations/${encodeURIComponent(operationRef)}`,
      { method: "GET", headers: serviceAuthHeaders(this.serviceAuthToken) },
      this.timeoutMs,
    );
    if (result.status === 404) return ok(null);

    const operation = result.data?.operation;
    if (!result.ok || !operation || typeof operation.txRef !== "string") {
      return err(
        new ChainUnavailableError(
          getErrorMessage(result.data) || `ledger adapter lookup failed (${result.status})`,
          { operationRef, status: result.status },
        ),
      );
    }
    return ok({ txRef: operation.txRef, payload: operation.payload });
  }
}
