import type {
  Commission,
  EscrowContract,
  Money,
  ReconciliationFinding,
  ReconciliationReport,
  SellerRef,
} from "@chrono/shared";
import type {
  PaymentGateway,
  PaymentTransfer,
  SettlementReceipt,
} from "../collaborators.js";
import type { LifecycleContext } from "../context.js";
import {
  InsufficientFundsError,
  PaymentUnavailableError,
} from "../errors.js";
import { newId, payoutRefFor } from "../ids.js";
import { err, ok, type Result } from "../result.js";
import { retryTransient, withTimeout } from "../retry.js";
import { computeCommission } from "./commission.js";
import { toCents } from "./money.js";

export interface PayoutRequest {
  contractId: string;
  holdRef: string;
  seller: SellerRef;
  amount: Money;
  commissionRate: string;
  evaluatorShare: string;
  evaluatorTier: string;
  evaluatorId?: string;
}

/**
 * Money movement for escrow contracts. Every gateway call carries an
 * idempotency reference, is bounded by `paymentCallTimeoutMs` and is retried
 * with the same reference while the gateway reports itself unavailable.
 */
export class SettlementEngine {
  constructor(
    private readonly ctx: LifecycleContext,
    private readonly payments: PaymentGateway,
  ) {}

  async hold(
    amount: Money,
    payer: string,
    idempotencyRef: string,
  ): Promise<Result<string, InsufficientFundsError | PaymentUnavailableError>> {
    const { result } = await this.withRetry("hold", idempotencyRef, () =>
      this.payments.hold({ idempotencyRef, payer, amount }),
    );
    if (!result.ok) return result;
    this.ctx.logger.info({ idempotencyRef, payer, amount: amount.amount }, "funds held");
    return ok(result.value.holdRef);
  }

  /**
   * Releases the hold in one gateway call: seller proceeds plus every
   * commission line. The Commission is returned, not stored; the caller
   * persists it together with the RELEASED transition.
   */
  async payout(request: PayoutRequest): Promise<Result<Commission, PaymentUnavailableError>> {
    const breakdown = computeCommission({
      grossAmount: request.amount,
      rate: request.commissionRate,
      evaluatorShare: request.evaluatorShare,
      evaluatorId: request.evaluatorId,
      platformBeneficiaryId: this.ctx.config.platformBeneficiaryId,
    });

    const transfers: PaymentTransfer[] = [
      {
        beneficiaryId: request.seller.partyId,
        amount: breakdown.sellerAmount,
        purpose: "SELLER_PROCEEDS",
      },
      ...breakdown.lines
        .filter((line) => toCents(line.amount.amount) > 0n)
        .map((line): PaymentTransfer => ({
          beneficiaryId: line.beneficiaryId,
          amount: line.amount,
          purpose: line.beneficiary === "EVALUATOR" ? "EVALUATOR_FEE" : "PLATFORM_COMMISSION",
        })),
    ];

    const idempotencyRef = payoutRefFor(request.contractId);
    const { result } = await this.withRetry("release", idempotencyRef, () =>
      this.payments.release({ idempotencyRef, holdRef: request.holdRef, transfers }),
    );
    if (!result.ok) return result;

    const now = this.ctx.clock();
    const commission: Commission = {
      commissionId: newId("COM", now),
      contractId: request.contractId,
      rate: request.commissionRate,
      evaluatorTier: request.evaluatorTier,
      grossAmount: request.amount,
      commissionAmount: breakdown.commissionAmount,
      sellerAmount: breakdown.sellerAmount,
      lines: breakdown.lines,
      settlementRef: result.value.settlementRef,
      createdAt: now.toISOString(),
    };
    this.ctx.logger.info(
      {
        contractId: request.contractId,
        commission: commission.commissionAmount.amount,
        sellerAmount: commission.sellerAmount.amount,
      },
      "payout settled",
    );
    return ok(commission);
  }

  async refund(
    holdRef: string,
    payer: string,
    amount: Money,
    idempotencyRef: string,
  ): Promise<Result<SettlementReceipt, PaymentUnavailableError>> {
    const { result } = await this.withRetry("refund", idempotencyRef, () =>
      this.payments.refund({ idempotencyRef, holdRef, payer, amount }),
    );
    if (result.ok) {
      this.ctx.logger.info({ holdRef, payer, amount: amount.amount }, "hold refunded");
    }
    return result;
  }

  /**
   * Cross-checks released contracts against token history and commissions,
   * and every tokenized watch against the owner its last settlement recorded.
   */
  reconcile(): ReconciliationReport {
    const { store } = this.ctx;
    const released = store.listEscrows({ state: "RELEASED" });
    const findings: ReconciliationFinding[] = [];

    for (const contract of released) {
      findings.push(...this.checkReleased(contract));
    }

    for (const watch of store.listWatches()) {
      const history = store.listTokenRecords(watch.watchId);
      const active = history[history.length - 1];
      if (!active) continue;
      const settledBy = store.getEscrow(active.contractId);
      if (settledBy?.state !== "RELEASED") continue;
      if (watch.ownerId !== settledBy.buyer.partyId) {
        findings.push({
          code: "WATCH_OWNER_MISMATCH",
          watchId: watch.watchId,
          contractId: settledBy.contractId,
          message: `watch owner ${watch.ownerId} differs from buyer ${settledBy.buyer.partyId}`,
        });
      }
    }

    const report: ReconciliationReport = {
      checkedContracts: released.length,
      findings,
      createdAt: this.ctx.clock().toISOString(),
    };
    if (findings.length > 0) {
      this.ctx.logger.warn({ findings: findings.length }, "reconciliation found mismatches");
    }
    return report;
  }

  private checkReleased(contract: EscrowContract): ReconciliationFinding[] {
    const { store } = this.ctx;
    const findings: ReconciliationFinding[] = [];
    const tokenRecordId = contract.tokenization?.tokenRecordId;
    const record = tokenRecordId ? store.getTokenRecord(tokenRecordId) : null;

    if (!record || record.contractId !== contract.contractId) {
      findings.push({
        code: "RELEASED_WITHOUT_TOKEN",
        watchId: contract.watchId,
        contractId: contract.contractId,
        message: "released contract has no token record",
      });
    } else if (record.ownerKey !== contract.buyer.chainKey) {
      findings.push({
        code: "TOKEN_OWNER_MISMATCH",
        watchId: contract.watchId,
        contractId: contract.contractId,
        message: `token owner ${record.ownerKey} differs from buyer key ${contract.buyer.chainKey}`,
      });
    }

    if (!store.getCommissionForContract(contract.contractId)) {
      findings.push({
        code: "RELEASED_WITHOUT_COMMISSION",
        watchId: contract.watchId,
        contractId: contract.contractId,
        message: "released contract has no commission record",
      });
    }
    return findings;
  }

  private withRetry<T, E extends InsufficientFundsError | PaymentUnavailableError>(
    operation: string,
    idempotencyRef: string,
    call: () => Promise<Result<T, E>>,
  ): Promise<{ result: Result<T, E | PaymentUnavailableError>; attempts: number }> {
    const { config, logger, sleep } = this.ctx;
    return retryTransient<T, E | PaymentUnavailableError>(
      () =>
        withTimeout<Result<T, E | PaymentUnavailableError>>(
          call(),
          config.paymentCallTimeoutMs,
          () =>
            err(
              new PaymentUnavailableError(`payment ${operation} timed out`, {
                idempotencyRef,
                timeoutMs: config.paymentCallTimeoutMs,
              }),
            ),
        ),
      config.paymentRetry,
      sleep,
      {
        onRetry: (error, attempt, delayMs) =>
          logger.warn(
            { operation, idempotencyRef, attempt, delayMs, code: error.code },
            "payment call failed, retrying",
          ),
      },
    );
  }
}
