import type {
  BuyerRef,
  ClaimKind,
  Commission,
  EscrowAuditEvent,
  EscrowAuditEventType,
  EscrowContract,
  EscrowState,
  Evaluation,
  Money,
  ReviewAction,
  ReviewReason,
  SellerRef,
  SweepExpiredResponse,
  TokenRecord,
  Watch,
} from "@chrono/shared";
import { commissionTierFor } from "../config.js";
import type { LifecycleContext } from "../context.js";
import {
  ChainRejectedError,
  ConflictError,
  InvalidAmountError,
  InvalidStateError,
  NotFoundError,
  ValidationError,
} from "../errors.js";
import { holdRefFor, newId, refundRefFor } from "../ids.js";
import { attempt, attemptSync, type Result } from "../result.js";
import { retryTransient } from "../retry.js";
import type { SettlementEngine } from "../settlement/settlement-engine.js";
import { normalizeMoney } from "../settlement/money.js";
import type { ListEscrowsFilter } from "../storage/ledger-store.js";
import { commitEscrow, commitWatch, releaseAbandonedWatchClaim } from "../storage/commit.js";
import type { TokenizationService } from "../tokenization/tokenization-service.js";
import {
  EXPIRABLE_ESCROW_STATES,
  assertNever,
  canTransition,
  isTerminalEscrowState,
  watchStateFor,
} from "./state-machine.js";

export interface OpenEscrowInput {
  watchId: string;
  buyer: BuyerRef;
  seller: SellerRef;
  amount: Money;
  deadline: string;
}

export interface ResolveOutcome {
  contract: EscrowContract;
  tokenRecord?: TokenRecord;
  commission?: Commission;
}

export interface EvaluationAssignment {
  evaluationId: string;
  evaluatorId: string;
  evaluatorTier: string;
}

const SYSTEM_ACTOR = "system";

function requireText(value: string | undefined, field: string): string {
  const trimmed = (value ?? "").trim();
  if (!trimmed) throw new ValidationError(`${field} is required`, { field });
  return trimmed;
}

/**
 * Owns the escrow contract state machine. Mutations are compare-and-swap
 * writes on the contract version; outbound calls happen between a claim
 * (a CAS that stores a lease) and the commit against the claimed version,
 * never inside a store transaction.
 */
export class EscrowContractManager {
  constructor(
    private readonly ctx: LifecycleContext,
    private readonly tokenization: TokenizationService,
    private readonly settlement: SettlementEngine,
  ) {}

  openEscrow(input: OpenEscrowInput): Promise<Result<EscrowContract>> {
    return attempt(async () => {
      const { store, config, logger } = this.ctx;
      const amount = normalizeMoney(input.amount);
      if (amount.currency !== config.currency) {
        throw new InvalidAmountError(`escrows are held in ${config.currency}`, {
          currency: amount.currency,
        });
      }
      const buyer: BuyerRef = {
        partyId: requireText(input.buyer?.partyId, "buyer.partyId"),
        chainKey: requireText(input.buyer?.chainKey, "buyer.chainKey"),
      };
      const seller: SellerRef = { partyId: requireText(input.seller?.partyId, "seller.partyId") };
      if (buyer.partyId === seller.partyId) {
        throw new ValidationError("buyer and seller must be different parties");
      }

      const now = this.ctx.clock();
      const deadlineMs = Date.parse(input.deadline);
      if (Number.isNaN(deadlineMs)) {
        throw new ValidationError(`deadline '${input.deadline}' is not a timestamp`, { field: "deadline" });
      }
      if (deadlineMs <= now.getTime()) {
        throw new ValidationError("deadline must be in the future", { field: "deadline" });
      }

      const stored = store.getWatch(input.watchId);
      if (!stored) throw new NotFoundError(`watch ${input.watchId} not found`, { watchId: input.watchId });
      const watch = this.releaseAbandonedClaim(stored, now);
      const active = watch.activeContractId ?? store.getActiveEscrowForWatch(watch.watchId)?.contractId;
      if (active) {
        throw new ConflictError(`watch ${watch.watchId} already has an active escrow`, {
          contractId: active,
        });
      }
      if (watch.state !== "LISTED") {
        throw new InvalidStateError(`watch ${watch.watchId} is not listed (is ${watch.state})`);
      }
      if (watch.ownerId !== seller.partyId) {
        throw new InvalidStateError(`seller ${seller.partyId} does not own watch ${watch.watchId}`);
      }

      const contractId = newId("ESC", now);
      const claimedWatch = commitWatch(
        store,
        watch,
        { state: "IN_ESCROW", activeContractId: contractId },
        now,
      );

      // Any failure before the contract row lands hands the watch back.
      try {
        return await this.fundAndInsert(contractId, claimedWatch, buyer, seller, amount, deadlineMs);
      } catch (error) {
        const released = attemptSync(() => this.releaseWatchClaim(claimedWatch.watchId, contractId));
        if (!released.ok) {
          logger.error(
            { watchId: claimedWatch.watchId, contractId, code: released.error.code },
            "watch claim could not be released",
          );
        }
        throw error;
      }
    });
  }

  private async fundAndInsert(
    contractId: string,
    watch: Watch,
    buyer: BuyerRef,
    seller: SellerRef,
    amount: Money,
    deadlineMs: number,
  ): Promise<EscrowContract> {
    const { store, logger } = this.ctx;
    const hold = await this.settlement.hold(amount, buyer.partyId, holdRefFor(contractId));
    if (!hold.ok) {
      logger.warn({ watchId: watch.watchId, code: hold.error.code }, "escrow hold failed");
      throw hold.error;
    }

    const createdAt = this.ctx.clock().toISOString();
    const contract: EscrowContract = {
      contractId,
      watchId: watch.watchId,
      buyer,
      seller,
      amount,
      state: "FUNDED",
      holdRef: hold.value,
      deadline: new Date(deadlineMs).toISOString(),
      createdAt,
      updatedAt: createdAt,
      version: 1,
    };
    const inserted = store.transaction(() => {
      if (!store.insertEscrow(contract)) return false;
      this.audit(contractId, "OPENED", buyer.partyId, {
        amount: amount.amount,
        currency: amount.currency,
        holdRef: contract.holdRef,
      });
      return true;
    });
    if (!inserted) {
      const refund = await this.settlement.refund(
        contract.holdRef,
        buyer.partyId,
        amount,
        refundRefFor(contractId),
      );
      if (!refund.ok) {
        logger.error(
          { contractId, holdRef: contract.holdRef, code: refund.error.code },
          "orphaned hold could not be refunded",
        );
      }
      throw new ConflictError(`watch ${watch.watchId} already has an active escrow`);
    }

    logger.info({ contractId, watchId: watch.watchId, amount: amount.amount }, "escrow opened");
    return contract;
  }

  confirmShipment(contractId: string, sellerId: string): Result<EscrowContract> {
    return attemptSync(() => {
      const contract = this.load(contractId);
      if (contract.seller.partyId !== sellerId) {
        throw new InvalidStateError(`${sellerId} is not the seller of ${contractId}`);
      }
      if (contract.state !== "FUNDED" && contract.state !== "AWAITING_EVALUATION") {
        throw new InvalidStateError(`cannot confirm shipment while ${contract.state}`);
      }
      if (contract.shipmentConfirmedAt) return contract;
      this.ensureNoLiveClaim(contract);

      const now = this.ctx.clock();
      return this.ctx.store.transaction(() => {
        const next = commitEscrow(this.ctx.store, contract, { shipmentConfirmedAt: now.toISOString() }, now);
        this.audit(contractId, "SHIPMENT_CONFIRMED", sellerId);
        return next;
      });
    });
  }

  /**
   * FUNDED -> AWAITING_EVALUATION. Runs inside the evaluation workflow's
   * transaction, against the version it read before looking up an evaluator.
   */
  beginEvaluation(contract: EscrowContract, assignment: EvaluationAssignment): EscrowContract {
    this.ensureNoLiveClaim(contract);
    if (this.ctx.config.requireShipmentConfirmation && !contract.shipmentConfirmedAt) {
      throw new InvalidStateError(`seller has not confirmed shipment for ${contract.contractId}`);
    }
    const next = this.transition(contract, "AWAITING_EVALUATION", {
      evaluationId: assignment.evaluationId,
      evaluatorId: assignment.evaluatorId,
      evaluatorTier: assignment.evaluatorTier,
    });
    this.audit(contract.contractId, "EVALUATION_REQUESTED", SYSTEM_ACTOR, { ...assignment });
    return next;
  }

  submitEvaluation(contractId: string, evaluation: Evaluation): Result<EscrowContract> {
    return attemptSync(() =>
      this.ctx.store.transaction(() => this.applyEvaluation(contractId, evaluation.evaluationId)),
    );
  }

  /** Applies the stored outcome of `evaluationId`; callers hold a transaction. */
  applyEvaluation(contractId: string, evaluationId: string): EscrowContract {
    const { store } = this.ctx;
    const contract = this.load(contractId);
    const evaluation = store.getEvaluation(evaluationId);
    if (!evaluation) throw new NotFoundError(`evaluation ${evaluationId} not found`, { evaluationId });
    if (evaluation.contractId !== contractId || contract.evaluationId !== evaluationId) {
      throw new InvalidStateError(`evaluation ${evaluationId} does not belong to ${contractId}`);
    }
    if (contract.state !== "AWAITING_EVALUATION") {
      throw new InvalidStateError(`cannot submit an evaluation while ${contract.state}`);
    }
    this.ensureNoLiveClaim(contract);

    let target: EscrowState;
    switch (evaluation.result) {
      case "CERTIFIED":
        target = "APPROVED";
        break;
      case "REJECTED":
        target = "REJECTED";
        break;
      case "PENDING":
        throw new InvalidStateError(`evaluation ${evaluationId} is not completed`);
      default:
        return assertNever(evaluation.result);
    }

    const next = this.transition(contract, target, {});
    const watch = this.loadWatch(contract.watchId);
    const watchState = watchStateFor(target, watch.state);
    if (watchState !== watch.state) {
      commitWatch(store, watch, { state: watchState }, this.ctx.clock());
    }
    this.audit(contractId, "EVALUATION_SUBMITTED", evaluation.evaluatorId, {
      evaluationId,
      result: evaluation.result,
    });
    return next;
  }

  /** Sets the manual-review flag; callers hold a transaction. */
  flagReview(contract: EscrowContract, reason: ReviewReason, message: string, actor: string): EscrowContract {
    const now = this.ctx.clock();
    const next = commitEscrow(
      this.ctx.store,
      contract,
      { review: { reason, message, flaggedAt: now.toISOString() } },
      now,
    );
    this.audit(contract.contractId, "REVIEW_FLAGGED", actor, { reason, message });
    this.ctx.logger.warn({ contractId: contract.contractId, reason }, "escrow flagged for review");
    return next;
  }

  resolve(contractId: string): Promise<Result<ResolveOutcome>> {
    return attempt(async () => {
      const contract = this.load(contractId);
      this.ensureNoLiveClaim(contract);
      if (contract.review) {
        throw new InvalidStateError(
          `escrow ${contractId} awaits manual review (${contract.review.reason})`,
        );
      }

      switch (contract.state) {
        case "APPROVED":
          return this.release(contract);
        case "REJECTED": {
          const refunded = await this.refundAndClose(
            this.claim(contract, "RESOLVE"),
            "REFUNDED",
            SYSTEM_ACTOR,
          );
          return { contract: refunded };
        }
        case "FUNDED":
        case "AWAITING_EVALUATION":
        case "RELEASED":
        case "REFUNDED":
        case "EXPIRED":
          throw new InvalidStateError(`cannot resolve an escrow in ${contract.state}`);
        default:
          return assertNever(contract.state);
      }
    });
  }

  expire(contractId: string, actor: string = SYSTEM_ACTOR): Promise<Result<EscrowContract>> {
    return attempt(async () => {
      const contract = this.load(contractId);
      if (isTerminalEscrowState(contract.state)) {
        throw new InvalidStateError(`escrow ${contractId} is already ${contract.state}`);
      }
      if (!EXPIRABLE_ESCROW_STATES.includes(contract.state)) {
        throw new InvalidStateError(`escrow ${contractId} has an evaluation outcome (${contract.state})`);
      }
      if (Date.parse(contract.deadline) > this.ctx.clock().getTime()) {
        throw new InvalidStateError(`escrow ${contractId} has not reached its deadline`);
      }
      this.ensureNoLiveClaim(contract);
      return this.refundAndClose(this.claim(contract, "EXPIRE"), "EXPIRED", actor);
    });
  }

  async sweepExpired(): Promise<SweepExpiredResponse> {
    const nowIso = this.ctx.clock().toISOString();
    const overdue = this.ctx.store
      .listOverdueEscrows(nowIso)
      .filter((contract) => EXPIRABLE_ESCROW_STATES.includes(contract.state));

    const response: SweepExpiredResponse = { expired: [], skipped: [] };
    for (const contract of overdue) {
      const result = await this.expire(contract.contractId);
      if (result.ok) {
        response.expired.push(contract.contractId);
      } else {
        response.skipped.push({ contractId: contract.contractId, code: result.error.code });
      }
    }

    const released = this.releaseAbandonedClaims();
    if (released.length > 0) response.releasedWatches = released;
    if (overdue.length > 0 || released.length > 0) {
      this.ctx.logger.info(
        { expired: response.expired.length, skipped: response.skipped.length, released: released.length },
        "expiry sweep finished",
      );
    }
    return response;
  }

  resolveReview(
    contractId: string,
    action: ReviewAction,
    actor: string,
    buyerChainKey?: string,
  ): Promise<Result<ResolveOutcome>> {
    return attempt(async () => {
      const operator = requireText(actor, "actor");
      const contract = this.load(contractId);
      if (!contract.review) {
        throw new InvalidStateError(`escrow ${contractId} has no pending review`);
      }
      this.ensureNoLiveClaim(contract);

      switch (action) {
        case "RETRY": {
          const now = this.ctx.clock();
          const chainKey = buyerChainKey?.trim();
          const changes: Partial<EscrowContract> = { review: undefined };
          if (chainKey) changes.buyer = { ...contract.buyer, chainKey };
          if (contract.tokenization) {
            changes.tokenization = { ...contract.tokenization, retryEligible: true };
          }
          const cleared = this.ctx.store.transaction(() => {
            const next = commitEscrow(this.ctx.store, contract, changes, now);
            this.audit(contractId, "REVIEW_CLEARED", operator, {
              reason: contract.review?.reason,
              buyerChainKeyReplaced: Boolean(chainKey),
            });
            return next;
          });
          this.ctx.logger.info({ contractId, actor: operator }, "escrow review cleared");
          return { contract: cleared };
        }
        case "REFUND_BUYER": {
          if (contract.state !== "APPROVED" && contract.state !== "REJECTED") {
            throw new InvalidStateError(`cannot refund a reviewed escrow in ${contract.state}`);
          }
          // The token record is appended before the contract learns its id.
          const moved = this.ctx.store.listTokenRecordsForContract(contractId);
          if (contract.tokenization?.tokenRecordId || moved.length > 0) {
            throw new InvalidStateError(`token already transferred for ${contractId}`, {
              tokenRecordId: contract.tokenization?.tokenRecordId ?? moved[0]?.tokenRecordId,
            });
          }
          const refunded = await this.refundAndClose(
            this.claim(contract, "REVIEW_REFUND"),
            "REFUNDED",
            operator,
          );
          return { contract: refunded };
        }
        default:
          return assertNever(action);
      }
    });
  }

  getEscrow(contractId: string): Result<EscrowContract> {
    return attemptSync(() => this.load(contractId));
  }

  listEscrows(filter: ListEscrowsFilter = {}): EscrowContract[] {
    return this.ctx.store.listEscrows(filter);
  }

  getAuditTrail(contractId: string): Result<EscrowAuditEvent[]> {
    return attemptSync(() => {
      this.load(contractId);
      return this.ctx.store.getAuditEvents(contractId);
    });
  }

  private async release(contract: EscrowContract): Promise<ResolveOutcome> {
    const { store, config, logger, sleep } = this.ctx;
    const evaluation = contract.evaluationId ? store.getEvaluation(contract.evaluationId) : null;
    if (evaluation?.result !== "CERTIFIED") {
      throw new InvalidStateError(`escrow ${contract.contractId} has no certified evaluation`);
    }

    let claimed = this.claim(contract, "RESOLVE");
    const { result: tokenResult, attempts } = await retryTransient(
      () => this.tokenization.mintOrTransfer(contract.watchId, contract.buyer.chainKey, contract.contractId),
      config.tokenizationRetry,
      sleep,
      {
        onRetry: (error, attempt, delayMs) =>
          logger.warn(
            { contractId: contract.contractId, attempt, delayMs, code: error.code },
            "tokenization failed, retrying",
          ),
      },
    );

    const now = this.ctx.clock();
    const previousAttempts = contract.tokenization?.attempts ?? 0;
    if (!tokenResult.ok) {
      const error = tokenResult.error;
      store.transaction(() => {
        const failed = commitEscrow(
          store,
          claimed,
          {
            claim: undefined,
            tokenization: {
              attempts: previousAttempts + attempts,
              retryEligible: error.retryable,
              lastErrorCode: error.code,
              lastErrorMessage: error.message,
              lastAttemptAt: now.toISOString(),
            },
          },
          now,
        );
        this.audit(contract.contractId, "TOKENIZATION_FAILED", SYSTEM_ACTOR, {
          code: error.code,
          attempts,
        });
        if (error instanceof ChainRejectedError) {
          this.flagReview(failed, "CHAIN_REJECTED", error.message, SYSTEM_ACTOR);
        }
      });
      throw error;
    }

    const tokenRecord = tokenResult.value;
    claimed = commitEscrow(
      store,
      claimed,
      {
        tokenization: {
          attempts: previousAttempts + attempts,
          retryEligible: false,
          lastAttemptAt: now.toISOString(),
          tokenRecordId: tokenRecord.tokenRecordId,
        },
      },
      now,
    );

    const { tier, commission: rates } = commissionTierFor(config, contract.evaluatorTier);
    const payout = await this.settlement.payout({
      contractId: contract.contractId,
      holdRef: contract.holdRef,
      seller: contract.seller,
      amount: contract.amount,
      commissionRate: rates.rate,
      evaluatorShare: rates.evaluatorShare,
      evaluatorTier: tier,
      evaluatorId: contract.evaluatorId,
    });
    if (!payout.ok) {
      commitEscrow(store, claimed, { claim: undefined }, this.ctx.clock());
      throw payout.error;
    }

    const commission = payout.value;
    const released = store.transaction(() => {
      const committedAt = this.ctx.clock();
      store.insertCommission(commission);
      const stored = store.getCommissionForContract(contract.contractId) ?? commission;
      const next = this.transition(claimed, "RELEASED", {
        claim: undefined,
        commissionId: stored.commissionId,
        resolvedAt: committedAt.toISOString(),
      });
      const watch = this.loadWatch(contract.watchId);
      commitWatch(
        store,
        watch,
        {
          state: "SOLD",
          ownerId: contract.buyer.partyId,
          ownerChainKey: contract.buyer.chainKey,
          activeContractId: undefined,
        },
        committedAt,
      );
      this.audit(contract.contractId, "RELEASED", SYSTEM_ACTOR, {
        tokenRecordId: tokenRecord.tokenRecordId,
        commissionId: stored.commissionId,
        settlementRef: stored.settlementRef,
      });
      return next;
    });

    logger.info(
      { contractId: contract.contractId, watchId: contract.watchId, buyer: contract.buyer.partyId },
      "escrow released",
    );
    return { contract: released, tokenRecord, commission };
  }

  /** Refunds the buyer from a claimed contract and closes it in `target`. */
  private async refundAndClose(
    claimed: EscrowContract,
    target: "REFUNDED" | "EXPIRED",
    actor: string,
  ): Promise<EscrowContract> {
    const { store, logger } = this.ctx;
    const refund = await this.settlement.refund(
      claimed.holdRef,
      claimed.buyer.partyId,
      claimed.amount,
      refundRefFor(claimed.contractId),
    );
    if (!refund.ok) {
      commitEscrow(store, claimed, { claim: undefined }, this.ctx.clock());
      throw refund.error;
    }

    const closed = store.transaction(() => {
      const now = this.ctx.clock();
      const next = this.transition(claimed, target, {
        claim: undefined,
        review: undefined,
        resolvedAt: now.toISOString(),
      });
      const watch = this.loadWatch(claimed.watchId);
      if (watch.activeContractId === claimed.contractId) {
        commitWatch(store, watch, { state: watchStateFor(target, watch.state), activeContractId: undefined }, now);
      }
      this.audit(claimed.contractId, target, actor, { settlementRef: refund.value.settlementRef });
      return next;
    });
    logger.info({ contractId: claimed.contractId, state: target }, "escrow closed with refund");
    return closed;
  }

  private claim(contract: EscrowContract, kind: ClaimKind): EscrowContract {
    const now = this.ctx.clock();
    return commitEscrow(
      this.ctx.store,
      contract,
      {
        claim: {
          kind,
          claimedAt: now.toISOString(),
          leaseExpiresAt: new Date(now.getTime() + this.ctx.config.claimLeaseMs).toISOString(),
        },
      },
      now,
    );
  }

  private ensureNoLiveClaim(contract: EscrowContract): void {
    const claim = contract.claim;
    if (claim && Date.parse(claim.leaseExpiresAt) > this.ctx.clock().getTime()) {
      throw new ConflictError(`escrow ${contract.contractId} is busy (${claim.kind})`, {
        contractId: contract.contractId,
        claim: claim.kind,
      });
    }
  }

  private transition(
    contract: EscrowContract,
    to: EscrowState,
    changes: Partial<EscrowContract>,
  ): EscrowContract {
    if (!canTransition(contract.state, to)) {
      throw new InvalidStateError(`escrow cannot move from ${contract.state} to ${to}`, {
        contractId: contract.contractId,
        from: contract.state,
        to,
      });
    }
    const next = commitEscrow(this.ctx.store, contract, { ...changes, state: to }, this.ctx.clock());
    this.ctx.logger.info({ contractId: contract.contractId, from: contract.state, to }, "escrow transition");
    return next;
  }

  /** Undoes an openEscrow claim whose contract row was never inserted. */
  private releaseWatchClaim(watchId: string, contractId: string): void {
    const { store } = this.ctx;
    const watch = store.getWatch(watchId);
    if (watch?.activeContractId !== contractId || store.getEscrow(contractId)) return;
    commitWatch(store, watch, { state: "LISTED", activeContractId: undefined }, this.ctx.clock());
  }

  private releaseAbandonedClaim(watch: Watch, now: Date): Watch {
    const next = releaseAbandonedWatchClaim(this.ctx.store, watch, now, this.ctx.config.claimLeaseMs);
    if (next !== watch) {
      this.ctx.logger.warn(
        { watchId: watch.watchId, contractId: watch.activeContractId },
        "abandoned watch claim released",
      );
    }
    return next;
  }

  private releaseAbandonedClaims(): string[] {
    const now = this.ctx.clock();
    const released: string[] = [];
    for (const watch of this.ctx.store.listWatches()) {
      if (watch.state !== "IN_ESCROW" || !watch.activeContractId) continue;
      const result = attemptSync(() => this.releaseAbandonedClaim(watch, now));
      if (!result.ok) {
        this.ctx.logger.warn({ watchId: watch.watchId, code: result.error.code }, "watch claim release skipped");
      } else if (result.value !== watch) {
        released.push(watch.watchId);
      }
    }
    return released;
  }

  private audit(
    contractId: string,
    type: EscrowAuditEventType,
    actor: string,
    details?: Record<string, unknown>,
  ): void {
    const now = this.ctx.clock();
    this.ctx.store.appendAuditEvent({
      eventId: newId("AUD", now),
      contractId,
      type,
      actor,
      occurredAt: now.toISOString(),
      details,
    });
  }

  private load(contractId: string): EscrowContract {
    const contract = this.ctx.store.getEscrow(contractId);
    if (!contract) throw new NotFoundError(`escrow ${contractId} not found`, { contractId });
    return contract;
  }

  private loadWatch(watchId: string): Watch {
    const watch = this.ctx.store.getWatch(watchId);
    if (!watch) throw new NotFoundError(`watch ${watchId} not found`, { watchId });
    return watch;
  }
}
