import {
  sha256Hex,
  type EscrowContract,
  type TokenOperationPayload,
  type TokenRecord,
  type TokenVerification,
  type TokenVerificationMismatch,
  type Watch,
} from "@chrono/shared";
import type { ChainClient, ChainOperation, ChainReceipt, ChainSubmitError } from "../collaborators.js";
import type { LifecycleContext } from "../context.js";
import {
  ChainUnavailableError,
  ConflictError,
  InvalidStateError,
  NotFoundError,
  ValidationError,
} from "../errors.js";
import { newId, tokenOperationRef } from "../ids.js";
import { attempt, err, type Result } from "../result.js";
import { withTimeout } from "../retry.js";
import { commitWatch } from "../storage/commit.js";

/**
 * Appends MINT/TRANSFER records to a watch's token history after the chain
 * accepted the matching operation. One operation reference per
 * (contract, watch, new owner) makes every retry land on the same record.
 */
export class TokenizationService {
  constructor(
    private readonly ctx: LifecycleContext,
    private readonly chain: ChainClient,
  ) {}

  mintOrTransfer(watchId: string, newOwnerKey: string, contractId: string): Promise<Result<TokenRecord>> {
    return attempt(async () => {
      const { store, logger } = this.ctx;
      const ownerKey = newOwnerKey.trim();
      if (!ownerKey) throw new ValidationError("newOwnerKey is required", { field: "newOwnerKey" });

      const watch = store.getWatch(watchId);
      if (!watch) throw new NotFoundError(`watch ${watchId} not found`, { watchId });

      const contract = store.getEscrow(contractId);
      if (!contract) throw new NotFoundError(`escrow ${contractId} not found`, { contractId });
      if (contract.watchId !== watchId) {
        throw new ValidationError(`escrow ${contractId} is not for watch ${watchId}`, { contractId, watchId });
      }

      const operationRef = tokenOperationRef(contractId, watchId, ownerKey);
      const existing = store.getTokenRecordByOperationRef(operationRef);
      if (existing) {
        logger.info({ watchId, operationRef }, "token operation already recorded");
        return existing;
      }

      this.assertCertifiedForBuyer(contract, ownerKey);

      const history = store.listTokenRecords(watchId);
      const active = history[history.length - 1];
      if (active && active.ownerKey === ownerKey) {
        throw new InvalidStateError(`token for watch ${watchId} is already held by ${ownerKey}`);
      }

      const payload: TokenOperationPayload = active
        ? {
            kind: "TRANSFER",
            watchId,
            serialHash: sha256Hex(watch.serial),
            toKey: ownerKey,
            fromKey: active.ownerKey,
          }
        : { kind: "MINT", watchId, serialHash: sha256Hex(watch.serial), toKey: ownerKey };

      const receipt = await this.submit(operationRef, payload);
      if (!receipt.ok) {
        logger.warn(
          { watchId, operationRef, code: receipt.error.code, message: receipt.error.message },
          "token operation failed",
        );
        throw receipt.error;
      }

      const record = store.transaction(() =>
        this.append(watch, operationRef, payload, receipt.value, contractId, active?.sequence ?? 0),
      );
      logger.info(
        { watchId, operationRef, kind: record.kind, sequence: record.sequence, txRef: record.chainTxRef },
        "token record appended",
      );
      return record;
    });
  }

  getTokenHistory(watchId: string): Result<TokenRecord[]> {
    if (!this.ctx.store.getWatch(watchId)) {
      return err(new NotFoundError(`watch ${watchId} not found`, { watchId }));
    }
    return { ok: true, value: this.ctx.store.listTokenRecords(watchId) };
  }

  getActiveToken(watchId: string): TokenRecord | null {
    const history = this.ctx.store.listTokenRecords(watchId);
    return history[history.length - 1] ?? null;
  }

  /**
   * Checks the active token record against the ledger's record of the
   * operation that produced it: same transaction, same new owner.
   */
  verifyToken(watchId: string): Promise<Result<TokenVerification>> {
    return attempt(async () => {
      const { store, logger, config } = this.ctx;
      if (!store.getWatch(watchId)) throw new NotFoundError(`watch ${watchId} not found`, { watchId });
      const active = this.getActiveToken(watchId);
      if (!active) throw new NotFoundError(`watch ${watchId} has no token`, { watchId });

      const { operationRef } = active;
      const found = await withTimeout<Result<ChainOperation | null, ChainUnavailableError>>(
        this.chain.lookup(operationRef),
        config.chainCallTimeoutMs,
        () => err(new ChainUnavailableError("chain lookup timed out", { operationRef })),
      );
      if (!found.ok) throw found.error;

      const operation = found.value;
      let mismatch: TokenVerificationMismatch | undefined;
      if (!operation) {
        mismatch = "OPERATION_NOT_FOUND";
      } else if (operation.txRef !== active.chainTxRef) {
        mismatch = "TX_REF_MISMATCH";
      } else if (operation.payload.toKey !== active.ownerKey || operation.payload.watchId !== watchId) {
        mismatch = "OWNER_MISMATCH";
      }

      const verification: TokenVerification = {
        watchId,
        tokenRecordId: active.tokenRecordId,
        operationRef,
        chainTxRef: active.chainTxRef,
        ledgerTxRef: operation?.txRef,
        verified: !mismatch,
        mismatch,
        checkedAt: this.ctx.clock().toISOString(),
      };
      if (mismatch) {
        logger.warn({ watchId, operationRef, mismatch }, "token record does not match the ledger");
      }
      return verification;
    });
  }

  /** Only a certified, approved escrow may move the token, and only to its buyer. */
  private assertCertifiedForBuyer(contract: EscrowContract, ownerKey: string): void {
    if (contract.state !== "APPROVED") {
      throw new InvalidStateError(`escrow ${contract.contractId} is ${contract.state}, not APPROVED`);
    }
    if (contract.review) {
      throw new InvalidStateError(`escrow ${contract.contractId} is under review (${contract.review.reason})`);
    }
    const evaluation = contract.evaluationId ? this.ctx.store.getEvaluation(contract.evaluationId) : null;
    if (evaluation?.result !== "CERTIFIED") {
      throw new InvalidStateError(`escrow ${contract.contractId} has no certified evaluation`);
    }
    if (contract.buyer.chainKey !== ownerKey) {
      throw new InvalidStateError(`escrow ${contract.contractId} is not for owner key ${ownerKey}`);
    }
  }

  private submit(
    operationRef: string,
    payload: TokenOperationPayload,
  ): Promise<Result<ChainReceipt, ChainSubmitError>> {
    const timeoutMs = this.ctx.config.chainCallTimeoutMs;
    return withTimeout<Result<ChainReceipt, ChainSubmitError>>(
      this.chain.submit(operationRef, payload),
      timeoutMs,
      () => err(new ChainUnavailableError("chain call timed out", { operationRef, timeoutMs })),
    );
  }

  private append(
    watch: Watch,
    operationRef: string,
    payload: TokenOperationPayload,
    receipt: ChainReceipt,
    contractId: string,
    expectedSequence: number,
  ): TokenRecord {
    const { store } = this.ctx;
    const raced = store.getTokenRecordByOperationRef(operationRef);
    if (raced) return raced;

    const history = store.listTokenRecords(watch.watchId);
    const lastSequence = history[history.length - 1]?.sequence ?? 0;
    if (lastSequence !== expectedSequence) {
      throw new ConflictError(`token history of ${watch.watchId} moved during submission`, {
        watchId: watch.watchId,
        expectedSequence,
        lastSequence,
      });
    }

    const now = this.ctx.clock();
    const record: TokenRecord = {
      tokenRecordId: newId("TKN", now),
      watchId: watch.watchId,
      sequence: lastSequence + 1,
      kind: payload.kind,
      ownerKey: payload.toKey,
      previousOwnerKey: payload.fromKey,
      chainTxRef: receipt.txRef,
      operationRef,
      contractId,
      mintedAt: now.toISOString(),
    };
    if (!store.appendTokenRecord(record)) {
      throw new ConflictError(`token record for ${operationRef} was refused`, { operationRef });
    }

    const current = store.getWatch(watch.watchId);
    if (current?.state === "EVALUATED") {
      commitWatch(store, current, { state: "TOKENIZED" }, now);
    }
    return record;
  }
}
