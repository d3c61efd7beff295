import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pino } from "pino";
import type {
  EscrowContract,
  Evaluation,
  Money,
  TokenOperationPayload,
  Watch,
} from "@chrono/shared";
import type {
  ChainClient,
  ChainOperation,
  ChainReceipt,
  ChainSubmitError,
  EvaluatorDirectory,
  EvaluatorRef,
  HoldReceipt,
  HoldRequest,
  PaymentGateway,
  RefundRequest,
  ReleaseRequest,
  SettlementReceipt,
} from "../collaborators.js";
import { DEFAULT_LIFECYCLE_CONFIG, type LifecycleConfig } from "../config.js";
import { createLifecycleEngine, type LifecycleEngine } from "../engine.js";
import {
  ChainRejectedError,
  ChainUnavailableError,
  InsufficientFundsError,
  PaymentUnavailableError,
} from "../errors.js";
import { err, ok, unwrap, type Result } from "../result.js";
import { SqliteLedgerStore } from "../storage/ledger-store.js";

export const START = "2026-03-01T10:00:00.000Z";
export const DEADLINE = "2026-03-08T10:00:00.000Z";
export const BUYER_KEY = `0x${"1".repeat(40)}`;
export const OTHER_BUYER_KEY = `0x${"2".repeat(40)}`;

export type ChainFailure = "unavailable" | "rejected" | "hang";

export class FakeChainClient implements ChainClient {
  readonly failures: ChainFailure[] = [];
  readonly submissions: Array<{ operationRef: string; payload: TokenOperationPayload }> = [];
  readonly effects = new Map<string, string>();
  readonly recorded = new Map<string, ChainOperation>();
  lookupDown = false;

  async submit(
    operationRef: string,
    payload: TokenOperationPayload,
  ): Promise<Result<ChainReceipt, ChainSubmitError>> {
    this.submissions.push({ operationRef, payload });
    const failure = this.failures.shift();
    if (failure === "hang") return new Promise<never>(() => undefined);
    if (failure === "unavailable") return err(new ChainUnavailableError("rpc unreachable"));
    if (failure === "rejected") return err(new ChainRejectedError("registry reverted"));

    const existing = this.effects.get(operationRef);
    if (existing) return ok({ txRef: existing });
    const txRef = `tx-${this.effects.size + 1}`;
    this.effects.set(operationRef, txRef);
    this.recorded.set(operationRef, { txRef, payload });
    return ok({ txRef });
  }

  async lookup(operationRef: string): Promise<Result<ChainOperation | null, ChainUnavailableError>> {
    if (this.lookupDown) return err(new ChainUnavailableError("rpc unreachable"));
    return ok(this.recorded.get(operationRef) ?? null);
  }
}

export class FakePaymentGateway implements PaymentGateway {
  readonly insufficient = new Set<string>();
  readonly unavailable: Array<"hold" | "release" | "refund"> = [];
  readonly holds = new Map<string, HoldRequest>();
  readonly releases: ReleaseRequest[] = [];
  readonly refunds: RefundRequest[] = [];
  holdCrash: Error | null = null;

  async hold(
    request: HoldRequest,
  ): Promise<Result<HoldReceipt, InsufficientFundsError | PaymentUnavailableError>> {
    if (this.holdCrash) throw this.holdCrash;
    if (this.takeOutage("hold")) return err(new PaymentUnavailableError("gateway down"));
    if (this.insufficient.has(request.payer)) {
      return err(new InsufficientFundsError(`payer ${request.payer} cannot cover ${request.amount.amount}`));
    }
    this.holds.set(request.idempotencyRef, request);
    return ok({ holdRef: `HLD-${request.idempotencyRef}` });
  }

  async release(request: ReleaseRequest): Promise<Result<SettlementReceipt, PaymentUnavailableError>> {
    if (this.takeOutage("release")) return err(new PaymentUnavailableError("gateway down"));
    if (!this.releases.some((existing) => existing.idempotencyRef === request.idempotencyRef)) {
      this.releases.push(request);
    }
    return ok({ settlementRef: `SET-${request.idempotencyRef}` });
  }

  async refund(request: RefundRequest): Promise<Result<SettlementReceipt, PaymentUnavailableError>> {
    if (this.takeOutage("refund")) return err(new PaymentUnavailableError("gateway down"));
    if (!this.refunds.some((existing) => existing.idempotencyRef === request.idempotencyRef)) {
      this.refunds.push(request);
    }
    return ok({ settlementRef: `RFD-${request.idempotencyRef}` });
  }

  private takeOutage(operation: "hold" | "release" | "refund"): boolean {
    const index = this.unavailable.indexOf(operation);
    if (index === -1) return false;
    this.unavailable.splice(index, 1);
    return true;
  }
}

export class StaticEvaluatorDirectory implements EvaluatorDirectory {
  readonly lookups: string[] = [];

  constructor(public evaluator: EvaluatorRef | null = { evaluatorId: "evaluator-1", tier: "STANDARD" }) {}

  async findEligibleEvaluator(watchCategory: string): Promise<EvaluatorRef | null> {
    this.lookups.push(watchCategory);
    return this.evaluator;
  }
}

export interface Harness {
  engine: LifecycleEngine;
  store: SqliteLedgerStore;
  chain: FakeChainClient;
  payments: FakePaymentGateway;
  directory: StaticEvaluatorDirectory;
  advance(ms: number): void;
  cleanup(): void;
}

export function createHarness(options: {
  config?: Partial<LifecycleConfig>;
  evaluator?: EvaluatorRef | null;
} = {}): Harness {
  const dir = mkdtempSync(join(tmpdir(), "chrono-lifecycle-"));
  const store = new SqliteLedgerStore(join(dir, "ledger.db"));
  const chain = new FakeChainClient();
  const payments = new FakePaymentGateway();
  const directory = new StaticEvaluatorDirectory(options.evaluator);
  let now = new Date(START).getTime();

  const engine = createLifecycleEngine({
    store,
    evaluators: directory,
    chain,
    payments,
    config: { ...DEFAULT_LIFECYCLE_CONFIG, ...options.config },
    logger: pino({ level: "silent" }),
    clock: () => new Date(now),
    sleep: async () => undefined,
  });

  return {
    engine,
    store,
    chain,
    payments,
    directory,
    advance(ms: number) {
      now += ms;
    },
    cleanup() {
      store.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

export function brl(amount: string): Money {
  return { amount, currency: "BRL" };
}

export function listWatch(harness: Harness, serial = "SN-1001", ownerId = "seller-1"): Watch {
  return unwrap(
    harness.engine.watches.listWatch({
      serial,
      brand: "Omega",
      model: "Speedmaster",
      category: "Chronograph",
      ownerId,
    }),
  );
}

export async function openEscrow(
  harness: Harness,
  watch: Watch,
  overrides: { buyerId?: string; chainKey?: string; amount?: string; deadline?: string } = {},
): Promise<EscrowContract> {
  return unwrap(
    await harness.engine.escrow.openEscrow({
      watchId: watch.watchId,
      buyer: { partyId: overrides.buyerId ?? "buyer-1", chainKey: overrides.chainKey ?? BUYER_KEY },
      seller: { partyId: watch.ownerId },
      amount: brl(overrides.amount ?? "100.00"),
      deadline: overrides.deadline ?? DEADLINE,
    }),
  );
}

export async function evaluate(
  harness: Harness,
  contract: EscrowContract,
  result: "CERTIFIED" | "REJECTED",
): Promise<{ contract: EscrowContract; evaluation: Evaluation }> {
  const requested = unwrap(
    await harness.engine.evaluations.requestEvaluation(contract.watchId, contract.contractId),
  );
  const completed = unwrap(
    await harness.engine.evaluations.completeEvaluation({
      evaluationId: requested.evaluation.evaluationId,
      result,
      certificateRef: `CERT-${requested.evaluation.evaluationId}`,
    }),
  );
  return { contract: completed.contract, evaluation: completed.evaluation };
}

export function errorCode<T>(result: Result<T>): string | undefined {
  return result.ok ? undefined : result.error.code;
}
