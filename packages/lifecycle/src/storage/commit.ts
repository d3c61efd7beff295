import type { EscrowContract, Evaluation, Watch } from "@chrono/shared";
import { ConflictError } from "../errors.js";
import type { LedgerStore } from "./ledger-store.js";

// Every write is a compare-and-swap against the version that was read; the
// loser of a race gets a ConflictError and must re-read.

export function commitEscrow(
  store: LedgerStore,
  current: EscrowContract,
  changes: Partial<EscrowContract>,
  now: Date,
): EscrowContract {
  const next: EscrowContract = {
    ...current,
    ...changes,
    version: current.version + 1,
    updatedAt: now.toISOString(),
  };
  if (!store.updateEscrow(next, current.version)) {
    throw new ConflictError(`escrow ${current.contractId} changed concurrently`, {
      contractId: current.contractId,
      expectedVersion: current.version,
    });
  }
  return next;
}

export function commitWatch(
  store: LedgerStore,
  current: Watch,
  changes: Partial<Watch>,
  now: Date,
): Watch {
  const next: Watch = {
    ...current,
    ...changes,
    version: current.version + 1,
    updatedAt: now.toISOString(),
  };
  if (!store.updateWatch(next, current.version)) {
    throw new ConflictError(`watch ${current.watchId} changed concurrently`, {
      watchId: current.watchId,
      expectedVersion: current.version,
    });
  }
  return next;
}

/**
 * A watch claimed for a contract whose row never landed stays IN_ESCROW
 * until the claim lease has run out; after that it goes back to LISTED.
 * Returns the watch unchanged when the claim is missing, backed or live.
 */
export function releaseAbandonedWatchClaim(
  store: LedgerStore,
  watch: Watch,
  now: Date,
  claimLeaseMs: number,
): Watch {
  if (!watch.activeContractId || store.getEscrow(watch.activeContractId)) return watch;
  if (Date.parse(watch.updatedAt) + claimLeaseMs > now.getTime()) return watch;
  return commitWatch(store, watch, { state: "LISTED", activeContractId: undefined }, now);
}

export function commitEvaluation(
  store: LedgerStore,
  current: Evaluation,
  changes: Partial<Evaluation>,
): Evaluation | null {
  const next: Evaluation = { ...current, ...changes, version: current.version + 1 };
  return store.updateEvaluation(next, current.version) ? next : null;
}
