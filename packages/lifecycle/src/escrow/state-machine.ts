import type { EscrowContract, EscrowState, WatchState } from "@chrono/shared";

/**
 * Escrow contract states and allowed transitions. This table is the single
 * source of truth; every mutation in the manager goes through assertTransition.
 */
export const ESCROW_STATES: readonly EscrowState[] = [
  "FUNDED",
  "AWAITING_EVALUATION",
  "APPROVED",
  "REJECTED",
  "RELEASED",
  "REFUNDED",
  "EXPIRED",
];

export const ALLOWED_ESCROW_TRANSITIONS: Record<EscrowState, readonly EscrowState[]> = {
  FUNDED: ["AWAITING_EVALUATION", "EXPIRED"],
  AWAITING_EVALUATION: ["APPROVED", "REJECTED", "EXPIRED"],
  APPROVED: ["RELEASED", "REFUNDED"],
  REJECTED: ["REFUNDED"],
  RELEASED: [],
  REFUNDED: [],
  EXPIRED: [],
};

export const TERMINAL_ESCROW_STATES: readonly EscrowState[] = ["RELEASED", "REFUNDED", "EXPIRED"];

// Evaluation outcome wins over the deadline: once APPROVED or REJECTED the
// sweep leaves a contract alone.
export const EXPIRABLE_ESCROW_STATES: readonly EscrowState[] = ["FUNDED", "AWAITING_EVALUATION"];

export function isEscrowState(value: unknown): value is EscrowState {
  return typeof value === "string" && (ESCROW_STATES as readonly string[]).includes(value);
}

export function isTerminalEscrowState(state: EscrowState): boolean {
  return TERMINAL_ESCROW_STATES.includes(state);
}

export function canTransition(from: EscrowState, to: EscrowState): boolean {
  return ALLOWED_ESCROW_TRANSITIONS[from].includes(to);
}

export function isExpirable(contract: EscrowContract, now: Date): boolean {
  return (
    EXPIRABLE_ESCROW_STATES.includes(contract.state) &&
    new Date(contract.deadline).getTime() <= now.getTime()
  );
}

/** Watch state the ledger records while its contract sits in `state`. */
export function watchStateFor(state: EscrowState, current: WatchState): WatchState {
  switch (state) {
    case "FUNDED":
    case "AWAITING_EVALUATION":
    case "REJECTED":
      return "IN_ESCROW";
    case "APPROVED":
      // Tokenization may already have moved the watch on.
      return current === "TOKENIZED" ? "TOKENIZED" : "EVALUATED";
    case "RELEASED":
      return "SOLD";
    case "REFUNDED":
    case "EXPIRED":
      return "LISTED";
    default:
      return assertNever(state);
  }
}

export function assertNever(value: never): never {
  throw new Error(`unhandled variant: ${String(value)}`);
}
