import { randomUUID } from "node:crypto";
import { digestOf } from "@chrono/shared";

export type IdPrefix = "WCH" | "ESC" | "EVL" | "TKN" | "COM" | "AUD";

export function newId(prefix: IdPrefix, now: Date = new Date()): string {
  const timestamp = now.toISOString().replace(/[-:.]/g, "");
  return `${prefix}-${timestamp}-${randomUUID().split("-")[0]}`;
}

// Idempotency references handed to collaborators. They are derived from the
// contract id alone so that every retry of the same step reuses them.
export function holdRefFor(contractId: string): string {
  return `hold:${contractId}`;
}

export function payoutRefFor(contractId: string): string {
  return `payout:${contractId}`;
}

export function refundRefFor(contractId: string): string {
  return `refund:${contractId}`;
}

export function tokenOperationRef(contractId: string, watchId: string, newOwnerKey: string): string {
  return `TOK-${digestOf({ contractId, watchId, newOwnerKey })}`;
}
