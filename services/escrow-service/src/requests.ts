import type {
  CompleteEvaluationRequest,
  ConfirmShipmentRequest,
  DisputeEvaluationRequest,
  EscrowState,
  EvaluationReport,
  ListEscrowsQuery,
  ListWatchRequest,
  MintOrTransferRequest,
  Money,
  OpenEscrowRequest,
  ResolveReviewRequest,
  SubmitEvaluationRequest,
  WatchAuthenticity,
  WatchCondition,
  WatchOwnerRequest,
} from "@chrono/shared";
import { isEscrowState } from "@chrono/lifecycle";

// Parsers check shape only; business rules (amounts, deadlines, states) are
// enforced by the lifecycle engine and come back as typed errors.

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function optionalString(value: unknown): string | undefined | null {
  if (value === undefined) return undefined;
  return isNonEmptyString(value) ? value.trim() : null;
}

function parseMoney(value: unknown): Money | null {
  if (!isObject(value)) return null;
  if (typeof value.amount !== "string" || !isNonEmptyString(value.currency)) return null;
  return { amount: value.amount.trim(), currency: value.currency.trim().toUpperCase() };
}

const CONDITIONS: readonly WatchCondition[] = ["excellent", "good", "fair", "poor"];
const AUTHENTICITY: readonly WatchAuthenticity[] = ["authentic", "replica", "unknown"];

function isCondition(value: unknown): value is WatchCondition {
  return typeof value === "string" && (CONDITIONS as readonly string[]).includes(value);
}

function isAuthenticity(value: unknown): value is WatchAuthenticity {
  return typeof value === "string" && (AUTHENTICITY as readonly string[]).includes(value);
}

function parseReport(value: unknown): EvaluationReport | null {
  if (!isObject(value)) return null;
  if (!isCondition(value.condition) || !isAuthenticity(value.authenticity)) return null;

  const report: EvaluationReport = { condition: value.condition, authenticity: value.authenticity };
  if (value.estimatedValue !== undefined) {
    const estimatedValue = parseMoney(value.estimatedValue);
    if (!estimatedValue) return null;
    report.estimatedValue = estimatedValue;
  }
  if (value.notes !== undefined) {
    if (typeof value.notes !== "string") return null;
    report.notes = value.notes;
  }
  if (value.photoHashes !== undefined) {
    const hashes = value.photoHashes;
    if (!Array.isArray(hashes) || !hashes.every(isNonEmptyString)) return null;
    report.photoHashes = hashes;
  }
  return report;
}

export function parseListWatchRequest(body: unknown): ListWatchRequest | null {
  if (!isObject(body)) return null;
  const ownerChainKey = optionalString(body.ownerChainKey);
  if (
    !isNonEmptyString(body.serial) ||
    !isNonEmptyString(body.brand) ||
    !isNonEmptyString(body.model) ||
    !isNonEmptyString(body.category) ||
    !isNonEmptyString(body.ownerId) ||
    ownerChainKey === null
  ) {
    return null;
  }
  return {
    serial: body.serial.trim(),
    brand: body.brand.trim(),
    model: body.model.trim(),
    category: body.category.trim(),
    ownerId: body.ownerId.trim(),
    ownerChainKey,
  };
}

export function parseWatchOwnerRequest(body: unknown): WatchOwnerRequest | null {
  if (!isObject(body) || !isNonEmptyString(body.ownerId)) return null;
  return { ownerId: body.ownerId.trim() };
}

export function parseOpenEscrowRequest(body: unknown): OpenEscrowRequest | null {
  if (!isObject(body)) return null;
  const { buyer, seller } = body;
  const amount = parseMoney(body.amount);
  if (
    !isNonEmptyString(body.watchId) ||
    !isObject(buyer) ||
    !isNonEmptyString(buyer.partyId) ||
    !isNonEmptyString(buyer.chainKey) ||
    !isObject(seller) ||
    !isNonEmptyString(seller.partyId) ||
    !amount ||
    !isNonEmptyString(body.deadline)
  ) {
    return null;
  }
  return {
    watchId: body.watchId.trim(),
    buyer: { partyId: buyer.partyId.trim(), chainKey: buyer.chainKey.trim() },
    seller: { partyId: seller.partyId.trim() },
    amount,
    deadline: body.deadline.trim(),
  };
}

export function parseListEscrowsQuery(query: unknown): ListEscrowsQuery | null {
  if (!isObject(query)) return {};
  const parsed: ListEscrowsQuery = {};
  if (query.state !== undefined) {
    if (!isEscrowState(query.state)) return null;
    const state: EscrowState = query.state;
    parsed.state = state;
  }
  if (query.watchId !== undefined) {
    if (!isNonEmptyString(query.watchId)) return null;
    parsed.watchId = query.watchId;
  }
  return parsed;
}

export function parseConfirmShipmentRequest(body: unknown): ConfirmShipmentRequest | null {
  if (!isObject(body) || !isNonEmptyString(body.sellerId)) return null;
  return { sellerId: body.sellerId.trim() };
}

export function parseSubmitEvaluationRequest(body: unknown): SubmitEvaluationRequest | null {
  if (!isObject(body) || !isNonEmptyString(body.evaluationId)) return null;
  return { evaluationId: body.evaluationId.trim() };
}

export function parseCompleteEvaluationRequest(body: unknown): CompleteEvaluationRequest | null {
  if (!isObject(body)) return null;
  const { result } = body;
  if (result !== "CERTIFIED" && result !== "REJECTED") return null;
  if (!isNonEmptyString(body.certificateRef)) return null;

  const signature = optionalString(body.signature);
  if (signature === null) return null;

  const parsed: CompleteEvaluationRequest = {
    result,
    certificateRef: body.certificateRef.trim(),
    signature,
  };
  if (body.report !== undefined) {
    const report = parseReport(body.report);
    if (!report) return null;
    parsed.report = report;
  }
  return parsed;
}

export function parseDisputeEvaluationRequest(body: unknown): DisputeEvaluationRequest | null {
  if (!isObject(body) || !isNonEmptyString(body.openedBy) || !isNonEmptyString(body.reason)) {
    return null;
  }
  return { openedBy: body.openedBy.trim(), reason: body.reason.trim() };
}

export function parseResolveReviewRequest(body: unknown): ResolveReviewRequest | null {
  if (!isObject(body)) return null;
  const { action } = body;
  if (action !== "RETRY" && action !== "REFUND_BUYER") return null;
  if (!isNonEmptyString(body.actor)) return null;
  const buyerChainKey = optionalString(body.buyerChainKey);
  if (buyerChainKey === null) return null;
  const parsed: ResolveReviewRequest = { action, actor: body.actor.trim() };
  if (buyerChainKey) parsed.buyerChainKey = buyerChainKey;
  return parsed;
}

export function parseMintOrTransferRequest(body: unknown): MintOrTransferRequest | null {
  if (!isObject(body)) return null;
  if (
    !isNonEmptyString(body.watchId) ||
    !isNonEmptyString(body.newOwnerKey) ||
    !isNonEmptyString(body.contractId)
  ) {
    return null;
  }
  return {
    watchId: body.watchId.trim(),
    newOwnerKey: body.newOwnerKey.trim(),
    contractId: body.contractId.trim(),
  };
}
