/**
 * Decimal-safe money. `amount` is a non-negative decimal string with at most
 * two fraction digits ("100.00"); arithmetic happens on integer cents.
 */
export interface Money {
  amount: string;
  currency: string;
}

export type WatchState =
  | "LISTED"
  | "IN_ESCROW"
  | "EVALUATED"
  | "TOKENIZED"
  | "SOLD"
  | "DELISTED";

export interface Watch {
  watchId: string;
  serial: string;           // unique, never changes after listing
  brand: string;
  model: string;
  category: string;         // evaluator eligibility key (e.g. "dress", "complication")
  ownerId: string;
  ownerChainKey?: string;
  state: WatchState;
  activeContractId?: string;
  version: number;
  listedAt: string;
  updatedAt: string;
}

export type EscrowState =
  | "FUNDED"
  | "AWAITING_EVALUATION"
  | "APPROVED"
  | "REJECTED"
  | "RELEASED"
  | "REFUNDED"
  | "EXPIRED";

export interface BuyerRef {
  partyId: string;
  chainKey: string;         // receives the token on release
}

export interface SellerRef {
  partyId: string;
}

export type ReviewReason = "CHAIN_REJECTED" | "EVALUATION_DISPUTED";

export interface ReviewFlag {
  reason: ReviewReason;
  message: string;
  flaggedAt: string;
}

export interface TokenizationProgress {
  attempts: number;
  retryEligible: boolean;
  lastErrorCode?: string;
  lastErrorMessage?: string;
  lastAttemptAt?: string;
  tokenRecordId?: string;
}

export type ClaimKind = "OPEN" | "RESOLVE" | "EXPIRE" | "REVIEW_REFUND";

export interface ContractClaim {
  kind: ClaimKind;
  claimedAt: string;
  leaseExpiresAt: string;
}

export interface EscrowContract {
  contractId: string;
  watchId: string;
  buyer: BuyerRef;
  seller: SellerRef;
  amount: Money;
  state: EscrowState;
  holdRef: string;
  deadline: string;
  createdAt: string;
  updatedAt: string;
  version: number;
  evaluationId?: string;
  evaluatorId?: string;
  evaluatorTier?: string;
  shipmentConfirmedAt?: string;
  tokenization?: TokenizationProgress;
  review?: ReviewFlag;
  claim?: ContractClaim;
  commissionId?: string;
  resolvedAt?: string;
}

export type EvaluationResult = "PENDING" | "CERTIFIED" | "REJECTED";
export type EvaluationOutcome = Exclude<EvaluationResult, "PENDING">;

export type WatchCondition = "excellent" | "good" | "fair" | "poor";
export type WatchAuthenticity = "authentic" | "replica" | "unknown";

export interface EvaluationReport {
  condition: WatchCondition;
  authenticity: WatchAuthenticity;
  estimatedValue?: Money;
  notes?: string;
  photoHashes?: string[];
}

export interface EvaluationDispute {
  openedBy: string;
  reason: string;
  openedAt: string;
}

export interface Evaluation {
  evaluationId: string;
  watchId: string;
  contractId: string;
  evaluatorId: string;
  evaluatorTier: string;
  evaluatorPublicKey?: string;
  result: EvaluationResult;
  certificateRef?: string;
  certificateHash?: string;
  signature?: string;
  report?: EvaluationReport;
  requestedAt: string;
  completedAt?: string;
  dispute?: EvaluationDispute;
  version: number;
}

export type TokenRecordKind = "MINT" | "TRANSFER";

export interface TokenRecord {
  tokenRecordId: string;
  watchId: string;
  sequence: number;         // 1-based, the highest sequence is the active record
  kind: TokenRecordKind;
  ownerKey: string;
  previousOwnerKey?: string;
  chainTxRef: string;
  operationRef: string;
  contractId: string;
  mintedAt: string;
}

export type CommissionBeneficiary = "PLATFORM" | "EVALUATOR";

export interface CommissionLine {
  beneficiary: CommissionBeneficiary;
  beneficiaryId: string;
  amount: Money;
}

export interface Commission {
  commissionId: string;
  contractId: string;
  rate: string;
  evaluatorTier: string;
  grossAmount: Money;
  commissionAmount: Money;
  sellerAmount: Money;
  lines: CommissionLine[];
  settlementRef: string;
  createdAt: string;
}

export type EscrowAuditEventType =
  | "OPENED"
  | "SHIPMENT_CONFIRMED"
  | "EVALUATION_REQUESTED"
  | "EVALUATION_SUBMITTED"
  | "TOKENIZATION_FAILED"
  | "REVIEW_FLAGGED"
  | "REVIEW_CLEARED"
  | "RELEASED"
  | "REFUNDED"
  | "EXPIRED";

export interface EscrowAuditEvent {
  eventId: string;
  contractId: string;
  type: EscrowAuditEventType;
  actor?: string;
  occurredAt: string;
  details?: Record<string, unknown>;
}
