import type {
  BuyerRef,
  Commission,
  EscrowAuditEvent,
  EscrowContract,
  EscrowState,
  Evaluation,
  EvaluationOutcome,
  EvaluationReport,
  Money,
  SellerRef,
  TokenRecord,
  Watch,
} from "./ledger.js";

export interface ErrorResponse {
  error: string;
  message?: string;
}

export interface ListWatchRequest {
  serial: string;
  brand: string;
  model: string;
  category: string;
  ownerId: string;
  ownerChainKey?: string;
}

export interface WatchOwnerRequest {
  ownerId: string;
}

export interface WatchResponse {
  watch: Watch;
}

export interface GetTokenHistoryResponse {
  watchId: string;
  records: TokenRecord[];
}

export interface OpenEscrowRequest {
  watchId: string;
  buyer: BuyerRef;
  seller: SellerRef;
  amount: Money;
  deadline: string;
}

export interface EscrowResponse {
  contract: EscrowContract;
}

export interface ListEscrowsQuery {
  state?: EscrowState;
  watchId?: string;
}

export interface ListEscrowsResponse {
  contracts: EscrowContract[];
}

export interface GetEscrowAuditResponse {
  contractId: string;
  events: EscrowAuditEvent[];
}

export interface ConfirmShipmentRequest {
  sellerId: string;
}

export interface RequestEvaluationResponse {
  contract: EscrowContract;
  evaluation: Evaluation;
}

export interface SubmitEvaluationRequest {
  evaluationId: string;
}

export interface CompleteEvaluationRequest {
  result: EvaluationOutcome;
  certificateRef: string;
  report?: EvaluationReport;
  signature?: string;
}

export interface CompleteEvaluationResponse {
  evaluation: Evaluation;
  contract: EscrowContract;
  replayed: boolean;
}

export interface DisputeEvaluationRequest {
  openedBy: string;
  reason: string;
}

export interface DisputeEvaluationResponse {
  evaluation: Evaluation;
  contract: EscrowContract;
}

export interface GetEvaluationResponse {
  evaluation: Evaluation;
}

export interface ResolveEscrowResponse {
  contract: EscrowContract;
  tokenRecord?: TokenRecord;
  commission?: Commission;
}

export type ReviewAction = "RETRY" | "REFUND_BUYER";

export interface ResolveReviewRequest {
  action: ReviewAction;
  actor: string;
  buyerChainKey?: string;
}

export interface SweepSkip {
  contractId: string;
  code: string;
}

export interface SweepExpiredResponse {
  expired: string[];
  skipped: SweepSkip[];
  releasedWatches?: string[];   // abandoned watch claims put back on the market
}

export interface MintOrTransferRequest {
  watchId: string;
  newOwnerKey: string;
  contractId: string;
}

export interface MintOrTransferResponse {
  record: TokenRecord;
}

export type TokenVerificationMismatch = "OPERATION_NOT_FOUND" | "TX_REF_MISMATCH" | "OWNER_MISMATCH";

/** The active token record checked against what the ledger recorded for its operation. */
export interface TokenVerification {
  watchId: string;
  tokenRecordId: string;
  operationRef: string;
  chainTxRef: string;
  ledgerTxRef?: string;
  verified: boolean;
  mismatch?: TokenVerificationMismatch;
  checkedAt: string;
}

export interface VerifyTokenResponse {
  verification: TokenVerification;
}

export type ReconciliationFindingCode =
  | "RELEASED_WITHOUT_TOKEN"
  | "RELEASED_WITHOUT_COMMISSION"
  | "TOKEN_OWNER_MISMATCH"
  | "WATCH_OWNER_MISMATCH";

export interface ReconciliationFinding {
  code: ReconciliationFindingCode;
  watchId: string;
  contractId?: string;
  message: string;
}

export interface ReconciliationReport {
  checkedContracts: number;
  findings: ReconciliationFinding[];
  createdAt: string;
}
