import type { TokenRecordKind } from "./ledger.js";

export interface TokenOperationPayload {
  kind: TokenRecordKind;
  watchId: string;
  serialHash: string;       // sha256 of the watch serial, never the raw serial
  toKey: string;
  fromKey?: string;
}

export interface SubmitTokenOperationRequest {
  operationRef: string;
  payload: TokenOperationPayload;
}

export interface SubmitTokenOperationResponse {
  operationRef: string;
  txRef: string;
  simulated: boolean;
  replayed: boolean;
}

export interface TokenOperationRecord {
  operationRef: string;
  payload: TokenOperationPayload;
  payloadHash: string;
  txRef: string;
  simulated: boolean;
  submittedAt: string;
}

export interface GetTokenOperationResponse {
  operation: TokenOperationRecord;
}

export interface GetTokenTimelineResponse {
  watchId: string;
  operations: TokenOperationRecord[];
}
