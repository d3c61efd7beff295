import Fastify from "fastify";
import type { FastifyReply, FastifyRequest } from "fastify";
import {
  canonicalJson,
  isServiceCallAuthorized,
  SERVICE_AUTH_HEADER,
  sha256Hex,
  type CompleteEvaluationResponse,
  type DisputeEvaluationResponse,
  type EscrowResponse,
  type GetEscrowAuditResponse,
  type GetEvaluationResponse,
  type GetTokenHistoryResponse,
  type ListEscrowsResponse,
  type MintOrTransferResponse,
  type RequestEvaluationResponse,
  type ResolveEscrowResponse,
  type VerifyTokenResponse,
  type WatchResponse,
} from "@chrono/shared";
import {
  createLifecycleEngine,
  loadLifecycleConfig,
  SqliteLedgerStore,
  type ChainClient,
  type Clock,
  type EvaluatorDirectory,
  type LedgerStore,
  type LifecycleConfig,
  type PaymentGateway,
  type Sleep,
} from "@chrono/lifecycle";
import { HttpEvaluatorDirectory } from "./clients/evaluator-directory.js";
import { trimBaseUrl } from "./clients/http.js";
import { HttpLedgerClient } from "./clients/ledger-client.js";
import { HttpPaymentGateway } from "./clients/payment-gateway.js";
import { sendInvalidRequest, sendLifecycleError } from "./errors.js";
import {
  parseCompleteEvaluationRequest,
  parseConfirmShipmentRequest,
  parseDisputeEvaluationRequest,
  parseListEscrowsQuery,
  parseListWatchRequest,
  parseMintOrTransferRequest,
  parseOpenEscrowRequest,
  parseResolveReviewRequest,
  parseSubmitEvaluationRequest,
  parseWatchOwnerRequest,
} from "./requests.js";
import {
  SqliteIdempotencyStore,
  type IdempotencyStore,
  type IdempotentAction,
} from "./storage/idempotency-store.js";

const DEFAULT_ESCROW_DB_PATH = "data/escrow-service.db";
const DEFAULT_EVALUATOR_DIRECTORY_URL = "http://127.0.0.1:4201";
const DEFAULT_PAYMENT_GATEWAY_URL = "http://127.0.0.1:4202";
const DEFAULT_LEDGER_ADAPTER_URL = "http://127.0.0.1:4103";
const IDEMPOTENCY_HEADER = "idempotency-key";

interface ContractParams {
  contractId: string;
}

interface WatchParams {
  watchId: string;
}

interface EvaluationParams {
  evaluationId: string;
}

export interface BuildServerOptions {
  dbPath?: string;
  ledgerStore?: LedgerStore;
  idempotencyStore?: IdempotencyStore;
  evaluatorDirectory?: EvaluatorDirectory;
  evaluatorDirectoryUrl?: string;
  paymentGateway?: PaymentGateway;
  paymentGatewayUrl?: string;
  chainClient?: ChainClient;
  ledgerAdapterUrl?: string;
  serviceAuthToken?: string;
  config?: Partial<LifecycleConfig>;
  clock?: Clock;
  sleep?: Sleep;
  logger?: boolean;
}

function readIdempotencyKey(req: FastifyRequest): string | null {
  const raw = req.headers[IDEMPOTENCY_HEADER];
  const value = Array.isArray(raw) ? raw[0] : raw;
  if (typeof value !== "string" || value.trim().length === 0) return null;
  return value.trim();
}

function sendMissingIdempotencyKey(reply: FastifyReply): FastifyReply {
  return reply.code(400).send({
    error: "missing_idempotency_key",
    message: `Set '${IDEMPOTENCY_HEADER}' header`,
  });
}

function replayIdempotentIfExists(
  reply: FastifyReply,
  store: IdempotencyStore,
  action: IdempotentAction,
  idempotencyKey: string,
  requestHash: string,
): boolean {
  const existing = store.getIdempotencyRecord(action, idempotencyKey);
  if (!existing) return false;

  if (existing.requestHash !== requestHash) {
    reply.code(409).send({
      error: "idempotency_key_reuse_conflict",
      message: "Idempotency key already used with different payload",
    });
    return true;
  }

  reply.header("idempotent-replay", "true");
  reply.code(existing.responseStatus).send(existing.responseBody);
  return true;
}

function saveIdempotentResponse(
  store: IdempotencyStore,
  action: IdempotentAction,
  idempotencyKey: string,
  requestHash: string,
  responseStatus: number,
  responseBody: unknown,
): void {
  store.putIdempotencyRecord({
    action,
    idempotencyKey,
    requestHash,
    responseStatus,
    responseBody,
    createdAt: new Date().toISOString(),
  });
}

export async function buildServer(options: BuildServerOptions = {}) {
  const app = Fastify({ logger: options.logger ?? true });
  const dbPath = options.dbPath || process.env.ESCROW_DB_PATH || DEFAULT_ESCROW_DB_PATH;

  const ledgerStore = options.ledgerStore || new SqliteLedgerStore(dbPath);
  const ownLedgerStore = !options.ledgerStore;
  const idempotencyStore = options.idempotencyStore || new SqliteIdempotencyStore(dbPath);
  const ownIdempotencyStore = !options.idempotencyStore;

  const config: LifecycleConfig = { ...loadLifecycleConfig(process.env), ...options.config };
  const serviceAuthToken = options.serviceAuthToken ?? process.env.SERVICE_AUTH_TOKEN;

  const evaluatorDirectory =
    options.evaluatorDirectory ||
    new HttpEvaluatorDirectory(
      trimBaseUrl(
        options.evaluatorDirectoryUrl ||
          process.env.EVALUATOR_DIRECTORY_URL ||
          DEFAULT_EVALUATOR_DIRECTORY_URL,
      ),
    );
  const paymentGateway =
    options.paymentGateway ||
    new HttpPaymentGateway(
      trimBaseUrl(
        options.paymentGatewayUrl || process.env.PAYMENT_GATEWAY_URL || DEFAULT_PAYMENT_GATEWAY_URL,
      ),
      config.paymentCallTimeoutMs,
    );
  const chainClient =
    options.chainClient ||
    new HttpLedgerClient(
      trimBaseUrl(
        options.ledgerAdapterUrl || process.env.LEDGER_ADAPTER_URL || DEFAULT_LEDGER_ADAPTER_URL,
      ),
      serviceAuthToken,
      config.chainCallTimeoutMs,
    );

  const engine = createLifecycleEngine({
    store: ledgerStore,
    config,
    logger: app.log,
    clock: options.clock,
    sleep: options.sleep,
    evaluators: evaluatorDirectory,
    chain: chainClient,
    payments: paymentGateway,
  });

  function requireServiceAuth(req: FastifyRequest, reply: FastifyReply): boolean {
    if (isServiceCallAuthorized(req.headers[SERVICE_AUTH_HEADER], serviceAuthToken)) {
      return true;
    }
    reply.code(401).send({
      error: "unauthorized_service",
      message: `Missing or invalid '${SERVICE_AUTH_HEADER}' header`,
    });
    return false;
  }

  app.get("/health", async () => ({ ok: true, service: "escrow-service" }));

  // Watches

  app.post("/watches", async (req, reply) => {
    const parsed = parseListWatchRequest(req.body);
    if (!parsed) {
      return sendInvalidRequest(reply, "Expected serial, brand, model, category, ownerId");
    }
    const result = engine.watches.listWatch(parsed);
    if (!result.ok) return sendLifecycleError(reply, result.error);
    const response: WatchResponse = { watch: result.value };
    return reply.code(201).send(response);
  });

  app.get("/watches", async () => ({ watches: engine.watches.listWatches() }));

  app.get<{ Params: WatchParams }>("/watches/:watchId", async (req, reply) => {
    const result = engine.watches.getWatch(req.params.watchId);
    if (!result.ok) return sendLifecycleError(reply, result.error);
    const response: WatchResponse = { watch: result.value };
    return response;
  });

  app.post<{ Params: WatchParams }>("/watches/:watchId/delist", async (req, reply) => {
    const parsed = parseWatchOwnerRequest(req.body);
    if (!parsed) return sendInvalidRequest(reply, "Expected ownerId");
    const result = engine.watches.delistWatch(req.params.watchId, parsed.ownerId);
    if (!result.ok) return sendLifecycleError(reply, result.error);
    const response: WatchResponse = { watch: result.value };
    return response;
  });

  app.post<{ Params: WatchParams }>("/watches/:watchId/relist", async (req, reply) => {
    const parsed = parseWatchOwnerRequest(req.body);
    if (!parsed) return sendInvalidRequest(reply, "Expected ownerId");
    const result = engine.watches.relistWatch(req.params.watchId, parsed.ownerId);
    if (!result.ok) return sendLifecycleError(reply, result.error);
    const response: WatchResponse = { watch: result.value };
    return response;
  });

  app.get<{ Params: WatchParams }>("/watches/:watchId/tokens", async (req, reply) => {
    const result = engine.tokenization.getTokenHistory(req.params.watchId);
    if (!result.ok) return sendLifecycleError(reply, result.error);
    const response: GetTokenHistoryResponse = { watchId: req.params.watchId, records: result.value };
    return response;
  });

  app.get<{ Params: WatchParams }>("/watches/:watchId/tokens/verify", async (req, reply) => {
    const result = await engine.tokenization.verifyToken(req.params.watchId);
    if (!result.ok) return sendLifecycleError(reply, result.error);
    const response: VerifyTokenResponse = { verification: result.value };
    return response;
  });

  // Escrows

  app.post("/escrows/open", async (req, reply) => {
    const parsed = parseOpenEscrowRequest(req.body);
    if (!parsed) {
      return sendInvalidRequest(reply, "Expected watchId, buyer, seller, amount, deadline");
    }
    const idempotencyKey = readIdempotencyKey(req);
    if (!idempotencyKey) return sendMissingIdempotencyKey(reply);

    const requestHash = sha256Hex(canonicalJson(parsed));
    if (replayIdempotentIfExists(reply, idempotencyStore, "OPEN_ESCROW", idempotencyKey, requestHash)) {
      return;
    }

    const result = await engine.escrow.openEscrow(parsed);
    if (!result.ok) return sendLifecycleError(reply, result.error);

    const response: EscrowResponse = { contract: result.value };
    saveIdempotentResponse(idempotencyStore, "OPEN_ESCROW", idempotencyKey, requestHash, 201, response);
    return reply.code(201).send(response);
  });

  app.post("/escrows/sweep", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    return engine.escrow.sweepExpired();
  });

  app.get("/escrows", async (req, reply) => {
    const filter = parseListEscrowsQuery(req.query);
    if (!filter) return sendInvalidRequest(reply, "Unknown state or empty watchId filter");
    const response: ListEscrowsResponse = { contracts: engine.escrow.listEscrows(filter) };
    return response;
  });

  app.get<{ Params: ContractParams }>("/escrows/:contractId", async (req, reply) => {
    const result = engine.escrow.getEscrow(req.params.contractId);
    if (!result.ok) return sendLifecycleError(reply, result.error);
    const response: EscrowResponse = { contract: result.value };
    return response;
  });

  app.get<{ Params: ContractParams }>("/escrows/:contractId/audit", async (req, reply) => {
    const result = engine.escrow.getAuditTrail(req.params.contractId);
    if (!result.ok) return sendLifecycleError(reply, result.error);
    const response: GetEscrowAuditResponse = {
      contractId: req.params.contractId,
      events: result.value,
    };
    return response;
  });

  app.post<{ Params: ContractParams }>("/escrows/:contractId/confirm-shipment", async (req, reply) => {
    const parsed = parseConfirmShipmentRequest(req.body);
    if (!parsed) return sendInvalidRequest(reply, "Expected sellerId");
    const result = engine.escrow.confirmShipment(req.params.contractId, parsed.sellerId);
    if (!result.ok) return sendLifecycleError(reply, result.error);
    const response: EscrowResponse = { contract: result.value };
    return response;
  });

  app.post<{ Params: ContractParams }>("/escrows/:contractId/request-evaluation", async (req, reply) => {
    const contract = engine.escrow.getEscrow(req.params.contractId);
    if (!contract.ok) return sendLifecycleError(reply, contract.error);

    const result = await engine.evaluations.requestEvaluation(
      contract.value.watchId,
      contract.value.contractId,
    );
    if (!result.ok) return sendLifecycleError(reply, result.error);
    const response: RequestEvaluationResponse = result.value;
    return reply.code(201).send(response);
  });

  app.post<{ Params: ContractParams }>("/escrows/:contractId/submit-evaluation", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    const parsed = parseSubmitEvaluationRequest(req.body);
    if (!parsed) return sendInvalidRequest(reply, "Expected evaluationId");

    const evaluation = engine.evaluations.getEvaluation(parsed.evaluationId);
    if (!evaluation.ok) return sendLifecycleError(reply, evaluation.error);
    const result = engine.escrow.submitEvaluation(req.params.contractId, evaluation.value);
    if (!result.ok) return sendLifecycleError(reply, result.error);
    const response: EscrowResponse = { contract: result.value };
    return response;
  });

  app.post<{ Params: ContractParams }>("/escrows/:contractId/resolve", async (req, reply) => {
    const idempotencyKey = readIdempotencyKey(req);
    if (!idempotencyKey) return sendMissingIdempotencyKey(reply);

    const requestHash = sha256Hex(canonicalJson({ contractId: req.params.contractId }));
    if (replayIdempotentIfExists(reply, idempotencyStore, "RESOLVE_ESCROW", idempotencyKey, requestHash)) {
      return;
    }

    const result = await engine.escrow.resolve(req.params.contractId);
    if (!result.ok) return sendLifecycleError(reply, result.error);

    const response: ResolveEscrowResponse = result.value;
    saveIdempotentResponse(idempotencyStore, "RESOLVE_ESCROW", idempotencyKey, requestHash, 200, response);
    return response;
  });

  app.post<{ Params: ContractParams }>("/escrows/:contractId/expire", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    const result = await engine.escrow.expire(req.params.contractId, "api");
    if (!result.ok) return sendLifecycleError(reply, result.error);
    const response: EscrowResponse = { contract: result.value };
    return response;
  });

  app.post<{ Params: ContractParams }>("/escrows/:contractId/review", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    const parsed = parseResolveReviewRequest(req.body);
    if (!parsed) {
      return sendInvalidRequest(reply, "Expected action (RETRY | REFUND_BUYER) and actor");
    }
    const idempotencyKey = readIdempotencyKey(req);
    if (!idempotencyKey) return sendMissingIdempotencyKey(reply);

    const requestHash = sha256Hex(canonicalJson({ contractId: req.params.contractId, ...parsed }));
    if (replayIdempotentIfExists(reply, idempotencyStore, "RESOLVE_REVIEW", idempotencyKey, requestHash)) {
      return;
    }

    const result = await engine.escrow.resolveReview(
      req.params.contractId,
      parsed.action,
      parsed.actor,
      parsed.buyerChainKey,
    );
    if (!result.ok) return sendLifecycleError(reply, result.error);

    const response: ResolveEscrowResponse = result.value;
    saveIdempotentResponse(idempotencyStore, "RESOLVE_REVIEW", idempotencyKey, requestHash, 200, response);
    return response;
  });

  // Evaluations

  app.get<{ Params: EvaluationParams }>("/evaluations/:evaluationId", async (req, reply) => {
    const result = engine.evaluations.getEvaluation(req.params.evaluationId);
    if (!result.ok) return sendLifecycleError(reply, result.error);
    const response: GetEvaluationResponse = { evaluation: result.value };
    return response;
  });

  app.post<{ Params: EvaluationParams }>("/evaluations/:evaluationId/complete", async (req, reply) => {
    const parsed = parseCompleteEvaluationRequest(req.body);
    if (!parsed) {
      return sendInvalidRequest(reply, "Expected result (CERTIFIED | REJECTED) and certificateRef");
    }
    const result = await engine.evaluations.completeEvaluation({
      evaluationId: req.params.evaluationId,
      ...parsed,
    });
    if (!result.ok) return sendLifecycleError(reply, result.error);
    const response: CompleteEvaluationResponse = result.value;
    return response;
  });

  app.post<{ Params: EvaluationParams }>("/evaluations/:evaluationId/dispute", async (req, reply) => {
    const parsed = parseDisputeEvaluationRequest(req.body);
    if (!parsed) return sendInvalidRequest(reply, "Expected openedBy and reason");
    const result = engine.evaluations.disputeEvaluation(
      req.params.evaluationId,
      parsed.openedBy,
      parsed.reason,
    );
    if (!result.ok) return sendLifecycleError(reply, result.error);
    const response: DisputeEvaluationResponse = result.value;
    return reply.code(201).send(response);
  });

  // Tokens and reconciliation

  app.post("/tokens/mint-or-transfer", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    const parsed = parseMintOrTransferRequest(req.body);
    if (!parsed) return sendInvalidRequest(reply, "Expected watchId, newOwnerKey, contractId");

    const result = await engine.tokenization.mintOrTransfer(
      parsed.watchId,
      parsed.newOwnerKey,
      parsed.contractId,
    );
    if (!result.ok) return sendLifecycleError(reply, result.error);
    const response: MintOrTransferResponse = { record: result.value };
    return reply.code(201).send(response);
  });

  app.get("/reconciliation", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    return engine.settlement.reconcile();
  });

  app.addHook("onReady", async () => {
    engine.sweeper.start();
  });

  app.addHook("onClose", async () => {
    await engine.sweeper.stop();
    if (ownIdempotencyStore) idempotencyStore.close();
    if (ownLedgerStore) ledgerStore.close();
  });

  return app;
}
