import Fastify from "fastify";
import type { FastifyReply, FastifyRequest } from "fastify";
import { isAddress } from "ethers";
import {
  canonicalJson,
  isServiceCallAuthorized,
  isSha256Hex,
  SERVICE_AUTH_HEADER,
  sha256Hex,
  type GetTokenOperationResponse,
  type GetTokenTimelineResponse,
  type SubmitTokenOperationRequest,
  type SubmitTokenOperationResponse,
  type TokenOperationPayload,
  type TokenOperationRecord,
} from "@chrono/shared";
import {
  buildChainWriterFromEnv,
  classifyChainError,
  type ChainStatusResult,
  type ChainWriter,
} from "./chain.js";

export interface BuildServerOptions {
  chainWriter?: ChainWriter | null;
  serviceAuthToken?: string;
  logger?: boolean;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function parsePayload(value: unknown): TokenOperationPayload | null {
  if (!isObject(value)) return null;
  if (value.kind !== "MINT" && value.kind !== "TRANSFER") return null;
  if (!isNonEmptyString(value.watchId) || !isNonEmptyString(value.toKey)) return null;
  if (typeof value.serialHash !== "string" || !isSha256Hex(value.serialHash)) return null;

  const payload: TokenOperationPayload = {
    kind: value.kind,
    watchId: value.watchId,
    serialHash: value.serialHash,
    toKey: value.toKey,
  };
  if (value.fromKey !== undefined) {
    if (!isNonEmptyString(value.fromKey)) return null;
    payload.fromKey = value.fromKey;
  }
  if (payload.kind === "TRANSFER" && !payload.fromKey) return null;
  return payload;
}

function parseSubmitRequest(body: unknown): SubmitTokenOperationRequest | null {
  if (!isObject(body) || !isNonEmptyString(body.operationRef)) return null;
  const payload = parsePayload(body.payload);
  if (!payload) return null;
  return { operationRef: body.operationRef.trim(), payload };
}

function simulatedTxRef(operationRef: string, payloadHash: string): string {
  return `sim-${sha256Hex(`${operationRef}:${payloadHash}`).slice(0, 32)}`;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const app = Fastify({ logger: options.logger ?? true });
  const operations = new Map<string, TokenOperationRecord>();
  const timelines = new Map<string, TokenOperationRecord[]>();
  const pending = new Map<string, Promise<TokenOperationRecord>>();
  const chainWriter =
    options.chainWriter === undefined ? buildChainWriterFromEnv() : options.chainWriter;
  const serviceAuthToken = options.serviceAuthToken ?? process.env.SERVICE_AUTH_TOKEN;

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

  async function execute(
    operationRef: string,
    payload: TokenOperationPayload,
    payloadHash: string,
  ): Promise<TokenOperationRecord> {
    let txRef: string;
    if (chainWriter) {
      txRef = (await chainWriter.submit(operationRef, payload)).txRef;
    } else {
      txRef = simulatedTxRef(operationRef, payloadHash);
    }

    const record: TokenOperationRecord = {
      operationRef,
      payload,
      payloadHash,
      txRef,
      simulated: !chainWriter,
      submittedAt: new Date().toISOString(),
    };
    operations.set(operationRef, record);
    const timeline = timelines.get(payload.watchId) || [];
    timeline.push(record);
    timelines.set(payload.watchId, timeline);
    app.log.info(
      { operationRef, watchId: payload.watchId, kind: payload.kind, txRef, simulated: record.simulated },
      "token operation submitted",
    );
    return record;
  }

  app.get("/health", async () => ({ ok: true, service: "ledger-adapter" }));

  app.get("/chain/status", async () => {
    if (!chainWriter) {
      const status: ChainStatusResult = { configured: false };
      return status;
    }
    return chainWriter.status();
  });

  app.post("/tokens/submit", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;

    const parsed = parseSubmitRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected operationRef and a MINT or TRANSFER payload",
      });
    }
    const { operationRef, payload } = parsed;
    if (!isAddress(payload.toKey) || (payload.fromKey !== undefined && !isAddress(payload.fromKey))) {
      return reply.code(422).send({
        error: "chain_rejected",
        message: "Owner keys must be EVM addresses",
      });
    }

    const payloadHash = sha256Hex(canonicalJson(payload));
    const existing = operations.get(operationRef);
    if (existing) {
      if (existing.payloadHash !== payloadHash) {
        return reply.code(409).send({
          error: "operation_ref_conflict",
          message: "Operation ref already submitted with a different payload",
        });
      }
      const response: SubmitTokenOperationResponse = {
        operationRef,
        txRef: existing.txRef,
        simulated: existing.simulated,
        replayed: true,
      };
      return response;
    }

    // Concurrent submissions of one operation share a single chain write.
    let inFlight = pending.get(operationRef);
    if (!inFlight) {
      inFlight = execute(operationRef, payload, payloadHash).finally(() => {
        pending.delete(operationRef);
      });
      pending.set(operationRef, inFlight);
    }

    try {
      const record = await inFlight;
      if (record.payloadHash !== payloadHash) {
        return reply.code(409).send({
          error: "operation_ref_conflict",
          message: "Operation ref already submitted with a different payload",
        });
      }
      const response: SubmitTokenOperationResponse = {
        operationRef,
        txRef: record.txRef,
        simulated: record.simulated,
        replayed: false,
      };
      return reply.code(201).send(response);
    } catch (error) {
      const failure = classifyChainError(error);
      req.log.warn({ operationRef, kind: failure.kind, err: failure }, "token operation failed");
      if (failure.kind === "unavailable") {
        return reply.code(503).send({ error: "chain_unavailable", message: failure.message });
      }
      return reply.code(422).send({ error: "chain_rejected", message: failure.message });
    }
  });

  app.get<{ Params: { operationRef: string } }>(
    "/tokens/operations/:operationRef",
    async (req, reply) => {
      const operation = operations.get(req.params.operationRef);
      if (!operation) {
        return reply.code(404).send({ error: "operation_not_found" });
      }
      const response: GetTokenOperationResponse = { operation };
      return response;
    },
  );

  app.get<{ Params: { watchId: string } }>("/tokens/:watchId/timeline", async (req) => {
    const response: GetTokenTimelineResponse = {
      watchId: req.params.watchId,
      operations: timelines.get(req.params.watchId) || [],
    };
    return response;
  });

  return app;
}
