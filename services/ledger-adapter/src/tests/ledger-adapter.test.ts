import assert from "node:assert/strict";
import test from "node:test";
import { makeError } from "ethers";
import { canonicalJson, sha256Hex, type TokenOperationPayload } from "@chrono/shared";
import type { ChainStatusResult, ChainSubmitResult, ChainWriter } from "../chain.js";
import { buildServer } from "../server.js";

const OWNER = `0x${"a".repeat(40)}`;
const NEXT_OWNER = `0x${"b".repeat(40)}`;
const SERIAL_HASH = sha256Hex("SN-3001");

function mintPayload(watchId = "WCH-1"): TokenOperationPayload {
  return { kind: "MINT", watchId, serialHash: SERIAL_HASH, toKey: OWNER };
}

class RecordingWriter implements ChainWriter {
  readonly calls: string[] = [];
  failWith: unknown = null;

  async submit(operationRef: string): Promise<ChainSubmitResult> {
    this.calls.push(operationRef);
    if (this.failWith) throw this.failWith;
    return { txRef: `0xtx${this.calls.length}` };
  }

  async status(): Promise<ChainStatusResult> {
    return { configured: true, latestBlock: 7 };
  }
}

test("simulates submissions when no registry is configured", async () => {
  const app = await buildServer({ chainWriter: null, logger: false });
  try {
    const payload = mintPayload();
    const res = await app.inject({
      method: "POST",
      url: "/tokens/submit",
      payload: { operationRef: "op-1", payload },
    });
    assert.equal(res.statusCode, 201);
    const expectedTxRef = `sim-${sha256Hex(`op-1:${sha256Hex(canonicalJson(payload))}`).slice(0, 32)}`;
    assert.deepEqual(res.json(), {
      operationRef: "op-1",
      txRef: expectedTxRef,
      simulated: true,
      replayed: false,
    });

    const status = await app.inject({ method: "GET", url: "/chain/status" });
    assert.deepEqual(status.json(), { configured: false });
  } finally {
    await app.close();
  }
});

test("replays a repeated operation without a second chain write", async () => {
  const writer = new RecordingWriter();
  const app = await buildServer({ chainWriter: writer, logger: false });
  try {
    const first = await app.inject({
      method: "POST",
      url: "/tokens/submit",
      payload: { operationRef: "op-mint", payload: mintPayload() },
    });
    assert.equal(first.statusCode, 201);
    assert.equal(first.json().txRef, "0xtx1");

    const again = await app.inject({
      method: "POST",
      url: "/tokens/submit",
      payload: { operationRef: "op-mint", payload: mintPayload() },
    });
    assert.equal(again.statusCode, 200);
    assert.equal(again.json().txRef, "0xtx1");
    assert.equal(again.json().replayed, true);

    const conflicting = await app.inject({
      method: "POST",
      url: "/tokens/submit",
      payload: { operationRef: "op-mint", payload: mintPayload("WCH-2") },
    });
    assert.equal(conflicting.statusCode, 409);
    assert.equal(conflicting.json().error, "operation_ref_conflict");
    assert.deepEqual(writer.calls, ["op-mint"]);
  } finally {
    await app.close();
  }
});

test("shares one chain write between concurrent submissions", async () => {
  const writer = new RecordingWriter();
  const app = await buildServer({ chainWriter: writer, logger: false });
  try {
    const [a, b] = await Promise.all([
      app.inject({
        method: "POST",
        url: "/tokens/submit",
        payload: { operationRef: "op-race", payload: mintPayload() },
      }),
      app.inject({
        method: "POST",
        url: "/tokens/submit",
        payload: { operationRef: "op-race", payload: mintPayload() },
      }),
    ]);
    assert.equal(a.json().txRef, "0xtx1");
    assert.equal(b.json().txRef, "0xtx1");
    assert.deepEqual(writer.calls, ["op-race"]);
  } finally {
    await app.close();
  }
});

test("maps chain failures to unavailable or rejected", async () => {
  const writer = new RecordingWriter();
  const app = await buildServer({ chainWriter: writer, logger: false });
  try {
    writer.failWith = makeError("connection refused", "NETWORK_ERROR");
    const unavailable = await app.inject({
      method: "POST",
      url: "/tokens/submit",
      payload: { operationRef: "op-down", payload: mintPayload() },
    });
    assert.equal(unavailable.statusCode, 503);
    assert.equal(unavailable.json().error, "chain_unavailable");

    writer.failWith = makeError("execution reverted", "CALL_EXCEPTION");
    const rejected = await app.inject({
      method: "POST",
      url: "/tokens/submit",
      payload: { operationRef: "op-down", payload: mintPayload() },
    });
    assert.equal(rejected.statusCode, 422);
    assert.equal(rejected.json().error, "chain_rejected");

    writer.failWith = null;
    const recovered = await app.inject({
      method: "POST",
      url: "/tokens/submit",
      payload: { operationRef: "op-down", payload: mintPayload() },
    });
    assert.equal(recovered.statusCode, 201);
    assert.deepEqual(writer.calls, ["op-down", "op-down", "op-down"]);
  } finally {
    await app.close();
  }
});

test("validates payloads and owner keys", async () => {
  const app = await buildServer({ chainWriter: null, logger: false });
  try {
    const missingFrom = await app.inject({
      method: "POST",
      url: "/tokens/submit",
      payload: {
        operationRef: "op-bad",
        payload: { kind: "TRANSFER", watchId: "WCH-1", serialHash: SERIAL_HASH, toKey: OWNER },
      },
    });
    assert.equal(missingFrom.statusCode, 400);
    assert.equal(missingFrom.json().error, "invalid_request");

    const rawSerial = await app.inject({
      method: "POST",
      url: "/tokens/submit",
      payload: { operationRef: "op-bad", payload: { ...mintPayload(), serialHash: "SN-3001" } },
    });
    assert.equal(rawSerial.statusCode, 400);

    const badKey = await app.inject({
      method: "POST",
      url: "/tokens/submit",
      payload: { operationRef: "op-bad", payload: { ...mintPayload(), toKey: "GABC-not-evm" } },
    });
    assert.equal(badKey.statusCode, 422);
    assert.equal(badKey.json().error, "chain_rejected");
  } finally {
    await app.close();
  }
});

test("requires service auth for submissions when a token is configured", async () => {
  const app = await buildServer({
    chainWriter: null,
    serviceAuthToken: "test-service-token",
    logger: false,
  });
  try {
    const denied = await app.inject({
      method: "POST",
      url: "/tokens/submit",
      payload: { operationRef: "op-auth", payload: mintPayload() },
    });
    assert.equal(denied.statusCode, 401);
    assert.equal(denied.json().error, "unauthorized_service");

    const allowed = await app.inject({
      method: "POST",
      url: "/tokens/submit",
      headers: { "x-service-token": "test-service-token" },
      payload: { operationRef: "op-auth", payload: mintPayload() },
    });
    assert.equal(allowed.statusCode, 201);
  } finally {
    await app.close();
  }
});

test("exposes operations and the per-watch timeline", async () => {
  const writer = new RecordingWriter();
  const app = await buildServer({ chainWriter: writer, logger: false });
  try {
    await app.inject({
      method: "POST",
      url: "/tokens/submit",
      payload: { operationRef: "op-1", payload: mintPayload() },
    });
    await app.inject({
      method: "POST",
      url: "/tokens/submit",
      payload: {
        operationRef: "op-2",
        payload: {
          kind: "TRANSFER",
          watchId: "WCH-1",
          serialHash: SERIAL_HASH,
          fromKey: OWNER,
          toKey: NEXT_OWNER,
        },
      },
    });

    const operation = await app.inject({ method: "GET", url: "/tokens/operations/op-2" });
    assert.equal(operation.statusCode, 200);
    assert.equal(operation.json().operation.txRef, "0xtx2");
    assert.equal(operation.json().operation.payload.fromKey, OWNER);

    const missing = await app.inject({ method: "GET", url: "/tokens/operations/op-9" });
    assert.equal(missing.statusCode, 404);

    const timeline = await app.inject({ method: "GET", url: "/tokens/WCH-1/timeline" });
    assert.deepEqual(
      (timeline.json() as { operations: Array<{ operationRef: string }> }).operations.map(
        (item) => item.operationRef,
      ),
      ["op-1", "op-2"],
    );

    const status = await app.inject({ method: "GET", url: "/chain/status" });
    assert.deepEqual(status.json(), { configured: true, latestBlock: 7 });
  } finally {
    await app.close();
  }
});
