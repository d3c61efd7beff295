import assert from "node:assert/strict";
import test from "node:test";
import { sha256Hex, type EscrowContract, type Watch } from "@chrono/shared";
import { tokenOperationRef } from "../ids.js";
import { unwrap } from "../result.js";
import {
  BUYER_KEY,
  OTHER_BUYER_KEY,
  createHarness,
  errorCode,
  evaluate,
  listWatch,
  openEscrow,
  type Harness,
} from "./helpers.js";

async function approvedEscrow(
  h: Harness,
  watch: Watch,
  overrides: { buyerId?: string; chainKey?: string } = {},
): Promise<EscrowContract> {
  const opened = await openEscrow(h, watch, overrides);
  const { contract } = await evaluate(h, opened, "CERTIFIED");
  return contract;
}

test("mints first, then transfers from the active holder", async () => {
  const h = createHarness();
  try {
    const watch = listWatch(h, "SN-TOK-1");
    const first = await approvedEscrow(h, watch);
    const minted = unwrap(
      await h.engine.tokenization.mintOrTransfer(watch.watchId, BUYER_KEY, first.contractId),
    );
    assert.equal(unwrap(h.engine.watches.getWatch(watch.watchId)).state, "TOKENIZED");
    unwrap(await h.engine.escrow.resolve(first.contractId));
    const resold = unwrap(h.engine.watches.relistWatch(watch.watchId, "buyer-1"));

    const second = await approvedEscrow(h, resold, { buyerId: "buyer-2", chainKey: OTHER_BUYER_KEY });
    const transferred = unwrap(
      await h.engine.tokenization.mintOrTransfer(watch.watchId, OTHER_BUYER_KEY, second.contractId),
    );

    assert.equal(minted.kind, "MINT");
    assert.equal(minted.sequence, 1);
    assert.equal(minted.operationRef, tokenOperationRef(first.contractId, watch.watchId, BUYER_KEY));
    assert.equal(minted.chainTxRef, "tx-1");
    assert.equal(transferred.kind, "TRANSFER");
    assert.equal(transferred.sequence, 2);
    assert.equal(transferred.previousOwnerKey, BUYER_KEY);

    // resolve reused the recorded mint, so only two chain submissions happened
    assert.equal(h.chain.submissions.length, 2);
    assert.deepEqual(h.chain.submissions[1].payload, {
      kind: "TRANSFER",
      watchId: watch.watchId,
      serialHash: sha256Hex("SN-TOK-1"),
      toKey: OTHER_BUYER_KEY,
      fromKey: BUYER_KEY,
    });
    assert.equal(h.engine.tokenization.getActiveToken(watch.watchId)?.tokenRecordId, transferred.tokenRecordId);
    assert.deepEqual(
      unwrap(h.engine.tokenization.getTokenHistory(watch.watchId)).map((record) => record.sequence),
      [1, 2],
    );
  } finally {
    h.cleanup();
  }
});

test("repeating an operation returns the recorded token without a chain call", async () => {
  const h = createHarness();
  try {
    const watch = listWatch(h);
    const contract = await approvedEscrow(h, watch);
    const first = unwrap(
      await h.engine.tokenization.mintOrTransfer(watch.watchId, BUYER_KEY, contract.contractId),
    );
    const second = unwrap(
      await h.engine.tokenization.mintOrTransfer(watch.watchId, BUYER_KEY, contract.contractId),
    );

    assert.equal(second.tokenRecordId, first.tokenRecordId);
    assert.equal(h.chain.submissions.length, 1);
    assert.equal(h.store.listTokenRecords(watch.watchId).length, 1);
  } finally {
    h.cleanup();
  }
});

test("a chain call that outlives the timeout is reported as unavailable", async () => {
  const h = createHarness({ config: { chainCallTimeoutMs: 5 } });
  try {
    const watch = listWatch(h);
    const contract = await approvedEscrow(h, watch);
    h.chain.failures.push("hang");

    const result = await h.engine.tokenization.mintOrTransfer(watch.watchId, BUYER_KEY, contract.contractId);
    assert.equal(errorCode(result), "CHAIN_UNAVAILABLE");
    assert.equal(h.store.listTokenRecords(watch.watchId).length, 0);
  } finally {
    h.cleanup();
  }
});

test("rejects unknown watches and contracts, blank keys and contracts of another watch", async () => {
  const h = createHarness();
  try {
    const watch = listWatch(h);
    const other = listWatch(h, "SN-OTHER", "seller-2");
    const contract = await approvedEscrow(h, watch);

    assert.equal(
      errorCode(await h.engine.tokenization.mintOrTransfer("WCH-missing", BUYER_KEY, contract.contractId)),
      "NOT_FOUND",
    );
    assert.equal(
      errorCode(await h.engine.tokenization.mintOrTransfer(watch.watchId, BUYER_KEY, "ESC-does-not-exist")),
      "NOT_FOUND",
    );
    assert.equal(
      errorCode(await h.engine.tokenization.mintOrTransfer(watch.watchId, " ", contract.contractId)),
      "VALIDATION",
    );
    assert.equal(
      errorCode(await h.engine.tokenization.mintOrTransfer(other.watchId, BUYER_KEY, contract.contractId)),
      "VALIDATION",
    );
    assert.equal(errorCode(h.engine.tokenization.getTokenHistory("WCH-missing")), "NOT_FOUND");
    assert.equal(h.chain.submissions.length, 0);
  } finally {
    h.cleanup();
  }
});

test("only a certified, approved escrow may move the token, and only to its buyer", async () => {
  const h = createHarness();
  try {
    const watch = listWatch(h);
    const funded = await openEscrow(h, watch);
    assert.equal(
      errorCode(await h.engine.tokenization.mintOrTransfer(watch.watchId, BUYER_KEY, funded.contractId)),
      "INVALID_STATE",
    );

    const { contract: rejected } = await evaluate(h, funded, "REJECTED");
    assert.equal(
      errorCode(await h.engine.tokenization.mintOrTransfer(watch.watchId, BUYER_KEY, rejected.contractId)),
      "INVALID_STATE",
    );
    const refunded = unwrap(await h.engine.escrow.resolve(rejected.contractId));
    assert.equal(refunded.contract.state, "REFUNDED");
    assert.equal(
      errorCode(await h.engine.tokenization.mintOrTransfer(watch.watchId, BUYER_KEY, rejected.contractId)),
      "INVALID_STATE",
    );

    const approved = await approvedEscrow(h, watch);
    assert.equal(
      errorCode(await h.engine.tokenization.mintOrTransfer(watch.watchId, OTHER_BUYER_KEY, approved.contractId)),
      "INVALID_STATE",
    );

    assert.equal(h.chain.submissions.length, 0);
    assert.equal(h.store.listTokenRecords(watch.watchId).length, 0);
    const current = unwrap(h.engine.watches.getWatch(watch.watchId));
    assert.equal(current.state, "EVALUATED");
    assert.equal(current.ownerId, "seller-1");
  } finally {
    h.cleanup();
  }
});

test("chain rejection surfaces as a non-retryable error", async () => {
  const h = createHarness();
  try {
    const watch = listWatch(h);
    const contract = await approvedEscrow(h, watch);
    h.chain.failures.push("rejected");
    const result = await h.engine.tokenization.mintOrTransfer(watch.watchId, BUYER_KEY, contract.contractId);
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.code, "CHAIN_REJECTED");
      assert.equal(result.error.retryable, false);
    }
  } finally {
    h.cleanup();
  }
});

test("verifyToken checks the active record against the ledger's operation", async () => {
  const h = createHarness();
  try {
    const watch = listWatch(h);
    const unminted = listWatch(h, "SN-NO-TOKEN");
    const contract = await approvedEscrow(h, watch);
    const minted = unwrap(
      await h.engine.tokenization.mintOrTransfer(watch.watchId, BUYER_KEY, contract.contractId),
    );

    assert.deepEqual(unwrap(await h.engine.tokenization.verifyToken(watch.watchId)), {
      watchId: watch.watchId,
      tokenRecordId: minted.tokenRecordId,
      operationRef: minted.operationRef,
      chainTxRef: "tx-1",
      ledgerTxRef: "tx-1",
      verified: true,
      mismatch: undefined,
      checkedAt: "2026-03-01T10:00:00.000Z",
    });

    const payload = h.chain.submissions[0].payload;
    h.chain.recorded.set(minted.operationRef, { txRef: "tx-forged", payload });
    const forged = unwrap(await h.engine.tokenization.verifyToken(watch.watchId));
    assert.equal(forged.verified, false);
    assert.equal(forged.mismatch, "TX_REF_MISMATCH");
    assert.equal(forged.ledgerTxRef, "tx-forged");

    h.chain.recorded.set(minted.operationRef, { txRef: "tx-1", payload: { ...payload, toKey: OTHER_BUYER_KEY } });
    assert.equal(unwrap(await h.engine.tokenization.verifyToken(watch.watchId)).mismatch, "OWNER_MISMATCH");

    h.chain.recorded.delete(minted.operationRef);
    const missing = unwrap(await h.engine.tokenization.verifyToken(watch.watchId));
    assert.equal(missing.mismatch, "OPERATION_NOT_FOUND");
    assert.equal(missing.ledgerTxRef, undefined);

    h.chain.lookupDown = true;
    assert.equal(errorCode(await h.engine.tokenization.verifyToken(watch.watchId)), "CHAIN_UNAVAILABLE");
    assert.equal(errorCode(await h.engine.tokenization.verifyToken(unminted.watchId)), "NOT_FOUND");
    assert.equal(errorCode(await h.engine.tokenization.verifyToken("WCH-missing")), "NOT_FOUND");
  } finally {
    h.cleanup();
  }
});
