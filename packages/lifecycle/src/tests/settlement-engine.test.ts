import assert from "node:assert/strict";
import test from "node:test";
import { unwrap } from "../result.js";
import { brl, createHarness, errorCode, evaluate, listWatch, openEscrow } from "./helpers.js";

test("hold retries a gateway outage with the same idempotency reference", async () => {
  const h = createHarness();
  try {
    h.payments.unavailable.push("hold");
    const holdRef = await h.engine.settlement.hold(brl("10.00"), "buyer-1", "hold:ESC-X");
    assert.equal(unwrap(holdRef), "HLD-hold:ESC-X");
    assert.deepEqual([...h.payments.holds.keys()], ["hold:ESC-X"]);
  } finally {
    h.cleanup();
  }
});

test("refund gives up after the configured attempts", async () => {
  const h = createHarness({ config: { paymentRetry: { maxAttempts: 2, initialDelayMs: 0, maxDelayMs: 0 } } });
  try {
    h.payments.unavailable.push("refund", "refund");
    const result = await h.engine.settlement.refund("HLD-1", "buyer-1", brl("10.00"), "refund:ESC-X");
    assert.equal(errorCode(result), "PAYMENT_UNAVAILABLE");
    assert.equal(h.payments.refunds.length, 0);
  } finally {
    h.cleanup();
  }
});

test("reconciliation is clean after a release and flags later drift", async () => {
  const h = createHarness();
  try {
    const watch = listWatch(h);
    const opened = await openEscrow(h, watch);
    await evaluate(h, opened, "CERTIFIED");
    unwrap(await h.engine.escrow.resolve(opened.contractId));

    const clean = h.engine.settlement.reconcile();
    assert.equal(clean.checkedContracts, 1);
    assert.deepEqual(clean.findings, []);

    const sold = h.store.getWatch(watch.watchId);
    assert.ok(sold);
    h.store.updateWatch({ ...sold, ownerId: "someone-else", version: sold.version + 1 }, sold.version);

    const drifted = h.engine.settlement.reconcile();
    assert.deepEqual(
      drifted.findings.map((finding) => [finding.code, finding.contractId]),
      [["WATCH_OWNER_MISMATCH", opened.contractId]],
    );
  } finally {
    h.cleanup();
  }
});
