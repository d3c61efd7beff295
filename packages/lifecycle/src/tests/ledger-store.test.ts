import assert from "node:assert/strict";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import type { EscrowContract, TokenRecord, Watch } from "@chrono/shared";
import { SqliteLedgerStore } from "../storage/ledger-store.js";

function createTempStore() {
  const dir = mkdtempSync(join(tmpdir(), "chrono-ledger-store-"));
  return { dir, store: new SqliteLedgerStore(join(dir, "nested", "ledger.db")) };
}

const watch: Watch = {
  watchId: "WCH-1",
  serial: "SN-STORE-1",
  brand: "Tudor",
  model: "Black Bay",
  category: "diver",
  ownerId: "seller-1",
  state: "LISTED",
  version: 1,
  listedAt: "2026-03-01T10:00:00.000Z",
  updatedAt: "2026-03-01T10:00:00.000Z",
};

function contract(contractId: string, overrides: Partial<EscrowContract> = {}): EscrowContract {
  return {
    contractId,
    watchId: "WCH-1",
    buyer: { partyId: "buyer-1", chainKey: "key-1" },
    seller: { partyId: "seller-1" },
    amount: { amount: "50.00", currency: "BRL" },
    state: "FUNDED",
    holdRef: `HLD-${contractId}`,
    deadline: "2026-03-08T10:00:00.000Z",
    createdAt: "2026-03-01T10:00:00.000Z",
    updatedAt: "2026-03-01T10:00:00.000Z",
    version: 1,
    ...overrides,
  };
}

function token(sequence: number, operationRef: string): TokenRecord {
  return {
    tokenRecordId: `TKN-${operationRef}`,
    watchId: "WCH-1",
    sequence,
    kind: sequence === 1 ? "MINT" : "TRANSFER",
    ownerKey: `owner-${sequence}`,
    chainTxRef: `tx-${operationRef}`,
    operationRef,
    contractId: "ESC-1",
    mintedAt: "2026-03-01T10:00:00.000Z",
  };
}

test("updates with a stale version are refused", () => {
  const { dir, store } = createTempStore();
  try {
    assert.equal(store.insertWatch(watch), true);
    assert.equal(store.insertWatch({ ...watch, watchId: "WCH-2" }), false);

    assert.equal(store.updateWatch({ ...watch, state: "DELISTED", version: 2 }, 1), true);
    assert.equal(store.updateWatch({ ...watch, state: "LISTED", version: 2 }, 1), false);
    assert.equal(store.getWatch("WCH-1")?.state, "DELISTED");
    assert.equal(store.getWatchBySerial("SN-STORE-1")?.watchId, "WCH-1");
  } finally {
    store.close();
    rmSync(dir, { recursive: true, force: true });
  }
});

test("only one non-terminal contract per watch", () => {
  const { dir, store } = createTempStore();
  try {
    assert.equal(store.insertEscrow(contract("ESC-1")), true);
    assert.equal(store.insertEscrow(contract("ESC-2")), false);

    const expired = contract("ESC-1", { state: "EXPIRED", version: 2 });
    assert.equal(store.updateEscrow(expired, 1), true);
    assert.equal(store.getActiveEscrowForWatch("WCH-1"), null);
    assert.equal(store.insertEscrow(contract("ESC-2")), true);
    assert.equal(store.getActiveEscrowForWatch("WCH-1")?.contractId, "ESC-2");
    assert.deepEqual(
      store.listEscrows({ watchId: "WCH-1", state: "EXPIRED" }).map((c) => c.contractId),
      ["ESC-1"],
    );
  } finally {
    store.close();
    rmSync(dir, { recursive: true, force: true });
  }
});

test("overdue listing only returns active contracts at or past the deadline", () => {
  const { dir, store } = createTempStore();
  try {
    store.insertEscrow(contract("ESC-1"));
    store.insertEscrow(
      contract("ESC-2", { watchId: "WCH-2", deadline: "2026-03-20T10:00:00.000Z" }),
    );
    store.insertEscrow(contract("ESC-3", { watchId: "WCH-3", state: "REFUNDED" }));

    assert.deepEqual(
      store.listOverdueEscrows("2026-03-08T10:00:00.000Z").map((c) => c.contractId),
      ["ESC-1"],
    );
  } finally {
    store.close();
    rmSync(dir, { recursive: true, force: true });
  }
});

test("token history refuses duplicate sequences and operation references", () => {
  const { dir, store } = createTempStore();
  try {
    assert.equal(store.appendTokenRecord(token(1, "op-1")), true);
    assert.equal(store.appendTokenRecord(token(1, "op-2")), false);
    assert.equal(store.appendTokenRecord({ ...token(2, "op-1"), tokenRecordId: "TKN-other" }), false);
    assert.equal(store.appendTokenRecord(token(2, "op-2")), true);

    assert.deepEqual(store.listTokenRecords("WCH-1").map((record) => record.operationRef), ["op-1", "op-2"]);
    assert.equal(store.getTokenRecordByOperationRef("op-2")?.sequence, 2);
    assert.deepEqual(
      store.listTokenRecordsForContract("ESC-1").map((record) => record.sequence),
      [1, 2],
    );
    assert.deepEqual(store.listTokenRecordsForContract("ESC-2"), []);
  } finally {
    store.close();
    rmSync(dir, { recursive: true, force: true });
  }
});

test("transactions roll back every write when the body throws", () => {
  const { dir, store } = createTempStore();
  try {
    assert.throws(() =>
      store.transaction(() => {
        store.insertWatch(watch);
        throw new Error("boom");
      }),
    );
    assert.equal(store.getWatch("WCH-1"), null);
  } finally {
    store.close();
    rmSync(dir, { recursive: true, force: true });
  }
});
