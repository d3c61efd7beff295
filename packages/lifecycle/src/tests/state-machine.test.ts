import assert from "node:assert/strict";
import test from "node:test";
import type { EscrowContract } from "@chrono/shared";
import {
  ESCROW_STATES,
  canTransition,
  isExpirable,
  isTerminalEscrowState,
  watchStateFor,
} from "../escrow/state-machine.js";

function contractIn(state: EscrowContract["state"]): EscrowContract {
  return {
    contractId: "ESC-1",
    watchId: "WCH-1",
    buyer: { partyId: "buyer-1", chainKey: "key" },
    seller: { partyId: "seller-1" },
    amount: { amount: "10.00", currency: "BRL" },
    state,
    holdRef: "HLD-1",
    deadline: "2026-03-08T10:00:00.000Z",
    createdAt: "2026-03-01T10:00:00.000Z",
    updatedAt: "2026-03-01T10:00:00.000Z",
    version: 1,
  };
}

test("terminal states have no outgoing transitions", () => {
  for (const from of ESCROW_STATES.filter(isTerminalEscrowState)) {
    for (const to of ESCROW_STATES) {
      assert.equal(canTransition(from, to), false, `${from} -> ${to}`);
    }
  }
});

test("evaluation outcomes cannot expire or skip settlement", () => {
  assert.equal(canTransition("FUNDED", "AWAITING_EVALUATION"), true);
  assert.equal(canTransition("FUNDED", "APPROVED"), false);
  assert.equal(canTransition("AWAITING_EVALUATION", "EXPIRED"), true);
  assert.equal(canTransition("APPROVED", "EXPIRED"), false);
  assert.equal(canTransition("REJECTED", "RELEASED"), false);
  assert.equal(canTransition("APPROVED", "REFUNDED"), true);
});

test("only funded or awaiting contracts past their deadline are expirable", () => {
  const after = new Date("2026-03-09T00:00:00.000Z");
  const before = new Date("2026-03-07T00:00:00.000Z");
  assert.equal(isExpirable(contractIn("FUNDED"), after), true);
  assert.equal(isExpirable(contractIn("AWAITING_EVALUATION"), after), true);
  assert.equal(isExpirable(contractIn("FUNDED"), before), false);
  assert.equal(isExpirable(contractIn("APPROVED"), after), false);
  assert.equal(isExpirable(contractIn("RELEASED"), after), false);
});

test("watch state follows the contract", () => {
  assert.equal(watchStateFor("APPROVED", "IN_ESCROW"), "EVALUATED");
  assert.equal(watchStateFor("APPROVED", "TOKENIZED"), "TOKENIZED");
  assert.equal(watchStateFor("RELEASED", "TOKENIZED"), "SOLD");
  assert.equal(watchStateFor("EXPIRED", "IN_ESCROW"), "LISTED");
});
