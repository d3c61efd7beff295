export * from "./errors.js";
export * from "./result.js";
export * from "./config.js";
export * from "./collaborators.js";
export * from "./context.js";
export * from "./ids.js";
export * from "./retry.js";
export * from "./engine.js";
export * from "./watch-registry.js";
export * from "./escrow/state-machine.js";
export * from "./escrow/escrow-manager.js";
export * from "./escrow/expiry-sweeper.js";
export * from "./evaluation/evaluation-workflow.js";
export * from "./tokenization/tokenization-service.js";
export * from "./settlement/money.js";
export * from "./settlement/commission.js";
export * from "./settlement/settlement-engine.js";
export * from "./storage/ledger-store.js";
export * from "./storage/commit.js";
