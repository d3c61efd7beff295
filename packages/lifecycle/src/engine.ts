import type { ChainClient, EvaluatorDirectory, PaymentGateway } from "./collaborators.js";
import { createContext, type LifecycleContext, type LifecycleContextOptions } from "./context.js";
import { EscrowContractManager } from "./escrow/escrow-manager.js";
import { ExpirySweeper } from "./escrow/expiry-sweeper.js";
import { EvaluationWorkflow } from "./evaluation/evaluation-workflow.js";
import { SettlementEngine } from "./settlement/settlement-engine.js";
import { TokenizationService } from "./tokenization/tokenization-service.js";
import { WatchRegistry } from "./watch-registry.js";

export interface LifecycleEngineOptions extends LifecycleContextOptions {
  evaluators: EvaluatorDirectory;
  chain: ChainClient;
  payments: PaymentGateway;
}

export interface LifecycleEngine {
  context: LifecycleContext;
  watches: WatchRegistry;
  escrow: EscrowContractManager;
  evaluations: EvaluationWorkflow;
  tokenization: TokenizationService;
  settlement: SettlementEngine;
  sweeper: ExpirySweeper;
}

export function createLifecycleEngine(options: LifecycleEngineOptions): LifecycleEngine {
  const context = createContext(options);
  const tokenization = new TokenizationService(context, options.chain);
  const settlement = new SettlementEngine(context, options.payments);
  const escrow = new EscrowContractManager(context, tokenization, settlement);

  return {
    context,
    watches: new WatchRegistry(context),
    escrow,
    evaluations: new EvaluationWorkflow(context, options.evaluators, escrow),
    tokenization,
    settlement,
    sweeper: new ExpirySweeper(context, escrow),
  };
}
