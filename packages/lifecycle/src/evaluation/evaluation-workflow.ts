import {
  digestOf,
  verifyHex,
  type EscrowContract,
  type Evaluation,
  type EvaluationOutcome,
  type EvaluationReport,
} from "@chrono/shared";
import type { EvaluatorDirectory } from "../collaborators.js";
import type { LifecycleContext } from "../context.js";
import type { EscrowContractManager } from "../escrow/escrow-manager.js";
import {
  AlreadyCompletedError,
  ConflictError,
  InvalidCertificateError,
  InvalidStateError,
  NoEvaluatorAvailableError,
  NotFoundError,
  ValidationError,
} from "../errors.js";
import { newId } from "../ids.js";
import { attempt, attemptSync, type Result } from "../result.js";
import { commitEvaluation } from "../storage/commit.js";

export interface CompleteEvaluationInput {
  evaluationId: string;
  result: EvaluationOutcome;
  certificateRef: string;
  report?: EvaluationReport;
  signature?: string;
}

export interface EvaluationRequested {
  contract: EscrowContract;
  evaluation: Evaluation;
}

export interface EvaluationCompleted {
  evaluation: Evaluation;
  contract: EscrowContract;
  replayed: boolean;
}

export interface DisputeOpened {
  evaluation: Evaluation;
  contract: EscrowContract;
}

const OUTCOMES: readonly EvaluationOutcome[] = ["CERTIFIED", "REJECTED"];
const CONDITIONS = ["excellent", "good", "fair", "poor"];
const AUTHENTICITY = ["authentic", "replica", "unknown"];

function validateReport(report: EvaluationReport | undefined): void {
  if (report === undefined) return;
  if (!CONDITIONS.includes(report.condition)) {
    throw new ValidationError(`report.condition '${report.condition}' is not recognized`);
  }
  if (!AUTHENTICITY.includes(report.authenticity)) {
    throw new ValidationError(`report.authenticity '${report.authenticity}' is not recognized`);
  }
}

/**
 * Hash the evaluator signs: canonical JSON over the identity of the watch
 * and the outcome. Optional fields are left out rather than set to null.
 */
export function certificateHashFor(
  evaluation: Pick<Evaluation, "evaluationId" | "watchId">,
  serial: string,
  input: Pick<CompleteEvaluationInput, "result" | "certificateRef" | "report">,
): string {
  const body: Record<string, unknown> = {
    evaluationId: evaluation.evaluationId,
    watchId: evaluation.watchId,
    serial,
    result: input.result,
    certificateRef: input.certificateRef,
  };
  if (input.report) body.report = input.report;
  return digestOf(body);
}

export class EvaluationWorkflow {
  constructor(
    private readonly ctx: LifecycleContext,
    private readonly directory: EvaluatorDirectory,
    private readonly escrow: EscrowContractManager,
  ) {}

  requestEvaluation(watchId: string, contractId: string): Promise<Result<EvaluationRequested>> {
    return attempt(async () => {
      const { store, logger } = this.ctx;
      const contract = store.getEscrow(contractId);
      if (!contract) throw new NotFoundError(`escrow ${contractId} not found`, { contractId });
      if (contract.watchId !== watchId) {
        throw new ValidationError(`escrow ${contractId} is not for watch ${watchId}`);
      }
      if (contract.state !== "FUNDED") {
        throw new InvalidStateError(`cannot request an evaluation while ${contract.state}`);
      }
      const watch = store.getWatch(watchId);
      if (!watch) throw new NotFoundError(`watch ${watchId} not found`, { watchId });

      const evaluator = await this.directory.findEligibleEvaluator(watch.category);
      if (!evaluator) {
        throw new NoEvaluatorAvailableError(`no evaluator available for ${watch.category}`, {
          category: watch.category,
        });
      }

      const now = this.ctx.clock();
      const evaluation: Evaluation = {
        evaluationId: newId("EVL", now),
        watchId,
        contractId,
        evaluatorId: evaluator.evaluatorId,
        evaluatorTier: evaluator.tier.toUpperCase(),
        evaluatorPublicKey: evaluator.publicKeyHex,
        result: "PENDING",
        requestedAt: now.toISOString(),
        version: 1,
      };

      // The contract version read above guards against anything that moved
      // the contract while the directory was being asked.
      const updated = store.transaction(() => {
        if (!store.insertEvaluation(evaluation)) {
          throw new ConflictError(`evaluation ${evaluation.evaluationId} already exists`);
        }
        return this.escrow.beginEvaluation(contract, {
          evaluationId: evaluation.evaluationId,
          evaluatorId: evaluation.evaluatorId,
          evaluatorTier: evaluation.evaluatorTier,
        });
      });
      logger.info(
        { contractId, evaluationId: evaluation.evaluationId, evaluatorId: evaluation.evaluatorId },
        "evaluation requested",
      );
      return { contract: updated, evaluation };
    });
  }

  completeEvaluation(input: CompleteEvaluationInput): Promise<Result<EvaluationCompleted>> {
    return attempt(async () => {
      const { store, logger } = this.ctx;
      const evaluation = this.load(input.evaluationId);
      if (evaluation.result !== "PENDING") {
        return this.replay(evaluation, input);
      }

      if (!OUTCOMES.includes(input.result)) {
        throw new ValidationError(`result '${String(input.result)}' is not an evaluation outcome`);
      }
      const certificateRef = (input.certificateRef ?? "").trim();
      if (!certificateRef) throw new ValidationError("certificateRef is required", { field: "certificateRef" });
      validateReport(input.report);

      const watch = store.getWatch(evaluation.watchId);
      if (!watch) throw new NotFoundError(`watch ${evaluation.watchId} not found`);
      const certificateHash = certificateHashFor(evaluation, watch.serial, {
        result: input.result,
        certificateRef,
        report: input.report,
      });

      if (evaluation.evaluatorPublicKey) {
        const signature = input.signature ?? "";
        const valid = signature
          ? await verifyHex(certificateHash, signature, evaluation.evaluatorPublicKey)
          : false;
        if (!valid) {
          throw new InvalidCertificateError(`certificate signature rejected for ${evaluation.evaluationId}`, {
            evaluatorId: evaluation.evaluatorId,
          });
        }
      }

      const outcome = store.transaction((): EvaluationCompleted => {
        const completed = commitEvaluation(store, evaluation, {
          result: input.result,
          certificateRef,
          certificateHash,
          signature: input.signature,
          report: input.report,
          completedAt: this.ctx.clock().toISOString(),
        });
        if (!completed) {
          const current = this.load(evaluation.evaluationId);
          if (current.result === "PENDING") {
            throw new ConflictError(`evaluation ${evaluation.evaluationId} changed concurrently`);
          }
          return this.replay(current, { ...input, certificateRef });
        }
        const contract = this.escrow.applyEvaluation(completed.contractId, completed.evaluationId);
        return { evaluation: completed, contract, replayed: false };
      });

      if (!outcome.replayed) {
        logger.info(
          { evaluationId: evaluation.evaluationId, result: input.result, contractId: evaluation.contractId },
          "evaluation completed",
        );
      }
      return outcome;
    });
  }

  disputeEvaluation(evaluationId: string, openedBy: string, reason: string): Result<DisputeOpened> {
    return attemptSync(() => {
      const { store } = this.ctx;
      const by = (openedBy ?? "").trim();
      const why = (reason ?? "").trim();
      if (!by || !why) throw new ValidationError("openedBy and reason are required");

      const evaluation = this.load(evaluationId);
      if (evaluation.result === "PENDING") {
        throw new InvalidStateError(`evaluation ${evaluationId} is not completed`);
      }
      if (evaluation.dispute) {
        throw new InvalidStateError(`evaluation ${evaluationId} is already disputed`);
      }
      const contract = store.getEscrow(evaluation.contractId);
      if (!contract) throw new NotFoundError(`escrow ${evaluation.contractId} not found`);
      if (contract.state !== "APPROVED" && contract.state !== "REJECTED") {
        throw new InvalidStateError(`escrow ${contract.contractId} can no longer be disputed (${contract.state})`);
      }
      if (contract.claim && Date.parse(contract.claim.leaseExpiresAt) > this.ctx.clock().getTime()) {
        throw new ConflictError(`escrow ${contract.contractId} is busy (${contract.claim.kind})`);
      }

      return store.transaction((): DisputeOpened => {
        const disputed = commitEvaluation(store, evaluation, {
          dispute: { openedBy: by, reason: why, openedAt: this.ctx.clock().toISOString() },
        });
        if (!disputed) throw new ConflictError(`evaluation ${evaluationId} changed concurrently`);
        const flagged = this.escrow.flagReview(contract, "EVALUATION_DISPUTED", why, by);
        return { evaluation: disputed, contract: flagged };
      });
    });
  }

  getEvaluation(evaluationId: string): Result<Evaluation> {
    return attemptSync(() => this.load(evaluationId));
  }

  private replay(evaluation: Evaluation, input: CompleteEvaluationInput): EvaluationCompleted {
    const watch = this.ctx.store.getWatch(evaluation.watchId);
    if (!watch) throw new NotFoundError(`watch ${evaluation.watchId} not found`);
    // Same payload means the same certificate hash and the same signature.
    const requestedHash = certificateHashFor(evaluation, watch.serial, {
      result: input.result,
      certificateRef: (input.certificateRef ?? "").trim(),
      report: input.report,
    });
    const samePayload =
      evaluation.result === input.result &&
      evaluation.certificateHash === requestedHash &&
      (evaluation.signature ?? "") === (input.signature ?? "");
    if (!samePayload) {
      throw new AlreadyCompletedError(`evaluation ${evaluation.evaluationId} is already ${evaluation.result}`, {
        evaluationId: evaluation.evaluationId,
      });
    }
    const contract = this.ctx.store.getEscrow(evaluation.contractId);
    if (!contract) throw new NotFoundError(`escrow ${evaluation.contractId} not found`);
    return { evaluation, contract, replayed: true };
  }

  private load(evaluationId: string): Evaluation {
    const evaluation = this.ctx.store.getEvaluation(evaluationId);
    if (!evaluation) throw new NotFoundError(`evaluation ${evaluationId} not found`, { evaluationId });
    return evaluation;
  }
}
