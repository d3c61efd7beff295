import {
  NoEvaluatorAvailableError,
  type EvaluatorDirectory,
  type EvaluatorRef,
} from "@chrono/lifecycle";
import { requestJson } from "./http.js";

interface EligibleEvaluatorResponse {
  evaluator: EvaluatorRef | null;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isEvaluatorRef(value: unknown): value is EvaluatorRef {
  if (!isObject(value)) return false;
  return (
    typeof value.evaluatorId === "string" &&
    value.evaluatorId.length > 0 &&
    typeof value.tier === "string" &&
    (value.publicKeyHex === undefined || typeof value.publicKeyHex === "string")
  );
}

export class HttpEvaluatorDirectory implements EvaluatorDirectory {
  constructor(private readonly baseUrl: string) {}

  async findEligibleEvaluator(watchCategory: string): Promise<EvaluatorRef | null> {
    const result = await requestJson<EligibleEvaluatorResponse>(
      `${this.baseUrl}/evaluators/eligible?category=${encodeURIComponent(watchCategory)}`,
      { method: "GET" },
    );
    if (result.status === 404) return null;
    if (!result.ok) {
      throw new NoEvaluatorAvailableError("evaluator directory unavailable", {
        status: result.status,
      });
    }
    const evaluator = result.data?.evaluator;
    if (evaluator === null || evaluator === undefined) return null;
    if (!isEvaluatorRef(evaluator)) {
      throw new NoEvaluatorAvailableError("evaluator directory returned an invalid evaluator");
    }
    return evaluator;
  }
}
