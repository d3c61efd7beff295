import type { FastifyReply } from "fastify";
import type { LifecycleError, LifecycleErrorCode } from "@chrono/lifecycle";

interface HttpErrorMapping {
  status: number;
  error: string;
}

const HTTP_ERRORS: Record<LifecycleErrorCode, HttpErrorMapping> = {
  CONFLICT: { status: 409, error: "conflict" },
  ALREADY_COMPLETED: { status: 409, error: "already_completed" },
  INVALID_STATE: { status: 409, error: "state_conflict" },
  INVALID_AMOUNT: { status: 400, error: "invalid_amount" },
  VALIDATION: { status: 400, error: "invalid_request" },
  INSUFFICIENT_FUNDS: { status: 402, error: "insufficient_funds" },
  NOT_FOUND: { status: 404, error: "not_found" },
  INVALID_CERTIFICATE: { status: 422, error: "invalid_certificate" },
  NO_EVALUATOR_AVAILABLE: { status: 503, error: "no_evaluator_available" },
  CHAIN_UNAVAILABLE: { status: 503, error: "chain_unavailable" },
  PAYMENT_UNAVAILABLE: { status: 503, error: "payment_unavailable" },
  CHAIN_REJECTED: { status: 502, error: "chain_rejected" },
};

export function httpErrorFor(error: LifecycleError): HttpErrorMapping {
  return HTTP_ERRORS[error.code];
}

export function sendLifecycleError(reply: FastifyReply, error: LifecycleError): FastifyReply {
  const mapping = httpErrorFor(error);
  return reply.code(mapping.status).send({
    error: mapping.error,
    message: error.message,
    retryable: error.retryable,
  });
}

export function sendInvalidRequest(reply: FastifyReply, message: string): FastifyReply {
  return reply.code(400).send({ error: "invalid_request", message });
}
