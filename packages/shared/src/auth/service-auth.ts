import { timingSafeEqual } from "node:crypto";

export const SERVICE_AUTH_HEADER = "x-service-token";

function normalizeToken(token: string | undefined | null): string | null {
  if (typeof token !== "string") return null;
  const trimmed = token.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function tokensEqual(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function serviceAuthHeaders(token: string | undefined | null): Record<string, string> {
  const normalized = normalizeToken(token);
  if (!normalized) return {};
  return { [SERVICE_AUTH_HEADER]: normalized };
}

/**
 * Operator and service-to-service routes are open when no token is
 * configured, which is how local development and the tests run.
 */
export function isServiceCallAuthorized(
  providedHeader: unknown,
  expectedToken: string | undefined | null,
): boolean {
  const expected = normalizeToken(expectedToken);
  if (!expected) return true;

  if (Array.isArray(providedHeader)) {
    return providedHeader.some(
      (value) => typeof value === "string" && tokensEqual(value, expected),
    );
  }
  return typeof providedHeader === "string" && tokensEqual(providedHeader, expected);
}
