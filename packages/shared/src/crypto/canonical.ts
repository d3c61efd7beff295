import { canonicalize } from "json-canonicalize";
import { sha256Hex } from "./hash.js";

/**
 * Canonical JSON per RFC 8785 (JCS). Hash and sign only canonical output,
 * key order in the source object must not change a digest.
 */
export function canonicalJson(value: unknown): string {
  return canonicalize(value);
}

export function digestOf(value: unknown): string {
  return sha256Hex(canonicalJson(value));
}
