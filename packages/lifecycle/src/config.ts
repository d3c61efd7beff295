export interface CommissionTier {
  rate: string;             // decimal fraction of the gross amount, e.g. "0.025"
  evaluatorShare: string;   // fraction of the commission paid to the evaluator
}

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

export interface LifecycleConfig {
  currency: string;
  commissionTiers: Record<string, CommissionTier>;
  defaultEvaluatorTier: string;
  platformBeneficiaryId: string;
  tokenizationRetry: RetryPolicy;
  paymentRetry: RetryPolicy;
  chainCallTimeoutMs: number;
  paymentCallTimeoutMs: number;
  claimLeaseMs: number;
  requireShipmentConfirmation: boolean;
  expirySweepIntervalMs: number;
}

export const DEFAULT_COMMISSION_TIERS: Record<string, CommissionTier> = {
  STANDARD: { rate: "0.025", evaluatorShare: "0.4" },
  PREMIUM: { rate: "0.03", evaluatorShare: "0.5" },
  MASTER: { rate: "0.035", evaluatorShare: "0.5" },
};

export const DEFAULT_LIFECYCLE_CONFIG: LifecycleConfig = {
  currency: "BRL",
  commissionTiers: DEFAULT_COMMISSION_TIERS,
  defaultEvaluatorTier: "STANDARD",
  platformBeneficiaryId: "platform",
  tokenizationRetry: { maxAttempts: 3, initialDelayMs: 250, maxDelayMs: 4000 },
  paymentRetry: { maxAttempts: 3, initialDelayMs: 250, maxDelayMs: 4000 },
  chainCallTimeoutMs: 15_000,
  paymentCallTimeoutMs: 10_000,
  claimLeaseMs: 120_000,
  requireShipmentConfirmation: false,
  expirySweepIntervalMs: 60_000,
};

const RATE_PATTERN = /^(0|1)(\.\d{1,6})?$/;

export function isRate(value: unknown): value is string {
  return typeof value === "string" && RATE_PATTERN.test(value) && Number(value) <= 1;
}

function parseNonNegativeInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`invalid integer setting '${raw}'`);
  }
  return parsed;
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === "") return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") return true;
  if (normalized === "0" || normalized === "false" || normalized === "no") return false;
  throw new Error(`invalid boolean setting '${raw}'`);
}

/**
 * Parses `TIER:rate:evaluatorShare` entries separated by commas, e.g.
 * `STANDARD:0.025:0.4,PREMIUM:0.03:0.5`. The share may be omitted (0).
 */
export function parseCommissionTiers(
  raw: string | undefined,
  fallback: Record<string, CommissionTier>,
): Record<string, CommissionTier> {
  const source = (raw || "").trim();
  if (!source) return fallback;

  const tiers: Record<string, CommissionTier> = {};
  for (const entry of source.split(",")) {
    const trimmed = entry.trim();
    if (!trimmed) continue;
    const [name, rate, evaluatorShare = "0"] = trimmed.split(":").map((part) => part.trim());
    if (!name || !isRate(rate) || !isRate(evaluatorShare)) {
      throw new Error(`invalid commission tier '${trimmed}'`);
    }
    tiers[name.toUpperCase()] = { rate, evaluatorShare };
  }
  return tiers;
}

export function loadLifecycleConfig(
  env: NodeJS.ProcessEnv = process.env,
  base: LifecycleConfig = DEFAULT_LIFECYCLE_CONFIG,
): LifecycleConfig {
  const commissionTiers = parseCommissionTiers(env.COMMISSION_TIERS, base.commissionTiers);
  const defaultEvaluatorTier = (env.DEFAULT_EVALUATOR_TIER || base.defaultEvaluatorTier).toUpperCase();
  if (!commissionTiers[defaultEvaluatorTier]) {
    throw new Error(`default evaluator tier '${defaultEvaluatorTier}' has no commission rate`);
  }

  return {
    currency: (env.ESCROW_CURRENCY || base.currency).toUpperCase(),
    commissionTiers,
    defaultEvaluatorTier,
    platformBeneficiaryId: env.PLATFORM_BENEFICIARY_ID || base.platformBeneficiaryId,
    tokenizationRetry: {
      maxAttempts: Math.max(
        1,
        parseNonNegativeInt(env.TOKENIZATION_MAX_ATTEMPTS, base.tokenizationRetry.maxAttempts),
      ),
      initialDelayMs: parseNonNegativeInt(
        env.TOKENIZATION_BACKOFF_MS,
        base.tokenizationRetry.initialDelayMs,
      ),
      maxDelayMs: base.tokenizationRetry.maxDelayMs,
    },
    paymentRetry: {
      maxAttempts: Math.max(
        1,
        parseNonNegativeInt(env.PAYMENT_MAX_ATTEMPTS, base.paymentRetry.maxAttempts),
      ),
      initialDelayMs: parseNonNegativeInt(env.PAYMENT_BACKOFF_MS, base.paymentRetry.initialDelayMs),
      maxDelayMs: base.paymentRetry.maxDelayMs,
    },
    chainCallTimeoutMs: parseNonNegativeInt(env.CHAIN_CALL_TIMEOUT_MS, base.chainCallTimeoutMs),
    paymentCallTimeoutMs: parseNonNegativeInt(
      env.PAYMENT_CALL_TIMEOUT_MS,
      base.paymentCallTimeoutMs,
    ),
    claimLeaseMs: parseNonNegativeInt(env.ESCROW_CLAIM_LEASE_MS, base.claimLeaseMs),
    requireShipmentConfirmation: parseBoolean(
      env.REQUIRE_SHIPMENT_CONFIRMATION,
      base.requireShipmentConfirmation,
    ),
    expirySweepIntervalMs: parseNonNegativeInt(
      env.EXPIRY_SWEEP_INTERVAL_MS,
      base.expirySweepIntervalMs,
    ),
  };
}

export function commissionTierFor(config: LifecycleConfig, tier: string | undefined): {
  tier: string;
  commission: CommissionTier;
} {
  const requested = (tier || config.defaultEvaluatorTier).toUpperCase();
  const commission = config.commissionTiers[requested];
  if (commission) return { tier: requested, commission };
  const fallback = config.commissionTiers[config.defaultEvaluatorTier];
  if (!fallback) {
    throw new Error(`default evaluator tier '${config.defaultEvaluatorTier}' has no commission rate`);
  }
  return { tier: config.defaultEvaluatorTier, commission: fallback };
}
