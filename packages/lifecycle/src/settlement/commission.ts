import type { CommissionLine, Money } from "@chrono/shared";
import { applyRate, money, toCents } from "./money.js";

export interface CommissionInput {
  grossAmount: Money;
  rate: string;
  evaluatorShare: string;
  evaluatorId?: string;
  platformBeneficiaryId: string;
}

export interface CommissionBreakdown {
  commissionAmount: Money;
  sellerAmount: Money;
  lines: CommissionLine[];
}

/**
 * commission = gross * rate (half up to the cent); the evaluator's cut is
 * commission * evaluatorShare (half up) and the platform keeps the rest, so
 * the lines always add up to the commission exactly.
 */
export function computeCommission(input: CommissionInput): CommissionBreakdown {
  const currency = input.grossAmount.currency;
  const grossCents = toCents(input.grossAmount.amount);
  const commissionCents = applyRate(grossCents, input.rate);
  const evaluatorCents = input.evaluatorId ? applyRate(commissionCents, input.evaluatorShare) : 0n;
  const platformCents = commissionCents - evaluatorCents;

  const lines: CommissionLine[] = [
    {
      beneficiary: "PLATFORM",
      beneficiaryId: input.platformBeneficiaryId,
      amount: money(platformCents, currency),
    },
  ];
  if (input.evaluatorId && evaluatorCents > 0n) {
    lines.push({
      beneficiary: "EVALUATOR",
      beneficiaryId: input.evaluatorId,
      amount: money(evaluatorCents, currency),
    });
  }

  return {
    commissionAmount: money(commissionCents, currency),
    sellerAmount: money(grossCents - commissionCents, currency),
    lines,
  };
}
