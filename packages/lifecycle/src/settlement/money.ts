import type { Money } from "@chrono/shared";
import { InvalidAmountError } from "../errors.js";

const CENTS = 100n;
const RATE_SCALE = 1_000_000n;
const AMOUNT_PATTERN = /^\d+(\.\d{1,2})?$/;
const RATE_PATTERN = /^\d+(\.\d{1,6})?$/;

export function isAmount(value: unknown): value is string {
  return typeof value === "string" && AMOUNT_PATTERN.test(value);
}

export function toCents(amount: string): bigint {
  if (!isAmount(amount)) {
    throw new InvalidAmountError(`amount '${amount}' is not a decimal with at most two places`);
  }
  const [wholeRaw, fractionRaw = ""] = amount.split(".");
  return BigInt(wholeRaw) * CENTS + BigInt((fractionRaw + "00").slice(0, 2));
}

export function formatCents(cents: bigint): string {
  const abs = cents < 0n ? -cents : cents;
  const formatted = `${(abs / CENTS).toString()}.${(abs % CENTS).toString().padStart(2, "0")}`;
  return cents < 0n ? `-${formatted}` : formatted;
}

export function money(cents: bigint, currency: string): Money {
  return { amount: formatCents(cents), currency };
}

/** Validates and normalizes to two fraction digits ("100" -> "100.00"). */
export function normalizeMoney(value: Money): Money {
  const cents = toCents(value.amount);
  if (cents <= 0n) {
    throw new InvalidAmountError("amount must be greater than zero", { amount: value.amount });
  }
  if (!/^[A-Z]{3,5}$/.test(value.currency)) {
    throw new InvalidAmountError(`currency '${value.currency}' is not supported`);
  }
  return money(cents, value.currency);
}

export function toRateScaled(rate: string): bigint {
  if (!RATE_PATTERN.test(rate)) {
    throw new InvalidAmountError(`rate '${rate}' is not a decimal with at most six places`);
  }
  const [wholeRaw, fractionRaw = ""] = rate.split(".");
  return BigInt(wholeRaw) * RATE_SCALE + BigInt((fractionRaw + "000000").slice(0, 6));
}

/** cents * rate, rounded half up to the cent. Inputs are non-negative. */
export function applyRate(cents: bigint, rate: string): bigint {
  const scaled = cents * toRateScaled(rate);
  return (scaled + RATE_SCALE / 2n) / RATE_SCALE;
}
