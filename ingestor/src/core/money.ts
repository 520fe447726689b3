import { Money } from "./dto";
import { InvalidStateError } from "./errors";

const PLAIN_AMOUNT = /^\s*(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d+))?\s*$/;
const DISPLAY_AMOUNT =
  /\$\s*(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d+))?\s*(million|mil|m|k)?(?![\d,a-z])/i;

const SUFFIX_MULTIPLIER: Record<string, number> = {
  k: 1_000,
  m: 1_000_000,
  mil: 1_000_000,
  million: 1_000_000,
};

/**
 * Convert a decimal written as digits into cents without going through a
 * fractional float. Sub-cent digits round half up.
 */
function decimalToCents(whole: string, fraction = "", multiplier = 1): Money {
  const units = Number(whole.replace(/,/g, "")) * multiplier * 100;
  if (!fraction) return units;

  const scaled = (Number(fraction) * multiplier * 100) / 10 ** fraction.length;
  return units + Math.round(scaled);
}

/**
 * Parse a price as found in a source payload. Accepts numbers, plain
 * numeric strings ("750000", "750,000.50") and display strings
 * ("$750,000", "Offers over $1.2m", "$650k - $700k", first amount wins).
 * Anything without an amount ("Contact agent") is null.
 */
export function parseMoney(value: unknown): Money | null {
  if (typeof value === "number") {
    if (!Number.isFinite(value) || value < 0) return null;
    return parseMoney(String(value));
  }

  if (typeof value !== "string") return null;

  const plain = PLAIN_AMOUNT.exec(value);
  if (plain) {
    return decimalToCents(plain[1], plain[2]);
  }

  const display = DISPLAY_AMOUNT.exec(value);
  if (!display) return null;

  const suffix = display[3]?.toLowerCase();
  const multiplier = suffix ? SUFFIX_MULTIPLIER[suffix] ?? 1 : 1;
  return decimalToCents(display[1], display[2], multiplier);
}

/**
 * Render cents as a decimal string: "800000", "799999.50"
 */
export function formatMoney(amount: Money): string {
  const sign = amount < 0 ? "-" : "";
  const abs = Math.abs(amount);
  const whole = Math.trunc(abs / 100);
  const cents = abs % 100;

  return cents === 0
    ? `${sign}${whole}`
    : `${sign}${whole}.${String(cents).padStart(2, "0")}`;
}

export interface PriceDrop {
  dropAmount: Money;
  dropPercent: number; // two decimals, relative to the old price
}

export function computePriceDrop(oldPrice: Money, newPrice: Money): PriceDrop {
  if (oldPrice === 0) {
    throw new InvalidStateError(
      "Cannot compute a drop percentage against a zero base price"
    );
  }

  const dropAmount = oldPrice - newPrice;
  return {
    dropAmount,
    dropPercent: Math.round((dropAmount * 10000) / oldPrice) / 100,
  };
}
