import { FEE_TIERS, type FeeTier } from "@shared/schema";
import { DEFAULT_FEE_TIER_RATES, type FeeTierRates } from "../../config";
import { Decimal, ZERO, roundCurrency, toDecimal, type MoneyInput } from "./money";

const TIER_LABELS: Record<FeeTier, { icon: string; name: string }> = {
  standard: { icon: "👤", name: "Standard" },
  vip: { icon: "⭐", name: "VIP" },
  team: { icon: "🏠", name: "Team" },
};

/**
 * Tier names match exactly: "VIP" or " vip" are unknown and bill as
 * standard, as do unset and empty values.
 */
export function resolveFeeTier(tier: string | null | undefined): FeeTier {
  return FEE_TIERS.find(t => t === tier) ?? "standard";
}

export function isFeeTier(tier: string): tier is FeeTier {
  return FEE_TIERS.some(t => t === tier);
}

export function getFeeRate(
  tier: string | null | undefined,
  rates: FeeTierRates = DEFAULT_FEE_TIER_RATES,
): Decimal {
  return new Decimal(rates[resolveFeeTier(tier)]);
}

export function getTierDisplay(
  tier: string | null | undefined,
  rates: FeeTierRates = DEFAULT_FEE_TIER_RATES,
): string {
  const resolved = resolveFeeTier(tier);
  const label = TIER_LABELS[resolved];
  const percent = new Decimal(rates[resolved]).times(100).toDecimalPlaces(2).toString();
  return `${label.icon} ${label.name} (${percent}%)`;
}

/** Fee on profit: zero for non-positive profit, otherwise profit × rate rounded to cents. */
export function calculateProfitFee(profit: MoneyInput, rate: Decimal): Decimal {
  const p = toDecimal(profit);
  if (p.lte(0)) return ZERO;
  return roundCurrency(p.times(rate));
}
