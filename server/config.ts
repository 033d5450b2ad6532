import { z } from "zod";
import { FEE_TIERS, type FeeTier } from "@shared/schema";

export type FeeTierRates = Record<FeeTier, string>;

export const DEFAULT_FEE_TIER_RATES: FeeTierRates = {
  standard: "0.10",
  vip: "0.05",
  team: "0",
};

/**
 * Parses "standard:0.10,vip:0.05,team:0". Tiers left out keep their default rate.
 */
export function parseFeeTierRates(raw: string | undefined): FeeTierRates {
  const rates: FeeTierRates = { ...DEFAULT_FEE_TIER_RATES };
  if (!raw || raw.trim() === "") return rates;

  for (const entry of raw.split(",")) {
    const [name, value] = entry.split(":").map(part => part.trim());
    const tier = FEE_TIERS.find(t => t === name);
    if (!tier) {
      throw new Error(`Unknown fee tier in FEE_TIER_RATES: "${name}"`);
    }
    const rate = Number(value);
    if (value === undefined || value === "" || !Number.isFinite(rate) || rate < 0 || rate > 1) {
      throw new Error(`Invalid fee rate for tier "${tier}": "${value}" (expected 0..1)`);
    }
    rates[tier] = value;
  }
  return rates;
}

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: z.string().optional(),
  ENCRYPTION_KEY: z.string().optional(),
  STRIPE_SECRET_KEY: z.string().optional(),
  STRIPE_WEBHOOK_SECRET: z.string().optional(),
  ADMIN_PASSWORD: z.string().optional(),
  PUBLIC_BASE_URL: z.string().url().default("http://localhost:5000"),

  BILLING_CYCLE_DAYS: z.coerce.number().positive().default(30),
  BILLING_CHECK_INTERVAL_MINUTES: z.coerce.number().positive().default(60),
  BALANCE_CHECK_INTERVAL_MINUTES: z.coerce.number().positive().default(60),
  BALANCE_CHECK_STARTUP_DELAY_SECONDS: z.coerce.number().min(0).default(30),
  BALANCE_CHECK_THRESHOLD_USD: z.coerce.number().min(0).default(10),
  TRADE_LOOKBACK_DAYS: z.coerce.number().positive().default(30),
  TRADE_DEDUP_TOLERANCE_SECONDS: z.coerce.number().min(0).default(60),
  EXCHANGE_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  FEE_TIER_RATES: z.string().optional(),
});

export interface AppConfig {
  env: "development" | "production" | "test";
  port: number;
  databaseUrl: string | undefined;
  encryptionKey: string | undefined;
  stripeSecretKey: string | undefined;
  stripeWebhookSecret: string | undefined;
  adminPassword: string | undefined;
  publicBaseUrl: string;
  billing: {
    cycleDays: number;
    checkIntervalMs: number;
    feeTierRates: FeeTierRates;
  };
  balanceCheck: {
    intervalMs: number;
    startupDelayMs: number;
    thresholdUsd: number;
  };
  tradeReconciliation: {
    lookbackDays: number;
    dedupToleranceMs: number;
  };
  exchange: {
    timeoutMs: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = result.data;

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    encryptionKey: e.ENCRYPTION_KEY,
    stripeSecretKey: e.STRIPE_SECRET_KEY,
    stripeWebhookSecret: e.STRIPE_WEBHOOK_SECRET,
    adminPassword: e.ADMIN_PASSWORD,
    publicBaseUrl: e.PUBLIC_BASE_URL,
    billing: {
      cycleDays: e.BILLING_CYCLE_DAYS,
      checkIntervalMs: e.BILLING_CHECK_INTERVAL_MINUTES * 60 * 1000,
      feeTierRates: parseFeeTierRates(e.FEE_TIER_RATES),
    },
    balanceCheck: {
      intervalMs: e.BALANCE_CHECK_INTERVAL_MINUTES * 60 * 1000,
      startupDelayMs: e.BALANCE_CHECK_STARTUP_DELAY_SECONDS * 1000,
      thresholdUsd: e.BALANCE_CHECK_THRESHOLD_USD,
    },
    tradeReconciliation: {
      lookbackDays: e.TRADE_LOOKBACK_DAYS,
      dedupToleranceMs: e.TRADE_DEDUP_TOLERANCE_SECONDS * 1000,
    },
    exchange: {
      timeoutMs: e.EXCHANGE_TIMEOUT_MS,
    },
  };
}
