import { sql } from "drizzle-orm";
import { pgTable, text, varchar, timestamp, decimal, integer, boolean, index, uniqueIndex } from "drizzle-orm/pg-core";
import { z } from "zod";

export const FEE_TIERS = ["standard", "vip", "team"] as const;
export type FeeTier = typeof FEE_TIERS[number];

export const TRADE_SIDES = ["long", "short"] as const;
export type TradeSide = typeof TRADE_SIDES[number];

export const CYCLE_INVOICE_STATUSES = ["invoiced", "waived"] as const;
export type CycleInvoiceStatus = typeof CYCLE_INVOICE_STATUSES[number];

// expired: the checkout session lapsed and a new charge replaced it; cancelled: waived by an admin
export const INVOICE_STATUSES = ["pending", "paid", "expired", "cancelled"] as const;
export type InvoiceStatus = typeof INVOICE_STATUSES[number];

export const TRANSACTION_TYPES = ["deposit", "withdrawal"] as const;
export type TransactionType = typeof TRANSACTION_TYPES[number];

export const DETECTION_METHODS = ["automatic", "manual"] as const;
export type DetectionMethod = typeof DETECTION_METHODS[number];

export const TRADE_SOURCES = ["agent", "reconciliation"] as const;
export type TradeSource = typeof TRADE_SOURCES[number];

// Follower users - one row per subscriber, carries billing cycle and portfolio state
export const follower_users = pgTable("follower_users", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  email: varchar("email").notNull().unique(),
  api_key: varchar("api_key", { length: 64 }).notNull().unique(), // Agent key used by the follower agent to report trades

  // Fee tier: standard (10%), vip (5%), team (0%). Free text on purpose: unknown values bill as standard
  fee_tier: varchar("fee_tier", { length: 20 }).default("standard"),
  next_cycle_fee_tier: varchar("next_cycle_fee_tier", { length: 20 }), // Applied at the next cycle boundary

  access_granted: boolean("access_granted").default(true).notNull(),
  agent_active: boolean("agent_active").default(false).notNull(),
  credentials_set: boolean("credentials_set").default(false).notNull(),
  kraken_api_key_encrypted: text("kraken_api_key_encrypted"), // AES-256-GCM, see encryptionService
  kraken_api_secret_encrypted: text("kraken_api_secret_encrypted"),

  // ========== BILLING CYCLE (rolling 30 days) ==========
  billing_cycle_start: timestamp("billing_cycle_start"), // NULL = cycle never started
  current_cycle_profit: decimal("current_cycle_profit", { precision: 20, scale: 2 }).default("0").notNull(),
  current_cycle_trades: integer("current_cycle_trades").default(0).notNull(),
  current_cycle_fees: decimal("current_cycle_fees", { precision: 20, scale: 2 }).default("0").notNull(),
  pending_invoice_id: varchar("pending_invoice_id"), // External charge id while an invoice is outstanding
  pending_invoice_amount: decimal("pending_invoice_amount", { precision: 20, scale: 2 }).default("0").notNull(),

  // ========== LIFETIME TOTALS ==========
  total_profit: decimal("total_profit", { precision: 20, scale: 2 }).default("0").notNull(),
  total_trades: integer("total_trades").default(0).notNull(),
  total_fees: decimal("total_fees", { precision: 20, scale: 2 }).default("0").notNull(), // Accrued per trade
  total_fees_paid: decimal("total_fees_paid", { precision: 20, scale: 2 }).default("0").notNull(),

  // ========== PORTFOLIO / BALANCE TRACKING ==========
  initial_capital: decimal("initial_capital", { precision: 20, scale: 2 }).default("0").notNull(),
  last_known_balance: decimal("last_known_balance", { precision: 20, scale: 2 }),
  last_balance_check: timestamp("last_balance_check"),
  total_deposits: decimal("total_deposits", { precision: 20, scale: 2 }).default("0").notNull(),
  total_withdrawals: decimal("total_withdrawals", { precision: 20, scale: 2 }).default("0").notNull(),
  portfolio_started_at: timestamp("portfolio_started_at"),

  created_at: timestamp("created_at").defaultNow().notNull(),
  updated_at: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  index("idx_follower_users_billing").on(table.access_granted, table.credentials_set),
]);

export type InsertFollowerUser = typeof follower_users.$inferInsert;
export type FollowerUser = typeof follower_users.$inferSelect;

// Billing cycles - immutable record of every closed 30-day cycle
export const billing_cycles = pgTable("billing_cycles", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  user_id: varchar("user_id").notNull().references(() => follower_users.id, { onDelete: 'cascade' }),
  cycle_start: timestamp("cycle_start").notNull(),
  cycle_end: timestamp("cycle_end").notNull(),
  total_profit: decimal("total_profit", { precision: 20, scale: 2 }).notNull(),
  total_trades: integer("total_trades").default(0).notNull(),
  fee_tier: varchar("fee_tier", { length: 20 }).notNull(), // Tier the fee was computed with
  fee_percentage: decimal("fee_percentage", { precision: 5, scale: 4 }).notNull(), // 0.1000 = 10%
  fee_amount: decimal("fee_amount", { precision: 20, scale: 2 }).notNull(),
  invoice_status: varchar("invoice_status", { length: 20 }).$type<CycleInvoiceStatus>().notNull(),
  charge_id: varchar("charge_id"), // Set when invoiced
  created_at: timestamp("created_at").defaultNow().notNull(),
}, (table) => [
  index("idx_billing_cycles_user").on(table.user_id, table.created_at),
]);

export type InsertBillingCycle = typeof billing_cycles.$inferInsert;
export type BillingCycle = typeof billing_cycles.$inferSelect;

// Billing invoices - one row per external payment-provider charge. A cycle whose checkout
// session lapses gets a new row; at most one row per cycle is pending
export const billing_invoices = pgTable("billing_invoices", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  user_id: varchar("user_id").notNull().references(() => follower_users.id, { onDelete: 'cascade' }),
  cycle_id: varchar("cycle_id").references(() => billing_cycles.id),
  charge_id: varchar("charge_id").notNull(),
  amount_usd: decimal("amount_usd", { precision: 20, scale: 2 }).notNull(),
  profit_usd: decimal("profit_usd", { precision: 20, scale: 2 }).notNull(),
  status: varchar("status", { length: 20 }).$type<InvoiceStatus>().default("pending").notNull(),
  hosted_url: text("hosted_url"),
  paid_at: timestamp("paid_at"),
  expired_at: timestamp("expired_at"),
  cancelled_at: timestamp("cancelled_at"),
  created_at: timestamp("created_at").defaultNow().notNull(),
}, (table) => [
  uniqueIndex("uq_billing_invoices_charge").on(table.charge_id),
  index("idx_billing_invoices_cycle").on(table.cycle_id),
  index("idx_billing_invoices_user").on(table.user_id, table.status),
]);

export type InsertBillingInvoice = typeof billing_invoices.$inferInsert;
export type BillingInvoice = typeof billing_invoices.$inferSelect;

// Portfolio trades - completed round trips, reported by the agent or rebuilt from exchange fills
export const portfolio_trades = pgTable("portfolio_trades", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  user_id: varchar("user_id").notNull().references(() => follower_users.id, { onDelete: 'cascade' }),
  symbol: text("symbol").notNull(),
  side: varchar("side", { length: 10 }).$type<TradeSide>().notNull(),
  entry_price: decimal("entry_price", { precision: 20, scale: 8 }).notNull(),
  exit_price: decimal("exit_price", { precision: 20, scale: 8 }).notNull(),
  quantity: decimal("quantity", { precision: 20, scale: 8 }).notNull(),
  leverage: decimal("leverage", { precision: 6, scale: 2 }).default("1").notNull(),
  profit_usd: decimal("profit_usd", { precision: 20, scale: 2 }).notNull(),
  profit_percent: decimal("profit_percent", { precision: 10, scale: 4 }).notNull(),
  fee_charged: decimal("fee_charged", { precision: 20, scale: 2 }).default("0").notNull(),
  exit_type: varchar("exit_type", { length: 30 }),
  source: varchar("source", { length: 20 }).$type<TradeSource>().default("agent").notNull(),
  notes: text("notes"),
  entry_time: timestamp("entry_time").notNull(),
  exit_time: timestamp("exit_time").notNull(),
  created_at: timestamp("created_at").defaultNow().notNull(),
}, (table) => [
  index("idx_portfolio_trades_dedup").on(table.user_id, table.symbol, table.exit_time),
]);

export type InsertPortfolioTrade = typeof portfolio_trades.$inferInsert;
export type PortfolioTrade = typeof portfolio_trades.$inferSelect;

// Portfolio transactions - append-only deposits and withdrawals
export const portfolio_transactions = pgTable("portfolio_transactions", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  user_id: varchar("user_id").notNull().references(() => follower_users.id, { onDelete: 'cascade' }),
  transaction_type: varchar("transaction_type", { length: 20 }).$type<TransactionType>().notNull(),
  amount: decimal("amount", { precision: 20, scale: 2 }).notNull(), // Always positive, type carries direction
  balance_before: decimal("balance_before", { precision: 20, scale: 2 }),
  balance_after: decimal("balance_after", { precision: 20, scale: 2 }),
  detection_method: varchar("detection_method", { length: 20 }).$type<DetectionMethod>().notNull(),
  notes: text("notes"),
  created_at: timestamp("created_at").defaultNow().notNull(),
}, (table) => [
  index("idx_portfolio_transactions_user").on(table.user_id, table.created_at),
]);

export type InsertPortfolioTransaction = typeof portfolio_transactions.$inferInsert;
export type PortfolioTransaction = typeof portfolio_transactions.$inferSelect;

export const LEDGER_TABLES = [
  "follower_users",
  "billing_cycles",
  "billing_invoices",
  "portfolio_trades",
  "portfolio_transactions",
] as const;

// ========== REQUEST SCHEMAS ==========

export const tradeReportSchema = z.object({
  symbol: z.string().min(1),
  side: z.enum(TRADE_SIDES),
  entry_price: z.coerce.number().positive(),
  exit_price: z.coerce.number().positive(),
  quantity: z.coerce.number().positive(),
  leverage: z.coerce.number().positive().default(1),
  profit_usd: z.coerce.number(),
  profit_percent: z.coerce.number().optional(),
  entry_time: z.coerce.date(),
  exit_time: z.coerce.date(),
  exit_type: z.string().max(30).optional(),
  notes: z.string().optional(),
});
export type TradeReport = z.infer<typeof tradeReportSchema>;

export const manualTransactionSchema = z.object({
  type: z.enum(TRANSACTION_TYPES),
  amount: z.coerce.number().positive(),
  notes: z.string().max(500).optional(),
});
export type ManualTransactionRequest = z.infer<typeof manualTransactionSchema>;

export const tierChangeSchema = z.object({
  tier: z.enum(FEE_TIERS),
});

// "30d" style day counts or "all"
export const statsPeriodSchema = z.object({
  period: z.string()
    .regex(/^(all|[1-9]\d{0,3}d)$/i, "Expected a day count such as 30d, or all")
    .default("30d")
    .transform(p => p.toLowerCase() === "all" ? null : parseInt(p, 10)),
});
