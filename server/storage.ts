import { eq, asc, desc, and, sql, gt, gte, lt, isNull, isNotNull, notInArray } from "drizzle-orm";
import type { PgDatabase } from "drizzle-orm/pg-core";
import type { NeonQueryResultHKT } from "drizzle-orm/neon-serverless";
import * as schema from "@shared/schema";
import type {
  FollowerUser,
  BillingCycle, InsertBillingCycle,
  BillingInvoice, InsertBillingInvoice, InvoiceStatus,
  PortfolioTrade, InsertPortfolioTrade,
  PortfolioTransaction, InsertPortfolioTransaction,
} from "@shared/schema";
import type { LedgerDatabase } from "./db";

export interface CycleStateUpdate {
  billing_cycle_start?: Date | null;
  current_cycle_profit?: string;
  current_cycle_trades?: number;
  current_cycle_fees?: string;
  pending_invoice_id?: string | null;
  pending_invoice_amount?: string;
  fee_tier?: string | null;
  next_cycle_fee_tier?: string | null;
}

/** Added to both the lifetime and the open-cycle totals of a user. */
export interface TradeTotalsDelta {
  profit: string;
  trades: number;
  fees: string;
}

export interface PortfolioUpdate {
  initial_capital?: string;
  last_known_balance?: string | null;
  portfolio_started_at?: Date | null;
  agent_active?: boolean;
}

export interface TradeTotals {
  totalProfit: string;
  tradeCount: number;
}

export interface InvoiceStatusTotals {
  status: InvoiceStatus;
  count: number;
  total: string;
}

export interface TierCount {
  tier: string | null;
  count: number;
}

/** Per-user reads and writes. Inside `withUserLock` these run in one transaction. */
export interface LedgerOperations {
  getUser(id: string): Promise<FollowerUser | undefined>;
  getUserByApiKey(apiKey: string): Promise<FollowerUser | undefined>;

  // Billing cycle state
  updateCycleState(userId: string, update: CycleStateUpdate): Promise<void>;
  recordCycleResult(cycle: InsertBillingCycle): Promise<BillingCycle>;
  getBillingCycles(userId: string, limit?: number): Promise<BillingCycle[]>;
  getBillingCycle(id: string): Promise<BillingCycle | undefined>;

  // Invoices
  createInvoice(invoice: InsertBillingInvoice): Promise<BillingInvoice>;
  getInvoiceByChargeId(chargeId: string): Promise<BillingInvoice | undefined>;
  /** Moves a pending invoice to `status`; returns undefined when the invoice was not pending. */
  settleInvoice(chargeId: string, status: Exclude<InvoiceStatus, "pending">, at: Date): Promise<BillingInvoice | undefined>;
  addFeesPaid(userId: string, amount: string): Promise<void>;

  // Trades
  recordTrade(trade: InsertPortfolioTrade): Promise<PortfolioTrade>;
  addTradeTotals(userId: string, delta: TradeTotalsDelta): Promise<void>;
  /** A trade of the same symbol exited strictly within `toleranceMs`, ignoring `excludeIds`. */
  findTradeNear(
    userId: string,
    symbol: string,
    exitTime: Date,
    toleranceMs: number,
    excludeIds?: string[],
  ): Promise<PortfolioTrade | undefined>;
  /** Profit of trades exited strictly after `since`, or of every trade when `since` is null. */
  getTradeProfitsSince(userId: string, since: Date | null): Promise<string[]>;
  getTradeTotals(userId: string): Promise<TradeTotals>;
  /** Trades exited at or after `since` (all when null), oldest exit first. */
  getClosedTrades(userId: string, since: Date | null): Promise<PortfolioTrade[]>;

  // Portfolio
  /** Inserts the transaction and bumps total_deposits / total_withdrawals. */
  recordTransaction(transaction: InsertPortfolioTransaction): Promise<PortfolioTransaction>;
  getTransactions(userId: string, limit?: number): Promise<PortfolioTransaction[]>;
  updateBalance(userId: string, balance: string, checkedAt: Date): Promise<void>;
  updatePortfolio(userId: string, update: PortfolioUpdate): Promise<void>;
}

export interface LedgerStore extends LedgerOperations {
  /** Ledger tables that do not exist yet (empty when fully provisioned). */
  getMissingTables(): Promise<string[]>;

  /** access_granted, credentials_set, cycle started, no pending invoice. */
  getUsersDueForBilling(): Promise<FollowerUser[]>;
  /** agent_active, credentials_set, initial_capital > 0. */
  getUsersForBalanceCheck(): Promise<FollowerUser[]>;
  /** credentials_set with an encrypted key on file. */
  getUsersWithCredentials(): Promise<FollowerUser[]>;

  // Admin reporting
  getInvoiceTotals(): Promise<InvoiceStatusTotals[]>;
  getUserCountsByTier(): Promise<TierCount[]>;

  /** Runs `work` in a transaction holding the user's row lock. */
  withUserLock<T>(userId: string, work: (ops: LedgerOperations) => Promise<T>): Promise<T>;
}

type LedgerExecutor = PgDatabase<NeonQueryResultHKT, typeof schema>;

const users = schema.follower_users;

class DbLedgerOperations implements LedgerOperations {
  constructor(protected readonly executor: LedgerExecutor) {}

  async getUser(id: string): Promise<FollowerUser | undefined> {
    const [user] = await this.executor.select().from(users).where(eq(users.id, id));
    return user;
  }

  async getUserByApiKey(apiKey: string): Promise<FollowerUser | undefined> {
    const [user] = await this.executor.select().from(users).where(eq(users.api_key, apiKey));
    return user;
  }

  // ===== BILLING CYCLES =====
  async updateCycleState(userId: string, update: CycleStateUpdate): Promise<void> {
    await this.executor
      .update(users)
      .set({ ...update, updated_at: new Date() })
      .where(eq(users.id, userId));
  }

  async recordCycleResult(cycle: InsertBillingCycle): Promise<BillingCycle> {
    const [created] = await this.executor.insert(schema.billing_cycles).values(cycle).returning();
    return created;
  }

  async getBillingCycles(userId: string, limit: number = 50): Promise<BillingCycle[]> {
    return await this.executor.select().from(schema.billing_cycles)
      .where(eq(schema.billing_cycles.user_id, userId))
      .orderBy(desc(schema.billing_cycles.created_at))
      .limit(limit);
  }

  async getBillingCycle(id: string): Promise<BillingCycle | undefined> {
    const [cycle] = await this.executor.select().from(schema.billing_cycles)
      .where(eq(schema.billing_cycles.id, id));
    return cycle;
  }

  // ===== INVOICES =====
  async createInvoice(invoice: InsertBillingInvoice): Promise<BillingInvoice> {
    const [created] = await this.executor.insert(schema.billing_invoices).values(invoice).returning();
    return created;
  }

  async getInvoiceByChargeId(chargeId: string): Promise<BillingInvoice | undefined> {
    const [invoice] = await this.executor.select().from(schema.billing_invoices)
      .where(eq(schema.billing_invoices.charge_id, chargeId));
    return invoice;
  }

  async settleInvoice(
    chargeId: string,
    status: Exclude<InvoiceStatus, "pending">,
    at: Date,
  ): Promise<BillingInvoice | undefined> {
    const [updated] = await this.executor.update(schema.billing_invoices)
      .set(status === "paid"
        ? { status, paid_at: at }
        : status === "expired" ? { status, expired_at: at } : { status, cancelled_at: at })
      .where(and(
        eq(schema.billing_invoices.charge_id, chargeId),
        eq(schema.billing_invoices.status, "pending"),
      ))
      .returning();
    return updated;
  }

  async addFeesPaid(userId: string, amount: string): Promise<void> {
    await this.executor.update(users)
      .set({
        total_fees_paid: sql`${users.total_fees_paid} + ${amount}::numeric`,
        updated_at: new Date(),
      })
      .where(eq(users.id, userId));
  }

  // ===== TRADES =====
  async recordTrade(trade: InsertPortfolioTrade): Promise<PortfolioTrade> {
    const [created] = await this.executor.insert(schema.portfolio_trades).values(trade).returning();
    return created;
  }

  async addTradeTotals(userId: string, delta: TradeTotalsDelta): Promise<void> {
    await this.executor.update(users)
      .set({
        total_profit: sql`${users.total_profit} + ${delta.profit}::numeric`,
        total_trades: sql`${users.total_trades} + ${delta.trades}`,
        total_fees: sql`${users.total_fees} + ${delta.fees}::numeric`,
        current_cycle_profit: sql`${users.current_cycle_profit} + ${delta.profit}::numeric`,
        current_cycle_trades: sql`${users.current_cycle_trades} + ${delta.trades}`,
        current_cycle_fees: sql`${users.current_cycle_fees} + ${delta.fees}::numeric`,
        updated_at: new Date(),
      })
      .where(eq(users.id, userId));
  }

  async findTradeNear(
    userId: string,
    symbol: string,
    exitTime: Date,
    toleranceMs: number,
    excludeIds: string[] = [],
  ): Promise<PortfolioTrade | undefined> {
    const trades = schema.portfolio_trades;
    const [match] = await this.executor.select().from(trades)
      .where(and(
        eq(trades.user_id, userId),
        eq(trades.symbol, symbol),
        gt(trades.exit_time, new Date(exitTime.getTime() - toleranceMs)),
        lt(trades.exit_time, new Date(exitTime.getTime() + toleranceMs)),
        excludeIds.length > 0 ? notInArray(trades.id, excludeIds) : undefined,
      ))
      .limit(1);
    return match;
  }

  async getTradeProfitsSince(userId: string, since: Date | null): Promise<string[]> {
    const trades = schema.portfolio_trades;
    const rows = await this.executor.select({ profit: trades.profit_usd }).from(trades)
      .where(since
        ? and(eq(trades.user_id, userId), gt(trades.exit_time, since))
        : eq(trades.user_id, userId));
    return rows.map(r => r.profit);
  }

  async getTradeTotals(userId: string): Promise<TradeTotals> {
    const trades = schema.portfolio_trades;
    const [row] = await this.executor.select({
      totalProfit: sql<string>`COALESCE(SUM(${trades.profit_usd}), 0)::text`,
      tradeCount: sql<number>`COUNT(*)::int`,
    }).from(trades).where(eq(trades.user_id, userId));
    return row ?? { totalProfit: "0", tradeCount: 0 };
  }

  async getClosedTrades(userId: string, since: Date | null): Promise<PortfolioTrade[]> {
    const trades = schema.portfolio_trades;
    return await this.executor.select().from(trades)
      .where(since
        ? and(eq(trades.user_id, userId), gte(trades.exit_time, since))
        : eq(trades.user_id, userId))
      .orderBy(asc(trades.exit_time));
  }

  // ===== PORTFOLIO =====
  async recordTransaction(transaction: InsertPortfolioTransaction): Promise<PortfolioTransaction> {
    const [created] = await this.executor.insert(schema.portfolio_transactions).values(transaction).returning();

    await this.executor.update(users)
      .set(transaction.transaction_type === "deposit"
        ? { total_deposits: sql`${users.total_deposits} + ${transaction.amount}::numeric`, updated_at: new Date() }
        : { total_withdrawals: sql`${users.total_withdrawals} + ${transaction.amount}::numeric`, updated_at: new Date() })
      .where(eq(users.id, transaction.user_id));

    return created;
  }

  async getTransactions(userId: string, limit: number = 50): Promise<PortfolioTransaction[]> {
    return await this.executor.select().from(schema.portfolio_transactions)
      .where(eq(schema.portfolio_transactions.user_id, userId))
      .orderBy(desc(schema.portfolio_transactions.created_at))
      .limit(limit);
  }

  async updateBalance(userId: string, balance: string, checkedAt: Date): Promise<void> {
    await this.executor.update(users)
      .set({
        last_known_balance: balance,
        last_balance_check: checkedAt,
        updated_at: new Date(),
      })
      .where(eq(users.id, userId));
  }

  async updatePortfolio(userId: string, update: PortfolioUpdate): Promise<void> {
    await this.executor.update(users)
      .set({ ...update, updated_at: new Date() })
      .where(eq(users.id, userId));
  }
}

export class DbLedgerStore extends DbLedgerOperations implements LedgerStore {
  constructor(private readonly db: LedgerDatabase) {
    super(db);
  }

  async getMissingTables(): Promise<string[]> {
    const result = await this.db.execute<{ table_name: string }>(sql`
      SELECT table_name FROM information_schema.tables
      WHERE table_schema = current_schema()
      AND table_name IN (${sql.join(schema.LEDGER_TABLES.map(t => sql`${t}`), sql`, `)})
    `);
    const present = new Set(result.rows.map(r => r.table_name));
    return schema.LEDGER_TABLES.filter(t => !present.has(t));
  }

  async getUsersDueForBilling(): Promise<FollowerUser[]> {
    return await this.db.select().from(users)
      .where(and(
        eq(users.access_granted, true),
        eq(users.credentials_set, true),
        isNotNull(users.billing_cycle_start),
        isNull(users.pending_invoice_id),
      ))
      .orderBy(users.billing_cycle_start);
  }

  async getUsersForBalanceCheck(): Promise<FollowerUser[]> {
    return await this.db.select().from(users)
      .where(and(
        eq(users.agent_active, true),
        eq(users.credentials_set, true),
        gt(users.initial_capital, "0"),
      ));
  }

  async getUsersWithCredentials(): Promise<FollowerUser[]> {
    return await this.db.select().from(users)
      .where(and(
        eq(users.credentials_set, true),
        isNotNull(users.kraken_api_key_encrypted),
      ));
  }

  async getInvoiceTotals(): Promise<InvoiceStatusTotals[]> {
    const invoices = schema.billing_invoices;
    return await this.db.select({
      status: invoices.status,
      count: sql<number>`COUNT(*)::int`,
      total: sql<string>`COALESCE(SUM(${invoices.amount_usd}), 0)::text`,
    }).from(invoices).groupBy(invoices.status);
  }

  async getUserCountsByTier(): Promise<TierCount[]> {
    return await this.db.select({
      tier: users.fee_tier,
      count: sql<number>`COUNT(*)::int`,
    }).from(users).groupBy(users.fee_tier);
  }

  async withUserLock<T>(userId: string, work: (ops: LedgerOperations) => Promise<T>): Promise<T> {
    return await this.db.transaction(async (tx) => {
      await tx.select({ id: users.id }).from(users)
        .where(eq(users.id, userId))
        .for("update");
      return await work(new DbLedgerOperations(tx));
    });
  }
}
