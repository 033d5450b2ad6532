import type { FollowerUser, PortfolioTransaction, TransactionType } from "@shared/schema";
import type { LedgerOperations, LedgerStore } from "../../storage";
import type { BillingEvents } from "../billingEvents";
import type { CredentialVault, ExchangeCredentials } from "../encryptionService";
import { NotFoundError, ValidationError, errorMessage } from "../errors";
import type { ExchangeGateway } from "../exchange/krakenGateway";
import {
  Decimal, ZERO, formatUsd, sumDecimals, toCurrencyString, toDecimal, type MoneyInput,
} from "../billing/money";

const ROI_LIMIT_PERCENT = 10000;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface BalanceCheckResult {
  userId: string;
  expectedBalance: string;
  currentBalance: string;
  difference: string;
  transaction: PortfolioTransaction | null;
}

export interface BalanceCheckSummary {
  checked: number;
  transactions: number;
  skipped: number;
}

export interface BalanceSummary {
  initialCapital: string;
  totalDeposits: string;
  totalWithdrawals: string;
  netDeposits: string;
  totalCapital: string;
  totalProfit: string;
  tradeCount: number;
  currentValue: string;
  roiOnInitial: number;
  roiOnTotal: number;
  lastKnownBalance: string | null;
  lastBalanceCheck: Date | null;
}

export interface TradePerformance {
  status: "ok";
  period: string;
  totalProfit: string;
  totalTrades: number;
  winCount: number;
  lossCount: number;
  winRate: number;
  profitFactor: number;
  grossWins: string;
  grossLosses: string;
  bestTrade: string;
  worstTrade: string;
  avgWin: string;
  avgLoss: string;
  avgRiskReward: number;
  maxDrawdown: number;
  roiOnInitial: number;
}

export type PerformanceStats =
  | TradePerformance
  | { status: "not_initialized" }
  | { status: "no_data"; period: string };

export type PortfolioInitialization =
  | { status: "initialized"; initialCapital: string; startedAt: Date }
  | { status: "already_initialized"; initialCapital: string; startedAt: Date | null };

export interface BalanceReconcilerOptions {
  thresholdUsd: number;
}

export interface BalanceReconcilerDeps {
  store: LedgerStore;
  gateway: ExchangeGateway;
  vault: CredentialVault;
  events: BillingEvents;
  options: BalanceReconcilerOptions;
  clock?: () => Date;
}

function clampRoi(value: Decimal): number {
  const clamped = Decimal.max(-ROI_LIMIT_PERCENT, Decimal.min(ROI_LIMIT_PERCENT, value));
  return clamped.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
}

function roundTo(value: Decimal, places: number): number {
  return value.toDecimalPlaces(places, Decimal.ROUND_HALF_UP).toNumber();
}

/**
 * Largest fall from a running peak of cumulative P&L, as a percent of that
 * peak. Nothing counts as drawdown until the curve has been above zero.
 */
export function maxDrawdownPercent(profits: Decimal[]): Decimal {
  let equity = ZERO;
  let peak = ZERO;
  let worst = ZERO;
  for (const profit of profits) {
    equity = equity.plus(profit);
    if (equity.gt(peak)) peak = equity;
    if (peak.gt(0)) {
      worst = Decimal.max(worst, peak.minus(equity).div(peak).times(100));
    }
  }
  return worst;
}

/**
 * Baseline the next expectation is built on. Before the first check the
 * initial capital stands in for the last observed balance.
 */
function balanceBaseline(user: FollowerUser): Decimal {
  return user.last_known_balance !== null
    ? toDecimal(user.last_known_balance)
    : toDecimal(user.initial_capital);
}

/**
 * BalanceReconcilerService - detects deposits and withdrawals
 *
 * expected = last known balance + Σ P&L of trades exited since the last check
 *
 * A gap between the exchange balance and the expectation larger than the
 * threshold is capital that moved outside trading. Every check re-anchors
 * the last known balance so the same gap is never reported twice.
 */
export class BalanceReconcilerService {
  private readonly store: LedgerStore;
  private readonly gateway: ExchangeGateway;
  private readonly vault: CredentialVault;
  private readonly events: BillingEvents;
  private readonly threshold: Decimal;
  private readonly clock: () => Date;

  constructor(deps: BalanceReconcilerDeps) {
    this.store = deps.store;
    this.gateway = deps.gateway;
    this.vault = deps.vault;
    this.events = deps.events;
    this.threshold = new Decimal(deps.options.thresholdUsd);
    this.clock = deps.clock ?? (() => new Date());
  }

  async checkAllUsers(): Promise<BalanceCheckSummary> {
    const summary: BalanceCheckSummary = { checked: 0, transactions: 0, skipped: 0 };

    const missing = await this.store.getMissingTables();
    if (missing.length > 0) {
      console.warn(`[BalanceCheck] ⚠️ Ledger tables missing (${missing.join(", ")}), skipping balance check`);
      return summary;
    }

    if (!this.vault.isConfigured()) {
      console.error("[BalanceCheck] ❌ ENCRYPTION_KEY not configured - balance reconciliation is disabled");
      return summary;
    }

    const users = await this.store.getUsersForBalanceCheck();
    console.log(`[BalanceCheck] 🔍 Checking balances for ${users.length} users`);

    for (const user of users) {
      let credentials: ExchangeCredentials;
      try {
        credentials = this.vault.decrypt(user.kraken_api_key_encrypted, user.kraken_api_secret_encrypted);
      } catch (error) {
        summary.skipped++;
        console.error(`[BalanceCheck] ❌ Could not decrypt credentials for ${user.email}: ${errorMessage(error)}`);
        continue;
      }

      let currentBalance: number;
      try {
        currentBalance = await this.gateway.getBalance(credentials);
      } catch (error) {
        summary.skipped++;
        console.error(`[BalanceCheck] ❌ Balance fetch failed for ${user.email}: ${errorMessage(error)}`);
        continue;
      }

      try {
        const result = await this.checkUserBalance(user.id, currentBalance);
        summary.checked++;
        if (result.transaction) summary.transactions++;
      } catch (error) {
        summary.skipped++;
        console.error(`[BalanceCheck] ❌ Balance check failed for ${user.email}: ${errorMessage(error)}`);
      }
    }

    console.log(
      `[BalanceCheck] ✅ Done: ${summary.checked} checked, ${summary.transactions} transactions, ${summary.skipped} skipped`,
    );
    return summary;
  }

  async calculateExpectedBalance(userId: string): Promise<Decimal> {
    const user = await this.store.getUser(userId);
    if (!user) {
      throw new NotFoundError(`User ${userId} not found`);
    }
    return await this.expectedBalanceFor(this.store, user);
  }

  private async expectedBalanceFor(ops: LedgerOperations, user: FollowerUser): Promise<Decimal> {
    const profits = await ops.getTradeProfitsSince(user.id, user.last_balance_check);
    return balanceBaseline(user).plus(sumDecimals(profits));
  }

  async checkUserBalance(userId: string, currentBalance: MoneyInput): Promise<BalanceCheckResult> {
    const current = toDecimal(currentBalance);

    const result = await this.store.withUserLock(userId, async (ops): Promise<BalanceCheckResult> => {
      const user = await ops.getUser(userId);
      if (!user) {
        throw new NotFoundError(`User ${userId} not found`);
      }

      const expected = await this.expectedBalanceFor(ops, user);
      const difference = current.minus(expected);
      const now = this.clock();

      let transaction: PortfolioTransaction | null = null;
      if (difference.abs().gt(this.threshold)) {
        const type: TransactionType = difference.gt(0) ? "deposit" : "withdrawal";
        transaction = await ops.recordTransaction({
          user_id: userId,
          transaction_type: type,
          amount: toCurrencyString(difference.abs()),
          balance_before: toCurrencyString(expected),
          balance_after: toCurrencyString(current),
          detection_method: "automatic",
          notes: `Detected by balance check: expected ${formatUsd(expected)}, found ${formatUsd(current)}`,
        });
        const icon = type === "deposit" ? "💵" : "💸";
        console.log(`[BalanceCheck] ${icon} ${user.email}: ${type} of ${formatUsd(difference.abs())} detected`);
      }

      await ops.updateBalance(userId, toCurrencyString(current), now);

      return {
        userId,
        expectedBalance: toCurrencyString(expected),
        currentBalance: toCurrencyString(current),
        difference: toCurrencyString(difference),
        transaction,
      };
    });

    if (result.transaction) {
      this.events.emit("transactionDetected", {
        userId,
        type: result.transaction.transaction_type,
        amount: result.transaction.amount,
        balanceBefore: result.expectedBalance,
        balanceAfter: result.currentBalance,
      });
    }
    return result;
  }

  async getBalanceSummary(userId: string): Promise<BalanceSummary | undefined> {
    const user = await this.store.getUser(userId);
    if (!user) return undefined;

    let initial = toDecimal(user.initial_capital);
    if (initial.lte(0)) {
      console.warn(`[BalanceCheck] ⚠️ ${user.email} has invalid initial_capital ${initial.toString()}, using 1`);
      initial = new Decimal(1);
    }

    const deposits = toDecimal(user.total_deposits);
    const withdrawals = toDecimal(user.total_withdrawals);
    const netDeposits = deposits.minus(withdrawals);

    let totalCapital = initial.plus(netDeposits);
    if (totalCapital.lte(0)) {
      console.warn(`[BalanceCheck] ⚠️ ${user.email} has invalid total capital ${totalCapital.toString()}, using initial capital`);
      totalCapital = initial;
    }

    const totals = await this.store.getTradeTotals(userId);
    const profit = toDecimal(totals.totalProfit);

    return {
      initialCapital: toCurrencyString(initial),
      totalDeposits: toCurrencyString(deposits),
      totalWithdrawals: toCurrencyString(withdrawals),
      netDeposits: toCurrencyString(netDeposits),
      totalCapital: toCurrencyString(totalCapital),
      totalProfit: toCurrencyString(profit),
      tradeCount: totals.tradeCount,
      currentValue: toCurrencyString(totalCapital.plus(profit)),
      roiOnInitial: clampRoi(profit.div(initial).times(100)),
      roiOnTotal: clampRoi(profit.div(totalCapital).times(100)),
      lastKnownBalance: user.last_known_balance,
      lastBalanceCheck: user.last_balance_check,
    };
  }

  /**
   * Win/loss statistics over trades exited in the last `periodDays` days, or
   * over every trade when null. Built from trade P&L only, so deposits and
   * withdrawals never move them. A trade wins when its profit is positive.
   */
  async getPerformanceStats(userId: string, periodDays: number | null): Promise<PerformanceStats> {
    const user = await this.store.getUser(userId);
    if (!user) {
      throw new NotFoundError(`User ${userId} not found`);
    }
    const initial = toDecimal(user.initial_capital);
    if (!user.portfolio_started_at && initial.lte(0)) {
      return { status: "not_initialized" };
    }

    const period = periodDays === null ? "All-Time" : `${periodDays}-Day`;
    const since = periodDays === null ? null : new Date(this.clock().getTime() - periodDays * DAY_MS);
    const trades = await this.store.getClosedTrades(userId, since);
    if (trades.length === 0) {
      return { status: "no_data", period };
    }

    const profits = trades.map(t => toDecimal(t.profit_usd));
    const wins = profits.filter(p => p.gt(0));
    const losses = profits.filter(p => p.lte(0));
    const totalProfit = sumDecimals(profits);
    const grossWins = sumDecimals(wins);
    const grossLosses = sumDecimals(losses).abs();
    const avgWin = wins.length > 0 ? grossWins.div(wins.length) : ZERO;
    const avgLoss = losses.length > 0 ? grossLosses.div(losses.length) : ZERO;

    return {
      status: "ok",
      period,
      totalProfit: toCurrencyString(totalProfit),
      totalTrades: trades.length,
      winCount: wins.length,
      lossCount: losses.length,
      winRate: roundTo(new Decimal(wins.length).div(trades.length).times(100), 1),
      profitFactor: grossLosses.gt(0) ? roundTo(grossWins.div(grossLosses), 2) : 0,
      grossWins: toCurrencyString(grossWins),
      grossLosses: toCurrencyString(grossLosses),
      bestTrade: toCurrencyString(wins.length > 0 ? Decimal.max(...wins) : ZERO),
      worstTrade: toCurrencyString(losses.length > 0 ? Decimal.min(...losses) : ZERO),
      avgWin: toCurrencyString(avgWin),
      avgLoss: toCurrencyString(avgLoss),
      avgRiskReward: avgLoss.gt(0) ? roundTo(avgWin.div(avgLoss), 2) : 0,
      maxDrawdown: roundTo(maxDrawdownPercent(profits), 1),
      roiOnInitial: initial.gt(0) ? clampRoi(totalProfit.div(initial).times(100)) : 0,
    };
  }

  /**
   * Deposit or withdrawal entered by hand. Moves the last known balance by
   * the same amount so the next automatic check does not report it again.
   */
  async recordManualTransaction(
    userId: string,
    type: TransactionType,
    amount: MoneyInput,
    notes?: string,
  ): Promise<PortfolioTransaction> {
    const value = toDecimal(amount);
    if (value.lte(0)) {
      throw new ValidationError("Amount must be positive");
    }

    return await this.store.withUserLock(userId, async (ops) => {
      const user = await ops.getUser(userId);
      if (!user) {
        throw new NotFoundError(`User ${userId} not found`);
      }

      const before = user.last_known_balance !== null ? toDecimal(user.last_known_balance) : null;
      const after = before === null ? null : type === "deposit" ? before.plus(value) : before.minus(value);

      const transaction = await ops.recordTransaction({
        user_id: userId,
        transaction_type: type,
        amount: toCurrencyString(value),
        balance_before: before === null ? null : toCurrencyString(before),
        balance_after: after === null ? null : toCurrencyString(after),
        detection_method: "manual",
        notes: notes ?? null,
      });

      if (after !== null) {
        await ops.updatePortfolio(userId, { last_known_balance: toCurrencyString(after) });
      }
      console.log(`[BalanceCheck] ✍️ ${user.email}: manual ${type} of ${formatUsd(value)}`);
      return transaction;
    });
  }

  async getTransactionHistory(userId: string, limit: number = 50): Promise<PortfolioTransaction[]> {
    return await this.store.getTransactions(userId, limit);
  }

  /**
   * Sets the starting capital once. The balance check anchors on it until
   * the first exchange balance is observed.
   */
  async initializePortfolio(userId: string, initialCapital: MoneyInput): Promise<PortfolioInitialization> {
    const capital = toDecimal(initialCapital);
    if (capital.lte(0)) {
      throw new ValidationError("Initial capital must be positive");
    }

    return await this.store.withUserLock(userId, async (ops): Promise<PortfolioInitialization> => {
      const user = await ops.getUser(userId);
      if (!user) {
        throw new NotFoundError(`User ${userId} not found`);
      }
      if (user.portfolio_started_at || toDecimal(user.initial_capital).gt(ZERO)) {
        return {
          status: "already_initialized",
          initialCapital: toCurrencyString(user.initial_capital),
          startedAt: user.portfolio_started_at,
        };
      }

      const now = this.clock();
      await ops.updatePortfolio(userId, {
        initial_capital: toCurrencyString(capital),
        portfolio_started_at: now,
      });
      await ops.updateBalance(userId, toCurrencyString(capital), now);
      console.log(`[BalanceCheck] 🏁 ${user.email}: portfolio initialized with ${formatUsd(capital)}`);
      return { status: "initialized", initialCapital: toCurrencyString(capital), startedAt: now };
    });
  }
}
