import type { TradeSide } from "@shared/schema";
import type { LedgerStore } from "../../storage";
import type { BillingEvents } from "../billingEvents";
import type { CredentialVault } from "../encryptionService";
import { NotFoundError, errorMessage } from "../errors";
import type { ExchangeGateway, Fill } from "../exchange/krakenGateway";
import type { FeeTierRates } from "../../config";
import { calculateProfitFee, getFeeRate } from "../billing/feeTiers";
import { Decimal, ZERO, formatUsd, roundCurrency, toCurrencyString, toFixedString } from "../billing/money";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RoundTrip {
  symbol: string;
  side: TradeSide;
  entryPrice: Decimal;
  exitPrice: Decimal;
  quantity: Decimal;
  pnlUsd: Decimal;
  pnlPercent: Decimal;
  entryTime: Date;
  exitTime: Date;
  fee: Decimal;
}

interface OpenPosition {
  side: TradeSide;
  amount: Decimal;
  avgEntry: Decimal;
  entryTimes: number[];
}

function fillDirection(fill: Fill): TradeSide {
  return fill.side === "buy" ? "long" : "short";
}

/**
 * Replays fills per symbol through an open-position accumulator.
 *
 * A fill in the direction of the open position (or with nothing open)
 * extends it at the volume-weighted average entry. A fill against it closes
 * min(fill, open) as one round trip. When a closing fill is larger than the
 * open amount the rest opens a new position on the other side at the fill
 * price; the fill's fee is split pro rata and only the closing share is
 * carried on the round trip.
 */
export function pairFillsIntoRoundTrips(fills: Fill[]): RoundTrip[] {
  const positions = new Map<string, OpenPosition>();
  const roundTrips: RoundTrip[] = [];
  const sorted = [...fills].sort((a, b) => a.timestamp - b.timestamp);

  const extend = (symbol: string, side: TradeSide, amount: Decimal, price: Decimal, timestamp: number) => {
    const open = positions.get(symbol);
    if (!open) {
      positions.set(symbol, { side, amount, avgEntry: price, entryTimes: [timestamp] });
      return;
    }
    const total = open.amount.plus(amount);
    open.avgEntry = open.avgEntry.times(open.amount).plus(price.times(amount)).div(total);
    open.amount = total;
    open.entryTimes.push(timestamp);
  };

  for (const fill of sorted) {
    const amount = new Decimal(fill.amount);
    if (amount.lte(0)) continue;
    const price = new Decimal(fill.price);
    const direction = fillDirection(fill);
    const open = positions.get(fill.symbol);

    if (!open || open.side === direction) {
      extend(fill.symbol, direction, amount, price, fill.timestamp);
      continue;
    }

    const quantity = Decimal.min(amount, open.amount);
    const entryPrice = open.avgEntry;
    const pnlUsd = open.side === "long"
      ? price.minus(entryPrice).times(quantity)
      : entryPrice.minus(price).times(quantity);
    const pnlPercent = entryPrice.isZero()
      ? ZERO
      : pnlUsd.div(entryPrice.times(quantity)).times(100);

    roundTrips.push({
      symbol: fill.symbol,
      side: open.side,
      entryPrice,
      exitPrice: price,
      quantity,
      pnlUsd,
      pnlPercent,
      entryTime: new Date(open.entryTimes[0] ?? fill.timestamp),
      exitTime: new Date(fill.timestamp),
      fee: new Decimal(fill.fee).times(quantity).div(amount),
    });

    open.amount = open.amount.minus(quantity);
    if (open.amount.lte(0)) {
      positions.delete(fill.symbol);
    }

    const remainder = amount.minus(quantity);
    if (remainder.gt(0)) {
      extend(fill.symbol, direction, remainder, price, fill.timestamp);
    }
  }

  return roundTrips;
}

export interface BackfillResult {
  inserted: number;
  skipped: number;
  totalPnl: string;
  totalFees: string;
}

export interface UserReconciliationResult extends BackfillResult {
  userId: string;
  fills: number;
  roundTrips: number;
}

export interface ReconciliationSummary {
  users: number;
  failed: number;
  inserted: number;
  skipped: number;
  totalPnl: string;
  totalFees: string;
}

export interface TradeReconciliationOptions {
  lookbackDays: number;
  dedupToleranceMs: number;
  feeTierRates: FeeTierRates;
}

export interface TradeReconciliationDeps {
  store: LedgerStore;
  gateway: ExchangeGateway;
  vault: CredentialVault;
  events: BillingEvents;
  options: TradeReconciliationOptions;
  clock?: () => Date;
}

/**
 * TradeReconciliationService - rebuilds trade history from exchange fills
 *
 * Repair tool, run on demand. Round trips already on record before the run
 * (same symbol, exit within the dedup tolerance) are skipped, so running it
 * twice over the same window inserts nothing the second time. Trips of one
 * run never dedupe against each other: two partial closes in the same
 * second are two trades.
 */
export class TradeReconciliationService {
  private readonly store: LedgerStore;
  private readonly gateway: ExchangeGateway;
  private readonly vault: CredentialVault;
  private readonly events: BillingEvents;
  private readonly options: TradeReconciliationOptions;
  private readonly clock: () => Date;

  constructor(deps: TradeReconciliationDeps) {
    this.store = deps.store;
    this.gateway = deps.gateway;
    this.vault = deps.vault;
    this.events = deps.events;
    this.options = deps.options;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Inserts the round trips not yet recorded and adds their profit, count
   * and fee to the user's lifetime and open-cycle totals. `feeTier`
   * defaults to the user's current tier.
   */
  async backfillTrades(userId: string, roundTrips: RoundTrip[], feeTier?: string | null): Promise<BackfillResult> {
    const result = await this.store.withUserLock(userId, async (ops): Promise<BackfillResult> => {
      const user = await ops.getUser(userId);
      if (!user) {
        throw new NotFoundError(`User ${userId} not found`);
      }
      const rate = getFeeRate(feeTier === undefined ? user.fee_tier : feeTier, this.options.feeTierRates);

      let inserted = 0;
      let skipped = 0;
      let totalPnl = ZERO;
      let totalFees = ZERO;
      const insertedIds: string[] = [];

      for (const trip of roundTrips) {
        const existing = await ops.findTradeNear(
          userId, trip.symbol, trip.exitTime, this.options.dedupToleranceMs, insertedIds,
        );
        if (existing) {
          skipped++;
          console.log(`[TradeReconciliation] ⏭️ Skipping duplicate: ${trip.symbol} @ ${trip.exitTime.toISOString()}`);
          continue;
        }

        const profit = roundCurrency(trip.pnlUsd);
        const fee = calculateProfitFee(profit, rate);

        const trade = await ops.recordTrade({
          user_id: userId,
          symbol: trip.symbol,
          side: trip.side,
          entry_price: toFixedString(trip.entryPrice, 8),
          exit_price: toFixedString(trip.exitPrice, 8),
          quantity: toFixedString(trip.quantity, 8),
          leverage: "1.00",
          profit_usd: toCurrencyString(profit),
          profit_percent: toFixedString(trip.pnlPercent, 4),
          fee_charged: toCurrencyString(fee),
          exit_type: "reconciled",
          source: "reconciliation",
          notes: "Reconciled from exchange fill history",
          entry_time: trip.entryTime,
          exit_time: trip.exitTime,
        });

        insertedIds.push(trade.id);
        inserted++;
        totalPnl = totalPnl.plus(profit);
        totalFees = totalFees.plus(fee);
      }

      if (inserted > 0) {
        await ops.addTradeTotals(userId, {
          profit: toCurrencyString(totalPnl),
          trades: inserted,
          fees: toCurrencyString(totalFees),
        });
      }

      return {
        inserted,
        skipped,
        totalPnl: toCurrencyString(totalPnl),
        totalFees: toCurrencyString(totalFees),
      };
    });

    if (result.inserted > 0) {
      this.events.emit("tradesBackfilled", {
        userId,
        insertedCount: result.inserted,
        totalPnl: result.totalPnl,
        totalFees: result.totalFees,
      });
    }
    return result;
  }

  async reconcileUser(userId: string, lookbackDays: number = this.options.lookbackDays): Promise<UserReconciliationResult> {
    const user = await this.store.getUser(userId);
    if (!user) {
      throw new NotFoundError(`User ${userId} not found`);
    }

    const credentials = this.vault.decrypt(user.kraken_api_key_encrypted, user.kraken_api_secret_encrypted);
    const since = new Date(this.clock().getTime() - lookbackDays * DAY_MS);
    const fills = await this.gateway.getFillsSince(credentials, since);
    const roundTrips = pairFillsIntoRoundTrips(fills);

    console.log(`[TradeReconciliation] 📊 ${user.email}: ${fills.length} fills → ${roundTrips.length} round trips`);

    const backfill = await this.backfillTrades(userId, roundTrips);
    console.log(
      `[TradeReconciliation] ✅ ${user.email}: ${backfill.inserted} inserted, ${backfill.skipped} duplicates, P&L ${formatUsd(backfill.totalPnl)}, fees ${formatUsd(backfill.totalFees)}`,
    );

    return { userId, fills: fills.length, roundTrips: roundTrips.length, ...backfill };
  }

  async reconcileAllUsers(): Promise<ReconciliationSummary> {
    const summary: ReconciliationSummary = {
      users: 0, failed: 0, inserted: 0, skipped: 0, totalPnl: "0.00", totalFees: "0.00",
    };

    const missing = await this.store.getMissingTables();
    if (missing.length > 0) {
      console.warn(`[TradeReconciliation] ⚠️ Ledger tables missing (${missing.join(", ")}), nothing to reconcile`);
      return summary;
    }

    const users = await this.store.getUsersWithCredentials();
    console.log(`[TradeReconciliation] 📋 Found ${users.length} users with credentials`);

    let totalPnl = ZERO;
    let totalFees = ZERO;
    for (const user of users) {
      summary.users++;
      try {
        const result = await this.reconcileUser(user.id);
        summary.inserted += result.inserted;
        summary.skipped += result.skipped;
        totalPnl = totalPnl.plus(result.totalPnl);
        totalFees = totalFees.plus(result.totalFees);
      } catch (error) {
        summary.failed++;
        console.error(`[TradeReconciliation] ❌ ${user.email}: ${errorMessage(error)}`);
      }
    }

    summary.totalPnl = toCurrencyString(totalPnl);
    summary.totalFees = toCurrencyString(totalFees);
    return summary;
  }
}
