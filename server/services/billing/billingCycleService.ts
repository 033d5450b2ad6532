import type { FeeTier, FollowerUser, InvoiceStatus, PortfolioTrade, TradeReport, TradeSide } from "@shared/schema";
import type { FeeTierRates } from "../../config";
import type { LedgerOperations, LedgerStore } from "../../storage";
import type { BillingEvents } from "../billingEvents";
import { InvoicingError, NotFoundError, errorMessage } from "../errors";
import type { Charge, InvoicingProvider } from "../payments/stripeInvoicingProvider";
import { calculateProfitFee, getFeeRate, getTierDisplay, resolveFeeTier } from "./feeTiers";
import {
  Decimal, ZERO, formatUsd, roundCurrency, toCurrencyString, toDecimal, toFixedString, type MoneyInput,
} from "./money";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CycleSnapshot {
  billingCycleStart: Date | null;
  currentCycleProfit: MoneyInput;
  currentCycleTrades: number;
  feeTier: string | null;
}

export interface CycleEvaluationOptions {
  cycleLengthMs: number;
  feeTierRates: FeeTierRates;
}

interface ClosedCycle {
  cycleStart: Date;
  cycleEnd: Date;
  totalProfit: Decimal;
  totalTrades: number;
  feeTier: FeeTier;
  feePercentage: Decimal;
  feeAmount: Decimal;
}

export type WaiverReason = "no_profit" | "zero_rate" | "rounds_to_zero";

export type CycleOutcome =
  | { kind: "not_started" }
  | { kind: "not_due"; elapsedMs: number; remainingMs: number }
  | ({ kind: "invoiced" } & ClosedCycle)
  | ({ kind: "waived"; reason: WaiverReason } & ClosedCycle);

export type ClosedCycleOutcome = Extract<CycleOutcome, { kind: "invoiced" | "waived" }>;

/**
 * Decides whether a cycle has ended and what it owes. The rate comes from
 * the tier in force during the cycle; a scheduled tier change is applied
 * only after this evaluation.
 */
export function evaluateCycle(
  snapshot: CycleSnapshot,
  now: Date,
  options: CycleEvaluationOptions,
): CycleOutcome {
  if (!snapshot.billingCycleStart) {
    return { kind: "not_started" };
  }

  const elapsedMs = now.getTime() - snapshot.billingCycleStart.getTime();
  if (elapsedMs < options.cycleLengthMs) {
    return { kind: "not_due", elapsedMs, remainingMs: options.cycleLengthMs - elapsedMs };
  }

  const feeTier = resolveFeeTier(snapshot.feeTier);
  const feePercentage = getFeeRate(feeTier, options.feeTierRates);
  const totalProfit = roundCurrency(snapshot.currentCycleProfit);
  const feeAmount = calculateProfitFee(totalProfit, feePercentage);

  const closed: ClosedCycle = {
    cycleStart: snapshot.billingCycleStart,
    cycleEnd: now,
    totalProfit,
    totalTrades: snapshot.currentCycleTrades,
    feeTier,
    feePercentage,
    feeAmount,
  };

  if (feeAmount.isZero()) {
    const reason: WaiverReason = totalProfit.lte(0)
      ? "no_profit"
      : feePercentage.isZero() ? "zero_rate" : "rounds_to_zero";
    return { kind: "waived", reason, ...closed };
  }
  return { kind: "invoiced", ...closed };
}

export function toCycleSnapshot(user: FollowerUser): CycleSnapshot {
  return {
    billingCycleStart: user.billing_cycle_start,
    currentCycleProfit: user.current_cycle_profit,
    currentCycleTrades: user.current_cycle_trades,
    feeTier: user.fee_tier,
  };
}

function isDueForBilling(user: FollowerUser): boolean {
  return user.access_granted
    && user.credentials_set
    && user.billing_cycle_start !== null
    && !user.pending_invoice_id;
}

/** Move of the price in the position's favour, as a percent of entry. */
export function priceMovePercent(side: TradeSide, entryPrice: MoneyInput, exitPrice: MoneyInput): Decimal {
  const entry = toDecimal(entryPrice);
  if (entry.isZero()) return ZERO;
  const move = side === "long" ? toDecimal(exitPrice).minus(entry) : entry.minus(toDecimal(exitPrice));
  return move.div(entry).times(100);
}

export interface CheckCyclesSummary {
  checked: number;
  closed: number;
  invoiced: number;
  waived: number;
  failed: number;
}

export type PaymentConfirmation =
  | { status: "processed"; userId: string; amount: string }
  | { status: "already_paid" }
  | { status: "ignored" };

export type InvoiceReissue =
  | { status: "reissued"; userId: string; chargeId: string; hostedUrl: string | null }
  | { status: "already_settled" }
  | { status: "ignored" };

export type InvoiceCancellation =
  | { status: "cancelled"; userId: string; chargeId: string; amount: string }
  | { status: "nothing_pending" };

export type InvoiceResend =
  | { status: "sent"; userId: string; chargeId: string; amount: string; hostedUrl: string | null }
  | { status: "nothing_pending" };

export interface InvoiceCount {
  count: number;
  total: string;
}

export interface BillingSummary {
  unpaid: InvoiceCount;
  paid: InvoiceCount;
  cancelled: InvoiceCount;
  totalCollected: string;
  usersByTier: Record<FeeTier, number>;
}

export interface BillingCycleServiceOptions {
  cycleDays: number;
  feeTierRates: FeeTierRates;
}

export interface BillingCycleServiceDeps {
  store: LedgerStore;
  /** Null when no payment provider is configured; cycles that owe a fee then stay open. */
  invoicing: InvoicingProvider | null;
  events: BillingEvents;
  options: BillingCycleServiceOptions;
  clock?: () => Date;
}

/**
 * BillingCycleService - rolling profit-share cycles
 *
 * Each user accrues profit for `cycleDays`. When the window has elapsed the
 * cycle is closed: a fee of max(profit, 0) × tier rate is invoiced (or waived
 * at $0.00), the cycle is recorded, a scheduled tier change takes effect and
 * a new cycle opens at once. Users with an unpaid invoice are not evaluated
 * until it is paid or an admin cancels it. A checkout session that lapses
 * unpaid is replaced by a new charge for the same amount.
 *
 * Example (standard tier, 10%):
 * - cycle profit $1,000.00 after 31 days → invoice $100.00, counters reset
 * - cycle profit -$500.00 → waived, fee $0.00, counters reset
 */
export class BillingCycleService {
  private readonly store: LedgerStore;
  private readonly invoicing: InvoicingProvider | null;
  private readonly events: BillingEvents;
  private readonly options: BillingCycleServiceOptions;
  private readonly clock: () => Date;

  constructor(deps: BillingCycleServiceDeps) {
    this.store = deps.store;
    this.invoicing = deps.invoicing;
    this.events = deps.events;
    this.options = deps.options;
    this.clock = deps.clock ?? (() => new Date());
  }

  private get evaluationOptions(): CycleEvaluationOptions {
    return {
      cycleLengthMs: this.options.cycleDays * DAY_MS,
      feeTierRates: this.options.feeTierRates,
    };
  }

  getTierDisplay(tier: string | null | undefined): string {
    return getTierDisplay(tier, this.options.feeTierRates);
  }

  /**
   * First-time activation. Returns false when a cycle is already running or
   * the user does not exist; nothing is changed in that case.
   */
  async startBillingCycle(userId: string): Promise<boolean> {
    return await this.store.withUserLock(userId, async (ops) => {
      const user = await ops.getUser(userId);
      if (!user) {
        console.warn(`[BillingCycle] ⚠️ Cannot start cycle: user ${userId} not found`);
        return false;
      }
      if (user.billing_cycle_start) {
        console.log(`[BillingCycle] Cycle already running for ${user.email} since ${user.billing_cycle_start.toISOString()}`);
        return false;
      }

      await ops.updateCycleState(userId, {
        billing_cycle_start: this.clock(),
        current_cycle_profit: "0.00",
        current_cycle_trades: 0,
        current_cycle_fees: "0.00",
      });
      console.log(`[BillingCycle] ✅ Billing cycle started for ${user.email}`);
      return true;
    });
  }

  async checkAllCycles(): Promise<CheckCyclesSummary> {
    const summary: CheckCyclesSummary = { checked: 0, closed: 0, invoiced: 0, waived: 0, failed: 0 };

    const missing = await this.store.getMissingTables();
    if (missing.length > 0) {
      console.warn(`[BillingCycle] ⚠️ Ledger tables missing (${missing.join(", ")}), skipping cycle check`);
      return summary;
    }

    const users = await this.store.getUsersDueForBilling();
    console.log(`[BillingCycle] 🔍 Checking ${users.length} billing cycles`);

    for (const candidate of users) {
      summary.checked++;
      try {
        const outcome = await this.closeCycleIfDue(candidate.id);
        if (outcome.kind === "invoiced") {
          summary.closed++;
          summary.invoiced++;
        } else if (outcome.kind === "waived") {
          summary.closed++;
          summary.waived++;
        }
      } catch (error) {
        summary.failed++;
        console.error(`[BillingCycle] ❌ Failed to process cycle for ${candidate.email}: ${errorMessage(error)}`);
      }
    }

    console.log(
      `[BillingCycle] ✅ Check complete: ${summary.closed} closed (${summary.invoiced} invoiced, ${summary.waived} waived), ${summary.failed} failed`,
    );
    return summary;
  }

  /**
   * Re-reads the user under its row lock and closes the cycle when due.
   * An invoicing failure aborts the whole close so the next pass retries it.
   */
  async closeCycleIfDue(userId: string): Promise<CycleOutcome | { kind: "ineligible" }> {
    const outcome = await this.store.withUserLock(userId, async (ops) => {
      const user = await ops.getUser(userId);
      if (!user || !isDueForBilling(user)) {
        return { kind: "ineligible" as const };
      }

      const evaluated = evaluateCycle(toCycleSnapshot(user), this.clock(), this.evaluationOptions);
      if (evaluated.kind === "invoiced" || evaluated.kind === "waived") {
        await this.applyOutcome(ops, user, evaluated);
      }
      return evaluated;
    });

    if (outcome.kind === "invoiced" || outcome.kind === "waived") {
      this.events.emit("cycleClosed", {
        userId,
        totalProfit: toCurrencyString(outcome.totalProfit),
        feePercentage: toFixedString(outcome.feePercentage, 4),
        feeAmount: toCurrencyString(outcome.feeAmount),
        status: outcome.kind,
      });
    }
    return outcome;
  }

  private async applyOutcome(ops: LedgerOperations, user: FollowerUser, outcome: ClosedCycleOutcome): Promise<void> {
    const feeAmount = toCurrencyString(outcome.feeAmount);
    const totalProfit = toCurrencyString(outcome.totalProfit);

    let charge: Charge | null = null;
    if (outcome.kind === "invoiced") {
      if (!this.invoicing) {
        throw new InvoicingError("No invoicing provider configured");
      }
      charge = await this.invoicing.createCharge({
        userId: user.id,
        email: user.email,
        amountUsd: feeAmount,
        profitUsd: totalProfit,
        cycleStart: outcome.cycleStart,
        cycleEnd: outcome.cycleEnd,
      });
    }

    const cycle = await ops.recordCycleResult({
      user_id: user.id,
      cycle_start: outcome.cycleStart,
      cycle_end: outcome.cycleEnd,
      total_profit: totalProfit,
      total_trades: outcome.totalTrades,
      fee_tier: outcome.feeTier,
      fee_percentage: toFixedString(outcome.feePercentage, 4),
      fee_amount: feeAmount,
      invoice_status: outcome.kind,
      charge_id: charge?.chargeId ?? null,
    });

    if (charge) {
      await ops.createInvoice({
        user_id: user.id,
        cycle_id: cycle.id,
        charge_id: charge.chargeId,
        amount_usd: feeAmount,
        profit_usd: totalProfit,
        status: "pending",
        hosted_url: charge.hostedUrl,
      });
    }

    await ops.updateCycleState(user.id, {
      billing_cycle_start: outcome.cycleEnd,
      current_cycle_profit: "0.00",
      current_cycle_trades: 0,
      current_cycle_fees: "0.00",
      ...(charge ? { pending_invoice_id: charge.chargeId, pending_invoice_amount: feeAmount } : {}),
      ...(user.next_cycle_fee_tier ? { fee_tier: user.next_cycle_fee_tier, next_cycle_fee_tier: null } : {}),
    });

    if (user.next_cycle_fee_tier) {
      console.log(`[BillingCycle] 🔄 ${user.email}: tier ${outcome.feeTier} → ${resolveFeeTier(user.next_cycle_fee_tier)}`);
    }
    if (outcome.kind === "invoiced") {
      console.log(`[BillingCycle] 💰 ${user.email}: invoiced ${formatUsd(feeAmount)} on profit ${formatUsd(totalProfit)} (${outcome.feeTier})`);
    } else {
      console.log(`[BillingCycle] ⏭️ ${user.email}: waived (${outcome.reason}), profit ${formatUsd(totalProfit)}`);
    }
  }

  /**
   * Settles a pending invoice. Repeated or unknown charge ids are no-ops.
   */
  async confirmPayment(chargeId: string): Promise<PaymentConfirmation> {
    const invoice = await this.store.getInvoiceByChargeId(chargeId);
    if (!invoice) {
      console.warn(`[BillingCycle] ⚠️ Payment confirmation for unknown charge ${chargeId}`);
      return { status: "ignored" };
    }

    const result = await this.store.withUserLock(invoice.user_id, async (ops): Promise<PaymentConfirmation> => {
      const settled = await ops.settleInvoice(chargeId, "paid", this.clock());
      if (!settled) {
        const current = await ops.getInvoiceByChargeId(chargeId);
        return current?.status === "paid" ? { status: "already_paid" } : { status: "ignored" };
      }

      await this.clearPendingInvoice(ops, settled.user_id, chargeId);
      await ops.addFeesPaid(settled.user_id, settled.amount_usd);
      return { status: "processed", userId: settled.user_id, amount: settled.amount_usd };
    });

    if (result.status === "processed") {
      console.log(`[BillingCycle] ✅ Payment confirmed: ${chargeId} (${formatUsd(result.amount)})`);
      this.events.emit("paymentConfirmed", { userId: result.userId, chargeId, amount: result.amount });
    } else {
      console.log(`[BillingCycle] ⏭️ Payment confirmation for ${chargeId}: ${result.status}`);
    }
    return result;
  }

  /**
   * Replaces a charge whose checkout session ended unpaid. The lapsed
   * invoice is marked expired and a new pending invoice for the same amount
   * and cycle takes its place, so the fee stays owed.
   */
  async reissueInvoice(chargeId: string): Promise<InvoiceReissue> {
    const invoice = await this.store.getInvoiceByChargeId(chargeId);
    if (!invoice) {
      console.warn(`[BillingCycle] ⚠️ Expiry for unknown charge ${chargeId}`);
      return { status: "ignored" };
    }

    const result = await this.store.withUserLock(invoice.user_id, async (ops): Promise<InvoiceReissue> => {
      const lapsed = await ops.settleInvoice(chargeId, "expired", this.clock());
      if (!lapsed) {
        return { status: "already_settled" };
      }
      const user = await ops.getUser(lapsed.user_id);
      if (!user) {
        throw new NotFoundError(`User ${lapsed.user_id} not found`);
      }
      if (!this.invoicing) {
        throw new InvoicingError("No invoicing provider configured");
      }

      const cycle = lapsed.cycle_id ? await ops.getBillingCycle(lapsed.cycle_id) : undefined;
      const charge = await this.invoicing.createCharge({
        userId: user.id,
        email: user.email,
        amountUsd: lapsed.amount_usd,
        profitUsd: lapsed.profit_usd,
        cycleStart: cycle?.cycle_start ?? lapsed.created_at,
        cycleEnd: cycle?.cycle_end ?? lapsed.created_at,
      });

      await ops.createInvoice({
        user_id: user.id,
        cycle_id: lapsed.cycle_id,
        charge_id: charge.chargeId,
        amount_usd: lapsed.amount_usd,
        profit_usd: lapsed.profit_usd,
        status: "pending",
        hosted_url: charge.hostedUrl,
      });
      await ops.updateCycleState(user.id, {
        pending_invoice_id: charge.chargeId,
        pending_invoice_amount: lapsed.amount_usd,
      });

      console.log(`[BillingCycle] 🔁 ${user.email}: ${chargeId} lapsed, reissued ${formatUsd(lapsed.amount_usd)} as ${charge.chargeId}`);
      return { status: "reissued", userId: user.id, chargeId: charge.chargeId, hostedUrl: charge.hostedUrl };
    });

    if (result.status === "reissued") {
      this.events.emit("invoiceSent", {
        userId: result.userId,
        chargeId: result.chargeId,
        amount: invoice.amount_usd,
        hostedUrl: result.hostedUrl,
        reason: "reissued",
      });
    } else {
      console.log(`[BillingCycle] Invoice ${chargeId}: ${result.status}`);
    }
    return result;
  }

  /**
   * Admin fee waiver. The open charge is made unpayable, the invoice is
   * marked cancelled and the user re-enters cycle evaluation. Nothing is
   * added to fees paid.
   */
  async cancelInvoice(userId: string): Promise<InvoiceCancellation> {
    const result = await this.store.withUserLock(userId, async (ops): Promise<InvoiceCancellation> => {
      const user = await ops.getUser(userId);
      if (!user) {
        throw new NotFoundError(`User ${userId} not found`);
      }
      const chargeId = user.pending_invoice_id;
      if (!chargeId) {
        return { status: "nothing_pending" };
      }

      if (this.invoicing) {
        await this.invoicing.cancelCharge(chargeId);
      }
      const cancelled = await ops.settleInvoice(chargeId, "cancelled", this.clock());
      await this.clearPendingInvoice(ops, userId, chargeId);

      const amount = cancelled?.amount_usd ?? toCurrencyString(user.pending_invoice_amount);
      console.log(`[BillingCycle] 🎁 ${user.email}: fee of ${formatUsd(amount)} waived (${chargeId})`);
      return { status: "cancelled", userId, chargeId, amount };
    });

    if (result.status === "cancelled") {
      this.events.emit("invoiceCancelled", { userId, chargeId: result.chargeId, amount: result.amount });
    }
    return result;
  }

  /**
   * Sends the payment link of the user's pending invoice again through the
   * `invoiceSent` event.
   */
  async resendInvoice(userId: string): Promise<InvoiceResend> {
    const user = await this.store.getUser(userId);
    if (!user) {
      throw new NotFoundError(`User ${userId} not found`);
    }
    const invoice = user.pending_invoice_id
      ? await this.store.getInvoiceByChargeId(user.pending_invoice_id)
      : undefined;
    if (!invoice || invoice.status !== "pending") {
      console.log(`[BillingCycle] ⏭️ ${user.email}: no pending invoice to resend`);
      return { status: "nothing_pending" };
    }

    this.events.emit("invoiceSent", {
      userId,
      chargeId: invoice.charge_id,
      amount: invoice.amount_usd,
      hostedUrl: invoice.hosted_url,
      reason: "resent",
    });
    console.log(`[BillingCycle] 📧 ${user.email}: invoice ${invoice.charge_id} resent (${formatUsd(invoice.amount_usd)})`);
    return {
      status: "sent",
      userId,
      chargeId: invoice.charge_id,
      amount: invoice.amount_usd,
      hostedUrl: invoice.hosted_url,
    };
  }

  async getBillingSummary(): Promise<BillingSummary> {
    const [invoiceTotals, tierCounts] = await Promise.all([
      this.store.getInvoiceTotals(),
      this.store.getUserCountsByTier(),
    ]);

    const countFor = (status: InvoiceStatus): InvoiceCount => {
      const row = invoiceTotals.find(t => t.status === status);
      return { count: row?.count ?? 0, total: toCurrencyString(row?.total ?? 0) };
    };

    const usersByTier: Record<FeeTier, number> = { standard: 0, vip: 0, team: 0 };
    for (const { tier, count } of tierCounts) {
      usersByTier[resolveFeeTier(tier)] += count;
    }

    const paid = countFor("paid");
    return {
      unpaid: countFor("pending"),
      paid,
      cancelled: countFor("cancelled"),
      totalCollected: paid.total,
      usersByTier,
    };
  }

  private async clearPendingInvoice(ops: LedgerOperations, userId: string, chargeId: string): Promise<void> {
    const user = await ops.getUser(userId);
    if (user?.pending_invoice_id === chargeId) {
      await ops.updateCycleState(userId, { pending_invoice_id: null, pending_invoice_amount: "0.00" });
    }
  }

  /**
   * Records a closed trade reported by the user's agent and accrues its fee
   * into the open cycle.
   */
  async recordTradeResult(userId: string, report: TradeReport): Promise<PortfolioTrade> {
    return await this.store.withUserLock(userId, async (ops) => {
      const user = await ops.getUser(userId);
      if (!user) {
        throw new NotFoundError(`User ${userId} not found`);
      }

      const profit = roundCurrency(report.profit_usd);
      const fee = calculateProfitFee(profit, getFeeRate(user.fee_tier, this.options.feeTierRates));
      const profitPercent = report.profit_percent !== undefined
        ? new Decimal(report.profit_percent)
        : priceMovePercent(report.side, report.entry_price, report.exit_price).times(report.leverage);

      const trade = await ops.recordTrade({
        user_id: userId,
        symbol: report.symbol,
        side: report.side,
        entry_price: toFixedString(report.entry_price, 8),
        exit_price: toFixedString(report.exit_price, 8),
        quantity: toFixedString(report.quantity, 8),
        leverage: toFixedString(report.leverage, 2),
        profit_usd: toCurrencyString(profit),
        profit_percent: toFixedString(profitPercent, 4),
        fee_charged: toCurrencyString(fee),
        exit_type: report.exit_type ?? null,
        source: "agent",
        notes: report.notes ?? null,
        entry_time: report.entry_time,
        exit_time: report.exit_time,
      });

      await ops.addTradeTotals(userId, {
        profit: toCurrencyString(profit),
        trades: 1,
        fees: toCurrencyString(fee),
      });

      const status = profit.gt(0) ? "🟢 WIN" : "🔴 LOSS";
      console.log(`[BillingCycle] ${status} ${user.email} ${report.symbol}: ${formatUsd(profit)} (fee ${formatUsd(fee)})`);
      return trade;
    });
  }

  /**
   * Stores the tier the user moves to at the next cycle boundary. The
   * current tier is left alone.
   */
  async scheduleTierChange(userId: string, tier: FeeTier): Promise<boolean> {
    return await this.store.withUserLock(userId, async (ops) => {
      const user = await ops.getUser(userId);
      if (!user) return false;
      await ops.updateCycleState(userId, { next_cycle_fee_tier: tier });
      console.log(`[BillingCycle] 📅 ${user.email}: ${this.getTierDisplay(tier)} scheduled for next cycle`);
      return true;
    });
  }
}
