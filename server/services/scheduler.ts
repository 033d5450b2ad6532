import type { CheckCyclesSummary } from "./billing/billingCycleService";
import type { BalanceCheckSummary } from "./portfolio/balanceReconcilerService";

export interface BillingCycleRunner {
  checkAllCycles(): Promise<CheckCyclesSummary>;
}

export interface BalanceCheckRunner {
  checkAllUsers(): Promise<BalanceCheckSummary>;
}

export interface SchedulerOptions {
  billingIntervalMs: number;
  balanceIntervalMs: number;
  balanceStartupDelayMs: number;
}

/**
 * Two independent loops: billing cycles (first pass at start) and balance
 * checks (first pass after the startup delay, so migrations can finish).
 * A tick that fires while the previous pass of the same loop is still
 * running is dropped.
 */
export class SchedulerService {
  private billingInterval: NodeJS.Timeout | null = null;
  private balanceInterval: NodeJS.Timeout | null = null;
  private balanceStartupTimer: NodeJS.Timeout | null = null;
  private billingInFlight = false;
  private balanceInFlight = false;
  private isRunning = false;

  constructor(
    private readonly billing: BillingCycleRunner,
    private readonly balance: BalanceCheckRunner,
    private readonly options: SchedulerOptions,
  ) {}

  start(): void {
    if (this.isRunning) {
      console.log("[Scheduler] ⏭️ Already running");
      return;
    }
    this.isRunning = true;

    console.log("[Scheduler] 📅 Starting...");
    console.log(`[Scheduler] ⏰ Billing check interval: ${this.options.billingIntervalMs / 1000}s`);
    console.log(
      `[Scheduler] ⏰ Balance check interval: ${this.options.balanceIntervalMs / 1000}s (first run in ${this.options.balanceStartupDelayMs / 1000}s)`,
    );

    void this.runBillingCheck();
    this.billingInterval = setInterval(() => {
      void this.runBillingCheck();
    }, this.options.billingIntervalMs);

    this.balanceStartupTimer = setTimeout(() => {
      this.balanceStartupTimer = null;
      void this.runBalanceCheck();
      this.balanceInterval = setInterval(() => {
        void this.runBalanceCheck();
      }, this.options.balanceIntervalMs);
    }, this.options.balanceStartupDelayMs);

    console.log("[Scheduler] ✅ Started");
  }

  stop(): void {
    if (this.balanceStartupTimer) {
      clearTimeout(this.balanceStartupTimer);
      this.balanceStartupTimer = null;
    }
    if (this.billingInterval) {
      clearInterval(this.billingInterval);
      this.billingInterval = null;
    }
    if (this.balanceInterval) {
      clearInterval(this.balanceInterval);
      this.balanceInterval = null;
    }
    this.isRunning = false;
    console.log("[Scheduler] 🛑 Stopped");
  }

  /** Returns null when a billing pass was already in flight or the pass failed. */
  async runBillingCheck(): Promise<CheckCyclesSummary | null> {
    if (this.billingInFlight) {
      console.log("[Scheduler] ⏭️ Billing check still running, skipping tick");
      return null;
    }
    this.billingInFlight = true;
    const startTime = Date.now();
    try {
      const summary = await this.billing.checkAllCycles();
      console.log(`[Scheduler] ✅ Billing check completed in ${Date.now() - startTime}ms`);
      return summary;
    } catch (error) {
      console.error("[Scheduler] ❌ Billing check failed:", error);
      return null;
    } finally {
      this.billingInFlight = false;
    }
  }

  /** Returns null when a balance pass was already in flight or the pass failed. */
  async runBalanceCheck(): Promise<BalanceCheckSummary | null> {
    if (this.balanceInFlight) {
      console.log("[Scheduler] ⏭️ Balance check still running, skipping tick");
      return null;
    }
    this.balanceInFlight = true;
    const startTime = Date.now();
    try {
      const summary = await this.balance.checkAllUsers();
      console.log(`[Scheduler] ✅ Balance check completed in ${Date.now() - startTime}ms`);
      return summary;
    } catch (error) {
      console.error("[Scheduler] ❌ Balance check failed:", error);
      return null;
    } finally {
      this.balanceInFlight = false;
    }
  }
}
