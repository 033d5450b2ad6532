import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { SchedulerService } from '../scheduler';
import type { CheckCyclesSummary } from '../billing/billingCycleService';
import type { BalanceCheckSummary } from '../portfolio/balanceReconcilerService';

const BILLING_SUMMARY: CheckCyclesSummary = { checked: 2, closed: 1, invoiced: 1, waived: 0, failed: 0 };
const BALANCE_SUMMARY: BalanceCheckSummary = { checked: 3, transactions: 1, skipped: 0 };

const OPTIONS = {
  billingIntervalMs: 60 * 60 * 1000,
  balanceIntervalMs: 30 * 60 * 1000,
  balanceStartupDelayMs: 30 * 1000,
};

describe('Scheduler Service', () => {
  let billing: { checkAllCycles: Mock<() => Promise<CheckCyclesSummary>> };
  let balance: { checkAllUsers: Mock<() => Promise<BalanceCheckSummary>> };
  let scheduler: SchedulerService;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    billing = { checkAllCycles: vi.fn<() => Promise<CheckCyclesSummary>>().mockResolvedValue(BILLING_SUMMARY) };
    balance = { checkAllUsers: vi.fn<() => Promise<BalanceCheckSummary>>().mockResolvedValue(BALANCE_SUMMARY) };
    scheduler = new SchedulerService(billing, balance, OPTIONS);
  });

  afterEach(() => {
    scheduler.stop();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('1. start', () => {
    it('should run billing at once and balance only after the startup delay', async () => {
      scheduler.start();

      expect(billing.checkAllCycles).toHaveBeenCalledTimes(1);
      expect(balance.checkAllUsers).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(OPTIONS.balanceStartupDelayMs - 1);
      expect(balance.checkAllUsers).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      expect(balance.checkAllUsers).toHaveBeenCalledTimes(1);
    });

    it('should repeat each loop on its own interval', async () => {
      scheduler.start();

      await vi.advanceTimersByTimeAsync(OPTIONS.billingIntervalMs);

      expect(billing.checkAllCycles).toHaveBeenCalledTimes(2);
      // balance ran at 30s and 30m30s
      expect(balance.checkAllUsers).toHaveBeenCalledTimes(2);
    });

    it('should ignore a second start', async () => {
      scheduler.start();
      scheduler.start();

      expect(billing.checkAllCycles).toHaveBeenCalledTimes(1);
    });
  });

  describe('2. stop', () => {
    it('should cancel the pending startup run and both intervals', async () => {
      scheduler.start();
      scheduler.stop();

      await vi.advanceTimersByTimeAsync(OPTIONS.billingIntervalMs * 3);

      expect(billing.checkAllCycles).toHaveBeenCalledTimes(1);
      expect(balance.checkAllUsers).not.toHaveBeenCalled();
    });
  });

  describe('3. overlapping passes', () => {
    it('should skip a billing pass while the previous one is running', async () => {
      let release: () => void = () => undefined;
      billing.checkAllCycles.mockImplementationOnce(() => new Promise<CheckCyclesSummary>((resolve) => {
        release = () => resolve(BILLING_SUMMARY);
      }));

      const first = scheduler.runBillingCheck();
      const second = await scheduler.runBillingCheck();
      release();

      expect(second).toBeNull();
      expect(await first).toEqual(BILLING_SUMMARY);
      expect(billing.checkAllCycles).toHaveBeenCalledTimes(1);
      expect(await scheduler.runBillingCheck()).toEqual(BILLING_SUMMARY);
    });

    it('should skip a balance pass while the previous one is running', async () => {
      let release: () => void = () => undefined;
      balance.checkAllUsers.mockImplementationOnce(() => new Promise<BalanceCheckSummary>((resolve) => {
        release = () => resolve(BALANCE_SUMMARY);
      }));

      const first = scheduler.runBalanceCheck();
      expect(await scheduler.runBalanceCheck()).toBeNull();
      release();

      expect(await first).toEqual(BALANCE_SUMMARY);
    });
  });

  describe('4. failures', () => {
    it('should return null and keep the loop alive when a pass throws', async () => {
      billing.checkAllCycles.mockRejectedValueOnce(new Error('connection reset'));

      expect(await scheduler.runBillingCheck()).toBeNull();
      expect(await scheduler.runBillingCheck()).toEqual(BILLING_SUMMARY);
    });
  });
});
