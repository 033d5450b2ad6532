import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { FollowerUser } from '@shared/schema';
import { BillingCycleService, evaluateCycle, priceMovePercent } from '../billingCycleService';
import { BillingEvents } from '../../billingEvents';
import { InvoicingError, NotFoundError } from '../../errors';
import { DEFAULT_FEE_TIER_RATES } from '../../../config';
import { InMemoryLedgerStore, makeUser } from '../../__tests__/helpers/inMemoryLedgerStore';
import { FakeInvoicingProvider } from '../../__tests__/helpers/fakes';

const DAY_MS = 24 * 60 * 60 * 1000;
const NOW = new Date('2026-03-01T00:00:00Z');
const daysAgo = (days: number) => new Date(NOW.getTime() - days * DAY_MS);

const OPTIONS = { cycleLengthMs: 30 * DAY_MS, feeTierRates: DEFAULT_FEE_TIER_RATES };

describe('Billing Cycle - evaluateCycle', () => {
  it('should report not_started when no cycle is running', () => {
    const outcome = evaluateCycle(
      { billingCycleStart: null, currentCycleProfit: '500.00', currentCycleTrades: 3, feeTier: 'standard' },
      NOW,
      OPTIONS,
    );
    expect(outcome).toEqual({ kind: 'not_started' });
  });

  it('should not close a cycle before 30 days have elapsed', () => {
    const outcome = evaluateCycle(
      { billingCycleStart: daysAgo(29), currentCycleProfit: '1000.00', currentCycleTrades: 4, feeTier: 'standard' },
      NOW,
      OPTIONS,
    );
    expect(outcome).toEqual({ kind: 'not_due', elapsedMs: 29 * DAY_MS, remainingMs: DAY_MS });
  });

  it('should close a cycle at exactly 30 days', () => {
    const outcome = evaluateCycle(
      { billingCycleStart: daysAgo(30), currentCycleProfit: '1000.00', currentCycleTrades: 4, feeTier: 'standard' },
      NOW,
      OPTIONS,
    );
    expect(outcome.kind).toBe('invoiced');
  });

  it('should invoice 10% of positive profit for the standard tier', () => {
    const outcome = evaluateCycle(
      { billingCycleStart: daysAgo(31), currentCycleProfit: '1000.00', currentCycleTrades: 12, feeTier: 'standard' },
      NOW,
      OPTIONS,
    );
    if (outcome.kind !== 'invoiced') throw new Error(`expected invoiced, got ${outcome.kind}`);
    expect(outcome.feeAmount.toFixed(2)).toBe('100.00');
    expect(outcome.feePercentage.toFixed(4)).toBe('0.1000');
    expect(outcome.totalTrades).toBe(12);
    expect(outcome.cycleEnd).toEqual(NOW);
  });

  describe('fee amount', () => {
    const cases: Array<[string, string, string]> = [
      ['standard', '1000.00', '100.00'],
      ['vip', '1000.00', '50.00'],
      ['standard', '333.33', '33.33'],
      ['vip', '0.30', '0.02'],
      ['standard', '0.05', '0.01'],
      ['standard', '123456.78', '12345.68'],
    ];

    it.each(cases)('should charge round(profit × rate, 2) for %s on %s', (tier, profit, expected) => {
      const outcome = evaluateCycle(
        { billingCycleStart: daysAgo(31), currentCycleProfit: profit, currentCycleTrades: 1, feeTier: tier },
        NOW,
        OPTIONS,
      );
      if (outcome.kind !== 'invoiced') throw new Error(`expected invoiced, got ${outcome.kind}`);
      expect(outcome.feeAmount.toFixed(2)).toBe(expected);
    });

    it.each(['standard', 'vip', 'team'])('should waive non-positive profit for %s', (tier) => {
      for (const profit of ['0', '0.00', '-0.01', '-500.00']) {
        const outcome = evaluateCycle(
          { billingCycleStart: daysAgo(31), currentCycleProfit: profit, currentCycleTrades: 1, feeTier: tier },
          NOW,
          OPTIONS,
        );
        expect(outcome.kind).toBe('waived');
        if (outcome.kind === 'waived') {
          expect(outcome.reason).toBe('no_profit');
          expect(outcome.feeAmount.toFixed(2)).toBe('0.00');
        }
      }
    });

    it('should never charge the team tier', () => {
      for (const profit of ['0.01', '10000.00', '99999999.99']) {
        const outcome = evaluateCycle(
          { billingCycleStart: daysAgo(31), currentCycleProfit: profit, currentCycleTrades: 1, feeTier: 'team' },
          NOW,
          OPTIONS,
        );
        expect(outcome.kind).toBe('waived');
        if (outcome.kind === 'waived') expect(outcome.reason).toBe('zero_rate');
      }
    });

    it('should waive a fee that rounds to zero', () => {
      const outcome = evaluateCycle(
        { billingCycleStart: daysAgo(31), currentCycleProfit: '0.04', currentCycleTrades: 1, feeTier: 'standard' },
        NOW,
        OPTIONS,
      );
      expect(outcome.kind).toBe('waived');
      if (outcome.kind === 'waived') expect(outcome.reason).toBe('rounds_to_zero');
    });

    it.each(['', '  ', 'gold', 'VIP', ' vip', null])('should bill unknown tier %j as standard', (tier) => {
      const outcome = evaluateCycle(
        { billingCycleStart: daysAgo(31), currentCycleProfit: '200.00', currentCycleTrades: 1, feeTier: tier },
        NOW,
        OPTIONS,
      );
      if (outcome.kind !== 'invoiced') throw new Error(`expected invoiced, got ${outcome.kind}`);
      expect(outcome.feeTier).toBe('standard');
      expect(outcome.feeAmount.toFixed(2)).toBe('20.00');
    });
  });
});

describe('Billing Cycle - priceMovePercent', () => {
  it('should measure long and short moves against entry', () => {
    expect(priceMovePercent('long', 100, 110).toString()).toBe('10');
    expect(priceMovePercent('short', 100, 90).toString()).toBe('10');
    expect(priceMovePercent('long', 100, 90).toString()).toBe('-10');
    expect(priceMovePercent('long', 0, 90).toString()).toBe('0');
  });
});

describe('Billing Cycle Service', () => {
  let store: InMemoryLedgerStore;
  let invoicing: FakeInvoicingProvider;
  let events: BillingEvents;
  let service: BillingCycleService;
  let now: Date;

  const addUser = (overrides: Partial<FollowerUser>): FollowerUser => {
    const user = makeUser(overrides);
    store.users.push(user);
    return user;
  };

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    now = NOW;
    store = new InMemoryLedgerStore();
    invoicing = new FakeInvoicingProvider();
    events = new BillingEvents();
    service = new BillingCycleService({
      store,
      invoicing,
      events,
      options: { cycleDays: 30, feeTierRates: DEFAULT_FEE_TIER_RATES },
      clock: () => now,
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('1. startBillingCycle', () => {
    it('should start a cycle and zero the counters', async () => {
      const user = addUser({ current_cycle_profit: '12.00', current_cycle_trades: 2, current_cycle_fees: '1.20' });

      expect(await service.startBillingCycle(user.id)).toBe(true);

      const updated = store.user(user.id);
      expect(updated.billing_cycle_start).toEqual(NOW);
      expect(updated.current_cycle_profit).toBe('0.00');
      expect(updated.current_cycle_trades).toBe(0);
      expect(updated.current_cycle_fees).toBe('0.00');
    });

    it('should leave a running cycle untouched', async () => {
      const user = addUser({ billing_cycle_start: daysAgo(5), current_cycle_profit: '40.00', current_cycle_trades: 2 });

      expect(await service.startBillingCycle(user.id)).toBe(false);

      const updated = store.user(user.id);
      expect(updated.billing_cycle_start).toEqual(daysAgo(5));
      expect(updated.current_cycle_profit).toBe('40.00');
      expect(updated.current_cycle_trades).toBe(2);
    });

    it('should return false for an unknown user', async () => {
      expect(await service.startBillingCycle('missing-user')).toBe(false);
    });
  });

  describe('2. checkAllCycles end-to-end', () => {
    it('should invoice $100.00 for a standard user with $1000 profit after 31 days', async () => {
      const user = addUser({ fee_tier: 'standard', billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00', current_cycle_trades: 8 });

      const summary = await service.checkAllCycles();

      expect(summary).toEqual({ checked: 1, closed: 1, invoiced: 1, waived: 0, failed: 0 });
      expect(invoicing.requests).toEqual([{
        userId: user.id,
        email: 'follower@example.com',
        amountUsd: '100.00',
        profitUsd: '1000.00',
        cycleStart: daysAgo(31),
        cycleEnd: NOW,
      }]);

      expect(store.cycles).toHaveLength(1);
      expect(store.cycles[0]).toMatchObject({
        user_id: user.id,
        total_profit: '1000.00',
        total_trades: 8,
        fee_tier: 'standard',
        fee_percentage: '0.1000',
        fee_amount: '100.00',
        invoice_status: 'invoiced',
        charge_id: 'cs_test_1',
      });

      expect(store.invoices).toHaveLength(1);
      expect(store.invoices[0]).toMatchObject({
        charge_id: 'cs_test_1',
        cycle_id: store.cycles[0].id,
        amount_usd: '100.00',
        profit_usd: '1000.00',
        status: 'pending',
        hosted_url: 'https://checkout.example.com/cs_test_1',
      });

      const updated = store.user(user.id);
      expect(updated.pending_invoice_id).toBe('cs_test_1');
      expect(updated.pending_invoice_amount).toBe('100.00');
      expect(updated.current_cycle_profit).toBe('0.00');
      expect(updated.current_cycle_trades).toBe(0);
      expect(updated.billing_cycle_start).toEqual(NOW);
      expect(updated.fee_tier).toBe('standard');
    });

    it('should invoice $50.00 for a vip user with the same profit', async () => {
      addUser({ fee_tier: 'vip', billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00' });

      await service.checkAllCycles();

      expect(invoicing.requests.map(r => r.amountUsd)).toEqual(['50.00']);
      expect(store.cycles[0].fee_amount).toBe('50.00');
      expect(store.cycles[0].fee_percentage).toBe('0.0500');
    });

    it('should waive a team user with $10000 profit and still reset the cycle', async () => {
      const user = addUser({ fee_tier: 'team', billing_cycle_start: daysAgo(31), current_cycle_profit: '10000.00', current_cycle_trades: 40 });

      const summary = await service.checkAllCycles();

      expect(summary).toEqual({ checked: 1, closed: 1, invoiced: 0, waived: 1, failed: 0 });
      expect(invoicing.requests).toHaveLength(0);
      expect(store.invoices).toHaveLength(0);
      expect(store.cycles[0]).toMatchObject({ fee_amount: '0.00', invoice_status: 'waived', charge_id: null });

      const updated = store.user(user.id);
      expect(updated.pending_invoice_id).toBeNull();
      expect(updated.current_cycle_profit).toBe('0.00');
      expect(updated.current_cycle_trades).toBe(0);
      expect(updated.billing_cycle_start).toEqual(NOW);
    });

    it('should waive a standard user with -$500 profit', async () => {
      addUser({ fee_tier: 'standard', billing_cycle_start: daysAgo(31), current_cycle_profit: '-500.00' });

      await service.checkAllCycles();

      expect(invoicing.requests).toHaveLength(0);
      expect(store.cycles[0]).toMatchObject({ total_profit: '-500.00', fee_amount: '0.00', invoice_status: 'waived' });
    });

    it('should leave a cycle younger than 30 days alone', async () => {
      const user = addUser({ billing_cycle_start: daysAgo(29), current_cycle_profit: '1000.00', current_cycle_trades: 3 });

      const summary = await service.checkAllCycles();

      expect(summary).toEqual({ checked: 1, closed: 0, invoiced: 0, waived: 0, failed: 0 });
      expect(store.cycles).toHaveLength(0);
      const updated = store.user(user.id);
      expect(updated.current_cycle_profit).toBe('1000.00');
      expect(updated.current_cycle_trades).toBe(3);
      expect(updated.billing_cycle_start).toEqual(daysAgo(29));
    });

    it('should skip users without access, credentials or a running cycle', async () => {
      addUser({ access_granted: false, billing_cycle_start: daysAgo(40), current_cycle_profit: '100.00' });
      addUser({ credentials_set: false, billing_cycle_start: daysAgo(40), current_cycle_profit: '100.00' });
      addUser({ billing_cycle_start: null, current_cycle_profit: '100.00' });

      const summary = await service.checkAllCycles();

      expect(summary.checked).toBe(0);
      expect(store.cycles).toHaveLength(0);
    });
  });

  describe('3. Tier changes at the cycle boundary', () => {
    it('should apply the scheduled tier even when the cycle is waived', async () => {
      const user = addUser({ fee_tier: 'standard', next_cycle_fee_tier: 'vip', billing_cycle_start: daysAgo(31), current_cycle_profit: '-20.00' });

      await service.checkAllCycles();

      const updated = store.user(user.id);
      expect(updated.fee_tier).toBe('vip');
      expect(updated.next_cycle_fee_tier).toBeNull();
      expect(store.cycles[0].invoice_status).toBe('waived');
    });

    it('should bill the closing cycle at the old tier', async () => {
      const user = addUser({ fee_tier: 'standard', next_cycle_fee_tier: 'team', billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00' });

      await service.checkAllCycles();

      expect(store.cycles[0].fee_amount).toBe('100.00');
      expect(store.cycles[0].fee_tier).toBe('standard');
      expect(store.user(user.id).fee_tier).toBe('team');
    });

    it('should only store the next tier when a change is scheduled', async () => {
      const user = addUser({ fee_tier: 'standard', billing_cycle_start: daysAgo(3) });

      expect(await service.scheduleTierChange(user.id, 'vip')).toBe(true);

      const updated = store.user(user.id);
      expect(updated.fee_tier).toBe('standard');
      expect(updated.next_cycle_fee_tier).toBe('vip');
    });

    it('should report unknown users when scheduling a tier change', async () => {
      expect(await service.scheduleTierChange('missing-user', 'vip')).toBe(false);
    });
  });

  describe('4. Pending invoices', () => {
    it('should never issue a second invoice while one is pending', async () => {
      const user = addUser({ billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00' });

      await service.checkAllCycles();
      store.user(user.id).billing_cycle_start = daysAgo(45);
      store.user(user.id).current_cycle_profit = '800.00';
      const second = await service.checkAllCycles();

      expect(second.checked).toBe(0);
      expect(invoicing.requests).toHaveLength(1);
      expect(store.invoices).toHaveLength(1);
    });

    it('should skip a user whose invoice appeared after the batch was listed', async () => {
      const user = addUser({ billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00' });
      const original = store.getUsersDueForBilling.bind(store);
      vi.spyOn(store, 'getUsersDueForBilling').mockImplementation(async () => {
        const listed = await original();
        store.user(user.id).pending_invoice_id = 'cs_elsewhere';
        return listed;
      });

      const summary = await service.checkAllCycles();

      expect(summary).toEqual({ checked: 1, closed: 0, invoiced: 0, waived: 0, failed: 0 });
      expect(invoicing.requests).toHaveLength(0);
    });
  });

  describe('5. Invoicing failures', () => {
    it('should leave the cycle untouched when the charge cannot be created', async () => {
      const user = addUser({ billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00', current_cycle_trades: 5 });
      invoicing.failing = true;

      const summary = await service.checkAllCycles();

      expect(summary).toEqual({ checked: 1, closed: 0, invoiced: 0, waived: 0, failed: 1 });
      expect(store.cycles).toHaveLength(0);
      expect(store.invoices).toHaveLength(0);
      const updated = store.user(user.id);
      expect(updated.current_cycle_profit).toBe('1000.00');
      expect(updated.current_cycle_trades).toBe(5);
      expect(updated.billing_cycle_start).toEqual(daysAgo(31));
      expect(updated.pending_invoice_id).toBeNull();
    });

    it('should retry on the next pass once the provider recovers', async () => {
      addUser({ billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00' });
      invoicing.failing = true;
      await service.checkAllCycles();

      invoicing.failing = false;
      const summary = await service.checkAllCycles();

      expect(summary.invoiced).toBe(1);
      expect(store.cycles).toHaveLength(1);
    });

    it('should keep going after one user fails', async () => {
      addUser({ email: 'a@example.com', billing_cycle_start: daysAgo(40), current_cycle_profit: '100.00' });
      addUser({ email: 'b@example.com', fee_tier: 'team', billing_cycle_start: daysAgo(35), current_cycle_profit: '100.00' });
      invoicing.failing = true;

      const summary = await service.checkAllCycles();

      expect(summary).toEqual({ checked: 2, closed: 1, invoiced: 0, waived: 1, failed: 1 });
    });

    it('should keep cycles open when no invoicing provider is configured', async () => {
      const unconfigured = new BillingCycleService({
        store,
        invoicing: null,
        events,
        options: { cycleDays: 30, feeTierRates: DEFAULT_FEE_TIER_RATES },
        clock: () => NOW,
      });
      const user = addUser({ billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00' });

      const summary = await unconfigured.checkAllCycles();

      expect(summary.failed).toBe(1);
      expect(store.user(user.id).current_cycle_profit).toBe('1000.00');
    });

    it('should do nothing when the ledger tables are missing', async () => {
      addUser({ billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00' });
      store.missingTables = ['billing_cycles'];

      const summary = await service.checkAllCycles();

      expect(summary).toEqual({ checked: 0, closed: 0, invoiced: 0, waived: 0, failed: 0 });
      expect(invoicing.requests).toHaveLength(0);
    });
  });

  describe('6. Events', () => {
    it('should emit cycleClosed for every closed cycle', async () => {
      const listener = vi.fn();
      events.on('cycleClosed', listener);
      const invoiced = addUser({ billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00' });
      const waived = addUser({ fee_tier: 'team', billing_cycle_start: daysAgo(32), current_cycle_profit: '250.50' });

      await service.checkAllCycles();

      expect(listener).toHaveBeenCalledTimes(2);
      expect(listener).toHaveBeenCalledWith({
        userId: invoiced.id, totalProfit: '1000.00', feePercentage: '0.1000', feeAmount: '100.00', status: 'invoiced',
      });
      expect(listener).toHaveBeenCalledWith({
        userId: waived.id, totalProfit: '250.50', feePercentage: '0.0000', feeAmount: '0.00', status: 'waived',
      });
    });
  });

  describe('7. confirmPayment', () => {
    it('should add the invoice amount to fees paid exactly once', async () => {
      const listener = vi.fn();
      events.on('paymentConfirmed', listener);
      const user = addUser({ billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00', total_fees_paid: '20.00' });
      await service.checkAllCycles();

      const first = await service.confirmPayment('cs_test_1');
      const second = await service.confirmPayment('cs_test_1');

      expect(first).toEqual({ status: 'processed', userId: user.id, amount: '100.00' });
      expect(second).toEqual({ status: 'already_paid' });
      const updated = store.user(user.id);
      expect(updated.total_fees_paid).toBe('120.00');
      expect(updated.pending_invoice_id).toBeNull();
      expect(updated.pending_invoice_amount).toBe('0.00');
      expect(store.invoices[0].status).toBe('paid');
      expect(store.invoices[0].paid_at).toEqual(NOW);
      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith({ userId: user.id, chargeId: 'cs_test_1', amount: '100.00' });
    });

    it('should ignore unknown charges', async () => {
      expect(await service.confirmPayment('cs_unknown')).toEqual({ status: 'ignored' });
    });

    it('should let the user re-enter cycle evaluation once paid', async () => {
      const user = addUser({ billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00' });
      await service.checkAllCycles();
      await service.confirmPayment('cs_test_1');

      const due = await store.getUsersDueForBilling();
      expect(due.map(u => u.id)).toEqual([user.id]);
    });
  });

  describe('8. reissueInvoice', () => {
    it('should replace a lapsed charge with a new one for the same amount', async () => {
      const user = addUser({ billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00' });
      await service.checkAllCycles();

      const result = await service.reissueInvoice('cs_test_1');

      expect(result).toEqual({
        status: 'reissued', userId: user.id, chargeId: 'cs_test_2', hostedUrl: 'https://checkout.example.com/cs_test_2',
      });
      expect(invoicing.requests[1]).toEqual({
        userId: user.id,
        email: 'follower@example.com',
        amountUsd: '100.00',
        profitUsd: '1000.00',
        cycleStart: daysAgo(31),
        cycleEnd: NOW,
      });
      expect(store.invoices).toHaveLength(2);
      expect(store.invoices[0]).toMatchObject({ charge_id: 'cs_test_1', status: 'expired', expired_at: NOW });
      expect(store.invoices[1]).toMatchObject({
        charge_id: 'cs_test_2',
        cycle_id: store.cycles[0].id,
        amount_usd: '100.00',
        status: 'pending',
        hosted_url: 'https://checkout.example.com/cs_test_2',
      });
      const updated = store.user(user.id);
      expect(updated.pending_invoice_id).toBe('cs_test_2');
      expect(updated.pending_invoice_amount).toBe('100.00');
      expect(updated.total_fees_paid).toBe('0.00');
    });

    it('should keep the fee owed until the replacement charge is paid', async () => {
      const user = addUser({ fee_tier: 'standard', billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00' });
      await service.checkAllCycles();
      await service.reissueInvoice('cs_test_1');

      now = new Date(NOW.getTime() + 30 * DAY_MS);
      const whilePending = await service.checkAllCycles();

      expect(whilePending.checked).toBe(0);
      expect(store.user(user.id).pending_invoice_id).toBe('cs_test_2');

      expect(await service.confirmPayment('cs_test_2')).toEqual({ status: 'processed', userId: user.id, amount: '100.00' });
      const afterPayment = await service.checkAllCycles();

      expect(afterPayment).toEqual({ checked: 1, closed: 1, invoiced: 0, waived: 1, failed: 0 });
      expect(invoicing.requests.map(r => r.amountUsd)).toEqual(['100.00', '100.00']);
      expect(store.user(user.id).total_fees_paid).toBe('100.00');
      expect(store.user(user.id).pending_invoice_id).toBeNull();
    });

    it('should not settle the lapsed charge or reissue it twice', async () => {
      const user = addUser({ billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00' });
      await service.checkAllCycles();
      await service.reissueInvoice('cs_test_1');

      expect(await service.reissueInvoice('cs_test_1')).toEqual({ status: 'already_settled' });
      expect(await service.confirmPayment('cs_test_1')).toEqual({ status: 'ignored' });
      expect(invoicing.requests).toHaveLength(2);
      expect(store.user(user.id).total_fees_paid).toBe('0.00');
    });

    it('should leave the invoice pending when the replacement cannot be created', async () => {
      const user = addUser({ billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00' });
      await service.checkAllCycles();
      invoicing.failing = true;

      await expect(service.reissueInvoice('cs_test_1')).rejects.toThrow(InvoicingError);

      expect(store.invoices).toHaveLength(1);
      expect(store.invoices[0].status).toBe('pending');
      expect(store.user(user.id).pending_invoice_id).toBe('cs_test_1');
    });

    it('should announce the new payment link', async () => {
      const listener = vi.fn();
      events.on('invoiceSent', listener);
      const user = addUser({ billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00' });
      await service.checkAllCycles();

      await service.reissueInvoice('cs_test_1');

      expect(listener).toHaveBeenCalledWith({
        userId: user.id,
        chargeId: 'cs_test_2',
        amount: '100.00',
        hostedUrl: 'https://checkout.example.com/cs_test_2',
        reason: 'reissued',
      });
    });

    it('should ignore unknown charges', async () => {
      expect(await service.reissueInvoice('cs_unknown')).toEqual({ status: 'ignored' });
      expect(invoicing.requests).toHaveLength(0);
    });
  });

  describe('9. recordTradeResult', () => {
    const report = {
      symbol: 'BTC/USD',
      side: 'long' as const,
      entry_price: 100,
      exit_price: 110,
      quantity: 25,
      leverage: 1,
      profit_usd: 250,
      entry_time: new Date('2026-02-20T10:00:00Z'),
      exit_time: new Date('2026-02-20T14:00:00Z'),
    };

    it('should record the trade and accrue profit and fee into the cycle', async () => {
      const user = addUser({ fee_tier: 'standard', billing_cycle_start: daysAgo(3), current_cycle_profit: '10.00', current_cycle_trades: 1 });

      const trade = await service.recordTradeResult(user.id, report);

      expect(trade).toMatchObject({
        symbol: 'BTC/USD',
        side: 'long',
        entry_price: '100.00000000',
        exit_price: '110.00000000',
        quantity: '25.00000000',
        leverage: '1.00',
        profit_usd: '250.00',
        profit_percent: '10.0000',
        fee_charged: '25.00',
        source: 'agent',
      });
      const updated = store.user(user.id);
      expect(updated.current_cycle_profit).toBe('260.00');
      expect(updated.current_cycle_trades).toBe(2);
      expect(updated.current_cycle_fees).toBe('25.00');
      expect(updated.total_profit).toBe('250.00');
      expect(updated.total_trades).toBe(1);
      expect(updated.total_fees).toBe('25.00');
    });

    it('should charge no fee on a losing trade', async () => {
      const user = addUser({ fee_tier: 'vip' });

      const trade = await service.recordTradeResult(user.id, {
        ...report, exit_price: 90, profit_usd: -250, profit_percent: -10,
      });

      expect(trade.fee_charged).toBe('0.00');
      expect(trade.profit_percent).toBe('-10.0000');
      expect(store.user(user.id).current_cycle_profit).toBe('-250.00');
    });
  });

  describe('10. getTierDisplay', () => {
    it('should label each tier with its rate', () => {
      expect(service.getTierDisplay('standard')).toBe('👤 Standard (10%)');
      expect(service.getTierDisplay('vip')).toBe('⭐ VIP (5%)');
      expect(service.getTierDisplay('team')).toBe('🏠 Team (0%)');
      expect(service.getTierDisplay('')).toBe('👤 Standard (10%)');
    });
  });

  describe('11. cancelInvoice', () => {
    it('should waive the pending fee and let the user re-enter evaluation', async () => {
      const listener = vi.fn();
      events.on('invoiceCancelled', listener);
      const user = addUser({ billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00' });
      await service.checkAllCycles();

      const result = await service.cancelInvoice(user.id);

      expect(result).toEqual({ status: 'cancelled', userId: user.id, chargeId: 'cs_test_1', amount: '100.00' });
      expect(invoicing.cancelled).toEqual(['cs_test_1']);
      expect(store.invoices[0]).toMatchObject({ status: 'cancelled', cancelled_at: NOW });
      const updated = store.user(user.id);
      expect(updated.pending_invoice_id).toBeNull();
      expect(updated.pending_invoice_amount).toBe('0.00');
      expect(updated.total_fees_paid).toBe('0.00');
      expect((await store.getUsersDueForBilling()).map(u => u.id)).toEqual([user.id]);
      expect(listener).toHaveBeenCalledWith({ userId: user.id, chargeId: 'cs_test_1', amount: '100.00' });
    });

    it('should not reissue a cancelled charge when its session expiry arrives', async () => {
      const user = addUser({ billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00' });
      await service.checkAllCycles();
      await service.cancelInvoice(user.id);

      expect(await service.reissueInvoice('cs_test_1')).toEqual({ status: 'already_settled' });
      expect(invoicing.requests).toHaveLength(1);
      expect(store.user(user.id).pending_invoice_id).toBeNull();
    });

    it('should keep the invoice when the charge cannot be cancelled', async () => {
      const user = addUser({ billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00' });
      await service.checkAllCycles();
      invoicing.failing = true;

      await expect(service.cancelInvoice(user.id)).rejects.toThrow(InvoicingError);
      expect(store.invoices[0].status).toBe('pending');
      expect(store.user(user.id).pending_invoice_id).toBe('cs_test_1');
    });

    it('should report users without a pending invoice', async () => {
      const user = addUser({ billing_cycle_start: daysAgo(3) });

      expect(await service.cancelInvoice(user.id)).toEqual({ status: 'nothing_pending' });
      await expect(service.cancelInvoice('missing-user')).rejects.toThrow(NotFoundError);
    });
  });

  describe('12. resendInvoice', () => {
    it('should send the pending payment link again', async () => {
      const listener = vi.fn();
      events.on('invoiceSent', listener);
      const user = addUser({ billing_cycle_start: daysAgo(31), current_cycle_profit: '1000.00' });
      await service.checkAllCycles();

      const result = await service.resendInvoice(user.id);

      expect(result).toEqual({
        status: 'sent',
        userId: user.id,
        chargeId: 'cs_test_1',
        amount: '100.00',
        hostedUrl: 'https://checkout.example.com/cs_test_1',
      });
      expect(listener).toHaveBeenCalledWith({
        userId: user.id,
        chargeId: 'cs_test_1',
        amount: '100.00',
        hostedUrl: 'https://checkout.example.com/cs_test_1',
        reason: 'resent',
      });
      expect(invoicing.requests).toHaveLength(1);
    });

    it('should skip users with nothing owed', async () => {
      const user = addUser({ billing_cycle_start: daysAgo(3) });

      expect(await service.resendInvoice(user.id)).toEqual({ status: 'nothing_pending' });
      await expect(service.resendInvoice('missing-user')).rejects.toThrow(NotFoundError);
    });
  });

  describe('13. getBillingSummary', () => {
    it('should count invoices by status and users by tier', async () => {
      const paid = addUser({ email: 'a@example.com', fee_tier: 'standard', billing_cycle_start: daysAgo(33), current_cycle_profit: '1000.00' });
      addUser({ email: 'b@example.com', fee_tier: 'vip', billing_cycle_start: daysAgo(32), current_cycle_profit: '1000.00' });
      const waived = addUser({ email: 'c@example.com', fee_tier: 'standard', billing_cycle_start: daysAgo(31), current_cycle_profit: '200.00' });
      addUser({ email: 'd@example.com', fee_tier: 'team' });
      addUser({ email: 'e@example.com', fee_tier: 'VIP' });
      await service.checkAllCycles();
      await service.confirmPayment('cs_test_1');
      await service.cancelInvoice(waived.id);

      const summary = await service.getBillingSummary();

      expect(store.user(paid.id).total_fees_paid).toBe('100.00');
      expect(summary).toEqual({
        unpaid: { count: 1, total: '50.00' },
        paid: { count: 1, total: '100.00' },
        cancelled: { count: 1, total: '20.00' },
        totalCollected: '100.00',
        usersByTier: { standard: 3, vip: 1, team: 1 },
      });
    });

    it('should report zeros for an empty ledger', async () => {
      expect(await service.getBillingSummary()).toEqual({
        unpaid: { count: 0, total: '0.00' },
        paid: { count: 0, total: '0.00' },
        cancelled: { count: 0, total: '0.00' },
        totalCollected: '0.00',
        usersByTier: { standard: 0, vip: 0, team: 0 },
      });
    });
  });
});
