import { describe, it, expect } from 'vitest';
import { Decimal } from '../money';
import { calculateProfitFee, getFeeRate, getTierDisplay, isFeeTier, resolveFeeTier } from '../feeTiers';

describe('Fee Tiers', () => {
  describe('1. resolveFeeTier', () => {
    it('should accept exact tier names', () => {
      expect(resolveFeeTier('standard')).toBe('standard');
      expect(resolveFeeTier('vip')).toBe('vip');
      expect(resolveFeeTier('team')).toBe('team');
    });

    it('should bill differently cased or padded names as standard', () => {
      expect(resolveFeeTier('VIP')).toBe('standard');
      expect(resolveFeeTier(' vip ')).toBe('standard');
      expect(resolveFeeTier('Team')).toBe('standard');
      expect(getFeeRate('VIP').toString()).toBe('0.1');
    });

    it('should fall back to standard for unset or unknown tiers', () => {
      expect(resolveFeeTier(null)).toBe('standard');
      expect(resolveFeeTier(undefined)).toBe('standard');
      expect(resolveFeeTier('')).toBe('standard');
      expect(resolveFeeTier('platinum')).toBe('standard');
    });

    it('should only narrow exact tier names', () => {
      expect(isFeeTier('team')).toBe(true);
      expect(isFeeTier('Team')).toBe(false);
    });
  });

  describe('2. getFeeRate', () => {
    it('should return the default rates', () => {
      expect(getFeeRate('standard').toString()).toBe('0.1');
      expect(getFeeRate('vip').toString()).toBe('0.05');
      expect(getFeeRate('team').toString()).toBe('0');
    });

    it('should honour overridden rates', () => {
      const rates = { standard: '0.20', vip: '0.05', team: '0' };
      expect(getFeeRate('standard', rates).toString()).toBe('0.2');
      expect(getFeeRate('unknown', rates).toString()).toBe('0.2');
    });
  });

  describe('3. getTierDisplay', () => {
    it('should show icon, name and percentage', () => {
      expect(getTierDisplay('standard')).toBe('👤 Standard (10%)');
      expect(getTierDisplay('vip')).toBe('⭐ VIP (5%)');
      expect(getTierDisplay('team')).toBe('🏠 Team (0%)');
    });

    it('should show fractional percentages', () => {
      expect(getTierDisplay('vip', { standard: '0.10', vip: '0.075', team: '0' })).toBe('⭐ VIP (7.5%)');
    });
  });

  describe('4. calculateProfitFee', () => {
    const rate = new Decimal('0.10');

    it('should charge nothing on zero or negative profit', () => {
      expect(calculateProfitFee('0', rate).toFixed(2)).toBe('0.00');
      expect(calculateProfitFee('-100.00', rate).toFixed(2)).toBe('0.00');
      expect(calculateProfitFee(null, rate).toFixed(2)).toBe('0.00');
    });

    it('should round half up to cents', () => {
      expect(calculateProfitFee('0.05', rate).toFixed(2)).toBe('0.01');
      expect(calculateProfitFee('0.04', rate).toFixed(2)).toBe('0.00');
      expect(calculateProfitFee('333.33', rate).toFixed(2)).toBe('33.33');
      expect(calculateProfitFee(1000, rate).toFixed(2)).toBe('100.00');
    });
  });
});
