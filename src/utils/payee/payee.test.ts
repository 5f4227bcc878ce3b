import { describe, it, expect } from 'vitest';
import { normalizePayeeDisplay, normalizePayeeForComparison } from './payee';

describe('Payee normalization', () => {
  describe('normalizePayeeDisplay', () => {
    it('should return empty strings unchanged', () => {
      expect(normalizePayeeDisplay('   ')).toBe('');
    });

    it('should collapse whitespace', () => {
      expect(normalizePayeeDisplay('  Corner\tMarket   Downtown ')).toBe('Corner Market Downtown');
    });

    it('should strip a single noisy prefix', () => {
      expect(normalizePayeeDisplay('POS PURCHASE Corner Market')).toBe('Corner Market');
      expect(normalizePayeeDisplay('Visa Debit card')).toBe('Debit card');
    });

    it('should title-case mostly uppercase payees', () => {
      expect(normalizePayeeDisplay('POS  CORNER   MARKET')).toBe('Corner Market');
    });

    it('should keep mixed-case payees as written', () => {
      expect(normalizePayeeDisplay('McDonald Farms')).toBe('McDonald Farms');
    });
  });

  describe('normalizePayeeForComparison', () => {
    it('should lowercase and drop punctuation', () => {
      expect(normalizePayeeForComparison("VISA Joe's Café #12")).toBe('joe s caf 12');
    });

    it('should group variants of the same merchant', () => {
      expect(normalizePayeeForComparison('ACH STREAMFLIX')).toBe(normalizePayeeForComparison('Streamflix'));
    });
  });
});
