import { describe, it, expect } from 'vitest';

import { addressesEqual, normalizeAddress } from '../../src/utils/Address.js';

describe('Address Normalization', () => {
  describe('normalizeAddress', () => {
    it('should normalize address to lowercase', () => {
      const addr = '0xABCDEF1234567890ABCDEF1234567890ABCDEF12';
      expect(normalizeAddress(addr)).toBe(addr.toLowerCase());
    });

    it('should trim surrounding whitespace', () => {
      expect(normalizeAddress('  WETH\n')).toBe('weth');
    });

    it('should handle empty identifiers', () => {
      expect(normalizeAddress('')).toBe('');
    });
  });

  describe('addressesEqual', () => {
    it('should compare after normalization', () => {
      expect(addressesEqual('0xAbC', '0xabc')).toBe(true);
      expect(addressesEqual('0xabc', '0xabd')).toBe(false);
    });

    it('should never match empty identifiers', () => {
      expect(addressesEqual('', '')).toBe(false);
    });
  });
});
