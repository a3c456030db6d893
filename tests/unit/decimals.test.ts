// Unit tests for fixed-point display helpers
import { describe, it, expect } from 'vitest';

import { MAX_HEALTH_FACTOR } from '../../src/engine/constants.js';
import { formatHealthFactor, formatWad, toFeedPrice, toWad } from '../../src/utils/decimals.js';

describe('decimals', () => {
  it('should format 18-decimal amounts', () => {
    expect(formatWad(2970000000000000000000n)).toBe('2970.0');
    expect(formatWad(2183823529411764705n)).toBe('2.183823529411764705');
    expect(formatWad(0n)).toBe('0.0');
  });

  it('should render health factors to four places', () => {
    expect(formatHealthFactor(629629629629629629n, MAX_HEALTH_FACTOR)).toBe('0.6296');
    expect(formatHealthFactor(2000000000000000000n, MAX_HEALTH_FACTOR)).toBe('2.0000');
    expect(formatHealthFactor(MAX_HEALTH_FACTOR, MAX_HEALTH_FACTOR)).toBe('∞');
  });

  it('should parse human prices and amounts', () => {
    expect(toFeedPrice('2000')).toBe(200000000000n);
    expect(toFeedPrice('2000.5')).toBe(200050000000n);
    expect(toWad('1.25')).toBe(1250000000000000000n);
    expect(toWad('0.2')).toBe(200000000000000000n);
  });
});
