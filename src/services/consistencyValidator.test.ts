import { describe, it, expect } from 'vitest';
import { ConsistencyValidator } from './consistencyValidator.js';
import type { SummaryMetrics } from '../types/index.js';

const consistent: SummaryMetrics = {
  validCalls: 7,
  answeredCalls: 2,
  hungupCalls: 5,
  quickDrops: 1,
  abandonCalls: 4,
  uniqueAbandonPhones: 3,
  recoveredPhones: 1,
  needingOutboundPhones: 2,
  abandonmentRate: 42.9,
};

describe('ConsistencyValidator', () => {
  const validator = new ConsistencyValidator();

  it('passes every identity for consistent metrics', () => {
    expect(validator.validate(consistent)).toEqual([
      { name: 'call-outcomes', passed: true, message: '✅ Answered + Hungup = Total Calls' },
      { name: 'hungup-split', passed: true, message: '✅ Quick Drops + Abandons = Total Hungup' },
      { name: 'phone-resolution', passed: true, message: '✅ Recovered + Needing Calls = Unique Abandons' },
      { name: 'rate-range', passed: true, message: '✅ Abandonment rate within valid range' },
    ]);
  });

  it('reports each broken identity without throwing', () => {
    const checks = validator.validate({
      ...consistent,
      answeredCalls: 3,
      quickDrops: 2,
      needingOutboundPhones: 1,
      abandonmentRate: 120,
    });

    expect(checks.map((c) => c.passed)).toEqual([false, false, false, false]);
    expect(checks[0]?.message).toBe('❌ CRITICAL: Answered + Hungup ≠ Total Calls (3 + 5 vs 7)');
    expect(checks[1]?.message).toBe('❌ CRITICAL: Quick Drops + Abandons ≠ Total Hungup (2 + 4 vs 5)');
    expect(checks[2]?.message).toBe('❌ CRITICAL: Recovered + Needing Calls ≠ Unique Abandons (1 + 1 vs 3)');
    expect(checks[3]?.message).toBe('❌ CRITICAL: Abandonment rate outside 0-100% (120)');
  });

  it('rejects a negative rate', () => {
    const [, , , rate] = validator.validate({ ...consistent, abandonmentRate: -0.1 });
    expect(rate?.passed).toBe(false);
  });
});
