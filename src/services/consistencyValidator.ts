/**
 * Consistency validator - Re-checks the arithmetic identities of a summary.
 * Results are informational; a failed check never blocks the report.
 */
import type { ConsistencyCheck, SummaryMetrics } from '../types/index.js';

function check(name: string, passed: boolean, ok: string, failure: string): ConsistencyCheck {
  return {
    name,
    passed,
    message: passed ? `✅ ${ok}` : `❌ CRITICAL: ${failure}`,
  };
}

export class ConsistencyValidator {
  validate(metrics: SummaryMetrics): ConsistencyCheck[] {
    const {
      validCalls,
      answeredCalls,
      hungupCalls,
      quickDrops,
      abandonCalls,
      uniqueAbandonPhones,
      recoveredPhones,
      needingOutboundPhones,
      abandonmentRate,
    } = metrics;

    return [
      check(
        'call-outcomes',
        answeredCalls + hungupCalls === validCalls,
        'Answered + Hungup = Total Calls',
        `Answered + Hungup ≠ Total Calls (${answeredCalls} + ${hungupCalls} vs ${validCalls})`
      ),
      check(
        'hungup-split',
        quickDrops + abandonCalls === hungupCalls,
        'Quick Drops + Abandons = Total Hungup',
        `Quick Drops + Abandons ≠ Total Hungup (${quickDrops} + ${abandonCalls} vs ${hungupCalls})`
      ),
      check(
        'phone-resolution',
        recoveredPhones + needingOutboundPhones === uniqueAbandonPhones,
        'Recovered + Needing Calls = Unique Abandons',
        `Recovered + Needing Calls ≠ Unique Abandons (${recoveredPhones} + ${needingOutboundPhones} vs ${uniqueAbandonPhones})`
      ),
      check(
        'rate-range',
        Number.isFinite(abandonmentRate) && abandonmentRate >= 0 && abandonmentRate <= 100,
        'Abandonment rate within valid range',
        `Abandonment rate outside 0-100% (${abandonmentRate})`
      ),
    ];
  }
}
