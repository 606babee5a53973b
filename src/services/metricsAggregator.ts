/**
 * Metrics aggregator - Global and per-business-day call and phone metrics
 */
import { isAbandon, isQuickDrop } from './abandonDetector.js';
import type {
  AbandonAggregates,
  BusinessDate,
  DailyMetrics,
  NormalizedInboundCall,
  PhoneAbandonAggregate,
  SummaryMetrics,
} from '../types/index.js';

interface CallCounts {
  validCalls: number;
  answeredCalls: number;
  hungupCalls: number;
  quickDrops: number;
  abandonCalls: number;
}

interface PhoneCounts {
  uniqueAbandonPhones: number;
  recoveredPhones: number;
  needingOutboundPhones: number;
}

function countCalls(calls: NormalizedInboundCall[]): CallCounts {
  const counts: CallCounts = {
    validCalls: 0,
    answeredCalls: 0,
    hungupCalls: 0,
    quickDrops: 0,
    abandonCalls: 0,
  };

  for (const call of calls) {
    counts.validCalls++;
    if (call.outcome === 'ANSWERED') {
      counts.answeredCalls++;
    } else {
      counts.hungupCalls++;
      if (isQuickDrop(call)) counts.quickDrops++;
      if (isAbandon(call)) counts.abandonCalls++;
    }
  }
  return counts;
}

function countPhones(aggregates: Iterable<PhoneAbandonAggregate>): PhoneCounts {
  let uniqueAbandonPhones = 0;
  let recoveredPhones = 0;
  for (const aggregate of aggregates) {
    uniqueAbandonPhones++;
    if (aggregate.status === 'RECOVERED') recoveredPhones++;
  }
  return {
    uniqueAbandonPhones,
    recoveredPhones,
    needingOutboundPhones: uniqueAbandonPhones - recoveredPhones,
  };
}

/** Percentage rounded to one decimal place; 0 when there are no calls */
export function abandonmentRate(abandonCalls: number, recoveredAbandonCalls: number, validCalls: number): number {
  if (validCalls === 0) {
    return 0;
  }
  const rate = ((abandonCalls - recoveredAbandonCalls) / validCalls) * 100;
  return Math.round(rate * 10) / 10;
}

export class MetricsAggregator {
  summarize(calls: NormalizedInboundCall[], aggregates: AbandonAggregates): SummaryMetrics {
    const callCounts = countCalls(calls);
    const phoneCounts = countPhones(aggregates.values());

    let recoveredAbandonCalls = 0;
    for (const aggregate of aggregates.values()) {
      if (aggregate.status === 'RECOVERED') {
        recoveredAbandonCalls += aggregate.abandonCount;
      }
    }

    return {
      ...callCounts,
      ...phoneCounts,
      abandonmentRate: abandonmentRate(callCounts.abandonCalls, recoveredAbandonCalls, callCounts.validCalls),
    };
  }

  /**
   * Per business date, ascending. Phone figures belong to the date of each
   * phone's first abandon, so a repeat abandoner is counted once.
   */
  daily(calls: NormalizedInboundCall[], aggregates: AbandonAggregates): DailyMetrics[] {
    const callsByDate = new Map<BusinessDate, NormalizedInboundCall[]>();
    for (const call of calls) {
      const bucket = callsByDate.get(call.businessDate);
      if (bucket) {
        bucket.push(call);
      } else {
        callsByDate.set(call.businessDate, [call]);
      }
    }

    const cohorts = new Map<BusinessDate, PhoneAbandonAggregate[]>();
    for (const aggregate of aggregates.values()) {
      const cohort = cohorts.get(aggregate.firstAbandonBusinessDate);
      if (cohort) {
        cohort.push(aggregate);
      } else {
        cohorts.set(aggregate.firstAbandonBusinessDate, [aggregate]);
      }
    }

    const dates = [...callsByDate.keys()].sort();
    return dates.map((businessDate) => {
      const dayCalls = callsByDate.get(businessDate) ?? [];
      const callCounts = countCalls(dayCalls);
      const cohort = cohorts.get(businessDate) ?? [];
      const phoneCounts = countPhones(cohort);

      // Every abandon of a recovered phone counts against its first-abandon date
      const recoveredAbandonCalls = cohort
        .filter((aggregate) => aggregate.status === 'RECOVERED')
        .reduce((sum, aggregate) => sum + aggregate.abandonCount, 0);

      return {
        businessDate,
        ...callCounts,
        ...phoneCounts,
        abandonmentRate: abandonmentRate(callCounts.abandonCalls, recoveredAbandonCalls, callCounts.validCalls),
      };
    });
  }
}
