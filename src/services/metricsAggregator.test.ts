import { describe, it, expect } from 'vitest';
import { AbandonDetector } from './abandonDetector.js';
import { FieldNormalizer } from './fieldNormalizer.js';
import { MetricsAggregator, abandonmentRate } from './metricsAggregator.js';
import { RecoveryMatcher } from './recoveryMatcher.js';
import { answered, inbound, REFERENCE_TIME, sampleInboundLog } from '../test-utils/records.js';
import type { InboundCallRecord } from '../types/index.js';

function prepare(records: InboundCallRecord[]) {
  const normalizer = new FieldNormalizer(REFERENCE_TIME);
  const { calls } = normalizer.normalizeInboundLog(records);
  const aggregates = new AbandonDetector().detect(calls);
  new RecoveryMatcher(normalizer).match(aggregates, calls, []);
  return { calls, aggregates };
}

describe('abandonmentRate', () => {
  it('rounds to one decimal place', () => {
    expect(abandonmentRate(1, 0, 3)).toBe(33.3);
    expect(abandonmentRate(2, 0, 3)).toBe(66.7);
    expect(abandonmentRate(3, 1, 7)).toBe(28.6);
  });

  it('is zero without valid calls', () => {
    expect(abandonmentRate(0, 0, 0)).toBe(0);
  });
});

describe('MetricsAggregator.summarize', () => {
  it('counts valid calls and resolves phone figures', () => {
    const { calls, aggregates } = prepare(sampleInboundLog());

    expect(new MetricsAggregator().summarize(calls, aggregates)).toEqual({
      validCalls: 7,
      answeredCalls: 2,
      hungupCalls: 5,
      quickDrops: 1,
      abandonCalls: 4,
      uniqueAbandonPhones: 3,
      recoveredPhones: 1,
      needingOutboundPhones: 2,
      abandonmentRate: 42.9,
    });
  });

  it('subtracts every abandon of a recovered repeat caller', () => {
    const { calls, aggregates } = prepare([
      inbound({ rowNumber: 2, callTime: '2025-08-18 10:00:00' }),
      inbound({ rowNumber: 3, callTime: '2025-08-18 10:30:00' }),
      inbound({ rowNumber: 4, answeredHungup: 'ANSWERED', callTime: '2025-08-18 11:00:00', dispositionCode: 'AE' }),
      inbound({ rowNumber: 5, phone: '5550001111', callTime: '2025-08-18 12:00:00' }),
    ]);

    const summary = new MetricsAggregator().summarize(calls, aggregates);
    expect(summary.abandonCalls).toBe(3);
    expect(summary.recoveredPhones).toBe(1);
    expect(summary.abandonmentRate).toBe(25);
  });

  it('returns zeros for an empty log', () => {
    expect(new MetricsAggregator().summarize([], new Map())).toEqual({
      validCalls: 0,
      answeredCalls: 0,
      hungupCalls: 0,
      quickDrops: 0,
      abandonCalls: 0,
      uniqueAbandonPhones: 0,
      recoveredPhones: 0,
      needingOutboundPhones: 0,
      abandonmentRate: 0,
    });
  });
});

describe('MetricsAggregator.daily', () => {
  it('groups calls by business date and phones by first-abandon date', () => {
    const { calls, aggregates } = prepare(sampleInboundLog());

    expect(new MetricsAggregator().daily(calls, aggregates)).toEqual([
      {
        businessDate: '2025-08-18',
        validCalls: 5,
        answeredCalls: 1,
        hungupCalls: 4,
        quickDrops: 1,
        abandonCalls: 3,
        uniqueAbandonPhones: 3,
        recoveredPhones: 1,
        needingOutboundPhones: 2,
        abandonmentRate: 40,
      },
      {
        businessDate: '2025-08-19',
        validCalls: 2,
        answeredCalls: 1,
        hungupCalls: 1,
        quickDrops: 0,
        abandonCalls: 1,
        uniqueAbandonPhones: 0,
        recoveredPhones: 0,
        needingOutboundPhones: 0,
        abandonmentRate: 50,
      },
    ]);
  });

  it('subtracts all abandons of a recovered phone on its first-abandon date', () => {
    const { calls, aggregates } = prepare([
      inbound({ rowNumber: 2, callTime: '2025-08-18 10:00:00' }),
      inbound({ rowNumber: 3, phone: '5550001111', callTime: '2025-08-18 11:00:00' }),
      inbound({ rowNumber: 4, phone: '5559998888', callTime: '2025-08-18 12:00:00' }),
      answered({ rowNumber: 5, phone: '5554445555', callTime: '2025-08-18 13:00:00' }),
      inbound({ rowNumber: 6, callTime: '2025-08-19 10:00:00' }),
      answered({ rowNumber: 7, callTime: '2025-08-20 10:00:00', dispositionCode: 'MI' }),
    ]);

    expect(aggregates.get('5551234567')?.status).toBe('RECOVERED');
    const daily = new MetricsAggregator().daily(calls, aggregates);
    expect(daily.map((d) => [d.businessDate, d.abandonCalls, d.validCalls, d.abandonmentRate])).toEqual([
      ['2025-08-18', 3, 4, 25],
      ['2025-08-19', 1, 1, 100],
      ['2025-08-20', 0, 1, 0],
    ]);
  });

  it('orders dates ascending regardless of input order', () => {
    const { calls, aggregates } = prepare([
      inbound({ rowNumber: 2, callTime: '2025-08-20 10:00:00' }),
      inbound({ rowNumber: 3, phone: '5550001111', callTime: '2025-08-18 10:00:00' }),
    ]);

    const dates = new MetricsAggregator().daily(calls, aggregates).map((d) => d.businessDate);
    expect(dates).toEqual(['2025-08-18', '2025-08-20']);
  });

  it('is empty without valid calls', () => {
    expect(new MetricsAggregator().daily([], new Map())).toEqual([]);
  });
});
