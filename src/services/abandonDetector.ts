/**
 * Abandon detector - Groups abandoned inbound calls by phone number
 */
import { QUICK_DROP_THRESHOLD_SECONDS } from '../config/constants.js';
import { logger } from '../utils/logger.js';
import type {
  AbandonAggregates,
  AbandonEvent,
  NormalizedInboundCall,
  PhoneAbandonAggregate,
} from '../types/index.js';

/** A hung-up call that waited past the quick-drop cutoff */
export function isAbandon(call: NormalizedInboundCall): boolean {
  return call.outcome === 'HUNGUP' && call.waitSeconds > QUICK_DROP_THRESHOLD_SECONDS;
}

export function isQuickDrop(call: NormalizedInboundCall): boolean {
  return call.outcome === 'HUNGUP' && call.waitSeconds <= QUICK_DROP_THRESHOLD_SECONDS;
}

export class AbandonDetector {
  /**
   * Build one aggregate per phone that abandoned at least once.
   * Input order only decides which event wins a first-abandon tie.
   */
  detect(calls: NormalizedInboundCall[]): AbandonAggregates {
    const aggregates: AbandonAggregates = new Map();

    for (const call of calls) {
      if (!isAbandon(call)) {
        continue;
      }

      const event: AbandonEvent = {
        callTime: call.callTime,
        callTimeRaw: call.record.callTime,
        businessDate: call.businessDate,
        waitSeconds: call.waitSeconds,
        queueName: call.record.queueName,
        username: call.record.username,
        disposition: call.record.dispositionCode,
      };

      let aggregate = aggregates.get(call.phone);
      if (!aggregate) {
        aggregate = this.createAggregate(call, event);
        aggregates.set(call.phone, aggregate);
      }

      aggregate.abandonEvents.push(event);
      aggregate.abandonCount++;

      // Input is not guaranteed to be time-ordered
      if (event.callTime.getTime() < aggregate.firstAbandonTime.getTime()) {
        aggregate.firstAbandonTime = event.callTime;
        aggregate.firstAbandonTimeRaw = event.callTimeRaw;
        aggregate.firstAbandonBusinessDate = event.businessDate;
      }
    }

    const totalAbandons = [...aggregates.values()].reduce((sum, a) => sum + a.abandonCount, 0);
    logger.info(`Found ${aggregates.size} unique phone numbers with abandon calls`);
    logger.info(`Total abandon calls: ${totalAbandons}`);

    return aggregates;
  }

  private createAggregate(call: NormalizedInboundCall, event: AbandonEvent): PhoneAbandonAggregate {
    return {
      phone: call.phone,
      originalPhone: call.record.phone,
      firstAbandonTime: event.callTime,
      firstAbandonTimeRaw: event.callTimeRaw,
      firstAbandonBusinessDate: event.businessDate,
      abandonEvents: [],
      abandonCount: 0,
      status: 'NEEDS_OUTBOUND',
    };
  }
}
