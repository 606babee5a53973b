/**
 * Recovery matcher - Looks for a later contact with each abandoning phone,
 * first in the ACD log and then in the outbound dialer log
 */
import {
  OUTBOUND_CONNECTED,
  OUTBOUND_MANUAL_DIAL,
  SUCCESSFUL_DISPOSITIONS,
} from '../config/constants.js';
import { logger } from '../utils/logger.js';
import type { FieldNormalizer } from './fieldNormalizer.js';
import type {
  AbandonAggregates,
  DataQualityIssue,
  LogSource,
  NormalizedInboundCall,
  NormalizedOutboundCall,
  NormalizedPhone,
  PhoneAbandonAggregate,
  RecoveryAttempt,
  RecoveryStatus,
} from '../types/index.js';

type CandidateIndex = Map<NormalizedPhone, RecoveryAttempt[]>;

export interface RecoveryMatchResult {
  recoveredPhones: number;
  issues: DataQualityIssue[];
}

/**
 * Status after a contact is found. RECOVERED is terminal; any failed
 * contact moves NEEDS_OUTBOUND to ATTEMPTED.
 */
export function transitionStatus(current: RecoveryStatus, successful: boolean): RecoveryStatus {
  if (current === 'RECOVERED' || successful) {
    return 'RECOVERED';
  }
  return 'ATTEMPTED';
}

export class RecoveryMatcher {
  private readonly normalizer: FieldNormalizer;
  private readonly successfulDispositions: ReadonlySet<string>;

  constructor(
    normalizer: FieldNormalizer,
    successfulDispositions: ReadonlySet<string> = SUCCESSFUL_DISPOSITIONS
  ) {
    this.normalizer = normalizer;
    this.successfulDispositions = successfulDispositions;
  }

  /**
   * Resolve every aggregate in place. Inbound candidates are scanned before
   * outbound ones and the first successful contact ends the search.
   * There is no upper bound on how long after the abandon a contact may occur.
   */
  match(
    aggregates: AbandonAggregates,
    inbound: NormalizedInboundCall[],
    outbound: NormalizedOutboundCall[]
  ): RecoveryMatchResult {
    const issues: DataQualityIssue[] = [];
    if (aggregates.size === 0) {
      logger.debug('No abandon phone numbers to search recovery for');
      return { recoveredPhones: 0, issues };
    }

    const inboundIndex = this.indexInbound(inbound, aggregates, issues);
    const outboundIndex = this.indexOutbound(outbound, aggregates, issues);

    let recoveredPhones = 0;
    for (const aggregate of aggregates.values()) {
      const recovered =
        this.scan(aggregate, inboundIndex.get(aggregate.phone)) ||
        this.scan(aggregate, outboundIndex.get(aggregate.phone));
      if (recovered) {
        recoveredPhones++;
      }
    }

    logger.info(`Found recovery calls for ${recoveredPhones} phone numbers`);
    return { recoveredPhones, issues };
  }

  isSuccessful(disposition: string): boolean {
    return this.successfulDispositions.has(disposition.trim());
  }

  /** Returns true once the aggregate is recovered */
  private scan(aggregate: PhoneAbandonAggregate, candidates: RecoveryAttempt[] | undefined): boolean {
    if (!candidates) {
      return false;
    }

    const after = aggregate.firstAbandonTime.getTime();
    for (const candidate of candidates) {
      if (candidate.callTime.getTime() <= after) {
        continue;
      }

      // First failed attempt is kept until a success replaces it
      if (candidate.successful || !aggregate.recoveryAttempt) {
        aggregate.recoveryAttempt = { ...candidate };
      }
      aggregate.status = transitionStatus(aggregate.status, candidate.successful);

      if (aggregate.status === 'RECOVERED') {
        return true;
      }
    }
    return false;
  }

  private indexInbound(
    calls: NormalizedInboundCall[],
    aggregates: AbandonAggregates,
    issues: DataQualityIssue[]
  ): CandidateIndex {
    const index: CandidateIndex = new Map();
    for (const call of calls) {
      if (call.outcome !== 'ANSWERED' || !aggregates.has(call.phone)) {
        continue;
      }
      const { record } = call;
      this.append(index, call.phone, {
        direction: 'INBOUND',
        callTime: call.callTime,
        callTimeRaw: record.callTime,
        businessDate: call.businessDate,
        disposition: record.dispositionCode,
        username: record.username,
        talkTime: record.talkTime || '00:00:00',
        talkSeconds: this.talkSeconds(record.talkTime, 'INBOUND_QUEUE', record.rowNumber, issues),
        successful: this.isSuccessful(record.dispositionCode),
      });
    }
    return index;
  }

  private indexOutbound(
    calls: NormalizedOutboundCall[],
    aggregates: AbandonAggregates,
    issues: DataQualityIssue[]
  ): CandidateIndex {
    const index: CandidateIndex = new Map();
    for (const call of calls) {
      const { record } = call;
      if (
        record.callType.trim() !== OUTBOUND_MANUAL_DIAL ||
        record.systemDisposition.trim() !== OUTBOUND_CONNECTED ||
        !aggregates.has(call.phone)
      ) {
        continue;
      }
      this.append(index, call.phone, {
        direction: 'OUTBOUND',
        callTime: call.callTime,
        callTimeRaw: record.callTime,
        businessDate: call.businessDate,
        disposition: record.dispositionCode,
        username: record.userName,
        talkTime: record.talkTime || '00:00:00',
        talkSeconds: this.talkSeconds(record.talkTime, 'OUTBOUND_DIALER', record.rowNumber, issues),
        successful: this.isSuccessful(record.dispositionCode),
      });
    }
    return index;
  }

  private append(index: CandidateIndex, phone: NormalizedPhone, attempt: RecoveryAttempt): void {
    const existing = index.get(phone);
    if (existing) {
      existing.push(attempt);
    } else {
      index.set(phone, [attempt]);
    }
  }

  private talkSeconds(raw: string, source: LogSource, rowNumber: number, issues: DataQualityIssue[]): number {
    const result = this.normalizer.parseDuration(raw);
    if (!result.ok) {
      issues.push({ ...result.issue, source, rowNumber });
      return 0;
    }
    return result.value;
  }
}
