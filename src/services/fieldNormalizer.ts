/**
 * Field normalizer - Validates and canonicalizes phone numbers, timestamps
 * and durations, and assigns calls to their business date
 */
import { addDays, format, isValid, parse, parseISO, subDays } from 'date-fns';
import {
  BUSINESS_DAY_START_HOUR,
  PHONE_MAX_DIGITS,
  PHONE_MIN_DIGITS,
  TIMESTAMP_MAX_AGE_DAYS,
  TIMESTAMP_MAX_FUTURE_DAYS,
} from '../config/constants.js';
import type {
  BusinessDate,
  CallOutcome,
  DataQualityIssue,
  InboundCallRecord,
  LogSource,
  NormalizedInboundCall,
  NormalizedOutboundCall,
  NormalizedPhone,
  NormalizeResult,
  OutboundCallRecord,
} from '../types/index.js';

const MERIDIEM_MARKER = /\b(AM|PM)\b/i;
const ISO_DATE_PREFIX = /^\d{4}-\d{1,2}-\d{1,2}/;

// Dialer exports write 12-hour times with a meridiem
const TWELVE_HOUR_FORMATS = ['MM-dd-yyyy hh:mm:ss a', 'MM/dd/yyyy hh:mm:ss a', 'MM-dd-yyyy hh:mm a', 'MM/dd/yyyy hh:mm a'];
const MONTH_FIRST_FORMATS = [
  'MM/dd/yyyy HH:mm:ss',
  'MM-dd-yyyy HH:mm:ss',
  'MM/dd/yyyy HH:mm',
  'MM-dd-yyyy HH:mm',
  'MM/dd/yyyy',
  'MM-dd-yyyy',
];

function reject(kind: DataQualityIssue['kind'], details: string): { ok: false; issue: DataQualityIssue } {
  return { ok: false, issue: { kind, details } };
}

export interface NormalizedLog<T> {
  calls: T[];
  issues: DataQualityIssue[];
}

export class FieldNormalizer {
  private readonly referenceTime: Date;
  private readonly minTime: number;
  private readonly maxTime: number;

  /**
   * @param referenceTime - centre of the accepted timestamp window; defaults to now
   */
  constructor(referenceTime: Date = new Date()) {
    this.referenceTime = referenceTime;
    this.minTime = subDays(referenceTime, TIMESTAMP_MAX_AGE_DAYS).getTime();
    this.maxTime = addDays(referenceTime, TIMESTAMP_MAX_FUTURE_DAYS).getTime();
  }

  /**
   * Strip formatting and keep the last 10 digits
   * e.g. "+1 (555) 123-4567" -> "5551234567"
   */
  normalizePhone(raw: string): NormalizeResult<NormalizedPhone> {
    const digits = raw.replace(/\D/g, '');
    if (digits.length < PHONE_MIN_DIGITS) {
      return reject('InvalidPhone', raw.trim() === '' ? 'Empty phone number' : `Too short: ${raw}`);
    }
    if (digits.length > PHONE_MAX_DIGITS) {
      return reject('InvalidPhone', `Too long: ${raw}`);
    }
    return { ok: true, value: digits.slice(-PHONE_MIN_DIGITS) };
  }

  normalizeTimestamp(raw: string): NormalizeResult<Date> {
    const text = raw.trim();
    if (text === '') {
      return reject('InvalidTimestamp', 'Empty timestamp');
    }

    const parsed = MERIDIEM_MARKER.test(text)
      ? this.parseWithFormats(text, TWELVE_HOUR_FORMATS)
      : this.parseTwentyFourHour(text);
    if (!parsed) {
      return reject('InvalidTimestamp', `Unparseable timestamp: ${raw}`);
    }

    const time = parsed.getTime();
    if (time < this.minTime || time > this.maxTime) {
      return reject('InvalidTimestamp', `Date outside reasonable range: ${raw}`);
    }
    return { ok: true, value: parsed };
  }

  /** Calls before 6AM belong to the previous day's operating cycle */
  businessDate(timestamp: Date): BusinessDate {
    if (timestamp.getHours() < BUSINESS_DAY_START_HOUR) {
      return format(subDays(timestamp, 1), 'yyyy-MM-dd');
    }
    return format(timestamp, 'yyyy-MM-dd');
  }

  /**
   * HH:MM:SS -> seconds. Empty input is zero; out-of-range parts are rejected.
   */
  parseDuration(raw: string): NormalizeResult<number> {
    const text = raw.trim();
    if (text === '' || text === '00:00:00') {
      return { ok: true, value: 0 };
    }

    const parts = text.split(':');
    if (parts.length !== 3) {
      return { ok: true, value: 0 };
    }

    const [hours, minutes, seconds] = parts.map((part) => (/^\d+$/.test(part) ? parseInt(part, 10) : 0));
    const h = hours ?? 0;
    const m = minutes ?? 0;
    const s = seconds ?? 0;
    if (h > 24 || m > 59 || s > 59) {
      return reject('InvalidDuration', `Out of range: ${raw}`);
    }
    return { ok: true, value: h * 3600 + m * 60 + s };
  }

  callOutcome(raw: string): NormalizeResult<CallOutcome> {
    const value = raw.trim().toUpperCase();
    if (value === 'ANSWERED' || value === 'HUNGUP') {
      return { ok: true, value };
    }
    return reject('InvalidCallStatus', `Unknown Answered/Hungup value: ${raw}`);
  }

  /**
   * One pass over the ACD log. A call is kept only when its phone, timestamp
   * and answered/hungup flag are all valid.
   */
  normalizeInboundLog(records: InboundCallRecord[]): NormalizedLog<NormalizedInboundCall> {
    const calls: NormalizedInboundCall[] = [];
    const issues: DataQualityIssue[] = [];
    const track = (issue: DataQualityIssue, record: InboundCallRecord) =>
      issues.push(this.locate(issue, 'INBOUND_QUEUE', record.rowNumber));

    for (const record of records) {
      const phone = this.normalizePhone(record.phone);
      if (!phone.ok) {
        track(phone.issue, record);
        continue;
      }

      const callTime = this.normalizeTimestamp(record.callTime);
      if (!callTime.ok) {
        track(callTime.issue, record);
        continue;
      }

      const outcome = this.callOutcome(record.answeredHungup);
      if (!outcome.ok) {
        track(outcome.issue, record);
        continue;
      }

      const wait = this.parseDuration(record.waitTime);
      if (!wait.ok) {
        track(wait.issue, record);
      }

      calls.push({
        record,
        phone: phone.value,
        callTime: callTime.value,
        businessDate: this.businessDate(callTime.value),
        outcome: outcome.value,
        waitSeconds: wait.ok ? wait.value : 0,
      });
    }

    return { calls, issues };
  }

  normalizeOutboundLog(records: OutboundCallRecord[]): NormalizedLog<NormalizedOutboundCall> {
    const calls: NormalizedOutboundCall[] = [];
    const issues: DataQualityIssue[] = [];

    for (const record of records) {
      const phone = this.normalizePhone(record.phone);
      if (!phone.ok) {
        issues.push(this.locate(phone.issue, 'OUTBOUND_DIALER', record.rowNumber));
        continue;
      }

      const callTime = this.normalizeTimestamp(record.callTime);
      if (!callTime.ok) {
        issues.push(this.locate(callTime.issue, 'OUTBOUND_DIALER', record.rowNumber));
        continue;
      }

      calls.push({
        record,
        phone: phone.value,
        callTime: callTime.value,
        businessDate: this.businessDate(callTime.value),
      });
    }

    return { calls, issues };
  }

  private locate(issue: DataQualityIssue, source: LogSource, rowNumber: number): DataQualityIssue {
    return { ...issue, source, rowNumber };
  }

  private parseWithFormats(text: string, formats: string[]): Date | null {
    for (const pattern of formats) {
      const parsed = parse(text, pattern, this.referenceTime);
      if (isValid(parsed)) {
        return parsed;
      }
    }
    return null;
  }

  private parseTwentyFourHour(text: string): Date | null {
    if (ISO_DATE_PREFIX.test(text)) {
      const parsed = parseISO(text);
      return isValid(parsed) ? parsed : null;
    }
    return this.parseWithFormats(text, MONTH_FIRST_FORMATS);
  }
}
