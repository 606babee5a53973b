/**
 * Fixed business rules for abandon classification and recovery matching
 */

/** Hung-up calls that waited longer than this are abandons; the rest are quick drops */
export const QUICK_DROP_THRESHOLD_SECONDS = 27;

/** Calls before this hour belong to the previous business day (6AM-6AM cycle) */
export const BUSINESS_DAY_START_HOUR = 6;

export const TIMESTAMP_MAX_AGE_DAYS = 730;
export const TIMESTAMP_MAX_FUTURE_DAYS = 365;

export const PHONE_MIN_DIGITS = 10;
export const PHONE_MAX_DIGITS = 15;

export const OUTBOUND_MANUAL_DIAL = 'outbound.manual.dial';
export const OUTBOUND_CONNECTED = 'CONNECTED';

/** Dispositions that count as the customer having been reached */
export const SUCCESSFUL_DISPOSITIONS: ReadonlySet<string> = new Set([
  'Others',
  'MI',
  'PQC',
  'AE',
  'AE MI',
  'AE PQC',
  'Non-case',
  'Test',
  'AE PQC MI',
  'PQC MI',
  'Inbound Follow-up',
  'Translation AE',
]);
