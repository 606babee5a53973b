/**
 * Type definitions for the abandon call analysis pipeline
 */

export type LogSource = 'INBOUND_QUEUE' | 'OUTBOUND_DIALER';

/** Raw row from the ACD (inbound queue) log, columns already mapped by the loader */
export interface InboundCallRecord {
  source: 'INBOUND_QUEUE';
  rowNumber: number;
  phone: string;
  answeredHungup: string;
  waitTime: string;
  callTime: string;
  queueName: string;
  username: string;
  dispositionCode: string;
  talkTime: string;
}

/** Raw row from the outbound dialer (CALL details) log */
export interface OutboundCallRecord {
  source: 'OUTBOUND_DIALER';
  rowNumber: number;
  phone: string;
  callType: string;
  systemDisposition: string;
  callTime: string;
  dispositionCode: string;
  userName: string;
  talkTime: string;
}

export type CallRecord = InboundCallRecord | OutboundCallRecord;

/** Last 10 digits of a validated phone number */
export type NormalizedPhone = string;

/** Operating day on the 6AM-6AM cycle, formatted YYYY-MM-DD */
export type BusinessDate = string;

export type CallOutcome = 'ANSWERED' | 'HUNGUP';

export interface NormalizedInboundCall {
  record: InboundCallRecord;
  phone: NormalizedPhone;
  callTime: Date;
  businessDate: BusinessDate;
  outcome: CallOutcome;
  waitSeconds: number;
}

export interface NormalizedOutboundCall {
  record: OutboundCallRecord;
  phone: NormalizedPhone;
  callTime: Date;
  businessDate: BusinessDate;
}

export type IssueKind =
  | 'InvalidPhone'
  | 'InvalidTimestamp'
  | 'InvalidDuration'
  | 'InvalidCallStatus'
  | 'MissingColumn'
  | 'EmptyDataset';

export interface DataQualityIssue {
  kind: IssueKind;
  details: string;
  source?: LogSource;
  rowNumber?: number;
}

export type NormalizeResult<T> =
  | { ok: true; value: T }
  | { ok: false; issue: DataQualityIssue };

export interface AbandonEvent {
  callTime: Date;
  callTimeRaw: string;
  businessDate: BusinessDate;
  waitSeconds: number;
  queueName: string;
  username: string;
  disposition: string;
}

export type RecoveryStatus = 'RECOVERED' | 'ATTEMPTED' | 'NEEDS_OUTBOUND';

export type RecoveryDirection = 'INBOUND' | 'OUTBOUND';

export interface RecoveryAttempt {
  direction: RecoveryDirection;
  callTime: Date;
  callTimeRaw: string;
  businessDate: BusinessDate;
  disposition: string;
  username: string;
  talkTime: string;
  talkSeconds: number;
  successful: boolean;
}

export interface PhoneAbandonAggregate {
  phone: NormalizedPhone;
  originalPhone: string;
  firstAbandonTime: Date;
  firstAbandonTimeRaw: string;
  firstAbandonBusinessDate: BusinessDate;
  abandonEvents: AbandonEvent[];
  abandonCount: number;
  status: RecoveryStatus;
  recoveryAttempt?: RecoveryAttempt;
}

export type AbandonAggregates = Map<NormalizedPhone, PhoneAbandonAggregate>;

export interface SummaryMetrics {
  validCalls: number;
  answeredCalls: number;
  hungupCalls: number;
  quickDrops: number;
  abandonCalls: number;
  uniqueAbandonPhones: number;
  recoveredPhones: number;
  needingOutboundPhones: number;
  abandonmentRate: number;
}

export interface DailyMetrics extends SummaryMetrics {
  businessDate: BusinessDate;
}

export interface ConsistencyCheck {
  name: string;
  passed: boolean;
  message: string;
}

export interface AnalysisResult {
  summary: SummaryMetrics;
  aggregates: AbandonAggregates;
  daily: DailyMetrics[];
  checks: ConsistencyCheck[];
  issues: DataQualityIssue[];
}

export interface LoadResult<T extends CallRecord> {
  records: T[];
  issues: DataQualityIssue[];
}

export interface AnalysisOptions {
  acdSource: string;
  callSource?: string;
  outputDir: string;
  reportFilename: string;
  writeJson: boolean;
}

export interface AnalysisStats {
  inboundRecords: number;
  outboundRecords: number;
  validInboundCalls: number;
  uniqueAbandonPhones: number;
  recoveredPhones: number;
  failedChecks: number;
  issueCount: number;
  reportPath?: string;
  jsonPath?: string;
  startTime: Date;
  endTime?: Date;
}
