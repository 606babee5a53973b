/**
 * Report writer - Lays the analysis out as the six-sheet Excel workbook
 * handed to team leads
 */
import { format, parseISO } from 'date-fns';
import * as XLSX from 'xlsx';
import { QUICK_DROP_THRESHOLD_SECONDS } from '../config/constants.js';
import { FileManager } from '../utils/fileManager.js';
import { logger } from '../utils/logger.js';
import type {
  AnalysisResult,
  DailyMetrics,
  PhoneAbandonAggregate,
  SummaryMetrics,
} from '../types/index.js';

type SheetRow = Record<string, string | number>;

/** YYYY-MM-DD business date in the MM-DD-YYYY report layout */
const toDisplayDate = (businessDate: string): string => format(parseISO(businessDate), 'MM-dd-yyyy');

export type AssignmentPriority = 'High' | 'Medium' | 'Normal';

export const METRIC_LABELS: Record<keyof SummaryMetrics, string> = {
  validCalls: 'Total Valid Calls',
  answeredCalls: 'Total Answered Calls',
  hungupCalls: 'Total Hungup Calls',
  quickDrops: `Quick Drops (≤${QUICK_DROP_THRESHOLD_SECONDS} sec)`,
  abandonCalls: `Abandon Calls (>${QUICK_DROP_THRESHOLD_SECONDS} sec)`,
  uniqueAbandonPhones: 'Unique Abandon Phone Numbers',
  recoveredPhones: 'Unique Phones Recovered',
  needingOutboundPhones: 'Unique Phones Needing Outbound Calls',
  abandonmentRate: 'Abandonment Rate (%)',
};

const CALL_COUNT_METRICS: ReadonlyArray<keyof SummaryMetrics> = [
  'answeredCalls',
  'hungupCalls',
  'quickDrops',
  'abandonCalls',
];

const METRIC_ORDER: ReadonlyArray<keyof SummaryMetrics> = [
  'validCalls',
  'answeredCalls',
  'hungupCalls',
  'quickDrops',
  'abandonCalls',
  'uniqueAbandonPhones',
  'recoveredPhones',
  'needingOutboundPhones',
  'abandonmentRate',
];

const PRIORITY_RANK: Record<AssignmentPriority, number> = { High: 0, Medium: 1, Normal: 2 };

function percent(count: number, total: number): string {
  return total > 0 ? `${((count / total) * 100).toFixed(1)}%` : '0.0%';
}

/** "12 (34.5%)" share-of-day cell used by the daily sheet */
function countWithShare(count: number, total: number): string {
  return `${count} (${percent(count, total)})`;
}

export function assignmentPriority(abandonCount: number): AssignmentPriority {
  if (abandonCount > 2) return 'High';
  if (abandonCount > 1) return 'Medium';
  return 'Normal';
}

export function kpiRows(summary: SummaryMetrics): SheetRow[] {
  return METRIC_ORDER.map((metric) => {
    const count = summary[metric];
    let share = '-';
    if (CALL_COUNT_METRICS.includes(metric)) {
      share = percent(count, summary.validCalls);
    } else if (metric === 'abandonmentRate') {
      share = `${count}%`;
    }
    return { Metric: METRIC_LABELS[metric], Count: count, Percentage: share };
  });
}

export function initialAbandonRows(aggregates: PhoneAbandonAggregate[]): SheetRow[] {
  return aggregates.map((a) => ({
    'Phone Number': a.phone,
    'Original Phone Format': a.originalPhone,
    'First Abandon Timestamp': a.firstAbandonTimeRaw,
    'First Abandon Business Date': toDisplayDate(a.firstAbandonBusinessDate),
    'Total Abandon Calls': a.abandonCount,
    Status: 'Initial Abandon (Pre-Recovery Analysis)',
  }));
}

export function recoveryRows(aggregates: PhoneAbandonAggregate[]): SheetRow[] {
  const rows: SheetRow[] = [];
  for (const a of aggregates) {
    const attempt = a.recoveryAttempt;
    if (!attempt) continue;
    rows.push({
      'Phone Number': a.phone,
      'First Abandon Timestamp': a.firstAbandonTimeRaw,
      'Recovery Call Timestamp': attempt.callTimeRaw,
      'Recovery Type': attempt.direction,
      'Successful (Yes/No)': a.status === 'RECOVERED' ? 'Yes' : 'No',
      'User Name': attempt.username,
      'User Talk Time': attempt.talkTime,
      Disposition: attempt.disposition,
      'Recovery Status': a.status,
    });
  }
  return rows;
}

export function finalStatusRows(aggregates: PhoneAbandonAggregate[]): SheetRow[] {
  return aggregates.map((a) => {
    const recovered = a.status === 'RECOVERED';
    return {
      'Phone Number': a.phone,
      'First Abandon Time': a.firstAbandonTimeRaw,
      'First Abandon Business Date': toDisplayDate(a.firstAbandonBusinessDate),
      'Total Abandon Calls': a.abandonCount,
      'Recovery Status': a.status,
      'Final Status': recovered ? 'Recovered' : 'Needs Outbound Call',
      'Action Required': recovered ? 'None - Recovered' : 'Schedule Outbound Call',
    };
  });
}

/** Phones still to call back, highest priority and most abandons first */
export function assignmentRows(aggregates: PhoneAbandonAggregate[]): SheetRow[] {
  return aggregates
    .filter((a) => a.status !== 'RECOVERED')
    .map((a) => ({ aggregate: a, priority: assignmentPriority(a.abandonCount) }))
    .sort(
      (x, y) =>
        PRIORITY_RANK[x.priority] - PRIORITY_RANK[y.priority] ||
        y.aggregate.abandonCount - x.aggregate.abandonCount
    )
    .map(({ aggregate: a, priority }) => ({
      'Phone Number': a.phone,
      'Priority Level': priority,
      'Total Abandon Calls': a.abandonCount,
      'First Abandon Time': a.firstAbandonTimeRaw,
      'First Abandon Business Date': toDisplayDate(a.firstAbandonBusinessDate),
      'Recovery Status': a.status,
      'Assignment Notes': `Customer with ${a.abandonCount} abandon calls - Priority: ${priority}`,
    }));
}

export function dailyRows(daily: DailyMetrics[]): SheetRow[] {
  return daily.map((day) => ({
    'Business Date': toDisplayDate(day.businessDate),
    [METRIC_LABELS.validCalls]: countWithShare(day.validCalls, day.validCalls),
    [METRIC_LABELS.answeredCalls]: countWithShare(day.answeredCalls, day.validCalls),
    [METRIC_LABELS.hungupCalls]: countWithShare(day.hungupCalls, day.validCalls),
    [METRIC_LABELS.quickDrops]: countWithShare(day.quickDrops, day.validCalls),
    [METRIC_LABELS.abandonCalls]: countWithShare(day.abandonCalls, day.validCalls),
    [METRIC_LABELS.uniqueAbandonPhones]: day.uniqueAbandonPhones,
    [METRIC_LABELS.recoveredPhones]: day.recoveredPhones,
    [METRIC_LABELS.needingOutboundPhones]: day.needingOutboundPhones,
    [METRIC_LABELS.abandonmentRate]: `${day.abandonmentRate.toFixed(1)}%`,
  }));
}

export class ReportWriter {
  buildWorkbook(result: AnalysisResult): XLSX.WorkBook {
    const aggregates = [...result.aggregates.values()];
    const workbook = XLSX.utils.book_new();

    const sheets: Array<[string, SheetRow[]]> = [
      ['KPI Standard', kpiRows(result.summary)],
      ['Initial Abandon Report', initialAbandonRows(aggregates)],
      ['Recovery Details', recoveryRows(aggregates)],
      ['Final Phone Status', finalStatusRows(aggregates)],
      ['Team Leader Assignment', assignmentRows(aggregates)],
      ['Daily Row Format', dailyRows(result.daily)],
    ];

    for (const [name, rows] of sheets) {
      XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(rows), name);
    }
    return workbook;
  }

  async writeWorkbook(result: AnalysisResult, filePath: string): Promise<void> {
    const workbook = this.buildWorkbook(result);
    const buffer: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    if (!Buffer.isBuffer(buffer)) {
      throw new Error(`Workbook serialization did not produce a buffer for ${filePath}`);
    }
    await FileManager.writeBuffer(filePath, buffer);
    logger.success(`Saved report to: ${filePath}`);
  }

  async writeJson(result: AnalysisResult, filePath: string): Promise<void> {
    await FileManager.writeJSON(filePath, {
      summary: result.summary,
      checks: result.checks,
      daily: result.daily,
      phones: [...result.aggregates.values()],
      issues: result.issues,
    });
    logger.success(`Saved JSON to: ${filePath}`);
  }
}
