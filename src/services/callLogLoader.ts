/**
 * Call log loader - Reads ACD and dialer logs from Excel/CSV files or a
 * public CSV export URL and maps their columns onto the record schema
 */
import axios from 'axios';
import { parse } from 'csv-parse/sync';
import { format } from 'date-fns';
import * as XLSX from 'xlsx';
import { extname } from 'path';
import { FileManager } from '../utils/fileManager.js';
import { logger } from '../utils/logger.js';
import type {
  DataQualityIssue,
  InboundCallRecord,
  LoadResult,
  LogSource,
  OutboundCallRecord,
} from '../types/index.js';

type InboundFields = Exclude<keyof InboundCallRecord, 'source' | 'rowNumber'>;
type OutboundFields = Exclude<keyof OutboundCallRecord, 'source' | 'rowNumber'>;

/** Expected column title per record field */
export const INBOUND_COLUMNS: Record<InboundFields, string> = {
  phone: 'Phone',
  answeredHungup: 'Answered/Hungup',
  waitTime: 'Wait Time at ACD',
  callTime: 'Call Time',
  queueName: 'Queue Name',
  username: 'Username',
  dispositionCode: 'User Disposition Code',
  talkTime: 'User Talk Time',
};

export const OUTBOUND_COLUMNS: Record<OutboundFields, string> = {
  phone: 'Phone',
  callType: 'Call Type',
  systemDisposition: 'System Disposition',
  callTime: 'Call Time',
  dispositionCode: 'Disposition Code',
  userName: 'User Name',
  talkTime: 'User Talk Time',
};

interface MappedRows<T> {
  rows: T[];
  issues: DataQualityIssue[];
}

function cellToString(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value).trim();
}

const SECONDS_PER_DAY = 86400;
const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Typed workbook cell as the text a CSV export would carry. Excel stores
 * durations as fractions of a day and long phone numbers as plain numbers.
 */
function workbookCellToString(value: unknown): string {
  if (value instanceof Date) {
    // Serial dates can land a few milliseconds short of the second
    const rounded = new Date(Math.round(value.getTime() / 1000) * 1000);
    return format(rounded, 'yyyy-MM-dd HH:mm:ss');
  }
  if (typeof value === 'number') {
    if (Number.isInteger(value)) {
      return String(value);
    }
    if (value > 0 && value < 1) {
      const total = Math.round(value * SECONDS_PER_DAY);
      return `${pad(Math.floor(total / 3600))}:${pad(Math.floor((total % 3600) / 60))}:${pad(total % 60)}`;
    }
  }
  return cellToString(value);
}

function toStringMatrix(value: unknown, convert: (cell: unknown) => string = cellToString): string[][] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.map((row: unknown) => (Array.isArray(row) ? row.map(convert) : []));
}

/**
 * Index of the column for a title: exact case-insensitive match first,
 * then the first header containing the title.
 */
export function findColumn(headers: string[], title: string): number {
  const wanted = title.toLowerCase();
  const lowered = headers.map((h) => h.toLowerCase());
  const exact = lowered.indexOf(wanted);
  if (exact !== -1) {
    return exact;
  }
  return lowered.findIndex((h) => h !== '' && h.includes(wanted));
}

/**
 * Map a header row plus data rows onto named fields.
 * Missing columns are reported once and read as ''.
 */
export function mapRows<F extends string, T>(
  matrix: string[][],
  columns: Record<F, string>,
  source: LogSource,
  build: (read: (field: F) => string, rowNumber: number) => T
): MappedRows<T> {
  const issues: DataQualityIssue[] = [];
  const [headerRow, ...dataRows] = matrix;

  // Row numbers follow the sheet: header is row 1
  const rows = dataRows
    .map((cells, i) => ({ cells, rowNumber: i + 2 }))
    .filter(({ cells }) => cells.some((cell) => cell !== ''));

  // Empty logs are reported by the analysis, not per column
  if (!headerRow || rows.length === 0) {
    return { rows: [], issues };
  }

  const headers = headerRow.map((h) => h.trim());
  const positions = new Map<string, number>();
  for (const field in columns) {
    const title = columns[field];
    const index = findColumn(headers, title);
    if (index === -1) {
      issues.push({ kind: 'MissingColumn', source, details: `Column '${title}' not found` });
    } else {
      positions.set(field, index);
    }
  }

  const mapped = rows.map(({ cells, rowNumber }) => {
    const read = (field: F): string => {
      const index = positions.get(field);
      return index === undefined ? '' : cells[index] ?? '';
    };
    return build(read, rowNumber);
  });

  return { rows: mapped, issues };
}

export class CallLogLoader {
  private httpTimeoutMs: number;

  constructor(httpTimeoutMs = 30000) {
    this.httpTimeoutMs = httpTimeoutMs;
  }

  async loadInboundLog(source: string): Promise<LoadResult<InboundCallRecord>> {
    const matrix = await this.readMatrix(source);
    const { rows: records, issues } = mapRows(
      matrix,
      INBOUND_COLUMNS,
      'INBOUND_QUEUE',
      (read, rowNumber): InboundCallRecord => ({
        source: 'INBOUND_QUEUE',
        rowNumber,
        phone: read('phone'),
        answeredHungup: read('answeredHungup'),
        waitTime: read('waitTime'),
        callTime: read('callTime'),
        queueName: read('queueName'),
        username: read('username'),
        dispositionCode: read('dispositionCode'),
        talkTime: read('talkTime'),
      })
    );
    logger.info(`Loaded ${records.length} ACD records from ${source}`);
    return { records, issues };
  }

  async loadOutboundLog(source: string): Promise<LoadResult<OutboundCallRecord>> {
    const matrix = await this.readMatrix(source);
    const { rows: records, issues } = mapRows(
      matrix,
      OUTBOUND_COLUMNS,
      'OUTBOUND_DIALER',
      (read, rowNumber): OutboundCallRecord => ({
        source: 'OUTBOUND_DIALER',
        rowNumber,
        phone: read('phone'),
        callType: read('callType'),
        systemDisposition: read('systemDisposition'),
        callTime: read('callTime'),
        dispositionCode: read('dispositionCode'),
        userName: read('userName'),
        talkTime: read('talkTime'),
      })
    );
    logger.info(`Loaded ${records.length} CALL records from ${source}`);
    return { records, issues };
  }

  /**
   * Header row followed by data rows, every cell as trimmed text
   */
  async readMatrix(source: string): Promise<string[][]> {
    if (/^https?:\/\//i.test(source)) {
      return CallLogLoader.parseCsv(await this.fetchCsv(source));
    }

    const extension = extname(source).toLowerCase();
    const buffer = await FileManager.readBuffer(source);
    if (extension === '.csv') {
      return CallLogLoader.parseCsv(buffer.toString('utf-8'));
    }
    if (extension === '.xlsx' || extension === '.xls') {
      return CallLogLoader.parseWorkbook(buffer);
    }
    throw new Error(`Unsupported log format '${extension || source}': expected .xlsx, .xls or .csv`);
  }

  static parseCsv(text: string): string[][] {
    const parsed: unknown = parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    });
    return toStringMatrix(parsed);
  }

  /** First sheet of the workbook, typed cells converted to text */
  static parseWorkbook(buffer: Buffer): string[][] {
    const workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });
    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
    if (!sheet) {
      return [];
    }
    const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      raw: true,
      defval: '',
      blankrows: false,
    });
    return toStringMatrix(rows, workbookCellToString);
  }

  private async fetchCsv(url: string): Promise<string> {
    try {
      logger.debug(`CSV URL: ${url}`);
      const response = await axios.get<string>(url, {
        responseType: 'text',
        timeout: this.httpTimeoutMs,
      });

      if (response.status !== 200) {
        throw new Error(`Failed to fetch log: HTTP ${response.status}`);
      }
      return response.data;
    } catch (error) {
      const message = error instanceof Error && error.message ? error.message : 'Unknown error';
      logger.error(`Failed to fetch call log from ${url}:`, message);

      if (axios.isAxiosError(error) && error.response) {
        logger.error(`HTTP ${error.response.status}: ${error.response.statusText}`);
      }

      throw new Error(`Call log fetch failed: ${message}`);
    }
  }
}
