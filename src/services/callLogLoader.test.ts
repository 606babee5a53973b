import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import axios, { AxiosHeaders } from 'axios';
import * as XLSX from 'xlsx';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CallLogLoader, findColumn, mapRows, INBOUND_COLUMNS } from './callLogLoader.js';
import { FieldNormalizer } from './fieldNormalizer.js';
import { REFERENCE_TIME } from '../test-utils/records.js';

const ACD_CSV = [
  'phone,Answered/Hungup,Wait Time at ACD,Call Time,Queue Name,Username,User Disposition Code',
  '"+1 (555) 123-4567", HUNGUP ,00:00:45,2025-08-18 10:00:00,Support,,',
  '5559876543,ANSWERED,00:00:05,2025-08-18 11:00:00,Support,agent.one,MI',
].join('\n');

describe('findColumn', () => {
  it('matches titles case-insensitively', () => {
    expect(findColumn(['CALL TIME', 'PHONE'], 'Phone')).toBe(1);
  });

  it('prefers an exact title over a containing one', () => {
    expect(findColumn(['User Disposition Code', 'Disposition Code'], 'Disposition Code')).toBe(1);
  });

  it('falls back to a header containing the title', () => {
    expect(findColumn(['Customer Phone No', 'Call Time'], 'Phone')).toBe(0);
  });

  it('returns -1 when nothing matches', () => {
    expect(findColumn(['Call Time'], 'Queue Name')).toBe(-1);
  });
});

describe('mapRows', () => {
  it('reads nothing from a header-only sheet', () => {
    const { rows, issues } = mapRows([['Phone']], INBOUND_COLUMNS, 'INBOUND_QUEUE', (read) => read('phone'));
    expect(rows).toEqual([]);
    expect(issues).toEqual([]);
  });

  it('skips blank rows but keeps sheet row numbers', () => {
    const { rows } = mapRows(
      [['Phone'], ['', ''], ['5551234567']],
      { phone: 'Phone' },
      'INBOUND_QUEUE',
      (read, rowNumber) => `${rowNumber}:${read('phone')}`
    );
    expect(rows).toEqual(['3:5551234567']);
  });
});

describe('CallLogLoader', () => {
  let dir: string;
  const loader = new CallLogLoader(5000);

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'abandon-loader-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('loads an ACD CSV and reports missing columns', async () => {
    const file = join(dir, 'acd.csv');
    await writeFile(file, ACD_CSV, 'utf-8');

    const { records, issues } = await loader.loadInboundLog(file);

    expect(records).toEqual([
      {
        source: 'INBOUND_QUEUE',
        rowNumber: 2,
        phone: '+1 (555) 123-4567',
        answeredHungup: 'HUNGUP',
        waitTime: '00:00:45',
        callTime: '2025-08-18 10:00:00',
        queueName: 'Support',
        username: '',
        dispositionCode: '',
        talkTime: '',
      },
      {
        source: 'INBOUND_QUEUE',
        rowNumber: 3,
        phone: '5559876543',
        answeredHungup: 'ANSWERED',
        waitTime: '00:00:05',
        callTime: '2025-08-18 11:00:00',
        queueName: 'Support',
        username: 'agent.one',
        dispositionCode: 'MI',
        talkTime: '',
      },
    ]);
    expect(issues).toEqual([
      { kind: 'MissingColumn', source: 'INBOUND_QUEUE', details: "Column 'User Talk Time' not found" },
    ]);
  });

  it('loads the first sheet of a dialer workbook', async () => {
    const workbook = XLSX.utils.book_new();
    const sheet = XLSX.utils.aoa_to_sheet([
      ['Phone', 'Call Type', 'System Disposition', 'Call Time', 'Disposition Code', 'User Name', 'User Talk Time'],
      ['5551234567', 'outbound.manual.dial', 'CONNECTED', '08-20-2025 02:15:00 PM', 'PQC', 'agent.two', '00:03:00'],
    ]);
    XLSX.utils.book_append_sheet(workbook, sheet, 'Calls');
    const file = join(dir, 'calls.xlsx');
    const buffer: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    if (!Buffer.isBuffer(buffer)) throw new Error('expected a buffer');
    await writeFile(file, buffer);

    const { records, issues } = await loader.loadOutboundLog(file);

    expect(issues).toEqual([]);
    expect(records).toEqual([
      {
        source: 'OUTBOUND_DIALER',
        rowNumber: 2,
        phone: '5551234567',
        callType: 'outbound.manual.dial',
        systemDisposition: 'CONNECTED',
        callTime: '08-20-2025 02:15:00 PM',
        dispositionCode: 'PQC',
        userName: 'agent.two',
        talkTime: '00:03:00',
      },
    ]);
  });

  it('reads numeric phones, date cells and day-fraction durations from a workbook', async () => {
    const workbook = XLSX.utils.book_new();
    const sheet = XLSX.utils.aoa_to_sheet([
      [
        'Phone',
        'Answered/Hungup',
        'Wait Time at ACD',
        'Call Time',
        'Queue Name',
        'Username',
        'User Disposition Code',
        'User Talk Time',
      ],
      [919876543210, 'HUNGUP', 45 / 86400, new Date(2025, 7, 18, 10, 0, 0), 'Support', '', '', ''],
    ]);
    XLSX.utils.book_append_sheet(workbook, sheet, 'ACD');
    const file = join(dir, 'acd-typed.xlsx');
    const buffer: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    if (!Buffer.isBuffer(buffer)) throw new Error('expected a buffer');
    await writeFile(file, buffer);

    const { records, issues } = await loader.loadInboundLog(file);

    expect(issues).toEqual([]);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      phone: '919876543210',
      waitTime: '00:00:45',
      callTime: '2025-08-18 10:00:00',
    });

    const { calls } = new FieldNormalizer(REFERENCE_TIME).normalizeInboundLog(records);
    expect(calls).toHaveLength(1);
    expect(calls[0]).toMatchObject({
      phone: '9876543210',
      callTime: new Date(2025, 7, 18, 10, 0, 0),
      businessDate: '2025-08-18',
      waitSeconds: 45,
    });
  });

  it('fetches a CSV export URL', async () => {
    const get = vi.spyOn(axios, 'get').mockResolvedValue({
      status: 200,
      statusText: 'OK',
      data: ACD_CSV,
      headers: {},
      config: { headers: new AxiosHeaders() },
    });

    const { records } = await loader.loadInboundLog('https://example.com/export?format=csv');

    expect(get).toHaveBeenCalledWith('https://example.com/export?format=csv', {
      responseType: 'text',
      timeout: 5000,
    });
    expect(records.map((r) => r.phone)).toEqual(['+1 (555) 123-4567', '5559876543']);
  });

  it('wraps fetch failures', async () => {
    vi.spyOn(axios, 'get').mockRejectedValue(new Error('socket hang up'));

    await expect(loader.loadInboundLog('https://example.com/export')).rejects.toThrow(
      'Call log fetch failed: socket hang up'
    );
  });

  it('rejects unsupported file types', async () => {
    const file = join(dir, 'acd.txt');
    await writeFile(file, ACD_CSV, 'utf-8');

    await expect(loader.loadInboundLog(file)).rejects.toThrow("Unsupported log format '.txt'");
  });
});
