/**
 * Record builders shared by the unit tests
 */
import type { InboundCallRecord, OutboundCallRecord } from '../types/index.js';

/** Fixed "now" so the timestamp sanity window does not move with the calendar */
export const REFERENCE_TIME = new Date(2025, 8, 1, 12, 0, 0);

export function inbound(overrides: Partial<Omit<InboundCallRecord, 'source'>> = {}): InboundCallRecord {
  return {
    source: 'INBOUND_QUEUE',
    rowNumber: 2,
    phone: '5551234567',
    answeredHungup: 'HUNGUP',
    waitTime: '00:00:45',
    callTime: '2025-08-18 10:00:00',
    queueName: 'Support',
    username: '',
    dispositionCode: '',
    talkTime: '00:00:00',
    ...overrides,
  };
}

export function answered(overrides: Partial<Omit<InboundCallRecord, 'source'>> = {}): InboundCallRecord {
  return inbound({
    answeredHungup: 'ANSWERED',
    waitTime: '00:00:10',
    username: 'agent.inbound',
    talkTime: '00:04:00',
    ...overrides,
  });
}

export function outbound(overrides: Partial<Omit<OutboundCallRecord, 'source'>> = {}): OutboundCallRecord {
  return {
    source: 'OUTBOUND_DIALER',
    rowNumber: 2,
    phone: '5551234567',
    callType: 'outbound.manual.dial',
    systemDisposition: 'CONNECTED',
    callTime: '2025-08-18 12:00:00',
    dispositionCode: 'MI',
    userName: 'agent.outbound',
    talkTime: '00:03:00',
    ...overrides,
  };
}

/**
 * A two-day ACD log: three abandoning phones (one recovered inbound),
 * one quick drop, one invalid phone and one stale timestamp.
 */
export function sampleInboundLog(): InboundCallRecord[] {
  return [
    inbound({ rowNumber: 2, phone: '5551234567', waitTime: '00:00:45', callTime: '2025-08-18 10:00:00' }),
    answered({ rowNumber: 3, phone: '(555) 123-4567', callTime: '2025-08-18 11:00:00', dispositionCode: 'MI' }),
    inbound({ rowNumber: 4, phone: '5559876543', waitTime: '00:00:20', callTime: '2025-08-18 12:00:00' }),
    inbound({ rowNumber: 5, phone: '5550001111', waitTime: '00:01:00', callTime: '2025-08-18 13:00:00' }),
    inbound({ rowNumber: 6, phone: '5550001111', waitTime: '00:01:30', callTime: '2025-08-19 09:00:00' }),
    inbound({ rowNumber: 7, phone: '5552223333', waitTime: '00:00:30', callTime: '2025-08-19 05:00:00' }),
    answered({ rowNumber: 8, phone: '5554445555', callTime: '2025-08-19 10:00:00' }),
    inbound({ rowNumber: 9, phone: 'abc', callTime: '2025-08-19 11:00:00' }),
    inbound({ rowNumber: 10, phone: '5556667777', waitTime: '00:00:50', callTime: '2022-01-01 10:00:00' }),
  ];
}
