// api/_lib/services/transcript.ts
import type { Message } from '../types/riskTypes';
import { AppValidationError, MalformedTimestampError, MissingFieldError } from '../middleware/errorHandler';

/** Input contract supplied by the ingestion layer. */
export interface TranscriptRecord {
  timestamp: string | number | Date;
  sender: string;
  channel: string;
  message: string;
}

// ISO-8601 date with optional time and zone; a zone-less value is read as UTC
const ISO_DATETIME = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;

function validDate(ms: number): Date | null {
  const date = new Date(ms);
  return Number.isNaN(date.getTime()) ? null : date;
}

function offsetMinutes(zone: string | undefined): number | null {
  if (!zone || zone.toUpperCase() === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2)) : 0;
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes);
}

function parseIsoString(text: string): Date | null {
  const match = ISO_DATETIME.exec(text);
  if (!match) return null;

  const [, year, month, day, hour = '00', minute = '00', second = '00', fraction = '', zone] = match;
  if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) return null;

  const offset = offsetMinutes(zone);
  if (offset === null) return null;

  const millis = fraction.padEnd(3, '0').slice(0, 3);
  const utc = Date.parse(`${year}-${month}-${day}T${hour}:${minute}:${second}.${millis}Z`);
  if (Number.isNaN(utc)) return null;

  // Date.parse rolls 2024-02-30 over into March; a valid date keeps its calendar fields
  if (new Date(utc).toISOString().slice(0, 10) !== `${year}-${month}-${day}`) return null;

  return validDate(utc - offset * 60_000);
}

export function parseTimestamp(raw: unknown): Date | null {
  if (raw instanceof Date) return validDate(raw.getTime());
  if (typeof raw === 'number') return Number.isFinite(raw) ? validDate(raw) : null;
  if (typeof raw !== 'string') return null;
  return parseIsoString(raw.trim());
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireIdentity(record: Record<string, unknown>, field: 'sender' | 'channel', recordIndex: number): string {
  const value = record[field];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new MissingFieldError(recordIndex, field);
  }
  return value;
}

/**
 * Validate raw records and return immutable Messages sorted by timestamp.
 *
 * The batch is all-or-nothing: the first bad record throws, naming its input index.
 * Equal timestamps keep their input order.
 */
export function toMessages(records: readonly unknown[]): Message[] {
  const parsed = records.map((record, recordIndex) => {
    if (!isRecordObject(record)) {
      throw new AppValidationError(`Record ${recordIndex} is not an object`, [
        { field: '', message: 'Expected an object', recordIndex },
      ]);
    }

    if (record.timestamp === undefined || record.timestamp === null) {
      throw new MissingFieldError(recordIndex, 'timestamp');
    }
    const timestamp = parseTimestamp(record.timestamp);
    if (!timestamp) {
      throw new MalformedTimestampError(recordIndex, record.timestamp);
    }

    const sender = requireIdentity(record, 'sender', recordIndex);
    const channel = requireIdentity(record, 'channel', recordIndex);

    // Empty text is valid and scores neutral
    const text = record.message;
    if (typeof text !== 'string') {
      throw new MissingFieldError(recordIndex, 'message');
    }

    return { sourceIndex: recordIndex, timestamp, sender, channel, text };
  });

  return parsed
    .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime() || a.sourceIndex - b.sourceIndex)
    .map((m, index) => Object.freeze({ index, ...m }));
}
