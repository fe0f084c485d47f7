import { DomainError, MalformedSignalError } from '../common/errors';
import { toInstant } from '../common/utils/time.util';
import { ParsedSignal, parseSignal } from '../signals/dto/signal.dto';

// Every exported row starts with the numeric alert id column
const ROW_START = /^(\d+),/;

export interface ExportedFill {
  /** Alert id column of the export row. */
  exportId: string;
  /** Close price the alert carried when it fired. */
  price: number;
  time: Date;
}

export type ExportedSignal = ParsedSignal & ExportedFill;

export interface RejectedRow {
  exportId: string;
  reason: string;
}

export interface AlertExport {
  signals: ExportedSignal[];
  rejected: RejectedRow[];
}

/**
 * Reads an alert log export. Each row's message must be the webhook JSON
 * plus `close` (or `price`) and an offset-qualified `timestamp`. Signals come
 * back in firing order; rows fired before `after` are dropped.
 */
export function parseAlertExport(content: string, after?: Date): AlertExport {
  const signals: ExportedSignal[] = [];
  const rejected: RejectedRow[] = [];

  for (const row of splitExportRows(content)) {
    const exportId = ROW_START.exec(row)?.[1] ?? '';
    try {
      signals.push(parseExportRow(row, exportId));
    } catch (error: unknown) {
      if (!(error instanceof DomainError)) {
        throw error;
      }
      rejected.push({ exportId, reason: error.message });
    }
  }

  const kept = after ? signals.filter((s) => s.time.getTime() >= after.getTime()) : signals;
  return { signals: kept.sort((a, b) => a.time.getTime() - b.time.getTime()), rejected };
}

/**
 * Groups physical lines into rows. A message may span several lines, so a
 * new row only starts once the braces of the previous one are balanced.
 */
export function splitExportRows(content: string): string[] {
  const rows: string[] = [];
  let current: string[] = [];
  let depth = 0;

  for (const line of content.split(/\r?\n/)) {
    if (!line.trim()) {
      continue;
    }
    if (depth <= 0 && ROW_START.test(line)) {
      if (current.length > 0) {
        rows.push(current.join('\n'));
      }
      current = [line];
      depth = braceBalance(line);
    } else if (current.length > 0) {
      current.push(line);
      depth += braceBalance(line);
    }
  }
  if (current.length > 0) {
    rows.push(current.join('\n'));
  }
  return rows;
}

function parseExportRow(row: string, exportId: string): ExportedSignal {
  const start = row.indexOf('{');
  const end = row.lastIndexOf('}');
  if (start === -1 || end < start) {
    throw new MalformedSignalError('Row carries no JSON alert message', { exportId });
  }

  let json = row.slice(start, end + 1);
  if (row[start - 1] === '"') {
    // Quoted CSV field: quotes inside it are doubled
    json = json.replace(/""/g, '"');
  }

  let body: unknown;
  try {
    body = JSON.parse(json);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedSignalError(`Alert message is not valid JSON: ${message}`, { exportId });
  }

  const signal = parseSignal(body);
  const fields = recordOf(body);
  const price = positiveNumber(fields.close) ?? positiveNumber(fields.price);
  if (price === null) {
    throw new MalformedSignalError('Alert message needs a positive close price', { exportId });
  }
  const time = toInstant(fields.timestamp);
  if (!time) {
    throw new MalformedSignalError('Alert message needs a timestamp with an offset', { exportId });
  }

  return { ...signal, exportId, price, time };
}

function recordOf(body: unknown): Record<string, unknown> {
  return typeof body === 'object' && body !== null ? Object.fromEntries(Object.entries(body)) : {};
}

function positiveNumber(value: unknown): number | null {
  const parsed = typeof value === 'number' ? value : typeof value === 'string' && value.trim() ? Number(value) : NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

function braceBalance(line: string): number {
  let balance = 0;
  for (const char of line) {
    if (char === '{') {
      balance += 1;
    } else if (char === '}') {
      balance -= 1;
    }
  }
  return balance;
}
