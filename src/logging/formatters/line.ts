/**
 * Line Formatter - Traditional single-line log format
 */

import type { LogEntry } from '../logger.js';
import type { LogFormatter } from './types.js';

/**
 * Formats log entries as traditional single-line format.
 *
 * @example
 * W, [2024-03-01T09:00:00.000Z #3784] WARN -- ledger: Reversal clamped to balance order_id=42 clamped=30
 */
export class LineFormatter implements LogFormatter {
  format(entry: LogEntry): string {
    const { level, timestamp, pid, progname } = entry;
    const prefix = `${level.charAt(0).toUpperCase()}, [${timestamp.toISOString()} #${pid}] ${level.toUpperCase()} -- ${progname}:`;
    const body = entry.result ? formatResult(entry) : (entry.message ?? '');
    const fields = formatFields(entry.fields);
    return fields.length > 0 ? `${prefix} ${body} ${fields}` : `${prefix} ${body}`;
  }
}

function formatResult(entry: LogEntry): string {
  const { result, tags } = entry;
  if (!result) return '';

  const parts: string[] = [`class="${result.type}"`];

  if (tags && tags.length > 0) {
    parts.push(`tags=[${tags.map((t) => `"${t}"`).join(', ')}]`);
  }

  parts.push(`id="${result.taskId}"`);
  parts.push(`state="${result.state}"`);
  parts.push(`status="${result.status}"`);
  parts.push(`outcome="${result.outcome}"`);

  if (Object.keys(result.metadata).length > 0) {
    parts.push(`metadata=${formatMetadata(result.metadata)}`);
  }

  if (result.reason) {
    parts.push(`reason="${escapeString(result.reason)}"`);
  }

  if (result.retries > 0) {
    parts.push(`retries=${result.retries}`);
  }

  return parts.join(' ');
}

function formatFields(fields: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    parts.push(`${key}=${formatValue(value)}`);
  }
  return parts.join(' ');
}

function formatMetadata(metadata: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(metadata)) {
    if (value === undefined) continue;
    parts.push(`${key}: ${formatValue(value)}`);
  }
  return `{${parts.join(', ')}}`;
}

function formatValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return `"${escapeString(value)}"`;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (value instanceof Date) return `"${value.toISOString()}"`;
  if (value instanceof Error) return `"${escapeString(`[${value.name}] ${value.message}`)}"`;
  if (Array.isArray(value)) return `[${value.map(formatValue).join(', ')}]`;
  if (typeof value === 'object') return formatMetadata({ ...value });
  return String(value);
}

function escapeString(str: string): string {
  return str.replace(/"/g, '\\"').replace(/\n/g, '\\n');
}
