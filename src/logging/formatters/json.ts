/**
 * JSON Formatter - Compact JSON log format
 */

import type { LogEntry } from '../logger.js';
import type { LogFormatter } from './types.js';

/**
 * Formats log entries as compact JSON.
 *
 * @example
 * {"level":"info","timestamp":"2024-03-01T09:00:00.000Z","pid":1,"progname":"ledger","message":"Order created","order_id":42}
 */
export class JsonFormatter implements LogFormatter {
  private pretty: boolean;

  constructor(options?: { pretty?: boolean }) {
    this.pretty = options?.pretty ?? false;
  }

  format(entry: LogEntry): string {
    const { level, timestamp, pid, progname, message, fields, result, tags } = entry;

    const obj: Record<string, unknown> = {
      level,
      timestamp: timestamp.toISOString(),
      pid,
      progname,
    };

    if (message !== undefined) {
      obj.message = message;
    }

    if (result) {
      obj.class = result.type;
      obj.taskId = result.taskId;
      obj.state = result.state;
      obj.status = result.status;
      obj.outcome = result.outcome;
      if (Object.keys(result.metadata).length > 0) {
        obj.metadata = result.metadata;
      }
      if (result.reason) {
        obj.reason = result.reason;
      }
      if (result.retries > 0) {
        obj.retries = result.retries;
      }
    }

    if (tags && tags.length > 0) {
      obj.tags = tags;
    }

    for (const [key, value] of Object.entries(fields)) {
      if (value === undefined || key in obj) continue;
      obj[key] = value instanceof Error ? `[${value.name}] ${value.message}` : value;
    }

    return JSON.stringify(obj, replacer, this.pretty ? 2 : undefined);
  }
}

function replacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}
