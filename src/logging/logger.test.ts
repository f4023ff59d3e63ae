import { describe, it, expect } from 'vitest';
import type { ResultJSON } from '../result.js';
import { JsonFormatter } from './formatters/json.js';
import { LineFormatter } from './formatters/line.js';
import { Logger, type LogEntry } from './logger.js';
import { createTestLogger, MemoryLogOutput } from '../testing/fixtures.js';

const TIMESTAMP = new Date('2026-03-01T09:00:00.000Z');

function entry(overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    level: 'info',
    timestamp: TIMESTAMP,
    pid: 42,
    progname: 'ledger',
    fields: {},
    ...overrides,
  };
}

const RESULT: ResultJSON = {
  type: 'ProcessOrderPointsTask',
  taskId: 'task-1',
  state: 'interrupted',
  status: 'failed',
  outcome: 'failed',
  reason: 'order_not_found',
  metadata: { orderId: 9 },
  retries: 2,
  rolledBack: false,
};

describe('Logger', () => {
  describe('LineFormatter', () => {
    const formatter = new LineFormatter();

    it('should format a message with its fields', () => {
      const line = formatter.format(
        entry({
          level: 'warn',
          message: 'Reversal clamped to balance',
          fields: { order_id: 42, note: 'say "hi"', skipped: undefined, user_id: null },
        })
      );

      expect(line).toBe(
        'W, [2026-03-01T09:00:00.000Z #42] WARN -- ledger: Reversal clamped to balance ' +
          'order_id=42 note="say \\"hi\\"" user_id=null'
      );
    });

    it('should render errors, dates and nested values', () => {
      const line = formatter.format(
        entry({
          message: 'x',
          fields: {
            error: new TypeError('bad'),
            at: TIMESTAMP,
            ids: [1, 2],
            total: { amount: '5', currency: 'EUR' },
          },
        })
      );

      expect(line).toBe(
        'I, [2026-03-01T09:00:00.000Z #42] INFO -- ledger: x error="[TypeError] bad" ' +
          'at="2026-03-01T09:00:00.000Z" ids=[1, 2] total={amount: "5", currency: "EUR"}'
      );
    });

    it('should format a task result', () => {
      const line = formatter.format(entry({ level: 'error', result: RESULT, tags: ['loyalty'] }));

      expect(line).toBe(
        'E, [2026-03-01T09:00:00.000Z #42] ERROR -- ledger: class="ProcessOrderPointsTask" ' +
          'tags=["loyalty"] id="task-1" state="interrupted" status="failed" outcome="failed" ' +
          'metadata={orderId: 9} reason="order_not_found" retries=2'
      );
    });
  });

  describe('JsonFormatter', () => {
    const formatter = new JsonFormatter();

    it('should emit one compact object per entry', () => {
      const line = formatter.format(
        entry({
          message: 'Order created',
          fields: { order_id: 1, level: 'shadowed', big: 5n, error: new RangeError('no') },
        })
      );

      expect(JSON.parse(line)).toEqual({
        level: 'info',
        timestamp: '2026-03-01T09:00:00.000Z',
        pid: 42,
        progname: 'ledger',
        message: 'Order created',
        order_id: 1,
        big: '5',
        error: '[RangeError] no',
      });
      expect(line).not.toContain('\n');
    });

    it('should flatten a task result', () => {
      const line = formatter.format(entry({ result: RESULT, tags: ['loyalty'] }));
      const parsed: unknown = JSON.parse(line);

      expect(parsed).toMatchObject({
        class: 'ProcessOrderPointsTask',
        taskId: 'task-1',
        status: 'failed',
        metadata: { orderId: 9 },
        reason: 'order_not_found',
        retries: 2,
        tags: ['loyalty'],
      });
    });
  });

  describe('levels and fields', () => {
    it('should drop entries below the level', () => {
      const { logger, output } = createTestLogger('warn');

      logger.info('ignored');
      logger.warn('kept');

      expect(output.messages()).toEqual(['kept']);
    });

    it('should not build lazy messages that are filtered out', () => {
      const { logger, output } = createTestLogger('info');
      let built = false;

      logger.debug(() => {
        built = true;
        return 'expensive';
      });

      expect(built).toBe(false);
      expect(output.lines).toEqual([]);
    });

    it('should bind fields on child loggers', () => {
      const { logger, output } = createTestLogger();

      logger
        .child({ component: 'stock' })
        .child({ product_id: 3 })
        .info('Stock reserved', { quantity: 2 });

      expect(output.find('Stock reserved')).toMatchObject({
        component: 'stock',
        product_id: 3,
        quantity: 2,
        progname: 'test',
      });
    });

    it('should write nothing while disabled', () => {
      const output = new MemoryLogOutput();
      const logger = new Logger({ output, formatter: new JsonFormatter() });

      logger.disable();
      logger.error('hidden');
      logger.enable();
      logger.error('shown');

      expect(output.messages()).toEqual(['shown']);
    });

    it('should honour a changed level', () => {
      const { logger, output } = createTestLogger('error');

      logger.setLevel('debug');
      logger.debug('now visible');

      expect(output.messages()).toEqual(['now visible']);
    });
  });
});
