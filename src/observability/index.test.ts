/**
 * Tests for logging
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  ConsoleLogger,
  LogLevel,
  NoopLogger,
  createRequestContext,
  type LogSink,
  type RequestContext,
} from './index.js';

describe('ConsoleLogger', () => {
  let lines: Array<[LogLevel, string]>;
  let sink: LogSink;

  const context: RequestContext = {
    requestId: 'req-1',
    operation: 'SendEmail',
    startTime: new Date('2026-10-19T08:05:09Z'),
  };

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-10-19T08:05:09.000Z'));
    lines = [];
    sink = (level, line) => {
      lines.push([level, line]);
    };
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should write one line per entry', () => {
    new ConsoleLogger(LogLevel.Info, undefined, sink).info('ready');

    expect(lines).toEqual([[LogLevel.Info, '2026-10-19T08:05:09.000Z [INFO] ready']]);
  });

  it('should include the request context and fields', () => {
    new ConsoleLogger(LogLevel.Debug, undefined, sink).withContext(context).warn('careful', { status: 400 });

    expect(lines).toEqual([
      [LogLevel.Warn, '2026-10-19T08:05:09.000Z [WARN] [req-1] [SendEmail] careful {"status":400}'],
    ]);
  });

  it('should drop entries below the minimum level', () => {
    const logger = new ConsoleLogger(LogLevel.Warn, undefined, sink);

    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');
    logger.error('error');

    expect(lines.map(([level]) => level)).toEqual([LogLevel.Warn, LogLevel.Error]);
  });

  it('should add the error message to the fields', () => {
    new ConsoleLogger(LogLevel.Info, undefined, sink).error('failed', new Error('boom'), { attempt: 1 });

    expect(lines).toHaveLength(1);
    expect(lines[0]?.[1]).toContain('[ERROR] failed {"attempt":1,"error":"boom","stack":');
  });
});

describe('NoopLogger', () => {
  it('should return itself for any context', () => {
    const logger = new NoopLogger();
    expect(logger.withContext(createRequestContext('SendEmail'))).toBe(logger);
  });
});

describe('createRequestContext', () => {
  it('should create a unique ID per call', () => {
    const first = createRequestContext('SendEmail');
    const second = createRequestContext('SendEmail');

    expect(first.operation).toBe('SendEmail');
    expect(first.requestId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(second.requestId).not.toBe(first.requestId);
  });
});
