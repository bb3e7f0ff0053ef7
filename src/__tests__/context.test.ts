/**
 * Tests for the execution context and event sinks.
 */

import { describe, it, expect } from 'vitest';
import {
  InMemoryEventSink,
  InMemoryLogger,
  LogLevel,
  LoggingEventSink,
  createContext,
  forFile,
} from '../index.js';

describe('createContext', () => {
  it('should tag the logger with the run id', () => {
    const logger = new InMemoryLogger();
    const ctx = createContext({ logger, runId: 'run-1' });

    ctx.logger.info('hello');

    expect(ctx.runId).toBe('run-1');
    expect(logger.getLogs()[0].context).toEqual({ runId: 'run-1' });
  });

  it('should generate a run id', () => {
    expect(createContext().runId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should log events by default', () => {
    const logger = new InMemoryLogger();
    const ctx = createContext({ logger, runId: 'run-1' });

    ctx.events.emit({ type: 'file_skipped', path: '/m/a.mkv' });

    expect(logger.getLogsByLevel(LogLevel.Debug)[0]).toMatchObject({
      message: 'event:file_skipped',
      context: { runId: 'run-1', path: '/m/a.mkv' },
    });
  });
});

describe('forFile', () => {
  it('should add the file to the logger context', () => {
    const logger = new InMemoryLogger();
    const ctx = forFile(createContext({ logger, runId: 'run-1' }), '/m/a.mkv');

    ctx.logger.warn('careful');

    expect(logger.getLogs()[0].context).toEqual({ runId: 'run-1', file: '/m/a.mkv' });
  });
});

describe('LoggingEventSink', () => {
  it('should raise subtitle changes to info', () => {
    const logger = new InMemoryLogger();
    const sink = new LoggingEventSink(logger);

    sink.emit({ type: 'subtitle_count_changed', path: '/m/a.mkv', originalCount: 2, candidateCount: 1 });

    expect(logger.getLogsByLevel(LogLevel.Info)).toHaveLength(1);
    expect(logger.getLogs()[0].context).toEqual({ path: '/m/a.mkv', originalCount: 2, candidateCount: 1 });
  });
});

describe('InMemoryEventSink', () => {
  it('should filter events by type', () => {
    const sink = new InMemoryEventSink();
    sink.emit({ type: 'file_skipped', path: '/m/a.mkv' });
    sink.emit({ type: 'replace_state', path: '/m/a.mkv', state: 'pending' });

    expect(sink.ofType('replace_state')).toEqual([
      { type: 'replace_state', path: '/m/a.mkv', state: 'pending' },
    ]);

    sink.clear();
    expect(sink.events).toEqual([]);
  });
});
