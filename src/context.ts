/**
 * Execution context passed to every pipeline stage.
 */

import { randomUUID } from 'crypto';
import type { Logger } from './observability/index.js';
import { NoopLogger } from './observability/index.js';
import type { EventSink, PipelineEvent, PipelineEventType } from './types/events.js';

export interface ExecutionContext {
  /** Identifier of the current run */
  readonly runId: string;
  readonly logger: Logger;
  readonly events: EventSink;
}

/**
 * Sink that records events as debug log lines; audit-relevant events
 * are raised to info
 */
export class LoggingEventSink implements EventSink {
  constructor(private readonly logger: Logger) {}

  emit(event: PipelineEvent): void {
    const { type, ...fields } = event;
    if (type === 'subtitle_count_changed') {
      this.logger.info(`event:${type}`, fields);
    } else {
      this.logger.debug(`event:${type}`, fields);
    }
  }
}

/**
 * Sink that keeps every event, for tests
 */
export class InMemoryEventSink implements EventSink {
  readonly events: PipelineEvent[] = [];

  emit(event: PipelineEvent): void {
    this.events.push(event);
  }

  ofType<T extends PipelineEventType>(type: T): Array<Extract<PipelineEvent, { type: T }>> {
    return this.events.filter(
      (event): event is Extract<PipelineEvent, { type: T }> => event.type === type
    );
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * Build a context; the event sink defaults to logging through the logger
 */
export function createContext(options: {
  logger?: Logger;
  events?: EventSink;
  runId?: string;
} = {}): ExecutionContext {
  const runId = options.runId ?? randomUUID();
  const logger = (options.logger ?? new NoopLogger()).child({ runId });
  return {
    runId,
    logger,
    events: options.events ?? new LoggingEventSink(logger),
  };
}

/**
 * Derive a context whose logger carries the file being processed
 */
export function forFile(ctx: ExecutionContext, filePath: string): ExecutionContext {
  return { ...ctx, logger: ctx.logger.child({ file: filePath }) };
}
