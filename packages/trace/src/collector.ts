/**
 * Event Collector
 *
 * Append-only event collection with hash chain integrity, written as JSONL to
 * one file per UTC day.
 */

import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import type {
  LogEvent,
  LogEventType,
  EventSink,
  EventSource,
  RecordOptions,
} from '@honeyport/protocol';
import {
  createEvent,
  generateId,
  getTimestamp,
  toJsonl,
  fromJsonl,
  verifyChain,
  errorMessage,
} from '@honeyport/protocol';

export interface CollectorOptions {
  /** Session ID for this collector (generated if not provided) */
  session_id?: string;
  /** Output directory for log files */
  output_dir?: string;
  /** Enable file output */
  file_output?: boolean;
  /** Event source information */
  source?: EventSource;
  /** Buffer size before flush */
  buffer_size?: number;
  /** Flush interval in ms (0 disables the timer) */
  flush_interval_ms?: number;
  /** Events kept in memory for inspection */
  max_retained_events?: number;
}

/**
 * Daily log file name, e.g. log-2024-05-01.jsonl
 */
export function logFileName(date: Date = new Date()): string {
  return `log-${date.toISOString().slice(0, 10)}.jsonl`;
}

/**
 * Event Collector
 *
 * Collects and streams log events. `record` never performs I/O; buffered
 * events are written by `flush`.
 */
export class EventCollector extends EventEmitter implements EventSink {
  private readonly sessionId: string;
  private readonly source?: EventSource;
  private readonly outputDir?: string;
  private readonly fileOutput: boolean;
  private readonly bufferSize: number;
  private readonly maxRetained: number;

  private events: LogEvent[] = [];
  private buffer: LogEvent[] = [];
  private sequence = 0;
  private totalRecorded = 0;
  private lastEventHash?: string;
  private flushTimer?: NodeJS.Timeout;
  private flushing: Promise<void> = Promise.resolve();
  private fileHandle?: fs.promises.FileHandle;
  private openFileName?: string;
  private closed = false;

  constructor(options: CollectorOptions = {}) {
    super();
    this.sessionId = options.session_id ?? generateId();
    this.source = options.source;
    this.outputDir = options.output_dir;
    this.fileOutput = options.file_output ?? false;
    this.bufferSize = options.buffer_size ?? 100;
    this.maxRetained = options.max_retained_events ?? 1000;

    const flushInterval = options.flush_interval_ms ?? 1000;
    if (flushInterval > 0) {
      this.flushTimer = setInterval(() => void this.flush(), flushInterval);
      this.flushTimer.unref();
    }
  }

  /**
   * Get the session ID
   */
  getSessionId(): string {
    return this.sessionId;
  }

  /**
   * Record an event. After close, events are still emitted to listeners but no
   * longer buffered for the file.
   */
  record(
    eventType: LogEventType,
    payload: Record<string, unknown>,
    options: RecordOptions = {}
  ): LogEvent {
    const event = createEvent(eventType, payload, {
      session_id: this.sessionId,
      sequence: ++this.sequence,
      severity: options.severity,
      previous_event_hash: this.lastEventHash,
      source: this.source,
    });

    this.lastEventHash = event.event_hash;
    this.totalRecorded++;

    this.events.push(event);
    if (this.events.length > this.maxRetained) {
      this.events.splice(0, this.events.length - this.maxRetained);
    }

    if (!this.closed) {
      this.buffer.push(event);
    }

    super.emit('event', event);

    if (this.buffer.length >= this.bufferSize) {
      void this.flush();
    }

    return event;
  }

  /**
   * Get retained events
   */
  getEvents(): LogEvent[] {
    return [...this.events];
  }

  /**
   * Get retained events of one type
   */
  getEventsByType(eventType: LogEventType): LogEvent[] {
    return this.events.filter(e => e.event_type === eventType);
  }

  /**
   * Flush buffered events to the current day's file. Flushes are serialized.
   */
  flush(): Promise<void> {
    this.flushing = this.flushing.then(() => this.writeBuffered());
    return this.flushing;
  }

  private async writeBuffered(): Promise<void> {
    if (this.buffer.length === 0) return;
    if (!this.fileOutput || !this.outputDir) {
      this.buffer = [];
      return;
    }

    const eventsToFlush = [...this.buffer];
    this.buffer = [];

    try {
      await fs.promises.mkdir(this.outputDir, { recursive: true });

      const fileName = logFileName();
      if (this.fileHandle && this.openFileName !== fileName) {
        await this.fileHandle.close();
        this.fileHandle = undefined;
      }
      if (!this.fileHandle) {
        this.fileHandle = await fs.promises.open(path.join(this.outputDir, fileName), 'a');
        this.openFileName = fileName;
      }

      const lines = eventsToFlush.map(e => toJsonl(e) + '\n').join('');
      await this.fileHandle.write(lines);
    } catch (error) {
      // Put events back in buffer on failure
      this.buffer = eventsToFlush.concat(this.buffer);
      this.reportError(error);
    }
  }

  private reportError(error: unknown): void {
    if (this.listenerCount('error') > 0) {
      super.emit('error', error);
    } else {
      console.error(`Event log flush failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Verify the integrity of retained events
   */
  verify(): { valid: boolean; errors: string[] } {
    return verifyChain(this.events);
  }

  /**
   * Get summary of collected events
   */
  getSummary(): {
    session_id: string;
    event_count: number;
    started_at: string;
    ended_at?: string;
  } {
    const firstEvent = this.events[0];
    const lastEvent = this.events[this.events.length - 1];

    return {
      session_id: this.sessionId,
      event_count: this.totalRecorded,
      started_at: firstEvent?.timestamp ?? getTimestamp(),
      ended_at: lastEvent?.timestamp,
    };
  }

  /**
   * Close the collector
   */
  async close(): Promise<void> {
    if (this.closed) return;

    this.closed = true;

    if (this.flushTimer) {
      clearInterval(this.flushTimer);
    }

    await this.flush();

    if (this.fileHandle) {
      await this.fileHandle.close();
      this.fileHandle = undefined;
    }

    super.emit('close');
  }
}

/**
 * Load events from a log file
 */
export async function loadLogFile(filePath: string): Promise<LogEvent[]> {
  const content = await fs.promises.readFile(filePath, 'utf-8');
  const lines = content.split('\n').filter(line => line.trim());
  return lines.map(line => fromJsonl(line));
}
