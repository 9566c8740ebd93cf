/**
 * Event log utilities
 */

import { createHash } from 'crypto';
import { v7 as uuidv7 } from 'uuid';
import type {
  LogEvent,
  LogEventType,
  LogVersion,
  Severity,
  EventSource,
} from './types.js';
import { LOG_EVENT_TYPES } from './types.js';

/** Current log format version */
export const LOG_VERSION: LogVersion = '1.0';

/** Default source component */
const DEFAULT_SOURCE: EventSource = {
  component: 'honeyport.server',
  version: '0.1.0',
};

const SEVERITY_ORDER: readonly Severity[] = ['debug', 'info', 'warn', 'error'];

/**
 * Generate a UUIDv7 (time-ordered)
 */
export function generateId(): string {
  return uuidv7();
}

/**
 * Get current ISO 8601 timestamp
 */
export function getTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Compute SHA-256 hash of content
 */
function computeHash(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Create canonical JSON string with sorted keys
 */
export function canonicalize(obj: unknown): string {
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (isPlainObject(value)) {
      const sorted: Record<string, unknown> = {};
      for (const key of Object.keys(value).sort()) {
        sorted[key] = value[key];
      }
      return sorted;
    }
    return value;
  });
}

/**
 * Compute event hash (excluding event_hash field itself)
 */
function computeEventHash(event: Omit<LogEvent, 'event_hash'>): string {
  return computeHash(canonicalize(event));
}

/**
 * Create a log event
 */
export function createEvent(
  eventType: LogEventType,
  payload: Record<string, unknown>,
  options: {
    session_id: string;
    sequence: number;
    severity?: Severity;
    previous_event_hash?: string;
    source?: EventSource;
  }
): LogEvent {
  const eventWithoutHash: Omit<LogEvent, 'event_hash'> = {
    log_version: LOG_VERSION,
    event_id: generateId(),
    sequence: options.sequence,
    timestamp: getTimestamp(),
    session_id: options.session_id,
    event_type: eventType,
    severity: options.severity ?? 'info',
    payload,
    previous_event_hash: options.previous_event_hash,
    source: options.source ?? DEFAULT_SOURCE,
  };

  return {
    ...eventWithoutHash,
    event_hash: computeEventHash(eventWithoutHash),
  };
}

/**
 * Verify event hash integrity
 */
export function verifyEventHash(event: LogEvent): boolean {
  const { event_hash, ...rest } = event;
  return computeEventHash(rest) === event_hash;
}

/**
 * Verify hash chain integrity.
 *
 * A daily log may hold several runs. A change of `session_id` starts a new
 * chain, which must open at sequence 1 with no `previous_event_hash`.
 */
export function verifyChain(events: LogEvent[]): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  events.forEach((event, i) => {
    if (!verifyEventHash(event)) {
      errors.push(`Event ${i} (${event.event_id}): hash mismatch`);
    }

    const previous = i > 0 ? events[i - 1] : undefined;
    if (previous === undefined) {
      return;
    }

    if (event.session_id !== previous.session_id) {
      if (event.sequence !== 1 || event.previous_event_hash !== undefined) {
        errors.push(`Event ${i} (${event.event_id}): session ${event.session_id} does not start a new chain`);
      }
      return;
    }

    if (event.previous_event_hash !== previous.event_hash) {
      errors.push(`Event ${i} (${event.event_id}): chain break`);
    }
  });

  return { valid: errors.length === 0, errors };
}

/**
 * Format event as JSONL line
 */
export function toJsonl(event: LogEvent): string {
  return JSON.stringify(event);
}

/**
 * Parse JSONL line to event
 */
export function fromJsonl(line: string): LogEvent {
  const parsed: unknown = JSON.parse(line);
  if (!isLogEvent(parsed)) {
    throw new Error(`Not a log event: ${line.slice(0, 80)}`);
  }
  return parsed;
}

/**
 * Structural check for a decoded log event
 */
export function isLogEvent(value: unknown): value is LogEvent {
  if (!isPlainObject(value)) return false;
  return (
    value.log_version === LOG_VERSION &&
    typeof value.event_id === 'string' &&
    typeof value.sequence === 'number' &&
    typeof value.timestamp === 'string' &&
    typeof value.session_id === 'string' &&
    typeof value.event_type === 'string' &&
    isLogEventType(value.event_type) &&
    typeof value.severity === 'string' &&
    isSeverity(value.severity) &&
    isPlainObject(value.payload) &&
    typeof value.event_hash === 'string' &&
    isPlainObject(value.source)
  );
}

export function isLogEventType(value: string): value is LogEventType {
  return LOG_EVENT_TYPES.some(t => t === value);
}

export function isSeverity(value: string): value is Severity {
  return SEVERITY_ORDER.some(s => s === value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
