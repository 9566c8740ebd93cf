/**
 * Event log types
 *
 * Every state transition and per-connection outcome the decoy observes is
 * recorded as a structured, hash-chained event.
 */

// =============================================================================
// Core Types
// =============================================================================

export type LogVersion = '1.0';

export type Severity = 'debug' | 'info' | 'warn' | 'error';

// =============================================================================
// Event Types
// =============================================================================

export type LogEventType =
  // Listener lifecycle
  | 'listener_started'
  | 'listener_stopped'
  | 'listen_error'
  | 'accept_error'

  // Connection outcomes
  | 'connection_received'
  | 'write_error'
  | 'read_error'
  | 'data_received'

  // Shutdown
  | 'shutdown_signal'
  | 'connections_closed'
  | 'shutdown_complete'

  // Configuration
  | 'config_loaded'
  | 'invalid_port';

export const LOG_EVENT_TYPES: readonly LogEventType[] = [
  'listener_started',
  'listener_stopped',
  'listen_error',
  'accept_error',
  'connection_received',
  'write_error',
  'read_error',
  'data_received',
  'shutdown_signal',
  'connections_closed',
  'shutdown_complete',
  'config_loaded',
  'invalid_port',
];

// =============================================================================
// Event Source
// =============================================================================

export interface EventSource {
  /** Component name (e.g., "honeyport.server") */
  component: string;
  /** Component version */
  version: string;
  /** Instance ID when several decoys share one log sink */
  instance_id?: string;
}

// =============================================================================
// Log Event
// =============================================================================

export interface LogEvent {
  /** Format version */
  log_version: LogVersion;

  /** Unique event ID (UUIDv7, time-ordered) */
  event_id: string;
  /** Monotonic sequence number within session */
  sequence: number;
  /** ISO 8601 timestamp */
  timestamp: string;

  /** Process run identifier */
  session_id: string;

  /** Event classification */
  event_type: LogEventType;
  /** Severity level */
  severity: Severity;

  /** Event-specific payload */
  payload: Record<string, unknown>;

  /** SHA-256 of previous event (chain) */
  previous_event_hash?: string;
  /** SHA-256 of this event (excluding this field) */
  event_hash: string;

  /** Event source information */
  source: EventSource;
}

export interface RecordOptions {
  severity?: Severity;
}

/**
 * The logging collaborator as seen by the core.
 *
 * `record` is synchronous; the core never waits on, or fails because of, the
 * sink's own I/O.
 */
export interface EventSink {
  record(eventType: LogEventType, payload: Record<string, unknown>, options?: RecordOptions): void;
}
