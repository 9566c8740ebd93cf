/**
 * Server types
 */

import type { EventSink, LogEventType, RecordOptions } from '@honeyport/protocol';
import { errorMessage } from '@honeyport/protocol';

// =============================================================================
// Configuration
// =============================================================================

export interface HoneyportConfig {
  /** Ports to listen on, in order */
  ports: number[];
  /** Address to bind */
  host: string;
  /** Connections handled concurrently across all ports */
  maxConnections: number;
  /** Absolute per-connection deadline */
  connectionTimeoutMs: number;
  /** Bytes read from a peer, at most once */
  readBufferSize: number;
  /** Captured payload characters kept in the log */
  maxPayloadLogLength: number;
  /** Sent to peers on ports without a banner */
  defaultResponse: ResponseData;
  /** Per-port response */
  banners: ReadonlyMap<number, ResponseData>;
  /** Delay before retrying after a failed accept */
  acceptBackoffMs: number;
  /** Event log directory */
  logDir: string;
  /** Write the event log to disk */
  fileLog: boolean;
}

/** Text goes out as UTF-8; a Buffer goes out as is */
export type ResponseData = string | Buffer;

/** Largest delay `setTimeout` honours; longer ones fire at once */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const DEFAULT_PORTS = '22,80,8080';
export const DEFAULT_RESPONSE = 'Authentication failed.';

export const DEFAULT_CONFIG: HoneyportConfig = {
  ports: [22, 80, 8080],
  host: '0.0.0.0',
  maxConnections: 100,
  connectionTimeoutMs: 10_000,
  readBufferSize: 1024,
  maxPayloadLogLength: 512,
  defaultResponse: DEFAULT_RESPONSE,
  banners: new Map(),
  acceptBackoffMs: 0,
  logDir: './logs',
  fileLog: true,
};

// =============================================================================
// Metrics hook
// =============================================================================

export type ConnectionErrorType = 'listen' | 'accept' | 'write' | 'read';

/**
 * Implemented by @honeyport/otel; every method must be cheap and non-throwing.
 */
export interface ServerMetrics {
  recordConnection(port: number): void;
  recordBytesReceived(port: number, bytes: number): void;
  recordError(errorType: ConnectionErrorType, port: number): void;
  updateActiveConnections(delta: number): void;
  recordAdmissionWait(durationMs: number): void;
}

// =============================================================================
// Statistics
// =============================================================================

export interface ServerStats {
  uptime_ms: number;
  listeners_active: number;
  connections_total: number;
  connections_active: number;
  connections_waiting: number;
  connections_closed_on_shutdown: number;
  admissions_acquired: number;
  admissions_released: number;
  by_port: Record<string, number>;
}

// =============================================================================
// Logging
// =============================================================================

/**
 * Wrap a sink so a failing logger can never break connection handling.
 */
export function guardSink(sink: EventSink): EventSink {
  return {
    record(eventType: LogEventType, payload: Record<string, unknown>, options?: RecordOptions): void {
      try {
        sink.record(eventType, payload, options);
      } catch (error) {
        console.error(`Failed to record ${eventType}: ${errorMessage(error)}`);
      }
    },
  };
}
