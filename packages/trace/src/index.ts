/**
 * honeyport Trace Package
 *
 * Event collector and log file tooling for captured decoy traffic.
 */

export { EventCollector, loadLogFile, logFileName } from './collector.js';
export type { CollectorOptions } from './collector.js';

export { summarizeEvents, remoteHost } from './summary.js';
export type { LogSummary, PeerCount } from './summary.js';

export type {
  LogEvent,
  LogEventType,
  Severity,
  EventSink,
  EventSource,
  RecordOptions,
} from '@honeyport/protocol';

export {
  LOG_VERSION,
  verifyChain,
  verifyEventHash,
  toJsonl,
  fromJsonl,
} from '@honeyport/protocol';
