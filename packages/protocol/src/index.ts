/**
 * honeyport Protocol Package
 *
 * Event log types, listener set validation and error types shared by every
 * honeyport package.
 */

export * from './log/types.js';
export {
  LOG_VERSION,
  generateId,
  getTimestamp,
  canonicalize,
  createEvent,
  verifyEventHash,
  verifyChain,
  toJsonl,
  fromJsonl,
  isLogEvent,
  isLogEventType,
  isSeverity,
} from './log/utils.js';

export type { ListenerSet, PortWarning } from './ports/utils.js';
export {
  parsePort,
  isValidPort,
  splitPortList,
  resolveListenerSet,
} from './ports/utils.js';

export {
  HoneyportError,
  isHoneyportError,
  errorMessage,
  type HoneyportErrorCode,
} from './errors.js';
