/**
 * honeyport Server Package
 *
 * Multi-port TCP decoy: per-port accept loops behind one admission gate,
 * tracked connections and ordered shutdown.
 */

export { HoneyportServer, type ServerDependencies } from './server.js';
export { AdmissionGate, type AdmissionToken } from './admission-gate.js';
export { ConnectionRegistry } from './connection-registry.js';
export {
  ConnectionHandler,
  formatPayload,
  type HandlerOptions,
  type HandlerContext,
  type CapturedPayload,
} from './connection-handler.js';
export { PortListener, type ListenerState, type ListenerContext } from './port-listener.js';
export { ShutdownCoordinator, type ShutdownContext, type ShutdownResult } from './shutdown.js';
export {
  createConnection,
  formatRemoteAddress,
  type Connection,
  type ConnectionRecord,
} from './connection.js';
export {
  loadConfig,
  loadConfigFile,
  parseFileConfig,
  resolveConfig,
  envLayer,
  decodeEscapes,
  parseBannerFlags,
  describeConfig,
  type ConfigLayer,
  type ConfigResult,
  type ParsedFile,
  type LoadConfigOptions,
} from './config.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_PORTS,
  DEFAULT_RESPONSE,
  MAX_TIMER_DELAY_MS,
  guardSink,
  type HoneyportConfig,
  type ResponseData,
  type ServerMetrics,
  type ServerStats,
  type ConnectionErrorType,
} from './types.js';
