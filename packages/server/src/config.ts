/**
 * Configuration
 *
 * Resolved as defaults <- config file (YAML or JSON) <- environment <- CLI
 * flags. Invalid ports and stray banners are warnings; malformed numbers and
 * an empty port set are errors.
 */

import * as fs from 'fs';
import { parse as parseYaml } from 'yaml';
import type { PortWarning } from '@honeyport/protocol';
import { HoneyportError, errorMessage, parsePort, resolveListenerSet, splitPortList } from '@honeyport/protocol';
import type { HoneyportConfig, ResponseData } from './types.js';
import { DEFAULT_CONFIG, MAX_TIMER_DELAY_MS } from './types.js';

/**
 * One unvalidated source of settings. Numbers may still be strings.
 */
export interface ConfigLayer {
  ports?: string | Array<string | number>;
  host?: string;
  maxConnections?: number | string;
  connectionTimeoutMs?: number | string;
  readBufferSize?: number | string;
  maxPayloadLogLength?: number | string;
  defaultResponse?: ResponseData;
  banners?: Record<string, ResponseData>;
  acceptBackoffMs?: number | string;
  logDir?: string;
  fileLog?: boolean;
}

export interface ConfigResult {
  valid: boolean;
  config: HoneyportConfig;
  errors: string[];
  warnings: string[];
  /** Rejected port entries, one per warning about a port */
  portWarnings: PortWarning[];
}

export interface ParsedFile {
  layer: ConfigLayer;
  errors: string[];
  warnings: string[];
}

const FILE_KEYS: Record<string, keyof ConfigLayer> = {
  ports: 'ports',
  host: 'host',
  max_connections: 'maxConnections',
  connection_timeout_ms: 'connectionTimeoutMs',
  read_buffer_size: 'readBufferSize',
  max_payload_log_length: 'maxPayloadLogLength',
  default_response: 'defaultResponse',
  banners: 'banners',
  accept_backoff_ms: 'acceptBackoffMs',
  log_dir: 'logDir',
  file_log: 'fileLog',
};

// =============================================================================
// Sources
// =============================================================================

/**
 * Read and parse a config file. YAML is a superset of JSON, so both work.
 */
export async function loadConfigFile(filePath: string): Promise<ParsedFile> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new HoneyportError('CONFIG_LOAD_FAILED', `Cannot read config file ${filePath}: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new HoneyportError('CONFIG_LOAD_FAILED', `Cannot parse config file ${filePath}: ${errorMessage(error)}`);
  }

  return parseFileConfig(raw ?? {});
}

/**
 * Map a decoded file (snake_case keys) onto a layer, type-checking each value.
 */
export function parseFileConfig(raw: unknown): ParsedFile {
  const layer: ConfigLayer = {};
  const errors: string[] = [];
  const warnings: string[] = [];

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { layer, errors: ['Config file must contain a mapping'], warnings };
  }

  const entries: Array<[string, unknown]> = Object.entries(raw);
  for (const [key, value] of entries) {
    const field = FILE_KEYS[key];
    if (!field) {
      warnings.push(`Unknown config key: ${key}`);
      continue;
    }

    switch (field) {
      case 'ports':
        if (typeof value === 'string' || typeof value === 'number') {
          layer.ports = String(value);
        } else if (Array.isArray(value)) {
          const list: unknown[] = value;
          layer.ports = list.map(p => (typeof p === 'number' ? p : String(p)));
        } else {
          errors.push('ports must be a list or a comma-separated string');
        }
        break;
      case 'banners':
        if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
          const banners: Record<string, string> = {};
          const bannerEntries: Array<[string, unknown]> = Object.entries(value);
          for (const [port, text] of bannerEntries) {
            if (typeof text === 'string') {
              banners[port] = text;
            } else {
              errors.push(`banners.${port} must be a string`);
            }
          }
          layer.banners = banners;
        } else {
          errors.push('banners must be a mapping of port to text');
        }
        break;
      case 'fileLog':
        if (typeof value === 'boolean') {
          layer.fileLog = value;
        } else {
          errors.push(`${key} must be true or false`);
        }
        break;
      case 'host':
      case 'defaultResponse':
      case 'logDir':
        if (typeof value === 'string') {
          layer[field] = value;
        } else {
          errors.push(`${key} must be a string`);
        }
        break;
      default:
        if (typeof value === 'number' || typeof value === 'string') {
          layer[field] = value;
        } else {
          errors.push(`${key} must be a number`);
        }
    }
  }

  return { layer, errors, warnings };
}

/**
 * Settings from HONEYPORT_* variables
 */
export function envLayer(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const layer: ConfigLayer = {};
  if (env.HONEYPORT_PORTS) layer.ports = env.HONEYPORT_PORTS;
  if (env.HONEYPORT_HOST) layer.host = env.HONEYPORT_HOST;
  if (env.HONEYPORT_MAX_CONNECTIONS) layer.maxConnections = env.HONEYPORT_MAX_CONNECTIONS;
  if (env.HONEYPORT_TIMEOUT_MS) layer.connectionTimeoutMs = env.HONEYPORT_TIMEOUT_MS;
  if (env.HONEYPORT_LOG_DIR) layer.logDir = env.HONEYPORT_LOG_DIR;
  if (env.HONEYPORT_DEFAULT_RESPONSE) layer.defaultResponse = decodeEscapes(env.HONEYPORT_DEFAULT_RESPONSE);
  return layer;
}

const ESCAPE = /\\(x[0-9a-fA-F]{2}|[nrt\\])/g;

/**
 * Expand \n, \r, \t, \\ and \xHH in text typed on a command line.
 *
 * Literal text is UTF-8; each \xHH is the single byte HH.
 */
export function decodeEscapes(text: string): Buffer {
  const parts: Buffer[] = [];
  let last = 0;
  for (const match of text.matchAll(ESCAPE)) {
    const index = match.index ?? last;
    parts.push(Buffer.from(text.slice(last, index), 'utf8'));
    const seq = match[1];
    switch (seq) {
      case 'n': parts.push(Buffer.from('\n')); break;
      case 'r': parts.push(Buffer.from('\r')); break;
      case 't': parts.push(Buffer.from('\t')); break;
      case '\\': parts.push(Buffer.from('\\')); break;
      default: parts.push(Buffer.from([Number.parseInt(seq.slice(1), 16)]));
    }
    last = index + match[0].length;
  }
  parts.push(Buffer.from(text.slice(last), 'utf8'));
  return Buffer.concat(parts);
}

/**
 * Parse "PORT=TEXT" banner flags.
 */
export function parseBannerFlags(specs: string[]): { banners: Record<string, Buffer>; errors: string[] } {
  const banners: Record<string, Buffer> = {};
  const errors: string[] = [];
  for (const spec of specs) {
    const idx = spec.indexOf('=');
    if (idx <= 0) {
      errors.push(`Banner must look like PORT=TEXT: ${spec}`);
      continue;
    }
    banners[spec.slice(0, idx).trim()] = decodeEscapes(spec.slice(idx + 1));
  }
  return { banners, errors };
}

// =============================================================================
// Resolution
// =============================================================================

function readInteger(
  value: number | string | undefined,
  name: string,
  min: number,
  fallback: number,
  errors: string[],
  max = Number.MAX_SAFE_INTEGER
): number {
  if (value === undefined) return fallback;
  const text = String(value).trim();
  const parsed = /^-?[0-9]+$/.test(text) ? Number.parseInt(text, 10) : Number.NaN;
  if (Number.isNaN(parsed) || parsed < min) {
    errors.push(`${name} must be an integer >= ${min}, got ${String(value)}`);
    return fallback;
  }
  if (parsed > max) {
    errors.push(`${name} must be an integer <= ${max}, got ${String(value)}`);
    return fallback;
  }
  return parsed;
}

/**
 * Merge layers (later wins; banner maps merge key by key) and validate.
 */
export function resolveConfig(layers: ConfigLayer[]): ConfigResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const merged: ConfigLayer = {};
  const bannerSpecs: Record<string, ResponseData> = {};

  for (const layer of layers) {
    Object.assign(merged, Object.fromEntries(Object.entries(layer).filter(([, v]) => v !== undefined)));
    Object.assign(bannerSpecs, layer.banners ?? {});
  }

  const portEntries = merged.ports === undefined
    ? DEFAULT_CONFIG.ports
    : typeof merged.ports === 'string' ? splitPortList(merged.ports) : merged.ports;
  const listenerSet = resolveListenerSet(portEntries);
  warnings.push(...listenerSet.warnings.map(w => w.message));
  if (listenerSet.ports.length === 0) {
    errors.push('No valid ports provided.');
  }

  const banners = new Map<number, ResponseData>();
  for (const [entry, text] of Object.entries(bannerSpecs)) {
    const port = parsePort(entry);
    if (port === undefined) {
      warnings.push(`Ignoring banner for invalid port: ${entry}`);
      continue;
    }
    if (!listenerSet.ports.includes(port)) {
      warnings.push(`Banner configured for port ${port}, which is not listened on`);
    }
    banners.set(port, text);
  }

  const config: HoneyportConfig = {
    ports: listenerSet.ports,
    host: merged.host ?? DEFAULT_CONFIG.host,
    maxConnections: readInteger(merged.maxConnections, 'max_connections', 1, DEFAULT_CONFIG.maxConnections, errors),
    connectionTimeoutMs: readInteger(
      merged.connectionTimeoutMs,
      'connection_timeout_ms',
      1,
      DEFAULT_CONFIG.connectionTimeoutMs,
      errors,
      MAX_TIMER_DELAY_MS
    ),
    readBufferSize: readInteger(merged.readBufferSize, 'read_buffer_size', 1, DEFAULT_CONFIG.readBufferSize, errors),
    maxPayloadLogLength: readInteger(
      merged.maxPayloadLogLength, 'max_payload_log_length', 0, DEFAULT_CONFIG.maxPayloadLogLength, errors
    ),
    defaultResponse: merged.defaultResponse ?? DEFAULT_CONFIG.defaultResponse,
    banners,
    acceptBackoffMs: readInteger(merged.acceptBackoffMs, 'accept_backoff_ms', 0, DEFAULT_CONFIG.acceptBackoffMs, errors),
    logDir: merged.logDir ?? DEFAULT_CONFIG.logDir,
    fileLog: merged.fileLog ?? DEFAULT_CONFIG.fileLog,
  };

  return {
    valid: errors.length === 0,
    config,
    errors,
    warnings,
    portWarnings: listenerSet.warnings,
  };
}

export interface LoadConfigOptions {
  /** Config file path */
  file?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence settings, usually CLI flags */
  overrides?: ConfigLayer;
}

/**
 * Load every source and resolve. Throws only when the file cannot be read or
 * parsed; validation problems are reported in the result.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ConfigResult> {
  const layers: ConfigLayer[] = [];
  const fileErrors: string[] = [];
  const fileWarnings: string[] = [];

  if (options.file) {
    const parsed = await loadConfigFile(options.file);
    layers.push(parsed.layer);
    fileErrors.push(...parsed.errors);
    fileWarnings.push(...parsed.warnings);
  }
  layers.push(envLayer(options.env ?? process.env));
  if (options.overrides) {
    layers.push(options.overrides);
  }

  const result = resolveConfig(layers);
  const errors = [...fileErrors, ...result.errors];
  return {
    ...result,
    valid: errors.length === 0,
    errors,
    warnings: [...fileWarnings, ...result.warnings],
  };
}

function responseText(response: ResponseData): string {
  return typeof response === 'string' ? response : response.toString('utf8');
}

/**
 * Plain-object view of a config, for printing and logging
 */
export function describeConfig(config: HoneyportConfig): Record<string, unknown> {
  return {
    ports: config.ports,
    host: config.host,
    max_connections: config.maxConnections,
    connection_timeout_ms: config.connectionTimeoutMs,
    read_buffer_size: config.readBufferSize,
    max_payload_log_length: config.maxPayloadLogLength,
    default_response: responseText(config.defaultResponse),
    banners: Object.fromEntries([...config.banners].map(([port, response]) => [String(port), responseText(response)])),
    accept_backoff_ms: config.acceptBackoffMs,
    log_dir: config.logDir,
    file_log: config.fileLog,
  };
}
