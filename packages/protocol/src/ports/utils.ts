/**
 * Listener set utilities
 *
 * Turns operator-supplied port entries into the ordered, de-duplicated set of
 * ports the decoy listens on.
 */

const MIN_PORT = 1;
const MAX_PORT = 65535;

export interface PortWarning {
  /** The entry as supplied */
  entry: string;
  message: string;
}

export interface ListenerSet {
  /** Valid ports in first-seen order */
  ports: number[];
  /** One warning per rejected entry */
  warnings: PortWarning[];
}

/**
 * Parse a single port entry. Returns undefined unless the entry is a base-10
 * integer in (0, 65535].
 */
export function parsePort(entry: string | number): number | undefined {
  const text = String(entry).trim();
  if (!/^[0-9]+$/.test(text)) {
    return undefined;
  }
  const port = Number.parseInt(text, 10);
  return port >= MIN_PORT && port <= MAX_PORT ? port : undefined;
}

/**
 * Check whether an entry names a valid TCP port
 */
export function isValidPort(entry: string | number): boolean {
  return parsePort(entry) !== undefined;
}

/**
 * Split a comma-separated port list, e.g. "22,80,8080"
 */
export function splitPortList(list: string): string[] {
  return list.split(',').map(p => p.trim());
}

/**
 * Validate port entries.
 *
 * Invalid entries are dropped with a warning; repeated ports keep their first
 * position.
 */
export function resolveListenerSet(entries: ReadonlyArray<string | number>): ListenerSet {
  const ports: number[] = [];
  const warnings: PortWarning[] = [];
  const seen = new Set<number>();

  for (const entry of entries) {
    const port = parsePort(entry);
    if (port === undefined) {
      warnings.push({ entry: String(entry), message: `Invalid port number: ${String(entry)}` });
      continue;
    }
    if (seen.has(port)) {
      continue;
    }
    seen.add(port);
    ports.push(port);
  }

  return { ports, warnings };
}
