/**
 * Log summaries
 *
 * Aggregates captured connection events into per-port and per-peer counts.
 */

import type { LogEvent } from '@honeyport/protocol';

export interface PeerCount {
  remote_addr: string;
  connections: number;
}

export interface LogSummary {
  connections: number;
  bytes_received: number;
  payloads: number;
  errors: number;
  by_port: Record<string, number>;
  top_peers: PeerCount[];
  first_seen?: string;
  last_seen?: string;
}

/**
 * Strip the port from "host:port" or "[v6]:port"
 */
export function remoteHost(remoteAddr: string): string {
  const bracketed = /^\[(.+)\]:\d+$/.exec(remoteAddr);
  if (bracketed) return bracketed[1];
  const idx = remoteAddr.lastIndexOf(':');
  return idx > 0 && remoteAddr.indexOf(':') === idx ? remoteAddr.slice(0, idx) : remoteAddr;
}

export function summarizeEvents(events: LogEvent[], options: { top?: number } = {}): LogSummary {
  const byPort: Record<string, number> = {};
  const byPeer = new Map<string, number>();
  let connections = 0;
  let bytesReceived = 0;
  let payloads = 0;
  let errors = 0;
  let firstSeen: string | undefined;
  let lastSeen: string | undefined;

  for (const event of events) {
    const { payload } = event;
    switch (event.event_type) {
      case 'connection_received': {
        connections++;
        const port = String(payload.port);
        byPort[port] = (byPort[port] ?? 0) + 1;
        if (typeof payload.remote_addr === 'string') {
          const host = remoteHost(payload.remote_addr);
          byPeer.set(host, (byPeer.get(host) ?? 0) + 1);
        }
        firstSeen ??= event.timestamp;
        lastSeen = event.timestamp;
        break;
      }
      case 'data_received':
        payloads++;
        if (typeof payload.byte_count === 'number') {
          bytesReceived += payload.byte_count;
        }
        break;
      case 'accept_error':
      case 'listen_error':
      case 'write_error':
      case 'read_error':
        errors++;
        break;
      default:
        break;
    }
  }

  const topPeers = [...byPeer.entries()]
    .map(([remote_addr, count]) => ({ remote_addr, connections: count }))
    .sort((a, b) => b.connections - a.connections || a.remote_addr.localeCompare(b.remote_addr))
    .slice(0, options.top ?? 10);

  return {
    connections,
    bytes_received: bytesReceived,
    payloads,
    errors,
    by_port: byPort,
    top_peers: topPeers,
    first_seen: firstSeen,
    last_seen: lastSeen,
  };
}
