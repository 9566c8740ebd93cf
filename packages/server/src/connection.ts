/**
 * Live connection handle and its ephemeral record
 */

import type { Socket } from 'net';
import type { AdmissionToken } from './admission-gate.js';
import { generateId } from '@honeyport/protocol';

export interface ConnectionRecord {
  remote_addr: string;
  local_port: number;
  accepted_at: number;
  deadline_at?: number;
  bytes_read: number;
  banner_sent: boolean;
}

export interface Connection {
  readonly id: string;
  readonly socket: Socket;
  readonly port: number;
  readonly token: AdmissionToken;
  readonly record: ConnectionRecord;
}

/**
 * Format a peer address as host:port ([v6]:port for IPv6)
 */
export function formatRemoteAddress(socket: Socket): string {
  const host = socket.remoteAddress ?? 'unknown';
  const port = socket.remotePort ?? 0;
  return socket.remoteFamily === 'IPv6' ? `[${host}]:${port}` : `${host}:${port}`;
}

export function createConnection(socket: Socket, port: number, token: AdmissionToken): Connection {
  return {
    id: generateId(),
    socket,
    port,
    token,
    record: {
      remote_addr: formatRemoteAddress(socket),
      local_port: port,
      accepted_at: Date.now(),
      bytes_read: 0,
      banner_sent: false,
    },
  };
}
