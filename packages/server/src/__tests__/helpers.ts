/**
 * Loopback helpers shared by the server tests
 */

import { connect, createServer } from 'net';
import type { Socket } from 'net';
import type { ServerMetrics, ConnectionErrorType } from '../types.js';

export interface PeerResult {
  data: Buffer;
  error?: string;
  elapsed_ms: number;
}

/**
 * Connect, optionally send once the first bytes arrive, and collect everything
 * until the server closes the connection.
 */
export function talk(port: number, options: { send?: string | Buffer; onConnect?: (socket: Socket) => void } = {}): Promise<PeerResult> {
  return new Promise(resolve => {
    const started = Date.now();
    const chunks: Buffer[] = [];
    let error: string | undefined;

    const socket = connect({ port, host: '127.0.0.1' });
    socket.on('connect', () => options.onConnect?.(socket));
    socket.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
      if (options.send !== undefined && chunks.length === 1) {
        socket.write(options.send);
      }
    });
    socket.on('error', (err: Error) => {
      error = err.message;
    });
    socket.on('close', () => {
      resolve({ data: Buffer.concat(chunks), error, elapsed_ms: Date.now() - started });
    });
  });
}

/**
 * Open a connection and resolve once it is established; the caller owns it.
 */
export function openPeer(port: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = connect({ port, host: '127.0.0.1' });
    socket.once('connect', () => resolve(socket));
    socket.once('error', reject);
  });
}

/**
 * Resolves when the peer's socket has closed.
 */
export function closedPeer(socket: Socket): Promise<void> {
  return new Promise(resolve => {
    if (socket.closed) {
      resolve();
      return;
    }
    socket.on('error', () => undefined);
    socket.once('close', () => resolve());
  });
}

/**
 * A port that was free a moment ago.
 */
export function freePort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const scratch = createServer();
    scratch.once('error', reject);
    scratch.listen({ port: 0, host: '127.0.0.1' }, () => {
      const address = scratch.address();
      const port = address !== null && typeof address === 'object' ? address.port : 0;
      scratch.close(() => resolve(port));
    });
  });
}

/**
 * Server-side and client-side ends of one loopback connection. The
 * server-side socket starts paused, as listeners hand it over.
 */
export async function socketPair(): Promise<{ serverSide: Socket; clientSide: Socket }> {
  const listener = createServer({ pauseOnConnect: true });
  await new Promise<void>(resolve => listener.listen({ port: 0, host: '127.0.0.1' }, () => resolve()));
  const address = listener.address();
  const port = address !== null && typeof address === 'object' ? address.port : 0;

  const accepted = new Promise<Socket>(resolve => listener.once('connection', resolve));
  const clientSide = await openPeer(port);
  const serverSide = await accepted;
  listener.close();
  return { serverSide, clientSide };
}

export async function waitFor(condition: () => boolean, timeoutMs = 3000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('Timed out waiting for condition');
    }
    await new Promise(resolve => setTimeout(resolve, 10));
  }
}

/**
 * Metrics hook that remembers what it was told
 */
export class RecordingMetrics implements ServerMetrics {
  active = 0;
  maxActive = 0;
  connections: number[] = [];
  bytes = 0;
  errors: Array<{ type: ConnectionErrorType; port: number }> = [];
  admissionWaits = 0;

  recordConnection(port: number): void {
    this.connections.push(port);
  }

  recordBytesReceived(_port: number, bytes: number): void {
    this.bytes += bytes;
  }

  recordError(type: ConnectionErrorType, port: number): void {
    this.errors.push({ type, port });
  }

  updateActiveConnections(delta: number): void {
    this.active += delta;
    this.maxActive = Math.max(this.maxActive, this.active);
  }

  recordAdmissionWait(): void {
    this.admissionWaits++;
  }
}
