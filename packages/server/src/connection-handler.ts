/**
 * Connection Handler
 *
 * Per-connection sequence: deadline, response, one read, log, cleanup.
 * Failures are logged against the connection and never leave this module.
 */

import type { Socket } from 'net';
import type { EventSink } from '@honeyport/protocol';
import { HoneyportError, errorMessage } from '@honeyport/protocol';
import type { ConnectionRegistry } from './connection-registry.js';
import type { Connection } from './connection.js';
import type { ResponseData, ServerMetrics } from './types.js';

export interface HandlerOptions {
  connectionTimeoutMs: number;
  readBufferSize: number;
  maxPayloadLogLength: number;
  defaultResponse: ResponseData;
  banners: ReadonlyMap<number, ResponseData>;
}

export interface HandlerContext {
  registry: ConnectionRegistry;
  log: EventSink;
  metrics?: ServerMetrics;
}

export interface CapturedPayload {
  text: string;
  truncated: boolean;
}

/**
 * Decode captured bytes for the log: UTF-8, trailing NULs and whitespace
 * trimmed, cut to `maxLength` characters.
 */
export function formatPayload(data: Buffer, maxLength: number): CapturedPayload {
  const text = data.toString('utf8').replace(/[\0\s]+$/, '');
  if (text.length <= maxLength) {
    return { text, truncated: false };
  }
  return { text: text.slice(0, maxLength), truncated: true };
}

export class ConnectionHandler {
  constructor(
    private readonly options: HandlerOptions,
    private readonly ctx: HandlerContext
  ) {}

  /**
   * The bytes sent to a peer on `port`
   */
  responseFor(port: number): Buffer {
    const response = this.options.banners.get(port) ?? this.options.defaultResponse;
    return typeof response === 'string' ? Buffer.from(response, 'utf8') : response;
  }

  async handle(connection: Connection): Promise<void> {
    const { socket, port, record } = connection;
    const { log, metrics } = this.ctx;
    const remote_addr = record.remote_addr;
    let deadline: NodeJS.Timeout | undefined;

    metrics?.updateActiveConnections(1);

    try {
      log.record('connection_received', { port, remote_addr });
      metrics?.recordConnection(port);

      const timeoutMs = this.options.connectionTimeoutMs;
      record.deadline_at = Date.now() + timeoutMs;
      deadline = setTimeout(() => {
        socket.destroy(new HoneyportError('CONNECTION_TIMEOUT', `No activity completed within ${timeoutMs}ms`));
      }, timeoutMs);

      try {
        await this.write(socket, this.responseFor(port));
        record.banner_sent = true;
      } catch (error) {
        log.record('write_error', { port, remote_addr, err: errorMessage(error) }, { severity: 'warn' });
        metrics?.recordError('write', port);
        return;
      }

      let data: Buffer;
      try {
        data = await this.readOnce(socket);
      } catch (error) {
        log.record('read_error', { port, remote_addr, err: errorMessage(error) }, { severity: 'warn' });
        metrics?.recordError('read', port);
        return;
      }

      record.bytes_read = data.length;
      metrics?.recordBytesReceived(port, data.length);

      const payload = formatPayload(data, this.options.maxPayloadLogLength);
      log.record('data_received', {
        port,
        remote_addr,
        byte_count: data.length,
        payload: payload.text,
        truncated: payload.truncated,
      });
    } finally {
      // Unregister before releasing so a shutdown snapshot never holds a
      // connection whose slot was already returned.
      this.ctx.registry.unregister(connection);
      connection.token.release();
      socket.destroy();
      clearTimeout(deadline);
      metrics?.updateActiveConnections(-1);
    }
  }

  private write(socket: Socket, data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      if (socket.destroyed) {
        reject(socket.errored ?? new Error('Connection closed before write'));
        return;
      }
      socket.write(data, error => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Resolve with the first chunk (at most readBufferSize bytes); reject on EOF,
   * error or close.
   */
  private readOnce(socket: Socket): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      if (socket.destroyed) {
        reject(socket.errored ?? new Error('Connection closed before read'));
        return;
      }

      const cleanup = (): void => {
        socket.off('data', onData);
        socket.off('end', onEnd);
        socket.off('error', onError);
        socket.off('close', onClose);
      };
      const onData = (chunk: Buffer): void => {
        cleanup();
        socket.pause();
        resolve(chunk.subarray(0, this.options.readBufferSize));
      };
      const onEnd = (): void => {
        cleanup();
        reject(new Error('EOF'));
      };
      const onError = (error: Error): void => {
        cleanup();
        reject(error);
      };
      const onClose = (): void => {
        cleanup();
        reject(socket.errored ?? new Error('Connection closed'));
      };

      socket.on('data', onData);
      socket.once('end', onEnd);
      socket.once('error', onError);
      socket.once('close', onClose);
      socket.resume();
    });
  }
}
