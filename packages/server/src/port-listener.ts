/**
 * Port Listener
 *
 * Owns one passive socket and its accept loop. A token is taken from the
 * admission gate before each accept, so a saturated gate leaves new peers
 * waiting (paused, unanswered) instead of spawning handlers.
 */

import { createServer } from 'net';
import type { Server, Socket } from 'net';
import type { EventSink } from '@honeyport/protocol';
import { HoneyportError, errorMessage, isHoneyportError } from '@honeyport/protocol';
import type { AdmissionGate } from './admission-gate.js';
import type { ConnectionRegistry } from './connection-registry.js';
import { createConnection } from './connection.js';
import type { Connection } from './connection.js';
import type { ServerMetrics } from './types.js';

export type ListenerState = 'created' | 'starting' | 'listening' | 'stopping' | 'stopped';

export interface ListenerContext {
  host: string;
  gate: AdmissionGate;
  registry: ConnectionRegistry;
  log: EventSink;
  /** Receives each admitted, registered connection; must not block */
  dispatch: (connection: Connection) => void;
  acceptBackoffMs?: number;
  /** How long a peer may wait for admission before it is disconnected */
  queueTimeoutMs?: number;
  metrics?: ServerMetrics;
}

interface AcceptWaiter {
  resolve: (socket: Socket) => void;
  reject: (error: Error) => void;
}

/**
 * Resolve after `ms`, or on the next turn of the event loop when `ms` is 0.
 * Resolves early if the signal aborts.
 */
function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

export class PortListener {
  private readonly server: Server;
  private readonly stopController = new AbortController();
  private readonly queued: Socket[] = [];
  private readonly queueTimers = new Map<Socket, NodeJS.Timeout>();
  private state: ListenerState = 'created';
  private starting?: Promise<boolean>;
  private waiter?: AcceptWaiter;
  private acceptFailure?: Error;
  private loop?: Promise<void>;
  private accepted = 0;
  private bound?: number;

  constructor(
    readonly port: number,
    private readonly ctx: ListenerContext
  ) {
    this.server = createServer({ pauseOnConnect: true });
    this.server.on('connection', socket => this.onConnection(socket));
  }

  getState(): ListenerState {
    return this.state;
  }

  /**
   * The port actually bound; differs from `port` only when `port` is 0.
   */
  get boundPort(): number {
    return this.bound ?? this.port;
  }

  /** Connections admitted on this port */
  get acceptedTotal(): number {
    return this.accepted;
  }

  /** Peers accepted by the OS but still waiting for admission */
  get queuedCount(): number {
    return this.queued.length;
  }

  /**
   * Bind and listen. A bind failure stops only this listener and resolves false,
   * as does a `stop()` that arrives before the bind completes.
   */
  start(): Promise<boolean> {
    if (this.state === 'starting' && this.starting) {
      return this.starting;
    }
    if (this.state !== 'created') {
      return Promise.resolve(this.state === 'listening');
    }

    this.state = 'starting';
    this.starting = new Promise(resolve => {
      const onError = (error: Error): void => {
        this.server.off('listening', onListening);
        this.state = 'stopped';
        this.ctx.log.record('listen_error', { port: this.port, err: errorMessage(error) }, { severity: 'error' });
        this.ctx.metrics?.recordError('listen', this.port);
        resolve(false);
      };
      const onListening = (): void => {
        this.server.off('error', onError);
        if (this.state === 'stopping') {
          this.server.close(() => {
            this.state = 'stopped';
            resolve(false);
          });
          return;
        }
        this.server.on('error', error => this.onAcceptFailure(error));
        const address = this.server.address();
        this.bound = address !== null && typeof address === 'object' ? address.port : this.port;
        this.state = 'listening';
        this.ctx.log.record('listener_started', { port: this.boundPort, host: this.ctx.host });
        resolve(true);
      };

      this.server.once('error', onError);
      this.server.once('listening', onListening);
      this.server.listen({ port: this.port, host: this.ctx.host });
    });
    return this.starting;
  }

  /**
   * Start the accept loop. The returned promise settles when the loop exits.
   */
  run(): Promise<void> {
    this.loop ??= this.acceptLoop();
    return this.loop;
  }

  /**
   * Close the passive socket, unblock the pending accept and wait for the loop
   * to exit. Peers still queued for admission are disconnected.
   */
  async stop(): Promise<void> {
    if (this.state === 'created') {
      this.state = 'stopped';
      return;
    }
    if (this.state === 'starting') {
      // onListening sees this and closes the socket instead of serving
      this.state = 'stopping';
      this.stopController.abort();
      await this.starting;
      return;
    }
    if (this.state === 'listening') {
      this.state = 'stopping';
      this.stopController.abort();
      this.server.close();

      this.waiter?.reject(new HoneyportError('LISTENER_CLOSED', `Listener on port ${this.boundPort} closed`));
      this.waiter = undefined;
      for (const socket of this.queued.splice(0)) {
        this.clearQueueTimer(socket);
        socket.destroy();
      }

      await this.loop;
      this.state = 'stopped';
      this.ctx.log.record('listener_stopped', { port: this.boundPort });
      return;
    }
    await this.starting;
    await this.loop;
  }

  private async acceptLoop(): Promise<void> {
    const { gate, registry, log, metrics } = this.ctx;
    const signal = this.stopController.signal;

    while (this.state === 'listening') {
      const waitStarted = Date.now();
      const token = await gate.acquire(signal);
      if (!token) break;
      metrics?.recordAdmissionWait(Date.now() - waitStarted);

      let socket: Socket;
      try {
        socket = await this.accept();
      } catch (error) {
        token.release();
        if (this.state !== 'listening' || isHoneyportError(error, 'LISTENER_CLOSED')) break;

        log.record('accept_error', { port: this.boundPort, err: errorMessage(error) }, { severity: 'warn' });
        metrics?.recordError('accept', this.boundPort);
        await pause(this.ctx.acceptBackoffMs ?? 0, signal);
        continue;
      }

      const connection = createConnection(socket, this.boundPort, token);
      registry.register(connection);
      this.accepted++;
      this.ctx.dispatch(connection);
    }
  }

  /**
   * Take the next queued peer, or wait for one.
   */
  private accept(): Promise<Socket> {
    if (this.state !== 'listening') {
      return Promise.reject(new HoneyportError('LISTENER_CLOSED', `Listener on port ${this.boundPort} closed`));
    }
    if (this.acceptFailure) {
      const failure = this.acceptFailure;
      this.acceptFailure = undefined;
      return Promise.reject(failure);
    }
    const socket = this.queued.shift();
    if (socket) {
      this.clearQueueTimer(socket);
      return Promise.resolve(socket);
    }
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  private onConnection(socket: Socket): void {
    if (this.state !== 'listening') {
      socket.destroy();
      return;
    }

    // Peers can reset before admission; queued ones are dropped, admitted ones
    // surface the failure through the handler's own I/O.
    const onGone = (): void => {
      this.clearQueueTimer(socket);
      const idx = this.queued.indexOf(socket);
      if (idx !== -1) this.queued.splice(idx, 1);
    };
    socket.once('close', onGone);
    socket.on('error', onGone);

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter.resolve(socket);
      return;
    }
    this.queued.push(socket);

    const timeoutMs = this.ctx.queueTimeoutMs;
    if (timeoutMs !== undefined) {
      this.queueTimers.set(socket, setTimeout(() => {
        this.queueTimers.delete(socket);
        socket.destroy();
      }, timeoutMs));
    }
  }

  private clearQueueTimer(socket: Socket): void {
    const timer = this.queueTimers.get(socket);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.queueTimers.delete(socket);
    }
  }

  private onAcceptFailure(error: Error): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter.reject(error);
      return;
    }
    this.acceptFailure = error;
  }
}
