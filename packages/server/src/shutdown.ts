/**
 * Shutdown Coordinator
 *
 * Turns one external stop request into an ordered drain: stop admitting, stop
 * every listener, force-close what is still being handled, wait for handlers.
 */

import type { EventSink } from '@honeyport/protocol';
import type { AdmissionGate } from './admission-gate.js';
import type { ConnectionRegistry } from './connection-registry.js';
import type { PortListener } from './port-listener.js';

export interface ShutdownContext {
  gate: AdmissionGate;
  registry: ConnectionRegistry;
  log: EventSink;
  listeners: () => readonly PortListener[];
  /** Settles once every dispatched handler has finished */
  drainHandlers: () => Promise<void>;
}

export interface ShutdownResult {
  reason: string;
  connections_closed: number;
  duration_ms: number;
}

export class ShutdownCoordinator {
  private readonly controller = new AbortController();
  private completion?: Promise<ShutdownResult>;

  constructor(private readonly ctx: ShutdownContext) {}

  /**
   * Single-fire: aborted exactly once, when shutdown starts.
   */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isStopping(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Start shutdown. Later calls return the first call's promise.
   */
  trigger(reason = 'shutdown'): Promise<ShutdownResult> {
    this.completion ??= this.run(reason);
    return this.completion;
  }

  /**
   * Trigger on an external stop notification.
   */
  attach(stop: AbortSignal): void {
    const onStop = (): void => {
      void this.trigger(typeof stop.reason === 'string' ? stop.reason : 'shutdown');
    };
    if (stop.aborted) {
      onStop();
      return;
    }
    stop.addEventListener('abort', onStop, { once: true });
  }

  /**
   * Resolves after a triggered shutdown has completed.
   */
  async completed(): Promise<ShutdownResult> {
    if (this.completion) return this.completion;
    await new Promise<void>(resolve => {
      this.controller.signal.addEventListener('abort', () => resolve(), { once: true });
    });
    return this.trigger();
  }

  private async run(reason: string): Promise<ShutdownResult> {
    const started = Date.now();
    const { gate, registry, log } = this.ctx;

    log.record('shutdown_signal', { signal: reason });
    this.controller.abort(reason);

    gate.close();
    await Promise.all(this.ctx.listeners().map(listener => listener.stop()));

    const closed = registry.closeAll();
    await this.ctx.drainHandlers();

    const result: ShutdownResult = {
      reason,
      connections_closed: closed,
      duration_ms: Date.now() - started,
    };
    log.record('shutdown_complete', { ...result });
    return result;
  }
}
