/**
 * honeyport Server
 *
 * Owns the process-wide admission gate and connection registry and wires them
 * into one listener per port, the connection handler and the shutdown
 * coordinator.
 */

import type { EventSink } from '@honeyport/protocol';
import { HoneyportError, errorMessage } from '@honeyport/protocol';
import { EventCollector } from '@honeyport/trace';
import { AdmissionGate } from './admission-gate.js';
import { ConnectionRegistry } from './connection-registry.js';
import { ConnectionHandler } from './connection-handler.js';
import { PortListener } from './port-listener.js';
import { ShutdownCoordinator } from './shutdown.js';
import type { ShutdownResult } from './shutdown.js';
import type { Connection } from './connection.js';
import type { HoneyportConfig, ServerMetrics, ServerStats } from './types.js';
import { DEFAULT_CONFIG, MAX_TIMER_DELAY_MS, guardSink } from './types.js';

export interface ServerDependencies {
  /** Logging collaborator; an in-memory collector is created when omitted */
  log?: EventSink;
  metrics?: ServerMetrics;
}

export class HoneyportServer {
  private readonly config: HoneyportConfig;
  private readonly log: EventSink;
  private readonly ownedCollector?: EventCollector;
  private readonly gate: AdmissionGate;
  private readonly registry: ConnectionRegistry;
  private readonly handler: ConnectionHandler;
  private readonly coordinator: ShutdownCoordinator;
  private readonly listeners: PortListener[];
  private readonly inFlight = new Set<Promise<void>>();
  private readonly loops: Promise<void>[] = [];
  private startTime?: number;
  private closedOnShutdown = 0;

  constructor(config: Partial<HoneyportConfig> = {}, deps: ServerDependencies = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (this.config.ports.length === 0) {
      throw new HoneyportError('NO_VALID_PORTS', 'No valid ports provided.');
    }
    for (const [name, value] of [
      ['maxConnections', this.config.maxConnections],
      ['connectionTimeoutMs', this.config.connectionTimeoutMs],
      ['readBufferSize', this.config.readBufferSize],
    ] as const) {
      if (!Number.isInteger(value) || value < 1) {
        throw new HoneyportError('INVALID_CONFIG', `${name} must be a positive integer, got ${value}`);
      }
    }
    if (this.config.connectionTimeoutMs > MAX_TIMER_DELAY_MS) {
      throw new HoneyportError(
        'INVALID_CONFIG',
        `connectionTimeoutMs must be at most ${MAX_TIMER_DELAY_MS}, got ${this.config.connectionTimeoutMs}`
      );
    }

    if (deps.log) {
      this.log = guardSink(deps.log);
    } else {
      this.ownedCollector = new EventCollector({ flush_interval_ms: 0 });
      this.log = guardSink(this.ownedCollector);
    }

    this.gate = new AdmissionGate(this.config.maxConnections);
    this.registry = new ConnectionRegistry(this.log);
    this.handler = new ConnectionHandler(
      {
        connectionTimeoutMs: this.config.connectionTimeoutMs,
        readBufferSize: this.config.readBufferSize,
        maxPayloadLogLength: this.config.maxPayloadLogLength,
        defaultResponse: this.config.defaultResponse,
        banners: this.config.banners,
      },
      { registry: this.registry, log: this.log, metrics: deps.metrics }
    );

    this.listeners = this.config.ports.map(port => new PortListener(port, {
      host: this.config.host,
      gate: this.gate,
      registry: this.registry,
      log: this.log,
      dispatch: connection => this.dispatch(connection),
      acceptBackoffMs: this.config.acceptBackoffMs,
      queueTimeoutMs: this.config.connectionTimeoutMs,
      metrics: deps.metrics,
    }));

    this.coordinator = new ShutdownCoordinator({
      gate: this.gate,
      registry: this.registry,
      log: this.log,
      listeners: () => this.listeners,
      drainHandlers: () => this.drainHandlers(),
    });
  }

  /**
   * Bind every port and start the accept loops. Returns how many listeners
   * started; ports that fail to bind are logged and skipped.
   */
  async start(): Promise<number> {
    if (this.startTime !== undefined) {
      return this.listeners.filter(l => l.getState() === 'listening').length;
    }
    this.startTime = Date.now();

    const results = await Promise.all(this.listeners.map(listener => listener.start()));
    results.forEach((started, i) => {
      if (started && !this.coordinator.isStopping) {
        this.loops.push(this.listeners[i].run());
      }
    });
    return results.filter(Boolean).length;
  }

  /**
   * Shut down; safe to call more than once.
   */
  async stop(reason = 'shutdown'): Promise<ShutdownResult> {
    const result = await this.coordinator.trigger(reason);
    this.closedOnShutdown = result.connections_closed;
    await this.ownedCollector?.close();
    return result;
  }

  /**
   * Shut down when the external signal aborts.
   */
  stopOn(signal: AbortSignal): void {
    this.coordinator.attach(signal);
  }

  /**
   * Resolves once a shutdown, however triggered, has completed.
   */
  async closed(): Promise<ShutdownResult> {
    const result = await this.coordinator.completed();
    this.closedOnShutdown = result.connections_closed;
    return result;
  }

  getStats(): ServerStats {
    const byPort: Record<string, number> = {};
    for (const listener of this.listeners) {
      byPort[String(listener.boundPort)] = listener.acceptedTotal;
    }

    return {
      uptime_ms: this.startTime === undefined ? 0 : Date.now() - this.startTime,
      listeners_active: this.listeners.filter(l => l.getState() === 'listening').length,
      connections_total: this.listeners.reduce((sum, l) => sum + l.acceptedTotal, 0),
      connections_active: this.registry.size,
      connections_waiting: this.listeners.reduce((sum, l) => sum + l.queuedCount, 0),
      connections_closed_on_shutdown: this.closedOnShutdown,
      admissions_acquired: this.gate.acquiredTotal,
      admissions_released: this.gate.releasedTotal,
      by_port: byPort,
    };
  }

  getListeners(): readonly PortListener[] {
    return this.listeners;
  }

  getConfig(): Readonly<HoneyportConfig> {
    return this.config;
  }

  /**
   * In-memory collector, present only when no log was supplied
   */
  getCollector(): EventCollector | undefined {
    return this.ownedCollector;
  }

  /** Exposed for tests and diagnostics */
  getGate(): AdmissionGate {
    return this.gate;
  }

  /** Exposed for tests and diagnostics */
  getRegistry(): ConnectionRegistry {
    return this.registry;
  }

  get isStopping(): boolean {
    return this.coordinator.isStopping;
  }

  private dispatch(connection: Connection): void {
    const task: Promise<void> = this.handler.handle(connection).then(
      () => {
        this.inFlight.delete(task);
      },
      (error: unknown) => {
        this.inFlight.delete(task);
        console.error(`Connection handler failed on port ${connection.port}: ${errorMessage(error)}`);
      }
    );
    this.inFlight.add(task);
  }

  private async drainHandlers(): Promise<void> {
    await Promise.all(this.loops);
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
