/**
 * honeyport Metrics
 *
 * Prometheus-compatible metrics for the listener service.
 */

import { MeterProvider } from '@opentelemetry/sdk-metrics';
import type { MetricReader } from '@opentelemetry/sdk-metrics';
import type { Counter, Histogram, Meter, UpDownCounter } from '@opentelemetry/api';
import type { ConnectionErrorType, ServerMetrics } from '@honeyport/server';

/**
 * Metrics configuration
 */
export interface MetricsConfig {
  /** Service name, used as the meter name */
  serviceName?: string;

  /** Metric reader (e.g., Prometheus exporter) */
  reader?: MetricReader;
}

/**
 * honeyport Metrics collector
 *
 * Exposes Prometheus-compatible metrics:
 * - honeyport_connections_total: Connections handled, by port
 * - honeyport_bytes_received_total: Payload bytes read, by port
 * - honeyport_errors_total: Listen, accept, read and write failures
 * - honeyport_active_connections: Connections currently being handled
 * - honeyport_admission_wait_seconds: Time accept loops spent waiting for a slot
 */
export class HoneyportMetrics implements ServerMetrics {
  private readonly meterProvider: MeterProvider;
  private readonly meter: Meter;

  // Counters
  readonly connectionsTotal: Counter;
  readonly bytesReceivedTotal: Counter;
  readonly errorsTotal: Counter;

  // Histograms
  readonly admissionWait: Histogram;

  // Gauges
  readonly activeConnections: UpDownCounter;

  constructor(config: MetricsConfig = {}) {
    const serviceName = config.serviceName ?? 'honeyport';

    this.meterProvider = new MeterProvider({
      readers: config.reader ? [config.reader] : [],
    });
    this.meter = this.meterProvider.getMeter(serviceName, '0.1.0');

    this.connectionsTotal = this.meter.createCounter('honeyport_connections_total', {
      description: 'Total number of connections handled',
    });

    this.bytesReceivedTotal = this.meter.createCounter('honeyport_bytes_received_total', {
      description: 'Total payload bytes read from peers',
      unit: 'By',
    });

    this.errorsTotal = this.meter.createCounter('honeyport_errors_total', {
      description: 'Total number of listen, accept, read and write errors',
    });

    this.admissionWait = this.meter.createHistogram('honeyport_admission_wait_seconds', {
      description: 'Time spent waiting for an admission slot before accepting',
      unit: 's',
    });

    this.activeConnections = this.meter.createUpDownCounter('honeyport_active_connections', {
      description: 'Number of connections currently being handled',
    });
  }

  recordConnection(port: number): void {
    this.connectionsTotal.add(1, { port });
  }

  recordBytesReceived(port: number, bytes: number): void {
    this.bytesReceivedTotal.add(bytes, { port });
  }

  recordError(errorType: ConnectionErrorType, port: number): void {
    this.errorsTotal.add(1, { error_type: errorType, port });
  }

  updateActiveConnections(delta: number): void {
    this.activeConnections.add(delta);
  }

  recordAdmissionWait(durationMs: number): void {
    this.admissionWait.record(durationMs / 1000);
  }

  /**
   * Flush pending exports
   */
  async forceFlush(): Promise<void> {
    await this.meterProvider.forceFlush();
  }

  /**
   * Shutdown the metrics provider
   */
  async shutdown(): Promise<void> {
    await this.meterProvider.shutdown();
  }
}
