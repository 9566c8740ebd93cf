/**
 * honeyport OpenTelemetry Integration
 *
 * Exports listener metrics through an OpenTelemetry MeterProvider.
 */

export { HoneyportMetrics, type MetricsConfig } from './metrics.js';
