/**
 * Node-only entry point. Kept apart from the package root so hosts without
 * `prom-client` never load it.
 *
 * @example
 * import { setTelemetry } from '@colonist/core';
 * import { createPrometheusTelemetry } from '@colonist/core/prometheus';
 *
 * const metrics = createPrometheusTelemetry({ prefix: 'colony_' });
 * setTelemetry(metrics);
 * // expose `await metrics.registry.metrics()` from the host's scrape endpoint
 */

export {
  createPrometheusTelemetry,
  type PrometheusTelemetryFacade,
  type PrometheusTelemetryOptions,
} from './telemetry-prometheus.js';
