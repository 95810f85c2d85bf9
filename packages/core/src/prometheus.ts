/**
 * Prometheus telemetry entry point for Node.js hosts.
 *
 * @example
 * import { createPrometheusTelemetry } from '@lifeboard/core/prometheus';
 * import { setTelemetry } from '@lifeboard/core';
 *
 * const promTelemetry = createPrometheusTelemetry();
 * setTelemetry(promTelemetry);
 */

export {
  createPrometheusTelemetry,
  type PrometheusTelemetryOptions,
  type PrometheusTelemetryFacade,
} from './telemetry-prometheus.js';
