import type { Config } from '@/config';
import { initRootLogger, getLogger } from './logger';
import { initMetrics, isMetricsEnabled } from './metrics';
import { initTracer } from './tracer';
import type { TelemetryStatus } from './types';

/**
 * Wires logging, metrics and tracing to the given configuration. Exporters
 * are left to the host process: this package only talks to the OpenTelemetry API.
 */
export const initTelemetry = (config: Config): TelemetryStatus => {
  initRootLogger(config);
  initTracer(config);
  initMetrics(config);

  const status: TelemetryStatus = {
    loggerInitialized: true,
    metricsEnabled: isMetricsEnabled(),
  };

  getLogger('Telemetry').debug({ status }, 'Telemetry initialized');
  return status;
};

export { getLogger, formatLogLine } from './logger';
export type { Logger } from './logger';
export { recordStorageOperation } from './metrics';
export { withSpan } from './tracer';
export type { StorageOperation, StorageOperationAttributes, TelemetryStatus } from './types';
