import { metrics, type Counter, type Histogram, ValueType } from '@opentelemetry/api';
import type { Config } from '@/config';
import type { StorageOperationAttributes } from '@/telemetry/types';

interface MetricState {
  operationsTotal: Counter;
  operationDurationMs: Histogram;
}

let metricState: MetricState | null = null;

export const initMetrics = (config: Config): void => {
  if (!config.telemetry.metricsEnabled) {
    metricState = null;
    return;
  }

  const meter = metrics.getMeter(config.telemetry.serviceName, config.telemetry.serviceVersion);
  metricState = {
    operationsTotal: meter.createCounter('storage.operations_total', {
      description: 'Count of storage adapter operations by bucket and outcome',
      valueType: ValueType.INT,
    }),
    operationDurationMs: meter.createHistogram('storage.operation_duration_ms', {
      description: 'Duration of storage adapter operations in milliseconds',
      unit: 'ms',
      valueType: ValueType.DOUBLE,
    }),
  };
};

export const isMetricsEnabled = (): boolean => metricState !== null;

export const recordStorageOperation = (
  attributes: StorageOperationAttributes,
  durationMs: number
): void => {
  if (!metricState) {
    return;
  }

  const labels = {
    operation: attributes.operation,
    bucket: attributes.bucket.length > 0 ? attributes.bucket : '*',
    result: attributes.result,
  };

  metricState.operationsTotal.add(1, labels);
  metricState.operationDurationMs.record(durationMs, labels);
};
