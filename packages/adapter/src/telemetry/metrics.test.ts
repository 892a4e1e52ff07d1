import { createNoopMeter, metrics } from '@opentelemetry/api';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from '@/config';
import { initMetrics, isMetricsEnabled, recordStorageOperation } from './metrics';
import { withSpan } from './tracer';

const baseEnv = {
  STORAGE_SOURCE_0_URL: 'http://localhost:9000',
  STORAGE_SOURCE_0_ACCESS_KEY: 'test-access',
  STORAGE_SOURCE_0_SECRET_KEY: 'test-secret',
};

describe('storage operation metrics', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    metrics.disable();
  });

  it('counts operations and records their duration', () => {
    const meter = createNoopMeter();
    const counter = meter.createCounter('operations');
    const histogram = meter.createHistogram('duration');
    const add = vi.spyOn(counter, 'add');
    const record = vi.spyOn(histogram, 'record');
    vi.spyOn(meter, 'createCounter').mockReturnValue(counter);
    vi.spyOn(meter, 'createHistogram').mockReturnValue(histogram);
    metrics.setGlobalMeterProvider({ getMeter: () => meter });

    initMetrics(loadConfig(baseEnv));
    recordStorageOperation({ operation: 'list', bucket: '', result: 'failure' }, 12);
    recordStorageOperation({ operation: 'get', bucket: 'photos', result: 'success' }, 3);

    expect(isMetricsEnabled()).toBe(true);
    expect(add.mock.calls).toEqual([
      [1, { operation: 'list', bucket: '*', result: 'failure' }],
      [1, { operation: 'get', bucket: 'photos', result: 'success' }],
    ]);
    expect(record.mock.calls).toEqual([
      [12, { operation: 'list', bucket: '*', result: 'failure' }],
      [3, { operation: 'get', bucket: 'photos', result: 'success' }],
    ]);
  });

  it('records nothing when metrics are disabled', () => {
    initMetrics(loadConfig({ ...baseEnv, METRICS_ENABLED: 'false' }));

    expect(isMetricsEnabled()).toBe(false);
    expect(() => recordStorageOperation({ operation: 'put', bucket: 'photos', result: 'success' }, 1)).not.toThrow();
  });
});

describe('withSpan', () => {
  it('returns the result of the wrapped call', async () => {
    await expect(withSpan('storage.stat', { bucket: 'photos' }, async () => 42)).resolves.toBe(42);
  });

  it('rethrows failures', async () => {
    const failure = new Error('boom');

    await expect(
      withSpan('storage.stat', {}, async () => {
        throw failure;
      })
    ).rejects.toBe(failure);
  });
});
