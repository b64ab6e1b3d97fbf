import { Registry } from 'prom-client';
import { describe, expect, it } from 'vitest';
import { defineMetrics, histogram } from '../src';
import { parseSamples, sampleValue } from './exposition.helpers';

const latencyMetrics = defineMetrics({
  scope: 'api',
  metrics: {
    latency: histogram({ labels: ['route'] as const, buckets: [1, 5, 10], help: 'Request latency in seconds.' }),
    payload: histogram()
  }
});

describe('histogram accessor', () => {
  it('accumulates observations into cumulative buckets', async () => {
    const registry = new Registry();
    const metrics = latencyMetrics.builder().withRegistry(registry).withLogger({}).build();
    const latency = metrics.latency('/users');

    latency.observe(0.5);
    latency.observe(3);
    latency.observe(7);
    latency.observe(20);

    const samples = parseSamples(await registry.metrics());
    expect(sampleValue(samples, 'api_latency_bucket', { route: '/users', le: '1' })).toBe(1);
    expect(sampleValue(samples, 'api_latency_bucket', { route: '/users', le: '5' })).toBe(2);
    expect(sampleValue(samples, 'api_latency_bucket', { route: '/users', le: '10' })).toBe(3);
    expect(sampleValue(samples, 'api_latency_bucket', { route: '/users', le: '+Inf' })).toBe(4);
    expect(sampleValue(samples, 'api_latency_count', { route: '/users' })).toBe(4);
    expect(sampleValue(samples, 'api_latency_sum', { route: '/users' })).toBe(30.5);
  });

  it('keeps bucket counts monotone across label values', async () => {
    const registry = new Registry();
    const metrics = latencyMetrics.builder().withRegistry(registry).withLabel('region', 'eu').withLogger({}).build();
    for (const value of [0.2, 0.9, 4, 12]) {
      metrics.latency('/a').observe(value);
    }
    metrics.latency('/b').observe(6);

    const samples = parseSamples(await registry.metrics());
    for (const route of ['/a', '/b']) {
      const counts = ['1', '5', '10', '+Inf'].map((le) => sampleValue(samples, 'api_latency_bucket', { region: 'eu', route, le }));
      for (let i = 1; i < counts.length; i += 1) {
        expect(counts[i]).toBeGreaterThanOrEqual(counts[i - 1] ?? 0);
      }
    }
    expect(sampleValue(samples, 'api_latency_count', { region: 'eu', route: '/a' })).toBe(4);
    expect(sampleValue(samples, 'api_latency_count', { region: 'eu', route: '/b' })).toBe(1);
    expect(sampleValue(samples, 'api_latency_bucket', { region: 'eu', route: '/b', le: '5' })).toBe(0);
  });

  it('uses the default buckets when none are declared', async () => {
    const registry = new Registry();
    const metrics = latencyMetrics.builder().withRegistry(registry).withLogger({}).build();

    metrics.payload().observe(0.3);

    const exposition = await registry.metrics();
    expect(exposition.split('\n')).toContain('# TYPE api_payload histogram');
    const buckets = parseSamples(exposition).filter((sample) => sample.name === 'api_payload_bucket');
    expect(buckets.map((sample) => sample.labels.le)).toEqual([
      '0.005',
      '0.01',
      '0.025',
      '0.05',
      '0.1',
      '0.25',
      '0.5',
      '1',
      '2.5',
      '5',
      '10',
      '+Inf'
    ]);
    expect(sampleValue(parseSamples(exposition), 'api_payload_count')).toBe(1);
  });
});
