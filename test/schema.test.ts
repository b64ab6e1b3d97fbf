import { describe, expect, it } from 'vitest';
import { counter, defineMetrics, gauge, histogram, parseSchema } from '../src';
import { SchemaError } from '../src/errors';
import { fullMetricName, resolveHelp } from '../src/schema/resolve';

describe('schema resolution', () => {
  it('resolves fields in declaration order', () => {
    const definition = defineMetrics({
      scope: 'shop',
      metrics: {
        orders: counter({ labels: ['channel'] as const, doc: 'Orders placed.' }),
        basket_size: gauge({ number: 'float' }),
        checkout: histogram({ buckets: [0.5, 1, 2], rename: 'checkout_seconds' })
      }
    });

    expect(definition.scope).toBe('shop');
    expect(definition.metrics).toEqual([
      {
        identifier: 'orders',
        kind: 'counter',
        number: 'int',
        fullName: 'shop_orders',
        help: 'Orders placed.',
        labelNames: ['channel']
      },
      {
        identifier: 'basket_size',
        kind: 'gauge',
        number: 'float',
        fullName: 'shop_basket_size',
        help: '',
        labelNames: []
      },
      {
        identifier: 'checkout',
        kind: 'histogram',
        fullName: 'shop_checkout_seconds',
        help: '',
        labelNames: [],
        buckets: [0.5, 1, 2]
      }
    ]);
  });

  it('joins scope and name with an underscore', () => {
    expect(fullMetricName('app', 'requests')).toBe('app_requests');
    expect(fullMetricName('app', 'requests', 'http_requests_total')).toBe('app_http_requests_total');
  });

  it('prefers explicit help over doc text', () => {
    expect(resolveHelp('Explicit.', 'From doc.')).toBe('Explicit.');
    expect(resolveHelp(undefined, '  From doc.  ')).toBe('From doc.');
    expect(resolveHelp('', 'From doc.')).toBe('');
    expect(resolveHelp(undefined, undefined)).toBe('');
  });

  it('rejects an empty scope', () => {
    expect(() => defineMetrics({ scope: ' ', metrics: { hits: counter() } })).toThrow(
      'metrics schema requires a non-empty scope'
    );
  });

  it('rejects duplicate labels', () => {
    try {
      defineMetrics({ scope: 'app', metrics: { hits: counter({ labels: ['route', 'route'] as const }) } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaError);
      expect(err).toMatchObject({ code: 'duplicate_label', message: "duplicate label 'route' in field hits" });
    }
  });

  it('rejects empty label names', () => {
    expect(() => defineMetrics({ scope: 'app', metrics: { hits: counter({ labels: [''] as const }) } })).toThrow(
      'labels of field hits must be non-empty strings'
    );
  });

  it('rejects buckets that are not strictly ascending', () => {
    expect(() => defineMetrics({ scope: 'app', metrics: { latency: histogram({ buckets: [1, 1, 2] }) } })).toThrow(
      'invalid buckets for field latency: buckets must be strictly ascending'
    );
    expect(() => defineMetrics({ scope: 'app', metrics: { latency: histogram({ buckets: [] }) } })).toThrow(
      'invalid buckets for field latency: at least one bucket is required'
    );
    expect(() => defineMetrics({ scope: 'app', metrics: { latency: histogram({ buckets: [1, Infinity] }) } })).toThrow(
      'invalid buckets for field latency: buckets must be finite numbers'
    );
  });

  it('accepts a schema with no metrics', () => {
    expect(defineMetrics({ scope: 'app', metrics: {} }).metrics).toEqual([]);
  });
});

describe('parseSchema', () => {
  it('validates an untyped schema', () => {
    const schema = parseSchema({
      scope: 'jobs',
      metrics: {
        processed: { kind: 'counter', labels: ['queue'], help: 'Processed jobs.' },
        backlog: { kind: 'gauge', number: 'float' },
        duration: { kind: 'histogram', buckets: [1, 10] }
      }
    });

    expect(schema.scope).toBe('jobs');
    expect(schema.metrics.processed).toEqual({
      kind: 'counter',
      number: 'int',
      labels: ['queue'],
      rename: undefined,
      help: 'Processed jobs.',
      doc: undefined
    });
    expect(schema.metrics.backlog).toMatchObject({ kind: 'gauge', number: 'float', labels: [] });
    expect(schema.metrics.duration).toMatchObject({ kind: 'histogram', buckets: [1, 10] });
    expect(defineMetrics(schema).metrics.map((metric) => metric.fullName)).toEqual([
      'jobs_processed',
      'jobs_backlog',
      'jobs_duration'
    ]);
  });

  it('rejects an unsupported kind', () => {
    try {
      parseSchema({ scope: 'jobs', metrics: { latency: { kind: 'summary' } } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaError);
      expect(err).toMatchObject({
        code: 'unsupported_kind',
        message: "unsupported metric kind 'summary' for field latency; use counter, gauge or histogram"
      });
    }
  });

  it('rejects a missing scope', () => {
    expect(() => parseSchema({ metrics: {} })).toThrow('metrics schema requires a non-empty scope');
  });

  it('rejects malformed fields', () => {
    expect(() => parseSchema('jobs')).toThrow('metrics schema must be an object');
    expect(() => parseSchema({ scope: 'jobs' })).toThrow('metrics schema requires a metrics object');
    expect(() => parseSchema({ scope: 'jobs', metrics: { a: { kind: 'counter', labels: 'queue' } } })).toThrow(
      'labels of field a must be an array of strings'
    );
    expect(() => parseSchema({ scope: 'jobs', metrics: { a: { kind: 'gauge', number: 'double' } } })).toThrow(
      'number of field a must be int or float'
    );
    expect(() => parseSchema({ scope: 'jobs', metrics: { a: { kind: 'counter', buckets: [1] } } })).toThrow(
      'invalid buckets for field a: only histograms take buckets'
    );
    expect(() => parseSchema({ scope: 'jobs', metrics: { a: { kind: 'counter', help: 3 } } })).toThrow(
      'help of field a must be a string'
    );
  });
});
