import { Registry } from 'prom-client';
import { MetricsError } from '../errors';
import { MetricsLogger, logger as defaultLogger } from '../logger';
import { defaultRegistry, unregisterMetric } from '../registry';
import { ResolvedMetric, resolveSchema } from '../schema/resolve';
import { LabelValue, MetricFields, MetricsBundle, MetricsSchema } from '../schema/types';
import { StaticLabels, bindMetric } from './bound';

/**
 * A processed schema. Every field has been resolved, so any schema error has already been thrown
 * by the time a definition exists.
 */
export class MetricsDefinition<M extends MetricFields> {
  readonly scope: string;
  /** Resolved fields in declaration order. */
  readonly metrics: readonly ResolvedMetric[];

  constructor(schema: MetricsSchema<M>) {
    this.metrics = resolveSchema(schema);
    this.scope = schema.scope;
  }

  /** A builder bound to the default registry, with no static labels. */
  builder(): MetricsBuilder<M> {
    return new MetricsBuilder(this, defaultRegistry(), new Map(), defaultLogger);
  }

  /** Builds against the default registry with no static labels. */
  build(): MetricsBundle<M> {
    return this.builder().build();
  }
}

type AccessorFn = (...labels: readonly LabelValue[]) => unknown;

export class MetricsBuilder<M extends MetricFields> {
  constructor(
    private readonly definition: MetricsDefinition<M>,
    private readonly registry: Registry,
    private readonly staticLabels: StaticLabels,
    private readonly logger: MetricsLogger
  ) {}

  withRegistry(registry: Registry): MetricsBuilder<M> {
    return new MetricsBuilder(this.definition, registry, this.staticLabels, this.logger);
  }

  /** Adds a label applied to every metric of the bundle. A repeated key overwrites the earlier value. */
  withLabel(key: string, value: LabelValue): MetricsBuilder<M> {
    const labels = new Map(this.staticLabels);
    labels.set(key, String(value));
    return new MetricsBuilder(this.definition, this.registry, labels, this.logger);
  }

  withLogger(logger: MetricsLogger): MetricsBuilder<M> {
    return new MetricsBuilder(this.definition, this.registry, this.staticLabels, logger);
  }

  /**
   * Constructs and registers every metric in declaration order. A metric already registered under
   * the same name, kind and labels is reused instead of replaced. When any field fails, the metrics
   * this call registered are removed again before the error is rethrown; adopted ones stay.
   */
  build(): MetricsBundle<M> {
    // fromEntries defines own properties, so an identifier such as `__proto__` stays a field
    const bundle = Object.fromEntries(this.bindAll());
    if (!isBundleOf(bundle, this.definition)) {
      throw new MetricsError({ message: 'metrics bundle is missing accessors', code: 'internal' });
    }
    this.logger.debug?.(
      { scope: this.definition.scope, metrics: this.definition.metrics.length, labels: Object.fromEntries(this.staticLabels) },
      'metrics bundle built'
    );
    Object.freeze(bundle);
    return bundle;
  }

  private bindAll(): [string, AccessorFn][] {
    const added: string[] = [];
    try {
      return this.definition.metrics.map((resolved): [string, AccessorFn] => {
        const isNew = this.registry.getSingleMetric(resolved.fullName) === undefined;
        const bound = bindMetric(resolved, {
          registry: this.registry,
          staticLabels: this.staticLabels,
          logger: this.logger
        });
        if (isNew) {
          added.push(resolved.fullName);
        }
        return [resolved.identifier, (...labels: readonly LabelValue[]) => bound.accessor(labels)];
      });
    } catch (err) {
      for (const name of added) {
        unregisterMetric(this.registry, name);
      }
      throw err;
    }
  }
}

function isBundleOf<M extends MetricFields>(value: object, definition: MetricsDefinition<M>): value is MetricsBundle<M> {
  return definition.metrics.every((metric) => typeof Reflect.get(value, metric.identifier) === 'function');
}

/**
 * Processes a metrics schema. Throws `SchemaError` for an unsupported kind, a missing scope, bad
 * labels or bad buckets.
 *
 * @example
 * const definition = defineMetrics({
 *   scope: 'app',
 *   metrics: {
 *     requests: counter({ labels: ['method'] as const, doc: 'Total HTTP requests.' }),
 *     latency: histogram({ labels: ['method'] as const, buckets: [0.01, 0.1, 1] })
 *   }
 * });
 * const metrics = definition.builder().withLabel('host', 'localhost').build();
 * metrics.requests('GET').inc();
 */
export function defineMetrics<M extends MetricFields>(schema: MetricsSchema<M>): MetricsDefinition<M> {
  return new MetricsDefinition(schema);
}
