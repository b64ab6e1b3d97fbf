import { Counter, Gauge, Histogram, LabelValues, Metric, Registry } from 'prom-client';
import { invalidValue, labelCountMismatch, registrationFailed } from '../errors';
import { MetricsLogger } from '../logger';
import { MetricIdentity, registerOrAdopt } from '../registry';
import { ResolvedMetric } from '../schema/resolve';
import { CounterAccessor, GaugeAccessor, HistogramAccessor, LabelValue, NumberKind } from '../schema/types';

export type StaticLabels = ReadonlyMap<string, string>;

/**
 * Maps positional label values onto the metric's label set. Keys are laid out in sorted order so
 * the encoder prints them alphabetically; static labels are pre-filled.
 */
export class LabelBinder {
  private readonly template: Record<string, LabelValue> = {};

  constructor(
    private readonly metricName: string,
    private readonly dynamicNames: readonly string[],
    staticLabels: StaticLabels
  ) {
    for (const name of sortedLabelNames(dynamicNames, staticLabels)) {
      this.template[name] = staticLabels.get(name) ?? '';
    }
  }

  bind(values: readonly LabelValue[]): LabelValues<string> {
    if (values.length !== this.dynamicNames.length) {
      throw labelCountMismatch(this.metricName, this.dynamicNames.length, values.length);
    }
    const labels: Record<string, LabelValue> = { ...this.template };
    for (let i = 0; i < values.length; i += 1) {
      labels[this.dynamicNames[i]] = values[i];
    }
    return labels;
  }
}

export function sortedLabelNames(dynamicNames: readonly string[], staticLabels: StaticLabels): string[] {
  return [...dynamicNames, ...staticLabels.keys()].sort();
}

abstract class BoundMetric<T extends Metric<string>> {
  constructor(
    readonly resolved: ResolvedMetric,
    readonly metric: T,
    protected readonly binder: LabelBinder
  ) {}

  protected checkAmount(value: number, number: NumberKind | undefined): void {
    if (number === 'int' && !Number.isInteger(value)) {
      throw invalidValue(this.resolved.fullName, `expected an integer, got ${value}`);
    }
  }
}

export class BoundCounter extends BoundMetric<Counter<string>> {
  accessor(values: readonly LabelValue[]): CounterAccessor {
    const labels = this.binder.bind(values);
    return {
      inc: () => this.metric.inc(labels, 1),
      incBy: (value: number) => {
        if (!Number.isFinite(value) || value < 0) {
          throw invalidValue(this.resolved.fullName, `counters only increase by finite non-negative amounts, got ${value}`);
        }
        this.checkAmount(value, this.resolved.number);
        this.metric.inc(labels, value);
      },
      reset: () => {
        this.metric.remove(labels);
        this.metric.inc(labels, 0);
      }
    };
  }
}

export class BoundGauge extends BoundMetric<Gauge<string>> {
  accessor(values: readonly LabelValue[]): GaugeAccessor {
    const labels = this.binder.bind(values);
    return {
      inc: () => this.metric.inc(labels, 1),
      dec: () => this.metric.dec(labels, 1),
      add: (value: number) => {
        this.checkAmount(value, this.resolved.number);
        this.metric.inc(labels, value);
      },
      sub: (value: number) => {
        this.checkAmount(value, this.resolved.number);
        this.metric.dec(labels, value);
      },
      set: (value: number) => {
        this.checkAmount(value, this.resolved.number);
        this.metric.set(labels, value);
      }
    };
  }
}

export class BoundHistogram extends BoundMetric<Histogram<string>> {
  accessor(values: readonly LabelValue[]): HistogramAccessor {
    const labels = this.binder.bind(values);
    return {
      observe: (value: number) => this.metric.observe(labels, value)
    };
  }
}

export type AnyBoundMetric = BoundCounter | BoundGauge | BoundHistogram;

export interface BindOptions {
  registry: Registry;
  staticLabels: StaticLabels;
  logger?: MetricsLogger;
}

/**
 * Constructs the prom-client metric for `resolved` and registers it. The metric's label names are
 * the dynamic labels plus the static label keys.
 */
export function bindMetric(resolved: ResolvedMetric, options: BindOptions): AnyBoundMetric {
  const { registry, staticLabels, logger } = options;
  for (const key of staticLabels.keys()) {
    if (resolved.labelNames.includes(key)) {
      throw registrationFailed(resolved.fullName, `static label '${key}' is also a dynamic label`);
    }
  }
  const labelNames = sortedLabelNames(resolved.labelNames, staticLabels);
  const identity: MetricIdentity = { name: resolved.fullName, kind: resolved.kind, labelNames };
  // prom-client rejects an empty help string
  const help = resolved.help || resolved.fullName;
  const binder = new LabelBinder(resolved.fullName, resolved.labelNames, staticLabels);

  switch (resolved.kind) {
    case 'counter': {
      const metric = construct(resolved, () => new Counter({ name: resolved.fullName, help, labelNames, registers: [] }));
      const registered = registerOrAdopt(
        registry,
        identity,
        metric,
        (existing): existing is Counter<string> => existing instanceof Counter,
        logger
      );
      return new BoundCounter(resolved, registered, binder);
    }
    case 'gauge': {
      const metric = construct(resolved, () => new Gauge({ name: resolved.fullName, help, labelNames, registers: [] }));
      const registered = registerOrAdopt(
        registry,
        identity,
        metric,
        (existing): existing is Gauge<string> => existing instanceof Gauge,
        logger
      );
      return new BoundGauge(resolved, registered, binder);
    }
    case 'histogram': {
      const buckets = resolved.buckets;
      const metric = construct(resolved, () =>
        buckets
          ? new Histogram({ name: resolved.fullName, help, labelNames, buckets: [...buckets], registers: [] })
          : new Histogram({ name: resolved.fullName, help, labelNames, registers: [] })
      );
      const registered = registerOrAdopt(
        registry,
        identity,
        metric,
        (existing): existing is Histogram<string> => existing instanceof Histogram,
        logger
      );
      return new BoundHistogram(resolved, registered, binder);
    }
  }
}

function construct<T>(resolved: ResolvedMetric, create: () => T): T {
  try {
    return create();
  } catch (err) {
    throw registrationFailed(resolved.fullName, err);
  }
}
