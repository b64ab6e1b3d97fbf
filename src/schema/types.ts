export type MetricKind = 'counter' | 'gauge' | 'histogram';

/** Numeric variant of counters and gauges. Integer variants reject fractional amounts. */
export type NumberKind = 'int' | 'float';

export const METRIC_KINDS: readonly MetricKind[] = ['counter', 'gauge', 'histogram'];

/** Joins the schema scope and the metric name. The exposition format allows no other separator. */
export const SEPARATOR = '_';

export type LabelNames = readonly string[];
export type LabelValue = string | number;

interface FieldBase<L extends LabelNames> {
  labels: L;
  /** Overrides the field identifier in the metric name. */
  rename?: string;
  /** Takes precedence over `doc`. */
  help?: string;
  doc?: string;
}

export interface CounterField<L extends LabelNames = LabelNames> extends FieldBase<L> {
  kind: 'counter';
  number: NumberKind;
}

export interface GaugeField<L extends LabelNames = LabelNames> extends FieldBase<L> {
  kind: 'gauge';
  number: NumberKind;
}

export interface HistogramField<L extends LabelNames = LabelNames> extends FieldBase<L> {
  kind: 'histogram';
  buckets?: readonly number[];
}

export type MetricField<L extends LabelNames = LabelNames> = CounterField<L> | GaugeField<L> | HistogramField<L>;

export type MetricFields = Record<string, MetricField>;

export interface MetricsSchema<M extends MetricFields = MetricFields> {
  /** Prefix of every metric name produced from this schema. */
  scope: string;
  metrics: M;
}

export interface CounterAccessor {
  inc(): void;
  incBy(value: number): void;
  reset(): void;
}

export interface GaugeAccessor {
  inc(): void;
  dec(): void;
  add(value: number): void;
  sub(value: number): void;
  set(value: number): void;
}

export interface HistogramAccessor {
  observe(value: number): void;
}

export type AccessorFor<F extends MetricField> = F extends { kind: 'counter' }
  ? CounterAccessor
  : F extends { kind: 'gauge' }
    ? GaugeAccessor
    : HistogramAccessor;

export type LabelArgs<L extends LabelNames> = { [I in keyof L]: LabelValue };

/** Takes one value per declared label, in declaration order. */
export type Accessor<F extends MetricField> = (...labels: LabelArgs<F['labels']>) => AccessorFor<F>;

export type MetricsBundle<M extends MetricFields> = { readonly [K in keyof M]: Accessor<M[K]> };
