import { CounterField, GaugeField, HistogramField, LabelNames, NumberKind } from './types';

export interface FieldOptions<L extends LabelNames> {
  labels?: L;
  rename?: string;
  help?: string;
  doc?: string;
}

export interface NumericFieldOptions<L extends LabelNames> extends FieldOptions<L> {
  number?: NumberKind;
}

export interface HistogramFieldOptions<L extends LabelNames> extends FieldOptions<L> {
  buckets?: readonly number[];
}

/**
 * Declares a counter. Pass labels `as const` to get one typed accessor argument per label.
 *
 * @example
 * counter({ labels: ['method', 'path'] as const, rename: 'http_requests_total' })
 */
export function counter(options?: NumericFieldOptions<readonly []>): CounterField<readonly []>;
export function counter<L extends LabelNames>(options: NumericFieldOptions<L> & { labels: L }): CounterField<L>;
export function counter(options: NumericFieldOptions<LabelNames> = {}): CounterField<LabelNames> {
  return {
    kind: 'counter',
    number: options.number ?? 'int',
    labels: options.labels ?? [],
    rename: options.rename,
    help: options.help,
    doc: options.doc
  };
}

export function gauge(options?: NumericFieldOptions<readonly []>): GaugeField<readonly []>;
export function gauge<L extends LabelNames>(options: NumericFieldOptions<L> & { labels: L }): GaugeField<L>;
export function gauge(options: NumericFieldOptions<LabelNames> = {}): GaugeField<LabelNames> {
  return {
    kind: 'gauge',
    number: options.number ?? 'int',
    labels: options.labels ?? [],
    rename: options.rename,
    help: options.help,
    doc: options.doc
  };
}

/** Declares a histogram. Without `buckets`, prom-client's default buckets apply. */
export function histogram(options?: HistogramFieldOptions<readonly []>): HistogramField<readonly []>;
export function histogram<L extends LabelNames>(options: HistogramFieldOptions<L> & { labels: L }): HistogramField<L>;
export function histogram(options: HistogramFieldOptions<LabelNames> = {}): HistogramField<LabelNames> {
  return {
    kind: 'histogram',
    labels: options.labels ?? [],
    buckets: options.buckets,
    rename: options.rename,
    help: options.help,
    doc: options.doc
  };
}
