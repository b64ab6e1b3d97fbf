import {
  duplicateLabel,
  invalidBuckets,
  invalidLabels,
  invalidSchema,
  missingScope,
  unsupportedKind
} from '../errors';
import { METRIC_KINDS, MetricField, MetricFields, MetricKind, MetricsSchema, NumberKind, SEPARATOR } from './types';

export interface ResolvedMetric {
  identifier: string;
  kind: MetricKind;
  /** `undefined` for histograms, which always observe floats. */
  number?: NumberKind;
  fullName: string;
  help: string;
  labelNames: readonly string[];
  buckets?: readonly number[];
}

export function fullMetricName(scope: string, identifier: string, rename?: string): string {
  return `${scope}${SEPARATOR}${rename ?? identifier}`;
}

export function resolveHelp(help: string | undefined, doc: string | undefined): string {
  if (help !== undefined) {
    return help;
  }
  return doc?.trim() ?? '';
}

export function resolveField(identifier: string, field: MetricField, scope: string): ResolvedMetric {
  if (!isMetricKind(field.kind)) {
    throw unsupportedKind(identifier, field.kind);
  }
  const labelNames = resolveLabels(identifier, field.labels);
  const resolved: ResolvedMetric = {
    identifier,
    kind: field.kind,
    fullName: fullMetricName(scope, identifier, field.rename),
    help: resolveHelp(field.help, field.doc),
    labelNames
  };
  switch (field.kind) {
    case 'counter':
    case 'gauge':
      resolved.number = field.number;
      break;
    case 'histogram':
      if (field.buckets !== undefined) {
        resolved.buckets = resolveBuckets(identifier, field.buckets);
      }
      break;
  }
  return resolved;
}

/** Resolves every field in declaration order. */
export function resolveSchema<M extends MetricFields>(schema: MetricsSchema<M>): ResolvedMetric[] {
  if (typeof schema.scope !== 'string' || schema.scope.trim() === '') {
    throw missingScope();
  }
  return Object.entries(schema.metrics).map(([identifier, field]) => resolveField(identifier, field, schema.scope));
}

function resolveLabels(field: string, labels: readonly unknown[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const label of labels) {
    if (typeof label !== 'string' || label === '') {
      throw invalidLabels(`labels of field ${field} must be non-empty strings`, { field });
    }
    if (seen.has(label)) {
      throw duplicateLabel(field, label);
    }
    seen.add(label);
    result.push(label);
  }
  return result;
}

function resolveBuckets(field: string, buckets: readonly number[]): number[] {
  if (buckets.length === 0) {
    throw invalidBuckets(field, 'at least one bucket is required');
  }
  for (let i = 0; i < buckets.length; i += 1) {
    if (typeof buckets[i] !== 'number' || !Number.isFinite(buckets[i])) {
      throw invalidBuckets(field, 'buckets must be finite numbers');
    }
    if (i > 0 && buckets[i] <= buckets[i - 1]) {
      throw invalidBuckets(field, 'buckets must be strictly ascending');
    }
  }
  return [...buckets];
}

function isMetricKind(value: unknown): value is MetricKind {
  return typeof value === 'string' && METRIC_KINDS.some((kind) => kind === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, field: string, key: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw invalidSchema(`${key} of field ${field} must be a string`, { field });
  }
  return value;
}

function parseNumberKind(value: unknown, field: string): NumberKind {
  if (value === undefined) {
    return 'int';
  }
  if (value !== 'int' && value !== 'float') {
    throw invalidSchema(`number of field ${field} must be int or float`, { field });
  }
  return value;
}

function parseField(identifier: string, raw: unknown): MetricField<string[]> {
  if (!isRecord(raw)) {
    throw invalidSchema(`field ${identifier} must be an object`, { field: identifier });
  }
  const kind = raw.kind;
  if (!isMetricKind(kind)) {
    throw unsupportedKind(identifier, kind);
  }
  const labels: unknown = raw.labels === undefined ? [] : raw.labels;
  if (!Array.isArray(labels) || !labels.every((label): label is string => typeof label === 'string')) {
    throw invalidLabels(`labels of field ${identifier} must be an array of strings`, { field: identifier });
  }
  const common = {
    labels,
    rename: optionalString(raw.rename, identifier, 'rename'),
    help: optionalString(raw.help, identifier, 'help'),
    doc: optionalString(raw.doc, identifier, 'doc')
  };
  if (kind === 'histogram') {
    const buckets: unknown = raw.buckets;
    if (buckets === undefined) {
      return { ...common, kind };
    }
    if (!Array.isArray(buckets) || !buckets.every((bucket): bucket is number => typeof bucket === 'number')) {
      throw invalidBuckets(identifier, 'buckets must be an array of numbers');
    }
    return { ...common, kind, buckets };
  }
  if (raw.buckets !== undefined) {
    throw invalidBuckets(identifier, 'only histograms take buckets');
  }
  return { ...common, kind, number: parseNumberKind(raw.number, identifier) };
}

/**
 * Validates an untyped schema description, such as one read from a JSON file, into a schema that
 * `defineMetrics` accepts. Field resolution still happens in `defineMetrics`.
 */
export function parseSchema(value: unknown): MetricsSchema<Record<string, MetricField<string[]>>> {
  if (!isRecord(value)) {
    throw invalidSchema('metrics schema must be an object');
  }
  if (typeof value.scope !== 'string' || value.scope.trim() === '') {
    throw missingScope();
  }
  if (!isRecord(value.metrics)) {
    throw invalidSchema('metrics schema requires a metrics object');
  }
  const metrics: Record<string, MetricField<string[]>> = Object.fromEntries(
    Object.entries(value.metrics).map(([identifier, raw]): [string, MetricField<string[]>] => [
      identifier,
      parseField(identifier, raw)
    ])
  );
  return { scope: value.scope, metrics };
}
