export { defineMetrics, MetricsBuilder, MetricsDefinition } from './bundle/builder';
export { LabelBinder } from './bundle/bound';
export type { StaticLabels } from './bundle/bound';
export { counter, gauge, histogram } from './schema/fields';
export type { FieldOptions, HistogramFieldOptions, NumericFieldOptions } from './schema/fields';
export { fullMetricName, parseSchema, resolveField, resolveSchema } from './schema/resolve';
export type { ResolvedMetric } from './schema/resolve';
export { METRIC_KINDS, SEPARATOR } from './schema/types';
export type {
  Accessor,
  AccessorFor,
  CounterAccessor,
  CounterField,
  GaugeAccessor,
  GaugeField,
  HistogramAccessor,
  HistogramField,
  LabelNames,
  LabelValue,
  MetricField,
  MetricFields,
  MetricKind,
  MetricsBundle,
  MetricsSchema,
  NumberKind
} from './schema/types';
export { defaultRegistry } from './registry';
export { ExporterBuilder, DEFAULT_PATH, validatePath } from './exporter/exporter';
export type { ExporterOptions, InstalledExporter } from './exporter/exporter';
export { buildExporterServer, gather } from './exporter/server';
export { applyGlobalPrefix } from './exporter/prefix';
export { ProcessCollector } from './process';
export type { ProcessCollectorOptions, ProcSource } from './process';
export { DEFAULT_LISTEN_ADDR, loadExporterConfig, parseListenAddr } from './config';
export type { ExporterConfig } from './config';
export { logger } from './logger';
export type { MetricsLogger } from './logger';
export {
  ExporterError,
  MetricsError,
  RegistrationError,
  SchemaError,
  normalizeError
} from './errors';
export type { MetricsErrorCode } from './errors';
