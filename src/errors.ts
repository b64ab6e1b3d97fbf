export type MetricsErrorCode =
  | 'unsupported_kind'
  | 'missing_scope'
  | 'invalid_schema'
  | 'invalid_labels'
  | 'duplicate_label'
  | 'invalid_buckets'
  | 'registration_conflict'
  | 'registration_failed'
  | 'invalid_value'
  | 'invalid_path'
  | 'invalid_address'
  | 'invalid_prefix'
  | 'bind_failed'
  | 'internal';

export class MetricsError extends Error {
  readonly code: MetricsErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(opts: { message: string; code: MetricsErrorCode; details?: Record<string, unknown>; cause?: unknown }) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'MetricsError';
    this.code = opts.code;
    this.details = opts.details;
  }
}

/** Raised while a schema is processed, before any metric exists. */
export class SchemaError extends MetricsError {
  constructor(opts: { message: string; code: MetricsErrorCode; details?: Record<string, unknown> }) {
    super(opts);
    this.name = 'SchemaError';
  }
}

/** Raised by `build()` when a metric cannot be registered. */
export class RegistrationError extends MetricsError {
  constructor(opts: { message: string; code: MetricsErrorCode; details?: Record<string, unknown>; cause?: unknown }) {
    super(opts);
    this.name = 'RegistrationError';
  }
}

/** Raised by the exposition service before it starts listening. */
export class ExporterError extends MetricsError {
  constructor(opts: { message: string; code: MetricsErrorCode; details?: Record<string, unknown>; cause?: unknown }) {
    super(opts);
    this.name = 'ExporterError';
  }
}

export function unsupportedKind(field: string, kind: unknown): SchemaError {
  return new SchemaError({
    message: `unsupported metric kind '${String(kind)}' for field ${field}; use counter, gauge or histogram`,
    code: 'unsupported_kind',
    details: { field, kind }
  });
}

export function missingScope(): SchemaError {
  return new SchemaError({
    message: 'metrics schema requires a non-empty scope',
    code: 'missing_scope'
  });
}

export function invalidSchema(message: string, details?: Record<string, unknown>): SchemaError {
  return new SchemaError({ message, code: 'invalid_schema', details });
}

export function invalidLabels(message: string, details?: Record<string, unknown>): SchemaError {
  return new SchemaError({ message, code: 'invalid_labels', details });
}

export function duplicateLabel(field: string, label: string): SchemaError {
  return new SchemaError({
    message: `duplicate label '${label}' in field ${field}`,
    code: 'duplicate_label',
    details: { field, label }
  });
}

export function invalidBuckets(field: string, reason: string): SchemaError {
  return new SchemaError({
    message: `invalid buckets for field ${field}: ${reason}`,
    code: 'invalid_buckets',
    details: { field }
  });
}

export function registrationConflict(name: string, reason: string): RegistrationError {
  return new RegistrationError({
    message: `metric ${name} is already registered with ${reason}`,
    code: 'registration_conflict',
    details: { name }
  });
}

export function registrationFailed(name: string, cause: unknown): RegistrationError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new RegistrationError({
    message: `failed to register metric ${name}: ${reason}`,
    code: 'registration_failed',
    details: { name },
    cause
  });
}

export function invalidValue(metric: string, message: string): MetricsError {
  return new MetricsError({
    message: `${metric}: ${message}`,
    code: 'invalid_value',
    details: { metric }
  });
}

export function labelCountMismatch(metric: string, expected: number, received: number): MetricsError {
  return new MetricsError({
    message: `${metric}: expected ${expected} label values, received ${received}`,
    code: 'invalid_labels',
    details: { metric, expected, received }
  });
}

export function invalidPath(path: string): ExporterError {
  return new ExporterError({
    message: `invalid path: ${path}`,
    code: 'invalid_path',
    details: { path }
  });
}

export function invalidAddress(address: string): ExporterError {
  return new ExporterError({
    message: `invalid listen address: ${address}`,
    code: 'invalid_address',
    details: { address }
  });
}

export function invalidPrefix(prefix: string): ExporterError {
  return new ExporterError({
    message: `invalid global prefix: ${prefix}`,
    code: 'invalid_prefix',
    details: { prefix }
  });
}

export function bindFailed(host: string, port: number, cause: unknown): ExporterError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new ExporterError({
    message: `failed to bind to ${host}:${port}: ${reason}`,
    code: 'bind_failed',
    details: { host, port },
    cause
  });
}

export function normalizeError(err: unknown): MetricsError {
  if (err instanceof MetricsError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new MetricsError({ message, code: 'internal', cause: err });
}
