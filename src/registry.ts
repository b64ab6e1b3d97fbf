import { Metric, Registry, register } from 'prom-client';
import { registrationConflict, registrationFailed } from './errors';
import { MetricsLogger } from './logger';
import { MetricKind } from './schema/types';

/** What makes two registrations of the same name interchangeable. */
export interface MetricIdentity {
  name: string;
  kind: MetricKind;
  /** Dynamic and static label names, sorted. */
  labelNames: readonly string[];
}

interface Registration {
  identity: MetricIdentity;
  metric: Metric<string>;
}

const registrations = new WeakMap<Registry, Map<string, Registration>>();

/**
 * The process-wide registry used when a builder or exporter is given none. It is prom-client's
 * global registry: created with the module, never torn down.
 */
export function defaultRegistry(): Registry {
  return register;
}

function registrationsOf(registry: Registry): Map<string, Registration> {
  let known = registrations.get(registry);
  if (!known) {
    known = new Map();
    registrations.set(registry, known);
  }
  return known;
}

function sameLabels(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((label, index) => label === b[index]);
}

/**
 * Registers `metric`, or adopts the instance already registered under the same name so that
 * repeated builds against one registry share state. Adoption requires the same kind and label
 * names; anything else is a conflict.
 */
export function registerOrAdopt<T extends Metric<string>>(
  registry: Registry,
  identity: MetricIdentity,
  metric: T,
  isSameKind: (existing: Metric<string>) => existing is T,
  logger?: MetricsLogger
): T {
  const known = registrationsOf(registry);
  const existing = registry.getSingleMetric(identity.name);
  if (!existing) {
    try {
      registry.registerMetric(metric);
    } catch (err) {
      throw registrationFailed(identity.name, err);
    }
    known.set(identity.name, { identity, metric });
    return metric;
  }

  if (!isSameKind(existing)) {
    throw registrationConflict(identity.name, 'a different metric kind');
  }
  const previous = known.get(identity.name);
  const existingLabels = previous && previous.metric === existing ? previous.identity.labelNames : labelNamesOf(existing);
  if (!existingLabels) {
    throw registrationConflict(identity.name, 'unreadable label names');
  }
  if (!sameLabels(existingLabels, identity.labelNames)) {
    throw registrationConflict(identity.name, `labels [${existingLabels.join(', ')}]`);
  }
  logger?.debug?.(
    { metric: identity.name, labels: identity.labelNames, owned: previous?.metric === existing },
    'metric already registered, reusing existing instance'
  );
  return existing;
}

/** Drops a metric registered by this library, e.g. when the build that added it fails. */
export function unregisterMetric(registry: Registry, name: string): void {
  registry.removeSingleMetric(name);
  registrations.get(registry)?.delete(name);
}

/** Sorted label names of a metric registered outside this library. */
function labelNamesOf(metric: Metric<string>): string[] | undefined {
  const labelNames: unknown = Reflect.get(metric, 'labelNames');
  if (!Array.isArray(labelNames) || !labelNames.every((label): label is string => typeof label === 'string')) {
    return undefined;
  }
  return [...labelNames].sort();
}
