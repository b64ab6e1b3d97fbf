import { readdirSync, readFileSync } from 'node:fs';
import { cpus, totalmem } from 'node:os';
import { performance } from 'node:perf_hooks';
import { Registry } from 'prom-client';
import { defineMetrics } from './bundle/builder';
import { counter, gauge } from './schema/fields';
import { MetricsLogger, logger as defaultLogger } from './logger';
import { defaultRegistry } from './registry';

const systemMetrics = defineMetrics({
  scope: 'system',
  metrics: {
    cpu_cores: gauge({ doc: 'The number of logical CPU cores available in the system.' }),
    max_cpu_frequency: gauge({ doc: 'The maximum CPU frequency of all cores in MHz.' }),
    min_cpu_frequency: gauge({ doc: 'The minimum CPU frequency of all cores in MHz.' })
  }
});

const processMetrics = defineMetrics({
  scope: 'process',
  metrics: {
    threads: gauge({ doc: 'The number of OS threads used by the process (Linux only).' }),
    cpu_usage: gauge({ number: 'float', doc: 'The CPU usage of the process as a percentage.' }),
    resident_memory_bytes: gauge({ doc: 'The resident memory of the process in bytes. (RSS)' }),
    resident_memory_usage: gauge({
      number: 'float',
      doc: 'The resident memory usage of the process as a percentage of the total memory available.'
    }),
    start_time_seconds: gauge({ doc: 'The start time of the process in UNIX seconds.' }),
    open_fds: gauge({ doc: 'The number of open file descriptors of the process.' }),
    max_fds: gauge({ doc: 'The maximum number of open file descriptors of the process.' }),
    disk_written_bytes_total: counter({ doc: 'The total written bytes to disk by the process.' })
  }
});

type SystemMetrics = ReturnType<typeof systemMetrics.build>;
type ProcessMetrics = ReturnType<typeof processMetrics.build>;

/** Reads from `/proc/self`. Values stay 0 on platforms without it. */
export interface ProcSource {
  readFile(path: string): string | undefined;
  countEntries(path: string): number | undefined;
}

export const procfs: ProcSource = {
  readFile: (path) => readOptional(() => readFileSync(path, 'utf8')),
  countEntries: (path) => readOptional(() => readdirSync(path).length)
};

function readOptional<T>(read: () => T): T | undefined {
  try {
    return read();
  } catch (err) {
    if (isMissingOrDenied(err)) {
      return undefined;
    }
    throw err;
  }
}

function isMissingOrDenied(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) {
    return false;
  }
  return err.code === 'ENOENT' || err.code === 'EACCES' || err.code === 'EPERM';
}

/** The `Threads:` entry of /proc/self/status. */
export function parseThreads(status: string): number | undefined {
  const match = /^Threads:\s+(\d+)/m.exec(status);
  return match ? Number(match[1]) : undefined;
}

/** The soft limit of `Max open files` in /proc/self/limits. */
export function parseMaxFds(limits: string): number | undefined {
  const match = /^Max open files\s+(\d+|unlimited)/m.exec(limits);
  if (!match || match[1] === 'unlimited') {
    return undefined;
  }
  return Number(match[1]);
}

/** The `write_bytes:` entry of /proc/self/io. */
export function parseWriteBytes(io: string): number | undefined {
  const match = /^write_bytes:\s+(\d+)/m.exec(io);
  return match ? Number(match[1]) : undefined;
}

export interface ProcessCollectorOptions {
  registry?: Registry;
  proc?: ProcSource;
  logger?: MetricsLogger;
}

/**
 * Samples CPU, memory, file descriptor, disk and thread figures of the current process into
 * gauges registered under `system_*` and `process_*`.
 *
 * @example
 * const collector = new ProcessCollector({ registry });
 * setInterval(() => collector.collect(), 15_000).unref();
 */
export class ProcessCollector {
  readonly pid = process.pid;
  private readonly proc: ProcSource;
  private readonly logger: MetricsLogger;
  private readonly system: SystemMetrics;
  private readonly metrics: ProcessMetrics;
  private readonly cores: number;
  private lastCpu = process.cpuUsage();
  private lastSampleAt = performance.now();

  constructor(options: ProcessCollectorOptions = {}) {
    const registry = options.registry ?? defaultRegistry();
    this.proc = options.proc ?? procfs;
    this.logger = options.logger ?? defaultLogger;
    this.system = systemMetrics.builder().withRegistry(registry).withLogger(this.logger).build();
    this.metrics = processMetrics.builder().withRegistry(registry).withLogger(this.logger).build();
    this.cores = Math.max(cpus().length, 1);
  }

  collect(): void {
    const cpuList = cpus();
    const speeds = cpuList.map((cpu) => cpu.speed);
    this.system.cpu_cores().set(this.cores);
    this.system.max_cpu_frequency().set(speeds.length > 0 ? Math.max(...speeds) : 0);
    this.system.min_cpu_frequency().set(speeds.length > 0 ? Math.min(...speeds) : 0);

    const now = performance.now();
    const cpu = process.cpuUsage(this.lastCpu);
    const elapsedMs = now - this.lastSampleAt;
    const usedMs = (cpu.user + cpu.system) / 1000;
    this.lastCpu = process.cpuUsage();
    this.lastSampleAt = now;
    this.metrics.cpu_usage().set(elapsedMs > 0 ? (usedMs / elapsedMs / this.cores) * 100 : 0);

    const rss = process.memoryUsage.rss();
    this.metrics.resident_memory_bytes().set(rss);
    this.metrics.resident_memory_usage().set((rss / totalmem()) * 100);
    this.metrics.start_time_seconds().set(Math.floor(performance.timeOrigin / 1000));

    const status = this.proc.readFile('/proc/self/status');
    const limits = this.proc.readFile('/proc/self/limits');
    const io = this.proc.readFile('/proc/self/io');
    const openFds = this.proc.countEntries('/proc/self/fd');
    if (status === undefined || limits === undefined || io === undefined || openFds === undefined) {
      this.logger.debug?.({ pid: this.pid }, 'some /proc/self sources are unavailable');
    }

    this.metrics.threads().set(status === undefined ? 0 : parseThreads(status) ?? 0);
    this.metrics.max_fds().set(limits === undefined ? 0 : parseMaxFds(limits) ?? 0);
    this.metrics.open_fds().set(openFds ?? 0);

    // absolute value from /proc, so collectors sharing the counter do not add up
    const written = io === undefined ? undefined : parseWriteBytes(io);
    if (written !== undefined) {
      const disk = this.metrics.disk_written_bytes_total();
      disk.reset();
      disk.incBy(written);
    }
  }
}
