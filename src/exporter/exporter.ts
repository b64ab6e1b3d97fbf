import { FastifyInstance } from 'fastify';
import { Registry } from 'prom-client';
import { DEFAULT_LISTEN_ADDR, ExporterConfig, formatListenAddr, parseListenAddr } from '../config';
import { bindFailed, invalidPath, invalidPrefix } from '../errors';
import { defaultRegistry } from '../registry';
import { isValidGlobalPrefix } from './prefix';
import { buildExporterServer } from './server';

export const DEFAULT_PATH = '/';

export interface ExporterOptions {
  address?: string;
  path?: string;
  globalPrefix?: string;
  registry?: Registry;
  logLevel?: string;
}

export interface InstalledExporter {
  host: string;
  /** The bound port, which differs from the configured one when that was 0. */
  port: number;
  path: string;
  server: FastifyInstance;
  close(): Promise<void>;
}

/** `undefined` selects the root. An explicit path must start with `/` and must not end with one. */
export function validatePath(path: string | undefined): string {
  if (path === undefined) {
    return DEFAULT_PATH;
  }
  if (path === '' || !path.startsWith('/') || path.endsWith('/')) {
    throw invalidPath(path);
  }
  return path;
}

export class ExporterBuilder {
  constructor(private readonly options: ExporterOptions = {}) {}

  static fromConfig(config: ExporterConfig): ExporterBuilder {
    return new ExporterBuilder({
      address: formatListenAddr(config.listenHost, config.listenPort),
      path: config.path,
      globalPrefix: config.globalPrefix,
      logLevel: config.logLevel
    });
  }

  /** `host:port`, `:port` or `[ipv6]:port`. Defaults to 0.0.0.0:9090. */
  withAddress(address: string): ExporterBuilder {
    return new ExporterBuilder({ ...this.options, address });
  }

  withPath(path: string): ExporterBuilder {
    return new ExporterBuilder({ ...this.options, path });
  }

  /** Prepended, with `_`, to every served metric name. */
  withGlobalPrefix(globalPrefix: string): ExporterBuilder {
    return new ExporterBuilder({ ...this.options, globalPrefix });
  }

  withRegistry(registry: Registry): ExporterBuilder {
    return new ExporterBuilder({ ...this.options, registry });
  }

  withLogLevel(logLevel: string): ExporterBuilder {
    return new ExporterBuilder({ ...this.options, logLevel });
  }

  /**
   * Validates the configuration, binds the listener and starts serving on the event loop. Resolves
   * once bound; a bad configuration or a bind failure rejects with an `ExporterError` and leaves
   * nothing running.
   */
  async install(): Promise<InstalledExporter> {
    const path = validatePath(this.options.path);
    const { host, port } = parseListenAddr(this.options.address ?? DEFAULT_LISTEN_ADDR);
    const globalPrefix = this.options.globalPrefix;
    if (globalPrefix !== undefined && !isValidGlobalPrefix(globalPrefix)) {
      throw invalidPrefix(globalPrefix);
    }

    const server = buildExporterServer({
      registry: this.options.registry ?? defaultRegistry(),
      path,
      globalPrefix,
      logLevel: this.options.logLevel
    });

    try {
      await server.listen({ host, port });
    } catch (err) {
      await server.close();
      throw bindFailed(host, port, err);
    }

    server.server.on('error', (err) => {
      server.log.error({ err: err.message }, 'metrics listener failed');
    });

    const bound = server.server.address();
    const boundPort = bound !== null && typeof bound === 'object' ? bound.port : port;
    server.log.info({ host, port: boundPort, path, globalPrefix }, 'metrics exporter listening');

    return {
      host,
      port: boundPort,
      path,
      server,
      close: () => server.close()
    };
  }
}
