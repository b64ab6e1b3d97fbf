import { invalidAddress } from './errors';
import { logLevel } from './logger';

export interface ExporterConfig {
  listenHost: string;
  listenPort: number;
  path?: string;
  globalPrefix?: string;
  logLevel: string;
}

export const DEFAULT_LISTEN_ADDR = '0.0.0.0:9090';

const PORT_RE = /^\d+$/;
const MAX_PORT = 65535;

export function loadExporterConfig(env: NodeJS.ProcessEnv = process.env): ExporterConfig {
  const { host, port } = parseListenAddr(env.METRICS_LISTEN_ADDR || DEFAULT_LISTEN_ADDR);
  return {
    listenHost: host,
    listenPort: port,
    path: env.METRICS_PATH || undefined,
    globalPrefix: env.METRICS_GLOBAL_PREFIX || undefined,
    logLevel: logLevel(env)
  };
}

/** Accepts `host:port`, `:port` (all interfaces) and `[ipv6]:port`. */
export function parseListenAddr(addr: string): { host: string; port: number } {
  const trimmed = addr.trim();
  let host: string;
  let portStr: string;
  if (trimmed.startsWith('[')) {
    const end = trimmed.indexOf(']');
    if (end < 0 || trimmed[end + 1] !== ':') {
      throw invalidAddress(addr);
    }
    host = trimmed.slice(1, end);
    portStr = trimmed.slice(end + 2);
  } else {
    const sep = trimmed.lastIndexOf(':');
    if (sep < 0) {
      throw invalidAddress(addr);
    }
    host = sep === 0 ? '0.0.0.0' : trimmed.slice(0, sep);
    portStr = trimmed.slice(sep + 1);
  }
  if (!host || !PORT_RE.test(portStr)) {
    throw invalidAddress(addr);
  }
  const port = Number(portStr);
  if (port > MAX_PORT) {
    throw invalidAddress(addr);
  }
  return { host, port };
}

export function formatListenAddr(host: string, port: number): string {
  return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}
