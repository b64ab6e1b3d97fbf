import { SEPARATOR } from '../schema/types';

const METRIC_NAME_RE = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const DESCRIPTOR_PREFIXES = ['# HELP ', '# TYPE '];

export function isValidGlobalPrefix(prefix: string): boolean {
  return METRIC_NAME_RE.test(prefix);
}

/**
 * Prepends `prefix_` to every metric family name of a text exposition. Works on the encoded copy,
 * so the registry keeps its own names.
 */
export function applyGlobalPrefix(exposition: string, prefix: string): string {
  const head = `${prefix}${SEPARATOR}`;
  return exposition
    .split('\n')
    .map((line) => {
      const descriptor = DESCRIPTOR_PREFIXES.find((marker) => line.startsWith(marker));
      if (descriptor) {
        return `${descriptor}${head}${line.slice(descriptor.length)}`;
      }
      if (line === '' || line.startsWith('#')) {
        return line;
      }
      return `${head}${line}`;
    })
    .join('\n');
}
