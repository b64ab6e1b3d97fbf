import { describe, expect, it } from 'vitest';
import { applyGlobalPrefix, isValidGlobalPrefix } from '../src/exporter/prefix';

describe('global prefix', () => {
  it('prefixes descriptors and samples', () => {
    const exposition = [
      '# HELP app_hits Hits served.',
      '# TYPE app_hits counter',
      'app_hits{route="/"} 2',
      '',
      '# HELP app_latency Latency.',
      '# TYPE app_latency histogram',
      'app_latency_bucket{le="+Inf"} 1',
      'app_latency_sum 0.2',
      'app_latency_count 1',
      ''
    ].join('\n');

    expect(applyGlobalPrefix(exposition, 'svc')).toBe(
      [
        '# HELP svc_app_hits Hits served.',
        '# TYPE svc_app_hits counter',
        'svc_app_hits{route="/"} 2',
        '',
        '# HELP svc_app_latency Latency.',
        '# TYPE svc_app_latency histogram',
        'svc_app_latency_bucket{le="+Inf"} 1',
        'svc_app_latency_sum 0.2',
        'svc_app_latency_count 1',
        ''
      ].join('\n')
    );
  });

  it('leaves other comments alone', () => {
    expect(applyGlobalPrefix('# EOF', 'svc')).toBe('# EOF');
  });

  it('validates prefixes as metric names', () => {
    expect(isValidGlobalPrefix('svc')).toBe(true);
    expect(isValidGlobalPrefix('team:svc_1')).toBe(true);
    expect(isValidGlobalPrefix('')).toBe(false);
    expect(isValidGlobalPrefix('1svc')).toBe(false);
    expect(isValidGlobalPrefix('my-svc')).toBe(false);
  });
});
