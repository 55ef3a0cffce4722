import { describe, it, expect } from 'vitest';
import { DEFAULT_HOST, DEFAULT_LOG_FILE, parseGlobalOptions } from './global-options.js';

describe('parseGlobalOptions', () => {
  it('should fall back to defaults', () => {
    expect(parseGlobalOptions(['status'], {})).toEqual({
      global: { host: DEFAULT_HOST, timeoutMs: undefined, verbose: false, logFile: DEFAULT_LOG_FILE },
      rest: ['status'],
    });
  });

  it('should read the environment', () => {
    const { global } = parseGlobalOptions([], {
      RADVCTL_HOST: '10.0.0.1:9000',
      RADVCTL_TIMEOUT_MS: '1500',
      RADVCTL_LOG_FILE: '/tmp/radvctl-test.log',
    });

    expect(global).toEqual({
      host: '10.0.0.1:9000',
      timeoutMs: 1500,
      verbose: false,
      logFile: '/tmp/radvctl-test.log',
    });
  });

  it('should let flags override the environment, wherever they appear', () => {
    const parsed = parseGlobalOptions(
      ['reload', '--host', '[::1]:8888', '-f', 'radv.yaml', '--timeout=250', '-v'],
      { RADVCTL_HOST: '10.0.0.1:9000', RADVCTL_TIMEOUT_MS: '1500' },
    );

    expect(parsed.global.host).toBe('[::1]:8888');
    expect(parsed.global.timeoutMs).toBe(250);
    expect(parsed.global.verbose).toBe(true);
    expect(parsed.rest).toEqual(['reload', '-f', 'radv.yaml']);
  });

  it('should accept the short host flag and the = form', () => {
    expect(parseGlobalOptions(['-H', 'a:1'], {}).global.host).toBe('a:1');
    expect(parseGlobalOptions(['--host=b:2'], {}).global.host).toBe('b:2');
  });

  it('should reject invalid timeouts', () => {
    expect(() => parseGlobalOptions(['--timeout', '0'], {})).toThrow(
      'Invalid --timeout: "0" (expected a positive number of milliseconds, at most 4294967295)',
    );
    expect(() => parseGlobalOptions(['--timeout', '5000000000'], {})).toThrow(
      'Invalid --timeout: "5000000000" (expected a positive number of milliseconds, at most 4294967295)',
    );
    expect(parseGlobalOptions(['--timeout', '4294967295'], {}).global.timeoutMs).toBe(4294967295);
    expect(() => parseGlobalOptions([], { RADVCTL_TIMEOUT_MS: 'soon' })).toThrow('Invalid RADVCTL_TIMEOUT_MS');
  });

  it('should require a value after --host', () => {
    expect(() => parseGlobalOptions(['--host'], {})).toThrow('Option --host requires a value');
    expect(() => parseGlobalOptions(['--host', '-v'], {})).toThrow('Option --host requires a value');
  });
});
