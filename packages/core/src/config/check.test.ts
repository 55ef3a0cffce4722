import { describe, it, expect } from 'vitest';
import { checkConfig } from './check.js';

describe('checkConfig', () => {
  it('should accept a valid config', () => {
    expect(
      checkConfig({
        interfaces: [
          { name: 'eth0', ra_interval_ms: 1000 },
          { name: 'eth1', ra_interval_ms: 200 },
        ],
      }),
    ).toEqual([]);
  });

  it('should accept an empty config', () => {
    expect(checkConfig({ interfaces: [] })).toEqual([]);
  });

  it('should report duplicate names against the first occurrence', () => {
    const issues = checkConfig({
      interfaces: [
        { name: 'eth0', ra_interval_ms: 1000 },
        { name: 'eth1', ra_interval_ms: 1000 },
        { name: 'eth0', ra_interval_ms: 1000 },
      ],
    });

    expect(issues).toEqual([
      { index: 2, field: 'name', message: 'duplicate interface name "eth0" (first at index 0)' },
    ]);
  });

  it('should report empty names and bad intervals', () => {
    const issues = checkConfig({
      interfaces: [
        { name: '', ra_interval_ms: 0 },
        { name: 'eth1', ra_interval_ms: 1.5 },
      ],
    });

    expect(issues).toEqual([
      { index: 0, field: 'name', message: 'interface name must not be empty' },
      { index: 0, field: 'ra_interval_ms', message: 'ra_interval_ms must be a positive integer, got 0' },
      { index: 1, field: 'ra_interval_ms', message: 'ra_interval_ms must be a positive integer, got 1.5' },
    ]);
  });
});
