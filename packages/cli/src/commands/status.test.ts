import { afterEach, describe, expect, it, vi } from 'vitest';
import { ControlClient } from '@radvctl/core';
import { formatStatus, parseStatusOptions, runStatus } from './status.js';

describe('status command', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('parseStatusOptions', () => {
    it('should parse --json', () => {
      expect(parseStatusOptions(['--json'])).toEqual({ json: true, help: false });
    });

    it('should reject unknown options', () => {
      expect(() => parseStatusOptions(['--yaml'])).toThrow('Unknown option: --yaml');
    });
  });

  describe('formatStatus', () => {
    it('should align interfaces in a table', () => {
      const lines = formatStatus(
        {
          interfaces: [
            { name: 'eth0', state: 'Running' },
            { name: 'wlan10', state: 'Init', message: 'waiting for link' },
          ],
        },
        'localhost:8888',
      );

      expect(lines).toEqual([
        '📡 RA Daemon Status (localhost:8888)',
        '─'.repeat(40),
        '  eth0    Running',
        '  wlan10  Init     waiting for link',
        '─'.repeat(40),
        'Interfaces: 2',
      ]);
    });

    it('should say when nothing is configured', () => {
      expect(formatStatus({ interfaces: [] }, 'h:1')).toEqual([
        '📡 RA Daemon Status (h:1)',
        '─'.repeat(40),
        'No interfaces configured',
      ]);
    });
  });

  describe('runStatus', () => {
    it('should print the raw status as JSON', async () => {
      const body = '{"interfaces":[{"name":"eth0","state":"Running"}]}';
      const fetchStub = vi.fn(async () => new Response(body, { status: 200 }));
      const client = new ControlClient('localhost:8888', { fetch: fetchStub });
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      await runStatus({ json: true, help: false }, client);

      expect(log).toHaveBeenCalledTimes(1);
      expect(log).toHaveBeenCalledWith(
        JSON.stringify({ interfaces: [{ name: 'eth0', state: 'Running' }] }, null, 2),
      );
    });

    it('should propagate client errors', async () => {
      const fetchStub = vi.fn(async () => new Response(null, { status: 500 }));
      const client = new ControlClient('localhost:8888', { fetch: fetchStub });

      await expect(runStatus({ json: false, help: false }, client)).rejects.toThrow('500 Internal Server Error');
    });
  });
});
