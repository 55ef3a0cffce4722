/**
 * Status command - Show per-interface state of the running daemon
 */

import type { ControlClient, Status } from '@radvctl/core';

export interface StatusOptions {
  json: boolean;
  timeoutMs?: number;
  help: boolean;
}

export function parseStatusOptions(args: string[]): StatusOptions {
  let json = false;
  let help = false;

  for (const arg of args) {
    switch (arg) {
      case '--json':
        json = true;
        break;
      case '-h':
      case '--help':
        help = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return { json, help };
}

export function formatStatus(status: Status, host: string): string[] {
  const lines = [`📡 RA Daemon Status (${host})`, '─'.repeat(40)];

  if (status.interfaces.length === 0) {
    lines.push('No interfaces configured');
    return lines;
  }

  const nameWidth = Math.max(...status.interfaces.map((i) => i.name.length));
  const stateWidth = Math.max(...status.interfaces.map((i) => i.state.length));

  for (const iface of status.interfaces) {
    const row = `  ${iface.name.padEnd(nameWidth)}  ${iface.state.padEnd(stateWidth)}`;
    lines.push(iface.message ? `${row}  ${iface.message}` : row.trimEnd());
  }

  lines.push('─'.repeat(40));
  lines.push(`Interfaces: ${status.interfaces.length}`);
  return lines;
}

export async function runStatus(options: StatusOptions, client: ControlClient): Promise<void> {
  const status = await client.status({ timeoutMs: options.timeoutMs });

  if (options.json) {
    console.log(JSON.stringify(status, null, 2));
    return;
  }

  for (const line of formatStatus(status, client.host)) {
    console.log(line);
  }
}

export function printStatusHelp(): void {
  console.log(`
radvctl status - Show daemon status

Usage:
  radvctl status [--json]

Options:
  --json       Print the raw status as JSON
  -h, --help   Show this message
`);
}
