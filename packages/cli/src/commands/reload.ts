/**
 * Reload command - Push a configuration file to the running daemon
 *
 * Usage:
 *   radvctl reload -f <config.yaml> [--env] [--check]
 *
 * Options:
 *   -f, --file <path>   Config file (YAML or JSON). May also be given positionally.
 *   --env               Substitute ${VAR} references from the environment
 *   --check             Run the pre-flight checks and refuse to send on issues
 *   -h, --help          Show help
 */

import * as path from 'path';
import { ConfigLoader, checkConfig, type ControlClient } from '@radvctl/core';
import { printIssues } from './validate.js';

export interface ReloadOptions {
  file: string;
  substituteEnv: boolean;
  check: boolean;
  timeoutMs?: number;
  help: boolean;
}

export function parseReloadOptions(args: string[]): ReloadOptions {
  let file: string | undefined;
  let substituteEnv = false;
  let check = false;
  let help = false;

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    switch (arg) {
      case '-f':
      case '--file': {
        const value = args[i + 1];
        if (value === undefined) {
          throw new Error(`Option ${arg} requires a path`);
        }
        file = path.resolve(value);
        i += 1;
        break;
      }
      case '--env':
        substituteEnv = true;
        break;
      case '--check':
        check = true;
        break;
      case '-h':
      case '--help':
        help = true;
        break;
      default:
        if (arg.startsWith('--file=')) {
          file = path.resolve(arg.slice('--file='.length));
        } else if (!file && !arg.startsWith('-')) {
          file = path.resolve(arg);
        } else {
          throw new Error(`Unknown option: ${arg}`);
        }
    }
  }

  if (!file && !help) {
    throw new Error('Config file is required. Usage: radvctl reload -f <config.yaml>');
  }

  return {
    file: file ?? '',
    substituteEnv,
    check,
    help,
  };
}

export async function runReload(options: ReloadOptions, client: ControlClient): Promise<void> {
  const config = options.substituteEnv
    ? await ConfigLoader.loadWithEnv(options.file)
    : await ConfigLoader.load(options.file);

  if (options.check) {
    const issues = checkConfig(config);
    if (issues.length > 0) {
      printIssues(options.file, issues);
      console.error('❌ Not sent: fix the issues above or drop --check');
      process.exitCode = 1;
      return;
    }
  }

  console.log(`⏳ Reloading ${client.host} with ${options.file}...`);
  await client.reload(config, { timeoutMs: options.timeoutMs });
  console.log(`✓ Reloaded ${config.interfaces.length} interface(s)`);
}

export function printReloadHelp(): void {
  console.log(`
radvctl reload - Apply a new configuration

Sends the whole configuration to the daemon, which applies it atomically
or rejects it. Nothing is retried.

Usage:
  radvctl reload -f <config.yaml> [options]

Options:
  -f, --file <path>   Config file (YAML or JSON)
  --env               Substitute \${VAR} references from the environment
  --check             Run pre-flight checks first and refuse to send on issues
  -h, --help          Show this message

Example config:
  interfaces:
    - name: eth0
      ra_interval_ms: 1000
`);
}
