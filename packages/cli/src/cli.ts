/**
 * radvctl command dispatch.
 */

import { formatError, type ControlClient } from '@radvctl/core';
import { parseReloadOptions, printReloadHelp, runReload } from './commands/reload.js';
import { parseStatusOptions, printStatusHelp, runStatus } from './commands/status.js';
import { parseValidateOptions, printValidateHelp, runValidate } from './commands/validate.js';
import { createClient, parseGlobalOptions, type GlobalOptions } from './utils/global-options.js';
import { VERSION } from './version.js';

export type ClientFactory = (options: GlobalOptions) => ControlClient;

export function printRootHelp(): void {
  console.log(`radvctl v${VERSION}

Control a running router advertisement daemon.

Usage:
  radvctl reload -f <file>       Apply a new configuration
  radvctl status [--json]        Show per-interface state
  radvctl validate <file>        Check a configuration file offline
  radvctl help <command>         Show help for a command

Global options:
  -H, --host <host:port>   Daemon control address (default: localhost:8888, env RADVCTL_HOST)
  --timeout <ms>           Fail a request after this long (env RADVCTL_TIMEOUT_MS)
  -v, --verbose            Log requests to stderr
  -h, --help               Show this message
  --version                Show version

Logs are appended to ~/.radvctl/logs/radvctl.log (env RADVCTL_LOG_FILE).
`);
}

/**
 * Runs one radvctl invocation and sets process.exitCode on failure.
 */
export async function run(
  argv: string[],
  clientFactory: ClientFactory = (options) => createClient(options),
): Promise<void> {
  try {
    const { global, rest } = parseGlobalOptions(argv);
    const [command, ...args] = rest;

    switch (command) {
      case undefined:
      case '-h':
      case '--help':
        printRootHelp();
        return;

      case '--version':
        console.log(VERSION);
        return;

      case 'help':
        switch (args[0]) {
          case 'reload':
            printReloadHelp();
            break;
          case 'status':
            printStatusHelp();
            break;
          case 'validate':
            printValidateHelp();
            break;
          default:
            printRootHelp();
        }
        return;

      case 'reload': {
        const options = parseReloadOptions(args);
        if (options.help) {
          printReloadHelp();
          return;
        }
        await runReload({ ...options, timeoutMs: global.timeoutMs }, clientFactory(global));
        return;
      }

      case 'status': {
        const options = parseStatusOptions(args);
        if (options.help) {
          printStatusHelp();
          return;
        }
        await runStatus({ ...options, timeoutMs: global.timeoutMs }, clientFactory(global));
        return;
      }

      case 'validate': {
        const options = parseValidateOptions(args);
        if (options.help) {
          printValidateHelp();
          return;
        }
        await runValidate(options);
        return;
      }

      default:
        console.error(`Unknown command "${command}".`);
        printRootHelp();
        process.exitCode = 1;
        return;
    }
  } catch (error) {
    console.error(`❌ Error: ${formatError(error)}`);
    process.exitCode = 1;
  }
}
