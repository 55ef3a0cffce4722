/**
 * Validate command - Check a configuration file without contacting the daemon
 */

import * as path from 'path';
import { ConfigLoader, checkConfig, type ConfigIssue } from '@radvctl/core';

export interface ValidateOptions {
  file: string;
  substituteEnv: boolean;
  help: boolean;
}

export function parseValidateOptions(args: string[]): ValidateOptions {
  let file: string | undefined;
  let substituteEnv = false;
  let help = false;

  for (const arg of args) {
    if (arg === '--env') {
      substituteEnv = true;
    } else if (arg === '-h' || arg === '--help') {
      help = true;
    } else if (!file && !arg.startsWith('-')) {
      file = path.resolve(arg);
    } else {
      throw new Error(`Unknown option: ${arg}`);
    }
  }

  if (!file && !help) {
    throw new Error('Config file is required. Usage: radvctl validate <config.yaml>');
  }

  return { file: file ?? '', substituteEnv, help };
}

export function formatIssue(issue: ConfigIssue): string {
  return `interfaces[${issue.index}].${issue.field}: ${issue.message}`;
}

export function printIssues(file: string, issues: ConfigIssue[]): void {
  console.error(`✗ ${file}: ${issues.length} issue(s)`);
  for (const issue of issues) {
    console.error(`  • ${formatIssue(issue)}`);
  }
}

export async function runValidate(options: ValidateOptions): Promise<void> {
  const config = options.substituteEnv
    ? await ConfigLoader.loadWithEnv(options.file)
    : await ConfigLoader.load(options.file);

  const issues = checkConfig(config);
  if (issues.length > 0) {
    printIssues(options.file, issues);
    process.exitCode = 1;
    return;
  }

  console.log(`✓ ${options.file}: ${config.interfaces.length} interface(s), no issues`);
}

export function printValidateHelp(): void {
  console.log(`
radvctl validate - Check a configuration file offline

Runs the same rules the daemon applies on reload: non-empty, unique
interface names and positive integer ra_interval_ms.

Usage:
  radvctl validate <config.yaml> [--env]
`);
}
