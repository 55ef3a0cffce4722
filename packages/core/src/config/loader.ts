/**
 * Configuration Loader
 *
 * Loads and shape-checks daemon configuration from YAML (or JSON) files.
 * Semantic rules the daemon enforces are left to checkConfig().
 */

import { promises as fs } from 'fs';
import YAML from 'yaml';
import { ZodError } from 'zod';
import { ConfigSchema, summarizeIssues } from '../schema/codec.js';
import type { Config } from '../schema/types.js';

export class ConfigLoadError extends Error {
  readonly file: string | undefined;

  constructor(message: string, file?: string, options?: { cause?: unknown }) {
    super(file ? `${file}: ${message}` : message, options);
    this.name = 'ConfigLoadError';
    this.file = file;
  }
}

export class ConfigLoader {
  /**
   * Load and validate a configuration file
   */
  static async load(filePath: string): Promise<Config> {
    const content = await ConfigLoader.read(filePath);
    return ConfigLoader.parse(content, filePath);
  }

  /**
   * Load configuration with environment variable substitution.
   * `${NAME}` is replaced by process.env.NAME, or by an empty string.
   */
  static async loadWithEnv(filePath: string, env: NodeJS.ProcessEnv = process.env): Promise<Config> {
    let content = await ConfigLoader.read(filePath);

    content = content.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      return env[varName.trim()] || '';
    });

    return ConfigLoader.parse(content, filePath);
  }

  /**
   * Validate a configuration object
   */
  static validate(config: unknown, file?: string): Config {
    try {
      return ConfigSchema.parse(config);
    } catch (error) {
      if (error instanceof ZodError) {
        throw new ConfigLoadError(`invalid config: ${summarizeIssues(error)}`, file, { cause: error });
      }
      throw error;
    }
  }

  static parse(content: string, file?: string): Config {
    let parsed: unknown;
    try {
      parsed = YAML.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigLoadError(`cannot parse config: ${reason}`, file, { cause: error });
    }
    return ConfigLoader.validate(parsed, file);
  }

  private static async read(filePath: string): Promise<string> {
    try {
      return await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigLoadError(`cannot read config: ${reason}`, filePath, { cause: error });
    }
  }
}
