// src/config/validator-config-loader.ts

import * as fs from 'fs/promises';
import * as path from 'path';
import * as YAML from 'yaml';
import { ConfigurationError, isErrnoException } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { DEFAULT_VALIDATOR_CONFIG, validatorConfigSchema, type ValidatorConfig } from './validator-config.js';

// Cache to avoid repeated disk IO per process
const configCache = new Map<string, ValidatorConfig>();

export const DEFAULT_CONFIG_PATH = path.join('.graph-validator', 'config.yml');

/**
 * Loads validator configuration (log level, groups, sequences) from YAML.
 */
export class ValidatorConfigLoader {
  constructor(private repoPath: string) {}

  /**
   * Loads `configPath` (relative to the repository root), or
   * .graph-validator/config.yml when none is given. A missing default file
   * yields the defaults; a missing explicit file is an error.
   */
  async load(configPath?: string): Promise<ValidatorConfig> {
    const resolvedPath = this.resolvePath(configPath ?? DEFAULT_CONFIG_PATH);

    const cached = configCache.get(resolvedPath);
    if (cached) {
      return cached;
    }

    let content: string;
    try {
      content = await fs.readFile(resolvedPath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT' && configPath === undefined) {
        Logger.debug('No config.yml found, using defaults');
        return DEFAULT_VALIDATOR_CONFIG;
      }
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new ConfigurationError(`Config file not found: ${resolvedPath}`);
      }
      throw error;
    }

    const config = this.parse(content, resolvedPath);
    configCache.set(resolvedPath, config);
    return config;
  }

  private parse(content: string, sourcePath: string): ValidatorConfig {
    let raw: unknown;
    try {
      raw = YAML.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Failed to parse ${sourcePath}: ${reason}`);
    }

    // An empty file parses to null
    const result = validatorConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
      const issues = result.error.issues.map(issue => {
        const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `  - ${location}: ${issue.message}`;
      });
      throw new ConfigurationError(`Invalid configuration in ${sourcePath}:\n${issues.join('\n')}`);
    }

    return result.data;
  }

  /**
   * Resolves a path relative to the repository root
   */
  private resolvePath(configPath: string): string {
    if (path.isAbsolute(configPath)) {
      return configPath;
    }
    return path.resolve(this.repoPath, configPath);
  }

  /**
   * Clears the configuration cache (useful for testing)
   */
  static clearCache(): void {
    configCache.clear();
  }
}
