/**
 * Configuration Loader
 *
 * Loads JSON experiment files, applies environment-variable overrides and
 * validates the result against ExperimentConfigSchema.
 */

import { existsSync, readFileSync } from 'fs';
import { InvalidArgumentError } from '../core/errors.js';
import { parseOrThrow } from '../core/validation.js';
import { ENV_OVERRIDES, ExperimentConfigSchema, type ExperimentConfig } from './types.js';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  private env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  /**
   * Load and validate an experiment file
   */
  load(path: string): ExperimentConfig {
    if (!existsSync(path)) {
      throw new InvalidArgumentError(`Configuration file not found: ${path}`);
    }

    const content = readFileSync(path, 'utf-8');
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new InvalidArgumentError(
        `Configuration file is not valid JSON: ${path}`,
        [error instanceof Error ? error.message : String(error)]
      );
    }

    return this.parse(raw);
  }

  /**
   * Validate an already-parsed configuration object
   */
  parse(raw: unknown): ExperimentConfig {
    const withOverrides = isRecord(raw) ? this.applyEnvOverrides(raw) : raw;
    return parseOrThrow(ExperimentConfigSchema, withOverrides, 'experiment configuration');
  }

  private applyEnvOverrides(raw: RawConfig): RawConfig {
    const result: RawConfig = { ...raw };

    const seed = this.readEnv(ENV_OVERRIDES.seed);
    if (seed !== undefined) {
      result.seed = /^-?\d+$/.test(seed) ? Number(seed) : seed;
    }

    const training: RawConfig = isRecord(raw.training) ? { ...raw.training } : {};
    const episodes = this.readEnv(ENV_OVERRIDES.episodes);
    if (episodes !== undefined) {
      training.episodes = Number(episodes);
    }
    const maxSteps = this.readEnv(ENV_OVERRIDES.maxSteps);
    if (maxSteps !== undefined) {
      training.maxSteps = Number(maxSteps);
    }
    if (episodes !== undefined || maxSteps !== undefined) {
      result.training = training;
    }

    return result;
  }

  private readEnv(name: string): string | undefined {
    const value = this.env[name]?.trim();
    if (!value) return undefined;
    console.log(`[ConfigLoader] ${name}=${value} overrides the experiment file`);
    return value;
  }
}
