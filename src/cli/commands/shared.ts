import { InvalidArgumentError as CommanderArgumentError } from 'commander';
import { ConfigLoader } from '../../config/ConfigLoader.js';
import type { ExperimentConfig } from '../../config/types.js';

export interface ExperimentOptions {
  config: string;
  episodes?: number;
  seed?: string;
}

/**
 * Commander argument parser for non-negative integers
 */
export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new CommanderArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

/**
 * Load the experiment file, then apply command-line overrides
 */
export function loadExperimentConfig(options: ExperimentOptions): ExperimentConfig {
  const config = new ConfigLoader().load(options.config);
  return {
    ...config,
    seed: options.seed ?? config.seed,
    training: {
      ...config.training,
      episodes: options.episodes ?? config.training.episodes
    }
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
