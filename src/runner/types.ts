/**
 * Episode Runner Types
 */

import type { Action } from '../core/Action.js';
import type { State } from '../core/State.js';

export interface EpisodeOptions {
  /** Abandon the episode after this many steps (default: 1000) */
  maxSteps: number;
  /** Abandon the episode once the return drops below this (default: none) */
  minReturn?: number;
  /** Update the agent while acting; false acts greedily without learning (default: true) */
  learn: boolean;
}

export const DEFAULT_EPISODE_OPTIONS: EpisodeOptions = {
  maxSteps: 1000,
  learn: true
};

export interface EpisodeResult {
  steps: number;
  totalReward: number;
  /** Whether the environment reached its natural end (vs. abandoned) */
  terminated: boolean;
}

export interface TrainingOptions {
  /** Training episodes in total (default: 1000) */
  episodes: number;
  /** Evaluate after every this many training episodes (default: 100) */
  evalInterval: number;
  /** Greedy episodes per evaluation (default: 10) */
  evalEpisodes: number;
  maxSteps: number;
  minReturn?: number;
  /** Log every evaluation to the console (default: false) */
  verbose?: boolean;
  /** Called after every evaluation */
  onEvaluation?: (record: EvaluationRecord) => void;
}

export const DEFAULT_TRAINING_OPTIONS: TrainingOptions = {
  episodes: 1000,
  evalInterval: 100,
  evalEpisodes: 10,
  maxSteps: 1000
};

export interface EvaluationRecord {
  /** Training episodes completed before this evaluation */
  episode: number;
  meanReturn: number;
  meanSteps: number;
  /** Fraction of evaluation episodes that reached their natural end */
  completionRate: number;
}

export interface TraceStep {
  observation: State;
  /** Value of every available action, in Action order */
  values: Array<{ action: Action; value: number }>;
  chosen: Action;
  reward: number;
}

export interface PolicyTrace {
  steps: TraceStep[];
  /** The rollout revisited an observation and was stopped */
  looped: boolean;
  terminated: boolean;
}
