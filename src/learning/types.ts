/**
 * Learning Types
 *
 * Agent contract and configuration for the linear Q-learning agent and its
 * exploration wrapper.
 */

import type { Action } from '../core/Action.js';
import type { RandomSeed } from '../core/random.js';
import type { State } from '../core/State.js';
import type { FeatureExtractor } from './features.js';

// ==========================================
// AGENT CONTRACT
// ==========================================

export interface Agent {
  /** Pick an action from `actions` and remember it for the next update */
  act(observation: State, actions: Action[]): Action;

  /** Current value estimate of taking `action` in `observation` */
  getValue(observation: State, action: Action): number;

  /** Highest-valued action; ties go to the first in Action order */
  getBestStoredAction(observation: State, actions: Action[]): Action;

  /** Remember `action` as taken in `observation` (used by wrappers that choose for the agent) */
  recordAction(observation: State, action: Action): void;

  /**
   * Learn from the reward for the last recorded action.
   * `observation` and `actions` describe where that action led;
   * `actions` is empty when the episode ended.
   */
  observeReward(observation: State, reward: number, actions: Action[]): void;

  /** Forget the pending action of an abandoned episode */
  startNewEpisode(): void;
}

// ==========================================
// CONFIGURATION
// ==========================================

export interface LinearQLearnerConfig {
  /** Step size in (0, 1] (default: 0.1) */
  learningRate: number;
  /** Discount in [0, 1] (default: 0.9) */
  discountRate: number;
  /** Observation -> feature keys (default: defaultFeatureExtractor) */
  featureExtractor: FeatureExtractor;
  /** Log every weight update (default: false) */
  debug: boolean;
}

export interface EpsilonGreedyConfig {
  /** Probability of a uniformly random action, in [0, 1] (default: 0.05) */
  explorationRate: number;
  /** Seed of the exploration random source (default: 0) */
  randomSeed: RandomSeed;
}

export const DEFAULT_EPSILON_GREEDY_CONFIG: EpsilonGreedyConfig = {
  explorationRate: 0.05,
  randomSeed: 0
};

// ==========================================
// STATISTICS
// ==========================================

export interface LearnerStats {
  /** Number of weights that have been touched */
  weightCount: number;
  /** Number of observeReward() updates applied */
  updates: number;
  /** Mean absolute temporal-difference error over all updates */
  meanAbsTdError: number;
}

/** Serialized weights: canonical key -> weight */
export type WeightRecord = Record<string, number>;
