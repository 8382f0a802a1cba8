/**
 * gating-rl
 *
 * Composable reinforcement learning: environments as state machines, a
 * gating-memory wrapper for any environment, and a linear Q-learning agent
 * with epsilon-greedy exploration.
 */

// Core
export { State, type AttributeValue } from './core/State.js';
export { Action, sortActions, type ActionParameter } from './core/Action.js';
export { InvalidStateError, InvalidArgumentError, ExternalLookupError } from './core/errors.js';
export { SeededRandom, type RandomSeed } from './core/random.js';

// Environments
export { BaseEnvironment } from './environments/BaseEnvironment.js';
export { GridWorld } from './environments/GridWorld.js';
export { SimpleTMaze } from './environments/SimpleTMaze.js';
export type {
  Environment,
  Cell,
  GridWorldParams,
  GoalSide,
  SimpleTMazeParams
} from './environments/types.js';

// Memory
export { GatingMemory } from './memory/GatingMemory.js';
export {
  DEFAULT_GATING_MEMORY_CONFIG,
  GATE_ACTION_NAME,
  MEMORY_ATTRIBUTE_PREFIX,
  isMemoryAttribute,
  type GatingMemoryConfig
} from './memory/types.js';
export type { KnowledgeStore, KnowledgeQuery, KnowledgeBinding } from './memory/knowledge.js';

// Learning
export { LinearQLearner } from './learning/LinearQLearner.js';
export { EpsilonGreedy } from './learning/EpsilonGreedy.js';
export {
  BIAS_FEATURE,
  actionFeatureKey,
  createFeatureExtractor,
  defaultFeatureExtractor,
  encodeFeature,
  featureSet,
  type FeatureExtractor,
  type FeatureExtractorOptions,
  type FeatureKey,
  type FeatureSet
} from './learning/features.js';
export {
  DEFAULT_EPSILON_GREEDY_CONFIG,
  type Agent,
  type EpsilonGreedyConfig,
  type LearnerStats,
  type LinearQLearnerConfig,
  type WeightRecord
} from './learning/types.js';

// Runner
export { runEpisode, trainAndEvaluate, traceGreedyPolicy } from './runner/EpisodeRunner.js';
export type {
  EpisodeOptions,
  EpisodeResult,
  EvaluationRecord,
  PolicyTrace,
  TraceStep,
  TrainingOptions
} from './runner/types.js';

// Configuration
export { ConfigLoader } from './config/ConfigLoader.js';
export { buildExperiment, type Experiment } from './config/buildExperiment.js';
export { ExperimentConfigSchema, type ExperimentConfig } from './config/types.js';
