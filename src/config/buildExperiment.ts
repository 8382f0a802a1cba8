import { SimpleTMaze } from '../environments/SimpleTMaze.js';
import { GridWorld } from '../environments/GridWorld.js';
import type { Environment } from '../environments/types.js';
import { EpsilonGreedy } from '../learning/EpsilonGreedy.js';
import { createFeatureExtractor } from '../learning/features.js';
import { LinearQLearner } from '../learning/LinearQLearner.js';
import { GatingMemory } from '../memory/GatingMemory.js';
import type { EnvironmentConfig, ExperimentConfig } from './types.js';

export interface Experiment {
  environment: Environment;
  learner: LinearQLearner;
  agent: EpsilonGreedy<LinearQLearner>;
}

/**
 * Build the environment and agent described by a validated configuration.
 * Each stochastic component gets its own seed derived from `config.seed`.
 */
export function buildExperiment(config: ExperimentConfig): Experiment {
  const base = buildEnvironment(config.environment, `${config.seed}:environment`);
  const environment = config.memory ? new GatingMemory(base, config.memory) : base;

  const learner = new LinearQLearner({
    learningRate: config.agent.learningRate,
    discountRate: config.agent.discountRate,
    featureExtractor: createFeatureExtractor(
      config.agent.variableContentPrefixes
        ? { variableContentPrefixes: config.agent.variableContentPrefixes }
        : undefined
    ),
    debug: config.agent.debug
  });
  const agent = new EpsilonGreedy(learner, {
    explorationRate: config.agent.explorationRate,
    randomSeed: `${config.seed}:agent`
  });

  return { environment, learner, agent };
}

function buildEnvironment(config: EnvironmentConfig, randomSeed: string): Environment {
  switch (config.type) {
    case 'gridworld':
      return new GridWorld({
        width: config.width,
        height: config.height,
        start: config.start,
        goal: config.goal
      });
    case 'tmaze':
      return new SimpleTMaze({
        hallwayLength: config.hallwayLength,
        goalX: config.goalX,
        signalPosition: config.signalPosition,
        randomSeed
      });
  }
}
