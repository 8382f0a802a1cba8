/**
 * Epsilon-Greedy exploration wrapper.
 *
 * With probability `explorationRate` act() picks a uniformly random action,
 * otherwise the wrapped agent's best stored action. Either way the choice is
 * recorded on the wrapped agent so its next update credits the right action.
 * Every other call is forwarded unchanged.
 */

import { z } from 'zod';
import type { Action } from '../core/Action.js';
import { InvalidArgumentError } from '../core/errors.js';
import { SeededRandom } from '../core/random.js';
import type { State } from '../core/State.js';
import { parseOrThrow } from '../core/validation.js';
import { DEFAULT_EPSILON_GREEDY_CONFIG, type Agent, type EpsilonGreedyConfig } from './types.js';

const EpsilonGreedyConfigSchema = z.object({
  explorationRate: z.number().min(0).max(1),
  randomSeed: z.union([z.number(), z.string()])
});

export class EpsilonGreedy<A extends Agent = Agent> implements Agent {
  readonly agent: A;
  private readonly config: EpsilonGreedyConfig;
  private readonly rng: SeededRandom;

  constructor(agent: A, config?: Partial<EpsilonGreedyConfig>) {
    this.agent = agent;
    this.config = parseOrThrow(
      EpsilonGreedyConfigSchema,
      { ...DEFAULT_EPSILON_GREEDY_CONFIG, ...config },
      'epsilon-greedy configuration'
    );
    this.rng = new SeededRandom(this.config.randomSeed);
  }

  get explorationRate(): number {
    return this.config.explorationRate;
  }

  act(observation: State, actions: Action[]): Action {
    if (actions.length === 0) {
      throw new InvalidArgumentError('EpsilonGreedy: no actions to choose from');
    }

    const action = this.rng.next() < this.config.explorationRate
      ? this.rng.choice(actions)
      : this.agent.getBestStoredAction(observation, actions);
    this.agent.recordAction(observation, action);
    return action;
  }

  getValue(observation: State, action: Action): number {
    return this.agent.getValue(observation, action);
  }

  getBestStoredAction(observation: State, actions: Action[]): Action {
    return this.agent.getBestStoredAction(observation, actions);
  }

  recordAction(observation: State, action: Action): void {
    this.agent.recordAction(observation, action);
  }

  observeReward(observation: State, reward: number, actions: Action[]): void {
    this.agent.observeReward(observation, reward, actions);
  }

  startNewEpisode(): void {
    this.agent.startNewEpisode();
  }
}
