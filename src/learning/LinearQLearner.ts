/**
 * Linear Q-Learner
 *
 * Online Q-learning with a linear value function over sparse binary
 * features. Q(s, a) is the sum of the weights of the (action, feature) pairs
 * formed by pairing every feature of `s` with `a`; unseen weights are 0.
 *
 * Update (one-step TD, indicator features):
 *   target = reward + discountRate * max_a' Q(s', a')    (0 if s' is terminal)
 *   w_k   += learningRate * (target - Q(s, a))          for every key k of (s, a)
 *
 * Usage:
 *   const agent = new LinearQLearner({ learningRate: 0.1, discountRate: 0.9 });
 *   const action = agent.act(observation, env.getActions());
 *   const reward = env.react(action);
 *   agent.observeReward(env.getObservation(), reward, env.getActions());
 */

import { z } from 'zod';
import { Action } from '../core/Action.js';
import { InvalidArgumentError, InvalidStateError } from '../core/errors.js';
import type { State } from '../core/State.js';
import { parseOrThrow } from '../core/validation.js';
import { actionFeatureKey, defaultFeatureExtractor } from './features.js';
import type { Agent, LearnerStats, LinearQLearnerConfig, WeightRecord } from './types.js';

const DEFAULT_CONFIG: LinearQLearnerConfig = {
  learningRate: 0.1,
  discountRate: 0.9,
  featureExtractor: defaultFeatureExtractor,
  debug: false
};

const LearnerParamsSchema = z.object({
  learningRate: z.number().gt(0).max(1),
  discountRate: z.number().min(0).max(1),
  debug: z.boolean()
});

const WeightRecordSchema = z.record(z.number().finite());

interface PendingAction {
  observation: State;
  action: Action;
  keys: string[];
}

export class LinearQLearner implements Agent {
  private config: LinearQLearnerConfig;
  private weights: Map<string, number> = new Map();
  private pending: PendingAction | null = null;
  private updates = 0;
  private absTdErrorSum = 0;

  constructor(config?: Partial<LinearQLearnerConfig>) {
    const merged = { ...DEFAULT_CONFIG, ...config };
    const params = parseOrThrow(LearnerParamsSchema, merged, 'LinearQLearner configuration');
    this.config = { ...params, featureExtractor: merged.featureExtractor };
  }

  /**
   * Get current configuration
   */
  getConfig(): LinearQLearnerConfig {
    return { ...this.config };
  }

  act(observation: State, actions: Action[]): Action {
    const action = this.getBestStoredAction(observation, actions);
    this.recordAction(observation, action);
    return action;
  }

  getValue(observation: State, action: Action): number {
    return this.sumWeights(this.featureKeys(observation, action));
  }

  getBestStoredAction(observation: State, actions: Action[]): Action {
    if (actions.length === 0) {
      throw new InvalidArgumentError('LinearQLearner: no actions to choose from');
    }

    let best = actions[0];
    let bestValue = this.getValue(observation, best);
    for (const action of actions.slice(1)) {
      const value = this.getValue(observation, action);
      if (value > bestValue || (value === bestValue && Action.compare(action, best) < 0)) {
        best = action;
        bestValue = value;
      }
    }
    return best;
  }

  recordAction(observation: State, action: Action): void {
    if (observation.isTerminal) {
      throw new InvalidStateError('LinearQLearner: cannot act in the terminal state');
    }
    this.pending = { observation, action, keys: this.featureKeys(observation, action) };
  }

  observeReward(observation: State, reward: number, actions: Action[]): void {
    const pending = this.pending;
    if (!pending) {
      throw new InvalidStateError('LinearQLearner: observeReward() called with no recorded action');
    }
    this.pending = null;

    const nextValue = actions.length === 0
      ? 0
      : Math.max(...actions.map(action => this.getValue(observation, action)));
    const target = reward + this.config.discountRate * nextValue;
    const previous = this.sumWeights(pending.keys);
    const tdError = target - previous;

    for (const key of pending.keys) {
      this.weights.set(key, (this.weights.get(key) ?? 0) + this.config.learningRate * tdError);
    }

    this.updates++;
    this.absTdErrorSum += Math.abs(tdError);

    if (this.config.debug) {
      console.log(
        `[LinearQLearner] ${pending.action.key()} in ${pending.observation.toString()}: ` +
        `reward=${reward} target=${target.toFixed(4)} td=${tdError.toFixed(4)}`
      );
    }
  }

  startNewEpisode(): void {
    this.pending = null;
  }

  /**
   * Weight of one (action, feature) key; 0 if never updated
   */
  getWeight(key: string): number {
    return this.weights.get(key) ?? 0;
  }

  /**
   * Snapshot of every weight, keyed by canonical (action, feature) key
   */
  exportWeights(): WeightRecord {
    const keys = [...this.weights.keys()].sort();
    const record: WeightRecord = {};
    for (const key of keys) {
      record[key] = this.getWeight(key);
    }
    return record;
  }

  /**
   * Replace all weights with a snapshot produced by exportWeights()
   */
  importWeights(record: WeightRecord): void {
    const parsed = parseOrThrow(WeightRecordSchema, record, 'weight record');
    this.weights = new Map(Object.entries(parsed));
  }

  getStats(): LearnerStats {
    return {
      weightCount: this.weights.size,
      updates: this.updates,
      meanAbsTdError: this.updates > 0 ? this.absTdErrorSum / this.updates : 0
    };
  }

  private featureKeys(observation: State, action: Action): string[] {
    return [...this.config.featureExtractor(observation).keys()].map(
      feature => actionFeatureKey(action, feature)
    );
  }

  private sumWeights(keys: string[]): number {
    let total = 0;
    for (const key of keys) {
      total += this.weights.get(key) ?? 0;
    }
    return total;
  }
}
