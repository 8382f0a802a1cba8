/**
 * Episode Runner
 *
 * The driver loop: the only caller of Environment and Agent operations.
 *
 *   startNewEpisode -> (getObservation, getActions, act, react, observeReward)*
 *
 * until the environment ends or the episode is abandoned (step budget or
 * return floor).
 */

import { z } from 'zod';
import { sortActions } from '../core/Action.js';
import { parseOrThrow } from '../core/validation.js';
import type { Environment } from '../environments/types.js';
import type { Agent } from '../learning/types.js';
import {
  DEFAULT_EPISODE_OPTIONS,
  DEFAULT_TRAINING_OPTIONS,
  type EpisodeOptions,
  type EpisodeResult,
  type EvaluationRecord,
  type PolicyTrace,
  type TraceStep,
  type TrainingOptions
} from './types.js';

const EpisodeOptionsSchema = z.object({
  maxSteps: z.number().int().min(1),
  minReturn: z.number().optional(),
  learn: z.boolean()
});

const TrainingOptionsSchema = z.object({
  episodes: z.number().int().min(0),
  evalInterval: z.number().int().min(1),
  evalEpisodes: z.number().int().min(1),
  maxSteps: z.number().int().min(1),
  minReturn: z.number().optional()
});

/**
 * Run one episode from a fresh start
 */
export function runEpisode(
  env: Environment,
  agent: Agent,
  options?: Partial<EpisodeOptions>
): EpisodeResult {
  const { maxSteps, minReturn, learn } = parseOrThrow(
    EpisodeOptionsSchema,
    { ...DEFAULT_EPISODE_OPTIONS, ...options },
    'episode options'
  );

  env.startNewEpisode();
  agent.startNewEpisode();

  let steps = 0;
  let totalReward = 0;
  while (!env.endOfEpisode() && steps < maxSteps) {
    if (minReturn !== undefined && totalReward < minReturn) break;

    const observation = env.getObservation();
    const actions = env.getActions();
    const action = learn
      ? agent.act(observation, actions)
      : agent.getBestStoredAction(observation, actions);
    const reward = env.react(action);
    if (learn) {
      agent.observeReward(env.getObservation(), reward, env.getActions());
    }

    steps++;
    totalReward += reward;
  }

  return { steps, totalReward, terminated: env.endOfEpisode() };
}

/**
 * Train for `episodes` episodes, evaluating the greedy policy every
 * `evalInterval` episodes (and once before training starts)
 */
export function trainAndEvaluate(
  env: Environment,
  agent: Agent,
  options?: Partial<TrainingOptions>
): EvaluationRecord[] {
  const merged = { ...DEFAULT_TRAINING_OPTIONS, ...options };
  const { episodes, evalInterval, evalEpisodes, maxSteps, minReturn } = parseOrThrow(
    TrainingOptionsSchema,
    merged,
    'training options'
  );

  const records: EvaluationRecord[] = [];
  const evaluate = (episode: number): void => {
    const results: EpisodeResult[] = [];
    for (let i = 0; i < evalEpisodes; i++) {
      results.push(runEpisode(env, agent, { maxSteps, minReturn, learn: false }));
    }
    const record: EvaluationRecord = {
      episode,
      meanReturn: mean(results.map(r => r.totalReward)),
      meanSteps: mean(results.map(r => r.steps)),
      completionRate: results.filter(r => r.terminated).length / results.length
    };
    records.push(record);
    if (merged.verbose) {
      console.log(
        `[EpisodeRunner] after ${episode} episodes: mean return ${record.meanReturn.toFixed(2)}, ` +
        `mean steps ${record.meanSteps.toFixed(1)}, completed ${(record.completionRate * 100).toFixed(0)}%`
      );
    }
    merged.onEvaluation?.(record);
  };

  evaluate(0);
  for (let episode = 1; episode <= episodes; episode++) {
    runEpisode(env, agent, { maxSteps, minReturn, learn: true });
    if (episode % evalInterval === 0) {
      evaluate(episode);
    }
  }

  return records;
}

/**
 * Roll out the greedy policy without learning, recording the value of every
 * available action at each step. Stops at the end of the episode, after
 * `maxSteps`, or when an observation repeats (the policy is looping).
 */
export function traceGreedyPolicy(env: Environment, agent: Agent, maxSteps: number = 10): PolicyTrace {
  env.startNewEpisode();
  agent.startNewEpisode();

  const steps: TraceStep[] = [];
  const visited = new Set<string>();
  let looped = false;

  while (!env.endOfEpisode() && steps.length < maxSteps) {
    const observation = env.getObservation();
    if (visited.has(observation.key())) {
      looped = true;
      break;
    }
    visited.add(observation.key());

    const actions = env.getActions();
    const values = sortActions(actions).map(action => ({
      action,
      value: agent.getValue(observation, action)
    }));
    const chosen = agent.getBestStoredAction(observation, actions);
    const reward = env.react(chosen);
    steps.push({ observation, values, chosen, reward });
  }

  return { steps, looped, terminated: env.endOfEpisode() };
}

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}
