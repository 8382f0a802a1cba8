/**
 * Experiment Configuration Types
 *
 * Shape of an experiment file. Structural checks live here; range checks
 * are left to the components, which validate their own parameters.
 */

import { z } from 'zod';

const CellSchema = z.tuple([z.number().int(), z.number().int()]);

const GridWorldEnvironmentSchema = z.object({
  type: z.literal('gridworld'),
  width: z.number().int(),
  height: z.number().int(),
  start: CellSchema,
  goal: CellSchema
});

const TMazeEnvironmentSchema = z.object({
  type: z.literal('tmaze'),
  hallwayLength: z.number().int(),
  goalX: z.union([z.literal(-1), z.literal(1)]).optional(),
  signalPosition: z.number().int().optional()
});

const MemorySchema = z.object({
  numMemorySlots: z.number().int().default(1),
  gateReward: z.number().default(-0.05),
  label: z.string().optional()
});

const AgentSchema = z.object({
  learningRate: z.number().default(0.1),
  discountRate: z.number().default(0.9),
  explorationRate: z.number().default(0.05),
  variableContentPrefixes: z.array(z.string()).optional(),
  debug: z.boolean().default(false)
});

const TrainingSchema = z.object({
  episodes: z.number().int().default(1000),
  evalInterval: z.number().int().default(100),
  evalEpisodes: z.number().int().default(10),
  maxSteps: z.number().int().default(1000),
  minReturn: z.number().optional()
});

export const ExperimentConfigSchema = z.object({
  /** Root seed; every stochastic component derives its own seed from it */
  seed: z.union([z.number().int(), z.string()]).default(8675309),
  environment: z.discriminatedUnion('type', [GridWorldEnvironmentSchema, TMazeEnvironmentSchema]),
  /** Wrap the environment in gating memory when present */
  memory: MemorySchema.optional(),
  agent: AgentSchema.default({}),
  training: TrainingSchema.default({})
});

export type ExperimentConfig = z.output<typeof ExperimentConfigSchema>;
export type EnvironmentConfig = ExperimentConfig['environment'];

/**
 * Environment variables that override experiment file values
 */
export const ENV_OVERRIDES = {
  seed: 'GATING_RL_SEED',
  episodes: 'GATING_RL_EPISODES',
  maxSteps: 'GATING_RL_MAX_STEPS'
} as const;
