/**
 * SimpleTMaze
 *
 * Walk up a corridor of `hallwayLength` cells, then turn left or right at the
 * junction. One corridor cell (the signal cell) shows the goal side in its
 * `symbol`; everywhere else `symbol` is 0. The goal side itself is hidden
 * from the observation, so an agent has to remember the signal to reach the
 * goal reliably.
 *
 * Rewards: -1 per corridor step, +10 for the correct side, -10 for the other.
 */

import { z } from 'zod';
import { Action } from '../core/Action.js';
import { InvalidArgumentError } from '../core/errors.js';
import { SeededRandom } from '../core/random.js';
import { State } from '../core/State.js';
import { parseOrThrow } from '../core/validation.js';
import { BaseEnvironment } from './BaseEnvironment.js';
import type { GoalSide, SimpleTMazeParams } from './types.js';

const STEP_REWARD = -1;
const GOAL_REWARD = 10;
const WRONG_SIDE_REWARD = -10;

const GOAL_SIDES: readonly GoalSide[] = [-1, 1];

const SimpleTMazeParamsSchema = z
  .object({
    hallwayLength: z.number().int().min(1),
    goalX: z.union([z.literal(-1), z.literal(1)]).optional(),
    signalPosition: z.number().int().min(0).optional(),
    randomSeed: z.union([z.number(), z.string()]).optional()
  })
  .superRefine((params, ctx) => {
    if (params.signalPosition !== undefined && params.signalPosition >= params.hallwayLength) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['signalPosition'],
        message: `must be less than hallwayLength (${params.hallwayLength})`
      });
    }
  });

export class SimpleTMaze extends BaseEnvironment {
  readonly hallwayLength: number;
  readonly signalPosition: number;
  readonly fixedGoalX: GoalSide | undefined;

  private readonly rng: SeededRandom;
  private x = 0;
  private y = 0;
  private goalX: GoalSide;

  constructor(params: SimpleTMazeParams) {
    super();
    const parsed = parseOrThrow(SimpleTMazeParamsSchema, params, 'SimpleTMaze parameters');
    this.hallwayLength = parsed.hallwayLength;
    this.signalPosition = parsed.signalPosition ?? parsed.hallwayLength - 1;
    this.fixedGoalX = parsed.goalX;
    this.rng = new SeededRandom(parsed.randomSeed ?? 0);
    this.goalX = this.pickGoalSide();
  }

  startNewEpisode(): void {
    this.x = 0;
    this.y = 0;
    this.goalX = this.pickGoalSide();
  }

  getState(): State {
    if (this.exited()) return State.TERMINAL;
    return State.of({ x: this.x, y: this.y, symbol: this.symbol(), goal_x: this.goalX });
  }

  getObservation(): State {
    if (this.exited()) return State.TERMINAL;
    return State.of({ x: this.x, y: this.y, symbol: this.symbol() });
  }

  getActions(): Action[] {
    if (this.exited()) return [];
    if (this.y < this.hallwayLength) return [new Action('up')];
    return [new Action('left'), new Action('right')];
  }

  react(action: Action): number {
    this.assertNotEnded(action);

    if (!this.getActions().some(available => available.equals(action))) {
      throw new InvalidArgumentError(
        `SimpleTMaze: ${action.key()} is not available at y=${this.y}`
      );
    }

    if (action.name === 'up') {
      this.y += 1;
      return STEP_REWARD;
    }

    this.x = action.name === 'left' ? -1 : 1;
    return this.x === this.goalX ? GOAL_REWARD : WRONG_SIDE_REWARD;
  }

  private symbol(): number {
    return this.y === this.signalPosition ? this.goalX : 0;
  }

  private exited(): boolean {
    return this.x !== 0;
  }

  private pickGoalSide(): GoalSide {
    return this.fixedGoalX ?? this.rng.choice(GOAL_SIDES);
  }
}
