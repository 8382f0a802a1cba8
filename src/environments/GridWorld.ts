/**
 * GridWorld
 *
 * Navigate a height x width grid from `start` to `goal`. Every move costs -1;
 * the move that lands on the goal pays +1 and ends the episode.
 *
 * Moves that would leave the grid are not advertised by getActions(), but
 * react() still accepts them and clamps to the boundary (the position stays).
 */

import { z } from 'zod';
import { Action } from '../core/Action.js';
import { InvalidArgumentError } from '../core/errors.js';
import { State } from '../core/State.js';
import { parseOrThrow } from '../core/validation.js';
import { BaseEnvironment } from './BaseEnvironment.js';
import type { Cell, GridWorldParams } from './types.js';

const MOVES: ReadonlyArray<{ name: string; delta: Cell }> = [
  { name: 'up', delta: [-1, 0] },
  { name: 'down', delta: [1, 0] },
  { name: 'left', delta: [0, -1] },
  { name: 'right', delta: [0, 1] }
];

const STEP_REWARD = -1;
const GOAL_REWARD = 1;

const CellSchema = z.tuple([z.number().int(), z.number().int()]);

const GridWorldParamsSchema = z
  .object({
    width: z.number().int().min(1),
    height: z.number().int().min(1),
    start: CellSchema,
    goal: CellSchema
  })
  .superRefine((params, ctx) => {
    for (const field of ['start', 'goal'] as const) {
      const [row, col] = params[field];
      if (row < 0 || row >= params.height || col < 0 || col >= params.width) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [field],
          message: `cell (${row}, ${col}) is outside the ${params.height}x${params.width} grid`
        });
      }
    }
    if (params.start[0] === params.goal[0] && params.start[1] === params.goal[1]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['goal'],
        message: 'goal must differ from start'
      });
    }
  });

export class GridWorld extends BaseEnvironment {
  readonly width: number;
  readonly height: number;
  readonly start: Cell;
  readonly goal: Cell;

  private row: number;
  private col: number;

  constructor(params: GridWorldParams) {
    super();
    const parsed = parseOrThrow(GridWorldParamsSchema, params, 'GridWorld parameters');
    this.width = parsed.width;
    this.height = parsed.height;
    this.start = parsed.start;
    this.goal = parsed.goal;
    this.row = this.start[0];
    this.col = this.start[1];
  }

  startNewEpisode(): void {
    this.row = this.start[0];
    this.col = this.start[1];
  }

  getState(): State {
    return this.getObservation();
  }

  getObservation(): State {
    if (this.atGoal()) return State.TERMINAL;
    return State.of({ row: this.row, col: this.col });
  }

  getActions(): Action[] {
    if (this.atGoal()) return [];
    return MOVES
      .filter(({ delta }) => this.inBounds(this.row + delta[0], this.col + delta[1]))
      .map(({ name }) => new Action(name));
  }

  react(action: Action): number {
    this.assertNotEnded(action);

    const move = MOVES.find(m => m.name === action.name);
    if (!move) {
      throw new InvalidArgumentError(`GridWorld: unknown action ${action.key()}`);
    }

    this.row = clamp(this.row + move.delta[0], 0, this.height - 1);
    this.col = clamp(this.col + move.delta[1], 0, this.width - 1);

    return this.atGoal() ? GOAL_REWARD : STEP_REWARD;
  }

  private atGoal(): boolean {
    return this.row === this.goal[0] && this.col === this.goal[1];
  }

  private inBounds(row: number, col: number): boolean {
    return row >= 0 && row < this.height && col >= 0 && col < this.width;
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
