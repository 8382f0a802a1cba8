/**
 * Environment Types
 *
 * The state-machine contract every environment (and every environment
 * wrapper) satisfies. The driver loop is the only caller of these operations.
 */

import type { Action } from '../core/Action.js';
import type { State } from '../core/State.js';

export interface Environment {
  /** Re-initialize internal state and clear any termination */
  startNewEpisode(): void;

  /** Complete internal state, including parts the agent cannot observe */
  getState(): State;

  /** What the agent perceives; State.TERMINAL once the episode has ended */
  getObservation(): State;

  /** Available actions; empty iff the episode has ended */
  getActions(): Action[];

  /**
   * Apply `action`, mutate internal state and return the scalar reward.
   * Throws InvalidStateError after termination.
   */
  react(action: Action): number;

  endOfEpisode(): boolean;
}

/** A (row, col) cell */
export type Cell = readonly [row: number, col: number];

export interface GridWorldParams {
  width: number;
  height: number;
  start: Cell;
  goal: Cell;
}

export type GoalSide = -1 | 1;

export interface SimpleTMazeParams {
  /** Corridor length before the junction (>= 1) */
  hallwayLength: number;
  /** Fixed goal side; chosen per episode from the random source when omitted */
  goalX?: GoalSide;
  /** Corridor cell that shows the goal side (default: hallwayLength - 1) */
  signalPosition?: number;
  /** Seed for the per-episode goal choice (default: 0) */
  randomSeed?: number | string;
}
