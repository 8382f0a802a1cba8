import type { Action } from '../core/Action.js';
import { InvalidStateError } from '../core/errors.js';
import type { State } from '../core/State.js';
import type { Environment } from './types.js';

/**
 * Base class for concrete environments.
 *
 * Episode end is defined by the action set: an environment has ended
 * exactly when it advertises no actions.
 */
export abstract class BaseEnvironment implements Environment {
  abstract startNewEpisode(): void;
  abstract getState(): State;
  abstract getObservation(): State;
  abstract getActions(): Action[];
  abstract react(action: Action): number;

  endOfEpisode(): boolean {
    return this.getActions().length === 0;
  }

  protected assertNotEnded(action: Action): void {
    if (this.endOfEpisode()) {
      throw new InvalidStateError(
        `${this.constructor.name}: cannot react to ${action.key()} after the episode has ended`
      );
    }
  }
}
