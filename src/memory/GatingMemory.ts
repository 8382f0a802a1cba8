/**
 * Gating Memory
 *
 * Wraps any Environment and gives the agent a fixed number of scratch memory
 * slots. Each slot appears in the observation as `memory_<i>` and can only be
 * written by a gate action, which copies the current value of one observed
 * attribute into the slot at a fixed cost without advancing the base
 * environment.
 *
 * The wrapper only talks to the base through the Environment contract, so it
 * composes with any environment, including another GatingMemory (give the
 * outer one a label so the slot names and gate actions stay distinct).
 *
 * Usage:
 *   const env = new GatingMemory(new SimpleTMaze({ hallwayLength: 2 }), {
 *     numMemorySlots: 1,
 *     gateReward: -0.05
 *   });
 */

import { z } from 'zod';
import { Action } from '../core/Action.js';
import { InvalidArgumentError } from '../core/errors.js';
import { State, type AttributeValue } from '../core/State.js';
import { parseOrThrow } from '../core/validation.js';
import { BaseEnvironment } from '../environments/BaseEnvironment.js';
import type { Environment } from '../environments/types.js';
import {
  DEFAULT_GATING_MEMORY_CONFIG,
  GATE_ACTION_NAME,
  MEMORY_ATTRIBUTE_PREFIX,
  isMemoryAttribute,
  type GatingMemoryConfig
} from './types.js';

const GatingMemoryConfigSchema = z.object({
  numMemorySlots: z.number().int().min(0),
  gateReward: z.number().finite(),
  label: z.string().regex(/^[A-Za-z0-9]+$/, 'must be alphanumeric').optional()
});

export class GatingMemory<E extends Environment = Environment> extends BaseEnvironment {
  readonly base: E;
  private readonly config: GatingMemoryConfig;
  private readonly slotNames: string[];
  private readonly memory: AttributeValue[];

  constructor(base: E, config?: Partial<GatingMemoryConfig>) {
    super();
    this.base = base;
    this.config = parseOrThrow(
      GatingMemoryConfigSchema,
      { ...DEFAULT_GATING_MEMORY_CONFIG, ...config },
      'gating memory configuration'
    );

    const prefix = this.config.label === undefined
      ? MEMORY_ATTRIBUTE_PREFIX
      : `${MEMORY_ATTRIBUTE_PREFIX}${this.config.label}_`;
    this.slotNames = Array.from({ length: this.config.numMemorySlots }, (_, i) => `${prefix}${i}`);
    this.memory = this.slotNames.map(() => null);

    const baseObservation = base.getObservation();
    const clashes = this.slotNames.filter(name => baseObservation.has(name));
    if (clashes.length > 0) {
      throw new InvalidArgumentError(
        'Memory slot names already present in the base observation; give this wrapper a distinct label',
        clashes
      );
    }
  }

  get numMemorySlots(): number {
    return this.config.numMemorySlots;
  }

  get gateReward(): number {
    return this.config.gateReward;
  }

  /** Current slot contents, in slot order */
  getMemory(): AttributeValue[] {
    return [...this.memory];
  }

  startNewEpisode(): void {
    this.memory.fill(null);
    this.base.startNewEpisode();
  }

  getState(): State {
    return this.withMemory(this.base.getState());
  }

  getObservation(): State {
    return this.withMemory(this.base.getObservation());
  }

  getActions(): Action[] {
    const baseActions = this.base.getActions();
    if (baseActions.length === 0) return [];

    const targets = this.gateTargets(this.base.getObservation());
    const gates: Action[] = [];
    for (let slot = 0; slot < this.config.numMemorySlots; slot++) {
      for (const attribute of targets) {
        gates.push(this.gateAction(slot, attribute));
      }
    }
    return [...baseActions, ...gates];
  }

  endOfEpisode(): boolean {
    return this.base.endOfEpisode();
  }

  react(action: Action): number {
    this.assertNotEnded(action);

    if (!this.isOwnGate(action)) {
      return this.base.react(action);
    }

    const slot = action.param('slot');
    if (typeof slot !== 'number' || !Number.isInteger(slot) || slot < 0 || slot >= this.config.numMemorySlots) {
      throw new InvalidArgumentError(`GatingMemory: no memory slot ${String(slot)} in ${action.key()}`);
    }

    const attribute = action.param('attribute');
    const observation = this.base.getObservation();
    if (typeof attribute !== 'string' || !this.gateTargets(observation).includes(attribute)) {
      throw new InvalidArgumentError(`GatingMemory: cannot gate attribute ${String(attribute)} in ${action.key()}`);
    }

    this.memory[slot] = observation.get(attribute) ?? null;
    return this.config.gateReward;
  }

  private withMemory(state: State): State {
    if (state.isTerminal) return state;
    const slots: Record<string, AttributeValue> = {};
    this.slotNames.forEach((name, i) => {
      slots[name] = this.memory[i];
    });
    return state.with(slots);
  }

  // Memory attributes (ours or a nested wrapper's) are never gate targets
  private gateTargets(observation: State): string[] {
    return observation.attributes().filter(name => !isMemoryAttribute(name));
  }

  private gateAction(slot: number, attribute: string): Action {
    return this.config.label === undefined
      ? new Action(GATE_ACTION_NAME, { slot, attribute })
      : new Action(GATE_ACTION_NAME, { memory: this.config.label, slot, attribute });
  }

  private isOwnGate(action: Action): boolean {
    return action.name === GATE_ACTION_NAME && action.param('memory') === this.config.label;
  }
}
