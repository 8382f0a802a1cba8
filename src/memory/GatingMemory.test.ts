/**
 * Gating Memory Tests
 */

import { describe, it, expect } from 'vitest';
import { Action, sortActions } from '../core/Action.js';
import { InvalidArgumentError, InvalidStateError } from '../core/errors.js';
import { GridWorld } from '../environments/GridWorld.js';
import { SimpleTMaze } from '../environments/SimpleTMaze.js';
import { GatingMemory } from './GatingMemory.js';

const up = new Action('up');
const gate = (slot: number, attribute: string): Action => new Action('gate', { slot, attribute });

function keys(actions: Action[]): string[] {
  return sortActions(actions).map(a => a.key());
}

describe('GatingMemory', () => {
  describe('SimpleTMaze with one slot', () => {
    it('should remember the signal after it disappears', () => {
      const env = new GatingMemory(new SimpleTMaze({ hallwayLength: 2, randomSeed: 3 }), {
        numMemorySlots: 1,
        gateReward: -0.05
      });
      env.startNewEpisode();

      const goal = env.getState().get('goal_x');
      expect(env.getState().toRecord()).toEqual({ x: 0, y: 0, symbol: 0, goal_x: goal, memory_0: null });

      const corridorActions = keys([up, gate(0, 'x'), gate(0, 'y'), gate(0, 'symbol')]);

      expect(env.getObservation().toRecord()).toEqual({ x: 0, y: 0, symbol: 0, memory_0: null });
      expect(keys(env.getActions())).toEqual(corridorActions);
      expect(env.react(up)).toBe(-1);

      expect(env.getObservation().toRecord()).toEqual({ x: 0, y: 1, symbol: goal, memory_0: null });
      expect(keys(env.getActions())).toEqual(corridorActions);
      expect(env.react(gate(0, 'symbol'))).toBe(-0.05);

      expect(env.getObservation().toRecord()).toEqual({ x: 0, y: 1, symbol: goal, memory_0: goal });
      expect(keys(env.getActions())).toEqual(corridorActions);
      expect(env.react(up)).toBe(-1);

      expect(env.getObservation().toRecord()).toEqual({ x: 0, y: 2, symbol: 0, memory_0: goal });
      expect(keys(env.getActions())).toEqual(
        keys([new Action('left'), new Action('right'), gate(0, 'x'), gate(0, 'y'), gate(0, 'symbol')])
      );
      expect(env.react(new Action(goal === -1 ? 'right' : 'left'))).toBe(-10);

      expect(env.getObservation().isTerminal).toBe(true);
      expect(env.getActions()).toEqual([]);
      expect(env.endOfEpisode()).toBe(true);
    });

    it('should list base actions first, then gates by slot and attribute', () => {
      const env = new GatingMemory(new SimpleTMaze({ hallwayLength: 2, goalX: 1 }), { numMemorySlots: 2 });

      expect(env.getActions().map(a => a.key())).toEqual([
        'up',
        'gate(attribute="symbol",slot=0)',
        'gate(attribute="x",slot=0)',
        'gate(attribute="y",slot=0)',
        'gate(attribute="symbol",slot=1)',
        'gate(attribute="x",slot=1)',
        'gate(attribute="y",slot=1)'
      ]);
    });
  });

  describe('Slot semantics', () => {
    it('should start every episode with empty slots', () => {
      const env = new GatingMemory(new GridWorld({ width: 3, height: 3, start: [0, 0], goal: [2, 2] }), {
        numMemorySlots: 3
      });
      env.react(gate(1, 'row'));
      env.react(new Action('down'));
      env.react(gate(2, 'row'));
      expect(env.getMemory()).toEqual([null, 0, 1]);

      env.startNewEpisode();

      expect(env.getMemory()).toEqual([null, null, null]);
      expect(env.getObservation().toRecord()).toEqual({
        row: 0, col: 0, memory_0: null, memory_1: null, memory_2: null
      });
    });

    it('should not advance the base environment when gating', () => {
      const env = new GatingMemory(new GridWorld({ width: 2, height: 2, start: [0, 0], goal: [1, 1] }));

      env.react(gate(0, 'col'));
      env.react(gate(0, 'row'));

      expect(env.getObservation().toRecord()).toEqual({ row: 0, col: 0, memory_0: 0 });
    });

    it('should keep a gated value through base moves until the slot is gated again', () => {
      const env = new GatingMemory(new GridWorld({ width: 4, height: 1, start: [0, 0], goal: [0, 3] }));
      const right = new Action('right');

      env.react(right);
      env.react(gate(0, 'col'));
      expect(env.getObservation().get('memory_0')).toBe(1);

      expect(env.react(right)).toBe(-1);
      expect(env.getObservation().get('col')).toBe(2);
      expect(env.getObservation().get('memory_0')).toBe(1);

      env.react(gate(0, 'col'));
      expect(env.getObservation().get('memory_0')).toBe(2);
    });

    it('should charge the gate reward again when re-gating an unchanged value', () => {
      const env = new GatingMemory(new SimpleTMaze({ hallwayLength: 2, goalX: 1 }), { gateReward: -0.25 });
      env.react(up);

      expect(env.react(gate(0, 'symbol'))).toBe(-0.25);
      expect(env.getObservation().get('memory_0')).toBe(1);
      expect(env.react(gate(0, 'symbol'))).toBe(-0.25);
      expect(env.getObservation().get('memory_0')).toBe(1);
    });

    it('should forward base rewards unchanged', () => {
      const env = new GatingMemory(new SimpleTMaze({ hallwayLength: 1, goalX: 1 }));

      expect(env.react(up)).toBe(-1);
      expect(env.react(new Action('right'))).toBe(10);
    });

    it('should offer no gate actions without slots', () => {
      const env = new GatingMemory(new SimpleTMaze({ hallwayLength: 1, goalX: 1 }), { numMemorySlots: 0 });

      expect(env.getActions()).toEqual([up]);
      expect(env.getObservation().toRecord()).toEqual({ x: 0, y: 0, symbol: 1 });
    });
  });

  describe('Nesting', () => {
    it('should compose with another gating memory under a distinct label', () => {
      const inner = new GatingMemory(new SimpleTMaze({ hallwayLength: 2, goalX: -1 }));
      const outer = new GatingMemory(inner, { numMemorySlots: 1, gateReward: -0.1, label: 'outer' });
      const outerGate = new Action('gate', { memory: 'outer', slot: 0, attribute: 'symbol' });

      expect(outer.getObservation().toRecord()).toEqual({
        x: 0, y: 0, symbol: 0, memory_0: null, memory_outer_0: null
      });
      // memory attributes of the inner wrapper are not gate targets
      expect(keys(outer.getActions())).toEqual(keys([
        up,
        gate(0, 'symbol'),
        gate(0, 'x'),
        gate(0, 'y'),
        outerGate,
        new Action('gate', { memory: 'outer', slot: 0, attribute: 'x' }),
        new Action('gate', { memory: 'outer', slot: 0, attribute: 'y' })
      ]));

      outer.react(up);
      expect(outer.react(gate(0, 'symbol'))).toBe(-0.05);
      expect(outer.react(outerGate)).toBe(-0.1);
      expect(outer.getObservation().toRecord()).toEqual({
        x: 0, y: 1, symbol: -1, memory_0: -1, memory_outer_0: -1
      });

      outer.startNewEpisode();
      expect(outer.getObservation().toRecord()).toEqual({
        x: 0, y: 0, symbol: 0, memory_0: null, memory_outer_0: null
      });
    });

    it('should require a label when slot names would clash', () => {
      const inner = new GatingMemory(new SimpleTMaze({ hallwayLength: 2, goalX: -1 }));

      expect(() => new GatingMemory(inner)).toThrow(InvalidArgumentError);
    });
  });

  describe('Errors', () => {
    it('should reject gating an unknown slot or attribute', () => {
      const env = new GatingMemory(new SimpleTMaze({ hallwayLength: 2, goalX: 1 }));

      expect(() => env.react(gate(1, 'x'))).toThrow(InvalidArgumentError);
      expect(() => env.react(gate(0, 'goal_x'))).toThrow(InvalidArgumentError);
      expect(() => env.react(gate(0, 'memory_0'))).toThrow(InvalidArgumentError);
    });

    it('should reject any action after the base episode ended', () => {
      const env = new GatingMemory(new SimpleTMaze({ hallwayLength: 1, goalX: 1 }));
      env.react(up);
      env.react(new Action('left'));

      expect(env.endOfEpisode()).toBe(true);
      expect(() => env.react(gate(0, 'x'))).toThrow(InvalidStateError);
    });

    it('should reject malformed configuration', () => {
      const base = new SimpleTMaze({ hallwayLength: 1, goalX: 1 });

      expect(() => new GatingMemory(base, { numMemorySlots: -1 })).toThrow(/numMemorySlots/);
      expect(() => new GatingMemory(base, { label: 'has space' })).toThrow(/label/);
    });
  });
});
