/**
 * Linear Q-Learner Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Action } from '../core/Action.js';
import { InvalidArgumentError, InvalidStateError } from '../core/errors.js';
import { State } from '../core/State.js';
import { createFeatureExtractor } from './features.js';
import { LinearQLearner } from './LinearQLearner.js';

const left = new Action('left');
const right = new Action('right');

describe('LinearQLearner', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Action selection', () => {
    it('should break ties by Action order', () => {
      const agent = new LinearQLearner();
      const observation = State.of({ pos: 'a' });

      expect(agent.getBestStoredAction(observation, [right, left])).toBe(left);
      expect(agent.getBestStoredAction(observation, [
        new Action('gate', { slot: 1, attribute: 'x' }),
        new Action('gate', { slot: 0, attribute: 'x' })
      ]).param('slot')).toBe(0);
    });

    it('should reject an empty action set', () => {
      const agent = new LinearQLearner();

      expect(() => agent.getBestStoredAction(State.of({}), [])).toThrow(InvalidArgumentError);
      expect(() => agent.act(State.of({}), [])).toThrow(InvalidArgumentError);
    });

    it('should value unseen (observation, action) pairs at 0', () => {
      const agent = new LinearQLearner();

      expect(agent.getValue(State.of({ x: 1 }), left)).toBe(0);
      expect(agent.getWeight('left::_bias')).toBe(0);
    });
  });

  describe('TD updates', () => {
    it('should move every feature weight of the taken action toward the target', () => {
      const agent = new LinearQLearner({ learningRate: 0.5, discountRate: 0.9 });
      const a = State.of({ pos: 'a' });
      const b = State.of({ pos: 'b' });

      expect(agent.act(a, [right, left])).toBe(left);
      agent.observeReward(b, 1, [left, right]);

      // target 1, previous 0: each of the two weights moves by 0.5 * 1
      expect(agent.exportWeights()).toEqual({ 'left::_bias': 0.5, 'left::pos': 0.5 });
      expect(agent.getValue(a, left)).toBe(1);
      expect(agent.getValue(a, right)).toBe(0);

      expect(agent.act(a, [left, right])).toBe(left);
      agent.observeReward(State.TERMINAL, -1, []);

      // terminal target -1, previous 1: each weight moves by 0.5 * -2
      expect(agent.exportWeights()).toEqual({ 'left::_bias': -0.5, 'left::pos': -0.5 });
      expect(agent.getValue(a, left)).toBe(-1);
      expect(agent.getBestStoredAction(a, [left, right])).toBe(right);

      expect(agent.getStats()).toEqual({ weightCount: 2, updates: 2, meanAbsTdError: 1.5 });
    });

    it('should bootstrap from the best next action, discounted', () => {
      const agent = new LinearQLearner({
        learningRate: 1,
        discountRate: 0.5,
        featureExtractor: createFeatureExtractor({ variableContentPrefixes: ['s'] })
      });
      const go = new Action('go');
      const s0 = State.of({ s: 0 });
      const s1 = State.of({ s: 1 });

      agent.act(s1, [go]);
      agent.observeReward(State.TERMINAL, 10, []);
      expect(agent.getValue(s1, go)).toBe(20);

      agent.act(s0, [go]);
      // value(s0) = 10 through the shared bias; target = -1 + 0.5 * 20 = 9
      agent.observeReward(s1, -1, [go]);

      expect(agent.getWeight('go::_bias')).toBe(9);
      expect(agent.getWeight('go::s=0')).toBe(-1);
      expect(agent.getWeight('go::s=1')).toBe(10);
      expect(agent.getValue(s0, go)).toBe(8);
      expect(agent.getValue(s1, go)).toBe(19);
    });

    it('should credit an action recorded by a wrapper', () => {
      const agent = new LinearQLearner({ learningRate: 1, discountRate: 0 });
      const observation = State.of({ x: 0 });

      agent.recordAction(observation, right);
      agent.observeReward(State.TERMINAL, 2, []);

      expect(agent.getValue(observation, right)).toBe(4);
      expect(agent.getValue(observation, left)).toBe(0);
    });

    it('should keep gate actions with different parameters apart', () => {
      const agent = new LinearQLearner({ learningRate: 1, discountRate: 0 });
      const observation = State.of({ symbol: 1, memory_0: null });
      const gateSymbol = new Action('gate', { slot: 0, attribute: 'symbol' });
      const gateX = new Action('gate', { slot: 0, attribute: 'x' });

      agent.recordAction(observation, gateSymbol);
      agent.observeReward(observation, 1, [gateSymbol, gateX]);

      expect(agent.getValue(observation, gateSymbol)).toBe(3);
      expect(agent.getValue(observation, gateX)).toBe(0);
    });
  });

  describe('Contract violations', () => {
    it('should reject observeReward without a recorded action', () => {
      const agent = new LinearQLearner();

      expect(() => agent.observeReward(State.of({}), 0, [])).toThrow(InvalidStateError);
    });

    it('should consume the recorded action on update', () => {
      const agent = new LinearQLearner();
      agent.act(State.of({ x: 0 }), [left]);
      agent.observeReward(State.of({ x: 1 }), -1, [left]);

      expect(() => agent.observeReward(State.of({ x: 2 }), -1, [left])).toThrow(InvalidStateError);
    });

    it('should forget the recorded action on a new episode', () => {
      const agent = new LinearQLearner();
      agent.act(State.of({ x: 0 }), [left]);
      agent.startNewEpisode();

      expect(() => agent.observeReward(State.TERMINAL, 1, [])).toThrow(InvalidStateError);
    });

    it('should refuse to act in the terminal state', () => {
      const agent = new LinearQLearner();

      expect(() => agent.recordAction(State.TERMINAL, left)).toThrow(InvalidStateError);
    });

    it('should reject out-of-range rates', () => {
      expect(() => new LinearQLearner({ learningRate: 0 })).toThrow(/learningRate/);
      expect(() => new LinearQLearner({ learningRate: 1.5 })).toThrow(InvalidArgumentError);
      expect(() => new LinearQLearner({ discountRate: -0.1 })).toThrow(/discountRate/);
      expect(() => new LinearQLearner({ learningRate: 1, discountRate: 1 })).not.toThrow();
    });
  });

  describe('Weights', () => {
    it('should restore exported weights', () => {
      const agent = new LinearQLearner({ learningRate: 0.5 });
      const observation = State.of({ x: 0, memory_0: 1 });
      agent.act(observation, [left]);
      agent.observeReward(State.TERMINAL, 4, []);

      const copy = new LinearQLearner();
      copy.importWeights(agent.exportWeights());

      expect(copy.getValue(observation, left)).toBe(agent.getValue(observation, left));
      expect(Object.keys(copy.exportWeights())).toEqual(['left::_bias', 'left::memory_0=1', 'left::x']);
    });

    it('should reject non-finite weights', () => {
      const agent = new LinearQLearner();

      expect(() => agent.importWeights({ 'left::_bias': Number.NaN })).toThrow(InvalidArgumentError);
    });
  });

  it('should log updates in debug mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const agent = new LinearQLearner({ learningRate: 1, discountRate: 0, debug: true });

    agent.act(State.of({ x: 0 }), [left]);
    agent.observeReward(State.TERMINAL, 1, []);

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('[LinearQLearner] left in State(x=0): reward=1 target=1.0000 td=1.0000');
  });
});
