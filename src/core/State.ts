/**
 * State
 *
 * Immutable attribute-value snapshot used for both environment state and
 * observations. Attributes are kept in name order, so two States built from
 * the same mapping are equal (and share a key) regardless of insertion order.
 */

import { InvalidStateError } from './errors.js';

export type AttributeValue = string | number | null;

const TERMINAL_KEY = '<terminal>';

export class State {
  /**
   * Sentinel for "episode terminated". Has no attributes and equals only itself.
   */
  static readonly TERMINAL: State = new State([], true);

  private readonly values: ReadonlyMap<string, AttributeValue>;
  private readonly canonicalKey: string;

  private constructor(
    entries: Array<[string, AttributeValue]>,
    public readonly isTerminal: boolean
  ) {
    const sorted = [...entries].sort(([a], [b]) => compareStrings(a, b));
    this.values = new Map(sorted);
    this.canonicalKey = isTerminal ? TERMINAL_KEY : JSON.stringify(sorted);
  }

  static of(attributes: Readonly<Record<string, AttributeValue>>): State {
    return new State(Object.entries(attributes), false);
  }

  get(name: string): AttributeValue | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  /** Attribute names, in order */
  attributes(): string[] {
    return [...this.values.keys()];
  }

  entries(): Array<[string, AttributeValue]> {
    return [...this.values.entries()];
  }

  toRecord(): Record<string, AttributeValue> {
    return Object.fromEntries(this.values);
  }

  /**
   * New State with `extra` added (or overriding existing attributes)
   */
  with(extra: Readonly<Record<string, AttributeValue>>): State {
    if (this.isTerminal) {
      throw new InvalidStateError('Cannot add attributes to the terminal state');
    }
    return State.of({ ...this.toRecord(), ...extra });
  }

  equals(other: State): boolean {
    return this.canonicalKey === other.canonicalKey;
  }

  /** Canonical, order-independent encoding; equal States have equal keys */
  key(): string {
    return this.canonicalKey;
  }

  toString(): string {
    if (this.isTerminal) return 'State(<terminal>)';
    const parts = this.entries().map(([name, value]) => `${name}=${JSON.stringify(value)}`);
    return `State(${parts.join(', ')})`;
  }

  static compare(a: State, b: State): number {
    return compareStrings(a.canonicalKey, b.canonicalKey);
  }
}

/** Code-unit string order, independent of locale */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
