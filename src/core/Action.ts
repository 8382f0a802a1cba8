/**
 * Action
 *
 * Immutable action record: a name plus optional named parameters
 * (gate actions carry `slot` and `attribute`, moves carry none).
 * Equality, keys and ordering cover the full (name, sorted parameters) tuple.
 */

import { compareStrings } from './State.js';

export type ActionParameter = string | number;

export class Action {
  public readonly name: string;
  public readonly parameters: Readonly<Record<string, ActionParameter>>;
  private readonly canonicalKey: string;

  constructor(name: string, parameters: Readonly<Record<string, ActionParameter>> = {}) {
    const sorted = sortedEntries(parameters);
    this.name = name;
    this.parameters = Object.freeze(Object.fromEntries(sorted));
    this.canonicalKey = sorted.length === 0
      ? name
      : `${name}(${sorted.map(([k, v]) => `${k}=${JSON.stringify(v)}`).join(',')})`;
  }

  static of(name: string, parameters?: Readonly<Record<string, ActionParameter>>): Action {
    return new Action(name, parameters);
  }

  param(name: string): ActionParameter | undefined {
    return Object.prototype.hasOwnProperty.call(this.parameters, name)
      ? this.parameters[name]
      : undefined;
  }

  equals(other: Action): boolean {
    return this.canonicalKey === other.canonicalKey;
  }

  /** Canonical encoding, e.g. `up` or `gate(attribute="x",slot=0)` */
  key(): string {
    return this.canonicalKey;
  }

  toString(): string {
    return this.canonicalKey;
  }

  /**
   * Total order: by name, then by the sorted parameter tuple
   */
  static compare(a: Action, b: Action): number {
    const byName = compareStrings(a.name, b.name);
    if (byName !== 0) return byName;

    const left = sortedEntries(a.parameters);
    const right = sortedEntries(b.parameters);
    const shared = Math.min(left.length, right.length);
    for (let i = 0; i < shared; i++) {
      const byKey = compareStrings(left[i][0], right[i][0]);
      if (byKey !== 0) return byKey;
      const byValue = compareParameters(left[i][1], right[i][1]);
      if (byValue !== 0) return byValue;
    }
    return left.length - right.length;
  }
}

/** Sort a copy of `actions` into the Action order */
export function sortActions(actions: readonly Action[]): Action[] {
  return [...actions].sort(Action.compare);
}

function sortedEntries(
  parameters: Readonly<Record<string, ActionParameter>>
): Array<[string, ActionParameter]> {
  return Object.entries(parameters).sort(([a], [b]) => compareStrings(a, b));
}

// Numbers order before strings, numerically among themselves
function compareParameters(a: ActionParameter, b: ActionParameter): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  return compareStrings(a, b);
}
