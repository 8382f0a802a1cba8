/**
 * Gating Memory Types
 */

/** Attribute names starting with this prefix hold memory content */
export const MEMORY_ATTRIBUTE_PREFIX = 'memory_';

/** Name of the action that copies an observed attribute into a slot */
export const GATE_ACTION_NAME = 'gate';

/**
 * Configuration for a gating memory wrapper
 */
export interface GatingMemoryConfig {
  /** Number of scratch slots (default: 1) */
  numMemorySlots: number;
  /** Reward charged for every gate action (default: -0.05) */
  gateReward: number;
  /**
   * Distinguishes nested wrappers. Labelled slots are named
   * `memory_<label>_<i>` and their gate actions carry a `memory` parameter.
   */
  label?: string;
}

export const DEFAULT_GATING_MEMORY_CONFIG: GatingMemoryConfig = {
  numMemorySlots: 1,
  gateReward: -0.05
};

export function isMemoryAttribute(name: string): boolean {
  return name.startsWith(MEMORY_ATTRIBUTE_PREFIX);
}
