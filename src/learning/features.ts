/**
 * Feature Extraction
 *
 * Features are the units of linear weighting. An extractor maps an
 * observation to a FeatureSet: feature keys indexed by their canonical
 * encoding, so a set can never hold the same key twice.
 */

import type { Action } from '../core/Action.js';
import type { AttributeValue, State } from '../core/State.js';
import { MEMORY_ATTRIBUTE_PREFIX } from '../memory/types.js';

export type FeatureKey =
  | { kind: 'bias' }
  | { kind: 'attribute'; attribute: string }
  | { kind: 'attribute-value'; attribute: string; value: AttributeValue };

export type FeatureSet = ReadonlyMap<string, FeatureKey>;

export type FeatureExtractor = (observation: State) => FeatureSet;

export const BIAS_FEATURE = '_bias';

export function encodeFeature(key: FeatureKey): string {
  switch (key.kind) {
    case 'bias':
      return BIAS_FEATURE;
    case 'attribute':
      return key.attribute;
    case 'attribute-value':
      return `${key.attribute}=${JSON.stringify(key.value)}`;
  }
}

export function featureSet(keys: Iterable<FeatureKey>): FeatureSet {
  const set = new Map<string, FeatureKey>();
  for (const key of keys) {
    set.set(encodeFeature(key), key);
  }
  return set;
}

/**
 * Key of the weight for one (action, feature) pair
 */
export function actionFeatureKey(action: Action, feature: string): string {
  return `${action.key()}::${feature}`;
}

export interface FeatureExtractorOptions {
  /**
   * Attributes whose name starts with one of these carry variable content;
   * they contribute (attribute, value) features instead of presence features
   */
  variableContentPrefixes: string[];
}

export const DEFAULT_FEATURE_EXTRACTOR_OPTIONS: FeatureExtractorOptions = {
  variableContentPrefixes: [MEMORY_ATTRIBUTE_PREFIX, 'scratch']
};

/**
 * Reference extractor: a constant bias, a presence feature per attribute,
 * and an (attribute, value) feature per variable-content attribute
 */
export function createFeatureExtractor(
  options?: Partial<FeatureExtractorOptions>
): FeatureExtractor {
  const { variableContentPrefixes } = { ...DEFAULT_FEATURE_EXTRACTOR_OPTIONS, ...options };
  const isVariable = (name: string): boolean =>
    variableContentPrefixes.some(prefix => name.startsWith(prefix));

  return (observation: State): FeatureSet => {
    const keys: FeatureKey[] = [{ kind: 'bias' }];
    for (const [attribute, value] of observation.entries()) {
      keys.push(
        isVariable(attribute)
          ? { kind: 'attribute-value', attribute, value }
          : { kind: 'attribute', attribute }
      );
    }
    return featureSet(keys);
  };
}

export const defaultFeatureExtractor: FeatureExtractor = createFeatureExtractor();
