/**
 * Knowledge Store boundary
 *
 * Contract for an external knowledge base that can fill memory content from
 * a lookup key derived from the current observation. No implementation ships
 * with the core; a knowledge-backed environment must finish (or cache) its
 * lookups before getObservation() is called, since environment operations
 * are synchronous.
 */

import type { AttributeValue } from '../core/State.js';

/**
 * Exact-match lookup, returning at most `limit` distinct bindings
 */
export interface KnowledgeQuery {
  attribute: string;
  value: AttributeValue;
  limit?: number;
}

/** One result row: attribute name -> value */
export type KnowledgeBinding = Readonly<Record<string, AttributeValue>>;

export interface KnowledgeStore {
  /**
   * Resolve `query`. Failures (network or service errors) must reject with an
   * ExternalLookupError, never resolve to an empty list.
   */
  query(query: KnowledgeQuery): Promise<KnowledgeBinding[]>;
}
