/**
 * Neighbor result shapes
 *
 * Vector search services return neighbors in one of two shapes: a full
 * datapoint nested under `datapoint`, or a flat record carrying only the id.
 * Either shape names its score `distance` or `score`.
 *
 * @module neighbor-result
 */

/**
 * Neighbor whose identifier and metadata are nested under a datapoint
 */
export interface NestedNeighbor {
  kind: 'nested';
  id: string;
  metadata: Record<string, unknown> | null;
  score: number | null;
}

/**
 * Neighbor carrying its identifier at the top level
 */
export interface FlatNeighbor {
  kind: 'flat';
  id: string;
  score: number | null;
}

export type RawNeighbor = NestedNeighbor | FlatNeighbor;

/**
 * Canonical neighbor after normalization.
 *
 * `score` keeps the ordering convention of the configured distance measure
 * (higher is closer for DOT_PRODUCT and COSINE, lower for SQUARED_L2).
 */
export interface NeighborResult {
  id: string;
  score: number | null;
  metadata: Record<string, unknown> | null;
}
