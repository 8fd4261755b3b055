/**
 * NodeId - Identity for model nodes
 *
 * ID Format: "n_{sequence}"
 *
 * Identity is assigned once, at creation, and never changes. Names are display
 * data only; everything internal (reference edges, history actions, hierarchy
 * levels, perspective members) points at ids.
 *
 * Sequences are per session, so ids are stable across undo/redo (a re-added
 * node keeps its id) and sort in creation order.
 *
 * @module NodeId
 */

/**
 * Unique identifier for a node within one session
 * Example: n_42
 */
export type NodeId = string & { readonly __brand: 'NodeId' };

const NODE_ID_PATTERN = /^n_(\d+)$/;

/**
 * Create an id generator for one session.
 *
 * @example
 * const nextId = createNodeIdFactory();
 * nextId(); // => "n_1"
 * nextId(); // => "n_2"
 */
export function createNodeIdFactory(start: number = 0): () => NodeId {
  let sequence = start;
  return () => `n_${++sequence}` as NodeId;
}

/**
 * Type guard for NodeId
 */
export function isNodeId(id: string): id is NodeId {
  return NODE_ID_PATTERN.test(id);
}

/**
 * Extract the creation sequence from an id.
 *
 * @throws Error if the id is malformed
 */
export function getIdSequence(id: NodeId): number {
  const match = NODE_ID_PATTERN.exec(id);
  if (!match) {
    throw new Error(`Invalid node ID format: ${id}`);
  }
  return parseInt(match[1], 10);
}

/**
 * Compare ids by creation order (for sorting)
 *
 * @example
 * ids.sort(compareNodeIds);
 */
export function compareNodeIds(a: NodeId, b: NodeId): number {
  return getIdSequence(a) - getIdSequence(b);
}
