/**
 * ModelGraph Engine - Model Module Exports
 */

export { ObjectGraph, nameKey, MAX_NAME_LENGTH } from './ObjectGraph.js';
export type {
  GraphChange,
  GraphListener,
  GraphStats,
  NameConflict,
  NodeSnapshot,
} from './ObjectGraph.js';

export {
  createNodeIdFactory,
  isNodeId,
  getIdSequence,
  compareNodeIds,
} from './NodeId.js';
