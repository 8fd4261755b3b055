/**
 * ModelGraph Engine - Error Types
 *
 * Validation failures are thrown before any mutation is applied, so a caught
 * ModelError means the model and the history are unchanged.
 */

import type { NodeId } from '../model/NodeId.js';

export type ModelErrorCode =
  | 'NAME_CONFLICT'
  | 'INVALID_VALUE'
  | 'INVALID_MOVE'
  | 'NODE_NOT_FOUND'
  | 'HISTORY_INVARIANT'
  | 'TOKENIZE_FAILED'
  | 'INVALID_DEFINITION';

export abstract class ModelError extends Error {
  abstract readonly code: ModelErrorCode;
}

/**
 * A name collides with another node in the same naming scope.
 */
export class NameConflictError extends ModelError {
  readonly code = 'NAME_CONFLICT';
  name: string = 'NameConflictError';
  /** The requested name */
  requestedName: string;
  /** The node already holding the name */
  conflictingNode: NodeId;

  constructor(requestedName: string, conflictingNode: NodeId, scope: string) {
    super(`Name '${requestedName}' is already used by another ${scope}`);
    this.requestedName = requestedName;
    this.conflictingNode = conflictingNode;
  }
}

/**
 * A property value was rejected by storage.
 */
export class InvalidValueError extends ModelError {
  readonly code = 'INVALID_VALUE';
  name: string = 'InvalidValueError';
  property: string;

  constructor(property: string, message: string) {
    super(`Invalid value for '${property}': ${message}`);
    this.property = property;
  }
}

/**
 * A structural change (move, add under a parent, remove) is not allowed.
 */
export class InvalidMoveError extends ModelError {
  readonly code = 'INVALID_MOVE';
  name: string = 'InvalidMoveError';
}

export class NodeNotFoundError extends ModelError {
  readonly code = 'NODE_NOT_FOUND';
  name: string = 'NodeNotFoundError';
  nodeId: string;

  constructor(nodeId: string) {
    super(`Node not found: ${nodeId}`);
    this.nodeId = nodeId;
  }
}

/**
 * Internal invariant violation in the history (mismatched replay, recording
 * during replay, unbalanced batches). Not recoverable by the caller.
 */
export class HistoryInvariantError extends ModelError {
  readonly code = 'HISTORY_INVARIANT';
  name: string = 'HistoryInvariantError';
}

export class TokenizeError extends ModelError {
  readonly code = 'TOKENIZE_FAILED';
  name: string = 'TokenizeError';
  /** Offset where the failing construct starts */
  offset: number;

  constructor(message: string, offset: number) {
    super(`${message} at offset ${offset}`);
    this.offset = offset;
  }
}

export class ModelDefinitionError extends ModelError {
  readonly code = 'INVALID_DEFINITION';
  name: string = 'ModelDefinitionError';
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid model definition:\n  ${issues.join('\n  ')}`);
    this.issues = issues;
  }
}

export function isModelError(error: unknown): error is ModelError {
  return error instanceof ModelError;
}
