/**
 * Model Actions - Undoable primitive mutations on the object graph
 *
 * Action Types:
 * - SetPropertyAction: Change one property value
 * - AddNodeAction: Insert a node (or subtree)
 * - RemoveNodeAction: Remove a subtree, keeping a snapshot for re-insertion
 * - MoveNodeAction: Re-parent a node
 * - CustomAction: Caller-supplied apply/revert pair
 *
 * Every action is created after its mutation has been applied, and checks the
 * graph is in the state it expects before replaying. A mismatch means the
 * history no longer describes the model and is raised as HistoryInvariantError.
 *
 * @module ModelActions
 */

import type { ActionType, ModelAction } from './UndoRedoManager.js';
import type { NodeSnapshot, ObjectGraph } from '../model/ObjectGraph.js';
import type { NodeId } from '../model/NodeId.js';
import { propertyValuesEqual, type PropertyName, type PropertyValue } from '../types/index.js';
import { HistoryInvariantError } from '../types/errors.js';

// =============================================================================
// Helper: Generate Action ID
// =============================================================================

let actionIdCounter = 0;

function generateActionId(): string {
  return `action_${++actionIdCounter}_${Date.now()}`;
}

function formatValue(value: PropertyValue): string {
  return Array.isArray(value) ? `[${value.join(', ')}]` : JSON.stringify(value);
}

// =============================================================================
// SetPropertyAction
// =============================================================================

/**
 * Apply: write newValue (expects oldValue)
 * Revert: write oldValue (expects newValue)
 */
export class SetPropertyAction implements ModelAction {
  readonly id: string;
  readonly type: ActionType = 'setProperty';
  readonly description: string;
  readonly timestamp: number;

  readonly nodeId: NodeId;
  readonly property: PropertyName;
  readonly oldValue: PropertyValue;
  readonly newValue: PropertyValue;

  private graph: ObjectGraph;

  constructor(
    graph: ObjectGraph,
    nodeId: NodeId,
    property: PropertyName,
    oldValue: PropertyValue,
    newValue: PropertyValue,
    description?: string
  ) {
    this.id = generateActionId();
    this.timestamp = Date.now();
    this.description = description ?? `Set ${property} of ${nodeId}`;
    this.graph = graph;
    this.nodeId = nodeId;
    this.property = property;
    this.oldValue = oldValue;
    this.newValue = newValue;
  }

  apply(): void {
    this.expect(this.oldValue, 'apply');
    this.graph.writeProperty(this.nodeId, this.property, this.newValue);
  }

  revert(): void {
    this.expect(this.newValue, 'revert');
    this.graph.writeProperty(this.nodeId, this.property, this.oldValue);
  }

  private expect(expected: PropertyValue, step: string): void {
    if (!this.graph.get(this.nodeId)) {
      throw new HistoryInvariantError(`Cannot ${step} '${this.description}': node ${this.nodeId} is missing`);
    }
    const current = this.graph.readProperty(this.nodeId, this.property);
    if (!propertyValuesEqual(current, expected)) {
      throw new HistoryInvariantError(
        `Cannot ${step} '${this.description}': ${this.property} is ${formatValue(current)}, expected ${formatValue(expected)}`
      );
    }
  }
}

// =============================================================================
// AddNodeAction / RemoveNodeAction
// =============================================================================

/**
 * Apply: insert the snapshot
 * Revert: remove the subtree
 */
export class AddNodeAction implements ModelAction {
  readonly id: string;
  readonly type: ActionType = 'addNode';
  readonly description: string;
  readonly timestamp: number;

  readonly snapshot: NodeSnapshot;
  private graph: ObjectGraph;

  constructor(graph: ObjectGraph, snapshot: NodeSnapshot, description?: string) {
    this.id = generateActionId();
    this.timestamp = Date.now();
    this.description = description ?? `Add ${snapshot.node.kind} '${snapshot.node.name}'`;
    this.graph = graph;
    this.snapshot = snapshot;
  }

  apply(): void {
    expectAbsent(this.graph, this.snapshot.node.id, this.description);
    this.graph.insertSubtree(this.snapshot);
  }

  revert(): void {
    expectPresent(this.graph, this.snapshot.node.id, this.description);
    this.graph.removeSubtree(this.snapshot.node.id);
  }
}

/**
 * Apply: remove the subtree
 * Revert: insert the snapshot at its original position
 */
export class RemoveNodeAction implements ModelAction {
  readonly id: string;
  readonly type: ActionType = 'removeNode';
  readonly description: string;
  readonly timestamp: number;

  readonly snapshot: NodeSnapshot;
  private graph: ObjectGraph;

  constructor(graph: ObjectGraph, snapshot: NodeSnapshot, description?: string) {
    this.id = generateActionId();
    this.timestamp = Date.now();
    this.description = description ?? `Remove ${snapshot.node.kind} '${snapshot.node.name}'`;
    this.graph = graph;
    this.snapshot = snapshot;
  }

  apply(): void {
    expectPresent(this.graph, this.snapshot.node.id, this.description);
    this.graph.removeSubtree(this.snapshot.node.id);
  }

  revert(): void {
    expectAbsent(this.graph, this.snapshot.node.id, this.description);
    this.graph.insertSubtree(this.snapshot);
  }
}

function expectPresent(graph: ObjectGraph, id: NodeId, description: string): void {
  if (!graph.get(id)) {
    throw new HistoryInvariantError(`Cannot replay '${description}': node ${id} is missing`);
  }
}

function expectAbsent(graph: ObjectGraph, id: NodeId, description: string): void {
  if (graph.get(id)) {
    throw new HistoryInvariantError(`Cannot replay '${description}': node ${id} already exists`);
  }
}

// =============================================================================
// MoveNodeAction
// =============================================================================

export interface NodePosition {
  parent: NodeId;
  index: number;
}

/**
 * Apply: move from `from` to `to`
 * Revert: move back to `from`, at the original index
 */
export class MoveNodeAction implements ModelAction {
  readonly id: string;
  readonly type: ActionType = 'moveNode';
  readonly description: string;
  readonly timestamp: number;

  readonly nodeId: NodeId;
  readonly from: NodePosition;
  readonly to: NodePosition;
  private graph: ObjectGraph;

  constructor(
    graph: ObjectGraph,
    nodeId: NodeId,
    from: NodePosition,
    to: NodePosition,
    description?: string
  ) {
    this.id = generateActionId();
    this.timestamp = Date.now();
    this.description = description ?? `Move ${nodeId}`;
    this.graph = graph;
    this.nodeId = nodeId;
    this.from = { ...from };
    this.to = { ...to };
  }

  apply(): void {
    this.expectParent(this.from.parent, 'apply');
    this.graph.moveNode(this.nodeId, this.to.parent, this.to.index);
  }

  revert(): void {
    this.expectParent(this.to.parent, 'revert');
    this.graph.moveNode(this.nodeId, this.from.parent, this.from.index);
  }

  private expectParent(parent: NodeId, step: string): void {
    const node = this.graph.get(this.nodeId);
    if (!node || node.parent !== parent) {
      throw new HistoryInvariantError(
        `Cannot ${step} '${this.description}': node ${this.nodeId} is not under ${parent}`
      );
    }
  }
}

// =============================================================================
// CustomAction
// =============================================================================

/**
 * Action with caller-defined apply/revert functions.
 */
export class CustomAction implements ModelAction {
  readonly id: string;
  readonly type: ActionType = 'custom';
  readonly description: string;
  readonly timestamp: number;

  private applyFn: () => void;
  private revertFn: () => void;

  constructor(description: string, applyFn: () => void, revertFn: () => void) {
    this.id = generateActionId();
    this.description = description;
    this.timestamp = Date.now();
    this.applyFn = applyFn;
    this.revertFn = revertFn;
  }

  apply(): void {
    this.applyFn();
  }

  revert(): void {
    this.revertFn();
  }
}
