/**
 * ObjectGraph - Node storage for one modeling session
 *
 * Architecture:
 * - O(1) node lookup via Map<NodeId, ModelNode>
 * - Ordered children via Map<NodeId, NodeId[]>
 * - Every write is validated before it is applied, and every applied write
 *   emits exactly one GraphChange to subscribers
 *
 * The graph is the default authoritative storage: it validates value types,
 * enumerations, id references and name format. Naming-scope uniqueness is
 * exposed through validateName() and checked by the session before it records
 * anything, so replayed history never has to re-check it.
 *
 * @module ObjectGraph
 */

import {
  CROSS_FILTERS,
  DATA_TYPES,
  MODEL_PERMISSIONS,
  PROPERTY_KINDS,
  PROPERTY_NAMES,
  hasExpression,
  propertyValuesEqual,
  type ColumnNode,
  type MeasureNode,
  type ModelNode,
  type ModelRootNode,
  type NodeKind,
  type PropertyName,
  type PropertyValue,
  type TableNode,
} from '../types/index.js';
import {
  InvalidMoveError,
  InvalidValueError,
  NameConflictError,
  NodeNotFoundError,
} from '../types/errors.js';
import { createNodeIdFactory, isNodeId, type NodeId } from './NodeId.js';

// =============================================================================
// Types
// =============================================================================

export type GraphChange =
  | {
      readonly type: 'nodeAdded';
      /** Root of the inserted subtree */
      readonly node: ModelNode;
      /** Inserted nodes in pre-order, root first */
      readonly subtree: readonly ModelNode[];
    }
  | {
      readonly type: 'nodeRemoved';
      readonly node: ModelNode;
      readonly subtree: readonly ModelNode[];
    }
  | {
      readonly type: 'propertyChanged';
      readonly node: ModelNode;
      readonly property: PropertyName;
      readonly oldValue: PropertyValue;
      readonly newValue: PropertyValue;
    };

export type GraphListener = (change: GraphChange) => void;

/**
 * Detached subtree with enough position data to re-insert it exactly.
 */
export interface NodeSnapshot {
  readonly node: ModelNode;
  /** Index among the parent's children */
  readonly index: number;
  readonly children: readonly NodeSnapshot[];
}

export interface NameConflict {
  node: ModelNode;
  scope: string;
}

export interface GraphStats {
  nodeCount: number;
  byKind: Record<NodeKind, number>;
}

// =============================================================================
// Constants
// =============================================================================

export const MAX_NAME_LENGTH = 511;

// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/** Parent kinds each kind may live under */
const ALLOWED_PARENTS: Record<NodeKind, readonly NodeKind[]> = {
  model: [],
  table: ['model'],
  column: ['table'],
  measure: ['table'],
  relationship: ['model'],
  hierarchy: ['table'],
  perspective: ['model'],
  role: ['model'],
  annotation: ['model', 'table', 'column', 'measure', 'relationship', 'hierarchy', 'perspective', 'role'],
};

const PERSPECTIVE_MEMBER_KINDS: readonly NodeKind[] = ['table', 'column', 'measure', 'hierarchy'];

export function nameKey(name: string): string {
  return name.toLowerCase();
}

// =============================================================================
// ObjectGraph Class
// =============================================================================

export class ObjectGraph {
  // ===========================================================================
  // Internal State
  // ===========================================================================

  /** Map: id → node */
  private nodes: Map<NodeId, ModelNode> = new Map();

  /** Map: id → ordered child ids */
  private children: Map<NodeId, NodeId[]> = new Map();

  private listeners = new Set<GraphListener>();

  private nextId: () => NodeId;

  private root: ModelRootNode;

  constructor(modelName: string = 'Model', idFactory: () => NodeId = createNodeIdFactory()) {
    this.nextId = idFactory;
    this.root = this.createRoot(modelName);
  }

  private createRoot(modelName: string): ModelRootNode {
    this.checkNameFormat(modelName);
    const root: ModelRootNode = {
      id: this.nextId(),
      kind: 'model',
      name: modelName,
      parent: null,
      description: '',
      culture: 'en-US',
    };
    this.nodes.set(root.id, root);
    this.children.set(root.id, []);
    return root;
  }

  /**
   * Drop every node and start over with an empty model root.
   * Ids keep counting so ids from before the reset are never reused.
   */
  reset(modelName: string = 'Model'): void {
    this.nodes.clear();
    this.children.clear();
    this.root = this.createRoot(modelName);
  }

  // ===========================================================================
  // Subscription
  // ===========================================================================

  subscribe(listener: GraphListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(change: GraphChange): void {
    for (const listener of this.listeners) {
      listener(change);
    }
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  createId(): NodeId {
    return this.nextId();
  }

  getRoot(): ModelRootNode {
    return this.root;
  }

  has(id: string): boolean {
    return isNodeId(id) && this.nodes.has(id);
  }

  get(id: NodeId): ModelNode | undefined {
    return this.nodes.get(id);
  }

  /**
   * @throws NodeNotFoundError
   */
  require(id: string): ModelNode {
    const node = isNodeId(id) ? this.nodes.get(id) : undefined;
    if (!node) {
      throw new NodeNotFoundError(id);
    }
    return node;
  }

  getChildren(id: NodeId, kind?: NodeKind): ModelNode[] {
    const result: ModelNode[] = [];
    for (const childId of this.children.get(id) ?? []) {
      const child = this.nodes.get(childId);
      if (child && (kind === undefined || child.kind === kind)) {
        result.push(child);
      }
    }
    return result;
  }

  getChildIndex(id: NodeId): number {
    const node = this.require(id);
    if (node.parent === null) return 0;
    return (this.children.get(node.parent) ?? []).indexOf(id);
  }

  /**
   * Node and all descendants in pre-order.
   */
  getSubtree(id: NodeId): ModelNode[] {
    const result: ModelNode[] = [];
    const visit = (nodeId: NodeId): void => {
      const node = this.nodes.get(nodeId);
      if (!node) return;
      result.push(node);
      for (const childId of this.children.get(nodeId) ?? []) {
        visit(childId);
      }
    };
    visit(id);
    return result;
  }

  /**
   * Every node in pre-order from the root.
   */
  all(): ModelNode[] {
    return this.getSubtree(this.root.id);
  }

  tables(): TableNode[] {
    const result: TableNode[] = [];
    for (const child of this.getChildren(this.root.id)) {
      if (child.kind === 'table') result.push(child);
    }
    return result;
  }

  /**
   * Nearest table at or above the node.
   */
  getHostTable(id: NodeId): TableNode | null {
    let current = this.nodes.get(id);
    while (current) {
      if (current.kind === 'table') return current;
      current = current.parent === null ? undefined : this.nodes.get(current.parent);
    }
    return null;
  }

  isDescendantOf(id: NodeId, ancestor: NodeId): boolean {
    let current = this.nodes.get(id);
    while (current && current.parent !== null) {
      if (current.parent === ancestor) return true;
      current = this.nodes.get(current.parent);
    }
    return false;
  }

  // ===========================================================================
  // Name Lookup (case-insensitive)
  // ===========================================================================

  findChild(parent: NodeId, kind: NodeKind, name: string): ModelNode | undefined {
    const key = nameKey(name);
    return this.getChildren(parent, kind).find(child => nameKey(child.name) === key);
  }

  findTable(name: string): TableNode | undefined {
    const key = nameKey(name);
    return this.tables().find(table => nameKey(table.name) === key);
  }

  /**
   * Column or measure of a table.
   */
  findTableMember(table: NodeId, name: string): ColumnNode | MeasureNode | undefined {
    const key = nameKey(name);
    for (const child of this.getChildren(table)) {
      if ((child.kind === 'column' || child.kind === 'measure') && nameKey(child.name) === key) {
        return child;
      }
    }
    return undefined;
  }

  /**
   * Measure anywhere in the model.
   */
  findMeasure(name: string): MeasureNode | undefined {
    const key = nameKey(name);
    for (const table of this.tables()) {
      for (const child of this.getChildren(table.id, 'measure')) {
        if (child.kind === 'measure' && nameKey(child.name) === key) {
          return child;
        }
      }
    }
    return undefined;
  }

  // ===========================================================================
  // Naming Scopes
  // ===========================================================================

  /**
   * Find a node that would collide with `name` for a node of `kind` placed
   * under `parent`.
   *
   * Scopes:
   * - same kind, same parent
   * - columns and measures of one table share a scope
   * - measures are unique across the model
   */
  findNameConflict(
    kind: NodeKind,
    parent: NodeId | null,
    name: string,
    self?: NodeId
  ): NameConflict | null {
    const key = nameKey(name);
    const matches = (node: ModelNode): boolean => node.id !== self && nameKey(node.name) === key;

    if (parent !== null) {
      for (const sibling of this.getChildren(parent)) {
        if (!matches(sibling)) continue;
        if (sibling.kind === kind) {
          return { node: sibling, scope: kind };
        }
        const sharedScope =
          (kind === 'column' || kind === 'measure') &&
          (sibling.kind === 'column' || sibling.kind === 'measure');
        if (sharedScope) {
          return { node: sibling, scope: `${sibling.kind} in this table` };
        }
      }
    }

    if (kind === 'measure') {
      const measure = this.findMeasure(name);
      if (measure && measure.id !== self) {
        return { node: measure, scope: 'measure in the model' };
      }
    }

    return null;
  }

  /**
   * @throws InvalidValueError for malformed names
   * @throws NameConflictError for collisions
   */
  validateName(kind: NodeKind, parent: NodeId | null, name: string, self?: NodeId): void {
    this.checkNameFormat(name);
    const conflict = this.findNameConflict(kind, parent, name, self);
    if (conflict) {
      throw new NameConflictError(name, conflict.node.id, conflict.scope);
    }
  }

  /**
   * First free name of the form "Base", "Base 1", "Base 2", ...
   */
  uniqueName(kind: NodeKind, parent: NodeId, base: string): string {
    if (!this.findNameConflict(kind, parent, base)) return base;
    let suffix = 1;
    while (this.findNameConflict(kind, parent, `${base} ${suffix}`)) {
      suffix++;
    }
    return `${base} ${suffix}`;
  }

  /**
   * @throws InvalidMoveError if `kind` cannot live under `parent`
   */
  validateParent(kind: NodeKind, parent: ModelNode): void {
    if (!ALLOWED_PARENTS[kind].includes(parent.kind)) {
      throw new InvalidMoveError(`A ${kind} cannot be placed under a ${parent.kind}`);
    }
  }

  private checkNameFormat(name: string): void {
    if (name.trim() === '') {
      throw new InvalidValueError('name', 'must not be empty');
    }
    if (name.length > MAX_NAME_LENGTH) {
      throw new InvalidValueError('name', `must not exceed ${MAX_NAME_LENGTH} characters`);
    }
    if (CONTROL_CHARS.test(name)) {
      throw new InvalidValueError('name', 'must not contain control characters');
    }
  }

  // ===========================================================================
  // Property Validation
  // ===========================================================================

  /**
   * Validate a value for a property of a node and return it narrowed.
   *
   * @throws InvalidValueError
   */
  validateProperty(node: ModelNode, property: PropertyName, value: unknown): PropertyValue {
    if (!PROPERTY_KINDS[property].includes(node.kind)) {
      throw new InvalidValueError(property, `does not apply to a ${node.kind}`);
    }

    switch (property) {
      case 'name': {
        const name = expectString(property, value);
        this.checkNameFormat(name);
        return name;
      }
      case 'parent':
        throw new InvalidValueError(property, 'parent changes are moves');
      case 'sourceColumn':
        if (node.kind !== 'column' || node.columnType !== 'data') {
          throw new InvalidValueError(property, 'applies to data columns only');
        }
        return expectString(property, value);
      case 'expression':
        if (!hasExpression(node)) {
          throw new InvalidValueError(property, 'applies to measures and calculated columns only');
        }
        return expectString(property, value);
      case 'description':
      case 'culture':
      case 'formatString':
      case 'displayFolder':
      case 'value':
        return expectString(property, value);
      case 'isHidden':
      case 'isActive':
        return expectBoolean(property, value);
      case 'dataType':
        return expectOneOf(property, value, DATA_TYPES);
      case 'crossFilter':
        return expectOneOf(property, value, CROSS_FILTERS);
      case 'modelPermission':
        return expectOneOf(property, value, MODEL_PERMISSIONS);
      case 'fromColumn':
      case 'toColumn': {
        const id = this.expectNodeId(property, value, ['column']);
        const other = property === 'fromColumn'
          ? (node.kind === 'relationship' ? node.toColumn : null)
          : (node.kind === 'relationship' ? node.fromColumn : null);
        if (other !== null && this.nodes.has(other)) {
          this.checkRelationshipEnds(property, id, other);
        }
        return id;
      }
      case 'levels': {
        const ids = this.expectNodeIds(property, value, ['column']);
        const table = node.parent === null ? null : this.getHostTable(node.parent);
        for (const id of ids) {
          if (this.getHostTable(id)?.id !== table?.id) {
            throw new InvalidValueError(property, `column ${id} belongs to another table`);
          }
        }
        return ids;
      }
      case 'members':
        return this.expectNodeIds(property, value, PERSPECTIVE_MEMBER_KINDS);
    }
  }

  /**
   * Validate every field of a node that is not yet in the graph.
   *
   * @throws InvalidValueError
   */
  validateNode(node: ModelNode): void {
    this.checkNameFormat(node.name);
    for (const property of PROPERTY_NAMES) {
      if (property === 'name' || property === 'parent') continue;
      if (!PROPERTY_KINDS[property].includes(node.kind)) continue;
      const value: unknown = Reflect.get(node, property);
      if (value === undefined) continue;
      this.validateProperty(node, property, value);
    }
  }

  /**
   * @throws InvalidValueError if both ends are in the same table
   */
  checkRelationshipEnds(property: string, a: NodeId, b: NodeId): void {
    const tableA = this.getHostTable(a);
    const tableB = this.getHostTable(b);
    if (tableA && tableB && tableA.id === tableB.id) {
      throw new InvalidValueError(property, 'relationship ends must be in different tables');
    }
  }

  private expectNodeId(property: string, value: unknown, kinds: readonly NodeKind[]): NodeId {
    if (typeof value !== 'string' || !isNodeId(value)) {
      throw new InvalidValueError(property, 'expected a node id');
    }
    const target = this.nodes.get(value);
    if (!target) {
      throw new InvalidValueError(property, `node ${value} does not exist`);
    }
    if (!kinds.includes(target.kind)) {
      throw new InvalidValueError(property, `expected ${kinds.join(' or ')}, got ${target.kind}`);
    }
    return value;
  }

  private expectNodeIds(property: string, value: unknown, kinds: readonly NodeKind[]): NodeId[] {
    if (!Array.isArray(value)) {
      throw new InvalidValueError(property, 'expected a list of node ids');
    }
    const ids: NodeId[] = [];
    for (const item of value) {
      const id = this.expectNodeId(property, item, kinds);
      if (ids.includes(id)) {
        throw new InvalidValueError(property, `duplicate entry ${id}`);
      }
      ids.push(id);
    }
    return ids;
  }

  // ===========================================================================
  // Mutations (no naming-scope checks; see module docs)
  // ===========================================================================

  /**
   * Read a property generically.
   */
  readProperty(id: NodeId, property: PropertyName): PropertyValue {
    const node = this.require(id);
    if (property === 'parent') return node.parent;
    const value: unknown = Reflect.get(node, property);
    if (value === undefined) {
      throw new InvalidValueError(property, `does not apply to a ${node.kind}`);
    }
    if (typeof value === 'string' || typeof value === 'boolean' || value === null) {
      return value;
    }
    if (Array.isArray(value)) {
      const ids: NodeId[] = [];
      for (const item of value) {
        if (typeof item === 'string' && isNodeId(item)) ids.push(item);
      }
      return ids;
    }
    throw new InvalidValueError(property, 'unsupported stored value');
  }

  /**
   * Validate and store a property value, then notify.
   *
   * @returns The previous value
   * @throws InvalidValueError
   */
  writeProperty(id: NodeId, property: PropertyName, value: unknown): PropertyValue {
    const node = this.require(id);
    const newValue = this.validateProperty(node, property, value);
    const oldValue = this.readProperty(id, property);
    if (propertyValuesEqual(oldValue, newValue)) {
      return oldValue;
    }

    Reflect.set(node, property, Array.isArray(newValue) ? [...newValue] : newValue);

    this.emit({ type: 'propertyChanged', node, property, oldValue, newValue });
    return oldValue;
  }

  /**
   * Re-parent a node.
   *
   * @param index - Position among the new parent's children (default: append)
   * @throws InvalidMoveError
   */
  moveNode(id: NodeId, newParent: NodeId, index?: number): void {
    const node = this.require(id);
    const parent = this.require(newParent);
    this.validateParent(node.kind, parent);
    if (node.parent === null) {
      throw new InvalidMoveError('The model root cannot be moved');
    }
    if (newParent === id || this.isDescendantOf(newParent, id)) {
      throw new InvalidMoveError('A node cannot be moved under itself');
    }

    const oldParent = node.parent;
    this.unlinkChild(oldParent, id);
    this.linkChild(newParent, id, index);
    node.parent = newParent;

    this.emit({
      type: 'propertyChanged',
      node,
      property: 'parent',
      oldValue: oldParent,
      newValue: newParent,
    });
  }

  /**
   * Insert a detached subtree (new node or one previously removed).
   *
   * @throws InvalidValueError if an id is already present
   * @throws InvalidMoveError if the parent is missing or of the wrong kind
   */
  insertSubtree(snapshot: NodeSnapshot): void {
    const inserted: ModelNode[] = [];

    const insert = (entry: NodeSnapshot): void => {
      const node = structuredClone(entry.node);
      if (this.nodes.has(node.id)) {
        throw new InvalidValueError('id', `node ${node.id} already exists`);
      }
      if (node.parent === null || !this.nodes.has(node.parent)) {
        throw new InvalidMoveError(`Parent of ${node.id} does not exist`);
      }
      this.validateParent(node.kind, this.require(node.parent));

      this.nodes.set(node.id, node);
      this.children.set(node.id, []);
      this.linkChild(node.parent, node.id, entry.index);
      inserted.push(node);

      for (const child of entry.children) {
        insert(child);
      }
    };

    insert(snapshot);
    this.emit({ type: 'nodeAdded', node: inserted[0], subtree: inserted });
  }

  insertNode(node: ModelNode, index?: number): void {
    this.insertSubtree({
      node,
      index: index ?? this.children.get(node.parent ?? this.root.id)?.length ?? 0,
      children: [],
    });
  }

  /**
   * Remove a node and its descendants.
   *
   * @returns Snapshot that re-inserts the subtree at the same position
   * @throws InvalidMoveError for the model root
   */
  removeSubtree(id: NodeId): NodeSnapshot {
    const node = this.require(id);
    if (node.parent === null) {
      throw new InvalidMoveError('The model root cannot be removed');
    }

    const snapshot = this.captureSnapshot(id);
    const removed = this.getSubtree(id);

    this.unlinkChild(node.parent, id);
    for (const entry of removed) {
      this.nodes.delete(entry.id);
      this.children.delete(entry.id);
    }

    this.emit({ type: 'nodeRemoved', node, subtree: removed });
    return snapshot;
  }

  /**
   * Deep copy of a subtree with child positions.
   */
  captureSnapshot(id: NodeId): NodeSnapshot {
    const node = this.require(id);
    const childIds = this.children.get(id) ?? [];
    return {
      node: structuredClone(node),
      index: this.getChildIndex(id),
      children: childIds.map(childId => this.captureSnapshot(childId)),
    };
  }

  private linkChild(parent: NodeId, child: NodeId, index?: number): void {
    const list = this.children.get(parent);
    if (!list) {
      throw new NodeNotFoundError(parent);
    }
    const at = index === undefined ? list.length : Math.max(0, Math.min(index, list.length));
    list.splice(at, 0, child);
  }

  private unlinkChild(parent: NodeId, child: NodeId): void {
    const list = this.children.get(parent);
    if (!list) return;
    const at = list.indexOf(child);
    if (at >= 0) list.splice(at, 1);
  }

  // ===========================================================================
  // Statistics
  // ===========================================================================

  getStats(): GraphStats {
    const byKind: Record<NodeKind, number> = {
      model: 0,
      table: 0,
      column: 0,
      measure: 0,
      relationship: 0,
      hierarchy: 0,
      perspective: 0,
      role: 0,
      annotation: 0,
    };
    for (const node of this.nodes.values()) {
      byKind[node.kind]++;
    }
    return { nodeCount: this.nodes.size, byKind };
  }
}

// =============================================================================
// Value Helpers
// =============================================================================

function expectString(property: string, value: unknown): string {
  if (typeof value !== 'string') {
    throw new InvalidValueError(property, 'expected text');
  }
  return value;
}

function expectBoolean(property: string, value: unknown): boolean {
  if (typeof value !== 'boolean') {
    throw new InvalidValueError(property, 'expected true or false');
  }
  return value;
}

function expectOneOf<T extends string>(property: string, value: unknown, allowed: readonly T[]): T {
  const match = allowed.find(option => option === value);
  if (match === undefined) {
    throw new InvalidValueError(property, `expected one of ${allowed.join(', ')}`);
  }
  return match;
}
