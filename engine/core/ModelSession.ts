/**
 * ModelGraph Engine - Model Session
 *
 * Central orchestrator for one modeling session. Owns exactly one of each:
 * - ObjectGraph for node storage and validation
 * - UndoRedoManager for transactional history
 * - DependencyIndex for formula references
 * - FixupEngine for rename/move cascades
 *
 * Every external mutation goes through this class. A mutation is validated
 * first, applied to the graph, then recorded; renames and moves additionally
 * rewrite dependent formulas inside the same transaction.
 */

import {
  hasExpression,
  isPropertyName,
  propertyValuesEqual,
  type CalculatedColumnNode,
  type CrossFilter,
  type DataColumnNode,
  type DataType,
  type MeasureNode,
  type ModelNode,
  type ModelPermission,
  type ModelRootNode,
  type NodeKind,
  type PropertyName,
  type PropertyValue,
} from './types/index.js';
import {
  HistoryInvariantError,
  InvalidMoveError,
  InvalidValueError,
} from './types/errors.js';
import { ObjectGraph, type GraphChange, type GraphStats } from './model/ObjectGraph.js';
import type { NodeId } from './model/NodeId.js';
import {
  UndoRedoManager,
  type HistoryEntry,
  type UndoRedoState,
} from './history/UndoRedoManager.js';
import {
  AddNodeAction,
  MoveNodeAction,
  RemoveNodeAction,
  SetPropertyAction,
} from './history/ModelActions.js';
import {
  DependencyIndex,
  type DependencyIndexStats,
  type ExpressionDiagnostic,
  type ReferenceSite,
} from './formula/DependencyIndex.js';
import { tokenizeFormula, type Tokenizer } from './formula/Tokenizer.js';
import { qualifiedName, quoteTableName } from './formula/ReferenceText.js';
import { FixupEngine, type FixupReport } from './fixup/FixupEngine.js';
import type {
  AnnotationDefinition,
  ColumnDefinition,
  HierarchyDefinition,
  MeasureDefinition,
  ModelDefinition,
  TableDefinition,
} from './definition/ModelDefinition.js';

// =============================================================================
// Config & Events
// =============================================================================

export interface ModelSessionConfig {
  /** Name of the model root (default: "Model") */
  modelName?: string;
  /** Maximum undo depth (default: 100) */
  maxHistory?: number;
  /** Formula tokenizer (default: DAX-style tokenizeFormula) */
  tokenizer?: Tokenizer;
}

export interface ModelSessionEvents {
  /** Called for every graph change, including replayed ones */
  onChange?: (change: GraphChange, replay: boolean) => void;
  /** Called when undo/redo state changes */
  onHistoryChange?: (state: UndoRedoState) => void;
  /** Called after a rename or move finished its fixups */
  onFixup?: (report: FixupReport) => void;
}

// =============================================================================
// Add Options
// =============================================================================

interface CommonOptions {
  name?: string;
  description?: string;
}

export interface TableOptions extends CommonOptions {
  isHidden?: boolean;
}

export interface DataColumnOptions extends CommonOptions {
  dataType?: DataType;
  sourceColumn?: string;
  isHidden?: boolean;
}

export interface CalculatedColumnOptions extends CommonOptions {
  expression?: string;
  dataType?: DataType;
  isHidden?: boolean;
}

export interface MeasureOptions extends CommonOptions {
  expression?: string;
  formatString?: string;
  displayFolder?: string;
  isHidden?: boolean;
}

export interface RelationshipOptions extends CommonOptions {
  isActive?: boolean;
  crossFilter?: CrossFilter;
}

export interface HierarchyOptions extends CommonOptions {
  levels?: NodeId[];
  isHidden?: boolean;
}

export interface PerspectiveOptions extends CommonOptions {
  members?: NodeId[];
}

export interface RoleOptions extends CommonOptions {
  modelPermission?: ModelPermission;
}

export interface AnnotationOptions extends CommonOptions {
  value?: string;
}

export interface SessionStats {
  graph: GraphStats;
  index: DependencyIndexStats;
  history: UndoRedoState;
}

/**
 * Observable model state: every node in pre-order.
 */
export interface ModelSnapshot {
  nodes: ModelNode[];
}

const DEFAULT_NAMES: Record<Exclude<NodeKind, 'model'>, string> = {
  table: 'New Table',
  column: 'New Column',
  measure: 'New Measure',
  relationship: 'New Relationship',
  hierarchy: 'New Hierarchy',
  perspective: 'New Perspective',
  role: 'New Role',
  annotation: 'New Annotation',
};

/** `'Table'[Member]`, `Table[Member]`, `Table` or `[Member]` */
const PATH_PATTERN = /^(?:'((?:[^']|'')*)'|([^'[\]]+))?(?:\[((?:[^\]]|\]\])*)\])?$/;

const NAMED_KIND_PREFIX = /^(perspective|role|relationship):(.+)$/;

// =============================================================================
// ModelSession Class
// =============================================================================

export class ModelSession {
  // Core components
  private graph: ObjectGraph;
  private history: UndoRedoManager;
  private index: DependencyIndex;
  private fixups: FixupEngine;

  private config: Required<ModelSessionConfig>;

  private events: ModelSessionEvents = {};

  constructor(config: ModelSessionConfig = {}) {
    // Merge with defaults
    this.config = {
      modelName: config.modelName ?? 'Model',
      maxHistory: config.maxHistory ?? 100,
      tokenizer: config.tokenizer ?? tokenizeFormula,
    };

    this.graph = new ObjectGraph(this.config.modelName);
    this.history = new UndoRedoManager({ maxHistory: this.config.maxHistory });
    this.index = new DependencyIndex(this.graph, this.config.tokenizer);
    this.fixups = new FixupEngine(this.graph, this.index, this.history, this.config.tokenizer);

    this.setupInternalEvents();
  }

  // ===========================================================================
  // Event Setup
  // ===========================================================================

  private setupInternalEvents(): void {
    this.graph.subscribe(change => {
      this.events.onChange?.(change, this.history.isReplaying());
    });
    this.history.setEventHandlers({
      onStateChange: state => {
        this.events.onHistoryChange?.(state);
      },
    });
  }

  setEventHandlers(events: ModelSessionEvents): void {
    this.events = { ...this.events, ...events };
  }

  // ===========================================================================
  // History
  // ===========================================================================

  beginBatch(label: string): void {
    this.history.beginBatch(label);
  }

  endBatch(): void {
    this.history.endBatch();
  }

  /**
   * @returns false if there was nothing to undo
   */
  undo(): boolean {
    return this.history.undo() !== null;
  }

  /**
   * @returns false if there was nothing to redo
   */
  redo(): boolean {
    return this.history.redo() !== null;
  }

  canUndo(): boolean {
    return this.history.canUndo();
  }

  canRedo(): boolean {
    return this.history.canRedo();
  }

  getHistoryState(): UndoRedoState {
    return this.history.getState();
  }

  getUndoHistory(): HistoryEntry[] {
    return this.history.getUndoHistory();
  }

  getRedoHistory(): HistoryEntry[] {
    return this.history.getRedoHistory();
  }

  /**
   * Forget all history, keeping the model as it is.
   */
  clearHistory(): void {
    this.history.clear();
  }

  /**
   * Run `fn` inside one batch. The batch is always ended; an exception leaves
   * already-applied edits in place.
   */
  batch<T>(label: string, fn: () => T): T {
    this.beginBatch(label);
    try {
      return fn();
    } finally {
      this.endBatch();
    }
  }

  /**
   * Like batch(), but on an exception the partial transaction is undone
   * before the error propagates. Must not be nested in an open batch.
   */
  atomically<T>(label: string, fn: () => T): T {
    if (this.history.isInBatch()) {
      throw new HistoryInvariantError('atomically() cannot run inside an open batch');
    }

    this.beginBatch(label);
    let result: T;
    try {
      result = fn();
    } catch (error) {
      if (this.history.endBatch()) {
        this.history.undo();
      }
      throw error;
    }
    this.endBatch();
    return result;
  }

  // ===========================================================================
  // Rename & Move
  // ===========================================================================

  /**
   * Rename a node and rewrite every formula that references it.
   *
   * @throws NameConflictError, InvalidValueError
   */
  rename(id: NodeId, newName: string): FixupReport {
    this.assertWritable();
    const node = this.graph.require(id);
    if (node.name === newName) {
      return { target: node.id, phase: 'committed', rewritten: [], flagged: [] };
    }

    const report = this.batch(`Rename ${node.kind} '${node.name}' to '${newName}'`, () =>
      this.fixups.run({
        target: node.id,
        validate: () => this.graph.validateName(node.kind, node.parent, newName, node.id),
        apply: () => {
          this.recordProperty(node.id, 'name', newName);
        },
        write: (holder, text) => {
          this.recordProperty(holder, 'expression', text);
        },
      })
    );

    this.events.onFixup?.(report);
    return report;
  }

  /**
   * Move a measure to another table, or an annotation to another node.
   * Qualified references to a moved measure are rewritten.
   *
   * @throws InvalidMoveError, NameConflictError
   */
  move(id: NodeId, newParent: NodeId): FixupReport {
    this.assertWritable();
    const node = this.graph.require(id);
    const parent = this.graph.require(newParent);
    if (node.parent === parent.id) {
      return { target: node.id, phase: 'committed', rewritten: [], flagged: [] };
    }

    const report = this.batch(`Move ${node.kind} '${node.name}' to '${parent.name}'`, () =>
      this.fixups.run({
        target: node.id,
        validate: () => {
          const movable =
            (node.kind === 'measure' && parent.kind === 'table') ||
            (node.kind === 'annotation' && parent.kind !== 'annotation');
          if (!movable) {
            throw new InvalidMoveError(`A ${node.kind} cannot be moved to a ${parent.kind}`);
          }
          this.graph.validateParent(node.kind, parent);
          this.graph.validateName(node.kind, parent.id, node.name, node.id);
        },
        apply: () => this.recordMove(node.id, parent.id),
        write: (holder, text) => {
          this.recordProperty(holder, 'expression', text);
        },
      })
    );

    this.events.onFixup?.(report);
    return report;
  }

  // ===========================================================================
  // Property Writes
  // ===========================================================================

  /**
   * @returns false if the expression was unchanged
   * @throws InvalidValueError if the node holds no expression
   */
  setExpression(id: NodeId, expression: string): boolean {
    this.assertWritable();
    const node = this.graph.require(id);
    if (!hasExpression(node)) {
      throw new InvalidValueError('expression', `a ${node.kind} has no expression`);
    }
    return this.recordProperty(id, 'expression', expression);
  }

  /**
   * Generic property write. `name` routes to rename(), `parent` to move().
   *
   * @returns The fixup report for renames and moves, otherwise null
   */
  setProperty(id: NodeId, property: string, value: unknown): FixupReport | null {
    this.assertWritable();
    if (!isPropertyName(property)) {
      throw new InvalidValueError(property, 'unknown or read-only property');
    }

    switch (property) {
      case 'name':
        if (typeof value !== 'string') {
          throw new InvalidValueError(property, 'expected text');
        }
        return this.rename(id, value);
      case 'parent':
        if (typeof value !== 'string') {
          throw new InvalidValueError(property, 'expected a node id');
        }
        return this.move(id, this.graph.require(value).id);
      case 'expression':
        if (typeof value !== 'string') {
          throw new InvalidValueError(property, 'expected text');
        }
        this.setExpression(id, value);
        return null;
      default:
        this.recordProperty(id, property, value);
        return null;
    }
  }

  getProperty(id: NodeId, property: PropertyName): PropertyValue {
    return this.graph.readProperty(id, property);
  }

  // ===========================================================================
  // Adding Nodes
  // ===========================================================================

  addTable(options: TableOptions = {}): NodeId {
    this.assertWritable();
    const root = this.graph.getRoot();
    return this.insert({
      id: this.graph.createId(),
      kind: 'table',
      name: options.name ?? this.graph.uniqueName('table', root.id, DEFAULT_NAMES.table),
      parent: root.id,
      description: options.description ?? '',
      isHidden: options.isHidden ?? false,
    });
  }

  addDataColumn(table: NodeId, options: DataColumnOptions = {}): NodeId {
    this.assertWritable();
    const name = options.name ?? this.graph.uniqueName('column', table, DEFAULT_NAMES.column);
    const column: DataColumnNode = {
      id: this.graph.createId(),
      kind: 'column',
      columnType: 'data',
      name,
      parent: table,
      description: options.description ?? '',
      dataType: options.dataType ?? 'string',
      isHidden: options.isHidden ?? false,
      sourceColumn: options.sourceColumn ?? name,
    };
    return this.insert(column);
  }

  addCalculatedColumn(table: NodeId, options: CalculatedColumnOptions = {}): NodeId {
    this.assertWritable();
    const column: CalculatedColumnNode = {
      id: this.graph.createId(),
      kind: 'column',
      columnType: 'calculated',
      name: options.name ?? this.graph.uniqueName('column', table, 'New Calculated Column'),
      parent: table,
      description: options.description ?? '',
      dataType: options.dataType ?? 'string',
      isHidden: options.isHidden ?? false,
      expression: options.expression ?? '',
    };
    return this.insert(column);
  }

  addMeasure(table: NodeId, options: MeasureOptions = {}): NodeId {
    this.assertWritable();
    const measure: MeasureNode = {
      id: this.graph.createId(),
      kind: 'measure',
      name: options.name ?? this.graph.uniqueName('measure', table, DEFAULT_NAMES.measure),
      parent: table,
      description: options.description ?? '',
      expression: options.expression ?? '',
      formatString: options.formatString ?? '',
      displayFolder: options.displayFolder ?? '',
      isHidden: options.isHidden ?? false,
    };
    return this.insert(measure);
  }

  addRelationship(fromColumn: NodeId, toColumn: NodeId, options: RelationshipOptions = {}): NodeId {
    this.assertWritable();
    const root = this.graph.getRoot();
    return this.insert({
      id: this.graph.createId(),
      kind: 'relationship',
      name: options.name ?? this.graph.uniqueName('relationship', root.id, DEFAULT_NAMES.relationship),
      parent: root.id,
      description: options.description ?? '',
      fromColumn,
      toColumn,
      isActive: options.isActive ?? true,
      crossFilter: options.crossFilter ?? 'oneDirection',
    });
  }

  addHierarchy(table: NodeId, options: HierarchyOptions = {}): NodeId {
    this.assertWritable();
    return this.insert({
      id: this.graph.createId(),
      kind: 'hierarchy',
      name: options.name ?? this.graph.uniqueName('hierarchy', table, DEFAULT_NAMES.hierarchy),
      parent: table,
      description: options.description ?? '',
      levels: options.levels ?? [],
      isHidden: options.isHidden ?? false,
    });
  }

  addPerspective(options: PerspectiveOptions = {}): NodeId {
    this.assertWritable();
    const root = this.graph.getRoot();
    return this.insert({
      id: this.graph.createId(),
      kind: 'perspective',
      name: options.name ?? this.graph.uniqueName('perspective', root.id, DEFAULT_NAMES.perspective),
      parent: root.id,
      description: options.description ?? '',
      members: options.members ?? [],
    });
  }

  addRole(options: RoleOptions = {}): NodeId {
    this.assertWritable();
    const root = this.graph.getRoot();
    return this.insert({
      id: this.graph.createId(),
      kind: 'role',
      name: options.name ?? this.graph.uniqueName('role', root.id, DEFAULT_NAMES.role),
      parent: root.id,
      description: options.description ?? '',
      modelPermission: options.modelPermission ?? 'read',
    });
  }

  addAnnotation(parent: NodeId, options: AnnotationOptions = {}): NodeId {
    this.assertWritable();
    return this.insert({
      id: this.graph.createId(),
      kind: 'annotation',
      name: options.name ?? this.graph.uniqueName('annotation', parent, DEFAULT_NAMES.annotation),
      parent,
      description: options.description ?? '',
      value: options.value ?? '',
    });
  }

  // ===========================================================================
  // Removing Nodes
  // ===========================================================================

  /**
   * Remove a node and its subtree. In the same transaction, relationships on
   * removed columns are removed and hierarchy levels and perspective members
   * pointing at removed nodes are dropped.
   *
   * @throws InvalidMoveError for the model root
   */
  removeNode(id: NodeId): void {
    this.assertWritable();
    const node = this.graph.require(id);
    if (node.parent === null) {
      throw new InvalidMoveError('The model root cannot be removed');
    }

    const removed = new Set(this.graph.getSubtree(id).map(n => n.id));

    this.batch(`Remove ${node.kind} '${node.name}'`, () => {
      for (const other of this.graph.all()) {
        if (removed.has(other.id)) continue;

        if (other.kind === 'relationship') {
          if (removed.has(other.fromColumn) || removed.has(other.toColumn)) {
            this.recordRemove(other.id);
          }
        } else if (other.kind === 'hierarchy') {
          const levels = other.levels.filter(level => !removed.has(level));
          if (levels.length !== other.levels.length) {
            this.recordProperty(other.id, 'levels', levels);
          }
        } else if (other.kind === 'perspective') {
          const members = other.members.filter(member => !removed.has(member));
          if (members.length !== other.members.length) {
            this.recordProperty(other.id, 'members', members);
          }
        }
      }

      this.recordRemove(id);
    });
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  getModel(): ModelRootNode {
    return structuredClone(this.graph.getRoot());
  }

  /**
   * Copy of a node.
   *
   * @throws NodeNotFoundError
   */
  getNode(id: NodeId): ModelNode {
    return structuredClone(this.graph.require(id));
  }

  hasNode(id: string): boolean {
    return this.graph.has(id);
  }

  getChildren(id: NodeId, kind?: NodeKind): ModelNode[] {
    return this.graph.getChildren(id, kind).map(node => structuredClone(node));
  }

  /**
   * Resolve a path to a node id (case-insensitive).
   *
   * Forms: `Table`, `'My Table'`, `'Table'[Member]`, `Table[Member]`,
   * `[Measure]`, `perspective:Name`, `role:Name`, `relationship:Name`.
   * Members are columns, measures and hierarchies.
   */
  findByPath(path: string): NodeId | undefined {
    const trimmed = path.trim();
    const root = this.graph.getRoot();

    const named = NAMED_KIND_PREFIX.exec(trimmed);
    if (named) {
      const kind = named[1] === 'perspective' ? 'perspective' : named[1] === 'role' ? 'role' : 'relationship';
      return this.graph.findChild(root.id, kind, named[2])?.id;
    }

    const match = PATH_PATTERN.exec(trimmed);
    if (!match) return undefined;

    const [, quotedTable, bareTable, member] = match;
    const tableName = quotedTable !== undefined ? quotedTable.replace(/''/g, "'") : bareTable?.trim();
    const memberName = member?.replace(/\]\]/g, ']');

    if (tableName === undefined) {
      return memberName === undefined ? undefined : this.graph.findMeasure(memberName)?.id;
    }

    const table = this.graph.findTable(tableName);
    if (!table) return undefined;
    if (memberName === undefined) return table.id;

    return (
      this.graph.findTableMember(table.id, memberName) ??
      this.graph.findChild(table.id, 'hierarchy', memberName)
    )?.id;
  }

  /**
   * Display path of a node. Paths of tables, columns, measures, hierarchies,
   * perspectives, roles and relationships round-trip through findByPath().
   */
  getPath(id: NodeId): string {
    const node = this.graph.require(id);
    switch (node.kind) {
      case 'model':
        return node.name;
      case 'table':
        return quoteTableName(node.name);
      case 'column':
      case 'measure':
      case 'hierarchy': {
        const table = this.graph.getHostTable(node.id);
        return table ? qualifiedName(table.name, node.name) : node.name;
      }
      case 'perspective':
      case 'role':
      case 'relationship':
        return `${node.kind}:${node.name}`;
      case 'annotation':
        return node.parent === null ? node.name : `${this.getPath(node.parent)}@${node.name}`;
    }
  }

  getDependents(id: NodeId): NodeId[] {
    return this.index.getDependents(id);
  }

  getAllDependents(id: NodeId): NodeId[] {
    return this.index.getAllDependents(id);
  }

  getPrecedents(id: NodeId): NodeId[] {
    return this.index.getPrecedents(id);
  }

  getReferenceSites(holder: NodeId, target?: NodeId): ReferenceSite[] {
    return this.index.getReferenceSites(holder, target);
  }

  getDiagnostics(): ExpressionDiagnostic[] {
    return this.index.getDiagnostics();
  }

  /**
   * Deterministic, JSON-serializable copy of every node.
   */
  snapshot(): ModelSnapshot {
    return { nodes: this.graph.all().map(node => structuredClone(node)) };
  }

  getStats(): SessionStats {
    return {
      graph: this.graph.getStats(),
      index: this.index.getStats(),
      history: this.history.getState(),
    };
  }

  /**
   * Export the model in definition form (names and paths, no ids).
   */
  toDefinition(): ModelDefinition {
    const root = this.graph.getRoot();
    const definition: ModelDefinition = {
      name: root.name,
      description: root.description,
      culture: root.culture,
      tables: [],
      relationships: [],
      perspectives: [],
      roles: [],
      annotations: this.annotationsOf(root.id),
    };

    for (const child of this.graph.getChildren(root.id)) {
      switch (child.kind) {
        case 'table':
          definition.tables.push(this.tableDefinition(child.id));
          break;
        case 'relationship':
          definition.relationships.push({
            name: child.name,
            from: this.getPath(child.fromColumn),
            to: this.getPath(child.toColumn),
            isActive: child.isActive,
            crossFilter: child.crossFilter,
            description: child.description,
            annotations: this.annotationsOf(child.id),
          });
          break;
        case 'perspective':
          definition.perspectives.push({
            name: child.name,
            members: child.members.map(member => this.getPath(member)),
            description: child.description,
            annotations: this.annotationsOf(child.id),
          });
          break;
        case 'role':
          definition.roles.push({
            name: child.name,
            modelPermission: child.modelPermission,
            description: child.description,
            annotations: this.annotationsOf(child.id),
          });
          break;
      }
    }

    return definition;
  }

  private tableDefinition(id: NodeId): TableDefinition {
    const table = this.graph.require(id);
    const columns: ColumnDefinition[] = [];
    const measures: MeasureDefinition[] = [];
    const hierarchies: HierarchyDefinition[] = [];

    for (const member of this.graph.getChildren(id)) {
      const annotations = this.annotationsOf(member.id);
      if (member.kind === 'column') {
        columns.push({
          name: member.name,
          type: member.columnType,
          dataType: member.dataType,
          sourceColumn: member.columnType === 'data' ? member.sourceColumn : undefined,
          expression: member.columnType === 'calculated' ? member.expression : undefined,
          isHidden: member.isHidden,
          description: member.description,
          annotations,
        });
      } else if (member.kind === 'measure') {
        measures.push({
          name: member.name,
          expression: member.expression,
          formatString: member.formatString,
          displayFolder: member.displayFolder,
          isHidden: member.isHidden,
          description: member.description,
          annotations,
        });
      } else if (member.kind === 'hierarchy') {
        hierarchies.push({
          name: member.name,
          levels: member.levels.map(level => this.graph.require(level).name),
          isHidden: member.isHidden,
          description: member.description,
          annotations,
        });
      }
    }

    return {
      name: table.name,
      isHidden: table.kind === 'table' ? table.isHidden : false,
      description: table.description,
      columns,
      measures,
      hierarchies,
      annotations: this.annotationsOf(id),
    };
  }

  private annotationsOf(id: NodeId): AnnotationDefinition[] {
    const result: AnnotationDefinition[] = [];
    for (const child of this.graph.getChildren(id, 'annotation')) {
      if (child.kind === 'annotation') {
        result.push({ name: child.name, value: child.value });
      }
    }
    return result;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Clear the model to an empty root and forget all history.
   */
  reset(modelName: string = this.config.modelName): void {
    this.assertWritable();
    if (this.history.isInBatch()) {
      throw new HistoryInvariantError('Cannot reset while a batch is open');
    }
    this.history.clear();
    this.graph.reset(modelName);
    this.index.rebuild();
  }

  dispose(): void {
    this.index.dispose();
  }

  // ===========================================================================
  // Recording Helpers
  // ===========================================================================

  private assertWritable(): void {
    if (this.history.isReplaying()) {
      throw new HistoryInvariantError('The model cannot be modified during undo/redo');
    }
  }

  /**
   * Validate and write one property, then record it.
   *
   * @returns false if the value was unchanged (nothing recorded)
   */
  private recordProperty(id: NodeId, property: PropertyName, value: unknown): boolean {
    const node = this.graph.require(id);
    const oldValue = this.graph.writeProperty(node.id, property, value);
    const newValue = this.graph.readProperty(node.id, property);
    if (propertyValuesEqual(oldValue, newValue)) {
      return false;
    }
    this.history.add(
      new SetPropertyAction(this.graph, node.id, property, oldValue, newValue,
        `Set ${property} of ${node.kind} '${node.name}'`)
    );
    return true;
  }

  private insert(node: ModelNode): NodeId {
    if (node.parent === null) {
      throw new InvalidMoveError('Only the model root has no parent');
    }
    const parent = this.graph.require(node.parent);
    this.graph.validateParent(node.kind, parent);
    this.graph.validateName(node.kind, parent.id, node.name);
    this.graph.validateNode(node);

    this.graph.insertNode(node);
    this.history.add(new AddNodeAction(this.graph, this.graph.captureSnapshot(node.id)));
    return node.id;
  }

  private recordRemove(id: NodeId): void {
    const snapshot = this.graph.removeSubtree(id);
    this.history.add(new RemoveNodeAction(this.graph, snapshot));
  }

  private recordMove(id: NodeId, newParent: NodeId): void {
    const node = this.graph.require(id);
    if (node.parent === null) {
      throw new InvalidMoveError('The model root cannot be moved');
    }
    const from = { parent: node.parent, index: this.graph.getChildIndex(id) };
    this.graph.moveNode(id, newParent);
    const to = { parent: newParent, index: this.graph.getChildIndex(id) };
    this.history.add(
      new MoveNodeAction(this.graph, id, from, to, `Move ${node.kind} '${node.name}'`)
    );
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

export function createModelSession(config?: ModelSessionConfig): ModelSession {
  return new ModelSession(config);
}
