/**
 * ModelGraph Engine - Core Type Definitions
 * Semantic model node types
 */

import type { NodeId } from '../model/NodeId.js';

export type { NodeId } from '../model/NodeId.js';

// ============================================================================
// Node Kinds
// ============================================================================

export type NodeKind =
  | 'model'
  | 'table'
  | 'column'
  | 'measure'
  | 'relationship'
  | 'hierarchy'
  | 'perspective'
  | 'role'
  | 'annotation';

export const NODE_KINDS: readonly NodeKind[] = [
  'model',
  'table',
  'column',
  'measure',
  'relationship',
  'hierarchy',
  'perspective',
  'role',
  'annotation',
];

export const DATA_TYPES = [
  'string',
  'int64',
  'double',
  'decimal',
  'boolean',
  'dateTime',
] as const;

export type DataType = (typeof DATA_TYPES)[number];

export type ColumnType = 'data' | 'calculated';

export const CROSS_FILTERS = ['oneDirection', 'bothDirections'] as const;

export type CrossFilter = (typeof CROSS_FILTERS)[number];

export const MODEL_PERMISSIONS = ['none', 'read', 'readRefresh', 'administrator'] as const;

export type ModelPermission = (typeof MODEL_PERMISSIONS)[number];

// ============================================================================
// Node Types
// ============================================================================

interface NodeBase {
  /** Stable identity, assigned at creation */
  readonly id: NodeId;
  /** Display name; unique within its naming scope */
  name: string;
  /** Owning node (null only for the model root) */
  parent: NodeId | null;
  description: string;
}

export interface ModelRootNode extends NodeBase {
  readonly kind: 'model';
  culture: string;
}

export interface TableNode extends NodeBase {
  readonly kind: 'table';
  isHidden: boolean;
}

export interface DataColumnNode extends NodeBase {
  readonly kind: 'column';
  readonly columnType: 'data';
  dataType: DataType;
  isHidden: boolean;
  /** Column name in the source query */
  sourceColumn: string;
}

export interface CalculatedColumnNode extends NodeBase {
  readonly kind: 'column';
  readonly columnType: 'calculated';
  dataType: DataType;
  isHidden: boolean;
  expression: string;
}

export type ColumnNode = DataColumnNode | CalculatedColumnNode;

export interface MeasureNode extends NodeBase {
  readonly kind: 'measure';
  expression: string;
  formatString: string;
  displayFolder: string;
  isHidden: boolean;
}

export interface RelationshipNode extends NodeBase {
  readonly kind: 'relationship';
  fromColumn: NodeId;
  toColumn: NodeId;
  isActive: boolean;
  crossFilter: CrossFilter;
}

export interface HierarchyNode extends NodeBase {
  readonly kind: 'hierarchy';
  /** Ordered column ids of the owning table */
  levels: readonly NodeId[];
  isHidden: boolean;
}

export interface PerspectiveNode extends NodeBase {
  readonly kind: 'perspective';
  members: readonly NodeId[];
}

export interface RoleNode extends NodeBase {
  readonly kind: 'role';
  modelPermission: ModelPermission;
}

export interface AnnotationNode extends NodeBase {
  readonly kind: 'annotation';
  value: string;
}

export type ModelNode =
  | ModelRootNode
  | TableNode
  | DataColumnNode
  | CalculatedColumnNode
  | MeasureNode
  | RelationshipNode
  | HierarchyNode
  | PerspectiveNode
  | RoleNode
  | AnnotationNode;

/** Nodes carrying a formula expression */
export type ExpressionHolder = MeasureNode | CalculatedColumnNode;

/** Nodes whose name can appear inside another node's formula text */
export type ReferenceTarget = TableNode | ColumnNode | MeasureNode;

export function hasExpression(node: ModelNode): node is ExpressionHolder {
  return node.kind === 'measure' || (node.kind === 'column' && node.columnType === 'calculated');
}

export function isReferenceTarget(node: ModelNode): node is ReferenceTarget {
  return node.kind === 'table' || node.kind === 'column' || node.kind === 'measure';
}

// ============================================================================
// Properties
// ============================================================================

/** Mutable properties, addressed generically by the history and the session */
export type PropertyName =
  | 'name'
  | 'parent'
  | 'description'
  | 'culture'
  | 'isHidden'
  | 'dataType'
  | 'sourceColumn'
  | 'expression'
  | 'formatString'
  | 'displayFolder'
  | 'fromColumn'
  | 'toColumn'
  | 'isActive'
  | 'crossFilter'
  | 'levels'
  | 'members'
  | 'modelPermission'
  | 'value';

export type PropertyValue = string | boolean | readonly NodeId[] | null;

/**
 * Kinds each property applies to. `sourceColumn` and `expression` are further
 * restricted by column type.
 */
export const PROPERTY_KINDS: Record<PropertyName, readonly NodeKind[]> = {
  name: NODE_KINDS,
  parent: NODE_KINDS,
  description: NODE_KINDS,
  culture: ['model'],
  isHidden: ['table', 'column', 'measure', 'hierarchy'],
  dataType: ['column'],
  sourceColumn: ['column'],
  expression: ['column', 'measure'],
  formatString: ['measure'],
  displayFolder: ['measure'],
  fromColumn: ['relationship'],
  toColumn: ['relationship'],
  isActive: ['relationship'],
  crossFilter: ['relationship'],
  levels: ['hierarchy'],
  members: ['perspective'],
  modelPermission: ['role'],
  value: ['annotation'],
};

export function isPropertyName(value: string): value is PropertyName {
  return Object.prototype.hasOwnProperty.call(PROPERTY_KINDS, value);
}

export const PROPERTY_NAMES: readonly PropertyName[] = Object.keys(PROPERTY_KINDS).filter(isPropertyName);

export function isPropertyValue(value: unknown): value is PropertyValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

export function propertyValuesEqual(a: PropertyValue, b: PropertyValue): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => item === b[i]);
  }
  return a === b;
}

// ============================================================================
// Text Spans
// ============================================================================

/** Half-open range [start, end) within an expression */
export interface TextSpan {
  readonly start: number;
  readonly end: number;
}
