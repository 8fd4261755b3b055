/**
 * ModelGraph Engine - Model Definition Exports
 */

export {
  modelDefinitionSchema,
  tableSchema,
  columnSchema,
  measureSchema,
  hierarchySchema,
  relationshipSchema,
  perspectiveSchema,
  roleSchema,
  annotationSchema,
} from './ModelDefinition.js';
export type {
  ModelDefinition,
  ModelDefinitionInput,
  TableDefinition,
  ColumnDefinition,
  MeasureDefinition,
  HierarchyDefinition,
  RelationshipDefinition,
  PerspectiveDefinition,
  RoleDefinition,
  AnnotationDefinition,
} from './ModelDefinition.js';

export {
  parseModelDefinition,
  readModelDefinitionFile,
  loadModelDefinition,
} from './ModelLoader.js';
