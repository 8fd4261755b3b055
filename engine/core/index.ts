/**
 * ModelGraph Engine - Core Module Exports
 *
 * This is the main entry point for the semantic model engine.
 */

// Main Session
export { ModelSession, createModelSession } from './ModelSession.js';
export type {
  ModelSessionConfig,
  ModelSessionEvents,
  ModelSnapshot,
  SessionStats,
  TableOptions,
  DataColumnOptions,
  CalculatedColumnOptions,
  MeasureOptions,
  RelationshipOptions,
  HierarchyOptions,
  PerspectiveOptions,
  RoleOptions,
  AnnotationOptions,
} from './ModelSession.js';

// Types - export all
export * from './types/index.js';
export * from './types/errors.js';

// Object Graph
export * from './model/index.js';

// History (Undo/Redo)
export * from './history/index.js';

// Formula references
export * from './formula/index.js';

// Rename/move fixups
export * from './fixup/index.js';

// Model definitions
export * from './definition/index.js';
