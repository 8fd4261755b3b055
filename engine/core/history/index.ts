/**
 * ModelGraph Engine - History Module Exports
 */

export {
  UndoRedoManager,
  Transaction,
  createUndoRedoManager,
} from './UndoRedoManager.js';

export {
  SetPropertyAction,
  AddNodeAction,
  RemoveNodeAction,
  MoveNodeAction,
  CustomAction,
} from './ModelActions.js';

export type {
  ModelAction,
  ActionType,
  HistoryState,
  HistoryEntry,
  UndoRedoState,
  UndoRedoEvents,
  UndoRedoConfig,
} from './UndoRedoManager.js';

export type { NodePosition } from './ModelActions.js';
