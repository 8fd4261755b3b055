/**
 * ModelGraph Engine - Fixup Module Exports
 */

export { FixupEngine } from './FixupEngine.js';
export type {
  FixupPhase,
  FixupReport,
  FixupRequest,
  ExpressionWriter,
} from './FixupEngine.js';
