/**
 * ModelGraph Engine - Formula Module Exports
 */

export { DependencyIndex } from './DependencyIndex.js';
export type {
  ReferenceForm,
  ReferenceSite,
  ExpressionParse,
  ExpressionDiagnostic,
  DependencyIndexStats,
} from './DependencyIndex.js';

export {
  tokenizeFormula,
  tokenText,
  isReferenceToken,
} from './Tokenizer.js';
export type {
  Tokenizer,
  TokenClass,
  FormulaToken,
} from './Tokenizer.js';

export {
  quoteTableName,
  bracketName,
  qualifiedName,
  unquoteTableName,
  unbracketName,
} from './ReferenceText.js';
