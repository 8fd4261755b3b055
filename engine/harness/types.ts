/**
 * ModelGraph Headless Harness - Types
 *
 * Command protocol and output types for stdin/stdout testing.
 */

import type { ModelDefinition } from '../core/definition/ModelDefinition.js';

// =============================================================================
// Command Types
// =============================================================================

export const COMMAND_TYPES = [
  // Model loading
  'LOAD',             // LOAD fixtures/sales-model.json

  // Adding nodes
  'ADD_TABLE',        // ADD_TABLE Sales | ADD_TABLE "Sales Region" hidden=true
  'ADD_COLUMN',       // ADD_COLUMN Sales Amount dataType=decimal source=amount
  'ADD_CALC_COLUMN',  // ADD_CALC_COLUMN Sales Margin [Amount] - [Cost]
  'ADD_MEASURE',      // ADD_MEASURE Sales Total SUM(Sales[Amount])
  'ADD_RELATIONSHIP', // ADD_RELATIONSHIP Sales[CustomerKey] Customer[CustomerKey] crossFilter=bothDirections

  // Editing
  'RENAME',           // RENAME [Total] "Total Sales"
  'MOVE',             // MOVE [Total] Finance
  'SET_EXPR',         // SET_EXPR [Total] SUM(Sales[Amount]) * 2
  'SET',              // SET Sales[Amount] isHidden true
  'REMOVE',           // REMOVE Sales[Cost]

  // Queries
  'GET',              // GET [Total] | GET [Total] expression
  'DEPS',             // DEPS [Total] | DEPS [Total] all=true

  // History
  'UNDO',             // UNDO
  'REDO',             // REDO
  'BEGIN_BATCH',      // BEGIN_BATCH Restructure sales
  'END_BATCH',        // END_BATCH
  'HISTORY',          // HISTORY (undo and redo stacks)

  // State inspection
  'SNAPSHOT',         // SNAPSHOT (model in definition form)
  'STATS',            // STATS (graph, index and history statistics)

  // Utility
  'ECHO',             // ECHO message
  'ASSERT',           // ASSERT [Total] expression == SUM(Sales[Amount])
  'ASSERT_ERROR',     // ASSERT_ERROR [NAME_CONFLICT] (next command should fail)

  // Control
  'RESET',            // RESET [modelName]
  'QUIT',             // QUIT
] as const;

export type CommandType = (typeof COMMAND_TYPES)[number];

export function isCommandType(value: string): value is CommandType {
  return COMMAND_TYPES.some(type => type === value);
}

export interface ParsedCommand {
  type: CommandType;
  args: string[];
  options: Record<string, string | boolean | number>;
  /**
   * Unparsed remainder of the line for commands ending in free text
   * (expressions, property values, assertion operands)
   */
  tail?: string;
  raw: string;
  lineNumber: number;
}

// =============================================================================
// Output Types
// =============================================================================

export type OutputType =
  | 'result'    // Command result
  | 'value'     // Node or property value
  | 'snapshot'  // Full model state
  | 'error'     // Error message
  | 'info'      // Info message
  | 'stats'     // Statistics
  | 'table'     // Tabular data dump
  | 'assert'    // Assertion result
  | 'echo';     // Echo output

export interface OutputBase {
  type: OutputType;
  timestamp: number;
  command?: string;
  lineNumber?: number;
}

export interface ResultOutput extends OutputBase {
  type: 'result';
  success: boolean;
  data?: unknown;
}

export interface ValueOutput extends OutputBase {
  type: 'value';
  path?: string;
  property?: string;
  value: unknown;
}

export interface SnapshotOutput extends OutputBase {
  type: 'snapshot';
  nodeCount: number;
  definition: ModelDefinition;
}

export type HarnessErrorType = 'StepLimitExceeded' | 'ScriptAborted' | 'UnexpectedSuccess';

export interface ErrorOutput extends OutputBase {
  type: 'error';
  message: string;
  /** ModelError code when the engine rejected the command */
  code?: string;
  errorType?: HarnessErrorType;
  stack?: string;
}

export interface InfoOutput extends OutputBase {
  type: 'info';
  message: string;
}

export interface StatsOutput extends OutputBase {
  type: 'stats';
  nodeCount: number;
  expressionCount: number;
  referenceCount: number;
  unresolvedCount: number;
  diagnosticCount: number;
  undoStackSize: number;
  redoStackSize: number;
}

export interface TableOutput extends OutputBase {
  type: 'table';
  headers: string[];
  rows: string[][];
}

export interface AssertOutput extends OutputBase {
  type: 'assert';
  passed: boolean;
  expected: unknown;
  actual: unknown;
  message?: string;
}

export interface EchoOutput extends OutputBase {
  type: 'echo';
  message: string;
}

export type Output =
  | ResultOutput
  | ValueOutput
  | SnapshotOutput
  | ErrorOutput
  | InfoOutput
  | StatsOutput
  | TableOutput
  | AssertOutput
  | EchoOutput;

// =============================================================================
// Harness Configuration
// =============================================================================

export interface HarnessConfig {
  /** Output format: 'json' (one JSON per line) or 'pretty' (human readable) */
  outputFormat: 'json' | 'pretty';
  /** Include timestamps in output */
  includeTimestamps: boolean;
  /** Include line numbers in output */
  includeLineNumbers: boolean;
  /** Stop on first error */
  stopOnError: boolean;
  /** Echo commands before executing */
  echoCommands: boolean;
  /** Verbose mode (extra logging) */
  verbose: boolean;
  /** Maximum commands per script execution (default: 10000) */
  maxStepsPerScript: number;
  /** Directory LOAD paths are resolved against (default: process.cwd()) */
  baseDir: string;
  /** Maximum undo depth of the session (default: 100) */
  maxHistory: number;
}

export const DEFAULT_CONFIG: HarnessConfig = {
  outputFormat: 'json',
  includeTimestamps: true,
  includeLineNumbers: true,
  stopOnError: false,
  echoCommands: false,
  verbose: false,
  maxStepsPerScript: 10000,
  baseDir: '.',
  maxHistory: 100,
};
