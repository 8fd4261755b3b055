/**
 * ModelGraph Headless Harness - Module Exports
 *
 * A text-based testing harness for the ModelGraph engine.
 * Enables automated testing via stdin/stdout command protocol.
 */

export { CommandParser, createCommandParser, ParseError } from './CommandParser.js';

export {
  HarnessRunner,
  createHarnessRunner,
  formatOutput,
  formatTable,
  formatPropertyValue,
} from './HarnessRunner.js';
export type { DisplayValue } from './HarnessRunner.js';

export type {
  CommandType,
  ParsedCommand,
  OutputType,
  Output,
  OutputBase,
  ResultOutput,
  ValueOutput,
  SnapshotOutput,
  ErrorOutput,
  HarnessErrorType,
  InfoOutput,
  StatsOutput,
  TableOutput,
  AssertOutput,
  EchoOutput,
  HarnessConfig,
} from './types.js';

export { COMMAND_TYPES, DEFAULT_CONFIG, isCommandType } from './types.js';
