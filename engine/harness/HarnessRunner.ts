/**
 * ModelGraph Headless Harness - Runner
 *
 * Executes parsed commands against a ModelSession and produces structured
 * output. Nodes are addressed by path (`Sales`, `'Sales Region'[Amount]`,
 * `[Total]`, `role:Reader`) or by id.
 */

import { resolve } from 'node:path';
import {
  ParsedCommand,
  Output,
  ResultOutput,
  ValueOutput,
  SnapshotOutput,
  ErrorOutput,
  InfoOutput,
  StatsOutput,
  TableOutput,
  AssertOutput,
  EchoOutput,
  HarnessConfig,
  HarnessErrorType,
  DEFAULT_CONFIG,
} from './types.js';
import { CommandParser, ParseError } from './CommandParser.js';
import { ModelSession } from '../core/ModelSession.js';
import type { FixupReport } from '../core/fixup/FixupEngine.js';
import { isNodeId, type NodeId } from '../core/model/NodeId.js';
import {
  CROSS_FILTERS,
  DATA_TYPES,
  isPropertyName,
  type PropertyName,
  type PropertyValue,
} from '../core/types/index.js';
import { InvalidValueError, NodeNotFoundError, isModelError } from '../core/types/errors.js';
import { loadModelDefinition, readModelDefinitionFile } from '../core/definition/ModelLoader.js';

/** Properties holding node ids, shown and written as paths */
const REFERENCE_PROPERTIES: ReadonlySet<PropertyName> = new Set<PropertyName>([
  'parent',
  'fromColumn',
  'toColumn',
  'levels',
  'members',
]);

const BOOLEAN_PROPERTIES: ReadonlySet<PropertyName> = new Set<PropertyName>([
  'isHidden',
  'isActive',
]);

/** Property value as shown to script authors: node ids become paths */
export type DisplayValue = PropertyValue | readonly string[];

interface CommandSource {
  raw: string;
  lineNumber: number;
}

// =============================================================================
// Harness Runner
// =============================================================================

export class HarnessRunner {
  private config: HarnessConfig;
  private session: ModelSession;
  private parser: CommandParser = new CommandParser();

  /** Pending ASSERT_ERROR: true for any error, or the expected error code */
  private expectError: string | boolean = false;

  // === Safety state ===
  /** Abort controller for cancellation */
  private abortController: AbortController | null = null;
  /** Current step count in script execution */
  private stepCount: number = 0;
  /** Whether the runner is currently executing */
  private isExecuting: boolean = false;

  // Output handler
  private outputHandler: (output: Output) => void;

  constructor(
    config: Partial<HarnessConfig> = {},
    outputHandler?: (output: Output) => void
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.outputHandler = outputHandler ?? this.defaultOutputHandler.bind(this);
    this.session = new ModelSession({ maxHistory: this.config.maxHistory });
  }

  /**
   * The session commands run against.
   */
  getSession(): ModelSession {
    return this.session;
  }

  // ===========================================================================
  // Command Execution
  // ===========================================================================

  /**
   * Execute a single command. Failures become error outputs.
   */
  execute(cmd: ParsedCommand): Output {
    if (this.abortController?.signal.aborted) {
      return this.createSafetyError('ScriptAborted', 'Script aborted: Script was aborted', cmd);
    }

    if (this.config.echoCommands) {
      this.emit(this.createEcho(cmd.raw, cmd));
    }

    const expected = cmd.type === 'ASSERT_ERROR' ? false : this.expectError;
    if (cmd.type !== 'ASSERT_ERROR') {
      this.expectError = false;
    }

    let result: Output;
    try {
      result = this.executeCommand(cmd);
    } catch (error) {
      const code = isModelError(error) ? error.code : undefined;
      if (expected === true || (expected !== false && expected === code)) {
        return this.createResult(true, { expectedError: true, code }, cmd);
      }

      const err = error instanceof Error ? error : new Error(String(error));
      const output = this.createError(err.message, cmd, code);
      if (expected !== false) {
        output.message = `Expected error ${expected} but got ${code ?? err.name}: ${err.message}`;
      }
      if (this.config.verbose) {
        output.stack = err.stack;
      }
      return output;
    }

    // Expected an error but the command succeeded
    if (expected !== false) {
      return this.createSafetyError('UnexpectedSuccess', 'Expected error but command succeeded', cmd);
    }

    return result;
  }

  /**
   * Execute multiple commands with step limit protection.
   */
  executeAll(commands: ParsedCommand[]): Output[] {
    return this.runSteps(commands.map(cmd => () => cmd));
  }

  /**
   * Execute a script (multiple lines). Lines that fail to parse become error
   * outputs at their position in the script.
   */
  executeScript(script: string): Output[] {
    const lines = script.split(/\r?\n/);
    const steps: Array<() => ParsedCommand | ErrorOutput | null> = lines.map((line, i) => () => {
      try {
        return this.parser.parse(line, i + 1);
      } catch (error) {
        if (error instanceof ParseError) {
          return this.createError(error.message, { raw: line.trim(), lineNumber: i + 1 });
        }
        throw error;
      }
    });
    return this.runSteps(steps);
  }

  /**
   * Execute a single line of input (for interactive mode).
   * Returns false if QUIT command was executed.
   */
  executeLine(line: string): boolean {
    let cmd: ParsedCommand | null;
    try {
      cmd = this.parser.parse(line, 0);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      this.emit(this.createError(error.message, { raw: line.trim(), lineNumber: 0 }));
      return !this.config.stopOnError;
    }

    if (!cmd) {
      return true;
    }

    const output = this.execute(cmd);
    this.emit(output);

    if (cmd.type === 'QUIT') {
      return false;
    }
    return !(output.type === 'error' && this.config.stopOnError);
  }

  private runSteps(steps: Array<() => ParsedCommand | ErrorOutput | null>): Output[] {
    const outputs: Output[] = [];
    this.stepCount = 0;
    this.abortController = new AbortController();
    this.isExecuting = true;

    try {
      for (const next of steps) {
        const step = next();
        if (step === null) continue;

        const source: CommandSource = isErrorOutput(step)
          ? { raw: step.command ?? '', lineNumber: step.lineNumber ?? 0 }
          : step;

        // Check abort signal
        if (this.abortController.signal.aborted) {
          const output = this.createSafetyError('ScriptAborted', 'Script aborted: Script was aborted', source);
          outputs.push(output);
          this.emit(output);
          break;
        }

        // Check step limit
        this.stepCount++;
        if (this.stepCount > this.config.maxStepsPerScript) {
          const output = this.createSafetyError(
            'StepLimitExceeded',
            `Step limit exceeded: ${this.stepCount} steps (max: ${this.config.maxStepsPerScript})`,
            source
          );
          outputs.push(output);
          this.emit(output);
          break;
        }

        const output = isErrorOutput(step) ? step : this.execute(step);
        outputs.push(output);
        this.emit(output);

        if (output.type === 'error' && this.config.stopOnError) {
          break;
        }
        if (!isErrorOutput(step) && step.type === 'QUIT') {
          break;
        }
      }
    } finally {
      this.isExecuting = false;
      this.abortController = null;
    }

    return outputs;
  }

  /**
   * Route command to appropriate handler.
   */
  private executeCommand(cmd: ParsedCommand): Output {
    switch (cmd.type) {
      // Model loading
      case 'LOAD': return this.cmdLoad(cmd);

      // Adding nodes
      case 'ADD_TABLE': return this.cmdAddTable(cmd);
      case 'ADD_COLUMN': return this.cmdAddColumn(cmd);
      case 'ADD_CALC_COLUMN': return this.cmdAddCalcColumn(cmd);
      case 'ADD_MEASURE': return this.cmdAddMeasure(cmd);
      case 'ADD_RELATIONSHIP': return this.cmdAddRelationship(cmd);

      // Editing
      case 'RENAME': return this.cmdRename(cmd);
      case 'MOVE': return this.cmdMove(cmd);
      case 'SET_EXPR': return this.cmdSetExpr(cmd);
      case 'SET': return this.cmdSet(cmd);
      case 'REMOVE': return this.cmdRemove(cmd);

      // Queries
      case 'GET': return this.cmdGet(cmd);
      case 'DEPS': return this.cmdDeps(cmd);

      // History
      case 'UNDO': return this.cmdUndo(cmd);
      case 'REDO': return this.cmdRedo(cmd);
      case 'BEGIN_BATCH': return this.cmdBeginBatch(cmd);
      case 'END_BATCH': return this.cmdEndBatch(cmd);
      case 'HISTORY': return this.cmdHistory(cmd);

      // State inspection
      case 'SNAPSHOT': return this.cmdSnapshot(cmd);
      case 'STATS': return this.cmdStats(cmd);

      // Utility
      case 'ECHO': return this.createEcho(cmd.tail ?? '', cmd);
      case 'ASSERT': return this.cmdAssert(cmd);
      case 'ASSERT_ERROR': return this.cmdAssertError(cmd);

      // Control
      case 'RESET': return this.cmdReset(cmd);
      case 'QUIT': return this.createInfo('Quitting', cmd);
    }
  }

  // ===========================================================================
  // Model Commands
  // ===========================================================================

  private cmdLoad(cmd: ParsedCommand): Output {
    const [file] = cmd.args;
    if (!file) throw new Error('LOAD requires a file path');

    const path = resolve(this.config.baseDir, file);
    const definition = loadModelDefinition(this.session, readModelDefinitionFile(path));

    return this.createResult(true, {
      model: definition.name,
      tables: definition.tables.length,
      nodes: this.session.snapshot().nodes.length,
    }, cmd);
  }

  private cmdAddTable(cmd: ParsedCommand): Output {
    const [name] = cmd.args;
    if (!name) throw new Error('ADD_TABLE requires a name');

    const id = this.session.addTable({
      name,
      isHidden: optionalBoolean(cmd, 'hidden'),
      description: optionalString(cmd, 'description'),
    });
    return this.createAdded(id, cmd);
  }

  private cmdAddColumn(cmd: ParsedCommand): Output {
    const [tablePath, name] = cmd.args;
    if (!tablePath || !name) throw new Error('ADD_COLUMN requires a table and a name');

    const dataType = optionalString(cmd, 'dataType');
    const id = this.session.addDataColumn(this.resolveNode(tablePath), {
      name,
      dataType: dataType === undefined ? undefined : oneOf(DATA_TYPES, dataType, 'dataType'),
      sourceColumn: optionalString(cmd, 'source'),
      isHidden: optionalBoolean(cmd, 'hidden'),
      description: optionalString(cmd, 'description'),
    });
    return this.createAdded(id, cmd);
  }

  private cmdAddCalcColumn(cmd: ParsedCommand): Output {
    const [tablePath, name] = cmd.args;
    if (!tablePath || !name || !cmd.tail) {
      throw new Error('ADD_CALC_COLUMN requires a table, a name and an expression');
    }

    const id = this.session.addCalculatedColumn(this.resolveNode(tablePath), {
      name,
      expression: cmd.tail,
    });
    return this.createAdded(id, cmd);
  }

  private cmdAddMeasure(cmd: ParsedCommand): Output {
    const [tablePath, name] = cmd.args;
    if (!tablePath || !name) throw new Error('ADD_MEASURE requires a table and a name');

    const id = this.session.addMeasure(this.resolveNode(tablePath), {
      name,
      expression: cmd.tail ?? '',
    });
    return this.createAdded(id, cmd);
  }

  private cmdAddRelationship(cmd: ParsedCommand): Output {
    const [fromPath, toPath] = cmd.args;
    if (!fromPath || !toPath) throw new Error('ADD_RELATIONSHIP requires two columns');

    const crossFilter = optionalString(cmd, 'crossFilter');
    const id = this.session.addRelationship(this.resolveNode(fromPath), this.resolveNode(toPath), {
      name: optionalString(cmd, 'name'),
      isActive: optionalBoolean(cmd, 'active'),
      crossFilter: crossFilter === undefined ? undefined : oneOf(CROSS_FILTERS, crossFilter, 'crossFilter'),
    });
    return this.createAdded(id, cmd);
  }

  private cmdRename(cmd: ParsedCommand): Output {
    const [path, newName] = cmd.args;
    if (!path || newName === undefined) throw new Error('RENAME requires a path and a new name');

    const report = this.session.rename(this.resolveNode(path), newName);
    return this.createFixupResult(report, cmd);
  }

  private cmdMove(cmd: ParsedCommand): Output {
    const [path, parentPath] = cmd.args;
    if (!path || !parentPath) throw new Error('MOVE requires a path and a new parent');

    const report = this.session.move(this.resolveNode(path), this.resolveNode(parentPath));
    return this.createFixupResult(report, cmd);
  }

  private cmdSetExpr(cmd: ParsedCommand): Output {
    const [path] = cmd.args;
    if (!path) throw new Error('SET_EXPR requires a path');

    const id = this.resolveNode(path);
    const changed = this.session.setExpression(id, cmd.tail ?? '');
    return this.createResult(true, { path: this.session.getPath(id), changed }, cmd);
  }

  private cmdSet(cmd: ParsedCommand): Output {
    const [path, property] = cmd.args;
    if (!path || !property) throw new Error('SET requires a path, a property and a value');
    if (!isPropertyName(property)) {
      throw new InvalidValueError(property, 'unknown property');
    }

    const id = this.resolveNode(path);
    const report = this.session.setProperty(id, property, this.parsePropertyValue(property, cmd.tail ?? ''));
    if (report) {
      return this.createFixupResult(report, cmd);
    }
    return this.createResult(true, {
      path: this.session.getPath(id),
      property,
      value: this.displayProperty(id, property),
    }, cmd);
  }

  private cmdRemove(cmd: ParsedCommand): Output {
    const [path] = cmd.args;
    if (!path) throw new Error('REMOVE requires a path');

    const id = this.resolveNode(path);
    const display = this.session.getPath(id);
    const before = this.session.snapshot().nodes.length;
    this.session.removeNode(id);

    return this.createResult(true, {
      removed: display,
      nodes: before - this.session.snapshot().nodes.length,
    }, cmd);
  }

  // ===========================================================================
  // Query Commands
  // ===========================================================================

  private cmdGet(cmd: ParsedCommand): Output {
    const [path, property] = cmd.args;
    if (!path) throw new Error('GET requires a path');

    const id = this.resolveNode(path);
    const display = this.session.getPath(id);

    if (property === undefined) {
      return this.createValue(display, undefined, this.session.getNode(id), cmd);
    }
    if (!isPropertyName(property)) {
      throw new InvalidValueError(property, 'unknown property');
    }
    return this.createValue(display, property, this.displayProperty(id, property), cmd);
  }

  private cmdDeps(cmd: ParsedCommand): Output {
    const [path] = cmd.args;
    if (!path) throw new Error('DEPS requires a path');

    const id = this.resolveNode(path);
    const dependents = cmd.options.all === true
      ? this.session.getAllDependents(id)
      : this.session.getDependents(id);

    return this.createValue(
      this.session.getPath(id),
      undefined,
      dependents.map(dependent => this.session.getPath(dependent)),
      cmd
    );
  }

  // ===========================================================================
  // History Commands
  // ===========================================================================

  private cmdUndo(cmd: ParsedCommand): Output {
    const description = this.session.getHistoryState().undoDescription;
    const undone = this.session.undo();
    return this.createResult(undone, { undone: undone ? description : null }, cmd);
  }

  private cmdRedo(cmd: ParsedCommand): Output {
    const description = this.session.getHistoryState().redoDescription;
    const redone = this.session.redo();
    return this.createResult(redone, { redone: redone ? description : null }, cmd);
  }

  private cmdBeginBatch(cmd: ParsedCommand): Output {
    const description = cmd.tail || 'Batch operation';
    this.session.beginBatch(description);
    return this.createResult(true, { batch: 'started', description }, cmd);
  }

  private cmdEndBatch(cmd: ParsedCommand): Output {
    this.session.endBatch();
    return this.createResult(true, { batch: 'ended' }, cmd);
  }

  private cmdHistory(cmd: ParsedCommand): Output {
    const rows: string[][] = [];
    for (const entry of this.session.getUndoHistory()) {
      rows.push(['undo', entry.description, String(entry.actionCount)]);
    }
    for (const entry of this.session.getRedoHistory()) {
      rows.push(['redo', entry.description, String(entry.actionCount)]);
    }

    const output: TableOutput = {
      type: 'table',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      headers: ['stack', 'description', 'actions'],
      rows,
    };
    return output;
  }

  // ===========================================================================
  // State Inspection Commands
  // ===========================================================================

  private cmdSnapshot(cmd: ParsedCommand): Output {
    const output: SnapshotOutput = {
      type: 'snapshot',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      nodeCount: this.session.snapshot().nodes.length,
      definition: this.session.toDefinition(),
    };
    return output;
  }

  private cmdStats(cmd: ParsedCommand): Output {
    const stats = this.session.getStats();

    const output: StatsOutput = {
      type: 'stats',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      nodeCount: stats.graph.nodeCount,
      expressionCount: stats.index.expressions,
      referenceCount: stats.index.edges,
      unresolvedCount: stats.index.unresolved,
      diagnosticCount: this.session.getDiagnostics().length,
      undoStackSize: stats.history.undoCount,
      redoStackSize: stats.history.redoCount,
    };
    return output;
  }

  // ===========================================================================
  // Utility Commands
  // ===========================================================================

  private cmdAssert(cmd: ParsedCommand): Output {
    const [path, propertyOrState, operator] = cmd.args;
    if (!path || !propertyOrState) {
      throw new Error('ASSERT requires a path and a property or exists/missing');
    }

    // ASSERT <path> exists | missing
    if (operator === undefined) {
      const state = propertyOrState.toLowerCase();
      if (state !== 'exists' && state !== 'missing') {
        throw new Error(`ASSERT expects exists or missing, got: ${propertyOrState}`);
      }
      const found = this.findNode(path) !== undefined;
      const actual = found ? 'exists' : 'missing';
      return this.createAssert(actual === state, state, actual, `${path} ${state}`, cmd);
    }

    if (!isPropertyName(propertyOrState)) {
      throw new InvalidValueError(propertyOrState, 'unknown property');
    }

    const expected = cmd.tail ?? '';
    const actual = formatPropertyValue(this.displayProperty(this.resolveNode(path), propertyOrState));

    let passed: boolean;
    switch (operator.toLowerCase()) {
      case '==':
        passed = actual === expected;
        break;
      case '!=':
        passed = actual !== expected;
        break;
      case 'contains':
        passed = actual.includes(expected);
        break;
      default:
        throw new Error(`Unknown operator: ${operator}`);
    }

    return this.createAssert(passed, expected, actual, `${path} ${propertyOrState} ${operator} ${expected}`, cmd);
  }

  private cmdAssertError(cmd: ParsedCommand): Output {
    const [code] = cmd.args;
    this.expectError = code === undefined ? true : code.toUpperCase();
    return this.createInfo(
      code === undefined ? 'Expecting error on next command' : `Expecting ${code.toUpperCase()} on next command`,
      cmd
    );
  }

  // ===========================================================================
  // Control Commands
  // ===========================================================================

  private cmdReset(cmd: ParsedCommand): Output {
    const [modelName] = cmd.args;
    this.session.reset(modelName);
    this.expectError = false;
    return this.createResult(true, { reset: true }, cmd);
  }

  // ===========================================================================
  // Path & Value Helpers
  // ===========================================================================

  private findNode(path: string): NodeId | undefined {
    const found = this.session.findByPath(path);
    if (found !== undefined) return found;
    return isNodeId(path) && this.session.hasNode(path) ? path : undefined;
  }

  private resolveNode(path: string): NodeId {
    const id = this.findNode(path);
    if (id === undefined) {
      throw new NodeNotFoundError(path);
    }
    return id;
  }

  /**
   * Property value with node ids replaced by paths.
   */
  private displayProperty(id: NodeId, property: PropertyName): DisplayValue {
    const value = this.session.getProperty(id, property);
    if (!REFERENCE_PROPERTIES.has(property)) return value;

    if (value === null || typeof value === 'boolean') return value;
    if (typeof value === 'string') return this.pathOf(value);
    return value.map(item => this.pathOf(item));
  }

  private pathOf(id: string): string {
    return isNodeId(id) && this.session.hasNode(id) ? this.session.getPath(id) : id;
  }

  private parsePropertyValue(property: PropertyName, text: string): unknown {
    if (BOOLEAN_PROPERTIES.has(property)) {
      const lowered = text.toLowerCase();
      if (lowered !== 'true' && lowered !== 'false') {
        throw new InvalidValueError(property, `expected true or false, got '${text}'`);
      }
      return lowered === 'true';
    }

    if (property === 'levels' || property === 'members') {
      return this.parser.splitArguments(text).map(path => this.resolveNode(path));
    }
    if (REFERENCE_PROPERTIES.has(property)) {
      return this.resolveNode(text);
    }
    return text;
  }

  // ===========================================================================
  // Output Helpers
  // ===========================================================================

  private createResult(success: boolean, data: unknown, cmd: CommandSource): ResultOutput {
    return {
      type: 'result',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      success,
      data,
    };
  }

  private createAdded(id: NodeId, cmd: ParsedCommand): ResultOutput {
    return this.createResult(true, { id, path: this.session.getPath(id) }, cmd);
  }

  private createFixupResult(report: FixupReport, cmd: ParsedCommand): ResultOutput {
    return this.createResult(true, {
      target: this.session.getPath(report.target),
      rewritten: report.rewritten.map(id => this.pathOf(id)),
      flagged: report.flagged.map(id => this.pathOf(id)),
    }, cmd);
  }

  private createValue(
    path: string,
    property: string | undefined,
    value: unknown,
    cmd: ParsedCommand
  ): ValueOutput {
    return {
      type: 'value',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      path,
      property,
      value,
    };
  }

  private createAssert(
    passed: boolean,
    expected: unknown,
    actual: unknown,
    description: string,
    cmd: ParsedCommand
  ): AssertOutput {
    return {
      type: 'assert',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      passed,
      expected,
      actual,
      message: passed ? undefined : `Assertion failed: ${description}`,
    };
  }

  private createError(message: string, cmd: CommandSource, code?: string): ErrorOutput {
    return {
      type: 'error',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      message,
      code,
    };
  }

  private createSafetyError(errorType: HarnessErrorType, message: string, cmd: CommandSource): ErrorOutput {
    return {
      ...this.createError(message, cmd),
      errorType,
    };
  }

  private createInfo(message: string, cmd: ParsedCommand): InfoOutput {
    return {
      type: 'info',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      message,
    };
  }

  private createEcho(message: string, cmd: ParsedCommand): EchoOutput {
    return {
      type: 'echo',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      message,
    };
  }

  private emit(output: Output): void {
    this.outputHandler(output);
  }

  private defaultOutputHandler(output: Output): void {
    const text = formatOutput(output, this.config);
    if (output.type === 'error') {
      console.error(text);
    } else {
      console.log(text);
    }
  }

  // ===========================================================================
  // CLI Interface Methods
  // ===========================================================================

  /**
   * Set a custom output handler.
   */
  onOutput(handler: (output: Output) => void): void {
    this.outputHandler = handler;
  }

  /**
   * Request abort of running script.
   * Can be called from signal handlers (e.g., SIGINT) or an output handler.
   */
  abort(reason: string = 'User requested abort'): void {
    if (this.abortController && this.isExecuting) {
      this.abortController.abort();
      if (this.config.verbose) {
        console.log(`[Abort] ${reason}`);
      }
    }
  }

  /**
   * Check if the runner is currently executing a script.
   */
  isRunning(): boolean {
    return this.isExecuting;
  }

  /**
   * Get current step count (for monitoring/progress).
   */
  getStepCount(): number {
    return this.stepCount;
  }

  dispose(): void {
    this.session.dispose();
  }
}

// =============================================================================
// Output Formatting
// =============================================================================

export function formatOutput(output: Output, config: HarnessConfig): string {
  if (config.outputFormat === 'json') {
    const { timestamp, lineNumber, ...rest } = output;
    return JSON.stringify({
      ...rest,
      ...(config.includeTimestamps ? { timestamp } : {}),
      ...(config.includeLineNumbers && lineNumber ? { lineNumber } : {}),
    });
  }

  // Pretty format
  const time = config.includeTimestamps
    ? `[${new Date(output.timestamp).toISOString().slice(11, 23)}] `
    : '';
  const line = config.includeLineNumbers && output.lineNumber ? `${output.lineNumber}: ` : '';
  const prefix = time + line;

  switch (output.type) {
    case 'result':
      return `${prefix}${output.success ? 'OK' : 'NOOP'}${output.data !== undefined ? `: ${JSON.stringify(output.data)}` : ''}`;

    case 'value':
      return `${prefix}${output.path ?? ''}${output.property ? `.${output.property}` : ''} = ${JSON.stringify(output.value)}`;

    case 'snapshot':
      return `${prefix}SNAPSHOT: ${output.nodeCount} nodes\n${JSON.stringify(output.definition, null, 2)}`;

    case 'error':
      return `${prefix}ERROR${output.code ? ` [${output.code}]` : ''}: ${output.message}`;

    case 'info':
      return `${prefix}INFO: ${output.message}`;

    case 'stats':
      return `${prefix}STATS: ${output.nodeCount} nodes, ${output.expressionCount} expressions, ` +
        `${output.referenceCount} references (${output.unresolvedCount} unresolved), ` +
        `${output.diagnosticCount} diagnostics, undo ${output.undoStackSize}/redo ${output.redoStackSize}`;

    case 'table':
      return `${prefix}TABLE:\n${formatTable(output.headers, output.rows)}`;

    case 'assert':
      return `${prefix}ASSERT ${output.passed ? 'PASSED' : 'FAILED'}: expected=${JSON.stringify(output.expected)}, actual=${JSON.stringify(output.actual)}${output.message ? ` (${output.message})` : ''}`;

    case 'echo':
      return `${prefix}${output.message}`;
  }
}

export function formatTable(headers: string[], rows: string[][]): string {
  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, i) =>
    Math.max(...allRows.map((row) => (row[i] || '').length))
  );

  const separator = colWidths.map((w) => '-'.repeat(w + 2)).join('+');
  const formatRow = (row: string[]) =>
    row.map((cell, i) => ` ${(cell || '').padEnd(colWidths[i])} `).join('|');

  return [
    formatRow(headers),
    separator,
    ...rows.map(formatRow),
  ].join('\n');
}

/**
 * Text form of a property value used by ASSERT.
 */
export function formatPropertyValue(value: DisplayValue): string {
  if (value === null) return 'null';
  if (typeof value === 'string' || typeof value === 'boolean') return String(value);
  return value.join(', ');
}

// =============================================================================
// Option Helpers
// =============================================================================

function isErrorOutput(step: ParsedCommand | ErrorOutput): step is ErrorOutput {
  return step.type === 'error';
}

function optionalString(cmd: ParsedCommand, key: string): string | undefined {
  const value = cmd.options[key];
  return value === undefined ? undefined : String(value);
}

function optionalBoolean(cmd: ParsedCommand, key: string): boolean | undefined {
  const value = cmd.options[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new InvalidValueError(key, `expected true or false, got '${String(value)}'`);
  }
  return value;
}

function oneOf<T extends string>(allowed: readonly T[], value: string, option: string): T {
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    throw new InvalidValueError(option, `expected one of ${allowed.join(', ')}`);
  }
  return match;
}

// =============================================================================
// Factory
// =============================================================================

export function createHarnessRunner(
  config?: Partial<HarnessConfig>,
  outputHandler?: (output: Output) => void
): HarnessRunner {
  return new HarnessRunner(config, outputHandler);
}
