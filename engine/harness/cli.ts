#!/usr/bin/env node
/**
 * ModelGraph Headless Harness - CLI Entry Point
 *
 * Usage:
 *   npx tsx engine/harness/cli.ts [options]
 *   npx tsx engine/harness/cli.ts < script.txt
 *   echo "ADD_TABLE Sales" | npx tsx engine/harness/cli.ts
 *
 * Options:
 *   --pretty        Human-readable output (default: JSON)
 *   --no-timestamps Omit timestamps from output
 *   --stop-on-error Stop execution on first error
 *   --echo          Echo commands before executing
 *   --verbose       Verbose mode with extra logging
 *   --help          Show help message
 *
 * Interactive mode:
 *   Run without piped input for REPL-style interaction.
 */

import * as readline from 'node:readline';
import { HarnessRunner, createHarnessRunner, formatOutput } from './HarnessRunner.js';
import { HarnessConfig, DEFAULT_CONFIG } from './types.js';

// =============================================================================
// CLI Argument Parsing
// =============================================================================

interface CLIArgs {
  config: Partial<HarnessConfig>;
  help: boolean;
  interactive: boolean;
}

function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = {
    config: {},
    help: false,
    interactive: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--pretty':
        result.config.outputFormat = 'pretty';
        break;
      case '--json':
        result.config.outputFormat = 'json';
        break;
      case '--no-timestamps':
        result.config.includeTimestamps = false;
        break;
      case '--timestamps':
        result.config.includeTimestamps = true;
        break;
      case '--no-line-numbers':
        result.config.includeLineNumbers = false;
        break;
      case '--stop-on-error':
        result.config.stopOnError = true;
        break;
      case '--continue-on-error':
        result.config.stopOnError = false;
        break;
      case '--echo':
        result.config.echoCommands = true;
        break;
      case '--no-echo':
        result.config.echoCommands = false;
        break;
      case '--verbose':
      case '-v':
        result.config.verbose = true;
        break;
      case '--quiet':
      case '-q':
        result.config.verbose = false;
        break;
      case '--max-steps': {
        const value = Number(args[++i]);
        if (!Number.isInteger(value) || value <= 0) {
          console.error('--max-steps requires a positive integer');
          process.exit(1);
        }
        result.config.maxStepsPerScript = value;
        break;
      }
      case '--interactive':
      case '-i':
        result.interactive = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        console.error(`Unknown option: ${arg}`);
        process.exit(1);
    }
  }

  return result;
}

// =============================================================================
// Help Text
// =============================================================================

const HELP_TEXT = `
ModelGraph Headless Harness

USAGE:
  npx tsx engine/harness/cli.ts [options]
  npx tsx engine/harness/cli.ts < script.txt
  echo "ADD_TABLE Sales" | npx tsx engine/harness/cli.ts

OPTIONS:
  --pretty            Human-readable output (default: JSON)
  --json              JSON output (one object per line)
  --no-timestamps     Omit timestamps from output
  --no-line-numbers   Omit script line numbers from output
  --stop-on-error     Stop execution on first error
  --echo              Echo commands before executing
  --verbose, -v       Verbose mode (stack traces on errors)
  --max-steps <n>     Maximum commands per script (default: 10000)
  --interactive, -i   Force interactive mode
  --help, -h          Show this help message

PATHS:
  Sales, 'Sales Region'    Tables
  Sales[Amount]            Column, measure or hierarchy of a table
  [Total]                  Measure, looked up model-wide
  role:Reader              Perspectives, roles and relationships by name
  n_12                     Any node by id

COMMANDS:
  Model:
    LOAD <file>                          Replace the model with a JSON definition
    ADD_TABLE <name> [hidden=true]       Add a table
    ADD_COLUMN <table> <name>            Add a data column (dataType=, source=, hidden=)
    ADD_CALC_COLUMN <table> <name> <expr> Add a calculated column
    ADD_MEASURE <table> <name> [expr]    Add a measure
    ADD_RELATIONSHIP <from> <to>         Relate two columns (name=, active=, crossFilter=)
    RENAME <path> <newName>              Rename and rewrite dependent formulas
    MOVE <path> <newParent>              Move a measure or annotation
    SET_EXPR <path> <expr>               Replace an expression
    SET <path> <property> <value>        Write any property
    REMOVE <path>                        Remove a node and its subtree

  Queries:
    GET <path> [property]                Node or property value
    DEPS <path> [all=true]               Formulas referencing a node

  History:
    UNDO                                 Undo last transaction
    REDO                                 Redo last undone transaction
    BEGIN_BATCH [label]                  Start a transaction
    END_BATCH                            Commit the transaction
    HISTORY                              List undo and redo stacks

  State Inspection:
    SNAPSHOT                             Model in definition form
    STATS                                Graph, index and history statistics

  Utility:
    ECHO <message>                       Print message
    ASSERT <path> <prop> <op> <value>    Assert a property (==, !=, contains)
    ASSERT <path> <exists|missing>       Assert a node exists
    ASSERT_ERROR [code]                  Expect next command to fail

  Control:
    RESET [modelName]                    Start over with an empty model
    QUIT                                 Exit harness

EXAMPLES:
  ADD_TABLE Sales
  ADD_COLUMN Sales Amount dataType=decimal
  ADD_MEASURE Sales Total SUM(Sales[Amount])
  ADD_MEASURE Sales Double [Total] * 2
  RENAME [Total] "Total Sales"
  ASSERT [Double] expression == [Total Sales] * 2
  UNDO
  ASSERT [Double] expression == [Total] * 2

  ASSERT_ERROR NAME_CONFLICT
  RENAME [Double] Total
`;

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<void> {
  const cliArgs = parseArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  const config: HarnessConfig = {
    ...DEFAULT_CONFIG,
    baseDir: process.cwd(),
    ...cliArgs.config,
  };

  const runner = createHarnessRunner(config);

  let failed = false;
  runner.onOutput((output) => {
    const text = formatOutput(output, config);
    if (output.type === 'error' || (output.type === 'assert' && !output.passed)) {
      failed = true;
      console.error(text);
    } else {
      console.log(text);
    }
  });

  process.on('SIGINT', () => {
    runner.abort('Interrupted');
    process.exit(130);
  });

  // Determine if interactive (TTY) or piped input
  const isInteractive = cliArgs.interactive || process.stdin.isTTY;

  if (isInteractive) {
    await runInteractive(runner, config);
  } else {
    await runPiped(runner);
    process.exit(failed ? 1 : 0);
  }
}

async function runInteractive(runner: HarnessRunner, config: HarnessConfig): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'model> ',
  });

  if (config.verbose) {
    console.log('ModelGraph Headless Harness');
    console.log('Type "help" for commands, "quit" to exit.');
    console.log('');
  }

  rl.prompt();

  for await (const line of rl) {
    if (line.trim().toLowerCase() === 'help') {
      console.log(HELP_TEXT);
      rl.prompt();
      continue;
    }

    if (!runner.executeLine(line)) {
      break;
    }
    rl.prompt();
  }

  rl.close();
  if (config.verbose) {
    console.log('\nGoodbye!');
  }
}

async function runPiped(runner: HarnessRunner): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    terminal: false,
  });

  const lines: string[] = [];

  // Collect all lines first
  for await (const line of rl) {
    lines.push(line);
  }

  runner.executeScript(lines.join('\n'));
}

// Run
main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
