/**
 * ModelGraph Headless Harness - Command Parser
 *
 * Parses text commands into structured command objects.
 *
 * Command syntax:
 *   COMMAND [args...] [key=value...]
 *
 * Arguments are separated by whitespace. `'Quoted Table'[Member Name]` paths
 * are one argument, spaces included, and keep their quotes and brackets.
 * `"double quoted"` text is one argument with the quotes removed
 * (escapes: \" \\ \n \t).
 *
 * Commands that end in free text (expressions, values) take the rest of the
 * line verbatim as `tail`:
 *   ADD_MEASURE Sales Total SUM(Sales[Amount])
 *   SET_EXPR [Total] "[Label]" & [Total]
 *
 * Model:
 *   LOAD <file>                            - Replace the model with a JSON definition
 *   ADD_TABLE <name> [hidden=true]
 *   ADD_COLUMN <table> <name> [dataType=int64] [source=col]
 *   ADD_CALC_COLUMN <table> <name> <expression...>
 *   ADD_MEASURE <table> <name> [expression...]
 *   ADD_RELATIONSHIP <from> <to> [name=n] [active=false] [crossFilter=bothDirections]
 *   RENAME <path> <newName>
 *   MOVE <path> <newParent>
 *   SET_EXPR <path> <expression...>
 *   SET <path> <property> <value...>
 *   REMOVE <path>
 *   GET <path> [property]
 *   DEPS <path> [all=true]
 *
 * History:
 *   UNDO / REDO / BEGIN_BATCH [label...] / END_BATCH / HISTORY
 *
 * State Inspection:
 *   SNAPSHOT / STATS
 *
 * Utility:
 *   ECHO <message...>
 *   ASSERT <path> <property> <==|!=|contains> <expected...>
 *   ASSERT <path> <exists|missing>
 *   ASSERT_ERROR [code]
 */

import { isCommandType, type CommandType, type ParsedCommand } from './types.js';

// =============================================================================
// Command Parser
// =============================================================================

/**
 * Number of arguments read before the rest of the line becomes `tail`.
 */
const TAIL_AFTER: Partial<Record<CommandType, number>> = {
  ADD_CALC_COLUMN: 2,
  ADD_MEASURE: 2,
  SET_EXPR: 1,
  SET: 2,
  ASSERT: 3,
  ECHO: 0,
  BEGIN_BATCH: 0,
};

const OPTION_KEY = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

interface Token {
  text: string;
  /** Started with a double quote */
  quoted: boolean;
  /** Offset just past the token */
  end: number;
}

export class CommandParser {
  /**
   * Parse a single command line.
   */
  parse(line: string, lineNumber: number = 0): ParsedCommand | null {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (trimmed === '' || trimmed.startsWith('#') || trimmed.startsWith('//')) {
      return null;
    }

    const head = this.readToken(trimmed, 0, lineNumber);
    if (!head) return null;

    // First token is the command
    const commandStr = head.text.toUpperCase();
    if (!isCommandType(commandStr)) {
      throw new ParseError(`Unknown command: ${commandStr}`, lineNumber, trimmed);
    }

    const args: string[] = [];
    const options: Record<string, string | boolean | number> = {};
    const tailAfter = TAIL_AFTER[commandStr];

    let pos = head.end;
    let tail: string | undefined;

    for (;;) {
      if (tailAfter !== undefined && args.length === tailAfter) {
        tail = trimmed.slice(pos).trim();
        break;
      }

      const token = this.readToken(trimmed, pos, lineNumber);
      if (!token) break;
      pos = token.end;

      // Tail commands take positional arguments only
      const eqIndex = token.text.indexOf('=');
      if (tailAfter === undefined && !token.quoted && eqIndex > 0) {
        const key = token.text.substring(0, eqIndex);
        if (OPTION_KEY.test(key)) {
          options[key] = this.parseOptionValue(token.text.substring(eqIndex + 1));
          continue;
        }
      }
      args.push(token.text);
    }

    return {
      type: commandStr,
      args,
      options,
      tail,
      raw: trimmed,
      lineNumber,
    };
  }

  /**
   * Parse multiple lines.
   */
  parseLines(lines: string[]): ParsedCommand[] {
    const commands: ParsedCommand[] = [];

    for (let i = 0; i < lines.length; i++) {
      const cmd = this.parse(lines[i], i + 1);
      if (cmd) {
        commands.push(cmd);
      }
    }

    return commands;
  }

  /**
   * Parse a script (multiline string).
   */
  parseScript(script: string): ParsedCommand[] {
    return this.parseLines(script.split(/\r?\n/));
  }

  /**
   * Split free text into arguments with the command-line quoting rules.
   * Used for list values such as `SET h levels Year Month`.
   */
  splitArguments(text: string): string[] {
    const result: string[] = [];
    let pos = 0;
    for (;;) {
      const token = this.readToken(text, pos, 0);
      if (!token) return result;
      result.push(token.text);
      pos = token.end;
    }
  }

  // ===========================================================================
  // Tokenizer
  // ===========================================================================

  /**
   * Read the token starting at or after `start`, or null at end of line.
   */
  private readToken(line: string, start: number, lineNumber: number): Token | null {
    let i = start;
    while (i < line.length && (line[i] === ' ' || line[i] === '\t')) i++;
    if (i >= line.length) return null;

    const quoted = line[i] === '"';
    let text = '';

    while (i < line.length) {
      const char = line[i];

      if (char === ' ' || char === '\t') {
        break;
      }

      if (char === '"') {
        // Quoted text: quotes dropped, escapes applied
        i++;
        let closed = false;
        while (i < line.length) {
          const c = line[i];
          if (c === '"') {
            closed = true;
            i++;
            break;
          }
          if (c === '\\' && i + 1 < line.length) {
            const next = line[i + 1];
            if (next === '"' || next === '\\' || next === 'n' || next === 't') {
              text += next === 'n' ? '\n' : next === 't' ? '\t' : next;
              i += 2;
              continue;
            }
          }
          text += c;
          i++;
        }
        if (!closed) {
          throw new ParseError('Unterminated string', lineNumber, line);
        }
        continue;
      }

      if (char === "'" || char === '[') {
        // Table names and member brackets are kept verbatim
        const close = char === "'" ? "'" : ']';
        const end = findClosing(line, i + 1, close);
        if (end < 0) {
          throw new ParseError(
            char === "'" ? 'Unterminated quoted name' : 'Unterminated bracket',
            lineNumber,
            line
          );
        }
        text += line.slice(i, end + 1);
        i = end + 1;
        continue;
      }

      text += char;
      i++;
    }

    return { text, quoted, end: i };
  }

  /**
   * Parse an option value to appropriate type.
   */
  private parseOptionValue(value: string): string | boolean | number {
    // Boolean
    if (value.toLowerCase() === 'true') return true;
    if (value.toLowerCase() === 'false') return false;

    // Number
    if (/^-?\d+\.?\d*$/.test(value)) {
      return parseFloat(value);
    }

    // String
    return value;
  }
}

/**
 * Index of the closing delimiter, skipping doubled (escaped) ones; -1 if none.
 */
function findClosing(line: string, from: number, close: string): number {
  let i = from;
  while (i < line.length) {
    if (line[i] === close) {
      if (line[i + 1] === close) {
        i += 2;
        continue;
      }
      return i;
    }
    i++;
  }
  return -1;
}

// =============================================================================
// Parse Error
// =============================================================================

export class ParseError extends Error {
  lineNumber: number;
  line: string;

  constructor(message: string, lineNumber: number, line: string) {
    super(`Parse error at line ${lineNumber}: ${message}\n  ${line}`);
    this.name = 'ParseError';
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCommandParser(): CommandParser {
  return new CommandParser();
}
