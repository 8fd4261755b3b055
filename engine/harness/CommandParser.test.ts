/**
 * CommandParser Tests
 */

import { describe, it, expect } from 'vitest';
import { CommandParser, ParseError, createCommandParser } from './CommandParser.js';

describe('CommandParser', () => {
  const parser: CommandParser = createCommandParser();

  function parseError(line: string, lineNumber = 1): string {
    try {
      parser.parse(line, lineNumber);
    } catch (error) {
      if (error instanceof ParseError) return error.message;
      throw error;
    }
    throw new Error('Expected a ParseError');
  }

  describe('Lines', () => {
    it('should skip blank lines and comments', () => {
      expect(parser.parse('')).toBeNull();
      expect(parser.parse('   ')).toBeNull();
      expect(parser.parse('# setup')).toBeNull();
      expect(parser.parse('  // setup')).toBeNull();
    });

    it('should parse commands case-insensitively with options', () => {
      expect(parser.parse('  add_table Sales hidden=true  ', 7)).toEqual({
        type: 'ADD_TABLE',
        args: ['Sales'],
        options: { hidden: true },
        tail: undefined,
        raw: 'add_table Sales hidden=true',
        lineNumber: 7,
      });
    });

    it('should type option values', () => {
      const cmd = parser.parse('ADD_COLUMN Sales Amount dataType=decimal source=amount_1 max=12 ratio=-0.5 hidden=FALSE');

      expect(cmd?.options).toEqual({
        dataType: 'decimal',
        source: 'amount_1',
        max: 12,
        ratio: -0.5,
        hidden: false,
      });
      expect(cmd?.args).toEqual(['Sales', 'Amount']);
    });

    it('should not treat quoted or bracketed text as options', () => {
      const cmd = parser.parse('RENAME [a=b] "c=d"');

      expect(cmd?.args).toEqual(['[a=b]', 'c=d']);
      expect(cmd?.options).toEqual({});
    });

    it('should reject unknown commands', () => {
      expect(parseError('frob x', 3)).toBe('Parse error at line 3: Unknown command: FROB\n  frob x');
    });
  });

  describe('Arguments', () => {
    it('should keep quoted table names and brackets verbatim, spaces included', () => {
      const cmd = parser.parse("GET 'Sales Region'[Net Amount] expression");

      expect(cmd?.args).toEqual(["'Sales Region'[Net Amount]", 'expression']);
    });

    it('should keep doubled delimiters inside names', () => {
      const cmd = parser.parse("GET 'Bob''s'[Qty]]Units]");

      expect(cmd?.args).toEqual(["'Bob''s'[Qty]]Units]"]);
    });

    it('should drop double quotes and apply escapes', () => {
      const cmd = parser.parse('RENAME [Total] "Total \\"Net\\" \\\\ Sales"');

      expect(cmd?.args).toEqual(['[Total]', 'Total "Net" \\ Sales']);
    });

    it('should join adjacent segments into one argument', () => {
      const cmd = parser.parse('GET relationship:"Sales to Customer" isActive');

      expect(cmd?.args).toEqual(['relationship:Sales to Customer', 'isActive']);
    });

    it.each([
      ['RENAME [Total] "open', 'Unterminated string'],
      ["GET 'Sales", 'Unterminated quoted name'],
      ['GET [Total', 'Unterminated bracket'],
    ])('should reject %j', (line, message) => {
      expect(parseError(line)).toBe(`Parse error at line 1: ${message}\n  ${line}`);
    });
  });

  describe('Free-text Tails', () => {
    it('should take the rest of the line as the expression', () => {
      const cmd = parser.parse('ADD_MEASURE Sales Total SUM(Sales[Amount]) * 2');

      expect(cmd?.args).toEqual(['Sales', 'Total']);
      expect(cmd?.tail).toBe('SUM(Sales[Amount]) * 2');
    });

    it('should keep quotes and option-like text in the tail', () => {
      const cmd = parser.parse("SET_EXPR 'Sales'[Label] \"x=\" & [Total]   ");

      expect(cmd?.args).toEqual(["'Sales'[Label]"]);
      expect(cmd?.tail).toBe('"x=" & [Total]');
      expect(cmd?.options).toEqual({});
    });

    it('should give an empty tail when nothing follows', () => {
      expect(parser.parse('ADD_MEASURE Sales Total')?.tail).toBe('');
      expect(parser.parse('ECHO')?.tail).toBe('');
    });

    it('should split assertions into operands and expected text', () => {
      const cmd = parser.parse('ASSERT [Double] expression == [Total Sales] * 2');

      expect(cmd?.args).toEqual(['[Double]', 'expression', '==']);
      expect(cmd?.tail).toBe('[Total Sales] * 2');
    });

    it('should leave the tail unset when the arguments run out first', () => {
      const cmd = parser.parse('ASSERT Sales exists');

      expect(cmd?.args).toEqual(['Sales', 'exists']);
      expect(cmd?.tail).toBeUndefined();
    });

    it('should echo text with its inner spacing', () => {
      expect(parser.parse('ECHO  hello   world ')?.tail).toBe('hello   world');
    });
  });

  describe('Scripts', () => {
    it('should number lines from one and skip non-commands', () => {
      const commands = parser.parseScript('ADD_TABLE A\n\n# note\r\nUNDO');

      expect(commands.map(cmd => [cmd.type, cmd.lineNumber])).toEqual([
        ['ADD_TABLE', 1],
        ['UNDO', 4],
      ]);
    });

    it('should split list values with the same quoting rules', () => {
      expect(parser.splitArguments(`Country 'Geo Table'[City]  "Two words"`)).toEqual([
        'Country',
        "'Geo Table'[City]",
        'Two words',
      ]);
      expect(parser.splitArguments('   ')).toEqual([]);
    });
  });
});
