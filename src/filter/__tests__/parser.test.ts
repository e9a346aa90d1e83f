/**
 * Filter parser tests
 */

import { describe, it, expect } from 'vitest';
import { parseFilter } from '../parser.js';
import { InvalidFilterSyntaxError } from '../../error/index.js';

function syntaxError(text: string): InvalidFilterSyntaxError {
  try {
    parseFilter(text);
  } catch (error) {
    if (error instanceof InvalidFilterSyntaxError) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected '${text}' to be rejected`);
}

describe('parseFilter', () => {
  describe('comparisons', () => {
    it('should parse equality without spaces', () => {
      expect(parseFilter('status=archived')).toEqual({
        kind: 'equals',
        attribute: 'status',
        value: { type: 'S', value: 'archived' },
      });
    });

    it('should infer bare value types', () => {
      expect(parseFilter('age = 30')).toEqual({ kind: 'equals', attribute: 'age', value: { type: 'N', value: '30' } });
      expect(parseFilter('active == true')).toEqual({
        kind: 'equals',
        attribute: 'active',
        value: { type: 'BOOL', value: true },
      });
      expect(parseFilter('deleted = null')).toEqual({ kind: 'equals', attribute: 'deleted', value: { type: 'NULL' } });
      expect(parseFilter('zip = 007')).toEqual({ kind: 'equals', attribute: 'zip', value: { type: 'S', value: '007' } });
    });

    it('should keep quoted values as strings', () => {
      expect(parseFilter('code = "30"')).toEqual({ kind: 'equals', attribute: 'code', value: { type: 'S', value: '30' } });
      expect(parseFilter("name = 'Ann \\'A\\' Lee'")).toEqual({
        kind: 'equals',
        attribute: 'name',
        value: { type: 'S', value: "Ann 'A' Lee" },
      });
    });

    it('should accept both not-equals spellings', () => {
      const expected = { kind: 'notEquals', attribute: 'status', value: { type: 'S', value: 'archived' } };
      expect(parseFilter('status != archived')).toEqual(expected);
      expect(parseFilter('status <> archived')).toEqual(expected);
    });

    it('should accept quoted attribute names', () => {
      expect(parseFilter('"first name" = Ann')).toEqual({
        kind: 'equals',
        attribute: 'first name',
        value: { type: 'S', value: 'Ann' },
      });
    });
  });

  describe('existence checks', () => {
    it('should parse function forms case-insensitively', () => {
      expect(parseFilter('attribute_exists(email)')).toEqual({ kind: 'exists', attribute: 'email' });
      expect(parseFilter('ATTRIBUTE_NOT_EXISTS( deletedAt )')).toEqual({ kind: 'notExists', attribute: 'deletedAt' });
    });

    it('should parse short forms', () => {
      expect(parseFilter('email exists')).toEqual({ kind: 'exists', attribute: 'email' });
      expect(parseFilter('email not_exists')).toEqual({ kind: 'notExists', attribute: 'email' });
    });
  });

  describe('conjunctions', () => {
    it('should combine clauses with AND, and or &&', () => {
      expect(parseFilter('attribute_exists(email) AND status = active and n != 1 && x exists')).toEqual({
        kind: 'and',
        clauses: [
          { kind: 'exists', attribute: 'email' },
          { kind: 'equals', attribute: 'status', value: { type: 'S', value: 'active' } },
          { kind: 'notEquals', attribute: 'n', value: { type: 'N', value: '1' } },
          { kind: 'exists', attribute: 'x' },
        ],
      });
    });
  });

  describe('syntax errors', () => {
    it('should reject empty text', () => {
      const error = syntaxError('   ');
      expect(error.position).toBe(0);
      expect(error.code).toBe('InvalidFilterSyntax');
    });

    it('should reject unknown operators', () => {
      expect(syntaxError('age > 30').position).toBe(4);
      expect(syntaxError('age > 30').message).toContain("Unknown operator '>'");
      expect(syntaxError('name =~ x').message).toContain("Unknown operator '=~'");
    });

    it('should reject missing operands', () => {
      const error = syntaxError('status =');
      expect(error.message).toContain("Missing operand after '='");
      expect(error.position).toBe(8);
    });

    it('should reject a missing operator', () => {
      expect(syntaxError('status').message).toContain("Missing operator after 'status'");
    });

    it('should reject unterminated quotes', () => {
      expect(syntaxError('name = "abc').position).toBe(7);
    });

    it('should reject trailing tokens', () => {
      const error = syntaxError('a = 1 b = 2');
      expect(error.message).toContain("Unexpected 'b'");
      expect(error.position).toBe(6);
    });

    it('should reject a dangling AND', () => {
      expect(syntaxError('a = 1 AND').position).toBe(9);
    });

    it('should reject unknown functions', () => {
      expect(syntaxError('begins_with(name)').message).toContain("Unknown function 'begins_with'");
    });
  });
});
