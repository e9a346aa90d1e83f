/**
 * Filter text parser.
 *
 * ```
 * filter := clause (("AND" | "&&") clause)*
 * clause := attr ("=" | "==") value
 *         | attr ("!=" | "<>") value
 *         | "attribute_exists(" attr ")" | "attribute_not_exists(" attr ")"
 *         | attr "exists" | attr "not_exists"
 * ```
 *
 * Quoted values are strings. Bare values are numbers when they have JSON
 * number syntax, `true`/`false`/`null` literals, and strings otherwise.
 */

import { isJsonNumberText } from '../codec/index.js';
import { InvalidFilterSyntaxError } from '../error/index.js';
import type { Filter, Value } from '../types/index.js';

type Token =
  | { kind: 'word'; text: string; position: number }
  | { kind: 'string'; text: string; position: number }
  | { kind: 'operator'; text: string; position: number }
  | { kind: 'and'; text: string; position: number }
  | { kind: 'lparen'; text: string; position: number }
  | { kind: 'rparen'; text: string; position: number };

const OPERATOR_CHARS = new Set(['=', '!', '<', '>', '~']);
const KNOWN_OPERATORS = new Set(['=', '==', '!=', '<>']);
const SPECIAL_CHARS = new Set(['(', ')', '"', "'", '&', '|', ...OPERATOR_CHARS]);

// ============================================================================
// Tokenizer
// ============================================================================

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < text.length) {
    const char = text.charAt(index);

    if (/\s/.test(char)) {
      index++;
      continue;
    }

    if (char === '(' || char === ')') {
      tokens.push({ kind: char === '(' ? 'lparen' : 'rparen', text: char, position: index });
      index++;
      continue;
    }

    if (char === '"' || char === "'") {
      const start = index;
      let value = '';
      index++;
      while (index < text.length && text.charAt(index) !== char) {
        if (text.charAt(index) === '\\' && index + 1 < text.length) {
          index++;
        }
        value += text.charAt(index);
        index++;
      }
      if (index >= text.length) {
        throw new InvalidFilterSyntaxError('Unterminated quoted string', text, start);
      }
      index++;
      tokens.push({ kind: 'string', text: value, position: start });
      continue;
    }

    if (OPERATOR_CHARS.has(char)) {
      const start = index;
      while (index < text.length && OPERATOR_CHARS.has(text.charAt(index))) {
        index++;
      }
      tokens.push({ kind: 'operator', text: text.slice(start, index), position: start });
      continue;
    }

    if (text.startsWith('&&', index)) {
      tokens.push({ kind: 'and', text: '&&', position: index });
      index += 2;
      continue;
    }

    if (SPECIAL_CHARS.has(char)) {
      throw new InvalidFilterSyntaxError(`Unexpected character '${char}'`, text, index);
    }

    const start = index;
    while (index < text.length && !/\s/.test(text.charAt(index)) && !SPECIAL_CHARS.has(text.charAt(index))) {
      index++;
    }
    const word = text.slice(start, index);
    tokens.push(
      word.toUpperCase() === 'AND'
        ? { kind: 'and', text: word, position: start }
        : { kind: 'word', text: word, position: start }
    );
  }

  return tokens;
}

// ============================================================================
// Parser
// ============================================================================

class FilterParser {
  private index = 0;

  constructor(
    private readonly text: string,
    private readonly tokens: Token[]
  ) {}

  parse(): Filter {
    if (this.tokens.length === 0) {
      throw new InvalidFilterSyntaxError('Empty filter', this.text, 0);
    }

    const clauses = [this.parseClause()];
    while (this.peek()?.kind === 'and') {
      this.index++;
      clauses.push(this.parseClause());
    }

    const trailing = this.peek();
    if (trailing) {
      throw new InvalidFilterSyntaxError(`Unexpected '${trailing.text}'`, this.text, trailing.position);
    }

    const [first] = clauses;
    return clauses.length === 1 && first ? first : { kind: 'and', clauses };
  }

  private parseClause(): Filter {
    const token = this.next('Expected an attribute name');

    if (token.kind === 'word' && this.peek()?.kind === 'lparen') {
      const fn = token.text.toLowerCase();
      if (fn !== 'attribute_exists' && fn !== 'attribute_not_exists') {
        throw new InvalidFilterSyntaxError(`Unknown function '${token.text}'`, this.text, token.position);
      }
      this.index++;
      const attribute = this.parseAttribute();
      const close = this.next(`Expected ')' to close ${token.text}`);
      if (close.kind !== 'rparen') {
        throw new InvalidFilterSyntaxError(`Expected ')' to close ${token.text}`, this.text, close.position);
      }
      return { kind: fn === 'attribute_exists' ? 'exists' : 'notExists', attribute };
    }

    if (token.kind !== 'word' && token.kind !== 'string') {
      throw new InvalidFilterSyntaxError('Expected an attribute name', this.text, token.position);
    }
    const attribute = token.text;

    const operator = this.next(`Missing operator after '${attribute}'`);
    if (operator.kind === 'word') {
      const keyword = operator.text.toLowerCase();
      if (keyword === 'exists') {
        return { kind: 'exists', attribute };
      }
      if (keyword === 'not_exists') {
        return { kind: 'notExists', attribute };
      }
    }
    if (operator.kind !== 'operator') {
      throw new InvalidFilterSyntaxError(`Expected an operator, got '${operator.text}'`, this.text, operator.position);
    }
    if (!KNOWN_OPERATORS.has(operator.text)) {
      throw new InvalidFilterSyntaxError(`Unknown operator '${operator.text}'`, this.text, operator.position);
    }

    const value = this.parseValue(operator.text);
    return operator.text === '=' || operator.text === '=='
      ? { kind: 'equals', attribute, value }
      : { kind: 'notEquals', attribute, value };
  }

  private parseAttribute(): string {
    const token = this.next('Expected an attribute name');
    if (token.kind !== 'word' && token.kind !== 'string') {
      throw new InvalidFilterSyntaxError('Expected an attribute name', this.text, token.position);
    }
    return token.text;
  }

  private parseValue(operator: string): Value {
    const token = this.next(`Missing operand after '${operator}'`);
    if (token.kind === 'string') {
      return { type: 'S', value: token.text };
    }
    if (token.kind !== 'word') {
      throw new InvalidFilterSyntaxError(`Missing operand after '${operator}'`, this.text, token.position);
    }
    return inferBareValue(token.text);
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private next(message: string): Token {
    const token = this.tokens[this.index];
    if (!token) {
      throw new InvalidFilterSyntaxError(message, this.text, this.text.length);
    }
    this.index++;
    return token;
  }
}

function inferBareValue(text: string): Value {
  if (text === 'true' || text === 'false') {
    return { type: 'BOOL', value: text === 'true' };
  }
  if (text === 'null') {
    return { type: 'NULL' };
  }
  if (isJsonNumberText(text)) {
    return { type: 'N', value: text };
  }
  return { type: 'S', value: text };
}

/**
 * Parses filter text into a Filter AST.
 *
 * @throws {InvalidFilterSyntaxError} On empty input, unknown operators,
 * missing operands, unterminated quotes or trailing tokens
 */
export function parseFilter(text: string): Filter {
  return new FilterParser(text, tokenize(text)).parse();
}
