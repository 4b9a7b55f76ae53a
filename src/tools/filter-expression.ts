/**
 * Filter Expressions
 *
 * Restricted boolean language over column comparisons, compiled against a
 * dataset schema into a row predicate:
 *
 *   expr       := or
 *   or         := and ( OR and )*
 *   and        := unary ( AND unary )*
 *   unary      := NOT unary | '(' expr ')' | comparison
 *   comparison := column op literal
 *               | column [NOT] IN '(' literal ( ',' literal )* ')'
 *   op         := = | == | != | <> | < | > | <= | >= | CONTAINS
 *   literal    := 'text' | "text" | number | TRUE | FALSE | NULL | bare-word
 *
 * Columns may be written bare or in backticks. Keywords are case-insensitive.
 * String equality, IN and CONTAINS ignore case; a comparison against a null
 * cell is false unless the literal is NULL.
 */

import { QueryError } from '../core/errors.js';
import type { Cell, ColumnSchema, ColumnType, Row } from '../core/types.js';

// =============================================================================
// TOKENS
// =============================================================================

type TokenKind = 'ident' | 'quoted_ident' | 'string' | 'number' | 'word' | 'op' | 'lparen' | 'rparen' | 'comma' | 'eof';

interface Token {
  kind: TokenKind;
  text: string;
  start: number;
  end: number;
}

const OPERATORS = ['==', '!=', '<>', '<=', '>=', '=', '<', '>'];
const DELIMITERS = new Set([' ', '\t', '\n', '\r', '(', ')', ',', "'", '"', '`', '=', '!', '<', '>']);
const NUMBER_PATTERN = /^-?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const IDENT_PATTERN = /^[A-Za-z_][A-Za-z0-9_.]*$/;

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
      i++;
      continue;
    }

    if (ch === '(' || ch === ')' || ch === ',') {
      tokens.push({ kind: ch === '(' ? 'lparen' : ch === ')' ? 'rparen' : 'comma', text: ch, start: i, end: i + 1 });
      i++;
      continue;
    }

    if (ch === "'" || ch === '"' || ch === '`') {
      const start = i;
      let value = '';
      i++;
      let closed = false;
      while (i < source.length) {
        if (source[i] === ch) {
          // Doubled quote escapes itself, as in SQL
          if (source[i + 1] === ch) {
            value += ch;
            i += 2;
            continue;
          }
          closed = true;
          i++;
          break;
        }
        value += source[i];
        i++;
      }
      if (!closed) {
        throw new QueryError('Unterminated quoted value', source.slice(start));
      }
      tokens.push({ kind: ch === '`' ? 'quoted_ident' : 'string', text: value, start, end: i });
      continue;
    }

    const op = OPERATORS.find(candidate => source.startsWith(candidate, i));
    if (op) {
      tokens.push({ kind: 'op', text: op, start: i, end: i + op.length });
      i += op.length;
      continue;
    }

    if (ch === '!') {
      throw new QueryError("Unexpected '!'", source.slice(i, i + 2));
    }

    const start = i;
    while (i < source.length && !DELIMITERS.has(source[i])) {
      i++;
    }
    const text = source.slice(start, i);
    const kind: TokenKind = NUMBER_PATTERN.test(text) ? 'number' : IDENT_PATTERN.test(text) ? 'ident' : 'word';
    tokens.push({ kind, text, start, end: i });
  }

  tokens.push({ kind: 'eof', text: '', start: source.length, end: source.length });
  return tokens;
}

// =============================================================================
// AST
// =============================================================================

export type Literal =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'null' };

export type ComparisonOp = '=' | '!=' | '<' | '>' | '<=' | '>=' | 'contains';

export type FilterNode =
  | { type: 'and'; left: FilterNode; right: FilterNode }
  | { type: 'or'; left: FilterNode; right: FilterNode }
  | { type: 'not'; operand: FilterNode }
  | { type: 'compare'; column: string; op: ComparisonOp; value: Literal; clause: string }
  | { type: 'in'; column: string; values: Literal[]; negated: boolean; clause: string };

function normalizeOp(text: string): ComparisonOp {
  switch (text) {
    case '==':
      return '=';
    case '<>':
      return '!=';
    case '=':
    case '!=':
    case '<':
    case '>':
    case '<=':
    case '>=':
      return text;
    default:
      return 'contains';
  }
}

class Parser {
  private tokens: Token[];
  private position = 0;

  constructor(private readonly source: string) {
    this.tokens = tokenize(source);
  }

  parse(): FilterNode {
    const node = this.parseOr();
    const trailing = this.peek();
    if (trailing.kind !== 'eof') {
      throw new QueryError(`Unexpected '${trailing.text}'`, this.source.slice(trailing.start));
    }
    return node;
  }

  private peek(): Token {
    return this.tokens[this.position];
  }

  private next(): Token {
    const token = this.tokens[this.position];
    if (token.kind !== 'eof') this.position++;
    return token;
  }

  private isKeyword(token: Token, keyword: string): boolean {
    return token.kind === 'ident' && token.text.toUpperCase() === keyword;
  }

  private parseOr(): FilterNode {
    let left = this.parseAnd();
    while (this.isKeyword(this.peek(), 'OR')) {
      this.next();
      left = { type: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): FilterNode {
    let left = this.parseUnary();
    while (this.isKeyword(this.peek(), 'AND')) {
      this.next();
      left = { type: 'and', left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): FilterNode {
    const token = this.peek();
    if (this.isKeyword(token, 'NOT')) {
      this.next();
      return { type: 'not', operand: this.parseUnary() };
    }
    if (token.kind === 'lparen') {
      this.next();
      const inner = this.parseOr();
      const close = this.next();
      if (close.kind !== 'rparen') {
        throw new QueryError("Expected ')'", this.source.slice(token.start, close.end));
      }
      return inner;
    }
    return this.parseComparison();
  }

  private parseComparison(): FilterNode {
    const columnToken = this.next();
    if (columnToken.kind !== 'ident' && columnToken.kind !== 'quoted_ident') {
      throw new QueryError(
        columnToken.kind === 'eof' ? 'Expected a comparison' : `Expected a column name, found '${columnToken.text}'`,
        this.source.slice(columnToken.start) || this.source
      );
    }

    let negated = false;
    if (this.isKeyword(this.peek(), 'NOT')) {
      this.next();
      negated = true;
      if (!this.isKeyword(this.peek(), 'IN')) {
        throw new QueryError('Expected IN after NOT', this.source.slice(columnToken.start, this.peek().end));
      }
    }

    if (this.isKeyword(this.peek(), 'IN')) {
      this.next();
      const open = this.next();
      if (open.kind !== 'lparen') {
        throw new QueryError("Expected '(' after IN", this.source.slice(columnToken.start, open.end));
      }
      const values: Literal[] = [this.parseLiteral(columnToken.start)];
      let separator = this.next();
      while (separator.kind === 'comma') {
        values.push(this.parseLiteral(columnToken.start));
        separator = this.next();
      }
      if (separator.kind !== 'rparen') {
        throw new QueryError("Expected ')' to close IN list", this.source.slice(columnToken.start, separator.end));
      }
      return {
        type: 'in',
        column: columnToken.text,
        values,
        negated,
        clause: this.source.slice(columnToken.start, separator.end),
      };
    }

    const opToken = this.next();
    const isContains = this.isKeyword(opToken, 'CONTAINS');
    if (opToken.kind !== 'op' && !isContains) {
      throw new QueryError(
        `Expected a comparison operator after '${columnToken.text}'`,
        this.source.slice(columnToken.start, opToken.end) || this.source
      );
    }
    const value = this.parseLiteral(columnToken.start);
    const last = this.tokens[this.position - 1];

    return {
      type: 'compare',
      column: columnToken.text,
      op: isContains ? 'contains' : normalizeOp(opToken.text),
      value,
      clause: this.source.slice(columnToken.start, last.end),
    };
  }

  private parseLiteral(clauseStart: number): Literal {
    const token = this.next();
    switch (token.kind) {
      case 'string':
      case 'word':
        return { kind: 'string', value: token.text };
      case 'number':
        return { kind: 'number', value: Number(token.text) };
      case 'ident': {
        const upper = token.text.toUpperCase();
        if (upper === 'TRUE' || upper === 'FALSE') return { kind: 'boolean', value: upper === 'TRUE' };
        if (upper === 'NULL') return { kind: 'null' };
        return { kind: 'string', value: token.text };
      }
      default:
        throw new QueryError(
          token.kind === 'eof' ? 'Expected a value' : `Expected a value, found '${token.text}'`,
          this.source.slice(clauseStart, token.end) || this.source
        );
    }
  }
}

export function parseFilter(source: string): FilterNode {
  return new Parser(source).parse();
}

// =============================================================================
// COMPILATION
// =============================================================================

export type RowPredicate = (row: Row) => boolean;

function literalMatchesType(literal: Literal, type: ColumnType): boolean {
  return literal.kind === 'null' || literal.kind === type;
}

function describeLiteral(literal: Literal): string {
  return literal.kind === 'null' ? 'NULL' : `${literal.kind} ${JSON.stringify(literal.value)}`;
}

function lookupColumn(schema: readonly ColumnSchema[], name: string, clause: string): ColumnSchema {
  const column = schema.find(c => c.name === name) ?? schema.find(c => c.name.toLowerCase() === name.toLowerCase());
  if (!column) {
    throw new QueryError(`Unknown column '${name}' (available: ${schema.map(c => c.name).join(', ')})`, clause);
  }
  return column;
}

function equals(cell: Cell, literal: Literal): boolean {
  if (literal.kind === 'null') return cell === null;
  if (cell === null) return false;
  if (typeof cell === 'string' && literal.kind === 'string') {
    return cell.toLowerCase() === literal.value.toLowerCase();
  }
  return cell === literal.value;
}

function compareOrdered(cell: Cell, literal: Literal, op: '<' | '>' | '<=' | '>='): boolean {
  if (cell === null || literal.kind === 'null' || literal.kind === 'boolean') return false;
  if (typeof cell === 'boolean') return false;
  const value = literal.value;
  if (typeof cell !== typeof value) return false;
  switch (op) {
    case '<':
      return cell < value;
    case '>':
      return cell > value;
    case '<=':
      return cell <= value;
    case '>=':
      return cell >= value;
  }
}

function compileNode(node: FilterNode, schema: readonly ColumnSchema[]): RowPredicate {
  switch (node.type) {
    case 'and': {
      const left = compileNode(node.left, schema);
      const right = compileNode(node.right, schema);
      return row => left(row) && right(row);
    }
    case 'or': {
      const left = compileNode(node.left, schema);
      const right = compileNode(node.right, schema);
      return row => left(row) || right(row);
    }
    case 'not': {
      const operand = compileNode(node.operand, schema);
      return row => !operand(row);
    }
    case 'in': {
      const column = lookupColumn(schema, node.column, node.clause);
      for (const literal of node.values) {
        if (!literalMatchesType(literal, column.type)) {
          throw new QueryError(
            `Type mismatch: column '${column.name}' is ${column.type}, got ${describeLiteral(literal)}`,
            node.clause
          );
        }
      }
      const values = node.values;
      return row => {
        const cell = row[column.name] ?? null;
        const found = values.some(literal => equals(cell, literal));
        return node.negated ? !found && cell !== null : found;
      };
    }
    case 'compare': {
      const column = lookupColumn(schema, node.column, node.clause);
      const { op, value } = node;

      if (!literalMatchesType(value, column.type)) {
        throw new QueryError(
          `Type mismatch: column '${column.name}' is ${column.type}, got ${describeLiteral(value)}`,
          node.clause
        );
      }
      if (value.kind === 'null' && op !== '=' && op !== '!=') {
        throw new QueryError(`NULL only supports = and !=`, node.clause);
      }
      if (column.type === 'boolean' && op !== '=' && op !== '!=') {
        throw new QueryError(`Boolean column '${column.name}' only supports = and !=`, node.clause);
      }
      if (op === 'contains' && column.type !== 'string') {
        throw new QueryError(`CONTAINS needs a string column, '${column.name}' is ${column.type}`, node.clause);
      }

      switch (op) {
        case '=':
          return row => equals(row[column.name] ?? null, value);
        case '!=':
          return row => {
            const cell = row[column.name] ?? null;
            return value.kind === 'null' ? cell !== null : cell !== null && !equals(cell, value);
          };
        case 'contains': {
          const needle = value.kind === 'string' ? value.value.toLowerCase() : '';
          return row => {
            const cell = row[column.name] ?? null;
            return typeof cell === 'string' && cell.toLowerCase().includes(needle);
          };
        }
        default:
          return row => compareOrdered(row[column.name] ?? null, value, op);
      }
    }
  }
}

/**
 * Compile a filter expression against a schema. Blank expressions match every row.
 */
export function compileFilter(source: string | undefined, schema: readonly ColumnSchema[]): RowPredicate {
  if (source === undefined || source.trim() === '') {
    return () => true;
  }
  return compileNode(parseFilter(source), schema);
}
