/**
 * Build file parser
 *
 * Hand-written tokenizer and recursive-descent parser for the BUILD
 * subset described in ast.ts. Comments are attached to the nearest node:
 * whole-line comments to the node that follows, same-line comments to
 * the node that precedes. A comment group followed by a blank line at
 * file level becomes its own CommentBlock statement.
 */

import type {
  AssignExpr,
  BuildFile,
  CallExpr,
  Comment,
  CommentBlock,
  DictExpr,
  Expr,
  KeyValueExpr,
  ListExpr,
  Statement,
} from './ast.js';
import { emptyComments } from './ast.js';

/**
 * Error thrown for malformed build files
 */
export class BuildFileSyntaxError extends Error {
  readonly line: number;
  readonly col: number;

  constructor(filePath: string, line: number, col: number, message: string) {
    super(`${filePath}:${line}:${col}: ${message}`);
    this.name = 'BuildFileSyntaxError';
    this.line = line;
    this.col = col;
  }
}

type TokenKind = 'string' | 'ident' | 'number' | 'punct' | 'comment' | 'eof';

interface Token {
  kind: TokenKind;
  value: string;
  tripleQuoted: boolean;
  line: number;
  col: number;
  endLine: number;
  /** Comment is the only thing on its line */
  ownLine: boolean;
  /** At least one blank line separates this token from the previous one */
  blankBefore: boolean;
}

const PUNCTUATION = new Set(['(', ')', '[', ']', '{', '}', ',', ':', '=', '+']);

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  '"': '"',
  "'": "'",
  '0': '\0',
  '\n': '',
};

function tokenize(source: string, filePath: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  let line = 1;
  let lineStart = 0;
  let prevEndLine = 0;

  const fail = (message: string): never => {
    throw new BuildFileSyntaxError(filePath, line, pos - lineStart + 1, message);
  };

  const push = (kind: TokenKind, value: string, startLine: number, startCol: number, tripleQuoted = false): void => {
    tokens.push({
      kind,
      value,
      tripleQuoted,
      line: startLine,
      col: startCol,
      endLine: line,
      ownLine: startLine > prevEndLine,
      blankBefore: tokens.length > 0 && startLine > prevEndLine + 1,
    });
    prevEndLine = line;
  };

  while (pos < source.length) {
    const ch = source[pos];

    if (ch === '\n') {
      pos++;
      line++;
      lineStart = pos;
      continue;
    }
    if (ch === ' ' || ch === '\t' || ch === '\r') {
      pos++;
      continue;
    }
    if (ch === '\\' && source[pos + 1] === '\n') {
      pos += 2;
      line++;
      lineStart = pos;
      continue;
    }

    const startLine = line;
    const startCol = pos - lineStart + 1;

    if (ch === '#') {
      let end = source.indexOf('\n', pos);
      if (end < 0) end = source.length;
      push('comment', source.slice(pos, end).trimEnd(), startLine, startCol);
      pos = end;
      continue;
    }

    if (ch === '"' || ch === "'" || ((ch === 'r' || ch === 'R') && (source[pos + 1] === '"' || source[pos + 1] === "'"))) {
      const raw = ch === 'r' || ch === 'R';
      if (raw) pos++;
      const quote = source[pos];
      const triple = source.startsWith(quote.repeat(3), pos);
      pos += triple ? 3 : 1;
      let value = '';
      while (true) {
        if (pos >= source.length) {
          fail('unterminated string literal');
        }
        const c = source[pos];
        if (triple ? source.startsWith(quote.repeat(3), pos) : c === quote) {
          pos += triple ? 3 : 1;
          break;
        }
        if (c === '\n') {
          if (!triple) fail('newline in string literal');
          line++;
          lineStart = pos + 1;
        }
        if (c === '\\' && !raw) {
          const next = source[pos + 1];
          const mapped = next === undefined ? undefined : ESCAPES[next];
          if (mapped !== undefined) {
            if (next === '\n') {
              line++;
              lineStart = pos + 2;
            }
            value += mapped;
          } else {
            value += c + (next ?? '');
          }
          pos += 2;
          continue;
        }
        value += c;
        pos++;
      }
      push('string', value, startLine, startCol, triple);
      continue;
    }

    if (/[A-Za-z_]/.test(ch)) {
      const match = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*/.exec(source.slice(pos));
      const word = match ? match[0] : ch;
      pos += word.length;
      push('ident', word, startLine, startCol);
      continue;
    }

    if (/[0-9]/.test(ch)) {
      const match = /^[0-9][0-9a-fA-FxXoO._]*/.exec(source.slice(pos));
      const num = match ? match[0] : ch;
      pos += num.length;
      push('number', num, startLine, startCol);
      continue;
    }

    if (PUNCTUATION.has(ch)) {
      pos++;
      push('punct', ch, startLine, startCol);
      continue;
    }

    fail(`unexpected character ${JSON.stringify(ch)}`);
  }

  tokens.push({
    kind: 'eof',
    value: '',
    tripleQuoted: false,
    line,
    col: pos - lineStart + 1,
    endLine: line,
    ownLine: true,
    blankBefore: line > prevEndLine + 1,
  });
  return tokens;
}

class Parser {
  private pos = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly filePath: string
  ) {}

  parseFile(): Statement[] {
    const statements: Statement[] = [];

    while (true) {
      let pending: Comment[] = [];
      while (this.peek().kind === 'comment') {
        pending.push({ text: this.next().value });
        if (this.peek().kind === 'eof' || this.peek().blankBefore) {
          statements.push(this.commentBlock(pending));
          pending = [];
        }
      }
      if (this.peek().kind === 'eof') {
        break;
      }

      const stmt = this.parseStatement();
      stmt.comments.before.unshift(...pending);
      this.takeSuffix(stmt);
      statements.push(stmt);
    }

    return statements;
  }

  private commentBlock(comments: Comment[]): CommentBlock {
    return { kind: 'comment-block', comments: { before: comments, suffix: [], after: [] } };
  }

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
  }

  private next(): Token {
    const tok = this.peek();
    if (this.pos < this.tokens.length - 1) this.pos++;
    return tok;
  }

  private fail(tok: Token, message: string): never {
    throw new BuildFileSyntaxError(this.filePath, tok.line, tok.col, message);
  }

  private isPunct(tok: Token, value: string): boolean {
    return tok.kind === 'punct' && tok.value === value;
  }

  private expectPunct(value: string): Token {
    const tok = this.next();
    if (!this.isPunct(tok, value)) {
      this.fail(tok, `expected "${value}", found ${describe(tok)}`);
    }
    return tok;
  }

  /** Consume whole-line comments */
  private takeLeading(): Comment[] {
    const comments: Comment[] = [];
    while (this.peek().kind === 'comment' && this.peek().ownLine) {
      comments.push({ text: this.next().value });
    }
    return comments;
  }

  /** Consume same-line comments following a node */
  private takeSuffix(expr: Expr): void {
    while (this.peek().kind === 'comment' && !this.peek().ownLine) {
      expr.comments.suffix.push({ text: this.next().value });
    }
  }

  private parseStatement(): CallExpr | AssignExpr {
    const start = this.peek();
    if (start.kind === 'ident' && this.isPunct(this.peek(1), '=')) {
      this.next();
      this.next();
      return { kind: 'assign', name: start.value, value: this.parseExpr(), comments: emptyComments() };
    }
    const expr = this.parseExpr();
    if (expr.kind !== 'call') {
      this.fail(start, 'expected rule call or assignment at top level');
    }
    return expr;
  }

  private parseExpr(): Expr {
    let left = this.parsePrimary();
    while (this.isPunct(this.peek(), '+')) {
      this.next();
      const right = this.parsePrimary();
      left = { kind: 'binary', op: '+', left, right, comments: emptyComments() };
    }
    return left;
  }

  private parsePrimary(): Expr {
    const tok = this.next();
    switch (tok.kind) {
      case 'string':
        return { kind: 'string', value: tok.value, tripleQuoted: tok.tripleQuoted, comments: emptyComments() };
      case 'number':
        return { kind: 'number', token: tok.value, comments: emptyComments() };
      case 'ident':
        if (this.isPunct(this.peek(), '(')) {
          return this.parseCall(tok.value);
        }
        return { kind: 'ident', name: tok.value, comments: emptyComments() };
      case 'punct':
        if (tok.value === '[') return this.parseList(tok);
        if (tok.value === '{') return this.parseDict();
        if (tok.value === '(') {
          const inner = this.parseExpr();
          this.expectPunct(')');
          return inner;
        }
        break;
      default:
        break;
    }
    return this.fail(tok, `unexpected ${describe(tok)}`);
  }

  /**
   * Parse a comma-separated sequence up to `close`, attaching comments
   * to items and to the container
   */
  private parseSequence<T extends Expr>(container: Expr, close: string, parseItem: () => T): T[] {
    const items: T[] = [];
    this.takeSuffix(container);

    while (true) {
      const before = this.takeLeading();
      if (this.isPunct(this.peek(), close)) {
        container.comments.after.push(...before);
        this.next();
        return items;
      }

      const item = parseItem();
      item.comments.before.unshift(...before);
      items.push(item);

      const hasComma = this.isPunct(this.peek(), ',');
      if (hasComma) this.next();
      this.takeSuffix(item);

      if (!hasComma) {
        container.comments.after.push(...this.takeLeading());
        this.expectPunct(close);
        return items;
      }
    }
  }

  private parseCall(callee: string): CallExpr {
    this.expectPunct('(');
    const call: CallExpr = { kind: 'call', callee, args: [], comments: emptyComments() };
    call.args = this.parseSequence<Expr>(call, ')', () => {
      const tok = this.peek();
      if (tok.kind === 'ident' && this.isPunct(this.peek(1), '=')) {
        this.next();
        this.next();
        const assign: AssignExpr = { kind: 'assign', name: tok.value, value: this.parseExpr(), comments: emptyComments() };
        return assign;
      }
      return this.parseExpr();
    });
    return call;
  }

  private parseList(open: Token): ListExpr {
    const list: ListExpr = { kind: 'list', items: [], forceMultiLine: false, comments: emptyComments() };
    const firstLine = this.peek().kind === 'comment' && !this.peek().ownLine ? open.line + 1 : this.peek().line;
    list.items = this.parseSequence<Expr>(list, ']', () => this.parseExpr());
    list.forceMultiLine = list.items.length > 0 && firstLine > open.line;
    return list;
  }

  private parseDict(): DictExpr {
    const dict: DictExpr = { kind: 'dict', entries: [], comments: emptyComments() };
    dict.entries = this.parseSequence<KeyValueExpr>(dict, '}', () => {
      const key = this.parseExpr();
      this.expectPunct(':');
      const value = this.parseExpr();
      return { kind: 'keyvalue', key, value, comments: emptyComments() };
    });
    return dict;
  }
}

function describe(tok: Token): string {
  if (tok.kind === 'eof') return 'end of file';
  if (tok.kind === 'string') return 'string literal';
  return `"${tok.value}"`;
}

/**
 * Parse build file content
 *
 * @throws BuildFileSyntaxError when the content is not valid
 */
export function parseBuildFile(filePath: string, content: string): BuildFile {
  const source = content.startsWith('﻿') ? content.slice(1) : content;
  const parser = new Parser(tokenize(source, filePath), filePath);
  return { path: filePath, statements: parser.parseFile() };
}
