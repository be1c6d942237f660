/**
 * Tokenizer and parser for the ASCII property-list syntax used by pbxproj files
 *
 * Only what object entries need: dictionaries, arrays, quoted and bare strings,
 * block and line comments.
 */

import type { PlistDict, PlistValue } from './types.js';

type Punct = '{' | '}' | '(' | ')' | '=' | ';' | ',';

export type Token =
  | { kind: 'punct'; value: Punct; offset: number }
  | { kind: 'string'; value: string; quoted: boolean; offset: number };

/**
 * Raised by the tokenizer and parser; callers translate it into a
 * MalformedManifestError with a line number.
 */
export class PlistSyntaxError extends Error {
  public readonly offset: number;

  constructor(message: string, offset: number) {
    super(message);
    this.name = 'PlistSyntaxError';
    this.offset = offset;
  }
}

const PUNCTUATION: ReadonlySet<string> = new Set(['{', '}', '(', ')', '=', ';', ',']);

function isPunct(ch: string): ch is Punct {
  return PUNCTUATION.has(ch);
}

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '"': '"',
  '\\': '\\',
  "'": "'",
};

function isBareChar(ch: string): boolean {
  return !/\s/.test(ch) && !isPunct(ch) && ch !== '"';
}

/**
 * Split property-list text into tokens, dropping whitespace and comments
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === '/' && text[i + 1] === '*') {
      const close = text.indexOf('*/', i + 2);
      if (close === -1) {
        throw new PlistSyntaxError('Unterminated comment', i);
      }
      i = close + 2;
      continue;
    }

    if (ch === '/' && text[i + 1] === '/') {
      const newline = text.indexOf('\n', i);
      i = newline === -1 ? text.length : newline + 1;
      continue;
    }

    if (isPunct(ch)) {
      tokens.push({ kind: 'punct', value: ch, offset: i });
      i++;
      continue;
    }

    if (ch === '"') {
      const start = i;
      let value = '';
      i++;
      while (i < text.length && text[i] !== '"') {
        if (text[i] === '\\') {
          const next = text[i + 1];
          if (next === undefined) break;
          value += ESCAPES[next] ?? next;
          i += 2;
        } else {
          value += text[i];
          i++;
        }
      }
      if (i >= text.length) {
        throw new PlistSyntaxError('Unterminated string', start);
      }
      i++;
      tokens.push({ kind: 'string', value, quoted: true, offset: start });
      continue;
    }

    const start = i;
    while (i < text.length && isBareChar(text[i]) && !(text[i] === '/' && text[i + 1] === '*')) {
      i++;
    }
    tokens.push({ kind: 'string', value: text.slice(start, i), quoted: false, offset: start });
  }

  return tokens;
}

/**
 * Recursive-descent parser over a token list
 */
export class PlistParser {
  private pos = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly endOffset: number
  ) {}

  get done(): boolean {
    return this.pos >= this.tokens.length;
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private offsetHere(): number {
    return this.peek()?.offset ?? this.endOffset;
  }

  expectPunct(value: string): void {
    const token = this.peek();
    if (!token || token.kind !== 'punct' || token.value !== value) {
      throw new PlistSyntaxError(`Expected '${value}'`, this.offsetHere());
    }
    this.pos++;
  }

  expectString(): string {
    const token = this.peek();
    if (!token || token.kind !== 'string') {
      throw new PlistSyntaxError('Expected a string', this.offsetHere());
    }
    this.pos++;
    return token.value;
  }

  parseValue(): PlistValue {
    const token = this.peek();
    if (!token) {
      throw new PlistSyntaxError('Unexpected end of input', this.endOffset);
    }
    if (token.kind === 'string') {
      this.pos++;
      return token.value;
    }
    if (token.value === '{') return this.parseDict();
    if (token.value === '(') return this.parseArray();
    throw new PlistSyntaxError(`Unexpected '${token.value}'`, token.offset);
  }

  parseDict(): PlistDict {
    this.expectPunct('{');
    const dict: PlistDict = {};
    for (;;) {
      const token = this.peek();
      if (token?.kind === 'punct' && token.value === '}') {
        this.pos++;
        return dict;
      }
      const key = this.expectString();
      this.expectPunct('=');
      dict[key] = this.parseValue();
      this.expectPunct(';');
    }
  }

  parseArray(): PlistValue[] {
    this.expectPunct('(');
    const values: PlistValue[] = [];
    for (;;) {
      const token = this.peek();
      if (token?.kind === 'punct' && token.value === ')') {
        this.pos++;
        return values;
      }
      values.push(this.parseValue());
      const next = this.peek();
      if (next?.kind === 'punct' && next.value === ',') {
        this.pos++;
      } else if (!(next?.kind === 'punct' && next.value === ')')) {
        throw new PlistSyntaxError("Expected ',' or ')'", this.offsetHere());
      }
    }
  }
}

/**
 * Parse one object entry of the form `ID /* comment *\/ = { ... };`
 */
export function parseObjectEntry(text: string): { id: string; attributes: PlistDict } {
  const parser = new PlistParser(tokenize(text), text.length);
  const id = parser.expectString();
  parser.expectPunct('=');
  const value = parser.parseValue();
  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new PlistSyntaxError('Object entry value must be a dictionary', 0);
  }
  parser.expectPunct(';');
  if (!parser.done) {
    throw new PlistSyntaxError('Unexpected content after object entry', text.length);
  }
  return { id, attributes: value };
}

/**
 * Read a string attribute, ignoring arrays and dictionaries
 */
export function stringAttribute(dict: PlistDict, key: string): string | undefined {
  const value = dict[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Quote a value the way Xcode writes it: bare when it only holds
 * identifier-like characters, double-quoted and escaped otherwise
 */
export function quoteValue(value: string): string {
  if (/^[A-Za-z0-9_$./]+$/.test(value)) {
    return value;
  }
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t');
  return `"${escaped}"`;
}
