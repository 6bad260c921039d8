/**
 * Expression grammar for template leaves
 *
 *   expression  := '${' call '}' | call        (bare form: catalog names only)
 *   call        := NAME ( ':' arguments? )?
 *   arguments   := argument ( ',' argument )*
 *   argument    := NAME '=' value | value      (keywords after positionals)
 *   value       := list | quoted | token
 *   list        := '[' ( value ( ',' value )* )? ']'
 *
 * Tokens read as numbers, true/false, null, or otherwise as bare strings.
 */

import { isDistributionName } from '../dists/catalog.js';
import { ExpressionParseError } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import type { ExpressionArg } from '../types/values.js';

export type ExpressionForm = 'interpolation' | 'bare';

export interface Expression {
  distribution: string;
  args: ExpressionArg[];
  kwargs: Record<string, ExpressionArg>;
  form: ExpressionForm;
}

const INTERPOLATION = /^\$\{([\s\S]*)\}$/;
const BARE_CALL = /^([A-Za-z_][A-Za-z0-9_]*)\s*:/;
const CALL_HEAD = /^\s*([A-Za-z_][A-Za-z0-9_]*)\s*/;
const KEYWORD = /([A-Za-z_][A-Za-z0-9_]*)\s*=(?!=)/y;
const NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const TOKEN_STOP = new Set([',', '[', ']']);

/**
 * Classify a leaf string; `null` means the leaf is a literal.
 */
export function detectExpression(text: string): ExpressionForm | null {
  const trimmed = text.trim();
  if (INTERPOLATION.test(trimmed)) return 'interpolation';
  const bare = BARE_CALL.exec(trimmed);
  if (bare?.[1] && isDistributionName(bare[1])) return 'bare';
  return null;
}

export function parseExpression(
  text: string
): Result<Expression, ExpressionParseError> {
  const form = detectExpression(text);
  if (form === null) {
    return err(
      new ExpressionParseError({
        message: 'Text is not a distribution expression',
        position: 0,
        context: { source: text },
      })
    );
  }

  const trimmed = text.trim();
  const offset = text.indexOf(trimmed);
  const body = form === 'interpolation' ? trimmed.slice(2, -1) : trimmed;
  const bodyOffset = offset + (form === 'interpolation' ? 2 : 0);

  try {
    const reader = new ArgumentReader(body, bodyOffset, text);
    const { distribution, args, kwargs } = reader.readCall();
    return ok({ distribution, args, kwargs, form });
  } catch (error) {
    if (error instanceof ExpressionParseError) return err(error);
    throw error;
  }
}

class ArgumentReader {
  private pos = 0;

  constructor(
    private readonly body: string,
    private readonly offset: number,
    private readonly source: string
  ) {}

  readCall(): Omit<Expression, 'form'> {
    const head = CALL_HEAD.exec(this.body);
    if (!head?.[1]) {
      throw this.fail('Expected a distribution name');
    }
    const distribution = head[1];
    this.pos = head[0].length;

    const args: ExpressionArg[] = [];
    const kwargs: Record<string, ExpressionArg> = {};

    if (this.atEnd()) {
      return { distribution, args, kwargs };
    }
    if (this.peek() !== ':') {
      throw this.fail(`Expected ':' after '${distribution}'`);
    }
    this.pos++;
    this.skipWhitespace();
    if (this.atEnd()) {
      return { distribution, args, kwargs };
    }

    let sawKeyword = false;
    for (;;) {
      this.skipWhitespace();
      const keyword = this.readKeyword();
      if (keyword !== null) {
        if (Object.prototype.hasOwnProperty.call(kwargs, keyword)) {
          throw this.fail(`Duplicate keyword argument '${keyword}'`);
        }
        Object.defineProperty(kwargs, keyword, {
          value: this.readValue(),
          enumerable: true,
          writable: true,
          configurable: true,
        });
        sawKeyword = true;
      } else {
        if (sawKeyword) {
          throw this.fail('Positional argument follows keyword argument');
        }
        args.push(this.readValue());
      }

      this.skipWhitespace();
      if (this.atEnd()) break;
      if (this.peek() !== ',') {
        throw this.fail(`Unexpected '${this.peek()}'`);
      }
      this.pos++;
      this.skipWhitespace();
      if (this.atEnd()) {
        throw this.fail('Trailing comma');
      }
    }

    return { distribution, args, kwargs };
  }

  private readKeyword(): string | null {
    KEYWORD.lastIndex = this.pos;
    const match = KEYWORD.exec(this.body);
    if (!match?.[1]) return null;
    this.pos = KEYWORD.lastIndex;
    return match[1];
  }

  private readValue(): ExpressionArg {
    this.skipWhitespace();
    const ch = this.peek();
    if (ch === '[') return this.readList();
    if (ch === '"' || ch === "'") return this.readQuoted(ch);
    return this.readToken();
  }

  private readList(): ExpressionArg[] {
    this.pos++; // '['
    const items: ExpressionArg[] = [];
    this.skipWhitespace();
    if (this.peek() === ']') {
      this.pos++;
      return items;
    }
    for (;;) {
      items.push(this.readValue());
      this.skipWhitespace();
      const ch = this.peek();
      if (ch === ',') {
        this.pos++;
        continue;
      }
      if (ch === ']') {
        this.pos++;
        return items;
      }
      throw this.fail(
        ch === undefined ? 'Unterminated list' : `Unexpected '${ch}' in list`
      );
    }
  }

  private readQuoted(quote: string): string {
    const start = this.pos;
    this.pos++;
    let out = '';
    while (!this.atEnd()) {
      const ch = this.body[this.pos] ?? '';
      if (ch === '\\') {
        const next = this.body[this.pos + 1];
        if (next !== undefined) {
          out += next;
          this.pos += 2;
          continue;
        }
      }
      if (ch === quote) {
        this.pos++;
        return out;
      }
      out += ch;
      this.pos++;
    }
    this.pos = start;
    throw this.fail('Unterminated string');
  }

  private readToken(): ExpressionArg {
    const start = this.pos;
    while (!this.atEnd() && !TOKEN_STOP.has(this.body[this.pos] ?? '')) {
      this.pos++;
    }
    const token = this.body.slice(start, this.pos).trim();
    if (token.length === 0) {
      this.pos = start;
      throw this.fail('Expected a value');
    }
    return interpretToken(token);
  }

  private skipWhitespace(): void {
    while (!this.atEnd() && /\s/.test(this.body[this.pos] ?? '')) {
      this.pos++;
    }
  }

  private peek(): string | undefined {
    return this.body[this.pos];
  }

  private atEnd(): boolean {
    return this.pos >= this.body.length;
  }

  private fail(message: string): ExpressionParseError {
    const position = this.offset + this.pos;
    return new ExpressionParseError({
      message: `${message} at position ${position}`,
      position,
      context: { source: this.source },
    });
  }
}

function interpretToken(token: string): ExpressionArg {
  if (NUMBER.test(token)) return Number(token);
  const lowered = token.toLowerCase();
  if (lowered === 'true') return true;
  if (lowered === 'false') return false;
  if (lowered === 'null') return null;
  return token;
}
