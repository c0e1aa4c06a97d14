/**
 * Safe arithmetic evaluator.
 *
 * Recursive-descent parser over numbers, + - * / % ^, parentheses, a fixed
 * set of functions and the constants pi and e. Nothing is ever executed as
 * code; every failure comes back as a typed result.
 *
 *   expr   := term (('+' | '-') term)*
 *   term   := unary (('*' | '/' | '%') unary)*
 *   unary  := ('+' | '-') unary | power
 *   power  := atom ('^' unary)?
 *   atom   := number | ident | ident '(' args ')' | '(' expr ')'
 */

export type MathErrorCode =
  | 'empty'
  | 'too_long'
  | 'syntax'
  | 'unknown_identifier'
  | 'arity'
  | 'division_by_zero'
  | 'too_deep'
  | 'non_finite';

export type MathResult =
  | { ok: true; value: number }
  | { ok: false; error: MathErrorCode; message: string };

export const MAX_EXPRESSION_LENGTH = 200;
const MAX_DEPTH = 32;

const CONSTANTS: Record<string, number> = { pi: Math.PI, e: Math.E };

interface MathFunction {
  minArgs: number;
  maxArgs: number;
  apply(args: number[]): number;
}

const FUNCTIONS: Record<string, MathFunction> = {
  abs: { minArgs: 1, maxArgs: 1, apply: ([x]) => Math.abs(x) },
  sqrt: { minArgs: 1, maxArgs: 1, apply: ([x]) => Math.sqrt(x) },
  round: {
    minArgs: 1,
    maxArgs: 2,
    apply: ([x, digits = 0]) => {
      const factor = Math.pow(10, Math.trunc(digits));
      return Math.round(x * factor) / factor;
    },
  },
  floor: { minArgs: 1, maxArgs: 1, apply: ([x]) => Math.floor(x) },
  ceil: { minArgs: 1, maxArgs: 1, apply: ([x]) => Math.ceil(x) },
  min: { minArgs: 1, maxArgs: 32, apply: (args) => Math.min(...args) },
  max: { minArgs: 1, maxArgs: 32, apply: (args) => Math.max(...args) },
  pow: { minArgs: 2, maxArgs: 2, apply: ([x, y]) => Math.pow(x, y) },
};

type Token =
  | { type: 'number'; value: number }
  | { type: 'ident'; name: string }
  | { type: 'op'; op: string };

class MathError extends Error {
  constructor(readonly code: MathErrorCode, message: string) {
    super(message);
  }
}

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const ch = input[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (/[0-9.]/.test(ch)) {
      const match = /^(\d+\.?\d*|\.\d+)(e[+-]?\d+)?/i.exec(input.slice(i));
      if (!match) throw new MathError('syntax', `Unexpected "${ch}"`);
      tokens.push({ type: 'number', value: Number(match[0]) });
      i += match[0].length;
      continue;
    }

    if (/[a-z]/i.test(ch)) {
      const match = /^[a-z]+/i.exec(input.slice(i));
      const name = match ? match[0].toLowerCase() : ch;
      tokens.push({ type: 'ident', name });
      i += name.length;
      continue;
    }

    if ('+-*/%^(),'.includes(ch)) {
      tokens.push({ type: 'op', op: ch });
      i++;
      continue;
    }

    throw new MathError('syntax', `Unexpected character "${ch}"`);
  }

  return tokens;
}

class Parser {
  private pos = 0;
  private depth = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number {
    const value = this.expr();
    const rest = this.tokens[this.pos];
    if (rest) throw new MathError('syntax', 'Unexpected trailing input');
    return value;
  }

  private peekOp(...ops: string[]): string | undefined {
    const tok = this.tokens[this.pos];
    return tok && tok.type === 'op' && ops.includes(tok.op) ? tok.op : undefined;
  }

  private expect(op: string): void {
    if (!this.peekOp(op)) throw new MathError('syntax', `Expected "${op}"`);
    this.pos++;
  }

  private enter(): void {
    if (++this.depth > MAX_DEPTH) throw new MathError('too_deep', 'Expression is nested too deeply');
  }

  private expr(): number {
    this.enter();
    let value = this.term();
    let op: string | undefined;
    while ((op = this.peekOp('+', '-'))) {
      this.pos++;
      const rhs = this.term();
      value = op === '+' ? value + rhs : value - rhs;
    }
    this.depth--;
    return value;
  }

  private term(): number {
    let value = this.unary();
    let op: string | undefined;
    while ((op = this.peekOp('*', '/', '%'))) {
      this.pos++;
      const rhs = this.unary();
      if ((op === '/' || op === '%') && rhs === 0) {
        throw new MathError('division_by_zero', 'Division by zero');
      }
      value = op === '*' ? value * rhs : op === '/' ? value / rhs : value % rhs;
    }
    return value;
  }

  private unary(): number {
    const op = this.peekOp('+', '-');
    if (op) {
      this.pos++;
      this.enter();
      const value = this.unary();
      this.depth--;
      return op === '-' ? -value : value;
    }
    return this.power();
  }

  private power(): number {
    const base = this.atom();
    if (this.peekOp('^')) {
      this.pos++;
      this.enter();
      const exponent = this.unary();
      this.depth--;
      return Math.pow(base, exponent);
    }
    return base;
  }

  private atom(): number {
    const tok = this.tokens[this.pos];
    if (!tok) throw new MathError('syntax', 'Unexpected end of expression');

    if (tok.type === 'number') {
      this.pos++;
      return tok.value;
    }

    if (tok.type === 'ident') {
      this.pos++;
      if (this.peekOp('(')) return this.call(tok.name);
      const constant = Object.hasOwn(CONSTANTS, tok.name) ? CONSTANTS[tok.name] : undefined;
      if (constant === undefined) throw new MathError('unknown_identifier', `Unknown name "${tok.name}"`);
      return constant;
    }

    if (tok.op === '(') {
      this.pos++;
      const value = this.expr();
      this.expect(')');
      return value;
    }

    throw new MathError('syntax', `Unexpected "${tok.op}"`);
  }

  private call(name: string): number {
    const fn = Object.hasOwn(FUNCTIONS, name) ? FUNCTIONS[name] : undefined;
    if (!fn) throw new MathError('unknown_identifier', `Unknown function "${name}"`);

    this.expect('(');
    const args: number[] = [];
    if (!this.peekOp(')')) {
      args.push(this.expr());
      while (this.peekOp(',')) {
        this.pos++;
        args.push(this.expr());
      }
    }
    this.expect(')');

    if (args.length < fn.minArgs || args.length > fn.maxArgs) {
      throw new MathError('arity', `${name}() takes ${fn.minArgs === fn.maxArgs ? fn.minArgs : `${fn.minArgs}-${fn.maxArgs}`} argument(s)`);
    }
    return fn.apply(args);
  }
}

export function evaluateExpression(expression: string): MathResult {
  const input = expression.trim();
  if (!input) return { ok: false, error: 'empty', message: 'Empty expression' };
  if (input.length > MAX_EXPRESSION_LENGTH) {
    return { ok: false, error: 'too_long', message: `Expression longer than ${MAX_EXPRESSION_LENGTH} characters` };
  }

  try {
    const value = new Parser(tokenize(input)).parse();
    if (!Number.isFinite(value)) {
      return { ok: false, error: 'non_finite', message: 'Result is not a finite number' };
    }
    return { ok: true, value };
  } catch (err) {
    if (err instanceof MathError) return { ok: false, error: err.code, message: err.message };
    throw err;
  }
}

/** Render a result without binary-float noise (0.1 + 0.2 → "0.3"). */
export function formatNumber(value: number): string {
  return String(Number(value.toPrecision(12)));
}
