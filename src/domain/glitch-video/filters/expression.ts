import { formatDecimal } from '../../../shared/media/numberUtils.js';

/**
 * Small expression tree for ffmpeg's per-frame expression evaluator. Nodes render to the
 * evaluator's syntax and can be evaluated in-process, which is how amplitudes, periods and
 * gates are tested without running an encoder.
 */
export type ExprVariable = 't' | 'on' | 'iw' | 'ih' | 'zoom';

export type ExprScope = Partial<Record<ExprVariable, number>>;

export type Expr =
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'pi' }
  | { readonly kind: 'variable'; readonly name: ExprVariable }
  | { readonly kind: 'sum'; readonly terms: readonly Expr[] }
  | { readonly kind: 'difference'; readonly minuend: Expr; readonly subtrahend: Expr }
  | { readonly kind: 'product'; readonly factors: readonly Expr[] }
  | { readonly kind: 'quotient'; readonly dividend: Expr; readonly divisor: Expr }
  | { readonly kind: 'sin'; readonly argument: Expr }
  | { readonly kind: 'between'; readonly value: Expr; readonly min: Expr; readonly max: Expr }
  | { readonly kind: 'max'; readonly left: Expr; readonly right: Expr };

export type ExprLike = Expr | number;

export const num = (value: number): Expr => ({ kind: 'number', value });

export const PI: Expr = { kind: 'pi' };

export const variable = (name: ExprVariable): Expr => ({ kind: 'variable', name });

export const lift = (value: ExprLike): Expr => (typeof value === 'number' ? num(value) : value);

export const add = (...terms: ExprLike[]): Expr => ({ kind: 'sum', terms: terms.map(lift) });

export const sub = (minuend: ExprLike, subtrahend: ExprLike): Expr => ({
  kind: 'difference',
  minuend: lift(minuend),
  subtrahend: lift(subtrahend),
});

export const mul = (...factors: ExprLike[]): Expr => ({ kind: 'product', factors: factors.map(lift) });

export const div = (dividend: ExprLike, divisor: ExprLike): Expr => ({
  kind: 'quotient',
  dividend: lift(dividend),
  divisor: lift(divisor),
});

export const sin = (argument: ExprLike): Expr => ({ kind: 'sin', argument: lift(argument) });

export const between = (value: ExprLike, min: ExprLike, max: ExprLike): Expr => ({
  kind: 'between',
  value: lift(value),
  min: lift(min),
  max: lift(max),
});

export const max = (left: ExprLike, right: ExprLike): Expr => ({
  kind: 'max',
  left: lift(left),
  right: lift(right),
});

/** `amplitude * sin(2*PI*time/period*harmonic)`: completes `harmonic` cycles per period. */
export function periodicSine(amplitude: number, time: Expr, period: number, harmonic = 1): Expr {
  const phase = harmonic === 1
    ? mul(2, PI, div(time, period))
    : mul(2, PI, div(time, period), harmonic);
  return mul(amplitude, sin(phase));
}

/** `amplitude * sin(2*PI*time*frequency)` with frequency in Hz. */
export function oscillator(amplitude: number, time: Expr, frequency: number): Expr {
  return mul(amplitude, sin(mul(2, PI, time, frequency)));
}

/** `offset + term + term …` */
export function affine(offset: ExprLike, ...terms: Expr[]): Expr {
  return add(offset, ...terms);
}

/**
 * Multiplies `body` by a 0/1 gate that is open while any of the `[start, end]` windows
 * contains `time`. Overlapping windows still open the gate exactly once.
 */
export function gated(time: Expr, windows: readonly (readonly [number, number])[], body: Expr): Expr {
  return mul(windowGate(time, windows), body);
}

export function windowGate(time: Expr, windows: readonly (readonly [number, number])[]): Expr {
  const [first, ...rest] = windows.map(([start, end]) => between(time, start, end));
  if (!first) {
    return num(0);
  }
  return rest.reduce<Expr>((gate, next) => max(gate, next), first);
}

export function renderExpr(expr: Expr): string {
  switch (expr.kind) {
    case 'number': {
      const text = formatDecimal(expr.value);
      return expr.value < 0 && text !== '0' ? `(${text})` : text;
    }
    case 'pi': {
      return 'PI';
    }
    case 'variable': {
      return expr.name;
    }
    case 'sum': {
      return expr.terms.map(renderExpr).join('+');
    }
    case 'difference': {
      return `(${renderExpr(expr.minuend)}-${renderOperand(expr.subtrahend)})`;
    }
    case 'product': {
      return expr.factors.map(renderOperand).join('*');
    }
    case 'quotient': {
      const divisor = renderOperand(expr.divisor);
      return `(${renderOperand(expr.dividend)}/${expr.divisor.kind === 'product' ? `(${divisor})` : divisor})`;
    }
    case 'sin': {
      return `sin(${renderExpr(expr.argument)})`;
    }
    case 'between': {
      return `between(${renderExpr(expr.value)},${renderExpr(expr.min)},${renderExpr(expr.max)})`;
    }
    case 'max': {
      return `max(${renderExpr(expr.left)},${renderExpr(expr.right)})`;
    }
    default: {
      const exhaustive: never = expr;
      throw new Error(`Unsupported expression ${JSON.stringify(exhaustive)}`);
    }
  }
}

function renderOperand(expr: Expr): string {
  const rendered = renderExpr(expr);
  return expr.kind === 'sum' ? `(${rendered})` : rendered;
}

export function evaluateExpr(expr: Expr, scope: ExprScope): number {
  switch (expr.kind) {
    case 'number': {
      return expr.value;
    }
    case 'pi': {
      return Math.PI;
    }
    case 'variable': {
      const value = scope[expr.name];
      if (value === undefined) {
        throw new Error(`Expression variable "${expr.name}" is not bound`);
      }
      return value;
    }
    case 'sum': {
      return expr.terms.reduce((total, term) => total + evaluateExpr(term, scope), 0);
    }
    case 'difference': {
      return evaluateExpr(expr.minuend, scope) - evaluateExpr(expr.subtrahend, scope);
    }
    case 'product': {
      return expr.factors.reduce((total, factor) => total * evaluateExpr(factor, scope), 1);
    }
    case 'quotient': {
      return evaluateExpr(expr.dividend, scope) / evaluateExpr(expr.divisor, scope);
    }
    case 'sin': {
      return Math.sin(evaluateExpr(expr.argument, scope));
    }
    case 'between': {
      const value = evaluateExpr(expr.value, scope);
      return value >= evaluateExpr(expr.min, scope) && value <= evaluateExpr(expr.max, scope) ? 1 : 0;
    }
    case 'max': {
      return Math.max(evaluateExpr(expr.left, scope), evaluateExpr(expr.right, scope));
    }
    default: {
      const exhaustive: never = expr;
      throw new Error(`Unsupported expression ${JSON.stringify(exhaustive)}`);
    }
  }
}
