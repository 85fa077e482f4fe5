const DEFAULT_PRECISION = 2;

const EXPRESSION_PRECISION = 6;

export function roundToPrecision(value: number, precision = DEFAULT_PRECISION): number {
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
}

/**
 * Plain decimal notation for filter arguments; ffmpeg option parsers do not all accept `1e-7`.
 */
export function formatDecimal(value: number, precision = EXPRESSION_PRECISION): string {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot format non-finite number ${value}`);
  }

  const rounded = roundToPrecision(value, precision);
  if (Object.is(rounded, -0) || rounded === 0) {
    return '0';
  }

  return rounded.toFixed(precision).replace(/\.?0+$/, '');
}
