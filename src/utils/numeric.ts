/**
 * Numeric helpers shared by the expression evaluator and the data blocks
 */

const HALF_TOLERANCE = 1e-9;

/**
 * Round half to even ("banker's rounding"), optionally to `digits` decimals.
 * roundHalfEven(2.5) === 2, roundHalfEven(3.5) === 4, roundHalfEven(-2.5) === -2
 */
export function roundHalfEven(value: number, digits = 0): number {
  if (!Number.isFinite(value)) {
    return value;
  }

  const factor = Math.pow(10, digits);
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;

  let rounded: number;
  if (Math.abs(fraction - 0.5) < HALF_TOLERANCE) {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  } else {
    rounded = Math.round(scaled);
  }

  return rounded / factor;
}

/**
 * Modulo with the sign of the divisor: floorMod(-7, 3) === 2
 */
export function floorMod(dividend: number, divisor: number): number {
  return ((dividend % divisor) + divisor) % divisor;
}

/**
 * Inclusive range of `count` values spaced evenly on a log10 scale
 */
export function logSpace(start: number, stop: number, count: number): number[] {
  if (count <= 0) {
    return [];
  }
  if (count === 1) {
    return [start];
  }

  const lower = Math.log10(start);
  const upper = Math.log10(stop);
  const stepSize = (upper - lower) / (count - 1);

  return Array.from({ length: count }, (_, i) => Math.pow(10, lower + i * stepSize));
}

/**
 * Number of values linearRange(start, stop, step) produces
 */
export function linearCount(start: number, stop: number, step: number): number {
  const count = Math.ceil((stop + step / 2 - start) / step);
  return Number.isFinite(count) && count > 0 ? count : 0;
}

/**
 * Values start, start + step, ... while below stop + step / 2
 */
export function linearRange(start: number, stop: number, step: number): number[] {
  return Array.from({ length: linearCount(start, stop, step) }, (_, i) => start + i * step);
}
