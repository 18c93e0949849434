/**
 * Fade Schedules
 *
 * Interpolates a driver (growth rate, margin, capital intensity) from its
 * starting value to its terminal value over the forecast horizon.
 *
 * Every schedule has exactly `years` entries and ends exactly on `end`:
 * - linear:      even steps from start to end
 * - exponential: end + (start - end) * e^(-k*i), final year clamped to end
 * - piecewise:   fast linear fade to an intermediate rate over the first
 *                PIECEWISE_BREAKPOINT years, slower linear fade afterwards
 */

import { InvalidAssumptionError } from './errors';
import { FADE_METHODS, type DriverPath, type FadeMethod, type FadeOptions } from './types';

// ============================================================================
// Constants
// ============================================================================

/** Remaining share of the start-to-end gap at the final index before clamping */
export const EXPONENTIAL_RESIDUAL = 0.01;
/** Index at which the piecewise fade switches from the fast to the slow segment */
export const PIECEWISE_BREAKPOINT = 2;
export const DEFAULT_FAST_SHARE = 0.6;

// ============================================================================
// Helpers
// ============================================================================

function assertFinite(value: number, name: string): void {
  if (!Number.isFinite(value)) {
    throw new InvalidAssumptionError(`must be a finite number, got ${value}`, name);
  }
}

function interpolate(from: number, to: number, step: number, steps: number): number {
  return from + ((to - from) * step) / steps;
}

export function isFadeMethod(value: string): value is FadeMethod {
  return FADE_METHODS.some((method) => method === value);
}

// ============================================================================
// Schedules
// ============================================================================

export function linearFade(start: number, end: number, years: number): number[] {
  if (years === 1) return [end];
  const last = years - 1;
  return Array.from({ length: years }, (_, i) => (i === last ? end : interpolate(start, end, i, last)));
}

/**
 * Decay constant that leaves EXPONENTIAL_RESIDUAL of the gap at the final index.
 * k = ln(1 / residual) / (years - 1)
 */
export function solveExponentialDecay(years: number): number {
  if (years <= 1) return 0;
  return Math.log(1 / EXPONENTIAL_RESIDUAL) / (years - 1);
}

export function exponentialFade(
  start: number,
  end: number,
  years: number,
  decay?: number
): number[] {
  if (years === 1) return [end];
  const k = decay ?? solveExponentialDecay(years);
  if (!Number.isFinite(k) || k <= 0) {
    throw new InvalidAssumptionError(`decay must be positive, got ${k}`, 'fadeOptions.decay');
  }

  const last = years - 1;
  return Array.from({ length: years }, (_, i) =>
    i === last ? end : end + (start - end) * Math.exp(-k * i)
  );
}

export function piecewiseFade(
  start: number,
  end: number,
  years: number,
  options: Pick<FadeOptions, 'midpoint' | 'fastShare'> = {}
): number[] {
  const last = years - 1;
  // Too short for two segments
  if (last <= PIECEWISE_BREAKPOINT) return linearFade(start, end, years);

  const fastShare = options.fastShare ?? DEFAULT_FAST_SHARE;
  if (!Number.isFinite(fastShare) || fastShare <= 0 || fastShare >= 1) {
    throw new InvalidAssumptionError(
      `fastShare must be between 0 and 1, got ${fastShare}`,
      'fadeOptions.fastShare'
    );
  }
  const midpoint = options.midpoint ?? interpolate(start, end, fastShare, 1);
  assertFinite(midpoint, 'fadeOptions.midpoint');

  const slowSteps = last - PIECEWISE_BREAKPOINT;
  return Array.from({ length: years }, (_, i) => {
    if (i === last) return end;
    if (i <= PIECEWISE_BREAKPOINT) return interpolate(start, midpoint, i, PIECEWISE_BREAKPOINT);
    return interpolate(midpoint, end, i - PIECEWISE_BREAKPOINT, slowSteps);
  });
}

/**
 * Build a fade schedule of `years` rates from `start` to `end`.
 */
export function fadeSchedule(
  start: number,
  end: number,
  years: number,
  method: FadeMethod,
  options: FadeOptions = {}
): number[] {
  if (!Number.isInteger(years) || years < 1) {
    throw new InvalidAssumptionError(`must be a positive integer, got ${years}`, 'horizonYears');
  }
  assertFinite(start, 'fade.start');
  assertFinite(end, 'fade.end');

  if (start === end) return Array.from({ length: years }, () => end);

  switch (method) {
    case 'linear':
      return linearFade(start, end, years);
    case 'exponential':
      return exponentialFade(start, end, years, options.decay);
    case 'piecewise':
      return piecewiseFade(start, end, years, options);
    default: {
      const unknown: never = method;
      throw new InvalidAssumptionError(`unknown fade method "${String(unknown)}"`, 'fadeMethod');
    }
  }
}

export function fadeDriver(
  path: DriverPath,
  years: number,
  method: FadeMethod,
  options: FadeOptions = {}
): number[] {
  return fadeSchedule(path.start, path.end, years, method, options);
}
