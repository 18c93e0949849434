import { describe, it, expect } from 'vitest';
import { DEFAULT_VALUATION_CONFIG } from '@/core/config';
import { runValuation } from '@/valuation/engine';
import type { AssumptionInput } from '@/valuation/inputs';
import { makeSnapshot } from '../helpers';

const options = { config: DEFAULT_VALUATION_CONFIG };

const INPUT: AssumptionInput = {
  fadeMethod: 'exponential',
  marginFadeMethod: 'piecewise',
  values: {
    operatingMargin: { value: 0.12, source: 'filing' },
    terminalOperatingMargin: { value: 0.2, source: 'interpolated' },
  },
};

describe('determinism', () => {
  it('produces an identical report for identical inputs', () => {
    const first = runValuation(makeSnapshot(), INPUT, options);
    const second = runValuation(makeSnapshot(), INPUT, options);

    expect(second.fingerprint).toBe(first.fingerprint);
    expect(second).toEqual(first);
  });

  it('changes the fingerprint when an input changes', () => {
    const first = runValuation(makeSnapshot(), INPUT, options);
    const shifted = runValuation(makeSnapshot({ netDebt: 51 }), INPUT, options);

    expect(shifted.fingerprint).not.toBe(first.fingerprint);
  });

  it('does not depend on input key order', () => {
    const reordered: AssumptionInput = {
      values: {
        terminalOperatingMargin: { value: 0.2, source: 'interpolated' },
        operatingMargin: { value: 0.12, source: 'filing' },
      },
      marginFadeMethod: 'piecewise',
      fadeMethod: 'exponential',
    };

    expect(runValuation(makeSnapshot(), reordered, options).fingerprint).toBe(
      runValuation(makeSnapshot(), INPUT, options).fingerprint
    );
  });
});
