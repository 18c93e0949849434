/**
 * Provenance-based confidence tiers for valuation assumptions.
 *
 * HIGH: read straight from structured filings
 * MED:  averaged or interpolated from filed history
 * LOW:  heuristic defaults (industry norms, fallback constants, scenario shifts)
 */

import { UnknownProvenanceError } from './errors';
import {
  PROVENANCE_TAGS,
  type AssumptionConfidence,
  type AssumptionKey,
  type AssumptionSources,
  type ConfidenceTier,
  type ProvenanceTag,
} from './types';

export function isProvenanceTag(value: string): value is ProvenanceTag {
  return PROVENANCE_TAGS.some((tag) => tag === value);
}

export function parseProvenance(raw: string): ProvenanceTag {
  const normalized = raw.trim().toLowerCase();
  if (!isProvenanceTag(normalized)) {
    throw new UnknownProvenanceError(raw);
  }
  return normalized;
}

export function labelConfidence(tag: ProvenanceTag): ConfidenceTier {
  switch (tag) {
    case 'filing':
      return 'HIGH';
    case 'historical_average':
    case 'interpolated':
      return 'MED';
    case 'industry_norm':
    case 'fallback_constant':
    case 'scenario_delta':
      return 'LOW';
    default: {
      const unknown: never = tag;
      throw new UnknownProvenanceError(String(unknown));
    }
  }
}

/**
 * Build a record over every assumption key.
 */
export function mapAssumptionKeys<T>(fn: (key: AssumptionKey) => T): Record<AssumptionKey, T> {
  return {
    startGrowth: fn('startGrowth'),
    terminalGrowth: fn('terminalGrowth'),
    operatingMargin: fn('operatingMargin'),
    terminalOperatingMargin: fn('terminalOperatingMargin'),
    capexPctRevenue: fn('capexPctRevenue'),
    terminalCapexPctRevenue: fn('terminalCapexPctRevenue'),
    daPctRevenue: fn('daPctRevenue'),
    nwcPctRevenueChange: fn('nwcPctRevenueChange'),
    sbcPctRevenue: fn('sbcPctRevenue'),
    taxRate: fn('taxRate'),
    wacc: fn('wacc'),
    exitMultiple: fn('exitMultiple'),
  };
}

export function labelAssumptions(sources: AssumptionSources): AssumptionConfidence {
  return Object.freeze(mapAssumptionKeys((key) => labelConfidence(sources[key])));
}
