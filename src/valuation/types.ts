/**
 * DCF valuation data model
 *
 * Everything here is produced once per run and frozen on construction.
 */

// ============================================================================
// Enumerations
// ============================================================================

export const FADE_METHODS = ['linear', 'piecewise', 'exponential'] as const;
export type FadeMethod = (typeof FADE_METHODS)[number];

export const TERMINAL_METHODS = ['gordon', 'exit-multiple'] as const;
export type TerminalMethod = (typeof TERMINAL_METHODS)[number];

export const EXIT_METRICS = ['ebit', 'ebitda'] as const;
export type ExitMetric = (typeof EXIT_METRICS)[number];

export const SCENARIO_NAMES = ['base', 'bull', 'bear'] as const;
export type ScenarioName = (typeof SCENARIO_NAMES)[number];

export const PROVENANCE_TAGS = [
  'filing',
  'historical_average',
  'interpolated',
  'industry_norm',
  'fallback_constant',
  'scenario_delta',
] as const;
export type ProvenanceTag = (typeof PROVENANCE_TAGS)[number];

export type ConfidenceTier = 'HIGH' | 'MED' | 'LOW';

// ============================================================================
// Inputs
// ============================================================================

export interface FinancialHistory {
  /** Oldest first */
  revenue?: readonly number[];
  operatingMargin?: readonly number[];
}

export interface FinancialSnapshot {
  symbol: string;
  currency: string;
  fiscalYear: number | null;
  asOf: string | null;
  revenue: number;
  operatingMargin: number | null;
  depreciationAmortization: number | null;
  /** Magnitude; the sign reported by the filing is ignored */
  capex: number | null;
  netWorkingCapital: number | null;
  stockBasedCompensation: number | null;
  taxRate: number | null;
  netDebt: number;
  sharesOutstanding: number;
  history?: FinancialHistory;
}

export interface DriverPath {
  start: number;
  end: number;
}

export const ASSUMPTION_KEYS = [
  'startGrowth',
  'terminalGrowth',
  'operatingMargin',
  'terminalOperatingMargin',
  'capexPctRevenue',
  'terminalCapexPctRevenue',
  'daPctRevenue',
  'nwcPctRevenueChange',
  'sbcPctRevenue',
  'taxRate',
  'wacc',
  'exitMultiple',
] as const;
export type AssumptionKey = (typeof ASSUMPTION_KEYS)[number];

export type AssumptionSources = Readonly<Record<AssumptionKey, ProvenanceTag>>;
export type AssumptionConfidence = Readonly<Record<AssumptionKey, ConfidenceTier>>;

export interface FadeOptions {
  /** Explicit exponential decay constant; solved from the horizon when absent */
  decay?: number;
  /** Explicit piecewise intermediate growth rate; margin and capex fades ignore it */
  midpoint?: number;
  /** Share of the start-to-end gap covered before the piecewise breakpoint */
  fastShare?: number;
}

export interface Assumptions {
  scenario: ScenarioName;
  horizonYears: number;
  baseYear: number | null;
  fadeMethod: FadeMethod;
  marginFadeMethod: FadeMethod;
  fadeOptions: FadeOptions;
  startGrowth: number;
  terminalGrowth: number;
  operatingMargin: DriverPath;
  capexPctRevenue: DriverPath;
  daPctRevenue: number;
  nwcPctRevenueChange: number;
  sbcPctRevenue: number;
  taxRate: number;
  wacc: number;
  terminalMethod: TerminalMethod;
  exitMultiple: number;
  exitMetric: ExitMetric;
  sources: AssumptionSources;
  confidence: AssumptionConfidence;
}

// ============================================================================
// Forecast & results
// ============================================================================

export interface ProjectedYear {
  yearIndex: number;
  label: string;
  growthRate: number;
  revenue: number;
  operatingMargin: number;
  ebit: number;
  depreciationAmortization: number;
  ebitda: number;
  taxes: number;
  nopat: number;
  stockBasedCompensation: number;
  addBacks: number;
  deltaNwc: number;
  capex: number;
  unleveredFcf: number;
}

export interface ForecastYear extends ProjectedYear {
  discountFactor: number;
  presentValue: number;
}

export interface TerminalValue {
  method: TerminalMethod;
  value: number;
  presentValue: number;
  growth: number | null;
  multiple: number | null;
  metric: ExitMetric | null;
}

export interface ValuationResult {
  scenario: ScenarioName;
  forecast: readonly ForecastYear[];
  terminal: TerminalValue;
  sumPvFcf: number;
  enterpriseValue: number;
  netDebt: number;
  equityValue: number;
  sharesOutstanding: number;
  valuePerShare: number;
  /** PV of terminal value as a share of enterprise value */
  terminalValueShare: number;
  assumptions: Assumptions;
}

export type ScenarioSet = Readonly<Record<ScenarioName, ValuationResult>>;

export type SensitivityCell =
  | { status: 'ok'; valuePerShare: number }
  | { status: 'n/a'; reason: string };

export interface SensitivityGrid {
  terminalMethod: TerminalMethod;
  baseWacc: number;
  baseTerminalGrowth: number;
  waccAxis: readonly number[];
  terminalGrowthAxis: readonly number[];
  /** cells[row][col]: row indexes waccAxis, col indexes terminalGrowthAxis */
  cells: readonly (readonly SensitivityCell[])[];
}

export interface ValuationReport {
  symbol: string;
  currency: string;
  scenarios: ScenarioSet;
  sensitivity: SensitivityGrid;
  fingerprint: string;
}
