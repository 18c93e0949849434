/**
 * Raw (snake_case JSON) snapshot and assumption input → typed engine inputs.
 * Schema violations throw ValidationError; unknown provenance tags throw
 * UnknownProvenanceError.
 */

import { validateAssumptionInput, validateFinancialSnapshot } from '@/validation/ajv_instance';
import { parseProvenance } from './confidence';
import { ValidationError } from './errors';
import {
  ASSUMPTION_KEYS,
  type AssumptionKey,
  type ExitMetric,
  type FadeMethod,
  type FadeOptions,
  type FinancialSnapshot,
  type ProvenanceTag,
  type TerminalMethod,
} from './types';

export interface RawFinancialSnapshot {
  symbol: string;
  currency?: string;
  fiscal_year?: number | null;
  as_of?: string | null;
  revenue: number;
  operating_margin?: number | null;
  depreciation_amortization?: number | null;
  capex?: number | null;
  net_working_capital?: number | null;
  stock_based_compensation?: number | null;
  tax_rate?: number | null;
  net_debt?: number | null;
  shares_outstanding: number;
  history?: {
    revenue?: number[];
    operating_margin?: number[];
  };
}

export interface RawSourcedValue {
  value: number;
  source: string;
}

export interface RawAssumptionInput {
  horizon_years?: number;
  fade_method?: FadeMethod;
  margin_fade_method?: FadeMethod;
  terminal_method?: TerminalMethod;
  exit_metric?: ExitMetric;
  fade_options?: {
    decay?: number;
    midpoint?: number;
    fast_share?: number;
  };
  /** Keyed by snake_case assumption name */
  values?: Record<string, RawSourcedValue>;
}

export interface SourcedValue {
  value: number;
  source: ProvenanceTag;
}

export interface AssumptionInput {
  horizonYears?: number;
  fadeMethod?: FadeMethod;
  marginFadeMethod?: FadeMethod;
  terminalMethod?: TerminalMethod;
  exitMetric?: ExitMetric;
  fadeOptions?: FadeOptions;
  values?: Partial<Record<AssumptionKey, SourcedValue>>;
}

export function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

function optionalNumber(value: number | null | undefined): number | null {
  return value === undefined ? null : value;
}

function copyHistory(values: number[] | undefined): readonly number[] | undefined {
  return values ? Object.freeze([...values]) : undefined;
}

export function parseFinancialSnapshot(data: unknown): FinancialSnapshot {
  const result = validateFinancialSnapshot(data);
  if (!result.valid || !result.data) {
    const errors = result.errors ?? [];
    throw new ValidationError(errors.join('; '), 'snapshot', errors);
  }
  const raw = result.data;
  const capex = optionalNumber(raw.capex);

  return Object.freeze({
    symbol: raw.symbol.trim().toUpperCase(),
    currency: raw.currency ?? 'USD',
    fiscalYear: optionalNumber(raw.fiscal_year),
    asOf: raw.as_of ?? null,
    revenue: raw.revenue,
    operatingMargin: optionalNumber(raw.operating_margin),
    depreciationAmortization: optionalNumber(raw.depreciation_amortization),
    capex: capex === null ? null : Math.abs(capex),
    netWorkingCapital: optionalNumber(raw.net_working_capital),
    stockBasedCompensation: optionalNumber(raw.stock_based_compensation),
    taxRate: optionalNumber(raw.tax_rate),
    netDebt: raw.net_debt ?? 0,
    sharesOutstanding: raw.shares_outstanding,
    history: raw.history
      ? Object.freeze({
          revenue: copyHistory(raw.history.revenue),
          operatingMargin: copyHistory(raw.history.operating_margin),
        })
      : undefined,
  });
}

export function parseAssumptionInput(data: unknown): AssumptionInput {
  const result = validateAssumptionInput(data);
  if (!result.valid || !result.data) {
    const errors = result.errors ?? [];
    throw new ValidationError(errors.join('; '), 'assumptions', errors);
  }
  const raw = result.data;

  const values: Partial<Record<AssumptionKey, SourcedValue>> = {};
  for (const key of ASSUMPTION_KEYS) {
    const entry: RawSourcedValue | undefined = raw.values?.[toSnakeCase(key)];
    if (entry) {
      values[key] = { value: entry.value, source: parseProvenance(entry.source) };
    }
  }

  return {
    horizonYears: raw.horizon_years,
    fadeMethod: raw.fade_method,
    marginFadeMethod: raw.margin_fade_method,
    terminalMethod: raw.terminal_method,
    exitMetric: raw.exit_metric,
    fadeOptions: raw.fade_options
      ? {
          decay: raw.fade_options.decay,
          midpoint: raw.fade_options.midpoint,
          fastShare: raw.fade_options.fast_share,
        }
      : undefined,
    values,
  };
}
