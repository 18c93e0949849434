/**
 * Valuation configuration loaded from config/valuation.json, merged over
 * built-in defaults.
 */

import { existsSync, readFileSync } from 'fs';
import crypto from 'crypto';
import { isAbsolute, join } from 'path';
import { getEnvConfig } from './env';
import { validateValuationConfig } from '@/validation/ajv_instance';
import type { ExitMetric, FadeMethod, TerminalMethod } from '@/valuation/types';

export interface DefaultAssumptions {
  horizonYears: number;
  fadeMethod: FadeMethod;
  marginFadeMethod: FadeMethod;
  terminalMethod: TerminalMethod;
  exitMetric: ExitMetric;
  startGrowth: number;
  terminalGrowth: number;
  operatingMargin: number;
  daPctRevenue: number;
  capexPctRevenue: number;
  nwcPctRevenueChange: number;
  sbcPctRevenue: number;
  taxRate: number;
  exitMultiple: number;
  fastShare: number;
  decay: number | null;
}

export interface CapmConfig {
  riskFreeRate: number;
  equityRiskPremium: number;
  beta: number;
  costOfDebt: number;
  debtToEquity: number;
}

export interface ScenarioDelta {
  startGrowth: number;
  operatingMargin: number;
  wacc: number;
  terminalGrowth: number;
}

export interface SensitivityConfig {
  waccStep: number;
  terminalGrowthStep: number;
  size: number;
}

export interface ValuationConfig {
  defaults: DefaultAssumptions;
  capm: CapmConfig;
  scenarios: {
    bull: ScenarioDelta;
    bear: ScenarioDelta;
  };
  sensitivity: SensitivityConfig;
  /** sha1 of the config file, null when running on built-in defaults */
  hash: string | null;
  path: string | null;
}

interface RawScenarioDelta {
  start_growth?: number;
  operating_margin?: number;
  wacc?: number;
  terminal_growth?: number;
}

export interface RawValuationConfig {
  defaults?: {
    horizon_years?: number;
    fade_method?: FadeMethod;
    margin_fade_method?: FadeMethod;
    terminal_method?: TerminalMethod;
    exit_metric?: ExitMetric;
    start_growth?: number;
    terminal_growth?: number;
    operating_margin?: number;
    da_pct_revenue?: number;
    capex_pct_revenue?: number;
    nwc_pct_revenue_change?: number;
    sbc_pct_revenue?: number;
    tax_rate?: number;
    exit_multiple?: number;
    fast_share?: number;
    decay?: number | null;
  };
  capm?: {
    risk_free_rate?: number;
    equity_risk_premium?: number;
    beta?: number;
    cost_of_debt?: number;
    debt_to_equity?: number;
  };
  scenarios?: {
    bull?: RawScenarioDelta;
    bear?: RawScenarioDelta;
  };
  sensitivity?: {
    wacc_step?: number;
    terminal_growth_step?: number;
    size?: number;
  };
}

export const DEFAULT_VALUATION_CONFIG: ValuationConfig = {
  defaults: {
    horizonYears: 5,
    fadeMethod: 'linear',
    marginFadeMethod: 'linear',
    terminalMethod: 'gordon',
    exitMetric: 'ebit',
    startGrowth: 0.05,
    terminalGrowth: 0.025,
    operatingMargin: 0.15,
    daPctRevenue: 0.04,
    capexPctRevenue: 0.05,
    nwcPctRevenueChange: 0.1,
    sbcPctRevenue: 0,
    taxRate: 0.21,
    exitMultiple: 12,
    fastShare: 0.6,
    decay: null,
  },
  capm: {
    riskFreeRate: 0.04,
    equityRiskPremium: 0.06,
    beta: 1.0,
    costOfDebt: 0.05,
    debtToEquity: 0.3,
  },
  scenarios: {
    bull: { startGrowth: 0.02, operatingMargin: 0.05, wacc: -0.01, terminalGrowth: 0.005 },
    bear: { startGrowth: -0.02, operatingMargin: -0.05, wacc: 0.01, terminalGrowth: -0.005 },
  },
  sensitivity: {
    waccStep: 0.01,
    terminalGrowthStep: 0.005,
    size: 5,
  },
  hash: null,
  path: null,
};

function resolveConfigPath(projectRoot: string): { path: string; explicit: boolean } {
  const envPath = getEnvConfig().valuationConfigPath;
  if (envPath) {
    return { path: isAbsolute(envPath) ? envPath : join(projectRoot, envPath), explicit: true };
  }
  return { path: join(projectRoot, 'config', 'valuation.json'), explicit: false };
}

function mergeDefaults(
  base: DefaultAssumptions,
  override?: RawValuationConfig['defaults']
): DefaultAssumptions {
  if (!override) return base;
  return {
    horizonYears: override.horizon_years ?? base.horizonYears,
    fadeMethod: override.fade_method ?? base.fadeMethod,
    marginFadeMethod: override.margin_fade_method ?? base.marginFadeMethod,
    terminalMethod: override.terminal_method ?? base.terminalMethod,
    exitMetric: override.exit_metric ?? base.exitMetric,
    startGrowth: override.start_growth ?? base.startGrowth,
    terminalGrowth: override.terminal_growth ?? base.terminalGrowth,
    operatingMargin: override.operating_margin ?? base.operatingMargin,
    daPctRevenue: override.da_pct_revenue ?? base.daPctRevenue,
    capexPctRevenue: override.capex_pct_revenue ?? base.capexPctRevenue,
    nwcPctRevenueChange: override.nwc_pct_revenue_change ?? base.nwcPctRevenueChange,
    sbcPctRevenue: override.sbc_pct_revenue ?? base.sbcPctRevenue,
    taxRate: override.tax_rate ?? base.taxRate,
    exitMultiple: override.exit_multiple ?? base.exitMultiple,
    fastShare: override.fast_share ?? base.fastShare,
    decay: override.decay === undefined ? base.decay : override.decay,
  };
}

function mergeCapm(base: CapmConfig, override?: RawValuationConfig['capm']): CapmConfig {
  if (!override) return base;
  return {
    riskFreeRate: override.risk_free_rate ?? base.riskFreeRate,
    equityRiskPremium: override.equity_risk_premium ?? base.equityRiskPremium,
    beta: override.beta ?? base.beta,
    costOfDebt: override.cost_of_debt ?? base.costOfDebt,
    debtToEquity: override.debt_to_equity ?? base.debtToEquity,
  };
}

function mergeDelta(base: ScenarioDelta, override?: RawScenarioDelta): ScenarioDelta {
  if (!override) return base;
  return {
    startGrowth: override.start_growth ?? base.startGrowth,
    operatingMargin: override.operating_margin ?? base.operatingMargin,
    wacc: override.wacc ?? base.wacc,
    terminalGrowth: override.terminal_growth ?? base.terminalGrowth,
  };
}

function mergeSensitivity(
  base: SensitivityConfig,
  override?: RawValuationConfig['sensitivity']
): SensitivityConfig {
  if (!override) return base;
  return {
    waccStep: override.wacc_step ?? base.waccStep,
    terminalGrowthStep: override.terminal_growth_step ?? base.terminalGrowthStep,
    size: override.size ?? base.size,
  };
}

export function loadValuationConfig(projectRoot: string = process.cwd()): ValuationConfig {
  const { path, explicit } = resolveConfigPath(projectRoot);
  if (!existsSync(path)) {
    // An explicitly requested config must exist
    if (explicit) throw new Error(`valuation_config_not_found: ${path}`);
    return DEFAULT_VALUATION_CONFIG;
  }

  const json = readFileSync(path, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`valuation_config_invalid_json: ${path} (${reason})`);
  }

  const result = validateValuationConfig(parsed);
  if (!result.valid || !result.data) {
    throw new Error(`valuation_config_invalid_schema: ${path} (${(result.errors ?? []).join('; ')})`);
  }
  const raw = result.data;

  const base = DEFAULT_VALUATION_CONFIG;
  return {
    defaults: mergeDefaults(base.defaults, raw.defaults),
    capm: mergeCapm(base.capm, raw.capm),
    scenarios: {
      bull: mergeDelta(base.scenarios.bull, raw.scenarios?.bull),
      bear: mergeDelta(base.scenarios.bear, raw.scenarios?.bear),
    },
    sensitivity: mergeSensitivity(base.sensitivity, raw.sensitivity),
    hash: crypto.createHash('sha1').update(json).digest('hex'),
    path,
  };
}

let cachedConfig: ValuationConfig | null = null;

export function getValuationConfig(): ValuationConfig {
  if (!cachedConfig) {
    cachedConfig = loadValuationConfig();
  }
  return cachedConfig;
}

export function resetValuationConfig(): void {
  cachedConfig = null;
}
