/**
 * Run a DCF valuation for one snapshot file and print the scenarios and
 * sensitivity grid.
 *
 * Usage: npm run valuation -- <snapshot.json> [assumptions.json]
 */

// Must load before the logger reads LOG_LEVEL
import 'dotenv/config';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { runValuation } from '../src/valuation/engine';
import { parseAssumptionInput, parseFinancialSnapshot } from '../src/valuation/inputs';
import { SCENARIO_NAMES, type SensitivityCell } from '../src/valuation/types';

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(resolve(process.cwd(), path), 'utf-8'));
}

function pct(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

function money(value: number): string {
  return value.toLocaleString('en-US', { maximumFractionDigits: 2 });
}

function formatCell(cell: SensitivityCell): string {
  return cell.status === 'ok' ? cell.valuePerShare.toFixed(2) : 'N/A';
}

function main() {
  const [snapshotPath, assumptionsPath] = process.argv.slice(2);
  if (!snapshotPath) {
    console.error('Usage: npm run valuation -- <snapshot.json> [assumptions.json]');
    process.exit(1);
  }

  const snapshot = parseFinancialSnapshot(readJson(snapshotPath));
  const input = assumptionsPath ? parseAssumptionInput(readJson(assumptionsPath)) : {};
  const report = runValuation(snapshot, input);

  console.log(`\n${report.symbol} (${report.currency})  fingerprint ${report.fingerprint.substring(0, 12)}`);

  for (const name of SCENARIO_NAMES) {
    const result = report.scenarios[name];
    const a = result.assumptions;
    console.log(`\n[${name.toUpperCase()}] wacc ${pct(a.wacc)} (${a.confidence.wacc})  g ${pct(a.terminalGrowth)} (${a.confidence.terminalGrowth})  ${a.terminalMethod}`);
    console.table(
      result.forecast.map((year) => ({
        year: year.label,
        growth: pct(year.growthRate),
        revenue: money(year.revenue),
        ebit: money(year.ebit),
        ufcf: money(year.unleveredFcf),
        pv: money(year.presentValue),
      }))
    );
    console.log(
      `EV ${money(result.enterpriseValue)}  equity ${money(result.equityValue)}  per share ${result.valuePerShare.toFixed(2)}  TV share ${pct(result.terminalValueShare)}`
    );
  }

  const grid = report.sensitivity;
  console.log('\nSensitivity (rows: wacc, cols: terminal growth)');
  console.table(
    Object.fromEntries(
      grid.waccAxis.map((wacc, row) => [
        pct(wacc),
        Object.fromEntries(grid.terminalGrowthAxis.map((g, col) => [pct(g), formatCell(grid.cells[row][col])])),
      ])
    )
  );
}

try {
  main();
} catch (error) {
  console.error('Valuation failed:', error instanceof Error ? error.message : error);
  process.exit(1);
}
