/**
 * Console report for a projection
 */

import type { Projection } from '@recovery-roadmap/shared';
import { formatCurrency, line } from './format.js';
import { renderGridTable } from './table.js';

export const TRADE_TABLE_HEADERS = ['Trade #', 'Account Balance', 'Risk Amount ($)', 'Profit Amount ($)'];

/**
 * Rough trade count at a 50% win rate. Display only, nothing is modelled.
 */
export function approximateTradesAtHalfWinRate(totalTrades: number): number {
  return totalTrades * 2;
}

/**
 * Build the report lines (no trailing newline handling, callers join with '\n')
 */
export function buildRoadmapReport(projection: Projection): string[] {
  const { config, trades, summary } = projection;
  const out: string[] = [];

  out.push('', line('═'));
  out.push('THE RECOVERY ROADMAP - Perfect Execution Simulation');
  out.push(line('═'));

  out.push('', 'Configuration:');
  out.push(`  Starting Balance: ${formatCurrency(config.currentBalance)}`);
  out.push(`  Target Balance: ${formatCurrency(config.targetBalance)}`);
  out.push(`  Risk per Trade: ${config.riskPerTradePercent}%`);
  out.push(`  Risk-to-Reward Ratio: 1:${config.riskRewardRatio}`);

  out.push('', line());
  out.push('TRADE SIMULATION RESULTS');
  out.push(line());

  if (trades.length > 0) {
    const rows = trades.map((trade) => [
      String(trade.tradeNumber),
      formatCurrency(trade.accountBalance),
      formatCurrency(trade.riskAmount),
      formatCurrency(trade.profitAmount),
    ]);
    out.push(renderGridTable(TRADE_TABLE_HEADERS, rows, ['right', 'left', 'left', 'left']));
  } else {
    out.push('No trades needed - target already reached!');
  }

  out.push('', line('═'));
  out.push('SUMMARY');
  out.push(line('═'));
  out.push(`Total Trades Needed: ${summary.totalTrades}`);
  out.push(`Max Risk Taken: ${formatCurrency(summary.maxRiskTaken)}`);
  out.push(`Final Balance: ${formatCurrency(summary.finalBalance)}`);

  out.push('', '⚠️  REALITY CHECK:');
  out.push('This simulation assumes zero losses (perfect execution).');
  out.push(
    `With a 50% win rate, you would need approximately ${approximateTradesAtHalfWinRate(summary.totalTrades)} trades.`
  );
  out.push(line('═'), '');

  return out;
}
