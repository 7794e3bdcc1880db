/**
 * Projection Engine
 *
 * Simulates perfect execution: every trade wins, risk is a fixed percentage of
 * the pre-trade balance and profit is that risk times the reward ratio. Both
 * grow geometrically until the balance reaches the target.
 *
 * Pure and synchronous. Inputs are not validated here; callers go through
 * validateSimulationConfig first, since non-positive risk or ratio never
 * terminates.
 */

import type {
  Projection,
  ProjectionSummary,
  SimulationConfig,
  TradeRecord,
} from '@recovery-roadmap/shared';

/**
 * Default ceiling the boundaries put on a single projection
 */
export const DEFAULT_MAX_PROJECTED_TRADES = 10_000;

/**
 * Balance multiplier applied by one winning trade
 */
export function growthFactor(config: SimulationConfig): number {
  return 1 + (config.riskPerTradePercent / 100) * config.riskRewardRatio;
}

/**
 * Closed-form trade count, ceil(ln(target / current) / ln(growth)).
 *
 * Floating point can put this one off the loop's count when the target sits
 * exactly on a compounding step, so use it as a guard, not as the answer.
 */
export function estimateTradeCount(config: SimulationConfig): number {
  if (config.targetBalance <= config.currentBalance) {
    return 0;
  }

  const growth = growthFactor(config);
  if (!(growth > 1) || !(config.currentBalance > 0)) {
    return Infinity;
  }

  return Math.ceil(Math.log(config.targetBalance / config.currentBalance) / Math.log(growth));
}

/**
 * Simulate winning trades until the balance reaches the target.
 *
 * Empty when the target is not above the current balance.
 */
export function computeTrades(config: SimulationConfig): readonly TradeRecord[] {
  const trades: TradeRecord[] = [];
  let balance = config.currentBalance;
  let tradeNumber = 1;

  while (balance < config.targetBalance) {
    const riskAmount = balance * (config.riskPerTradePercent / 100);
    const profitAmount = riskAmount * config.riskRewardRatio;

    trades.push(
      Object.freeze({
        tradeNumber,
        accountBalance: balance,
        riskAmount,
        profitAmount,
      })
    );

    balance += profitAmount;
    tradeNumber++;
  }

  return Object.freeze(trades);
}

/**
 * Aggregate a trade sequence
 */
export function summarize(
  trades: readonly TradeRecord[],
  config: SimulationConfig
): ProjectionSummary {
  const last = trades[trades.length - 1];

  if (!last) {
    return {
      totalTrades: 0,
      maxRiskTaken: 0,
      finalBalance: config.currentBalance,
      startingBalance: config.currentBalance,
      targetBalance: config.targetBalance,
    };
  }

  return {
    totalTrades: trades.length,
    maxRiskTaken: trades.reduce((max, trade) => Math.max(max, trade.riskAmount), 0),
    finalBalance: last.accountBalance + last.profitAmount,
    startingBalance: config.currentBalance,
    targetBalance: config.targetBalance,
  };
}

/**
 * computeTrades + summarize
 */
export function project(config: SimulationConfig): Projection {
  const trades = computeTrades(config);
  return {
    config,
    trades,
    summary: summarize(trades, config),
  };
}
