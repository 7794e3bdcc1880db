import type { SimulationRequest } from '../schemas/simulation.schema.js';
import type {
  Projection,
  ProjectionSummary,
  SimulationConfig,
  SimulationResponse,
  SummaryPayload,
  TradePayload,
  TradeRecord,
} from '../types/index.js';

/**
 * Map a parsed wire request to an engine config
 */
export function toSimulationConfig(request: SimulationRequest): SimulationConfig {
  return {
    currentBalance: request.current_balance,
    targetBalance: request.target_balance,
    riskPerTradePercent: request.risk_per_trade_percent,
    riskRewardRatio: request.risk_reward_ratio,
  };
}

export function serializeTrade(trade: TradeRecord): TradePayload {
  return {
    trade_number: trade.tradeNumber,
    account_balance: trade.accountBalance,
    risk_amount: trade.riskAmount,
    profit_amount: trade.profitAmount,
  };
}

export function serializeSummary(summary: ProjectionSummary): SummaryPayload {
  return {
    total_trades: summary.totalTrades,
    max_risk_taken: summary.maxRiskTaken,
    final_balance: summary.finalBalance,
    starting_balance: summary.startingBalance,
    target_balance: summary.targetBalance,
  };
}

/**
 * Serialize a projection to the JSON response body
 */
export function serializeProjection(projection: Projection): SimulationResponse {
  return {
    trades: projection.trades.map(serializeTrade),
    summary: serializeSummary(projection.summary),
  };
}
