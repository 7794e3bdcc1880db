/**
 * Projection types
 */

/**
 * Input of a single projection.
 * Created once per request and never mutated.
 */
export interface SimulationConfig {
  /** Balance the account starts from */
  readonly currentBalance: number;
  /** Balance to reach; must exceed currentBalance */
  readonly targetBalance: number;
  /** Percentage of the pre-trade balance put at risk, in (0, 100] */
  readonly riskPerTradePercent: number;
  /** Profit multiple of the risk on a win (3 means 1:3) */
  readonly riskRewardRatio: number;
}

/**
 * One simulated (winning) trade
 */
export interface TradeRecord {
  /** 1-based, strictly increasing */
  readonly tradeNumber: number;
  /** Balance before this trade */
  readonly accountBalance: number;
  readonly riskAmount: number;
  readonly profitAmount: number;
}

/**
 * Aggregate over a trade sequence
 */
export interface ProjectionSummary {
  readonly totalTrades: number;
  /** Largest riskAmount in the sequence, 0 when empty */
  readonly maxRiskTaken: number;
  /** Balance after the last trade, the starting balance when empty */
  readonly finalBalance: number;
  readonly startingBalance: number;
  readonly targetBalance: number;
}

/**
 * Full result handed to the presentation layers
 */
export interface Projection {
  readonly config: SimulationConfig;
  readonly trades: readonly TradeRecord[];
  readonly summary: ProjectionSummary;
}
