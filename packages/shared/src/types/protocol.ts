/**
 * JSON wire format shared by the HTTP API and `--json` CLI output.
 * Field names are snake_case on the wire.
 */

export interface TradePayload {
  trade_number: number;
  account_balance: number;
  risk_amount: number;
  profit_amount: number;
}

export interface SummaryPayload {
  total_trades: number;
  max_risk_taken: number;
  final_balance: number;
  starting_balance: number;
  target_balance: number;
}

export interface SimulationResponse {
  trades: TradePayload[];
  summary: SummaryPayload;
}
