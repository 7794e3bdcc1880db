import { z } from 'zod';

/**
 * Default request values, matching the CLI defaults
 */
export const DEFAULT_SIMULATION_REQUEST = {
  current_balance: 200,
  target_balance: 2000,
  risk_per_trade_percent: 2,
  risk_reward_ratio: 3,
} as const;

/**
 * Largest balance the projection can reach: the last trade starts below the
 * target and grows it by one step at most.
 */
function projectedCeiling(config: {
  targetBalance: number;
  riskPerTradePercent: number;
  riskRewardRatio: number;
}): number {
  return config.targetBalance * (1 + (config.riskPerTradePercent / 100) * config.riskRewardRatio);
}

/**
 * Simulation config schema
 *
 * The single set of rules every boundary (API and CLI) validates against.
 */
export const SimulationConfigSchema = z
  .object({
    currentBalance: z
      .number({ invalid_type_error: 'Current balance must be a number' })
      .finite('Current balance must be finite')
      .positive('Current balance must be greater than 0'),
    targetBalance: z
      .number({ invalid_type_error: 'Target balance must be a number' })
      .finite('Target balance must be finite')
      .positive('Target balance must be greater than 0'),
    riskPerTradePercent: z
      .number({ invalid_type_error: 'Risk percentage must be a number' })
      .finite('Risk percentage must be finite')
      .gt(0, 'Risk percentage must be between 0 and 100')
      .lte(100, 'Risk percentage must be between 0 and 100'),
    riskRewardRatio: z
      .number({ invalid_type_error: 'Risk-to-Reward ratio must be a number' })
      .finite('Risk-to-Reward ratio must be finite')
      .positive('Risk-to-Reward ratio must be greater than 0'),
  })
  .refine((config) => config.targetBalance > config.currentBalance, {
    message: 'Target balance must be greater than current balance',
    path: ['targetBalance'],
  })
  .refine(
    // Non-finite inputs already carry their own issue
    (config) =>
      !Object.values(config).every(Number.isFinite) || Number.isFinite(projectedCeiling(config)),
    {
      message: 'Risk-to-Reward ratio is too large: the projected balance overflows',
      path: ['riskRewardRatio'],
    }
  );

/**
 * Simulation request schema (wire format)
 *
 * Only checks shape; range rules live in SimulationConfigSchema.
 */
export const SimulationRequestSchema = z.object({
  current_balance: z.number().default(DEFAULT_SIMULATION_REQUEST.current_balance),
  target_balance: z.number().default(DEFAULT_SIMULATION_REQUEST.target_balance),
  risk_per_trade_percent: z.number().default(DEFAULT_SIMULATION_REQUEST.risk_per_trade_percent),
  risk_reward_ratio: z.number().default(DEFAULT_SIMULATION_REQUEST.risk_reward_ratio),
});

export type SimulationRequest = z.infer<typeof SimulationRequestSchema>;
