/**
 * CLI runner
 *
 * Kept apart from main.ts so it can be driven with captured output.
 */

import { DEFAULT_MAX_PROJECTED_TRADES, estimateTradeCount, project } from '@recovery-roadmap/engine';
import { serializeProjection, validateSimulationConfig, type Logger } from '@recovery-roadmap/shared';
import { parseRoadmapArgs, USAGE, type RoadmapCliArgs } from './args.js';
import { buildRoadmapReport } from './report.js';

export interface CliIo {
  out: (text: string) => void;
  err: (text: string) => void;
  logger?: Logger;
}

/**
 * Run the CLI and return its exit code
 */
export function runCli(argv: readonly string[], io: CliIo): number {
  let args: RoadmapCliArgs;
  try {
    args = parseRoadmapArgs(argv);
  } catch (error) {
    io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    io.err(USAGE);
    return 2;
  }

  if (args.help) {
    io.out(USAGE);
    return 0;
  }

  const validation = validateSimulationConfig({
    currentBalance: args.balance,
    targetBalance: args.target,
    riskPerTradePercent: args.risk,
    riskRewardRatio: args.reward,
  });

  if (!validation.valid) {
    for (const issue of validation.errors) {
      io.err(`Error: ${issue.message}`);
    }
    return 1;
  }

  const estimatedTrades = estimateTradeCount(validation.config);
  if (estimatedTrades > DEFAULT_MAX_PROJECTED_TRADES) {
    io.err(
      `Error: Reaching the target needs about ${estimatedTrades} trades, above the limit of ${DEFAULT_MAX_PROJECTED_TRADES}`
    );
    return 1;
  }

  const projection = project(validation.config);
  io.logger?.debug('Projection computed', {
    totalTrades: projection.summary.totalTrades,
    finalBalance: projection.summary.finalBalance,
  });

  if (args.json) {
    io.out(JSON.stringify(serializeProjection(projection), null, 2));
  } else {
    io.out(buildRoadmapReport(projection).join('\n'));
  }

  return 0;
}
