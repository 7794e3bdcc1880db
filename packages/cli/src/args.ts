/**
 * CLI argument parsing
 */

import { DEFAULT_SIMULATION_REQUEST } from '@recovery-roadmap/shared';

export interface RoadmapCliArgs {
  balance: number;
  target: number;
  /** Risk per trade, percent */
  risk: number;
  /** Reward multiple (3 means 1:3) */
  reward: number;
  /** Print the JSON response instead of the table */
  json: boolean;
  help: boolean;
}

export const USAGE = `Usage: recovery-roadmap [options]

The Recovery Roadmap - Calculate trades needed to reach target balance

Options:
  -b, --balance <n>  Current account balance (default: $200)
  -t, --target <n>   Target account balance (default: $2000)
  -r, --risk <n>     Risk per trade as percentage (default: 2%)
  -R, --reward <n>   Risk-to-Reward ratio (default: 3.0 for 1:3)
      --json         Print the result as JSON
  -h, --help         Show this help`;

function parseNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || Number.isNaN(value)) {
    throw new Error(`Invalid number for ${flag}: ${raw}`);
  }
  return value;
}

/**
 * Parse CLI arguments (process.argv.slice(2))
 *
 * @throws Error on unknown flags, missing values and non-numeric values
 */
export function parseRoadmapArgs(argv: readonly string[]): RoadmapCliArgs {
  const args: RoadmapCliArgs = {
    balance: DEFAULT_SIMULATION_REQUEST.current_balance,
    target: DEFAULT_SIMULATION_REQUEST.target_balance,
    risk: DEFAULT_SIMULATION_REQUEST.risk_per_trade_percent,
    reward: DEFAULT_SIMULATION_REQUEST.risk_reward_ratio,
    json: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const nextArg = (): string => {
      const val = argv[++i];
      if (val === undefined) throw new Error(`Missing value for ${arg}`);
      return val;
    };

    switch (arg) {
      case '--balance':
      case '-b':
        args.balance = parseNumber(arg, nextArg());
        break;
      case '--target':
      case '-t':
        args.target = parseNumber(arg, nextArg());
        break;
      case '--risk':
      case '-r':
        args.risk = parseNumber(arg, nextArg());
        break;
      case '--reward':
      case '-R':
        args.reward = parseNumber(arg, nextArg());
        break;
      case '--json':
        args.json = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return args;
}
