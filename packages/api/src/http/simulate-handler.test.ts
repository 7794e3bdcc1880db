import { describe, it, expect } from 'vitest';
import { handleSimulate } from './simulate-handler.js';

describe('handleSimulate', () => {
  const options = { maxProjectedTrades: 10000 };

  it('should project with defaults for an empty body', () => {
    const result = handleSimulate({}, options);

    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({
      summary: { total_trades: 40, starting_balance: 200, target_balance: 2000 },
    });
  });

  it('should return trades in wire format', () => {
    const result = handleSimulate(
      { current_balance: 100, target_balance: 100.01, risk_per_trade_percent: 1, risk_reward_ratio: 1 },
      options
    );

    expect(result).toEqual({
      status: 200,
      body: {
        trades: [{ trade_number: 1, account_balance: 100, risk_amount: 1, profit_amount: 1 }],
        summary: {
          total_trades: 1,
          max_risk_taken: 1,
          final_balance: 101,
          starting_balance: 100,
          target_balance: 100.01,
        },
      },
    });
  });

  it('should reject a target at or below the current balance', () => {
    const result = handleSimulate({ current_balance: 500, target_balance: 500 }, options);

    expect(result).toEqual({
      status: 422,
      body: {
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Target balance must be greater than current balance',
          details: [{ field: 'targetBalance', message: 'Target balance must be greater than current balance' }],
        },
      },
    });
  });

  it('should reject inputs whose projection would overflow', () => {
    const result = handleSimulate(
      {
        current_balance: 1e300,
        target_balance: 1.5e300,
        risk_per_trade_percent: 100,
        risk_reward_ratio: 1e10,
      },
      options
    );

    expect(result.status).toBe(422);
    expect(result.body).toMatchObject({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Risk-to-Reward ratio is too large: the projected balance overflows',
      },
    });
  });

  it('should reject risk above 100%', () => {
    const result = handleSimulate({ risk_per_trade_percent: 150 }, options);

    expect(result.status).toBe(422);
    expect(result.body).toMatchObject({
      error: { code: 'VALIDATION_ERROR', message: 'Risk percentage must be between 0 and 100' },
    });
  });

  it('should reject a zero reward ratio', () => {
    const result = handleSimulate({ risk_reward_ratio: 0 }, options);

    expect(result.body).toMatchObject({
      error: { code: 'VALIDATION_ERROR', message: 'Risk-to-Reward ratio must be greater than 0' },
    });
  });

  it('should reject wrongly typed fields', () => {
    const result = handleSimulate({ current_balance: 'lots' }, options);

    expect(result.status).toBe(422);
    expect(result.body).toMatchObject({
      error: {
        code: 'INVALID_REQUEST',
        details: [{ field: 'current_balance' }],
      },
    });
  });

  it('should reject a non-object body', () => {
    const result = handleSimulate([1, 2, 3], options);

    expect(result.body).toMatchObject({ error: { code: 'INVALID_REQUEST' } });
  });

  it('should refuse projections above the trade ceiling', () => {
    const result = handleSimulate({}, { maxProjectedTrades: 10 });

    expect(result).toEqual({
      status: 422,
      body: {
        error: {
          code: 'TOO_MANY_TRADES',
          message: 'Reaching the target needs about 40 trades, above the limit of 10',
        },
      },
    });
  });
});
