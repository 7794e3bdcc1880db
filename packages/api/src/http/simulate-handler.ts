/**
 * POST /api/simulate
 */

import { estimateTradeCount, project } from '@recovery-roadmap/engine';
import {
  SimulationRequestSchema,
  serializeProjection,
  toSimulationConfig,
  toValidationIssues,
  validateSimulationConfig,
  type Logger,
} from '@recovery-roadmap/shared';
import { errorResult, jsonResult, type HttpResult } from './responses.js';

export interface SimulateHandlerOptions {
  /** Largest projection the API will compute */
  maxProjectedTrades: number;
  logger?: Logger;
}

/**
 * Validate a decoded JSON body, run the projection and build the response.
 */
export function handleSimulate(payload: unknown, options: SimulateHandlerOptions): HttpResult {
  const request = SimulationRequestSchema.safeParse(payload);
  if (!request.success) {
    const details = toValidationIssues(request.error);
    options.logger?.warn('Rejected malformed simulation request', { details });
    return errorResult(422, 'INVALID_REQUEST', 'Request body does not match the simulation request shape', details);
  }

  const validation = validateSimulationConfig(toSimulationConfig(request.data));
  if (!validation.valid) {
    options.logger?.warn('Rejected simulation parameters', { details: validation.errors });
    return errorResult(
      422,
      'VALIDATION_ERROR',
      validation.errors[0]?.message ?? 'Simulation parameters are invalid',
      validation.errors
    );
  }

  const { config } = validation;
  const estimatedTrades = estimateTradeCount(config);
  if (estimatedTrades > options.maxProjectedTrades) {
    options.logger?.warn('Projection exceeds trade ceiling', {
      estimatedTrades,
      maxProjectedTrades: options.maxProjectedTrades,
    });
    return errorResult(
      422,
      'TOO_MANY_TRADES',
      `Reaching the target needs about ${estimatedTrades} trades, above the limit of ${options.maxProjectedTrades}`
    );
  }

  const projection = project(config);
  options.logger?.debug('Projection computed', {
    totalTrades: projection.summary.totalTrades,
    finalBalance: projection.summary.finalBalance,
  });

  return jsonResult(serializeProjection(projection));
}
