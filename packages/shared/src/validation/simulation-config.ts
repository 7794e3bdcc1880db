/**
 * Simulation config validation
 *
 * Shared by the HTTP API and the CLI so both accept exactly the same ranges.
 */

import type { ZodError } from 'zod';
import { SimulationConfigSchema } from '../schemas/simulation.schema.js';
import type { SimulationConfig } from '../types/simulation.js';

/**
 * A single rejected field
 */
export interface ValidationIssue {
  /** Dotted path of the offending field, `(root)` for the whole input */
  field: string;
  message: string;
}

export type ConfigValidationResult =
  | { valid: true; config: SimulationConfig }
  | { valid: false; errors: ValidationIssue[] };

/**
 * Flatten zod issues into field/message pairs
 */
export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

/**
 * Validate an untrusted config before it reaches the engine.
 *
 * The engine loops until the target is reached, so non-positive risk or
 * ratio, and non-finite values, must never get past this point.
 */
export function validateSimulationConfig(input: unknown): ConfigValidationResult {
  const parsed = SimulationConfigSchema.safeParse(input);

  if (!parsed.success) {
    return { valid: false, errors: toValidationIssues(parsed.error) };
  }

  return { valid: true, config: Object.freeze({ ...parsed.data }) };
}
