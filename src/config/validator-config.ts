// src/config/validator-config.ts

import { z } from 'zod';
import { GroupDefinitions } from '../core/groups/group-definitions.js';

const identifier = z.string().trim().min(1, 'must not be empty');

/**
 * Shape of .graph-validator/config.yml
 *
 * ```yaml
 * logLevel: info            # debug | info | warn | error
 * groups:
 *   - Billing
 *   - Shipping
 * sequences:
 *   Checkout: [Default, Billing, Shipping]
 * ```
 */
export const validatorConfigSchema = z
  .object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    groups: z.array(identifier).default([]),
    sequences: z.record(identifier, z.array(identifier)).default({}),
  })
  .strict();

export type ValidatorConfig = z.infer<typeof validatorConfigSchema>;

export const DEFAULT_VALIDATOR_CONFIG: ValidatorConfig = validatorConfigSchema.parse({});

export function toGroupDefinitions(config: ValidatorConfig): GroupDefinitions {
  return new GroupDefinitions({
    groups: config.groups,
    sequences: config.sequences,
  });
}
