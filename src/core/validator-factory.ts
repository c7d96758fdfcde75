// src/core/validator-factory.ts

import { DefaultConstraintEvaluator } from '../constraints/evaluator.js';
import type { MessageInterpolator } from '../constraints/message-interpolator.js';
import { BeanMetaDataManager } from '../metadata/bean-metadata-manager.js';
import type { ConstraintMapping } from '../metadata/constraint-mapping.js';
import type { MetadataProvider } from '../metadata/types.js';
import { GroupDefinitionError, ValidationUsageError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { GroupChainGenerator } from './groups/group-chain-generator.js';
import { GroupDefinitions, type GroupDefinitionsInput } from './groups/group-definitions.js';
import type { ConstraintEvaluator, Validator } from './types.js';
import { ValidatorImpl } from './validator.js';

export interface ValidatorOptions {
  /** Constraint declarations; ignored when `metadataProvider` is given */
  mapping?: ConstraintMapping;
  metadataProvider?: MetadataProvider;
  groupDefinitions?: GroupDefinitions | GroupDefinitionsInput;
  /** Defaults to DefaultConstraintEvaluator */
  evaluator?: ConstraintEvaluator;
  /** Used by the default evaluator only */
  messageInterpolator?: MessageInterpolator;
}

/**
 * Wires a validator from its collaborators. Group definitions are checked
 * here, so a broken sequence fails at startup rather than on first use.
 */
export function createValidator(options: ValidatorOptions): Validator {
  const metadataProvider = options.metadataProvider
    ?? (options.mapping ? new BeanMetaDataManager(options.mapping) : undefined);
  if (!metadataProvider) {
    throw new ValidationUsageError('Either a constraint mapping or a metadata provider is required');
  }

  const groupDefinitions = options.groupDefinitions instanceof GroupDefinitions
    ? options.groupDefinitions
    : new GroupDefinitions(options.groupDefinitions);

  const validation = new GroupChainGenerator(groupDefinitions).validateDefinitions();
  for (const warning of validation.warnings) {
    Logger.warn(warning);
  }
  if (!validation.valid) {
    throw new GroupDefinitionError(
      `Invalid group definitions:\n${validation.errors.map(e => `  - ${e}`).join('\n')}`
    );
  }

  const evaluator = options.evaluator ?? new DefaultConstraintEvaluator(options.messageInterpolator);
  return new ValidatorImpl(metadataProvider, evaluator, groupDefinitions);
}
