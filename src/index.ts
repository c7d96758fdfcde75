// src/index.ts - Public API

export { createValidator } from './core/validator-factory.js';
export type { ValidatorOptions } from './core/validator-factory.js';
export { ValidatorImpl, renderMapKey } from './core/validator.js';
export type { ConstraintEvaluator, Validator } from './core/types.js';
export { ExecutionContext } from './core/execution-context.js';
export type { ConstraintFailure } from './core/execution-context.js';
export { PropertyPathCursor, renderPropertyPath } from './core/property-path-cursor.js';
export type { PathSegment } from './core/property-path-cursor.js';
export { toViolationSet, formatViolation } from './core/violations.js';
export type { ConstraintViolation } from './core/violations.js';

export { DEFAULT_GROUP, Group } from './core/groups/group.js';
export { GroupChain } from './core/groups/group-chain.js';
export { GroupChainGenerator } from './core/groups/group-chain-generator.js';
export type { GroupDefinitionValidation } from './core/groups/group-chain-generator.js';
export { GroupDefinitions } from './core/groups/group-definitions.js';
export type { GroupDefinitionsInput } from './core/groups/group-definitions.js';

export { ConstraintMapping, TypeMapping } from './metadata/constraint-mapping.js';
export type { ConstraintOptions } from './metadata/constraint-mapping.js';
export { BeanMetaDataManager } from './metadata/bean-metadata-manager.js';
export {
  arrayOf,
  bean,
  collectionOf,
  mapOf,
  scalar,
  getIndexedType
} from './metadata/type-descriptors.js';
export { classOf } from './metadata/types.js';
export type {
  BeanMetaData,
  CascadedMember,
  ConstraintDefinition,
  Constructor,
  MetaConstraint,
  MetadataProvider,
  TypeDescriptor
} from './metadata/types.js';

export {
  assertTrue,
  constraint,
  max,
  min,
  notEmpty,
  notNull,
  pattern,
  size
} from './constraints/builtin.js';
export type { SizeOptions } from './constraints/builtin.js';
export { DefaultConstraintEvaluator } from './constraints/evaluator.js';
export { DefaultMessageInterpolator } from './constraints/message-interpolator.js';
export type { MessageInterpolator } from './constraints/message-interpolator.js';

export { ValidatorConfigLoader } from './config/validator-config-loader.js';
export { toGroupDefinitions, validatorConfigSchema } from './config/validator-config.js';
export type { ValidatorConfig } from './config/validator-config.js';

export {
  ConfigurationError,
  ConstraintEvaluationError,
  GroupDefinitionError,
  ValidationUsageError
} from './utils/errors.js';
export { Logger, LogLevel } from './utils/logger.js';
