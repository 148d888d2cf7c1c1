export { ContextShape, PathContext, defineContext, type ContextValues } from './domain/entities/PathContext.js';
export {
  PathTemplate,
  PATH_SEPARATOR,
  type ContextReader,
  type PathTemplateOptions,
  type TemplateValidation,
} from './domain/entities/PathTemplate.js';
export {
  TokenPathError,
  MissingTokensError,
  UnknownStopTokenError,
  TemplateNotFoundError,
  BaseNotFoundError,
  UnregisteredContextShapeError,
  DefinitionLoadError,
  ConfigValidationError,
  type ErrorClassification,
} from './domain/errors/DomainErrors.js';
export type { FileSystemPort } from './domain/ports/FileSystemPort.js';
export {
  parseTokens,
  isDefaultFormatter,
  defaultLiteral,
  uniqueTokenNames,
  type Token,
} from './domain/value-objects/Token.js';
export { applyFormatter, type Normalizer, type NormalizerMap } from './domain/value-objects/TokenFormatter.js';

export {
  PathResolver,
  truncatePattern,
  type PathResolverOptions,
  type CreateStructureOptions,
} from './application/PathResolver.js';
export { CompositeResolver, type CompositeResolverOptions } from './application/CompositeResolver.js';
export {
  createResolverFromConfig,
  createQueryFromConfig,
  shapeFromConfig,
  deriveFields,
} from './application/ResolverFactory.js';
export {
  TemplateDefinitionSchema,
  TemplateDefinitionsSchema,
  type TemplateDefinition,
  type TemplateDefinitions,
} from './application/dto/TemplateDefinition.js';
export type { QueryFilters } from './application/dto/QueryFilters.js';
export { Query, matchesFilters, type Clock, type QueryOptions } from './application/query/Query.js';
export { BasicQuery } from './application/query/BasicQuery.js';
export { CachedQuery, type CachedQueryOptions } from './application/query/CachedQuery.js';
export { TwoTierCachedQuery, type TwoTierCachedQueryOptions } from './application/query/TwoTierCachedQuery.js';
export { LazyQuery } from './application/query/LazyQuery.js';
export {
  createQuery,
  isQueryStrategy,
  QUERY_STRATEGIES,
  type QueryStrategy,
  type CreateQueryOptions,
} from './application/query/createQuery.js';

export { NodeFileSystemAdapter } from './infrastructure/filesystem/NodeFileSystemAdapter.js';

export { loadConfig, type TokenPathConfig, type PartialConfig } from './config/ConfigLoader.js';
export { DEFAULT_CONFIG, CONFIG_FILE_NAME } from './config/defaults.js';
export { BUILT_IN_NORMALIZERS, NORMALIZER_NAMES, buildNormalizers, type NormalizerName } from './config/normalizers.js';

export { Logger, type LogLevel } from './shared/Logger.js';
