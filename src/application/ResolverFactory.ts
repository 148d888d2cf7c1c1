import { defineContext, type ContextShape } from '../domain/entities/PathContext.js';
import type { FileSystemPort } from '../domain/ports/FileSystemPort.js';
import { parseTokens } from '../domain/value-objects/Token.js';
import { buildNormalizers } from '../config/normalizers.js';
import type { TokenPathConfig } from '../config/types.js';
import { Logger } from '../shared/Logger.js';
import type { TemplateDefinitions } from './dto/TemplateDefinition.js';
import { PathResolver } from './PathResolver.js';
import { createQuery } from './query/createQuery.js';
import type { Clock, Query } from './query/Query.js';

export interface ResolverFactoryOptions {
  fileSystem?: FileSystemPort;
  logger?: Logger;
}

/** 依出現順序收集所有 template 的 token 名稱 */
export function deriveFields(templates: TemplateDefinitions): string[] {
  const fields: string[] = [];
  for (const definition of Object.values(templates)) {
    const pattern = typeof definition === 'string' ? definition : definition.pattern;
    for (const token of parseTokens(pattern)) {
      if (!fields.includes(token.name)) fields.push(token.name);
    }
  }
  return fields;
}

export function shapeFromConfig(config: TokenPathConfig): ContextShape<string> {
  const fields = config.context.fields.length > 0
    ? config.context.fields
    : deriveFields(config.templates);
  return defineContext(config.context.name, fields);
}

/** 依設定建立 resolver：載入 template 定義與 token 值 */
export function createResolverFromConfig(
  config: TokenPathConfig,
  options: ResolverFactoryOptions = {},
): PathResolver<string> {
  const logger = options.logger ?? new Logger('PathResolver', config.logLevel);
  const resolver = new PathResolver(shapeFromConfig(config), {
    variables: config.variables,
    normalizers: buildNormalizers(config.normalizers),
    fileSystem: options.fileSystem,
    logger,
  });
  resolver.loadDefinitions(config.templates);
  for (const [token, values] of Object.entries(config.tokenValues)) {
    resolver.registerTokenValues(token, values);
  }
  return resolver;
}

/** 依設定的策略與 timeout 建立 query */
export function createQueryFromConfig<F extends string>(
  config: TokenPathConfig,
  resolver: PathResolver<F>,
  rootDir: string,
  options: ResolverFactoryOptions & { clock?: Clock } = {},
): Query<F> {
  return createQuery(config.query.strategy, resolver, rootDir, {
    ...options,
    logger: options.logger ?? new Logger('Query', config.logLevel),
    cacheTimeoutMs: config.query.cacheTimeoutMs,
    pathCacheTimeoutMs: config.query.pathCacheTimeoutMs,
    parseCacheTimeoutMs: config.query.parseCacheTimeoutMs,
  });
}
