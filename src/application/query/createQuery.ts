import type { PathResolver } from '../PathResolver.js';
import { BasicQuery } from './BasicQuery.js';
import { CachedQuery } from './CachedQuery.js';
import { LazyQuery } from './LazyQuery.js';
import type { Query, QueryOptions } from './Query.js';
import { TwoTierCachedQuery } from './TwoTierCachedQuery.js';

export type QueryStrategy = 'basic' | 'full' | 'two-tier' | 'lazy';

export const QUERY_STRATEGIES: readonly QueryStrategy[] = ['basic', 'full', 'two-tier', 'lazy'];

export interface CreateQueryOptions extends QueryOptions {
  cacheTimeoutMs?: number | null;
  pathCacheTimeoutMs?: number | null;
  parseCacheTimeoutMs?: number | null;
}

/** 依策略名稱建立 query；各策略只取用自己需要的 timeout */
export function createQuery<F extends string>(
  strategy: QueryStrategy,
  resolver: PathResolver<F>,
  rootDir: string,
  options: CreateQueryOptions = {},
): Query<F> {
  const { cacheTimeoutMs, pathCacheTimeoutMs, parseCacheTimeoutMs, ...base } = options;
  switch (strategy) {
    case 'basic':
      return new BasicQuery(resolver, rootDir, base);
    case 'full':
      return new CachedQuery(resolver, rootDir, { ...base, cacheTimeoutMs });
    case 'two-tier':
      return new TwoTierCachedQuery(resolver, rootDir, { ...base, pathCacheTimeoutMs, parseCacheTimeoutMs });
    case 'lazy':
      return new LazyQuery(resolver, rootDir, base);
  }
}

export function isQueryStrategy(value: string): value is QueryStrategy {
  return QUERY_STRATEGIES.some((s) => s === value);
}
