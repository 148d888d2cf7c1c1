import type { PathContext } from '../../domain/entities/PathContext.js';
import type { PathResolver } from '../PathResolver.js';
import type { QueryFilters } from '../dto/QueryFilters.js';
import { Query, isFresh, matchesFilters, type QueryOptions } from './Query.js';

export interface CachedQueryOptions extends QueryOptions {
  /** 快取有效毫秒數；null 代表永不過期 */
  cacheTimeoutMs?: number | null;
}

/**
 * 整棵樹的解析結果快取成單一 slot
 *
 * 篩選在每次呼叫時對快取內容執行。
 */
export class CachedQuery<F extends string = string> extends Query<F> {
  readonly cacheTimeoutMs: number | null;
  private cache: PathContext<F>[] | null = null;
  private stampedAt: number | null = null;

  constructor(resolver: PathResolver<F>, rootDir: string, options: CachedQueryOptions = {}) {
    super(resolver, rootDir, options);
    this.cacheTimeoutMs = options.cacheTimeoutMs ?? null;
  }

  get cacheTimestamp(): number | null {
    return this.stampedAt;
  }

  /** 快取的 context 數；未填充時為 null */
  get cachedCount(): number | null {
    return this.cache ? this.cache.length : null;
  }

  *query(filters: QueryFilters = {}): Generator<PathContext<F>, void, undefined> {
    for (const context of this.contexts()) {
      if (matchesFilters(context, filters)) yield context;
    }
  }

  invalidateCache(): void {
    this.cache = null;
    this.stampedAt = null;
  }

  isCacheValid(): boolean {
    if (this.cache === null || this.stampedAt === null) return false;
    return isFresh(this.stampedAt, this.cacheTimeoutMs, this.clock());
  }

  private contexts(): PathContext<F>[] {
    if (this.cache && this.isCacheValid()) return this.cache;

    this.logger.debug('Cache miss, rescanning', { root: this.rootDir });
    const contexts: PathContext<F>[] = [];
    for (const absolutePath of this.walk()) {
      const context = this.parse(absolutePath);
      if (context) contexts.push(context);
    }
    this.cache = contexts;
    this.stampedAt = this.clock();
    return contexts;
  }
}
