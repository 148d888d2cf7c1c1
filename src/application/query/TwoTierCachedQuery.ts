import type { PathContext } from '../../domain/entities/PathContext.js';
import type { PathResolver } from '../PathResolver.js';
import type { QueryFilters } from '../dto/QueryFilters.js';
import { Query, isFresh, matchesFilters, type QueryOptions } from './Query.js';

export interface TwoTierCachedQueryOptions extends QueryOptions {
  pathCacheTimeoutMs?: number | null;
  parseCacheTimeoutMs?: number | null;
}

/**
 * 路徑清單與解析結果分兩層快取，各自有 timeout
 *
 * - path 層：一次走訪得到的絕對路徑清單
 * - parse 層：絕對路徑 → context（或 null），存取時才逐筆填入
 */
export class TwoTierCachedQuery<F extends string = string> extends Query<F> {
  readonly pathCacheTimeoutMs: number | null;
  readonly parseCacheTimeoutMs: number | null;

  private pathCache: string[] | null = null;
  private pathStampedAt: number | null = null;
  private readonly parseCache = new Map<string, PathContext<F> | null>();
  private parseStampedAt: number | null = null;

  constructor(resolver: PathResolver<F>, rootDir: string, options: TwoTierCachedQueryOptions = {}) {
    super(resolver, rootDir, options);
    this.pathCacheTimeoutMs = options.pathCacheTimeoutMs ?? null;
    this.parseCacheTimeoutMs = options.parseCacheTimeoutMs ?? null;
  }

  get pathCacheTimestamp(): number | null {
    return this.pathStampedAt;
  }

  get parseCacheTimestamp(): number | null {
    return this.parseStampedAt;
  }

  /** path 層的路徑數；未填充時為 null */
  get pathCacheSize(): number | null {
    return this.pathCache ? this.pathCache.length : null;
  }

  get parseCacheSize(): number {
    return this.parseCache.size;
  }

  *query(filters: QueryFilters = {}): Generator<PathContext<F>, void, undefined> {
    for (const absolutePath of this.paths()) {
      const context = this.parseCached(absolutePath);
      if (context && matchesFilters(context, filters)) yield context;
    }
  }

  invalidatePathCache(): void {
    this.pathCache = null;
    this.pathStampedAt = null;
  }

  invalidateParseCache(): void {
    this.parseCache.clear();
    this.parseStampedAt = null;
  }

  invalidateAll(): void {
    this.invalidatePathCache();
    this.invalidateParseCache();
  }

  isPathCacheValid(): boolean {
    if (this.pathCache === null || this.pathStampedAt === null) return false;
    return isFresh(this.pathStampedAt, this.pathCacheTimeoutMs, this.clock());
  }

  isParseCacheValid(): boolean {
    if (this.parseStampedAt === null) return false;
    return isFresh(this.parseStampedAt, this.parseCacheTimeoutMs, this.clock());
  }

  private paths(): string[] {
    if (this.pathCache && this.isPathCacheValid()) return this.pathCache;

    this.logger.debug('Path cache miss, rescanning', { root: this.rootDir });
    const paths = [...this.walk()];
    this.pathCache = paths;
    this.pathStampedAt = this.clock();
    return paths;
  }

  private parseCached(absolutePath: string): PathContext<F> | null {
    // 過期時清空並重新計時
    if (!this.isParseCacheValid()) {
      this.parseCache.clear();
      this.parseStampedAt = this.clock();
    }

    const cached = this.parseCache.get(absolutePath);
    if (cached !== undefined) return cached;

    const context = this.parse(absolutePath);
    this.parseCache.set(absolutePath, context);
    return context;
  }
}
