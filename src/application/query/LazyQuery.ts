import type { PathContext } from '../../domain/entities/PathContext.js';
import { filterKey, type QueryFilters } from '../dto/QueryFilters.js';
import { Query, matchesFilters } from './Query.js';

/**
 * 只快取實際查詢過的篩選組合
 *
 * 快取鍵與篩選條件的鍵順序無關。consumer 提早中止時仍會走完剩餘路徑，
 * 讓快取內容完整；走訪途中拋錯則不寫入。
 */
export class LazyQuery<F extends string = string> extends Query<F> {
  private readonly cache = new Map<string, PathContext<F>[]>();

  get cacheSize(): number {
    return this.cache.size;
  }

  hasCached(filters: QueryFilters = {}): boolean {
    return this.cache.has(filterKey(filters));
  }

  *query(filters: QueryFilters = {}): Generator<PathContext<F>, void, undefined> {
    const key = filterKey(filters);
    const hit = this.cache.get(key);
    if (hit) {
      yield* hit;
      return;
    }

    this.logger.debug('Cache miss, scanning', { root: this.rootDir, filters });
    const results: PathContext<F>[] = [];
    const iterator = this.walk()[Symbol.iterator]();
    let completed = false;
    let failed = false;
    try {
      for (let step = iterator.next(); !step.done; step = iterator.next()) {
        const context = this.parse(step.value);
        if (context && matchesFilters(context, filters)) {
          results.push(context);
          yield context;
        }
      }
      completed = true;
    } catch (err) {
      failed = true;
      throw err;
    } finally {
      if (!failed) {
        if (!completed) {
          // 提早中止：不再 yield，只把剩餘路徑收進結果
          for (let step = iterator.next(); !step.done; step = iterator.next()) {
            const context = this.parse(step.value);
            if (context && matchesFilters(context, filters)) results.push(context);
          }
        }
        this.cache.set(key, results);
      }
    }
  }

  invalidateCache(filters: QueryFilters = {}): void {
    this.cache.delete(filterKey(filters));
  }

  invalidateAll(): void {
    this.cache.clear();
  }
}
