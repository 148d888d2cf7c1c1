import type { PathContext } from '../../domain/entities/PathContext.js';
import type { QueryFilters } from '../dto/QueryFilters.js';
import { Query, matchesFilters } from './Query.js';

/** 不快取，每次呼叫都重新掃描 */
export class BasicQuery<F extends string = string> extends Query<F> {
  *query(filters: QueryFilters = {}): Generator<PathContext<F>, void, undefined> {
    this.logger.debug('Scanning', { root: this.rootDir });
    for (const absolutePath of this.walk()) {
      const context = this.parse(absolutePath);
      if (context && matchesFilters(context, filters)) yield context;
    }
  }
}
