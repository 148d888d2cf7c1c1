import { describe, it, expect } from 'vitest';
import { BasicQuery } from '../../../../src/application/query/BasicQuery.js';
import { CachedQuery } from '../../../../src/application/query/CachedQuery.js';
import { LazyQuery } from '../../../../src/application/query/LazyQuery.js';
import { TwoTierCachedQuery } from '../../../../src/application/query/TwoTierCachedQuery.js';
import { createQuery, isQueryStrategy } from '../../../../src/application/query/createQuery.js';
import { ROOT, createShotResolver, createShotTree, quiet } from './fixtures.js';

describe('createQuery', () => {
  const fileSystem = createShotTree();
  const resolver = createShotResolver(fileSystem);

  it('should build the strategy by name', () => {
    expect(createQuery('basic', resolver, ROOT, { fileSystem, logger: quiet })).toBeInstanceOf(BasicQuery);
    expect(createQuery('lazy', resolver, ROOT, { fileSystem, logger: quiet })).toBeInstanceOf(LazyQuery);
  });

  it('should pass each strategy its own timeouts', () => {
    const full = createQuery('full', resolver, ROOT, { fileSystem, logger: quiet, cacheTimeoutMs: 10 });
    const tiered = createQuery('two-tier', resolver, ROOT, {
      fileSystem,
      logger: quiet,
      pathCacheTimeoutMs: 20,
      parseCacheTimeoutMs: null,
    });

    expect(full).toBeInstanceOf(CachedQuery);
    if (full instanceof CachedQuery) expect(full.cacheTimeoutMs).toBe(10);
    expect(tiered).toBeInstanceOf(TwoTierCachedQuery);
    if (tiered instanceof TwoTierCachedQuery) {
      expect(tiered.pathCacheTimeoutMs).toBe(20);
      expect(tiered.parseCacheTimeoutMs).toBeNull();
    }
  });

  it('should recognise strategy names', () => {
    expect(isQueryStrategy('two-tier')).toBe(true);
    expect(isQueryStrategy('cached')).toBe(false);
  });
});
