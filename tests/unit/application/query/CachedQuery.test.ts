import { describe, it, expect, beforeEach } from 'vitest';
import { CachedQuery } from '../../../../src/application/query/CachedQuery.js';
import type { InMemoryFileSystem } from '../../../helpers/InMemoryFileSystem.js';
import { ManualClock } from '../../../helpers/ManualClock.js';
import { ROOT, createShotResolver, createShotTree, quiet, shotIds } from './fixtures.js';

/**
 * Feature: 整棵樹的單一快取
 *
 * 作為大量查詢的呼叫端，我需要重複查詢時不要重新掃描目錄，
 * 並能依 timeout 或手動失效後重新掃描。
 */
describe('CachedQuery', () => {
  let fileSystem: InMemoryFileSystem;
  let clock: ManualClock;

  beforeEach(() => {
    fileSystem = createShotTree();
    clock = new ManualClock(1000);
  });

  function createQuery(cacheTimeoutMs?: number | null) {
    return new CachedQuery(createShotResolver(fileSystem), ROOT, {
      fileSystem,
      logger: quiet,
      clock: clock.now,
      cacheTimeoutMs,
    });
  }

  it('should scan once and filter the cached contexts', () => {
    const query = createQuery(100);

    expect(shotIds(query.query())).toHaveLength(4);
    expect(shotIds(query.query({ seq: '020' }))).toEqual(['demo/020/0010']);
    expect(fileSystem.walkCount).toBe(1);
    expect(query.cacheTimestamp).toBe(1000);
    expect(query.cachedCount).toBe(4);
  });

  /**
   * Scenario: timeout 到期
   * Given timeout 100ms，於 t=1000 填充
   * When t=1099 查詢
   * Then 仍使用快取；t=1100 時重新掃描並更新時間戳
   */
  it('should rescan once the timeout has elapsed and not before', () => {
    const query = createQuery(100);
    shotIds(query.query());
    fileSystem.add(`${ROOT}/demo/030/0010`);

    clock.advance(99);
    expect(shotIds(query.query())).toHaveLength(4);
    expect(query.isCacheValid()).toBe(true);

    clock.advance(1);
    expect(query.isCacheValid()).toBe(false);
    expect(shotIds(query.query())).toHaveLength(5);
    expect(fileSystem.walkCount).toBe(2);
    expect(query.cacheTimestamp).toBe(1100);
  });

  it('should never expire without a timeout', () => {
    const query = createQuery(null);
    shotIds(query.query());

    clock.advance(1_000_000_000);
    shotIds(query.query());
    expect(fileSystem.walkCount).toBe(1);
  });

  it('should rescan every call with a zero timeout', () => {
    const query = createQuery(0);
    shotIds(query.query());
    shotIds(query.query());
    expect(fileSystem.walkCount).toBe(2);
  });

  it('should clear the slot on invalidateCache', () => {
    const query = createQuery(null);
    shotIds(query.query());

    query.invalidateCache();
    expect(query.cacheTimestamp).toBeNull();
    expect(query.cachedCount).toBeNull();

    shotIds(query.query());
    expect(fileSystem.walkCount).toBe(2);
  });
});
