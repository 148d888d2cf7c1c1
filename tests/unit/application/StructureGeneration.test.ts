import { describe, it, expect, beforeEach } from 'vitest';
import { PathResolver, truncatePattern } from '../../../src/application/PathResolver.js';
import { defineContext } from '../../../src/domain/entities/PathContext.js';
import { TemplateNotFoundError, UnknownStopTokenError } from '../../../src/domain/errors/DomainErrors.js';
import { parseTokens } from '../../../src/domain/value-objects/Token.js';
import { Logger } from '../../../src/shared/Logger.js';
import { InMemoryFileSystem } from '../../helpers/InMemoryFileSystem.js';

const Task = defineContext('Task', ['show', 'dept', 'task', 'asset', 'subcontext', 'dcc', 'file_type']);

/**
 * Feature: 目錄結構展開
 *
 * 作為專案初始化工具，我需要以登錄的 token 值展開 context 未填的欄位，
 * 一次建立所有部門與任務的目錄。
 */
describe('PathResolver.createStructure', () => {
  let fileSystem: InMemoryFileSystem;
  let resolver: PathResolver<'show' | 'dept' | 'task' | 'asset' | 'subcontext' | 'dcc' | 'file_type'>;

  beforeEach(() => {
    fileSystem = new InMemoryFileSystem();
    resolver = new PathResolver(Task, { fileSystem, logger: new Logger('test', 'error') });
    resolver.register('task', '/proj/<show>/<dept>/<task>');
    resolver.registerTokenValues('dept', ['anim', 'comp', 'fx']);
    resolver.registerTokenValues('task', ['blocking', 'final']);
  });

  /**
   * Scenario: D × T 展開
   * Given 3 個部門與 2 個任務
   * When 只提供 show
   * Then 產生 6 個路徑，第一個 token 在最外層
   */
  it('should expand every combination in registration order', () => {
    const paths = resolver.createStructure('task', Task.create({ show: 'demo' }), { dryRun: true });

    expect(paths).toEqual([
      '/proj/demo/anim/blocking',
      '/proj/demo/anim/final',
      '/proj/demo/comp/blocking',
      '/proj/demo/comp/final',
      '/proj/demo/fx/blocking',
      '/proj/demo/fx/final',
    ]);
  });

  it('should not touch the filesystem on dry runs and return the same paths each time', () => {
    const ctx = Task.create({ show: 'demo' });
    const first = resolver.createStructure('task', ctx, { dryRun: true });
    const second = resolver.createStructure('task', ctx, { dryRun: true });

    expect(second).toEqual(first);
    expect(fileSystem.created).toEqual([]);
  });

  it('should create each directory when not a dry run', () => {
    const paths = resolver.createStructure('task', Task.create({ show: 'demo', dept: 'comp' }));

    expect(paths).toEqual(['/proj/demo/comp/blocking', '/proj/demo/comp/final']);
    expect(fileSystem.created).toEqual(paths);
  });

  it('should produce nothing when a registered value list is empty', () => {
    resolver.registerTokenValues('task', []);
    expect(resolver.createStructure('task', Task.create({ show: 'demo' }), { dryRun: true })).toEqual([]);
  });

  it('should skip combinations that cannot be formatted', () => {
    expect(resolver.createStructure('task', Task.create(), { dryRun: true })).toEqual([]);
  });

  it('should expand a repeated token once', () => {
    resolver.register('notes', '/proj/<dept>/<dept>_notes');
    const paths = resolver.createStructure('notes', Task.create(), { dryRun: true });

    expect(paths).toEqual(['/proj/anim/anim_notes', '/proj/comp/comp_notes', '/proj/fx/fx_notes']);
  });

  describe('stopAtToken', () => {
    beforeEach(() => {
      resolver.register('asset', '/lib/<asset>/<subcontext>/<dcc>/<file_type>');
      resolver.registerTokenValues('subcontext', ['model', 'rig', 'look', 'fx']);
      resolver.registerTokenValues('dcc', ['maya', 'houdini', 'nuke', 'blender']);
      resolver.registerTokenValues('file_type', ['ma', 'abc', 'fbx', 'usd', 'obj']);
    });

    it('should expand all three tokens without a stop token', () => {
      const paths = resolver.createStructure('asset', Task.create({ asset: 'tree' }), { dryRun: true });

      expect(paths).toHaveLength(80);
      expect(paths[0]).toBe('/lib/tree/model/maya/ma');
    });

    /**
     * Scenario: 在 file_type 前停止
     * Given 4 × 4 × 5 = 80 種組合
     * When stopAtToken 為 file_type
     * Then 只產生 16 個路徑，每個都停在 dcc 那一層
     */
    it('should truncate at the stop token', () => {
      const paths = resolver.createStructure('asset', Task.create({ asset: 'tree' }), {
        dryRun: true,
        stopAtToken: 'file_type',
      });

      expect(paths).toHaveLength(16);
      expect(paths[0]).toBe('/lib/tree/model/maya');
      expect(paths[15]).toBe('/lib/tree/fx/blender');
      expect(new Set(paths).size).toBe(16);
    });

    it('should return nothing when stopping at the first token', () => {
      const paths = resolver.createStructure('asset', Task.create({ asset: 'tree' }), {
        dryRun: true,
        stopAtToken: 'asset',
      });
      expect(paths).toEqual([]);
    });

    it('should reject a stop token the template does not contain', () => {
      const ctx = Task.create({ asset: 'tree' });

      expect(() => resolver.createStructure('asset', ctx, { stopAtToken: 'show' })).toThrow(UnknownStopTokenError);
      expect(() => resolver.createStructure('asset', ctx, { stopAtToken: 'show' })).toThrow(
        'Available tokens: asset, subcontext, dcc, file_type',
      );
    });
  });

  it('should throw for an unknown template', () => {
    expect(() => resolver.createStructure('nope', Task.create())).toThrow(TemplateNotFoundError);
  });
});

describe('truncatePattern', () => {
  it('should cut at the separator before the stop token', () => {
    const pattern = '/lib/<asset>/<dcc>_<file_type>';
    expect(truncatePattern(pattern, 1, parseTokens(pattern))).toBe('/lib/<asset>');
    expect(truncatePattern(pattern, 2, parseTokens(pattern))).toBe('/lib/<asset>');
  });

  it('should cut directly before the stop token when no separator precedes it', () => {
    const pattern = '<show>_<dept>';
    expect(truncatePattern(pattern, 1, parseTokens(pattern))).toBe('<show>_');
  });

  it('should keep the whole pattern when the bound covers every token', () => {
    const pattern = '<show>/<dept>';
    expect(truncatePattern(pattern, 2, parseTokens(pattern))).toBe(pattern);
    expect(truncatePattern(pattern, 0, parseTokens(pattern))).toBe('');
  });
});
