import path from 'node:path';
import type { PathContext } from '../../domain/entities/PathContext.js';
import type { FileSystemPort } from '../../domain/ports/FileSystemPort.js';
import { NodeFileSystemAdapter } from '../../infrastructure/filesystem/NodeFileSystemAdapter.js';
import { Logger } from '../../shared/Logger.js';
import type { QueryFilters } from '../dto/QueryFilters.js';
import type { PathResolver } from '../PathResolver.js';

/** 毫秒時鐘，測試可注入 */
export type Clock = () => number;

export interface QueryOptions {
  fileSystem?: FileSystemPort;
  logger?: Logger;
  clock?: Clock;
}

/**
 * 所有篩選條件都必須相等；null 代表欄位未填，shape 外的欄位一律不符合
 */
export function matchesFilters(context: PathContext<string>, filters: QueryFilters): boolean {
  for (const [field, expected] of Object.entries(filters)) {
    if (!context.shape.has(field)) return false;
    if ((context.get(field) ?? null) !== expected) return false;
  }
  return true;
}

/** 快取是否仍有效：timeout 為 null 時永不過期 */
export function isFresh(stampedAt: number, timeoutMs: number | null, now: number): boolean {
  return timeoutMs === null || now - stampedAt < timeoutMs;
}

/**
 * 目錄掃描 query 的共用基底
 *
 * 走訪 root 下所有子孫，以相對於 root 的路徑交給 resolver 解析。
 */
export abstract class Query<F extends string = string> {
  readonly rootDir: string;
  protected readonly fileSystem: FileSystemPort;
  protected readonly logger: Logger;
  protected readonly clock: Clock;

  constructor(
    readonly resolver: PathResolver<F>,
    rootDir: string,
    options: QueryOptions = {},
  ) {
    this.rootDir = path.resolve(rootDir);
    this.logger = options.logger ?? new Logger(this.constructor.name, 'warn');
    this.fileSystem = options.fileSystem ?? new NodeFileSystemAdapter(this.logger.child('NodeFileSystemAdapter'));
    this.clock = options.clock ?? Date.now;
  }

  abstract query(filters?: QueryFilters): Generator<PathContext<F>, void, undefined>;

  /** 以 posix 相對路徑解析 */
  protected parse(absolutePath: string): PathContext<F> | null {
    const relative = path.relative(this.rootDir, absolutePath).split(path.sep).join('/');
    return this.resolver.parsePath(relative);
  }

  protected walk(): Iterable<string> {
    return this.fileSystem.walk(this.rootDir);
  }
}
