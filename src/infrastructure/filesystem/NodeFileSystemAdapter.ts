import fs from 'node:fs';
import path from 'node:path';
import type { FileSystemPort } from '../../domain/ports/FileSystemPort.js';
import { Logger } from '../../shared/Logger.js';

export class NodeFileSystemAdapter implements FileSystemPort {
  constructor(private readonly logger: Logger = new Logger('NodeFileSystemAdapter', 'warn')) {}

  *walk(root: string): Generator<string> {
    const start = path.resolve(root);
    if (!this.isDirectory(start)) {
      this.logger.warn('Walk root does not exist', { root: start });
      return;
    }
    yield* this.walkDir(start);
  }

  /** 遞迴走訪目錄，項目依名稱排序；symlink 只回報、不進入 */
  private *walkDir(dir: string): Generator<string> {
    const entries = fs.readdirSync(dir, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      yield fullPath;
      if (entry.isDirectory()) {
        yield* this.walkDir(fullPath);
      }
    }
  }

  ensureDirectory(dirPath: string): void {
    fs.mkdirSync(dirPath, { recursive: true });
  }

  readFile(filePath: string): string {
    return fs.readFileSync(filePath, 'utf-8');
  }

  fileExists(filePath: string): boolean {
    try {
      return fs.statSync(filePath).isFile();
    } catch {
      return false;
    }
  }

  private isDirectory(dirPath: string): boolean {
    try {
      return fs.statSync(dirPath).isDirectory();
    } catch {
      return false;
    }
  }
}
