/**
 * 檔案系統存取介面
 *
 * 全部為同步操作；walk 為惰性 iterable，讓 query 可以提早中止。
 */
export interface FileSystemPort {
  /** 以前序走訪 root 下所有子孫（檔案與目錄），回傳絕對路徑；root 不存在時不產出任何項目 */
  walk(root: string): Iterable<string>;
  /** 遞迴建立目錄，已存在時不報錯 */
  ensureDirectory(dirPath: string): void;
  readFile(filePath: string): string;
  fileExists(filePath: string): boolean;
}
