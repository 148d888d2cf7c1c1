import type { ContextShape } from '../domain/entities/PathContext.js';

/**
 * 解析 `key=value` 參數
 *
 * `key=`（空值）代表 null：在 query 篩選中表示「欄位未填」。
 */
export function parseAssignments(
  args: readonly string[],
  shape: ContextShape<string>,
): Record<string, string | null> {
  const values: Record<string, string | null> = {};
  for (const arg of args) {
    const eq = arg.indexOf('=');
    if (eq <= 0) {
      throw new Error(`Expected key=value, got "${arg}"`);
    }
    const key = arg.slice(0, eq);
    if (!shape.has(key)) {
      throw new Error(`Unknown field "${key}". Known fields: ${shape.fields.join(', ')}`);
    }
    const value = arg.slice(eq + 1);
    values[key] = value === '' ? null : value;
  }
  return values;
}

/** 逗號分隔清單，略過空白項目 */
export function parseList(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}
