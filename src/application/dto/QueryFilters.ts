/**
 * Query 篩選條件
 *
 * 每個 (欄位, 值) 都必須相等；null 代表「該欄位未填」。
 */
export type QueryFilters = Readonly<Record<string, string | null>>;

/** 正規化後的篩選條件：依欄位名稱排序的配對清單 */
export type FilterPairs = ReadonlyArray<readonly [string, string | null]>;

export function toFilterPairs(filters: QueryFilters): FilterPairs {
  return Object.entries(filters).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/** 與鍵順序無關的快取鍵 */
export function filterKey(filters: QueryFilters): string {
  return JSON.stringify(toFilterPairs(filters));
}
