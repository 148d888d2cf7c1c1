import { isDefaultFormatter } from './Token.js';

/** 呼叫端提供的逐 token 正規化函式，在 formatter 之前執行 */
export type Normalizer = (value: string) => string;

export type NormalizerMap = Readonly<Record<string, Normalizer>>;

const DIGITS = /^\d+$/;

/**
 * 套用 formatter 規格到已存在的值
 *
 * - `04`：數字值左補零到指定寬度（不截斷），非數字值不變
 * - `upper` / `lower` / `title`：大小寫轉換
 * - `default=x`：值已存在時為 no-op
 * - 其他未知規格：no-op
 */
export function applyFormatter(value: string, formatter: string): string {
  if (isDefaultFormatter(formatter)) return value;

  if (DIGITS.test(formatter)) {
    const width = Number.parseInt(formatter, 10);
    return DIGITS.test(value) ? value.padStart(width, '0') : value;
  }

  switch (formatter) {
    case 'upper': return value.toUpperCase();
    case 'lower': return value.toLowerCase();
    case 'title': return toTitleCase(value);
    default: return value;
  }
}

/** 每個以空白分隔的單字首字大寫，其餘小寫 */
function toTitleCase(value: string): string {
  return value.replace(/\S+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}
