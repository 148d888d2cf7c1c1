import type { Normalizer, NormalizerMap } from '../domain/value-objects/TokenFormatter.js';

export const NORMALIZER_NAMES = [
  'trim',
  'lower',
  'upper',
  'spaces-to-underscores',
  'strip-illegal',
  'alphanumeric',
] as const;

export type NormalizerName = (typeof NORMALIZER_NAMES)[number];

/** 可由設定檔引用的內建 normalizer */
export const BUILT_IN_NORMALIZERS: Readonly<Record<NormalizerName, Normalizer>> = {
  'trim': (value) => value.trim(),
  'lower': (value) => value.toLowerCase(),
  'upper': (value) => value.toUpperCase(),
  'spaces-to-underscores': (value) => value.replace(/\s+/g, '_'),
  // Windows 與 POSIX 路徑中不合法的字元，以及控制字元
  'strip-illegal': (value) => value.replace(/[<>:"/\\|?*\u0000-\u001f]/g, ''),
  'alphanumeric': (value) => value.replace(/[^A-Za-z0-9]/g, ''),
};

/** 將 token → normalizer 名稱清單轉成串接後的函式 */
export function buildNormalizers(config: Readonly<Record<string, readonly NormalizerName[]>>): NormalizerMap {
  const map: Record<string, Normalizer> = {};
  for (const [token, names] of Object.entries(config)) {
    if (names.length === 0) continue;
    const chain = names.map((name) => BUILT_IN_NORMALIZERS[name]);
    map[token] = (value) => chain.reduce((current, fn) => fn(current), value);
  }
  return map;
}
