/** pattern 中的一個佔位符，例如 `<seq:04>` */
export interface Token {
  name: string;
  /** `:` 之後的 formatter 規格（可選） */
  formatter?: string;
  /** 在 pattern 中的起始位置 */
  position: number;
  /** 原始文字，例如 "<seq:04>" */
  raw: string;
}

const DEFAULT_PREFIX = 'default=';

/** 建立新的 token RegExp（global 狀態不可共用） */
export function tokenPattern(): RegExp {
  return /<(\w+)(?::([^>]+))?>/g;
}

/**
 * 依出現順序解析 pattern 中所有 token
 *
 * 同名 token 重複出現時全部保留，由呼叫端決定是否去重。
 */
export function parseTokens(pattern: string): Token[] {
  const tokens: Token[] = [];
  for (const match of pattern.matchAll(tokenPattern())) {
    const token: Token = {
      name: match[1],
      position: match.index ?? 0,
      raw: match[0],
    };
    if (match[2] !== undefined) token.formatter = match[2];
    tokens.push(token);
  }
  return tokens;
}

export function isDefaultFormatter(formatter: string | undefined): formatter is string {
  return formatter !== undefined && formatter.startsWith(DEFAULT_PREFIX);
}

/** 取出 `default=` 之後的字面值 */
export function defaultLiteral(formatter: string): string {
  return formatter.slice(DEFAULT_PREFIX.length);
}

/** 依出現順序回傳不重複的 token 名稱 */
export function uniqueTokenNames(tokens: readonly Token[]): string[] {
  return [...new Set(tokens.map((t) => t.name))];
}
