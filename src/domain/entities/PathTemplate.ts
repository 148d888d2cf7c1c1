import { MissingTokensError } from '../errors/DomainErrors.js';
import {
  defaultLiteral,
  isDefaultFormatter,
  parseTokens,
  tokenPattern,
  uniqueTokenNames,
  type Token,
} from '../value-objects/Token.js';
import { applyFormatter, type NormalizerMap } from '../value-objects/TokenFormatter.js';

/** template 只需要依名稱讀取欄位值 */
export interface ContextReader {
  get(field: string): string | undefined;
}

export interface TemplateValidation {
  valid: boolean;
  /** 缺少的 token，依 pattern 出現順序 */
  missing: string[];
}

export interface PathTemplateOptions {
  name?: string;
  base?: PathTemplate;
  normalizers?: NormalizerMap;
}

/** 解析時需排除 `.` 的 token，讓 `<file_name>.<file_type>` 能正確切分 */
const DOTLESS_TOKENS: ReadonlySet<string> = new Set(['file_name', 'file_type']);

export const PATH_SEPARATOR = '/';

/**
 * 單一路徑 template
 *
 * format（代換）與 parse（capture regex）兩個方向皆由同一份 token 清單產生，
 * 避免兩邊規則漂移。建構後不可變。
 */
export class PathTemplate {
  readonly pattern: string;
  readonly name: string;
  readonly tokens: readonly Token[];
  readonly normalizers: NormalizerMap;

  private parser?: { regex: RegExp; groups: string[] };

  constructor(fragment: string, options: PathTemplateOptions = {}) {
    this.pattern = options.base
      ? `${options.base.pattern}${PATH_SEPARATOR}${fragment}`
      : fragment;
    this.name = options.name ?? '';
    this.normalizers = options.normalizers ?? {};
    this.tokens = parseTokens(this.pattern);
  }

  /** 不重複的 token 名稱，依出現順序 */
  get tokenNames(): string[] {
    return uniqueTokenNames(this.tokens);
  }

  hasToken(name: string): boolean {
    return this.tokens.some((t) => t.name === name);
  }

  format(context: ContextReader): string {
    const missing = this.missingTokens(context);
    if (missing.length > 0) {
      throw new MissingTokensError(this.name, missing);
    }

    return this.pattern.replace(tokenPattern(), (_raw, name: string, formatter: string | undefined) => {
      const value = context.get(name);
      if (value === undefined) {
        // missingTokens 已保證只有 default= token 會走到這裡
        return isDefaultFormatter(formatter) ? defaultLiteral(formatter) : '';
      }
      const normalizer = this.normalizers[name];
      const normalized = normalizer ? normalizer(value) : value;
      return formatter ? applyFormatter(normalized, formatter) : normalized;
    });
  }

  canFormat(context: ContextReader): boolean {
    return this.tokens.every(
      (t) => isDefaultFormatter(t.formatter) || context.get(t.name) !== undefined,
    );
  }

  validate(context: ContextReader): TemplateValidation {
    const missing = this.missingTokens(context);
    return { valid: missing.length === 0, missing };
  }

  /**
   * 以 template 的 capture regex 比對完整路徑
   * @returns token 名稱 → 擷取值，不符合則為 null
   */
  match(path: string): Map<string, string> | null {
    const { regex, groups } = this.compileParser();
    const result = regex.exec(path.replace(/\\/g, PATH_SEPARATOR));
    if (!result) return null;

    const captured = new Map<string, string>();
    groups.forEach((name, i) => captured.set(name, result[i + 1]));
    return captured;
  }

  private missingTokens(context: ContextReader): string[] {
    const missing: string[] = [];
    for (const token of this.tokens) {
      if (isDefaultFormatter(token.formatter)) continue;
      if (context.get(token.name) === undefined && !missing.includes(token.name)) {
        missing.push(token.name);
      }
    }
    return missing;
  }

  /** 延遲建立 parse regex；同名 token 第二次出現改用 back-reference */
  private compileParser(): { regex: RegExp; groups: string[] } {
    if (this.parser) return this.parser;

    const pattern = this.pattern.replace(/\\/g, PATH_SEPARATOR);
    const groups: string[] = [];
    let source = '';
    let cursor = 0;

    for (const token of parseTokens(pattern)) {
      source += escapeRegExp(pattern.slice(cursor, token.position));
      const existing = groups.indexOf(token.name);
      if (existing >= 0) {
        // 包成 group，後面的數字字面值才不會被併進 back-reference 編號
        source += `(?:\\${existing + 1})`;
      } else {
        groups.push(token.name);
        source += DOTLESS_TOKENS.has(token.name) ? '([^/.]+)' : '([^/]+)';
      }
      cursor = token.position + token.raw.length;
    }
    source += escapeRegExp(pattern.slice(cursor));

    this.parser = { regex: new RegExp(`^${source}$`), groups };
    return this.parser;
  }
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
