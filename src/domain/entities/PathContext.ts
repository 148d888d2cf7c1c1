/**
 * Context 實體
 *
 * 設計意圖：以明確的欄位清單（ContextShape）取代 record 型別的反射。
 * 每個欄位皆為可選字串；null、undefined 與空字串皆視為「未填」。
 * Shape 以物件 identity 區分，CompositeResolver 依此路由。
 */

/** 建立或覆寫 context 時可傳入的欄位值 */
export type ContextValues<F extends string> = { readonly [K in F]?: string | null };

/** 一種 context 形狀：名稱 + 有序欄位 */
export class ContextShape<F extends string = string> {
  private readonly fieldSet: ReadonlySet<string>;

  constructor(
    public readonly name: string,
    public readonly fields: readonly F[],
  ) {
    this.fieldSet = new Set<string>(fields);
  }

  has(field: string): field is F {
    return this.fieldSet.has(field);
  }

  /** 建立 context，未知欄位與空值會被忽略 */
  create(values: ContextValues<F> = {}): PathContext<F> {
    const populated = new Map<F, string>();
    for (const field of this.fields) {
      const value = values[field];
      if (value) populated.set(field, value);
    }
    return new PathContext<F>(this, populated);
  }

  /** 從 (欄位, 值) 配對建立 context，常用於解析結果 */
  fromEntries(entries: Iterable<readonly [string, string]>): PathContext<F> {
    const collected = new Map<F, string>();
    for (const [field, value] of entries) {
      if (this.has(field) && value) collected.set(field, value);
    }
    // 依 shape 欄位順序重新排列
    const populated = new Map<F, string>();
    for (const field of this.fields) {
      const value = collected.get(field);
      if (value !== undefined) populated.set(field, value);
    }
    return new PathContext<F>(this, populated);
  }

  toString(): string {
    return `ContextShape(${this.name})`;
  }
}

/** 不可變的 context 實例 */
export class PathContext<F extends string = string> {
  constructor(
    public readonly shape: ContextShape<F>,
    private readonly values: ReadonlyMap<F, string>,
  ) {}

  /** 取得欄位值；未知或未填欄位回傳 undefined */
  get(field: string): string | undefined {
    if (!this.shape.has(field)) return undefined;
    return this.values.get(field);
  }

  has(field: string): boolean {
    return this.get(field) !== undefined;
  }

  /** 回傳覆寫後的新 context；值為 null 代表清除欄位 */
  with(overrides: ContextValues<F>): PathContext<F> {
    const next = new Map<F, string>();
    for (const field of this.shape.fields) {
      const override = overrides[field];
      if (override === undefined) {
        const current = this.values.get(field);
        if (current !== undefined) next.set(field, current);
      } else if (override) {
        next.set(field, override);
      }
    }
    return new PathContext<F>(this.shape, next);
  }

  withField(field: F, value: string | null): PathContext<F> {
    const next = new Map<F, string>();
    for (const name of this.shape.fields) {
      const current = name === field ? value : this.values.get(name);
      if (current) next.set(name, current);
    }
    return new PathContext<F>(this.shape, next);
  }

  /** 依 shape 欄位順序回傳已填欄位 */
  populated(): Map<F, string> {
    return new Map(this.values);
  }

  equals(other: PathContext<string>): boolean {
    if (other.shape !== this.shape) return false;
    const theirs = other.populated();
    if (theirs.size !== this.values.size) return false;
    for (const [field, value] of this.values) {
      if (theirs.get(field) !== value) return false;
    }
    return true;
  }

  toJSON(): Record<string, string | null> {
    const out: Record<string, string | null> = {};
    for (const field of this.shape.fields) {
      out[field] = this.values.get(field) ?? null;
    }
    return out;
  }
}

/**
 * 定義 context 形狀
 *
 * @example
 * const Shot = defineContext('Shot', ['show', 'seq', 'shot']);
 * const ctx = Shot.create({ show: 'demo', seq: '010' });
 */
export function defineContext<F extends string>(name: string, fields: readonly F[]): ContextShape<F> {
  return new ContextShape(name, fields);
}
