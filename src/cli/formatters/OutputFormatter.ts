export type OutputFormat = 'json' | 'text';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'text'];

/** CLI 輸出格式化：JSON 或平展後的文字 */
export class OutputFormatter {
  constructor(private readonly format: OutputFormat) {}

  formatObject(data: unknown): string {
    if (this.format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '-';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      if (data.length === 0) return `${prefix}(none)`;
      return data.map((item, i) => {
        if (typeof item === 'object' && item !== null) {
          return `${prefix}[${i}]\n${this.flattenToText(item, indent + 1)}`;
        }
        return `${prefix}[${i}] ${this.flattenToText(item)}`;
      }).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${this.flattenToText(val)}`;
      })
      .join('\n');
  }
}
