import path from 'node:path';
import type { ContextShape, PathContext } from '../domain/entities/PathContext.js';
import { PATH_SEPARATOR, PathTemplate, type TemplateValidation } from '../domain/entities/PathTemplate.js';
import {
  BaseNotFoundError,
  DefinitionLoadError,
  TemplateNotFoundError,
  UnknownStopTokenError,
} from '../domain/errors/DomainErrors.js';
import type { FileSystemPort } from '../domain/ports/FileSystemPort.js';
import type { Token } from '../domain/value-objects/Token.js';
import type { NormalizerMap } from '../domain/value-objects/TokenFormatter.js';
import { NodeFileSystemAdapter } from '../infrastructure/filesystem/NodeFileSystemAdapter.js';
import { Logger } from '../shared/Logger.js';
import { TemplateDefinitionsSchema, formatIssues } from './dto/TemplateDefinition.js';

export interface PathResolverOptions {
  /** `{NAME}` → 字面值，在註冊時代換 */
  variables?: Readonly<Record<string, string>>;
  normalizers?: NormalizerMap;
  fileSystem?: FileSystemPort;
  logger?: Logger;
}

export interface CreateStructureOptions {
  /** 只回傳路徑，不建立目錄 */
  dryRun?: boolean;
  /** 只展開此 token 之前的 token（不含） */
  stopAtToken?: string;
}

/**
 * 單一 context shape 的 template 註冊表
 *
 * 負責 format / parse，以及依 token 值清單展開目錄結構。
 */
export class PathResolver<F extends string = string> {
  private readonly templates = new Map<string, PathTemplate>();
  private readonly tokenValues = new Map<string, readonly string[]>();
  private readonly variables: Readonly<Record<string, string>>;
  private readonly normalizers: NormalizerMap;
  private readonly fileSystem: FileSystemPort;
  private readonly logger: Logger;

  constructor(
    readonly shape: ContextShape<F>,
    options: PathResolverOptions = {},
  ) {
    this.variables = options.variables ?? {};
    this.normalizers = options.normalizers ?? {};
    this.logger = options.logger ?? new Logger('PathResolver', 'warn');
    this.fileSystem = options.fileSystem ?? new NodeFileSystemAdapter(this.logger.child('NodeFileSystemAdapter'));
  }

  get templateNames(): string[] {
    return [...this.templates.keys()];
  }

  hasTemplate(name: string): boolean {
    return this.templates.has(name);
  }

  getTemplate(name: string): PathTemplate {
    const template = this.templates.get(name);
    if (!template) throw new TemplateNotFoundError(name);
    return template;
  }

  /**
   * 註冊 template；同名重複註冊會覆蓋，但保留原本的註冊順序
   * @param base - 已註冊的 template 名稱，其完整 pattern 會接在前面
   */
  register(name: string, pattern: string, base?: string): PathTemplate {
    const expanded = this.substituteVariables(pattern);

    let baseTemplate: PathTemplate | undefined;
    if (base !== undefined) {
      baseTemplate = this.templates.get(base);
      if (!baseTemplate) throw new BaseNotFoundError(base);
    }

    const template = new PathTemplate(expanded, {
      name,
      base: baseTemplate,
      normalizers: this.normalizers,
    });
    this.templates.set(name, template);
    this.logger.debug('Template registered', { name, pattern: template.pattern });
    return template;
  }

  resolve(name: string, context: PathContext<F>): string {
    return this.getTemplate(name).format(context);
  }

  /**
   * 回傳第一個可 format 的 template 結果
   *
   * prefer 非空時只依 prefer 的順序嘗試（未註冊的名稱略過），否則依註冊順序。
   */
  resolveAny(context: PathContext<F>, prefer: readonly string[] = []): string | null {
    const order = prefer.length > 0 ? prefer : this.templateNames;
    for (const name of order) {
      const template = this.templates.get(name);
      if (template?.canFormat(context)) return template.format(context);
    }
    return null;
  }

  findMatches(context: PathContext<F>): string[] {
    const names: string[] = [];
    for (const [name, template] of this.templates) {
      if (template.canFormat(context)) names.push(name);
    }
    return names;
  }

  validate(name: string, context: PathContext<F>): TemplateValidation {
    return this.getTemplate(name).validate(context);
  }

  /**
   * 依註冊順序比對路徑，回傳第一個符合的 context；皆不符合回傳 null
   *
   * template 沒有 file_name / file_type token 時，會由最後一段路徑的檔名與副檔名補上。
   */
  parsePath(filePath: string): PathContext<F> | null {
    const normalized = filePath.replace(/\\/g, PATH_SEPARATOR);

    for (const template of this.templates.values()) {
      const captured = template.match(normalized);
      if (!captured) continue;

      const entries = [...captured];
      const basename = path.posix.basename(normalized);
      const extension = path.posix.extname(basename);
      const stem = basename.slice(0, basename.length - extension.length);

      if (!template.hasToken('file_name') && this.shape.has('file_name') && stem) {
        entries.push(['file_name', stem]);
      }
      if (!template.hasToken('file_type') && this.shape.has('file_type') && extension) {
        entries.push(['file_type', extension.slice(1)]);
      }
      return this.shape.fromEntries(entries);
    }
    return null;
  }

  /** 登錄 token 的所有可能值，供 createStructure 展開；重複登錄會覆蓋 */
  registerTokenValues(token: string, values: readonly string[]): void {
    this.tokenValues.set(token, [...values]);
  }

  getTokenValues(token: string): string[] {
    return [...(this.tokenValues.get(token) ?? [])];
  }

  /**
   * 以已登錄的 token 值展開 context 未填的 token，產生所有目錄組合
   *
   * @example
   * resolver.registerTokenValues('dept', ['anim', 'comp']);
   * resolver.createStructure('task', ctx, { stopAtToken: 'version', dryRun: true });
   */
  createStructure(name: string, context: PathContext<F>, options: CreateStructureOptions = {}): string[] {
    const template = this.getTemplate(name);
    const tokens = template.tokens;

    let stopIndex = tokens.length;
    if (options.stopAtToken !== undefined) {
      const stopToken = options.stopAtToken;
      stopIndex = tokens.findIndex((t) => t.name === stopToken);
      if (stopIndex < 0) {
        throw new UnknownStopTokenError(stopToken, template.tokenNames);
      }
    }

    const expansion: F[] = [];
    for (const token of tokens.slice(0, stopIndex)) {
      const field = token.name;
      if (!this.shape.has(field)) continue;
      if (context.has(field) || expansion.includes(field)) continue;
      if (!this.tokenValues.has(field)) continue;
      expansion.push(field);
    }

    const partialPattern = truncatePattern(template.pattern, stopIndex, tokens);
    const paths: string[] = [];
    if (partialPattern) {
      const partial = new PathTemplate(partialPattern, { name, normalizers: template.normalizers });
      for (const combination of this.expand(context, expansion)) {
        if (partial.canFormat(combination)) paths.push(partial.format(combination));
      }
    }

    if (!options.dryRun) {
      for (const dir of paths) this.fileSystem.ensureDirectory(dir);
    }
    this.logger.info('Structure generated', {
      template: name,
      expanded: expansion,
      count: paths.length,
      dryRun: options.dryRun ?? false,
    });
    return paths;
  }

  /**
   * 批次載入 template 定義
   *
   * 依物件鍵順序註冊，所以 base 必須先於引用它的 template 出現。
   */
  loadDefinitions(data: unknown): void {
    const parsed = TemplateDefinitionsSchema.safeParse(data);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      throw new DefinitionLoadError(`Invalid template definitions: ${issues.join('; ')}`, issues);
    }

    for (const [name, definition] of Object.entries(parsed.data)) {
      if (typeof definition === 'string') {
        this.register(name, definition);
      } else {
        this.register(name, definition.pattern, definition.base);
      }
    }
  }

  /** 從 JSON 檔載入批次定義 */
  loadDefinitionsFile(filePath: string): void {
    if (!this.fileSystem.fileExists(filePath)) {
      const issue = `file not found: ${filePath}`;
      throw new DefinitionLoadError(`Template definitions ${issue}`, [issue]);
    }
    const raw = this.fileSystem.readFile(filePath);
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new DefinitionLoadError(`Invalid JSON in ${filePath}: ${message}`, [message], { cause: err });
    }
    this.loadDefinitions(data);
  }

  private substituteVariables(pattern: string): string {
    let result = pattern;
    for (const [name, value] of Object.entries(this.variables)) {
      result = result.replaceAll(`{${name}}`, value);
    }
    return result;
  }

  /** 依註冊順序的笛卡兒積，第一個 token 在最外層 */
  private expand(context: PathContext<F>, fields: readonly F[]): PathContext<F>[] {
    let contexts: PathContext<F>[] = [context];
    for (const field of fields) {
      const values = this.tokenValues.get(field) ?? [];
      const next: PathContext<F>[] = [];
      for (const current of contexts) {
        for (const value of values) next.push(current.withField(field, value));
      }
      contexts = next;
    }
    return contexts;
  }
}

/**
 * 截斷 pattern，只保留 stopIndex 之前的 token
 *
 * 從 stop token 的位置往回找分隔符；找不到時直接在 stop token 前截斷。
 */
export function truncatePattern(pattern: string, stopIndex: number, tokens: readonly Token[]): string {
  if (stopIndex === 0) return '';
  if (stopIndex >= tokens.length) return pattern;

  const stopPosition = tokens[stopIndex].position;
  let cut = stopPosition - 1;
  while (cut > 0 && pattern[cut] !== '/' && pattern[cut] !== '\\') cut--;

  return cut > 0 ? pattern.slice(0, cut) : pattern.slice(0, stopPosition);
}
