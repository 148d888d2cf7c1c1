import type { TemplateDefinitions } from '../application/dto/TemplateDefinition.js';
import type { QueryStrategy } from '../application/query/createQuery.js';
import type { LogLevel } from '../shared/Logger.js';
import type { NormalizerName } from './normalizers.js';

/** Context shape 設定；fields 為空時由 template 的 token 推導 */
export interface ContextConfig {
  name: string;
  fields: string[];
}

/** Query 策略與快取 timeout（毫秒，null 代表永不過期） */
export interface QueryConfig {
  strategy: QueryStrategy;
  cacheTimeoutMs: number | null;
  pathCacheTimeoutMs: number | null;
  parseCacheTimeoutMs: number | null;
}

/** 完整設定 */
export interface TokenPathConfig {
  version: number;
  context: ContextConfig;
  /** `{NAME}` → 字面值 */
  variables: Record<string, string>;
  templates: TemplateDefinitions;
  /** createStructure 展開用的 token 值 */
  tokenValues: Record<string, string[]>;
  /** token → 依序套用的內建 normalizer */
  normalizers: Record<string, NormalizerName[]>;
  query: QueryConfig;
  logLevel: LogLevel;
}

/** 部分設定（用於 merge） */
export interface PartialConfig {
  version?: number;
  context?: Partial<ContextConfig>;
  variables?: Record<string, string>;
  templates?: TemplateDefinitions;
  tokenValues?: Record<string, string[]>;
  normalizers?: Record<string, NormalizerName[]>;
  query?: Partial<QueryConfig>;
  logLevel?: LogLevel;
}
