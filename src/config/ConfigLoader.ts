import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { TemplateDefinitionsSchema, formatIssues } from '../application/dto/TemplateDefinition.js';
import { ConfigValidationError } from '../domain/errors/DomainErrors.js';
import { isLogLevel } from '../shared/Logger.js';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from './defaults.js';
import { NORMALIZER_NAMES } from './normalizers.js';
import type { PartialConfig, TokenPathConfig } from './types.js';

export type { TokenPathConfig, PartialConfig } from './types.js';

const ENV_LOG_LEVEL = 'TOKENPATH_LOG_LEVEL';
const ENV_VAR_PREFIX = 'TOKENPATH_VAR_';
const FIELD_NAME = /^\w+$/;

const TimeoutSchema = z.number().nullable();

/** 設定檔只需提供要覆蓋的部分 */
const PartialConfigSchema = z.object({
  version: z.number().int().optional(),
  context: z.object({
    name: z.string().min(1),
    fields: z.array(z.string()),
  }).partial().optional(),
  variables: z.record(z.string(), z.string()).optional(),
  templates: TemplateDefinitionsSchema.optional(),
  tokenValues: z.record(z.string(), z.array(z.string())).optional(),
  normalizers: z.record(z.string(), z.array(z.enum(NORMALIZER_NAMES))).optional(),
  query: z.object({
    strategy: z.enum(['basic', 'full', 'two-tier', 'lazy']),
    cacheTimeoutMs: TimeoutSchema,
    pathCacheTimeoutMs: TimeoutSchema,
    parseCacheTimeoutMs: TimeoutSchema,
  }).partial().optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

/** undefined 代表未指定；null 是合法的值（例如永不過期的 timeout） */
function pick<T>(value: T | undefined, fallback: T): T {
  return value === undefined ? fallback : value;
}

/** 合併：partial 覆蓋 base，record 型別的欄位逐鍵合併 */
function mergeConfig(base: TokenPathConfig, partial: PartialConfig): TokenPathConfig {
  return {
    version: pick(partial.version, base.version),
    context: {
      name: pick(partial.context?.name, base.context.name),
      fields: pick(partial.context?.fields, base.context.fields),
    },
    variables: { ...base.variables, ...partial.variables },
    templates: { ...base.templates, ...partial.templates },
    tokenValues: { ...base.tokenValues, ...partial.tokenValues },
    normalizers: { ...base.normalizers, ...partial.normalizers },
    query: {
      strategy: pick(partial.query?.strategy, base.query.strategy),
      cacheTimeoutMs: pick(partial.query?.cacheTimeoutMs, base.query.cacheTimeoutMs),
      pathCacheTimeoutMs: pick(partial.query?.pathCacheTimeoutMs, base.query.pathCacheTimeoutMs),
      parseCacheTimeoutMs: pick(partial.query?.parseCacheTimeoutMs, base.query.parseCacheTimeoutMs),
    },
    logLevel: pick(partial.logLevel, base.logLevel),
  };
}

/** 環境變數覆蓋 config：TOKENPATH_LOG_LEVEL → logLevel，TOKENPATH_VAR_<NAME> → variables.NAME */
function applyEnvOverrides(config: TokenPathConfig, env: NodeJS.ProcessEnv): void {
  const level = env[ENV_LOG_LEVEL];
  if (level) {
    if (!isLogLevel(level)) {
      throw new ConfigValidationError(`${ENV_LOG_LEVEL} must be one of debug, info, warn, error (got "${level}")`);
    }
    config.logLevel = level;
  }

  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(ENV_VAR_PREFIX) && key.length > ENV_VAR_PREFIX.length && value !== undefined) {
      config.variables[key.slice(ENV_VAR_PREFIX.length)] = value;
    }
  }
}

/** 驗證設定值的合法性 */
function validate(config: TokenPathConfig): void {
  const timeouts = {
    cacheTimeoutMs: config.query.cacheTimeoutMs,
    pathCacheTimeoutMs: config.query.pathCacheTimeoutMs,
    parseCacheTimeoutMs: config.query.parseCacheTimeoutMs,
  };
  for (const [key, value] of Object.entries(timeouts)) {
    if (value !== null && !(Number.isFinite(value) && value >= 0)) {
      throw new ConfigValidationError(`query.${key} must be a non-negative number or null`);
    }
  }

  const seen = new Set<string>();
  for (const field of config.context.fields) {
    if (!FIELD_NAME.test(field)) {
      throw new ConfigValidationError(`context field "${field}" must contain only letters, digits and underscores`);
    }
    if (seen.has(field)) {
      throw new ConfigValidationError(`context field "${field}" is declared more than once`);
    }
    seen.add(field);
  }
}

function parsePartial(data: unknown, source: string): PartialConfig {
  const parsed = PartialConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigValidationError(`Invalid config in ${source}: ${formatIssues(parsed.error).join('; ')}`);
  }
  return parsed.data;
}

/**
 * 載入設定：讀取 .tokenpath.json（若存在）並合併到預設值上
 * @param projectRoot - 專案根目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 * @param env - 環境變數，優先於所有其他來源
 */
export function loadConfig(
  projectRoot: string,
  overrides?: PartialConfig,
  env: NodeJS.ProcessEnv = process.env,
): TokenPathConfig {
  let fileConfig: PartialConfig = {};

  const configPath = path.join(projectRoot, CONFIG_FILE_NAME);
  if (fs.existsSync(configPath)) {
    const raw = fs.readFileSync(configPath, 'utf-8');
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigValidationError(`Invalid JSON in ${configPath}: ${message}`, { cause: err });
    }
    fileConfig = parsePartial(data, configPath);
  }

  // 合併順序：defaults < file config < overrides < env
  let merged = mergeConfig(DEFAULT_CONFIG, fileConfig);
  if (overrides) {
    merged = mergeConfig(merged, parsePartial(overrides, 'overrides'));
  }

  applyEnvOverrides(merged, env);

  validate(merged);
  return merged;
}
