import type { TokenPathConfig } from './types.js';

export const CONFIG_FILE_NAME = '.tokenpath.json';

export const DEFAULT_CONFIG: TokenPathConfig = {
  version: 1,
  context: {
    name: 'Context',
    fields: [],
  },
  variables: {},
  templates: {},
  tokenValues: {},
  normalizers: {},
  query: {
    strategy: 'full',
    cacheTimeoutMs: 300000, // 5 分鐘
    pathCacheTimeoutMs: 300000,
    parseCacheTimeoutMs: null,
  },
  logLevel: 'warn',
};
