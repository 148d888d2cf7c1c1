import { PathResolver } from '../../../../src/application/PathResolver.js';
import { defineContext } from '../../../../src/domain/entities/PathContext.js';
import { Logger } from '../../../../src/shared/Logger.js';
import { InMemoryFileSystem } from '../../../helpers/InMemoryFileSystem.js';

export const ROOT = '/project';

export const Shot = defineContext('Shot', ['show', 'seq', 'shot', 'dept']);

export const quiet = new Logger('test', 'error');

/** 四個 shot 目錄，共 9 個走訪項目 */
export function createShotTree(): InMemoryFileSystem {
  return new InMemoryFileSystem([
    `${ROOT}/demo/010/0010`,
    `${ROOT}/demo/010/0020`,
    `${ROOT}/demo/020/0010`,
    `${ROOT}/other/010/0030`,
  ]);
}

export function createShotResolver(fileSystem: InMemoryFileSystem): PathResolver<'show' | 'seq' | 'shot' | 'dept'> {
  const resolver = new PathResolver(Shot, { fileSystem, logger: quiet });
  resolver.register('shot', '<show>/<seq>/<shot>');
  return resolver;
}

export function shotIds(contexts: Iterable<{ get(field: string): string | undefined }>): string[] {
  return [...contexts].map((ctx) => `${ctx.get('show')}/${ctx.get('seq')}/${ctx.get('shot')}`);
}
