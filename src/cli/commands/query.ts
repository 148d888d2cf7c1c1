import type { Command } from 'commander';
import path from 'node:path';
import { createQueryFromConfig } from '../../application/ResolverFactory.js';
import { parseAssignments } from '../args.js';
import { openProject, print, withCommonOptions, type CommonOptions } from '../bootstrap.js';

/**
 * 掃描目錄並列出符合篩選的 context；`field=` 篩選未填欄位
 *
 * 用法：tokenpath query ./projects show=demo dept=comp
 */
export function registerQueryCommand(program: Command): void {
  withCommonOptions(
    program
      .command('query <root> [filters...]')
      .description('Scan a directory for paths matching the templates'),
  ).action((root: string, filters: string[], opts: CommonOptions) => {
    const project = openProject(opts);
    const { config, resolver } = project;
    const query = createQueryFromConfig(config, resolver, path.resolve(project.root, root), {
      fileSystem: project.fileSystem,
    });
    const results = [...query.query(parseAssignments(filters, resolver.shape))];

    print(project, {
      root: query.rootDir,
      strategy: config.query.strategy,
      count: results.length,
      results: results.map((ctx) => ctx.toJSON()),
    });
  });
}
