import type { Command } from 'commander';
import { parseAssignments } from '../args.js';
import { openProject, print, withCommonOptions, type CommonOptions } from '../bootstrap.js';

interface StructureOptions extends CommonOptions {
  dryRun?: boolean;
  stopAt?: string;
}

/**
 * 以設定中的 tokenValues 展開目錄結構，相對路徑以 project root 為基準
 *
 * 用法：tokenpath structure task show=demo --stop-at version --dry-run
 */
export function registerStructureCommand(program: Command): void {
  withCommonOptions(
    program
      .command('structure <template> [fields...]')
      .description('Create every directory combination of the registered token values')
      .option('--dry-run', 'Only print the paths')
      .option('--stop-at <token>', 'Expand only the tokens before this one'),
  ).action((template: string, fields: string[], opts: StructureOptions) => {
    const project = openProject(opts);
    const { resolver } = project;
    const context = resolver.shape.create(parseAssignments(fields, resolver.shape));
    const dryRun = opts.dryRun ?? false;

    const paths = resolver.createStructure(template, context, {
      dryRun,
      stopAtToken: opts.stopAt,
    });

    print(project, { template, dryRun, count: paths.length, paths });
  });
}
