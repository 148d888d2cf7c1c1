import type { Command } from 'commander';
import { parseAssignments, parseList } from '../args.js';
import { openProject, print, withCommonOptions, type CommonOptions } from '../bootstrap.js';

/**
 * 註冊 resolve 與 resolve-any 指令
 *
 * 用法：
 *   tokenpath resolve <template> show=demo seq=10
 *   tokenpath resolve-any show=demo --prefer shot,seq
 */
export function registerResolveCommands(program: Command): void {
  withCommonOptions(
    program
      .command('resolve <template> [fields...]')
      .description('Format a template with key=value fields'),
  ).action((template: string, fields: string[], opts: CommonOptions) => {
    const project = openProject(opts);
    const { resolver } = project;
    const context = resolver.shape.create(parseAssignments(fields, resolver.shape));

    print(project, { template, path: resolver.resolve(template, context) });
  });

  withCommonOptions(
    program
      .command('resolve-any [fields...]')
      .description('Format the first template the fields satisfy')
      .option('--prefer <names>', 'Comma-separated template names to try, in order'),
  ).action((fields: string[], opts: CommonOptions & { prefer?: string }) => {
    const project = openProject(opts);
    const { resolver } = project;
    const context = resolver.shape.create(parseAssignments(fields, resolver.shape));
    const prefer = opts.prefer ? parseList(opts.prefer) : [];

    print(project, {
      path: resolver.resolveAny(context, prefer),
      matches: resolver.findMatches(context),
    });
  });
}
