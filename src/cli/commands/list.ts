import type { Command } from 'commander';
import { openProject, print, withCommonOptions, type CommonOptions } from '../bootstrap.js';

/**
 * 列出已註冊的 template
 *
 * 用法：tokenpath list
 */
export function registerListCommand(program: Command): void {
  withCommonOptions(
    program
      .command('list')
      .description('List registered templates and the context fields'),
  ).action((opts: CommonOptions) => {
    const project = openProject(opts);
    const { resolver } = project;

    print(project, {
      context: { name: resolver.shape.name, fields: [...resolver.shape.fields] },
      templates: resolver.templateNames.map((name) => {
        const template = resolver.getTemplate(name);
        return { name, pattern: template.pattern, tokens: template.tokenNames };
      }),
    });
  });
}
