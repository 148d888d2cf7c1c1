import type { Command } from 'commander';
import { parseAssignments } from '../args.js';
import { openProject, print, withCommonOptions, type CommonOptions } from '../bootstrap.js';

/**
 * 檢查欄位是否足以 format 指定 template；缺少時 exit code 為 1
 *
 * 用法：tokenpath validate <template> show=demo
 */
export function registerValidateCommand(program: Command): void {
  withCommonOptions(
    program
      .command('validate <template> [fields...]')
      .description('Report the tokens a template still needs'),
  ).action((template: string, fields: string[], opts: CommonOptions) => {
    const project = openProject(opts);
    const { resolver } = project;
    const context = resolver.shape.create(parseAssignments(fields, resolver.shape));
    const result = resolver.validate(template, context);

    print(project, { template, valid: result.valid, missing: result.missing });
    if (!result.valid) process.exitCode = 1;
  });
}
