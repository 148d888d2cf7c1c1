import type { Command } from 'commander';
import { openProject, print, withCommonOptions, type CommonOptions } from '../bootstrap.js';

/**
 * 將路徑解析回欄位
 *
 * 用法：tokenpath parse demo/010/0100/comp/v002/demo_0100_v002.exr
 */
export function registerParseCommand(program: Command): void {
  withCommonOptions(
    program
      .command('parse <path>')
      .description('Parse a path back into context fields'),
  ).action((filePath: string, opts: CommonOptions) => {
    const project = openProject(opts);
    const context = project.resolver.parsePath(filePath);

    print(project, {
      path: filePath,
      matched: context !== null,
      context: context ? context.toJSON() : null,
    });
  });
}
