#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { registerListCommand } from './commands/list.js';
import { registerResolveCommands } from './commands/resolve.js';
import { registerValidateCommand } from './commands/validate.js';
import { registerParseCommand } from './commands/parse.js';
import { registerStructureCommand } from './commands/structure.js';
import { registerQueryCommand } from './commands/query.js';

// 從 package.json 動態讀取版本號
const require = createRequire(import.meta.url);
const { version }: { version: string } = require('../../package.json');

const program = new Command();

program
  .name('tokenpath')
  .description('Format and parse file paths with token templates')
  .version(version);

registerListCommand(program);
registerResolveCommands(program);
registerValidateCommand(program);
registerParseCommand(program);
registerStructureCommand(program);
registerQueryCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      // commander 已自行輸出說明或錯誤訊息
      process.exit(err.exitCode);
    }
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`Error: ${message}\n`);
    process.exit(1);
  }
}

void main();
