import { Option, type Command } from 'commander';
import path from 'node:path';
import type { PathResolver } from '../application/PathResolver.js';
import { createResolverFromConfig } from '../application/ResolverFactory.js';
import { loadConfig, type TokenPathConfig } from '../config/ConfigLoader.js';
import type { FileSystemPort } from '../domain/ports/FileSystemPort.js';
import { NodeFileSystemAdapter } from '../infrastructure/filesystem/NodeFileSystemAdapter.js';
import { Logger } from '../shared/Logger.js';
import { OUTPUT_FORMATS, OutputFormatter, type OutputFormat } from './formatters/OutputFormatter.js';

export interface CommonOptions {
  projectRoot: string;
  format: OutputFormat;
}

export interface Project {
  root: string;
  config: TokenPathConfig;
  fileSystem: FileSystemPort;
  resolver: PathResolver<string>;
  formatter: OutputFormatter;
}

/** 每個指令共用的 --project-root 與 --format */
export function withCommonOptions(command: Command): Command {
  return command
    .option('--project-root <path>', 'Project root containing .tokenpath.json', '.')
    .addOption(
      new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS).default('text'),
    );
}

/** 相對路徑以 project root 為基準，而非目前工作目錄 */
class ProjectFileSystem implements FileSystemPort {
  constructor(
    private readonly root: string,
    private readonly inner: FileSystemPort,
  ) {}

  walk(dir: string): Iterable<string> {
    return this.inner.walk(path.resolve(this.root, dir));
  }

  ensureDirectory(dirPath: string): void {
    this.inner.ensureDirectory(path.resolve(this.root, dirPath));
  }

  readFile(filePath: string): string {
    return this.inner.readFile(path.resolve(this.root, filePath));
  }

  fileExists(filePath: string): boolean {
    return this.inner.fileExists(path.resolve(this.root, filePath));
  }
}

export function openProject(opts: CommonOptions): Project {
  const root = path.resolve(opts.projectRoot);
  const config = loadConfig(root);
  const logger = new Logger('PathResolver', config.logLevel);
  const fileSystem = new ProjectFileSystem(root, new NodeFileSystemAdapter(logger.child('NodeFileSystemAdapter')));
  return {
    root,
    config,
    fileSystem,
    resolver: createResolverFromConfig(config, { fileSystem, logger }),
    formatter: new OutputFormatter(opts.format),
  };
}

export function print(project: Project, data: unknown): void {
  process.stdout.write(project.formatter.formatObject(data) + '\n');
}
