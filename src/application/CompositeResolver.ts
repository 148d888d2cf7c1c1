import type { ContextShape, PathContext } from '../domain/entities/PathContext.js';
import type { PathTemplate, TemplateValidation } from '../domain/entities/PathTemplate.js';
import { UnregisteredContextShapeError } from '../domain/errors/DomainErrors.js';
import type { FileSystemPort } from '../domain/ports/FileSystemPort.js';
import type { NormalizerMap } from '../domain/value-objects/TokenFormatter.js';
import { Logger } from '../shared/Logger.js';
import { PathResolver, type CreateStructureOptions } from './PathResolver.js';

export interface CompositeResolverOptions {
  variables?: Readonly<Record<string, string>>;
  normalizers?: NormalizerMap;
  fileSystem?: FileSystemPort;
  logger?: Logger;
}

function isResolverFor<F extends string>(
  resolver: PathResolver<string>,
  shape: ContextShape<F>,
): resolver is PathResolver<F> {
  return resolver.shape === shape;
}

/**
 * 依 context shape 路由到各自的 PathResolver
 *
 * 每個 shape 有獨立的 template 命名空間；variables、normalizers 等設定共用。
 */
export class CompositeResolver {
  private readonly resolvers: PathResolver<string>[] = [];
  private readonly logger: Logger;

  constructor(private readonly options: CompositeResolverOptions = {}) {
    this.logger = options.logger ?? new Logger('CompositeResolver', 'warn');
  }

  /** 已註冊的 shape，依首次註冊順序 */
  get shapes(): ContextShape<string>[] {
    return this.resolvers.map((r) => r.shape);
  }

  hasResolverFor(shape: ContextShape<string>): boolean {
    return this.resolvers.some((r) => r.shape === shape);
  }

  register<F extends string>(shape: ContextShape<F>, name: string, pattern: string, base?: string): PathTemplate {
    let resolver = this.find(shape);
    if (!resolver) {
      resolver = new PathResolver(shape, {
        variables: this.options.variables,
        normalizers: this.options.normalizers,
        fileSystem: this.options.fileSystem,
        logger: this.logger.child(`PathResolver:${shape.name}`),
      });
      this.resolvers.push(resolver);
    }
    return resolver.register(name, pattern, base);
  }

  resolve<F extends string>(name: string, context: PathContext<F>): string {
    return this.getResolverFor(context.shape).resolve(name, context);
  }

  resolveAny<F extends string>(context: PathContext<F>, prefer: readonly string[] = []): string | null {
    return this.getResolverFor(context.shape).resolveAny(context, prefer);
  }

  findMatches<F extends string>(context: PathContext<F>): string[] {
    return this.getResolverFor(context.shape).findMatches(context);
  }

  validate<F extends string>(name: string, context: PathContext<F>): TemplateValidation {
    return this.getResolverFor(context.shape).validate(name, context);
  }

  parsePath<F extends string>(shape: ContextShape<F>, filePath: string): PathContext<F> | null {
    return this.getResolverFor(shape).parsePath(filePath);
  }

  createStructure<F extends string>(
    name: string,
    context: PathContext<F>,
    options: CreateStructureOptions = {},
  ): string[] {
    return this.getResolverFor(context.shape).createStructure(name, context, options);
  }

  getResolverFor<F extends string>(shape: ContextShape<F>): PathResolver<F> {
    const resolver = this.find(shape);
    if (!resolver) throw new UnregisteredContextShapeError(shape.name);
    return resolver;
  }

  private find<F extends string>(shape: ContextShape<F>): PathResolver<F> | undefined {
    for (const resolver of this.resolvers) {
      if (isResolverFor(resolver, shape)) return resolver;
    }
    return undefined;
  }
}
