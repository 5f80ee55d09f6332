import { resolve as resolvePath } from 'path';
import { pathToFileURL } from 'url';
import { toError } from '../errors/index.js';
import { toInvokable, type Invokable, type InvocationTargetResolver } from './invocation-target.js';

export type ModuleImporter = (specifier: string) => Promise<unknown>;

export interface ModuleTargetResolverOptions {
  /** Directory module paths are resolved against (default: process.cwd()) */
  baseDir?: string;
  /** Re-import the module for every request (default: true) */
  reload?: boolean;
  /** Module loader, dynamic `import()` by default */
  importer?: ModuleImporter;
}

export interface ModuleTargetId {
  modulePath: string;
  exportName: string;
}

const DEFAULT_EXPORT_NAME = 'handler';

/**
 * Splits `"<module path>#<export>"`; the export defaults to `handler`.
 * @throws {Error} When the module path is empty
 */
export function parseModuleTargetId(targetId: string): ModuleTargetId {
  const hash = targetId.lastIndexOf('#');
  const modulePath = hash === -1 ? targetId : targetId.slice(0, hash);
  const exportName = hash === -1 ? DEFAULT_EXPORT_NAME : targetId.slice(hash + 1);

  if (!modulePath) {
    throw new Error(`Invocation target '${targetId}' does not name a module`);
  }
  return { modulePath, exportName: exportName || DEFAULT_EXPORT_NAME };
}

/**
 * Loads invocation targets from local ES modules.
 *
 * With `reload` enabled each request imports the module under a fresh URL
 * query, so edits to the handler apply to the next request without
 * restarting the session. Old module instances stay in the loader cache
 * for the life of the process.
 * @public
 */
export class ModuleTargetResolver implements InvocationTargetResolver {
  private readonly baseDir: string;
  private readonly reload: boolean;
  private readonly importer: ModuleImporter;
  private generation = 0;

  public constructor(options: ModuleTargetResolverOptions = {}) {
    this.baseDir = options.baseDir ?? process.cwd();
    this.reload = options.reload ?? true;
    this.importer = options.importer ?? ((specifier) => import(specifier));
  }

  public async resolve(targetId: string): Promise<Invokable> {
    const { modulePath, exportName } = parseModuleTargetId(targetId);
    const url = pathToFileURL(resolvePath(this.baseDir, modulePath));
    if (this.reload) {
      url.searchParams.set('generation', String(++this.generation));
    }

    let loaded: unknown;
    try {
      loaded = await this.importer(url.href);
    } catch (error) {
      const cause = toError(error);
      throw new Error(`Cannot load invocation target module '${modulePath}': ${cause.message}`, {
        cause,
      });
    }

    const exported: unknown =
      typeof loaded === 'object' && loaded !== null ? Reflect.get(loaded, exportName) : undefined;
    if (exported === undefined) {
      throw new Error(`Module '${modulePath}' has no export '${exportName}'`);
    }
    return toInvokable(exported, targetId);
  }
}
