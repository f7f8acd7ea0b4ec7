import {
  AnyLogContext,
  BUILTIN_LOG_CONTEXTS,
  BuiltinLogContextTable,
  FilterConfig,
  LogRecordFilter,
} from "@logging/domain";
import {
  BuiltinLogContextAmbiguousError,
  BuiltinLogContextNotFoundError,
} from "@logging/exceptions";
import { ContextMiddleware } from "@logging/presentation/context.middleware";

/**
 * LogContextRegistry - Central catalog of the active log contexts.
 *
 * Iteration follows registration order. That order fixes both the tags in
 * the generated format strings and the middleware nesting: the first
 * registered context is the outermost middleware on the way in and the
 * innermost on the way out. Contexts that depend on each other must be
 * registered accordingly.
 *
 * Filled once during bootstrap and read-only afterwards.
 */
export class LogContextRegistry {
  private readonly _contexts = new Map<string, AnyLogContext>();

  constructor(
    private readonly builtins: BuiltinLogContextTable = BUILTIN_LOG_CONTEXTS,
  ) {}

  /**
   * Build a registry holding the builtin contexts named in `logContexts`.
   */
  static fromSettings(
    settings: { logContexts: readonly string[] },
    builtins?: BuiltinLogContextTable,
  ): LogContextRegistry {
    const registry = new LogContextRegistry(builtins);
    for (const name of settings.logContexts) {
      registry.registerBuiltin(name);
    }
    return registry;
  }

  get contexts(): ReadonlyMap<string, AnyLogContext> {
    return this._contexts;
  }

  /**
   * Register a context, replacing any context already registered as `name`.
   */
  register(name: string, context: AnyLogContext): void {
    this._contexts.set(name, context);
  }

  /**
   * Register the builtin context known as `name`.
   */
  registerBuiltin(name: string): void {
    const candidates = Object.prototype.hasOwnProperty.call(this.builtins, name)
      ? this.builtins[name]
      : [];

    if (candidates.length === 0) {
      throw new BuiltinLogContextNotFoundError(name);
    }
    if (candidates.length > 1) {
      throw new BuiltinLogContextAmbiguousError(
        name,
        candidates.map((candidate) => candidate.name),
      );
    }

    const [ContextClass] = candidates;
    this.register(name, new ContextClass());
  }

  get(name: string): AnyLogContext | undefined {
    return this._contexts.get(name);
  }

  getAllFilters(): Map<string, LogRecordFilter> {
    return this.mapContexts((context) => context.createFilter());
  }

  getAllMiddlewares(): Map<string, ContextMiddleware> {
    return this.mapContexts((context) => new ContextMiddleware(context));
  }

  /**
   * Filter entries for the `filters` section of the logging config.
   */
  createFilterConfig(): Record<string, FilterConfig> {
    const filters: Record<string, FilterConfig> = {};
    for (const [name, context] of this._contexts) {
      filters[`${name}_filter`] = { factory: context.filterFactory };
    }
    return filters;
  }

  private mapContexts<V>(fn: (context: AnyLogContext) => V): Map<string, V> {
    const result = new Map<string, V>();
    for (const [name, context] of this._contexts) {
      result.set(name, fn(context));
    }
    return result;
  }
}
