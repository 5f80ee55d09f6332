import type { EnvVarPatternResolverConfig } from '@local-relay/models';

// ${NAME} or ${NAME:fallback}
const PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::([^}]*))?\}/gi;
const VARIABLE_NAME = /^[A-Z_][A-Z0-9_]*$/;

/**
 * Raised when a `${VAR}` reference in the session configuration cannot be resolved.
 * @public
 */
export class EnvironmentResolutionError extends Error {
  public constructor(
    message: string,
    public readonly variable?: string,
  ) {
    super(message);
    this.name = 'EnvironmentResolutionError';
    Object.setPrototypeOf(this, EnvironmentResolutionError.prototype);
  }

  public static missingVariable(variable: string): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Required environment variable '${variable}' is not defined`,
      variable,
    );
  }

  public static circularReference(variable: string): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Circular reference detected in environment variable '${variable}'`,
      variable,
    );
  }

  public static maxDepthExceeded(depth: number): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Maximum resolution depth of ${depth} exceeded`,
    );
  }

  public static invalidPattern(pattern: string): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Invalid environment variable pattern: ${pattern}`,
    );
  }
}

/**
 * Expands `${VAR}` and `${VAR:default}` references, recursively.
 *
 * Used for relay URLs and header values, which typically embed an access token
 * kept out of the config file.
 * @example
 * ```typescript
 * const resolver = new EnvVarPatternResolver({ envSource: { RELAY_TOKEN: 'abc' } });
 * resolver.resolve('Bearer ${RELAY_TOKEN}'); // 'Bearer abc'
 * ```
 * @public
 */
export class EnvVarPatternResolver {
  private readonly maxDepth: number;
  private readonly strict: boolean;
  private readonly envSource: Record<string, string | undefined>;

  public constructor(config: EnvVarPatternResolverConfig = {}) {
    this.maxDepth = config.maxDepth ?? 10;
    this.strict = config.strict ?? true;
    this.envSource = config.envSource ?? process.env;
  }

  /**
   * @throws {EnvironmentResolutionError} On a missing strict variable, a cycle, or excessive nesting
   */
  public resolve(
    value: string,
    visiting: ReadonlySet<string> = new Set(),
    depth = 0,
  ): string {
    if (depth > this.maxDepth) {
      throw EnvironmentResolutionError.maxDepthExceeded(this.maxDepth);
    }

    return value.replace(
      PATTERN,
      (match: string, name: string, fallback: string | undefined) => {
        if (!VARIABLE_NAME.test(name)) {
          throw EnvironmentResolutionError.invalidPattern(match);
        }
        if (visiting.has(name)) {
          throw EnvironmentResolutionError.circularReference(name);
        }

        const next = new Set(visiting).add(name);
        const envValue = this.envSource[name];
        if (envValue !== undefined) {
          return this.resolve(envValue, next, depth + 1);
        }
        if (fallback !== undefined) {
          return this.resolve(fallback, next, depth + 1);
        }
        if (this.strict) {
          throw EnvironmentResolutionError.missingVariable(name);
        }
        return match;
      },
    );
  }

  /**
   * Resolves every value of a string record, keeping its keys.
   */
  public resolveRecord(record: Record<string, string>): Record<string, string> {
    return Object.fromEntries(
      Object.entries(record).map(([key, value]) => [key, this.resolve(value)]),
    );
  }

  public static containsPattern(value: string): boolean {
    return /\$\{[A-Z_][A-Z0-9_]*(?::[^}]*)?\}/i.test(value);
  }
}
