/**
 * Options for `${VAR}` interpolation in configuration values
 */
export interface EnvVarPatternResolverConfig {
  /** Maximum depth for nested variable resolution */
  maxDepth?: number;
  /** Throw on missing variables that have no default */
  strict?: boolean;
  /** Variable source, `process.env` when omitted */
  envSource?: Record<string, string | undefined>;
}
