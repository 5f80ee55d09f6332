import { z } from 'zod';
import { SessionConfigSchema, type SessionConfig } from '@local-relay/schemas';
import { EnvVarPatternResolver } from '../env/index.js';
import { SessionError } from '../errors/index.js';

// URL is validated again once `${VAR}` references are expanded
const UnresolvedSessionConfigSchema = SessionConfigSchema.extend({
  url: z.string(),
});

export interface LoadSessionConfigOptions {
  /** Variable source for `${VAR}` references, `process.env` when omitted */
  env?: Record<string, string | undefined>;
}

/**
 * Validates a raw configuration object and returns a frozen session config.
 *
 * `${VAR}` and `${VAR:default}` references in `url` and header values are
 * expanded before the URL is checked.
 * @param raw - Parsed JSON or an object literal
 * @param options - Environment source override
 * @throws {SessionError} INVALID_CONFIG when validation fails
 * @throws {EnvironmentResolutionError} When a referenced variable is missing
 * @public
 */
export function loadSessionConfig(
  raw: unknown,
  options: LoadSessionConfigOptions = {},
): Readonly<SessionConfig> {
  const unresolved = UnresolvedSessionConfigSchema.safeParse(raw);
  if (!unresolved.success) {
    throw SessionError.invalidConfig(formatIssues(unresolved.error), unresolved.error);
  }

  const resolver = new EnvVarPatternResolver({ envSource: options.env });
  const candidate = {
    ...unresolved.data,
    url: resolver.resolve(unresolved.data.url),
    headers: resolver.resolveRecord(unresolved.data.headers),
  };

  const parsed = SessionConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw SessionError.invalidConfig(formatIssues(parsed.error), parsed.error);
  }

  return Object.freeze({
    ...parsed.data,
    headers: Object.freeze({ ...parsed.data.headers }),
    trust: Object.freeze({ ...parsed.data.trust }),
  });
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
