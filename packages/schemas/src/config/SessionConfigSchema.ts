import { z } from 'zod';
import { TrustConfigSchema } from './TrustConfigSchema.js';

/** One hour, after which a debug session closes itself. */
export const DEFAULT_SESSION_DURATION_MS = 60 * 60 * 1000;
export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 30_000;
/** Longest delay setTimeout honours; larger values fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const RELAY_PROTOCOLS = new Set(['ws:', 'wss:', 'http:', 'https:']);

export const RelayUrlSchema = z.string().refine(
  (value) => {
    try {
      return RELAY_PROTOCOLS.has(new URL(value).protocol);
    } catch {
      return false;
    }
  },
  { message: 'URL must use ws:, wss:, http: or https: protocol' },
);

export const SessionConfigSchema = z.object({
  url: RelayUrlSchema,
  headers: z.record(z.string(), z.string()).default({}),
  trust: TrustConfigSchema.default({ mode: 'trust-all' }),
  // Invocation target id, resolved per request
  target: z.string().min(1),
  sessionDurationMs: z
    .number()
    .int()
    .positive()
    .max(MAX_TIMER_DELAY_MS)
    .default(DEFAULT_SESSION_DURATION_MS),
  handshakeTimeoutMs: z
    .number()
    .int()
    .positive()
    .max(MAX_TIMER_DELAY_MS)
    .default(DEFAULT_HANDSHAKE_TIMEOUT_MS),
  invocationFailurePolicy: z.enum(['respond', 'fatal']).default('respond'),
});
