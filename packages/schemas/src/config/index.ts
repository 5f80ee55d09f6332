import type { z } from 'zod';
import type { SessionConfigSchema } from './SessionConfigSchema.js';
import type {
  AllTrustConfigSchema,
  FixedTrustConfigSchema,
  TrustConfigSchema,
} from './TrustConfigSchema.js';

export {
  SessionConfigSchema,
  RelayUrlSchema,
  DEFAULT_SESSION_DURATION_MS,
  DEFAULT_HANDSHAKE_TIMEOUT_MS,
  MAX_TIMER_DELAY_MS,
} from './SessionConfigSchema.js';
export {
  TrustConfigSchema,
  AllTrustConfigSchema,
  FixedTrustConfigSchema,
} from './TrustConfigSchema.js';

export type TrustConfigZod = z.infer<typeof TrustConfigSchema>;
export type AllTrustConfigZod = z.infer<typeof AllTrustConfigSchema>;
export type FixedTrustConfigZod = z.infer<typeof FixedTrustConfigSchema>;
export type SessionConfigInput = z.input<typeof SessionConfigSchema>;
