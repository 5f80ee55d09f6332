import type { z } from 'zod';
import type { SessionConfigSchema } from './config/index.js';
import type { RequestEnvelopeWireSchema, ResponseEnvelopeSchema } from './envelope/index.js';

export * from './config/index.js';
export * from './envelope/index.js';

export type SessionConfig = z.infer<typeof SessionConfigSchema>;
export type RequestEnvelopeWire = z.infer<typeof RequestEnvelopeWireSchema>;
export type ResponseEnvelopeWire = z.infer<typeof ResponseEnvelopeSchema>;
