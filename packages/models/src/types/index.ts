// Envelope types
export { EnvelopeTypes } from './envelope.js';
export type {
  EnvelopeType,
  RequestEnvelope,
  SuccessResponseEnvelope,
  FailureResponseEnvelope,
  ResponseEnvelope,
} from './envelope.js';

// Transport types
export { TransportState } from './transport.js';
export type { CloseInitiator, TransportStateChange } from './transport.js';

// Session types
export type { SessionStatus, InvocationFailurePolicy, SessionStateChange } from './session.js';

// Trust types
export type { KeyMaterial, TrustMaterial, TrustProviderKind } from './trust.js';

export type { EnvVarPatternResolverConfig } from './EnvVarPatternResolverConfig.js';
