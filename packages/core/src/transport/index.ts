// Transport domain re-exports - single entry point for the relay connection
export {
  TransportSession,
  type TransportSessionHandler,
  type TransportSessionOptions,
} from './transport-session.js';
export { buildTlsOptions, isTrustAll, MIN_TLS_VERSION, type RelayTlsOptions } from './tls-options.js';
export { normalizeRelayUrl, isUnencryptedRemote } from './relay-url.js';
