/**
 * Client certificate material presented during the TLS handshake.
 * PEM strings or buffers, as accepted by `tls.connect`.
 */
export interface KeyMaterial {
  cert?: string | Buffer | Array<string | Buffer>;
  key?: string | Buffer | Array<string | Buffer>;
  pfx?: string | Buffer;
  passphrase?: string;
}

/**
 * Certificate authorities used to verify the relay.
 *
 * An empty `ca` list is still "present": it replaces the system store and
 * therefore rejects every certificate.
 */
export interface TrustMaterial {
  ca: Array<string | Buffer>;
}

export type TrustProviderKind = 'trust-all' | 'fixed';
