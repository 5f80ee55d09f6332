import type { ClientOptions } from 'ws';
import type { TrustProvider } from '../trust/index.js';

/** Lowest protocol version the relay connection accepts. */
export const MIN_TLS_VERSION = 'TLSv1.2' as const;

export type RelayTlsOptions = Pick<
  ClientOptions,
  'minVersion' | 'rejectUnauthorized' | 'ca' | 'cert' | 'key' | 'pfx' | 'passphrase'
>;

/**
 * Maps trust provider material onto `ws` client TLS options.
 *
 * - no key and no trust material: trust-all (`rejectUnauthorized: false`)
 * - trust material present: `ca` replaces the system store, even when empty
 * - key material only: client certificate, relay verified by the system store
 * @public
 */
export function buildTlsOptions(provider: TrustProvider): RelayTlsOptions {
  const key = provider.keyMaterial();
  const trust = provider.trustMaterial();
  const options: RelayTlsOptions = { minVersion: MIN_TLS_VERSION };

  if (key?.pfx !== undefined) options.pfx = key.pfx;
  if (key?.cert !== undefined) options.cert = key.cert;
  if (key?.key !== undefined) options.key = key.key;
  if (key?.passphrase !== undefined) options.passphrase = key.passphrase;

  if (trust) {
    options.ca = trust.ca;
    options.rejectUnauthorized = true;
  } else {
    options.rejectUnauthorized = key !== undefined;
  }

  return options;
}

/**
 * Whether the options accept any relay certificate.
 */
export function isTrustAll(options: RelayTlsOptions): boolean {
  return options.rejectUnauthorized === false;
}
