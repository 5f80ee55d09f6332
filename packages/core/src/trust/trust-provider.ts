import type { KeyMaterial, TrustMaterial, TrustProviderKind } from '@local-relay/models';
import { SessionError } from '../errors/index.js';

/**
 * Supplies key and trust material for the relay TLS handshake.
 *
 * Implementations are pure: no I/O, no state changes. `undefined` means
 * "absent" and is distinct from present-but-empty material.
 * @public
 */
export interface TrustProvider {
  readonly kind: TrustProviderKind;
  keyMaterial(): KeyMaterial | undefined;
  trustMaterial(): TrustMaterial | undefined;
}

/**
 * Accepts any relay certificate and presents no client certificate.
 *
 * This is the explicit trust-all variant for local debugging. Never use it
 * against an untrusted network.
 * @public
 */
export class AllTrustProvider implements TrustProvider {
  public readonly kind = 'trust-all' as const;

  public keyMaterial(): undefined {
    return undefined;
  }

  public trustMaterial(): undefined {
    return undefined;
  }
}

/**
 * Returns the material it was constructed with.
 *
 * Without trust material the system certificate store verifies the relay.
 * At least one kind of material is required: "both absent" is reserved for
 * {@link AllTrustProvider}.
 * @public
 */
export class FixedTrustProvider implements TrustProvider {
  public readonly kind = 'fixed' as const;

  public constructor(
    private readonly key?: KeyMaterial,
    private readonly trust?: TrustMaterial,
  ) {
    if (!key && !trust) {
      throw SessionError.invalidConfig(
        'fixed trust provider needs key material, trust material or both',
      );
    }
  }

  public keyMaterial(): KeyMaterial | undefined {
    return this.key;
  }

  public trustMaterial(): TrustMaterial | undefined {
    return this.trust;
  }
}
