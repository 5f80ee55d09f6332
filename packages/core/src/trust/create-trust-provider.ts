import { readFileSync } from 'fs';
import { resolve } from 'path';
import type { KeyMaterial, TrustMaterial } from '@local-relay/models';
import type { TrustConfigZod } from '@local-relay/schemas';
import { SessionError, toError } from '../errors/index.js';
import { AllTrustProvider, FixedTrustProvider, type TrustProvider } from './trust-provider.js';

export type ReadFile = (path: string) => Buffer;

export interface CreateTrustProviderOptions {
  /** Directory relative file paths are resolved against */
  baseDir?: string;
  /** File reader, `fs.readFileSync` by default */
  readFile?: ReadFile;
}

/**
 * Builds the trust provider selected by the session configuration.
 *
 * For `fixed` mode every referenced file is read once, here; the provider
 * itself does no I/O.
 * @throws {SessionError} INVALID_CONFIG when a file cannot be read
 * @public
 */
export function createTrustProvider(
  trust: TrustConfigZod,
  options: CreateTrustProviderOptions = {},
): TrustProvider {
  if (trust.mode === 'trust-all') {
    return new AllTrustProvider();
  }

  const baseDir = options.baseDir ?? process.cwd();
  const readFile = options.readFile ?? ((path: string) => readFileSync(path));
  const load = (file: string): Buffer => {
    const path = resolve(baseDir, file);
    try {
      return readFile(path);
    } catch (error) {
      throw SessionError.invalidConfig(`cannot read ${path}`, toError(error));
    }
  };

  let key: KeyMaterial | undefined;
  if (trust.pfxFile) {
    key = { pfx: load(trust.pfxFile), passphrase: trust.passphrase };
  } else if (trust.certFile && trust.keyFile) {
    key = {
      cert: load(trust.certFile),
      key: load(trust.keyFile),
      passphrase: trust.passphrase,
    };
  }

  const trustMaterial: TrustMaterial | undefined = trust.caFiles
    ? { ca: trust.caFiles.map(load) }
    : undefined;

  return new FixedTrustProvider(key, trustMaterial);
}
