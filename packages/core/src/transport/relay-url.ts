import { SessionError, toError } from '../errors/index.js';

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]']);

/**
 * Converts http(s) relay URLs to ws(s) and rejects any other scheme.
 * @throws {SessionError} INVALID_CONFIG for unparsable URLs or unsupported schemes
 */
export function normalizeRelayUrl(value: string): URL {
  let url: URL;
  try {
    url = new URL(value);
  } catch (error) {
    throw SessionError.invalidConfig(`invalid relay URL: ${value}`, toError(error));
  }

  if (url.protocol === 'http:') {
    url.protocol = 'ws:';
  } else if (url.protocol === 'https:') {
    url.protocol = 'wss:';
  } else if (url.protocol !== 'ws:' && url.protocol !== 'wss:') {
    throw SessionError.invalidConfig(
      `relay URL must use http:, https:, ws:, or wss: protocol, got ${url.protocol}`,
    );
  }

  return url;
}

/**
 * Plain `ws:` is only expected against a relay on this machine.
 */
export function isUnencryptedRemote(url: URL): boolean {
  return url.protocol === 'ws:' && !LOOPBACK_HOSTS.has(url.hostname);
}
