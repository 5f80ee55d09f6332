import { describe, it, expect } from 'vitest';
import { loadSessionConfig } from './load-session-config.js';
import { SessionError, SessionErrorCode } from '../errors/index.js';
import { EnvironmentResolutionError } from '../env/index.js';

describe('loadSessionConfig', () => {
  it('should apply defaults and freeze the result', () => {
    const config = loadSessionConfig(
      { url: 'wss://relay.example.com/debug', target: 'echo' },
      { env: {} },
    );

    expect(config).toEqual({
      url: 'wss://relay.example.com/debug',
      headers: {},
      trust: { mode: 'trust-all' },
      target: 'echo',
      sessionDurationMs: 3_600_000,
      handshakeTimeoutMs: 30_000,
      invocationFailurePolicy: 'respond',
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.headers)).toBe(true);
  });

  it('should expand environment references in url and headers', () => {
    const config = loadSessionConfig(
      {
        url: 'wss://relay.example.com/targets/${TARGET_ID}/debug',
        headers: { authorization: '${RELAY_TOKEN}' },
        target: 'echo',
      },
      { env: { TARGET_ID: 'demo', RELAY_TOKEN: 'test-token' } },
    );

    expect(config.url).toBe('wss://relay.example.com/targets/demo/debug');
    expect(config.headers).toEqual({ authorization: 'test-token' });
  });

  it('should validate the url after expansion', () => {
    expect(() =>
      loadSessionConfig(
        { url: '${RELAY_URL}', target: 'echo' },
        { env: { RELAY_URL: 'ftp://relay.example.com' } },
      ),
    ).toThrow('Invalid configuration: url: URL must use ws:, wss:, http: or https: protocol');
  });

  it('should raise INVALID_CONFIG with field paths', () => {
    let caught: unknown;
    try {
      loadSessionConfig({ url: 'wss://relay.example.com', sessionDurationMs: -1 }, { env: {} });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SessionError);
    if (caught instanceof SessionError) {
      expect(caught.code).toBe(SessionErrorCode.INVALID_CONFIG);
      expect(caught.message).toContain('target: Required');
      expect(caught.message).toContain('sessionDurationMs:');
    }
  });

  it('should reject non-object input', () => {
    expect(() => loadSessionConfig('wss://relay.example.com', { env: {} })).toThrow(
      SessionError,
    );
  });

  it('should propagate missing variable errors', () => {
    expect(() =>
      loadSessionConfig(
        {
          url: 'wss://relay.example.com',
          headers: { authorization: '${RELAY_TOKEN}' },
          target: 'echo',
        },
        { env: {} },
      ),
    ).toThrow(EnvironmentResolutionError);
  });
});
