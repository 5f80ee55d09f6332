/**
 * Tests for the TransportSession opening handshake
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import WebSocket from 'ws';
import { TransportState } from '@local-relay/models';
import { SessionError, SessionErrorCode } from '../../../errors/index.js';
import { TransportSession } from '../../../transport/index.js';
import { FixedTrustProvider } from '../../../trust/index.js';
import {
  createRecordingHandler,
  installMockWebSocket,
  type MockWebSocket,
  type RecordedHandler,
} from './test-utils.js';

vi.mock('ws', () => {
  const mockWebSocket = vi.fn();
  return { default: mockWebSocket };
});

async function captureRejection(promise: Promise<unknown>): Promise<SessionError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof SessionError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the promise to reject');
}

describe('TransportSession connection establishment', () => {
  let sockets: ReturnType<typeof installMockWebSocket>;
  let handler: RecordedHandler;

  beforeEach(() => {
    vi.clearAllMocks();
    sockets = installMockWebSocket(WebSocket);
    handler = createRecordingHandler();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve connect only after the handshake completes', async () => {
    const transport = new TransportSession(
      {
        url: 'wss://relay.test/session',
        headers: { authorization: 'Bearer test-token' },
        handshakeTimeoutMs: 5000,
        pingIntervalMs: 0,
      },
      handler,
    );

    const connecting = transport.connect();
    expect(transport.getState()).toBe(TransportState.Connecting);
    expect(handler.opened).toBe(0);

    sockets.latest().simulateOpen();
    await connecting;

    expect(transport.getState()).toBe(TransportState.Open);
    expect(handler.opened).toBe(1);
    expect(handler.stateChanges).toEqual([
      { from: TransportState.Unconnected, to: TransportState.Connecting },
      { from: TransportState.Connecting, to: TransportState.Open },
    ]);
  });

  it('should pass URL, headers, handshake timeout and trust-all TLS options to the socket', async () => {
    const transport = new TransportSession(
      {
        url: 'wss://relay.test/session',
        headers: { authorization: 'Bearer test-token' },
        handshakeTimeoutMs: 5000,
        pingIntervalMs: 0,
      },
      handler,
    );

    const connecting = transport.connect();
    const ws: MockWebSocket = sockets.latest();
    ws.simulateOpen();
    await connecting;

    expect(ws.url).toBe('wss://relay.test/session');
    expect(ws.options).toEqual({
      minVersion: 'TLSv1.2',
      rejectUnauthorized: false,
      headers: { authorization: 'Bearer test-token' },
      handshakeTimeout: 5000,
    });
  });

  it('should convert an https relay URL to wss', () => {
    const transport = new TransportSession({ url: 'https://relay.test/x' }, handler);

    expect(transport.url).toBe('wss://relay.test/x');
  });

  it('should reject unsupported URL schemes at construction', () => {
    const create = (): TransportSession =>
      new TransportSession({ url: 'ftp://relay.test' }, handler);

    expect(create).toThrow(SessionError);
    expect(create).toThrow(
      'Invalid configuration: relay URL must use http:, https:, ws:, or wss: protocol, got ftp:',
    );
  });

  it('should configure the socket with fixed trust material', async () => {
    const provider = new FixedTrustProvider(undefined, { ca: ['test-ca'] });
    const transport = new TransportSession(
      { url: 'wss://relay.test', trustProvider: provider, pingIntervalMs: 0 },
      handler,
    );

    const connecting = transport.connect();
    const ws = sockets.latest();
    ws.simulateOpen();
    await connecting;

    expect(ws.options).toMatchObject({
      minVersion: 'TLSv1.2',
      ca: ['test-ca'],
      rejectUnauthorized: true,
    });
  });

  it('should fail the handshake on an unexpected server response', async () => {
    const transport = new TransportSession({ url: 'wss://relay.test' }, handler);

    const connecting = transport.connect();
    const ws = sockets.latest();
    ws.simulateError('Unexpected server response: 403');

    const error = await captureRejection(connecting);
    expect(error.code).toBe(SessionErrorCode.HANDSHAKE_FAILED);
    expect(error.message).toBe('Handshake failed: Unexpected server response: 403');
    expect(transport.getState()).toBe(TransportState.Failed);
    expect(ws.terminateCalls).toBe(1);

    // late events from the terminated socket are not reported
    await new Promise((resolve) => setTimeout(resolve, 5));
    expect(handler.opened).toBe(0);
    expect(handler.errors).toEqual([]);
    expect(handler.closes).toEqual([]);
  });

  it('should fail the handshake when the socket closes before opening', async () => {
    const transport = new TransportSession({ url: 'wss://relay.test' }, handler);

    const connecting = transport.connect();
    sockets.latest().simulateClose(1002, 'bad frame');

    const error = await captureRejection(connecting);
    expect(error.code).toBe(SessionErrorCode.HANDSHAKE_FAILED);
    expect(error.message).toBe('Handshake failed: connection closed with code 1002: bad frame');
  });

  it('should interrupt the attempt when the signal aborts', async () => {
    const controller = new AbortController();
    const transport = new TransportSession({ url: 'wss://relay.test' }, handler);

    const connecting = transport.connect(controller.signal);
    controller.abort();

    const error = await captureRejection(connecting);
    expect(error.code).toBe(SessionErrorCode.INTERRUPTED_CONNECT);
    expect(transport.getState()).toBe(TransportState.Failed);
    expect(handler.opened).toBe(0);
  });

  it('should not open a socket for an already aborted signal', async () => {
    const transport = new TransportSession({ url: 'wss://relay.test' }, handler);

    const error = await captureRejection(transport.connect(AbortSignal.abort()));

    expect(error.code).toBe(SessionErrorCode.INTERRUPTED_CONNECT);
    expect(sockets.all).toHaveLength(0);
  });

  it('should interrupt the attempt when closed while connecting', async () => {
    const transport = new TransportSession({ url: 'wss://relay.test' }, handler);

    const rejection = captureRejection(transport.connect());
    await transport.close();

    const error = await rejection;
    expect(error.code).toBe(SessionErrorCode.INTERRUPTED_CONNECT);
    expect(transport.getState()).toBe(TransportState.Failed);
  });

  it('should reject a second connect', async () => {
    const transport = new TransportSession({ url: 'wss://relay.test', pingIntervalMs: 0 }, handler);

    const connecting = transport.connect();
    sockets.latest().simulateOpen();
    await connecting;

    const error = await captureRejection(transport.connect());
    expect(error.code).toBe(SessionErrorCode.INVALID_STATE);
    expect(sockets.all).toHaveLength(1);
  });

  it('should ping while open', async () => {
    vi.useFakeTimers();
    const transport = new TransportSession(
      { url: 'wss://relay.test', pingIntervalMs: 1000 },
      handler,
    );

    const connecting = transport.connect();
    const ws = sockets.latest();
    ws.simulateOpen();
    await connecting;

    vi.advanceTimersByTime(3500);
    expect(ws.pings).toBe(3);

    transport.terminate();
    vi.advanceTimersByTime(3000);
    expect(ws.pings).toBe(3);
  });
});
