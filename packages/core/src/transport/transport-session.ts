/**
 * Transport Session
 *
 * Owns exactly one WebSocket connection to the debugging relay: builds the TLS
 * options from the trust provider, performs the opening handshake, and exposes
 * send/close primitives. Connection events are routed to a single handler.
 *
 * Key features:
 * - `connect()` settles only after the handshake succeeded or failed
 * - Handshake errors surface through the rejected promise, never through `onError`
 * - Abnormal closure (1006) after opening counts as a transport error
 * - Idempotent `close()`
 * - Ping heartbeat while open
 * @public
 */

import WebSocket from 'ws';
import type { CloseInitiator, TransportStateChange } from '@local-relay/models';
import { TransportState } from '@local-relay/models';
import { SessionError, toError } from '../errors/index.js';
import { componentLogger, type Logger } from '../logging/index.js';
import { AllTrustProvider, type TrustProvider } from '../trust/index.js';
import { buildTlsOptions, isTrustAll } from './tls-options.js';
import { isUnencryptedRemote, normalizeRelayUrl } from './relay-url.js';

const ABNORMAL_CLOSURE = 1006;

/**
 * Receives connection events. Calls arrive on the socket's event stream, one
 * at a time. `onOpen` fires before `connect()` resolves.
 * @public
 */
export interface TransportSessionHandler {
  /** Fired exactly once, after a successful handshake */
  onOpen(): void;
  onMessage(data: WebSocket.RawData, isBinary: boolean): void;
  onClose(code: number, reason: string, initiator: CloseInitiator): void;
  /** Fatal error after the connection opened */
  onError(error: SessionError): void;
  onStateChange?(change: TransportStateChange): void;
}

/**
 * Configuration for a transport session.
 * @public
 */
export interface TransportSessionOptions {
  url: string;
  headers?: Readonly<Record<string, string>>;
  /** Defaults to {@link AllTrustProvider} */
  trustProvider?: TrustProvider;
  /** Opening handshake timeout in milliseconds (default: 30000) */
  handshakeTimeoutMs?: number;
  /** Ping interval in milliseconds, 0 disables (default: 30000) */
  pingIntervalMs?: number;
  logger?: Logger;
}

interface PendingHandshake {
  resolve: () => void;
  reject: (error: SessionError) => void;
}

/**
 * One encrypted WebSocket connection, used once.
 * @public
 */
export class TransportSession {
  public readonly url: string;

  private readonly headers: Readonly<Record<string, string>>;
  private readonly trustProvider: TrustProvider;
  private readonly handshakeTimeoutMs: number;
  private readonly pingIntervalMs: number;
  private readonly logger: Logger;

  private ws: WebSocket | null = null;
  private state: TransportState = TransportState.Unconnected;
  private pendingHandshake: PendingHandshake | null = null;
  private closeInitiator: CloseInitiator | null = null;
  private closePromise: Promise<void> | null = null;
  private resolveClosed: (() => void) | null = null;
  private pingTimer: NodeJS.Timeout | null = null;

  public constructor(
    options: TransportSessionOptions,
    private readonly handler: TransportSessionHandler,
  ) {
    const url = normalizeRelayUrl(options.url);
    this.url = url.toString();
    this.headers = options.headers ?? {};
    this.trustProvider = options.trustProvider ?? new AllTrustProvider();
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? 30000;
    this.pingIntervalMs = options.pingIntervalMs ?? 30000;
    this.logger = componentLogger('transport', options.logger);

    if (isUnencryptedRemote(url)) {
      this.logger.warn({ url: this.url }, 'relay URL is not encrypted');
    }
  }

  public getState(): TransportState {
    return this.state;
  }

  /**
   * Opens the connection and waits for the handshake.
   * @param signal - Aborting it while the handshake is pending interrupts the attempt
   * @throws {SessionError} HANDSHAKE_FAILED when the relay or TLS rejects the connection
   * @throws {SessionError} INTERRUPTED_CONNECT when the signal fires or `close()` is called first
   * @throws {SessionError} INVALID_STATE when called more than once
   */
  public async connect(signal?: AbortSignal): Promise<void> {
    if (this.state !== TransportState.Unconnected) {
      throw SessionError.invalidState(`cannot connect while ${this.state}`);
    }
    if (signal?.aborted) {
      this.transition(TransportState.Failed);
      throw SessionError.interruptedConnect(toError(signal.reason));
    }

    const tlsOptions = buildTlsOptions(this.trustProvider);
    if (isTrustAll(tlsOptions)) {
      this.logger.warn(
        { url: this.url },
        'trust-all mode: relay certificate is not verified, use only for local debugging',
      );
    }

    this.transition(TransportState.Connecting);
    this.logger.info(
      { url: this.url, headers: this.headers, trust: this.trustProvider.kind },
      'connecting to relay',
    );

    const handshake = new Promise<void>((resolve, reject) => {
      this.pendingHandshake = { resolve, reject };
    });

    const onAbort = (): void => {
      this.failHandshake(SessionError.interruptedConnect(toError(signal?.reason)));
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const ws = new WebSocket(this.url, {
        ...tlsOptions,
        headers: { ...this.headers },
        handshakeTimeout: this.handshakeTimeoutMs,
      });
      this.ws = ws;
      this.setupWebSocketListeners(ws);
    } catch (error) {
      const cause = toError(error);
      this.failHandshake(SessionError.handshakeFailure(cause.message, cause));
    }

    try {
      await handshake;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Writes one text frame.
   * @throws {SessionError} INVALID_STATE outside the open state
   */
  public send(payload: string): void {
    const ws = this.ws;
    if (this.state !== TransportState.Open || !ws) {
      throw SessionError.invalidState(`cannot send while ${this.state}`);
    }

    ws.send(payload, (error) => {
      if (error) {
        this.handleWebSocketError(error);
      }
    });
  }

  /**
   * Starts the closing handshake and resolves once the socket is closed.
   * Repeated calls return the first call's promise.
   */
  public close(code = 1000, reason = 'Session closed'): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }

    switch (this.state) {
      case TransportState.Unconnected:
        this.transition(TransportState.Closed);
        this.closePromise = Promise.resolve();
        break;
      case TransportState.Connecting:
        this.failHandshake(SessionError.interruptedConnect());
        this.closePromise = Promise.resolve();
        break;
      case TransportState.Open:
        this.closeInitiator = 'local';
        this.closePromise = new Promise<void>((resolve) => {
          this.resolveClosed = resolve;
        });
        this.transition(TransportState.Closing);
        this.ws?.close(code, reason);
        break;
      default:
        this.closePromise = Promise.resolve();
    }

    return this.closePromise;
  }

  /**
   * Drops the connection without a closing handshake. Used after fatal errors.
   */
  public terminate(): void {
    if (this.state === TransportState.Closed || this.state === TransportState.Failed) {
      return;
    }
    if (this.state === TransportState.Connecting) {
      this.failHandshake(SessionError.interruptedConnect());
      return;
    }
    this.transition(TransportState.Failed);
    this.ws?.terminate();
    this.settleClosed();
  }

  private setupWebSocketListeners(ws: WebSocket): void {
    ws.on('open', () => this.handleWebSocketOpen());
    ws.on('message', (data: WebSocket.RawData, isBinary: boolean) =>
      this.handleWebSocketMessage(data, isBinary),
    );
    ws.on('close', (code: number, reason: Buffer) => this.handleWebSocketClose(code, reason));
    ws.on('error', (error: Error) => this.handleWebSocketError(error));
  }

  private handleWebSocketOpen(): void {
    const pending = this.pendingHandshake;
    if (this.state !== TransportState.Connecting || !pending) {
      return;
    }
    this.pendingHandshake = null;
    this.logger.info({ url: this.url }, 'handshake completed');
    // ws can emit 'message' synchronously after 'open'
    this.transition(TransportState.Open);
    this.startPingTimer();
    this.handler.onOpen();
    pending.resolve();
  }

  private handleWebSocketMessage(data: WebSocket.RawData, isBinary: boolean): void {
    if (this.state !== TransportState.Open) {
      this.logger.debug({ state: this.state }, 'ignoring frame outside open state');
      return;
    }
    this.handler.onMessage(data, isBinary);
  }

  private handleWebSocketClose(code: number, reason: Buffer): void {
    const reasonText = reason.toString('utf8');

    switch (this.state) {
      case TransportState.Connecting:
        this.failHandshake(
          SessionError.handshakeFailure(`connection closed with code ${code}: ${reasonText}`),
        );
        return;
      case TransportState.Open:
      case TransportState.Closing: {
        this.settleClosed();
        if (code === ABNORMAL_CLOSURE && this.closeInitiator !== 'local') {
          this.transition(TransportState.Failed);
          this.handler.onError(
            SessionError.transportError(`connection closed abnormally (${code})`),
          );
          return;
        }
        const initiator = this.closeInitiator ?? 'remote';
        this.transition(TransportState.Closed);
        this.logger.info({ code, reason: reasonText, initiator }, 'connection closed');
        this.handler.onClose(code, reasonText, initiator);
        return;
      }
      default:
        this.settleClosed();
    }
  }

  private handleWebSocketError(error: Error): void {
    switch (this.state) {
      case TransportState.Connecting:
        this.failHandshake(SessionError.handshakeFailure(error.message, error));
        return;
      case TransportState.Open:
      case TransportState.Closing:
        this.logger.error({ err: error }, 'transport error');
        this.transition(TransportState.Failed);
        this.ws?.terminate();
        this.settleClosed();
        this.handler.onError(SessionError.transportError(error.message, error));
        return;
      default:
        this.logger.debug({ err: error, state: this.state }, 'ignoring late socket error');
    }
  }

  private failHandshake(error: SessionError): void {
    const pending = this.pendingHandshake;
    if (!pending) {
      return;
    }
    this.pendingHandshake = null;
    this.logger.error({ err: error, url: this.url }, 'handshake failed');
    this.transition(TransportState.Failed);
    this.ws?.terminate();
    pending.reject(error);
  }

  private settleClosed(): void {
    this.resolveClosed?.();
    this.resolveClosed = null;
  }

  private transition(to: TransportState): void {
    const from = this.state;
    if (from === to) {
      return;
    }
    this.state = to;
    if (to !== TransportState.Open) {
      this.stopPingTimer();
    }
    this.logger.debug({ from, to }, 'transport state changed');
    this.handler.onStateChange?.({ from, to });
  }

  private startPingTimer(): void {
    if (this.pingIntervalMs <= 0) {
      return;
    }
    this.pingTimer = setInterval(() => {
      if (this.state === TransportState.Open) {
        this.ws?.ping();
      }
    }, this.pingIntervalMs);
  }

  private stopPingTimer(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }
}
