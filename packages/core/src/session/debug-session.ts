import Emittery from 'emittery';
import { v4 as uuidv4 } from 'uuid';
import type WebSocket from 'ws';
import type {
  CloseInitiator,
  RequestEnvelope,
  ResponseEnvelope,
  SessionStatus,
} from '@local-relay/models';
import type { SessionConfig } from '@local-relay/schemas';
import { jsonEnvelopeCodec, type EnvelopeCodec } from '../codec/index.js';
import { InvocationDispatcher, type InvocationTargetResolver } from '../dispatch/index.js';
import { SessionError, SessionErrorCode, toError } from '../errors/index.js';
import { componentLogger, type Logger } from '../logging/index.js';
import { TransportSession } from '../transport/index.js';
import { createTrustProvider, type ReadFile, type TrustProvider } from '../trust/index.js';
import type { DebugSessionEvents, SessionOutcome } from './session-types.js';

const NORMAL_CLOSURE = 1000;

export interface DebugSessionOptions {
  config: Readonly<SessionConfig>;
  resolver: InvocationTargetResolver;
  /** Overrides the provider built from `config.trust` */
  trustProvider?: TrustProvider;
  codec?: EnvelopeCodec;
  logger?: Logger;
  /** Directory trust files are resolved against */
  baseDir?: string;
  readFile?: ReadFile;
  /** WebSocket ping interval, 0 disables (default: 30000) */
  pingIntervalMs?: number;
}

/**
 * Event controller for one debug session.
 *
 * Owns the transport session, decodes every inbound frame, hands it to the
 * invocation dispatcher and writes the response back on the same connection.
 * Frames are processed one at a time in arrival order. The session closes
 * itself once `config.sessionDurationMs` has elapsed.
 *
 * States: `idle → awaiting-handshake → active → terminated`. `done` resolves
 * with the outcome and never rejects.
 * @example
 * ```typescript
 * const session = new DebugSession({ config, resolver });
 * session.on('response', ({ requestId }) => console.log('answered', requestId));
 * await session.start();
 * const outcome = await session.done;
 * ```
 * @public
 */
export class DebugSession extends Emittery<DebugSessionEvents> {
  public readonly id: string;
  public readonly config: Readonly<SessionConfig>;
  public readonly done: Promise<SessionOutcome>;

  private readonly options: DebugSessionOptions;
  private readonly dispatcher: InvocationDispatcher;
  private readonly codec: EnvelopeCodec;
  private readonly logger: Logger;

  private status: SessionStatus = 'idle';
  private outcome: SessionOutcome | undefined;
  private transport: TransportSession | null = null;
  private sessionTimer: NodeJS.Timeout | null = null;
  private queue: Promise<void> = Promise.resolve();
  private closePromise: Promise<void> | null = null;
  private resolveDone: (outcome: SessionOutcome) => void = () => {};

  public constructor(options: DebugSessionOptions) {
    super();
    this.id = uuidv4();
    this.options = options;
    this.config = options.config;
    this.codec = options.codec ?? jsonEnvelopeCodec;
    this.logger = componentLogger('session', options.logger).child({ sessionId: this.id });
    this.dispatcher = new InvocationDispatcher({
      resolver: options.resolver,
      policy: options.config.invocationFailurePolicy,
      logger: options.logger,
    });
    this.done = new Promise<SessionOutcome>((resolve) => {
      this.resolveDone = resolve;
    });
  }

  public getStatus(): SessionStatus {
    return this.status;
  }

  public getOutcome(): SessionOutcome | undefined {
    return this.outcome;
  }

  /**
   * Connects to the relay and resolves once the session is active.
   * @param signal - Aborting it while connecting interrupts the attempt
   * @throws {SessionError} HANDSHAKE_FAILED, INTERRUPTED_CONNECT or INVALID_CONFIG; the session is then terminated
   * @throws {SessionError} INVALID_STATE when the session was already started
   */
  public async start(signal?: AbortSignal): Promise<void> {
    if (this.status !== 'idle') {
      throw SessionError.invalidState(`cannot start a session that is ${this.status}`);
    }
    this.setStatus('awaiting-handshake');

    try {
      this.transport = this.createTransport();
      await this.transport.connect(signal);
    } catch (error) {
      const failure =
        error instanceof SessionError
          ? error
          : SessionError.handshakeFailure(toError(error).message, toError(error));
      this.finish({ status: 'failed', error: failure });
      throw failure;
    }
  }

  /**
   * Ends the session with a normal closure. Closing while the handshake is
   * pending interrupts it. Repeated calls return the first call's promise.
   */
  public close(code = NORMAL_CLOSURE, reason = 'Session closed'): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }

    switch (this.status) {
      case 'idle':
        this.finish({ status: 'closed', code, reason, initiator: 'local' });
        this.closePromise = Promise.resolve();
        break;
      case 'awaiting-handshake':
        // start() observes the interrupted handshake and fails the session
        this.closePromise = this.transport ? this.transport.close(code, reason) : Promise.resolve();
        break;
      case 'active': {
        const transport = this.transport;
        this.finish({ status: 'closed', code, reason, initiator: 'local' });
        this.closePromise = transport ? transport.close(code, reason) : Promise.resolve();
        break;
      }
      default:
        this.closePromise = Promise.resolve();
    }

    return this.closePromise;
  }

  private createTransport(): TransportSession {
    const trustProvider =
      this.options.trustProvider ??
      createTrustProvider(this.config.trust, {
        baseDir: this.options.baseDir,
        readFile: this.options.readFile,
      });

    return new TransportSession(
      {
        url: this.config.url,
        headers: this.config.headers,
        trustProvider,
        handshakeTimeoutMs: this.config.handshakeTimeoutMs,
        pingIntervalMs: this.options.pingIntervalMs,
        logger: this.options.logger,
      },
      {
        onOpen: () => this.handleOpen(),
        onMessage: (data) => this.handleMessage(data),
        onClose: (code, reason, initiator) => this.handleClose(code, reason, initiator),
        onError: (error) => this.fail(error),
      },
    );
  }

  private handleOpen(): void {
    if (this.status !== 'awaiting-handshake') {
      return;
    }
    const expiresAt = new Date(Date.now() + this.config.sessionDurationMs);
    this.setStatus('active');
    this.armSessionTimer();

    this.logger.info(
      { url: this.config.url, target: this.config.target, expiresAt: expiresAt.toISOString() },
      'debug session started',
    );
    void this.emit('open', { sessionId: this.id, url: this.config.url, expiresAt });
  }

  private handleMessage(data: WebSocket.RawData): void {
    if (this.status !== 'active') {
      return;
    }
    this.queue = this.queue
      .then(() => this.processMessage(data))
      .catch((error: unknown) => {
        const cause = toError(error);
        this.fail(SessionError.transportError(`cannot answer frame: ${cause.message}`, cause));
      });
  }

  private async processMessage(data: WebSocket.RawData): Promise<void> {
    if (this.status !== 'active') {
      return;
    }

    let request: RequestEnvelope;
    try {
      request = this.codec.decode(data);
    } catch (error) {
      this.dropFrame(error);
      return;
    }

    this.logger.debug({ requestId: request.requestId }, 'request received');

    let response: ResponseEnvelope;
    try {
      response = await this.dispatcher.invoke(request, this.config.target);
    } catch (error) {
      this.fail(
        error instanceof SessionError
          ? error
          : SessionError.invocationFailure(toError(error).message, true, toError(error)),
      );
      return;
    }

    if (this.status !== 'active') {
      this.logger.debug({ requestId: request.requestId }, 'discarding response, session ended');
      return;
    }

    const text = this.codec.encode(response);
    try {
      this.transport?.send(text);
    } catch (error) {
      this.logger.warn({ err: toError(error), requestId: request.requestId }, 'response not sent');
      return;
    }

    this.logger.debug({ requestId: request.requestId, type: response.type }, 'response sent');
    void this.emit('response', { requestId: request.requestId, type: response.type });
  }

  private dropFrame(error: unknown): void {
    const failure =
      error instanceof SessionError && error.code === SessionErrorCode.MALFORMED_PAYLOAD
        ? error
        : SessionError.malformedPayload(toError(error).message, toError(error));
    this.logger.warn({ err: failure }, 'dropping malformed frame');
    void this.emit('dropped', { error: failure });
  }

  private handleClose(code: number, reason: string, initiator: CloseInitiator): void {
    if (this.status === 'terminated') {
      this.logger.debug({ code, reason }, 'closing handshake completed');
      return;
    }
    this.logger.info({ code, reason, initiator }, 'debug session closed');
    this.finish({ status: 'closed', code, reason, initiator });
  }

  private fail(error: SessionError): void {
    if (this.status === 'terminated') {
      return;
    }
    this.logger.error({ err: error }, 'debug session failed');
    this.transport?.terminate();
    this.finish({ status: 'failed', error });
  }

  private armSessionTimer(): void {
    this.sessionTimer = setTimeout(() => {
      this.sessionTimer = null;
      this.logger.info(
        { durationMs: this.config.sessionDurationMs },
        'session duration elapsed, closing',
      );
      void this.close(NORMAL_CLOSURE, 'Session duration elapsed');
    }, this.config.sessionDurationMs);
  }

  private finish(outcome: SessionOutcome): void {
    if (this.status === 'terminated') {
      return;
    }
    if (this.sessionTimer) {
      clearTimeout(this.sessionTimer);
      this.sessionTimer = null;
    }
    this.outcome = outcome;
    this.setStatus('terminated');
    void this.emit('terminated', outcome);
    this.resolveDone(outcome);
  }

  private setStatus(to: SessionStatus): void {
    const from = this.status;
    if (from === to) {
      return;
    }
    this.status = to;
    this.logger.debug({ from, to }, 'session state changed');
    void this.emit('stateChange', { from, to });
  }
}
