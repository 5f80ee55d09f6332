import { DebugSession, type DebugSessionOptions } from './debug-session.js';
import type { ClosedSessionOutcome } from './session-types.js';

export interface RunDebugSessionOptions extends DebugSessionOptions {
  /** Aborting it closes the session, or interrupts the handshake */
  signal?: AbortSignal;
  /** Called with the session before it connects, to attach listeners */
  onSession?: (session: DebugSession) => void;
}

/**
 * Runs one debug session to completion.
 * @returns The closed outcome
 * @throws {SessionError} The terminal error when the session failed
 * @public
 */
export async function runDebugSession(
  options: RunDebugSessionOptions,
): Promise<ClosedSessionOutcome> {
  const { signal, onSession, ...sessionOptions } = options;
  const session = new DebugSession(sessionOptions);
  onSession?.(session);

  const onAbort = (): void => {
    void session.close();
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    await session.start(signal);
    const outcome = await session.done;
    if (outcome.status === 'failed') {
      throw outcome.error;
    }
    return outcome;
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }
}
