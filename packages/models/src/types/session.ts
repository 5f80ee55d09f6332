/**
 * Debug session controller states.
 */
export type SessionStatus = 'idle' | 'awaiting-handshake' | 'active' | 'terminated';

/**
 * How a failed invocation target is reported.
 *
 * - `respond`: answer with a failure envelope and keep serving
 * - `fatal`: end the session with the failure as terminal error
 */
export type InvocationFailurePolicy = 'respond' | 'fatal';

export interface SessionStateChange {
  from: SessionStatus;
  to: SessionStatus;
}
