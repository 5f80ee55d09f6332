import type { CloseInitiator, EnvelopeType, SessionStateChange } from '@local-relay/models';
import type { SessionError } from '../errors/index.js';

export interface ClosedSessionOutcome {
  status: 'closed';
  code: number;
  reason: string;
  initiator: CloseInitiator;
}

export interface FailedSessionOutcome {
  status: 'failed';
  error: SessionError;
}

/**
 * How a debug session ended. Produced exactly once.
 */
export type SessionOutcome = ClosedSessionOutcome | FailedSessionOutcome;

export interface SessionOpenedEvent {
  sessionId: string;
  url: string;
  expiresAt: Date;
}

export interface ResponseSentEvent {
  requestId: string;
  type: EnvelopeType;
}

export interface FrameDroppedEvent {
  error: SessionError;
}

// Event-driven session events with Emittery
export interface DebugSessionEvents {
  stateChange: SessionStateChange;
  open: SessionOpenedEvent;
  response: ResponseSentEvent;
  dropped: FrameDroppedEvent;
  terminated: SessionOutcome;
}
