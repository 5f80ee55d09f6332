export { DebugSession, type DebugSessionOptions } from './debug-session.js';
export { runDebugSession, type RunDebugSessionOptions } from './run-debug-session.js';
export type {
  SessionOutcome,
  ClosedSessionOutcome,
  FailedSessionOutcome,
  DebugSessionEvents,
  SessionOpenedEvent,
  ResponseSentEvent,
  FrameDroppedEvent,
} from './session-types.js';
