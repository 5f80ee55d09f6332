/**
 * Lifecycle of the single WebSocket owned by a transport session.
 * `failed` is terminal and reachable from every non-terminal state.
 */
export enum TransportState {
  Unconnected = 'unconnected',
  Connecting = 'connecting',
  Open = 'open',
  Closing = 'closing',
  Closed = 'closed',
  Failed = 'failed',
}

export type CloseInitiator = 'local' | 'remote';

export interface TransportStateChange {
  from: TransportState;
  to: TransportState;
}
