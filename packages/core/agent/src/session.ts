/**
 * Session state machine
 *
 * disconnected → connecting → connected → reconnecting → connecting ...
 * Any state may move to closed; closed is terminal.
 */

import { InvalidStateError } from '@brokerline/types';

export type SessionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting' | 'closed';

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  disconnected: ['connecting', 'closed'],
  connecting: ['connected', 'reconnecting', 'closed'],
  connected: ['reconnecting', 'closed'],
  reconnecting: ['connecting', 'disconnected', 'closed'],
  closed: [],
};

export interface StateChange {
  from: SessionState;
  to: SessionState;
}

export type StateListener = (change: StateChange) => void;

/**
 * The logical agent connection. One per running agent; only the
 * connection manager moves it between states.
 */
export class Session {
  /** Epoch milliseconds of the last successful handshake */
  lastConnectAt: number | null = null;
  /** Consecutive failed or pending reconnect attempts; reset on connect */
  backoffAttempt = 0;

  private current: SessionState = 'disconnected';
  private readonly listeners = new Set<StateListener>();

  constructor(readonly clientId: string) {}

  get state(): SessionState {
    return this.current;
  }

  isConnected(): boolean {
    return this.current === 'connected';
  }

  isClosed(): boolean {
    return this.current === 'closed';
  }

  canTransition(to: SessionState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  /**
   * Move to a new state
   *
   * @throws InvalidStateError when the transition is not allowed
   */
  transition(to: SessionState): void {
    const from = this.current;
    if (!this.canTransition(to)) {
      throw new InvalidStateError(`Illegal session transition ${from} → ${to}`, {
        component: 'connection',
        details: { from, to, clientId: this.clientId },
      });
    }

    this.current = to;
    if (to === 'connected') {
      this.lastConnectAt = Date.now();
      this.backoffAttempt = 0;
    }

    for (const listener of [...this.listeners]) {
      listener({ from, to });
    }
  }

  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
