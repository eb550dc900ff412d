export enum Role {
  HOST = 'HOST',
  CLIENT = 'CLIENT',
}

export enum SessionState {
  DISCONNECTED = 'DISCONNECTED',
  CONNECTING = 'CONNECTING',
  HANDSHAKING = 'HANDSHAKING',
  ESTABLISHED = 'ESTABLISHED',
  DEGRADED = 'DEGRADED',
  RECONNECTING = 'RECONNECTING',
  CLOSED = 'CLOSED',
}

/**
 * Session lifecycle:
 *
 *   DISCONNECTED -> CONNECTING -> HANDSHAKING -> ESTABLISHED <-> DEGRADED
 *                       ^                          |              |
 *                       +------- RECONNECTING <----+--------------+
 *
 * Any live state may fall back to DISCONNECTED (fatal error) or CLOSED.
 */
const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  [SessionState.DISCONNECTED]: [SessionState.CONNECTING, SessionState.CLOSED],
  [SessionState.CONNECTING]: [
    SessionState.HANDSHAKING,
    SessionState.RECONNECTING,
    SessionState.DISCONNECTED,
    SessionState.CLOSED,
  ],
  [SessionState.HANDSHAKING]: [
    SessionState.ESTABLISHED,
    SessionState.RECONNECTING,
    SessionState.DISCONNECTED,
    SessionState.CLOSED,
  ],
  [SessionState.ESTABLISHED]: [
    SessionState.DEGRADED,
    SessionState.RECONNECTING,
    SessionState.DISCONNECTED,
    SessionState.CLOSED,
  ],
  [SessionState.DEGRADED]: [
    SessionState.ESTABLISHED,
    SessionState.RECONNECTING,
    SessionState.DISCONNECTED,
    SessionState.CLOSED,
  ],
  [SessionState.RECONNECTING]: [
    SessionState.CONNECTING,
    SessionState.DISCONNECTED,
    SessionState.CLOSED,
  ],
  [SessionState.CLOSED]: [],
};

export function isTransitionAllowed(from: SessionState, to: SessionState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * States in which application data may be written
 */
export function isOpenState(state: SessionState): boolean {
  return state === SessionState.ESTABLISHED || state === SessionState.DEGRADED;
}
