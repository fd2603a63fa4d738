import type {
  Coordinates,
  Language,
  SessionSnapshot,
  SessionState,
  TerminalState,
} from "./types.js";

export interface NewSessionParams {
  userId: string;
  destinationId: string;
  position: Coordinates;
  trackingDurationSeconds: number;
  deliveryIntervalMinutes: number;
  language: Language;
  now: number;
}

export function createSessionState(params: NewSessionParams): SessionState {
  return {
    userId: params.userId,
    destinationId: params.destinationId,
    language: params.language,
    sessionStart: params.now,
    trackingDurationMs: params.trackingDurationSeconds * 1000,
    deliveryIntervalMinutes: params.deliveryIntervalMinutes,
    position: { ...params.position },
    lastUpdateTime: params.now,
    deliveryCount: 0,
    contentHistory: [],
    terminal: null,
    deliveryTask: null,
    monitorTask: null,
  };
}

export function expiryInstant(state: SessionState): number {
  return state.sessionStart + state.trackingDurationMs;
}

export function isExpired(state: SessionState, now: number): boolean {
  return now >= expiryInstant(state);
}

export function isSilent(state: SessionState, now: number, silenceThresholdMs: number): boolean {
  return now - state.lastUpdateTime > silenceThresholdMs;
}

export function deliveryIntervalMs(state: SessionState): number {
  return state.deliveryIntervalMinutes * 60 * 1000;
}

/**
 * Claim the terminal state. Returns false if the other task already ended
 * the session, so each terminal notice is sent at most once.
 */
export function markTerminal(state: SessionState, terminal: TerminalState): boolean {
  if (state.terminal !== null) return false;
  state.terminal = terminal;
  return true;
}

/** Append `"{place}: {summary}"`, keeping only the newest `limit` entries. */
export function appendHistory(state: SessionState, place: string, summary: string, limit: number): void {
  state.contentHistory.push(`${place}: ${summary}`);
  if (state.contentHistory.length > limit) {
    state.contentHistory.splice(0, state.contentHistory.length - limit);
  }
}

/** The newest `window` history entries, oldest first. */
export function recentExclusions(state: SessionState, window: number): string[] {
  if (window <= 0) return [];
  return state.contentHistory.slice(-window);
}

/** Place names recorded in history, in insertion order. */
export function historyPlaces(state: SessionState): string[] {
  const places: string[] = [];
  for (const entry of state.contentHistory) {
    const idx = entry.indexOf(": ");
    if (idx <= 0) continue;
    const place = entry.slice(0, idx).trim();
    if (place) places.push(place);
  }
  return places;
}

export function toSnapshot(state: SessionState): SessionSnapshot {
  return {
    userId: state.userId,
    destinationId: state.destinationId,
    language: state.language,
    position: { ...state.position },
    startedAt: new Date(state.sessionStart).toISOString(),
    lastUpdateAt: new Date(state.lastUpdateTime).toISOString(),
    expiresAt: new Date(expiryInstant(state)).toISOString(),
    deliveryIntervalMinutes: state.deliveryIntervalMinutes,
    deliveryCount: state.deliveryCount,
    historySize: state.contentHistory.length,
  };
}
