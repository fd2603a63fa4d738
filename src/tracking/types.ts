// -------------------------------------------------------
// Live tracking core types
// -------------------------------------------------------

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export type Language = "en" | "ru" | "fr";

/** Terminal notices sent to a destination when a session ends. */
export type NoticeKind = "expired" | "silent" | "stopped";

/** Why a session stopped. "stopped" is an explicit stop call and is not notified by the loop. */
export type TerminalState = "expired" | "silent" | "stopped";

export interface TaskHandle {
  readonly name: string;
  readonly signal: AbortSignal;
  /** Settles (never rejects) once the task body has finished. */
  readonly done: Promise<void>;
  cancel(): void;
}

/**
 * Mutable record for one user's live session.
 *
 * Single writer per field:
 * - position / lastUpdateTime: the registry's updatePosition
 * - deliveryCount / contentHistory: the delivery loop
 * - terminal: whichever task ends the session first
 * The health monitor only reads.
 */
export interface SessionState {
  readonly userId: string;
  readonly destinationId: string;
  readonly language: Language;
  readonly sessionStart: number;
  readonly trackingDurationMs: number;
  readonly deliveryIntervalMinutes: number;
  position: Coordinates;
  lastUpdateTime: number;
  deliveryCount: number;
  contentHistory: string[];
  terminal: TerminalState | null;
  deliveryTask: TaskHandle | null;
  monitorTask: TaskHandle | null;
}

/** Read-only view of a session for callers outside the core. */
export interface SessionSnapshot {
  userId: string;
  destinationId: string;
  language: Language;
  position: Coordinates;
  startedAt: string;
  lastUpdateAt: string;
  expiresAt: string;
  deliveryIntervalMinutes: number;
  deliveryCount: number;
  historySize: number;
}

export interface StartOptions {
  language?: Language;
}

// ---- Collaborators ----

export interface ContentRequest {
  position: Coordinates;
  /** Most recent history entries, oldest first. */
  exclusions: string[];
  language: Language;
  signal: AbortSignal;
}

export interface ContentResult {
  place: string;
  summary: string;
  companionPosition?: Coordinates;
  raw: string;
}

export interface ContentGenerator {
  generate(request: ContentRequest): Promise<ContentResult>;
}

export interface Venue {
  position: Coordinates;
  title: string;
}

export interface OutgoingMessage {
  text: string;
  images?: string[];
  venue?: Venue;
}

/**
 * Outbound side of a session. Calls are bounded by `deliveryTimeoutMs`;
 * `signal` fires on timeout or cancellation so slow transports can give up.
 */
export interface DeliveryChannel {
  deliver(destinationId: string, message: OutgoingMessage, signal?: AbortSignal): Promise<void>;
  notify(destinationId: string, kind: NoticeKind, language: Language, signal?: AbortSignal): Promise<void>;
}

/** Formats the user-visible text of a delivery cycle. */
export interface MessageFormatter {
  fact(language: Language, number: number, place: string, summary: string): string;
  failure(language: Language, number: number): string;
  nearYou(language: Language): string;
}

export interface TrackerPolicy {
  silenceThresholdMs: number;
  healthPollIntervalMs: number;
  generationLatencyEstimateMs: number;
  initialWaitFloorMs: number;
  cycleFloorMs: number;
  generationTimeoutMs: number;
  deliveryTimeoutMs: number;
  historyLimit: number;
  exclusionWindow: number;
}

export const DEFAULT_TRACKER_POLICY: TrackerPolicy = {
  silenceThresholdMs: 3 * 60 * 1000,
  healthPollIntervalMs: 30 * 1000,
  generationLatencyEstimateMs: 3 * 60 * 1000,
  initialWaitFloorMs: 30 * 1000,
  cycleFloorMs: 15 * 1000,
  generationTimeoutMs: 4 * 60 * 1000,
  deliveryTimeoutMs: 30 * 1000,
  historyLimit: 10,
  exclusionWindow: 5,
};
