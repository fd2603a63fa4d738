import { runDeliveryLoop } from "./delivery-loop.js";
import { runHealthMonitor } from "./health-monitor.js";
import { createSessionState, markTerminal, toSnapshot } from "./session-state.js";
import { cancelAndWait, spawnTask } from "./tasks.js";
import {
  DEFAULT_TRACKER_POLICY,
  type ContentGenerator,
  type Coordinates,
  type DeliveryChannel,
  type Language,
  type MessageFormatter,
  type SessionSnapshot,
  type SessionState,
  type StartOptions,
  type TrackerPolicy,
} from "./types.js";

/** Raised by start() when the session's background tasks could not be spawned. */
export class SessionStartError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SessionStartError";
  }
}

export interface SessionRegistryDeps {
  generator: ContentGenerator;
  channel: DeliveryChannel;
  formatter: MessageFormatter;
  policy?: Partial<TrackerPolicy>;
  defaultLanguage?: Language;
  /** Task spawner; replaceable so tests can simulate spawn failures. */
  spawn?: typeof spawnTask;
}

/**
 * The set of live sessions, one per user.
 *
 * Structural changes (start, stop, position writes) run one at a time through
 * a promise-chain lock. Removal by a finishing background task is a
 * synchronous, identity-checked delete and never takes the lock: stop() holds
 * the lock while it waits for those same tasks to settle.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, SessionState>();
  private readonly deps: SessionRegistryDeps;
  private readonly spawn: typeof spawnTask;
  readonly policy: TrackerPolicy;
  private lock: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(deps: SessionRegistryDeps) {
    this.deps = deps;
    this.spawn = deps.spawn ?? spawnTask;
    this.policy = { ...DEFAULT_TRACKER_POLICY, ...deps.policy };
  }

  private withLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.lock.then(fn);
    this.lock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Start a session, replacing (and fully stopping) any existing one for the
   * user. Rejects with SessionStartError only if spawning fails; nothing is
   * left registered in that case.
   */
  start(
    userId: string,
    destinationId: string,
    position: Coordinates,
    trackingDurationSeconds: number,
    deliveryIntervalMinutes: number,
    options: StartOptions = {}
  ): Promise<void> {
    return this.withLock(async () => {
      if (this.closed) {
        throw new SessionStartError(`Cannot start session for user ${userId}: tracker is shutting down`);
      }

      await this.stopLocked(userId);

      const state = createSessionState({
        userId,
        destinationId,
        position,
        trackingDurationSeconds,
        deliveryIntervalMinutes,
        language: options.language ?? this.deps.defaultLanguage ?? "en",
        now: Date.now(),
      });

      try {
        state.deliveryTask = this.spawn(`delivery:${userId}`, (signal) =>
          runDeliveryLoop(
            {
              policy: this.policy,
              generator: this.deps.generator,
              channel: this.deps.channel,
              formatter: this.deps.formatter,
              onExit: (exited) => {
                exited.monitorTask?.cancel();
                this.removeIfCurrent(exited);
              },
            },
            state,
            signal
          )
        );
        state.monitorTask = this.spawn(`monitor:${userId}`, (signal) =>
          runHealthMonitor(
            {
              policy: this.policy,
              channel: this.deps.channel,
              remove: (silent) => this.removeIfCurrent(silent),
            },
            state,
            signal
          )
        );
      } catch (err) {
        markTerminal(state, "stopped");
        await cancelAndWait(state.deliveryTask);
        await cancelAndWait(state.monitorTask);
        throw new SessionStartError(`Failed to start session for user ${userId}`, { cause: err });
      }

      this.sessions.set(userId, state);
      console.log(
        `[tracker] Started session for user ${userId}: ${trackingDurationSeconds}s, every ${deliveryIntervalMinutes} min`
      );
    });
  }

  /** Record a new position. Unknown users are ignored. */
  updatePosition(userId: string, position: Coordinates): Promise<void> {
    return this.withLock(async () => {
      const state = this.sessions.get(userId);
      if (!state) return;
      state.position = { latitude: position.latitude, longitude: position.longitude };
      state.lastUpdateTime = Date.now();
    });
  }

  /**
   * Stop a session and wait for both its tasks to settle. Resolves to the
   * stopped session's snapshot, or undefined when there was nothing to stop
   * or the session had already ended by expiry or silence.
   */
  stop(userId: string): Promise<SessionSnapshot | undefined> {
    return this.withLock(() => this.stopLocked(userId));
  }

  /** Stop every session and refuse new ones. Used on shutdown. */
  shutdown(): Promise<void> {
    return this.withLock(async () => {
      this.closed = true;
      const userIds = [...this.sessions.keys()];
      await Promise.all(userIds.map((userId) => this.stopLocked(userId)));
      console.log(`[tracker] Shut down, stopped ${userIds.length} session(s)`);
    });
  }

  isTracking(userId: string): boolean {
    return this.sessions.has(userId);
  }

  activeCount(): number {
    return this.sessions.size;
  }

  snapshot(userId: string): SessionSnapshot | undefined {
    const state = this.sessions.get(userId);
    return state ? toSnapshot(state) : undefined;
  }

  private async stopLocked(userId: string): Promise<SessionSnapshot | undefined> {
    const state = this.sessions.get(userId);
    if (!state) return undefined;

    // An explicit stop is not announced by the loop; the caller confirms it
    const claimed = markTerminal(state, "stopped");
    await cancelAndWait(state.deliveryTask);
    await cancelAndWait(state.monitorTask);
    this.removeIfCurrent(state);
    console.log(`[tracker] Stopped session for user ${userId}`);
    return claimed ? toSnapshot(state) : undefined;
  }

  /** Delete the entry only if it still belongs to `state`, never a newer session. */
  private removeIfCurrent(state: SessionState): void {
    if (this.sessions.get(state.userId) === state) {
      this.sessions.delete(state.userId);
    }
  }
}
