import { isDuplicatePlace } from "../content/place-dedupe.js";
import {
  appendHistory,
  deliveryIntervalMs,
  expiryInstant,
  historyPlaces,
  isExpired,
  isSilent,
  markTerminal,
  recentExclusions,
} from "./session-state.js";
import { isAbortError, sleep, withTimeout } from "./tasks.js";
import type {
  ContentGenerator,
  ContentResult,
  Coordinates,
  DeliveryChannel,
  MessageFormatter,
  NoticeKind,
  OutgoingMessage,
  SessionState,
  TrackerPolicy,
} from "./types.js";

export interface DeliveryLoopDeps {
  policy: TrackerPolicy;
  generator: ContentGenerator;
  channel: DeliveryChannel;
  formatter: MessageFormatter;
  /** Called once when the loop ends for any reason, cancellation included. */
  onExit: (state: SessionState) => void;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** First wait: one interval minus the expected generation time, so the first fact lands on cadence. */
export function initialWaitMs(state: SessionState, policy: TrackerPolicy): number {
  return Math.max(deliveryIntervalMs(state) - policy.generationLatencyEstimateMs, policy.initialWaitFloorMs);
}

/** Wait after a cycle that took `elapsedMs`, keeping the long-run cadence near the interval. */
export function nextWaitMs(state: SessionState, policy: TrackerPolicy, elapsedMs: number): number {
  return Math.max(deliveryIntervalMs(state) - elapsedMs, policy.cycleFloorMs);
}

/** Never sleep past expiry: the expiry notice goes out on time even with an hour-long interval. */
function capToExpiry(state: SessionState, waitMs: number): number {
  return Math.min(waitMs, Math.max(expiryInstant(state) - Date.now(), 0));
}

/** Deliver within `deliveryTimeoutMs`. Failures and timeouts are logged; cancellation propagates. */
async function safeDeliver(
  deps: DeliveryLoopDeps,
  state: SessionState,
  message: OutgoingMessage,
  signal: AbortSignal
): Promise<void> {
  try {
    await withTimeout(deps.policy.deliveryTimeoutMs, signal, "Delivery", (deliverySignal) =>
      deps.channel.deliver(state.destinationId, message, deliverySignal)
    );
  } catch (err) {
    if (isAbortError(err) && signal.aborted) throw err;
    console.error(`[delivery-loop] Delivery to ${state.destinationId} failed for user ${state.userId}: ${describeError(err)}`);
  }
}

/** Send a terminal notice within `policy.deliveryTimeoutMs`. Never throws. */
export async function safeNotify(
  channel: DeliveryChannel,
  policy: TrackerPolicy,
  state: SessionState,
  kind: NoticeKind,
  signal: AbortSignal
): Promise<void> {
  try {
    await withTimeout(policy.deliveryTimeoutMs, signal, `${kind} notice`, (noticeSignal) =>
      channel.notify(state.destinationId, kind, state.language, noticeSignal)
    );
  } catch (err) {
    console.error(`[delivery-loop] ${kind} notice to ${state.destinationId} failed for user ${state.userId}: ${describeError(err)}`);
  }
}

function generateOnce(
  deps: DeliveryLoopDeps,
  state: SessionState,
  position: Coordinates,
  exclusions: string[],
  signal: AbortSignal
): Promise<ContentResult> {
  return withTimeout(deps.policy.generationTimeoutMs, signal, "Content generation", (timeoutSignal) =>
    deps.generator.generate({
      position,
      exclusions,
      language: state.language,
      signal: timeoutSignal,
    })
  );
}

/**
 * Generate content for `position`. A place already in the history gets one
 * retry with that place excluded; the retry's answer is used even if it
 * repeats, and a failed retry falls back to the first answer.
 */
async function generateFresh(
  deps: DeliveryLoopDeps,
  state: SessionState,
  position: Coordinates,
  signal: AbortSignal
): Promise<ContentResult> {
  const exclusions = recentExclusions(state, deps.policy.exclusionWindow);
  const first = await generateOnce(deps, state, position, exclusions, signal);

  if (first.place === deps.formatter.nearYou(state.language)) return first;
  if (!isDuplicatePlace(first.place, historyPlaces(state))) return first;

  console.log(`[delivery-loop] Duplicate place for user ${state.userId}, regenerating once`);
  try {
    return await generateOnce(deps, state, position, [...exclusions, `${first.place}: ${first.summary}`], signal);
  } catch (err) {
    if (isAbortError(err) && signal.aborted) throw err;
    console.error(`[delivery-loop] Regeneration failed for user ${state.userId}: ${describeError(err)}`);
    return first;
  }
}

/**
 * One delivery cycle. Generation failures still produce a numbered
 * placeholder so the user-visible numbering has no gaps.
 */
export async function runDeliveryCycle(
  deps: DeliveryLoopDeps,
  state: SessionState,
  signal: AbortSignal
): Promise<void> {
  state.deliveryCount += 1;
  const number = state.deliveryCount;
  const position = { ...state.position };

  let result: ContentResult | null = null;
  try {
    result = await generateFresh(deps, state, position, signal);
  } catch (err) {
    if (isAbortError(err) && signal.aborted) throw err;
    console.error(`[delivery-loop] Generation failed for user ${state.userId} (#${number}): ${describeError(err)}`);
  }

  // Generation can outlive the session; nothing is delivered after expiry
  if (isExpired(state, Date.now())) return;

  if (!result) {
    await safeDeliver(deps, state, { text: deps.formatter.failure(state.language, number) }, signal);
    return;
  }

  appendHistory(state, result.place, result.summary, deps.policy.historyLimit);
  await safeDeliver(
    deps,
    state,
    { text: deps.formatter.fact(state.language, number, result.place, result.summary) },
    signal
  );

  if (result.companionPosition) {
    await safeDeliver(
      deps,
      state,
      { text: result.place, venue: { position: result.companionPosition, title: result.place } },
      signal
    );
  }
  console.log(`[delivery-loop] Delivered fact #${number} to user ${state.userId}`);
}

/**
 * Paced delivery for one session. Ends on expiry or silence (sending the
 * matching notice) or when `signal` is aborted; always calls `deps.onExit`.
 */
export async function runDeliveryLoop(
  deps: DeliveryLoopDeps,
  state: SessionState,
  signal: AbortSignal
): Promise<void> {
  const { policy } = deps;
  try {
    await sleep(capToExpiry(state, initialWaitMs(state, policy)), signal);

    for (;;) {
      const now = Date.now();
      if (isExpired(state, now)) {
        if (markTerminal(state, "expired")) {
          console.log(`[delivery-loop] Session expired for user ${state.userId}`);
          await safeNotify(deps.channel, policy, state, "expired", signal);
        }
        break;
      }
      if (isSilent(state, now, policy.silenceThresholdMs)) {
        if (markTerminal(state, "silent")) {
          console.log(`[delivery-loop] No position updates from user ${state.userId}, stopping`);
          await safeNotify(deps.channel, policy, state, "silent", signal);
        }
        break;
      }

      const cycleStart = Date.now();
      await runDeliveryCycle(deps, state, signal);
      const elapsed = Date.now() - cycleStart;
      await sleep(capToExpiry(state, nextWaitMs(state, policy, elapsed)), signal);
    }
  } catch (err) {
    if (!isAbortError(err)) {
      console.error(`[delivery-loop] Unexpected error for user ${state.userId}:`, err);
    } else {
      console.log(`[delivery-loop] Cancelled for user ${state.userId}`);
    }
  } finally {
    deps.onExit(state);
  }
}
