import { safeNotify } from "./delivery-loop.js";
import { isExpired, isSilent, markTerminal } from "./session-state.js";
import { isAbortError, sleep } from "./tasks.js";
import type { DeliveryChannel, SessionState, TrackerPolicy } from "./types.js";

export interface HealthMonitorDeps {
  policy: TrackerPolicy;
  channel: DeliveryChannel;
  /** Remove the session from the registry (no-op if already gone). */
  remove: (state: SessionState) => void;
}

/**
 * Polls one session for silence on a short fixed period, independent of the
 * delivery interval. On silence it cancels the delivery loop, removes the
 * session and sends the "silent" notice. Expiry is left to the delivery loop.
 */
export async function runHealthMonitor(
  deps: HealthMonitorDeps,
  state: SessionState,
  signal: AbortSignal
): Promise<void> {
  try {
    for (;;) {
      await sleep(deps.policy.healthPollIntervalMs, signal);

      if (state.terminal !== null) return;
      const now = Date.now();
      if (isExpired(state, now)) return;
      if (!isSilent(state, now, deps.policy.silenceThresholdMs)) continue;

      if (!markTerminal(state, "silent")) return;
      const silentSec = Math.round((now - state.lastUpdateTime) / 1000);
      console.log(`[health-monitor] User ${state.userId} silent for ${silentSec}s, stopping session`);

      state.deliveryTask?.cancel();
      deps.remove(state);
      // The loop's exit cancels this task, so the notice runs on its own signal
      await safeNotify(deps.channel, deps.policy, state, "silent", new AbortController().signal);
      return;
    }
  } catch (err) {
    if (!isAbortError(err)) {
      console.error(`[health-monitor] Unexpected error for user ${state.userId}:`, err);
    }
  }
}
