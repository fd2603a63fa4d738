import type { TaskHandle } from "./types.js";

export function createAbortError(message = "The operation was aborted"): Error {
  const err = new Error(message);
  err.name = "AbortError";
  return err;
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

export function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) throw createAbortError();
}

/**
 * Resolves after `ms`, or rejects with an AbortError as soon as `signal` fires.
 * Uses the global timer so fake timers in tests drive it.
 */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.reject(createAbortError());

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(createAbortError());
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(ms, 0));
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Runs `fn` with a child signal that aborts when the parent aborts or when
 * `timeoutMs` elapses. A timeout rejects with a plain Error so callers can
 * tell it apart from cancellation of the parent.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  parent: AbortSignal,
  label: string,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  throwIfAborted(parent);
  const controller = new AbortController();
  const onParentAbort = () => controller.abort();
  parent.addEventListener("abort", onParentAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      // Reject first so the race reports the timeout, not the abort it causes
      reject(new Error(`${label} timed out after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);
  });
  const cancelled = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener(
      "abort",
      () => {
        if (parent.aborted) reject(createAbortError());
      },
      { once: true }
    );
  });
  // Losing racers must not surface as unhandled rejections.
  timeout.catch(() => undefined);
  cancelled.catch(() => undefined);

  try {
    return await Promise.race([fn(controller.signal), timeout, cancelled]);
  } finally {
    clearTimeout(timer);
    parent.removeEventListener("abort", onParentAbort);
  }
}

/**
 * Start `body` as an independent background task.
 *
 * The returned handle's `done` promise never rejects: cancellation is the
 * task's normal way to end, and any other failure is logged here because
 * nothing awaits a background task's result.
 */
export function spawnTask(name: string, body: (signal: AbortSignal) => Promise<void>): TaskHandle {
  const controller = new AbortController();

  const done = Promise.resolve()
    .then(() => body(controller.signal))
    .catch((err: unknown) => {
      if (isAbortError(err)) return;
      console.error(`[tasks] ${name} crashed:`, err);
    });

  return {
    name,
    signal: controller.signal,
    done,
    cancel: () => controller.abort(),
  };
}

/** Cancel a task and wait until it has settled. */
export async function cancelAndWait(handle: TaskHandle | null): Promise<void> {
  if (!handle) return;
  handle.cancel();
  await handle.done;
}
