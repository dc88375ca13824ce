// Timeout utilities
// Request deadlines as abort signals, and the idle window of long-lived streams

// ─── ABORT TIMEOUTS ─────────────────────────────────────────

/**
 * Create an AbortController with timeout.
 * An optional parent signal aborts the controller as well.
 */
export function createTimeoutController(
  timeoutMs: number,
  parent?: AbortSignal,
): {
  controller: AbortController;
  signal: AbortSignal;
  cleanup: () => void;
} {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener("abort", onParentAbort, { once: true });
    }
  }

  return {
    controller,
    signal: controller.signal,
    cleanup: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

// ─── IDLE TIMER ─────────────────────────────────────────────

/** Restartable inactivity timer */
export interface IdleTimer {
  /** Restart the window after activity */
  touch(): void;
  /** Stop the timer for good */
  stop(): void;
}

/**
 * Fire `onIdle` once when `touch()` has not been called for `idleMs`.
 */
export function createIdleTimer(idleMs: number, onIdle: () => void): IdleTimer {
  let stopped = false;
  let timer: ReturnType<typeof setTimeout> = setTimeout(fire, idleMs);

  function fire(): void {
    if (stopped) return;
    stopped = true;
    onIdle();
  }

  return {
    touch() {
      if (stopped) return;
      clearTimeout(timer);
      timer = setTimeout(fire, idleMs);
    },
    stop() {
      stopped = true;
      clearTimeout(timer);
    },
  };
}
