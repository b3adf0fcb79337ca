/**
 * Set-once broadcast used to stop every worker
 */

/**
 * Backed by an AbortController: aborting twice is a no-op, so concurrent
 * trips never block and the first reason sticks.
 */
export class CancellationSignal {
  private controller = new AbortController();

  /** Trip the signal. Returns true only for the call that actually set it. */
  trip(reason: unknown): boolean {
    if (this.controller.signal.aborted) {
      return false;
    }
    this.controller.abort(reason);
    return true;
  }

  get isSet(): boolean {
    return this.controller.signal.aborted;
  }

  /** Reason passed to the first `trip` */
  get reason(): unknown {
    return this.controller.signal.reason;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }
}

/**
 * One signal that aborts when any of `signals` does.
 * Returns a disposer that detaches the listeners.
 */
export function linkSignals(
  signals: ReadonlyArray<AbortSignal | undefined>
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const attached: Array<[AbortSignal, () => void]> = [];

  for (const source of signals) {
    if (!source) continue;
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const onAbort = () => controller.abort(source.reason);
    source.addEventListener("abort", onAbort, { once: true });
    attached.push([source, onAbort]);
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const [source, onAbort] of attached) {
        source.removeEventListener("abort", onAbort);
      }
    },
  };
}

/**
 * Sleep that ends early, without rejecting, when `signal` aborts
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}
