export interface GuardOptions {
  /** Aborted when the timeout or the upstream signal fires, so the work can stop. */
  controller: AbortController;
  signal?: AbortSignal;
  timeoutMs?: number;
  timeoutError: () => Error;
  abortError: () => Error;
}

/**
 * Settles with `work` unless the timeout or the upstream signal fires first,
 * in which case it rejects with the matching error. Timer and listener are
 * released as soon as it settles.
 */
export function guard<T>(work: Promise<T>, options: GuardOptions): Promise<T> {
  const { controller, signal, timeoutMs } = options;

  return new Promise<T>((resolve, reject) => {
    let timer: ReturnType<typeof setTimeout> | undefined;

    const release = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    };
    const interrupt = (error: Error) => {
      release();
      controller.abort(error);
      reject(error);
    };
    function onAbort() {
      interrupt(options.abortError());
    }

    if (signal?.aborted) {
      onAbort();
      // The work may still settle; its outcome is no longer observed.
      work.catch(() => undefined);
      return;
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    if (timeoutMs !== undefined && timeoutMs > 0) {
      timer = setTimeout(() => interrupt(options.timeoutError()), timeoutMs);
    }

    work.then(
      (value) => {
        release();
        resolve(value);
      },
      (error: unknown) => {
        release();
        reject(error);
      },
    );
  });
}

/** Message of an abort signal's reason, when it has one. */
export function abortReason(signal: AbortSignal | undefined): string | undefined {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason.message;
  return typeof reason === "string" ? reason : undefined;
}
