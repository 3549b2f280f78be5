export type ScopedUnit<T> = (signal: AbortSignal) => Promise<T>;

export type TaskScopeOptions = {
  /**
   * Upper bound for units in flight. Defaults to the number of units, so every
   * unit starts immediately; a non-finite value is treated as unset.
   */
  readonly maxConcurrency?: number;
  /** Cancels the whole scope. */
  readonly signal?: AbortSignal;
};

type Slot<T> = { readonly value: T };

function toAbortError(reason: unknown): Error {
  if (reason instanceof Error) {
    return reason;
  }
  const error = new Error(typeof reason === "string" ? reason : "Task scope was cancelled.");
  error.name = "AbortError";
  return error;
}

/**
 * Runs every unit inside one cancellation scope and resolves with their
 * results in input order. Each unit writes only its own index.
 *
 * The promise settles only after every started unit has settled. If a unit
 * throws, or `options.signal` aborts, the scope signal aborts, no further
 * units start, and the scope rejects with the first error (or the abort
 * reason) once in-flight units finish.
 */
export function runTaskScope<T>(
  units: readonly ScopedUnit<T>[],
  options: TaskScopeOptions = {},
): Promise<T[]> {
  const requested = options.maxConcurrency;
  const limit =
    requested !== undefined && Number.isFinite(requested)
      ? Math.max(1, Math.floor(requested))
      : Math.max(1, units.length);
  const controller = new AbortController();
  const slots: Array<Slot<T> | undefined> = new Array(units.length);

  return new Promise<T[]>((resolve, reject) => {
    let nextIndex = 0;
    let active = 0;
    let firstError: Error | undefined;

    const onExternalAbort = (): void => {
      firstError ??= toAbortError(options.signal?.reason);
      controller.abort(firstError);
      settleIfDone();
    };

    function settleIfDone(): void {
      const exhausted = nextIndex >= units.length || controller.signal.aborted;
      if (active > 0 || !exhausted) {
        return;
      }
      options.signal?.removeEventListener("abort", onExternalAbort);
      if (firstError) {
        reject(firstError);
        return;
      }
      const results: T[] = [];
      for (const [index, slot] of slots.entries()) {
        if (!slot) {
          reject(new Error(`Task scope unit ${index} finished without a result.`));
          return;
        }
        results.push(slot.value);
      }
      resolve(results);
    }

    function startNext(): void {
      while (active < limit && nextIndex < units.length && !controller.signal.aborted) {
        const index = nextIndex;
        nextIndex += 1;
        const unit = units[index];
        if (!unit) {
          continue;
        }
        active += 1;
        void Promise.resolve()
          .then(() => unit(controller.signal))
          .then(
            (value) => {
              slots[index] = { value };
            },
            (error: unknown) => {
              if (!firstError) {
                firstError = error instanceof Error ? error : new Error(String(error));
                controller.abort(firstError);
              }
            },
          )
          .finally(() => {
            active -= 1;
            startNext();
            settleIfDone();
          });
      }
    }

    if (options.signal?.aborted) {
      reject(toAbortError(options.signal.reason));
      return;
    }
    options.signal?.addEventListener("abort", onExternalAbort, { once: true });
    startNext();
    settleIfDone();
  });
}
