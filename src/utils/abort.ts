import { ResearchCancelledError } from '../errors.js';

export interface QuerySignal {
  signal: AbortSignal;
  /** Clear the timeout and detach listeners from the parent signal. */
  dispose(): void;
}

/**
 * Derive the signal for one query from an optional caller signal and an
 * optional timeout. The abort reason is always a ResearchCancelledError.
 */
export function createQuerySignal(
  parent: AbortSignal | undefined,
  timeoutSeconds: number | undefined
): QuerySignal {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const onParentAbort = () => {
    controller.abort(new ResearchCancelledError());
  };

  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  if (timeoutSeconds !== undefined && !controller.signal.aborted) {
    timer = setTimeout(() => {
      controller.abort(
        new ResearchCancelledError(`Research timed out after ${String(timeoutSeconds)}s`)
      );
    }, timeoutSeconds * 1000);
  }

  return {
    signal: controller.signal,
    dispose() {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/** Throw the signal's ResearchCancelledError if it has been aborted. */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw cancellationReason(signal);
  }
}

export function cancellationReason(signal: AbortSignal): ResearchCancelledError {
  const reason: unknown = signal.reason;
  return reason instanceof ResearchCancelledError ? reason : new ResearchCancelledError();
}
