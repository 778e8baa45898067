export interface CancellableDelay {
  promise: Promise<void>;
  cancel(): void;
}

/**
 * setTimeout as a promise that can be resolved early.
 * Cancelling resolves instead of rejecting, so loops just re-check their flag.
 */
export function cancellableDelay(ms: number): CancellableDelay {
  let timer: NodeJS.Timeout | undefined;
  let release: () => void = () => undefined;

  const promise = new Promise<void>((resolve) => {
    release = resolve;
    timer = setTimeout(resolve, ms);
  });

  return {
    promise,
    cancel: () => {
      if (timer) clearTimeout(timer);
      release();
    },
  };
}
