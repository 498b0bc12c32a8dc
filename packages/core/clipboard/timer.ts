export interface SingleShotTimer {
  /** (Re)arm the timer; a pending firing is replaced, never duplicated. */
  start(): void;
  stop(): void;
  isActive(): boolean;
}

export function createSingleShotTimer(intervalMs: number, onTimeout: () => void): SingleShotTimer {
  let timer: ReturnType<typeof setTimeout> | undefined;

  return {
    start() {
      if (timer) clearTimeout(timer);
      timer = setTimeout(() => {
        timer = undefined;
        onTimeout();
      }, intervalMs);
    },
    stop() {
      if (timer) {
        clearTimeout(timer);
        timer = undefined;
      }
    },
    isActive() {
      return timer !== undefined;
    },
  };
}
