/**
 * Wraps an async task so overlapping requests collapse into one extra pass.
 * Returns the pass promise to the caller that started it, and null to callers
 * whose request was folded into a pass already running.
 */
export function createCoalescedTask(task: () => Promise<void>): () => Promise<void> | null {
  let running = false;
  let queued = false;

  async function drain() {
    try {
      do {
        queued = false;
        await task();
      } while (queued);
    } finally {
      running = false;
      queued = false;
    }
  }

  return () => {
    if (running) {
      queued = true;
      return null;
    }
    running = true;
    return drain();
  };
}
