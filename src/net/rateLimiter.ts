type TimeoutHandle = ReturnType<typeof setTimeout>;

export interface RateLimiterOptions {
  qps: number;
  burst: number;
  jitterRatio?: number;
  clock?: () => number;
  setTimeoutFn?: typeof setTimeout;
}

interface PendingTask {
  run: () => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Token bucket that spaces out calls to a public API.
 * Tasks start in submission order; an aborted task is dropped from the queue.
 */
export class RateLimiter {
  private readonly qps: number;
  private readonly burst: number;
  private readonly jitterRatio: number;
  private readonly clock: () => number;
  private readonly setTimeoutFn: typeof setTimeout;
  private tokens: number;
  private lastRefillMs: number;
  private queue: PendingTask[] = [];
  private timer: TimeoutHandle | null = null;

  constructor(options: RateLimiterOptions) {
    this.qps = Math.max(0.01, options.qps);
    this.burst = Math.max(1, Math.floor(options.burst));
    this.jitterRatio = Math.max(0, options.jitterRatio ?? 0);
    this.clock = options.clock ?? (() => Date.now());
    this.setTimeoutFn = options.setTimeoutFn ?? setTimeout;
    this.tokens = this.burst;
    this.lastRefillMs = this.clock();
  }

  get pending(): number {
    return this.queue.length;
  }

  schedule<T>(fn: () => Promise<T> | T, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }
    return new Promise<T>((resolve, reject) => {
      const task: PendingTask = {
        run: () => {
          void Promise.resolve()
            .then(fn)
            .then(resolve, reject);
        },
        signal
      };
      if (signal) {
        task.onAbort = () => {
          const index = this.queue.indexOf(task);
          if (index >= 0) {
            this.queue.splice(index, 1);
            reject(abortReason(signal));
          }
        };
        signal.addEventListener("abort", task.onAbort, { once: true });
      }
      this.queue.push(task);
      this.drain();
    });
  }

  private refill(): void {
    const now = this.clock();
    const elapsedMs = Math.max(0, now - this.lastRefillMs);
    if (elapsedMs > 0) {
      this.tokens = Math.min(this.burst, this.tokens + (elapsedMs / 1000) * this.qps);
      this.lastRefillMs = now;
    }
  }

  private drain(): void {
    while (this.queue.length > 0) {
      this.refill();
      if (this.tokens < 1) {
        this.wakeAfter(((1 - this.tokens) / this.qps) * 1000);
        return;
      }
      const task = this.queue.shift();
      if (!task) {
        return;
      }
      this.tokens -= 1;
      this.start(task);
    }
  }

  private start(task: PendingTask): void {
    if (task.signal && task.onAbort) {
      task.signal.removeEventListener("abort", task.onAbort);
    }
    const jitterMs = this.jitterRatio > 0 ? (Math.random() * this.jitterRatio * 1000) / this.qps : 0;
    if (jitterMs > 0) {
      this.setTimeoutFn(task.run, jitterMs);
    } else {
      task.run();
    }
  }

  private wakeAfter(delayMs: number): void {
    if (this.timer) {
      return;
    }
    this.timer = this.setTimeoutFn(() => {
      this.timer = null;
      this.drain();
    }, Math.max(0, delayMs));
  }
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new DOMException("The operation was aborted.", "AbortError");
}
