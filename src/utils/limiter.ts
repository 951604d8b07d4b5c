export type Lane = 'llm' | 'embed' | 'ocr' | 'crossref';

export type LimiterConfig = Record<Lane, number>;

const defaultConfig: LimiterConfig = {
  llm: 2,
  embed: 4,
  ocr: 2,
  crossref: 2,
};

export class LaneLimiter {
  private queues: Map<Lane, Array<() => void>> = new Map();
  private running: Map<Lane, number> = new Map();
  private config: LimiterConfig;

  constructor(config?: Partial<LimiterConfig>) {
    this.config = { ...defaultConfig, ...config };
  }

  async limit<T>(lane: Lane, fn: () => Promise<T>): Promise<T> {
    const max = this.config[lane];
    const running = this.running.get(lane) || 0;

    if (running < max) {
      this.running.set(lane, running + 1);
      try {
        return await fn();
      } finally {
        this.release(lane);
      }
    }

    return new Promise<T>((resolve, reject) => {
      this.queueFor(lane).push(() => {
        this.running.set(lane, (this.running.get(lane) || 0) + 1);
        fn()
          .then(resolve, reject)
          .finally(() => this.release(lane));
      });
    });
  }

  pending(lane: Lane): number {
    return this.queueFor(lane).length;
  }

  private queueFor(lane: Lane): Array<() => void> {
    let queue = this.queues.get(lane);
    if (!queue) {
      queue = [];
      this.queues.set(lane, queue);
    }
    return queue;
  }

  private release(lane: Lane): void {
    this.running.set(lane, Math.max(0, (this.running.get(lane) || 1) - 1));
    const queue = this.queueFor(lane);
    const running = this.running.get(lane) || 0;

    if (running < this.config[lane]) {
      const next = queue.shift();
      if (next) next();
    }
  }
}

const globalLimiter = new LaneLimiter({
  llm: Number(process.env.GEMINI_LLM_CONCURRENCY || '2'),
  embed: Number(process.env.GEMINI_EMBED_CONCURRENCY || '4'),
  ocr: Number(process.env.OCR_CONCURRENCY || '2'),
  crossref: Number(process.env.CROSSREF_CONCURRENCY || '2'),
});

export function limit<T>(lane: Lane, fn: () => Promise<T>): Promise<T> {
  return globalLimiter.limit(lane, fn);
}
