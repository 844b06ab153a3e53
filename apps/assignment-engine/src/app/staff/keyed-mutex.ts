import { Injectable } from '@nestjs/common';

/**
 * Fine-grained mutual exclusion keyed by string.
 *
 * Each key is a FIFO chain of promises. A task that needs several keys takes
 * them in sorted order, so two tasks over overlapping key sets cannot deadlock,
 * and tasks over disjoint keys never wait on each other.
 */
@Injectable()
export class KeyedMutex {
  /** key → promise that settles when the current holder releases */
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(keys: readonly string[], task: () => T | Promise<T>): Promise<T> {
    const ordered = Array.from(new Set(keys)).sort();
    const releases: Array<() => void> = [];

    try {
      for (const key of ordered) {
        releases.push(await this.acquire(key));
      }
      return await task();
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  /** True while any task holds or waits on the key */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  private acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    return new Promise((granted) => {
      const current = new Promise<void>((released) => {
        void previous.then(() =>
          granted(() => {
            if (this.tails.get(key) === current) {
              this.tails.delete(key);
            }
            released();
          })
        );
      });
      this.tails.set(key, current);
    });
  }
}
