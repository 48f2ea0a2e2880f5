import { Injectable } from '@nestjs/common';

/**
 * In-process mutex keyed by document id. Calls for the same key run one
 * after another in arrival order; different keys do not wait on each other.
 */
@Injectable()
export class DocumentLockService {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
