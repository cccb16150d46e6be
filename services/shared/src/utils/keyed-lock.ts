export type Release = () => void;

/**
 * Promise-chained mutex keyed by string.
 *
 * Multi-key acquisitions are deduplicated and taken in the order given by
 * `compare`, so two callers asking for overlapping key sets cannot deadlock.
 */
export class KeyedLock {
     private readonly tails = new Map<string, Promise<void>>();

     constructor(private readonly compare: (a: string, b: string) => number = defaultCompare) {}

     async acquire(keys: Iterable<string>): Promise<Release> {
          const ordered = [...new Set(keys)].sort(this.compare);
          const releases: Release[] = [];

          for (const key of ordered) {
               releases.push(await this.acquireOne(key));
          }

          let released = false;
          return () => {
               if (released) return;
               released = true;
               for (const release of releases.reverse()) {
                    release();
               }
          };
     }

     async runExclusive<T>(keys: Iterable<string>, fn: () => Promise<T>): Promise<T> {
          const release = await this.acquire(keys);
          try {
               return await fn();
          } finally {
               release();
          }
     }

     isLocked(key: string): boolean {
          return this.tails.has(key);
     }

     private async acquireOne(key: string): Promise<Release> {
          const previous = this.tails.get(key) ?? Promise.resolve();

          let unlock: () => void = () => undefined;
          const current = new Promise<void>((resolve) => {
               unlock = resolve;
          });
          const tail = previous.then(() => current);
          this.tails.set(key, tail);

          await previous;

          return () => {
               unlock();
               if (this.tails.get(key) === tail) {
                    this.tails.delete(key);
               }
          };
     }
}

function defaultCompare(a: string, b: string): number {
     return a < b ? -1 : a > b ? 1 : 0;
}
