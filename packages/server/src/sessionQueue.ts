// packages/server/src/sessionQueue.ts

/**
 * Serializes tasks per key. Tasks sharing a key run one at a time in
 * enqueue order; tasks under different keys never wait on each other.
 * A task must not await another task under its own key.
 */
export class SessionQueue {
  private readonly tails = new Map<string, Promise<unknown>>();

  enqueue<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    const run = previous
      .catch(() => undefined)
      .then(() => task());

    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return run;
  }

  activeKeys(): number {
    return this.tails.size;
  }
}

export function sessionKey(sessionId: string): string {
  return `ttt:${sessionId}`;
}
