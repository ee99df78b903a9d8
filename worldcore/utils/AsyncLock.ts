// worldcore/utils/AsyncLock.ts

import { AsyncLocalStorage } from "node:async_hooks";

/**
 * FIFO mutual exclusion for async critical sections.
 *
 * Sections run strictly one after another in the order they were requested;
 * a section that throws or rejects releases the lock like any other.
 *
 * Re-entrant: a runExclusive() issued from inside a running section (on its
 * own async call chain) runs straight away instead of queueing behind the
 * section that is waiting for it. Work a section starts but does not await
 * also counts as inside, so it must not outlive the section.
 */
export class AsyncLock {
  private readonly owner = new AsyncLocalStorage<true>();
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** True while a section is running or queued. */
  get isLocked(): boolean {
    return this.pending > 0;
  }

  /** True when called from inside a section of this lock. */
  get isHeldByCaller(): boolean {
    return this.owner.getStore() === true;
  }

  runExclusive<T>(section: () => T | Promise<T>): Promise<T> {
    if (this.isHeldByCaller) {
      return new Promise<T>((resolve) => resolve(section()));
    }

    this.pending++;

    const run = this.tail.then(() => this.owner.run(true, section));

    const release = (): void => {
      this.pending--;
    };
    this.tail = run.then(release, release);

    return run;
  }
}
