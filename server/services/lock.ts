export interface Lock {
  runExclusive<T>(task: () => Promise<T>): Promise<T>;
}

/** In-process mutex: tasks run one at a time in submission order. */
export class PromiseChainLock implements Lock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get isLocked(): boolean {
    return this.pending > 0;
  }

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const run = this.tail.then(task).finally(() => {
      this.pending -= 1;
    });
    // The chain only orders tasks; each caller observes its own result through `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
