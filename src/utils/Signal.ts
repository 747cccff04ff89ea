type Waiter = {
  promise: Promise<void>;
  resolve: () => void;
};

/**
 * One-shot wake-up primitive. Every `wait()` made before `set()` shares one
 * promise, so a set signal has nothing left referencing it.
 */
export class Signal {
  private signaled = false;
  private waiter: Waiter | null = null;

  get isSet(): boolean {
    return this.signaled;
  }

  get hasWaiters(): boolean {
    return this.waiter !== null;
  }

  wait(): Promise<void> {
    if (this.signaled) {
      return Promise.resolve();
    }

    if (!this.waiter) {
      let resolve: () => void = () => {};
      const promise = new Promise<void>((res) => {
        resolve = res;
      });
      this.waiter = { promise, resolve };
    }

    return this.waiter.promise;
  }

  set(): void {
    if (this.signaled) return;

    this.signaled = true;
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.resolve();
  }

  clear(): void {
    this.signaled = false;
  }
}
