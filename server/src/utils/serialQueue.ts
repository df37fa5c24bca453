/**
 * Serial Queue
 * Runs async jobs one at a time in submission (FIFO) order.
 */

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private closed = false;

  /**
   * Queue a job; the returned promise settles with the job's own result.
   * A failing job does not stop the jobs queued behind it.
   */
  run<T>(job: () => Promise<T> | T): Promise<T> {
    if (this.closed) {
      return Promise.reject(new Error('Queue closed'));
    }

    this.pending++;
    const result = this.tail.then(() => job());
    this.tail = result.then(
      () => { this.pending--; },
      () => { this.pending--; }
    );
    return result;
  }

  size(): number {
    return this.pending;
  }

  /**
   * Refuse new jobs; resolves once everything already queued has settled.
   */
  close(): Promise<void> {
    this.closed = true;
    return this.tail;
  }

  isClosed(): boolean {
    return this.closed;
  }
}
