/**
 * FIFO mutual exclusion over a promise chain.
 *
 * Each caller waits for the previous holder to settle before its critical
 * section starts, so sections never interleave even when they await.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Run `fn` once every earlier section has finished.
   * A section that throws releases the lock and rejects only its own caller.
   */
  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    this.pending += 1;

    const result = this.tail.then(fn);

    this.tail = result.then(
      () => this.release(),
      () => this.release()
    );

    return result;
  }

  /**
   * True while a section is queued or running
   */
  isLocked(): boolean {
    return this.pending > 0;
  }

  private release(): void {
    this.pending -= 1;
  }
}
