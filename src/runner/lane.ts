/**
 * Serial Execution Lane
 *
 * One lane per source. Tasks submitted to a lane run strictly one after
 * another, so a slow source only ever delays itself.
 */

// -----------------------------------------------------------------------------
// Port: lane.submit
// -----------------------------------------------------------------------------

export class SerialLane {
  private tail: Promise<void>;

  /**
   * @param after - Work that must settle before the first task starts.
   *   Used to hand a re-added source the lane of its retired predecessor.
   */
  constructor(after: Promise<void> = Promise.resolve()) {
    this.tail = after;
  }

  /**
   * Queues a task behind everything already submitted.
   * The returned promise settles with the task's own result.
   */
  submit<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /**
   * Resolves once every task submitted so far has settled. Never rejects.
   */
  drained(): Promise<void> {
    return this.tail;
  }
}
