/**
 * Owns a group of timeouts so that a view can cancel its pending work
 * when it is torn down.
 */
export class TimerScope {
  private readonly handles = new Set<number>();

  private disposed = false;

  /**
   * Schedules a callback.
   * @param callback - Function to run once.
   * @param delay - Delay in milliseconds.
   * @returns Function cancelling this timer.
   */
  public schedule(callback: () => void, delay: number): () => void {
    if (this.disposed) {
      return () => undefined;
    }
    const handle = window.setTimeout(() => {
      this.handles.delete(handle);
      callback();
    }, delay);
    this.handles.add(handle);
    return () => {
      if (this.handles.delete(handle)) {
        window.clearTimeout(handle);
      }
    };
  }

  /**
   * Number of timers that have neither fired nor been cancelled.
   */
  public get pending(): number {
    return this.handles.size;
  }

  public cancelAll(): void {
    this.handles.forEach((handle) => window.clearTimeout(handle));
    this.handles.clear();
  }

  /**
   * Cancels pending timers and ignores later scheduling.
   */
  public dispose(): void {
    this.cancelAll();
    this.disposed = true;
  }
}
