/**
 * FakeClock - Deterministic timer control for tests
 *
 * Simulates setTimeout/clearTimeout so deadline code can be driven to the
 * exact millisecond. Handles are plain numbers.
 */

interface TimerTask {
  id: number;
  callback: () => void;
  triggerAt: number;
}

export class FakeClock {
  private currentTime = 0;
  private nextTimerId = 1;
  private timerTasks = new Map<number, TimerTask>();

  /**
   * Get current fake time in milliseconds
   */
  now(): number {
    return this.currentTime;
  }

  /**
   * Schedule a one-time timer
   */
  setTimeout(callback: () => void, delay = 0): number {
    const id = this.nextTimerId++;
    this.timerTasks.set(id, { id, callback, triggerAt: this.currentTime + delay });
    return id;
  }

  clearTimeout(id: number | undefined): void {
    if (id !== undefined) {
      this.timerTasks.delete(id);
    }
  }

  /**
   * Advance time and fire every timer that comes due, in trigger order.
   */
  tick(ms: number): void {
    this.currentTime += ms;

    const due = Array.from(this.timerTasks.values())
      .filter((task) => task.triggerAt <= this.currentTime)
      .sort((a, b) => a.triggerAt - b.triggerAt || a.id - b.id);

    for (const task of due) {
      this.timerTasks.delete(task.id);
      task.callback();
    }
  }

  /**
   * Get number of pending timers
   */
  getPendingTimers(): number {
    return this.timerTasks.size;
  }

  reset(): void {
    this.currentTime = 0;
    this.nextTimerId = 1;
    this.timerTasks.clear();
  }
}
