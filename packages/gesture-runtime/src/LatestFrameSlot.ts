/**
 * Single-consumer hand-off between capture and processing. A newer frame
 * replaces an unread one; nothing queues.
 */
export class LatestFrameSlot<T> {
  private latest: { value: T } | null = null;
  private droppedCount = 0;

  offer(value: T): void {
    if (this.latest) this.droppedCount += 1;
    this.latest = { value };
  }

  take(): T | undefined {
    const latest = this.latest;
    this.latest = null;
    return latest?.value;
  }

  hasFrame(): boolean {
    return this.latest !== null;
  }

  /** Frames overwritten before they were taken. */
  get dropped(): number {
    return this.droppedCount;
  }
}
