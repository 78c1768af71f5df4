/**
 * Single-slot handoff between the capture loop and the game loop. Writers
 * overwrite whatever is waiting; the reader takes the newest frame or null.
 */
export class LatestFrameSlot<T> {
  private frame: T | null = null;
  private overwritten = 0;

  put(frame: T): void {
    if (this.frame !== null) this.overwritten += 1;
    this.frame = frame;
  }

  take(): T | null {
    const frame = this.frame;
    this.frame = null;
    return frame;
  }

  /** Frames replaced before the game loop got to them. */
  get droppedCount(): number {
    return this.overwritten;
  }

  clear(): void {
    this.frame = null;
  }
}
