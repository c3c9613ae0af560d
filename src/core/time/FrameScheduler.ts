/**
 * Resolves waiters on the next frame tick. The frame loop calls `tick()`
 * once per frame before anything else updates.
 */
export class FrameScheduler {
  private waiters: Array<() => void> = [];
  private frames = 0;

  get frameCount(): number {
    return this.frames;
  }

  get pending(): number {
    return this.waiters.length;
  }

  nextFrame(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  tick(): void {
    this.frames++;
    if (this.waiters.length === 0) return;

    // Waiters added while resolving belong to the following frame.
    const due = this.waiters;
    this.waiters = [];
    for (const resolve of due) resolve();
  }
}
