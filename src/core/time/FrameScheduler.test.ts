import { describe, expect, it } from 'vitest';
import { FrameScheduler } from './FrameScheduler';

describe('FrameScheduler', () => {
  it('resolves every waiter on the next tick', async () => {
    const frames = new FrameScheduler();
    const seen: number[] = [];

    const a = frames.nextFrame().then(() => seen.push(frames.frameCount));
    const b = frames.nextFrame().then(() => seen.push(frames.frameCount));
    expect(frames.pending).toBe(2);

    frames.tick();
    await Promise.all([a, b]);

    expect(seen).toEqual([1, 1]);
    expect(frames.pending).toBe(0);
  });

  it('defers waiters registered during a tick to the following frame', async () => {
    const frames = new FrameScheduler();
    let second: Promise<void> | null = null;
    let resolvedAt = -1;

    const first = frames.nextFrame().then(() => {
      second = frames.nextFrame().then(() => {
        resolvedAt = frames.frameCount;
      });
    });

    frames.tick();
    await first;
    expect(frames.pending).toBe(1);

    frames.tick();
    await second;
    expect(resolvedAt).toBe(2);
  });
});
