import type { EasingFn } from './Easings';
import { Easings } from './Easings';

export type NumericKeys<T> = {
  [K in keyof T]-?: T[K] extends number ? K : never;
}[keyof T];

export type TweenProps<T> = Partial<Record<NumericKeys<T>, number>>;

export interface TweenOptions {
  ease?: EasingFn;
  delay?: number;
  onUpdate?: () => void;
  onComplete?: () => void;
}

interface TweenChannel {
  key: string;
  from: number;
  to: number;
}

interface TweenItem {
  target: object;
  channels: TweenChannel[];
  duration: number;
  elapsed: number;
  delay: number;
  ease: EasingFn;
  onUpdate?: () => void;
  onComplete?: () => void;
  active: boolean;
}

/**
 * Time-based tween runner driven by the frame loop.
 * - delays + easing
 * - zero duration snaps on the next update
 * - killed tweens never complete
 */
export class TweenManager {
  private readonly tweens: TweenItem[] = [];

  to<T extends object, P extends TweenProps<T> = TweenProps<T>>(target: T, to: P, duration: number, options: TweenOptions = {}): void {
    const channels: TweenChannel[] = [];
    for (const k in to) {
      const end = to[k];
      const start: unknown = Reflect.get(target, k);
      if (end === undefined || typeof start !== 'number') continue;
      channels.push({ key: k, from: start, to: end });
    }

    this.tweens.push({
      target,
      channels,
      duration: Math.max(0, duration),
      elapsed: 0,
      delay: Math.max(0, options.delay ?? 0),
      ease: options.ease ?? Easings.outCubic,
      onUpdate: options.onUpdate,
      onComplete: options.onComplete,
      active: true,
    });
  }

  killTweensOf(target: object): void {
    for (const t of this.tweens) {
      if (t.active && t.target === target) t.active = false;
    }
  }

  get activeCount(): number {
    let n = 0;
    for (const t of this.tweens) if (t.active) n++;
    return n;
  }

  update(dt: number): void {
    const list = this.tweens;
    // Tweens queued from onComplete callbacks start on the next update.
    const count = list.length;

    for (let i = 0; i < count; i++) {
      const t = list[i];
      if (!t || !t.active) continue;

      if (t.delay > 0) {
        t.delay -= dt;
        continue;
      }

      t.elapsed += dt;
      const p = t.duration === 0 ? 1 : Math.min(1, t.elapsed / t.duration);
      const e = p >= 1 ? 1 : t.ease(p);

      for (const c of t.channels) {
        Object.assign(t.target, { [c.key]: c.from + (c.to - c.from) * e });
      }

      t.onUpdate?.();

      if (p >= 1) {
        t.active = false;
        t.onComplete?.();
      }
    }

    let w = 0;
    for (let r = 0; r < list.length; r++) {
      const t = list[r];
      if (t?.active) list[w++] = t;
    }
    list.length = w;
  }

  clear(): void {
    for (const t of this.tweens) t.active = false;
    this.tweens.length = 0;
  }
}
