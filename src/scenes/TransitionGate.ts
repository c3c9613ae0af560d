import type { Container } from 'pixi.js';
import type { EasingFn } from '../core/tween/Easings';
import type { TweenManager, TweenProps } from '../core/tween/TweenManager';
import type { TransitionClip } from './TransitionClips';

export interface SceneTransition {
  playOut(): Promise<void>;
  playIn(): Promise<void>;
}

export interface TransitionGateOptions {
  curtain: Container;
  clip: TransitionClip;
  duration: number;
  ease: EasingFn;
  /** Must keep updating while the simulation is paused. */
  tweens: TweenManager;
}

/**
 * Plays the transition clip on a curtain drawn above the scene layer.
 * The curtain starts fully covering so the first scene fades in from it.
 */
export class TransitionGate implements SceneTransition {
  readonly curtain: Container;
  private readonly clip: TransitionClip;
  private readonly duration: number;
  private readonly ease: EasingFn;
  private readonly tweens: TweenManager;

  constructor(opts: TransitionGateOptions) {
    this.curtain = opts.curtain;
    this.clip = opts.clip;
    this.duration = opts.clip.instant ? 0 : Math.max(0, opts.duration);
    this.ease = opts.ease;
    this.tweens = opts.tweens;

    Object.assign(this.curtain, this.clip.to);
    this.curtain.visible = true;
  }

  get covering(): boolean {
    return this.curtain.visible;
  }

  playOut(): Promise<void> {
    return this.play(this.clip.to, true);
  }

  playIn(): Promise<void> {
    return this.play(this.clip.from, false);
  }

  // Starts from wherever the curtain is, so a curtain left covering by a
  // failed transition stays put instead of snapping back to the clip start.
  private play(to: TweenProps<Container>, covered: boolean): Promise<void> {
    const curtain = this.curtain;
    this.tweens.killTweensOf(curtain);

    if (this.reached(to)) {
      curtain.visible = covered;
      return Promise.resolve();
    }

    curtain.visible = true;
    return new Promise<void>((resolve) => {
      this.tweens.to(curtain, to, this.duration, {
        ease: this.ease,
        onComplete: () => {
          curtain.visible = covered;
          resolve();
        },
      });
    });
  }

  private reached(props: TweenProps<Container>): boolean {
    return Object.entries(props).every(([key, value]) => Reflect.get(this.curtain, key) === value);
  }
}
