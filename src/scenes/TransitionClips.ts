import type { Container } from 'pixi.js';
import type { TweenProps } from '../core/tween/TweenManager';
import type { TransitionClipName } from '../core/config/EnvDirectorConfig';

/**
 * A curtain animation. Playing it forward covers the stage ("out"),
 * backward uncovers it ("in").
 */
export interface TransitionClip {
  readonly name: TransitionClipName;
  readonly from: TweenProps<Container>;
  readonly to: TweenProps<Container>;
  /** Clips that snap ignore the configured duration. */
  readonly instant: boolean;
}

export const TransitionClips: Record<TransitionClipName, TransitionClip> = {
  fade: { name: 'fade', from: { alpha: 0 }, to: { alpha: 1 }, instant: false },
  cut: { name: 'cut', from: { alpha: 0 }, to: { alpha: 1 }, instant: true },
};
