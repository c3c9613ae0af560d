import type { TweenManager } from '../core/tween/TweenManager';
import type { FrameScheduler } from '../core/time/FrameScheduler';
import type { PauseController } from '../core/pause/PauseController';
import type { SceneEvents } from './SceneEvents';
import type { LoadStatus } from './SceneLoader';

export interface LoadProgressSource {
  status(id: string): LoadStatus;
  progress(id: string): number;
}

export interface StageSize {
  width: number;
  height: number;
}

export interface SceneContext {
  stage: StageSize;
  /** Scene tweens; frozen while the simulation is paused. */
  tweens: TweenManager;
  /**
   * Keeps running while paused. Teardown and setup always run paused, so
   * loading UI they animate belongs here.
   */
  uiTweens: TweenManager;
  frames: FrameScheduler;
  pause: PauseController;
  events: SceneEvents;
  /** Status and progress of identifier loads, for loading screens. */
  loading: LoadProgressSource;
}
