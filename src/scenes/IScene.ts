import type { Container } from 'pixi.js';
import type { Awaitable } from '../core/async/awaitable';

export type SceneParams = readonly unknown[];

/**
 * Active content managed by the SceneManager. Every lifecycle hook is
 * optional; an absent hook is skipped with the same timing as one that
 * resolves immediately.
 */
export interface IScene {
  readonly view: Container;

  /** Runs before the outgoing scene is faded out and destroyed. */
  teardown?(): Awaitable;
  /** Runs after the scene is attached, before the fade-in. */
  setup?(params: SceneParams): Awaitable;
  /** Runs once the fade-in finished and the simulation is unpaused. */
  start?(): Awaitable;

  update?(dt: number): void;
}
