import type { Container } from 'pixi.js';
import { StateMachine, type TransitionMap } from '../core/state/StateMachine';
import { isPromiseLike, toError } from '../core/async/awaitable';
import type { ReentryPolicy } from '../core/config/EnvDirectorConfig';
import type { Trace } from '../core/log/trace';
import type { IScene, SceneParams } from './IScene';
import type { SceneContext } from './SceneContext';
import type { SceneLoader } from './SceneLoader';
import { invokeHook } from './SceneHooks';
import { SceneSlot } from './SceneSlot';
import { describeTarget, type SceneTarget } from './SceneTarget';
import type { SceneTransition } from './TransitionGate';
import { TransitionBusyError } from './errors';

export type TransitionPhase =
  | 'idle'
  | 'teardown'
  | 'fade-out'
  | 'release'
  | 'load'
  | 'setup'
  | 'fade-in'
  | 'start'
  | 'failed';

const PHASES: TransitionMap<TransitionPhase> = {
  idle: ['teardown', 'load'],
  failed: ['teardown', 'load'],
  teardown: ['fade-out', 'failed'],
  'fade-out': ['release', 'failed'],
  release: ['load', 'failed'],
  load: ['setup', 'failed'],
  setup: ['fade-in', 'failed'],
  'fade-in': ['start', 'failed'],
  start: ['idle', 'failed'],
};

export interface SceneManagerOptions {
  root: Container;
  ctx: SceneContext;
  loader: SceneLoader;
  transition: SceneTransition;
  reentry: ReentryPolicy;
  trace: Trace;
}

/**
 * Owns the single active scene and runs scene changes one at a time:
 *
 *   pause -> teardown -> fade out -> release -> load -> attach
 *         -> setup -> fade in -> unpause -> start
 *
 * The outgoing half is skipped when nothing is attached yet.
 */
export class SceneManager {
  private readonly slot: SceneSlot;
  private readonly ctx: SceneContext;
  private readonly loader: SceneLoader;
  private readonly transition: SceneTransition;
  private readonly reentry: ReentryPolicy;
  private readonly trace: Trace;
  private readonly phases: StateMachine<TransitionPhase>;

  // Transitions accepted but not finished, the running one included.
  private pending = 0;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(opts: SceneManagerOptions) {
    this.slot = new SceneSlot(opts.root);
    this.ctx = opts.ctx;
    this.loader = opts.loader;
    this.transition = opts.transition;
    this.reentry = opts.reentry;
    this.trace = opts.trace;
    this.phases = new StateMachine<TransitionPhase>('idle', PHASES, {
      onChange: (prev, next) => this.trace(`${prev} → ${next}`),
    });
  }

  get current(): IScene | null {
    return this.slot.current;
  }

  get phase(): TransitionPhase {
    return this.phases.state;
  }

  get transitioning(): boolean {
    return this.pending > 0;
  }

  changeScene(target: SceneTarget, params: SceneParams = []): Promise<boolean> {
    if (this.pending > 0 && this.reentry === 'reject') {
      return Promise.reject(new TransitionBusyError(describeTarget(target)));
    }

    const idle = this.pending === 0;
    this.pending++;
    const run = (): Promise<boolean> => this.run(target, params);
    const result = (idle ? run() : this.tail.then(run, run)).finally(() => {
      this.pending--;
    });
    // The chain only orders transitions; each caller still sees its own outcome.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  update(dt: number): void {
    if (this.ctx.pause.paused) return;
    this.slot.current?.update?.(dt);
  }

  /** Drops the active scene without running any hooks. */
  destroy(): void {
    void this.slot.release();
  }

  private async run(target: SceneTarget, params: SceneParams): Promise<boolean> {
    const { pause, events, frames } = this.ctx;
    this.trace(`changeScene ${describeTarget(target)}`);
    pause.setPaused(true);

    try {
      const previous = this.slot.current;
      if (previous) {
        this.enter('teardown');
        await invokeHook(previous, 'teardown');
        events.emit('teardown-done');

        this.enter('fade-out');
        await this.transition.playOut();

        this.enter('release');
        await frames.nextFrame();
        await this.slot.release();
      }

      this.enter('load');
      const resolved = this.loader.resolve(target, this.ctx);
      const next = isPromiseLike(resolved) ? await resolved : resolved;
      this.slot.attach(next);

      this.enter('setup');
      await invokeHook(next, 'setup', params);
      events.emit('setup-done');

      this.enter('fade-in');
      await this.transition.playIn();
      pause.setPaused(false);

      this.enter('start');
      await invokeHook(next, 'start');
      events.emit('start-done');

      this.enter('idle');
      return true;
    } catch (err) {
      const error = toError(err);
      this.phases.set('failed');
      console.error(`[SceneManager] Transition to ${describeTarget(target)} failed`, error);
      events.emit('transition-failed', error);
      throw error;
    }
  }

  private enter(phase: TransitionPhase): void {
    if (!this.phases.set(phase)) {
      throw new Error(`SceneManager cannot move from ${this.phases.state} to ${phase}`);
    }
  }
}
