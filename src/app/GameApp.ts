import { Container, Graphics, type Ticker } from 'pixi.js';
import { SceneManager } from '../scenes/SceneManager';
import { SceneLoader, type AssetFetcher } from '../scenes/SceneLoader';
import type { SceneCatalog } from '../scenes/SceneCatalog';
import type { SceneContext } from '../scenes/SceneContext';
import { SceneEvents } from '../scenes/SceneEvents';
import type { SceneParams } from '../scenes/IScene';
import type { SceneTarget } from '../scenes/SceneTarget';
import { TransitionGate } from '../scenes/TransitionGate';
import { TransitionClips } from '../scenes/TransitionClips';
import { TweenManager } from '../core/tween/TweenManager';
import { Easings } from '../core/tween/Easings';
import { FrameScheduler } from '../core/time/FrameScheduler';
import { PauseController } from '../core/pause/PauseController';
import { loadEnvDirectorConfig, type DirectorConfig } from '../core/config/EnvDirectorConfig';
import { createTrace } from '../core/log/trace';

export interface GameAppOptions {
  catalog: SceneCatalog;
  /** Applied on top of the environment configuration. */
  config?: Partial<DirectorConfig>;
  /** Drives `tick` once started. Without one the host calls `tick` itself. */
  ticker?: Ticker;
  curtain?: Container;
  assets?: AssetFetcher;
}

function createCurtain(config: DirectorConfig): Container {
  const curtain = new Container();
  curtain.label = 'curtain';
  curtain.addChild(new Graphics().rect(0, 0, config.stageWidth, config.stageHeight).fill(config.curtainColor));
  return curtain;
}

/**
 * Composition root: one stage, one scene layer, one curtain above it.
 */
export class GameApp {
  readonly config: DirectorConfig;
  readonly stage = new Container();
  readonly events = new SceneEvents();
  readonly pause = new PauseController();
  readonly scenes: SceneManager;
  readonly loader: SceneLoader;

  private readonly sceneLayer = new Container();
  private readonly tweens = new TweenManager();
  // Curtain and loading-UI tweens keep running while the simulation is paused.
  private readonly overlayTweens = new TweenManager();
  private readonly frames = new FrameScheduler();
  private readonly gate: TransitionGate;
  private readonly ticker: Ticker | null;

  private started = false;

  constructor(opts: GameAppOptions) {
    this.config = { ...loadEnvDirectorConfig(), ...opts.config };
    this.ticker = opts.ticker ?? null;
    const trace = createTrace('SceneManager', this.config.traceLog);

    this.loader = new SceneLoader({
      catalog: opts.catalog,
      addressing: { base: this.config.sceneBase, entry: this.config.sceneEntry },
      assets: opts.assets,
      trace: createTrace('SceneLoader', this.config.traceLog),
    });

    const ctx: SceneContext = {
      stage: { width: this.config.stageWidth, height: this.config.stageHeight },
      tweens: this.tweens,
      uiTweens: this.overlayTweens,
      frames: this.frames,
      pause: this.pause,
      events: this.events,
      loading: this.loader,
    };

    this.gate = new TransitionGate({
      curtain: opts.curtain ?? createCurtain(this.config),
      clip: TransitionClips[this.config.transitionClip],
      duration: this.config.transitionDuration,
      ease: Easings[this.config.transitionEase],
      tweens: this.overlayTweens,
    });

    this.sceneLayer.label = 'scenes';
    this.stage.addChild(this.sceneLayer, this.gate.curtain);

    this.scenes = new SceneManager({
      root: this.sceneLayer,
      ctx,
      loader: this.loader,
      transition: this.gate,
      reentry: this.config.reentry,
      trace,
    });
  }

  /** Boots the first scene. Later changes go through `scenes.changeScene`. */
  async start(initial: SceneTarget, params: SceneParams = []): Promise<boolean> {
    if (this.started) return false;
    this.started = true;

    this.ticker?.add(this.update);
    return this.scenes.changeScene(initial, params);
  }

  /** One frame, dt in seconds. */
  tick(dt: number): void {
    this.frames.tick();
    this.overlayTweens.update(dt);
    if (this.pause.paused) return;

    this.tweens.update(dt);
    this.scenes.update(dt);
  }

  destroy(): void {
    this.ticker?.remove(this.update);
    this.tweens.clear();
    this.overlayTweens.clear();
    this.scenes.destroy();
    this.events.removeAllListeners();
    this.pause.removeAllListeners();
    this.stage.destroy({ children: true });
  }

  private readonly update = (ticker: Ticker): void => {
    this.tick(ticker.deltaMS / 1000);
  };
}
