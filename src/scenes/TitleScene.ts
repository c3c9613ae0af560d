import { Container, Graphics } from 'pixi.js';
import { BaseScene } from './BaseScene';
import type { SceneContext } from './SceneContext';
import { Easings } from '../core/tween/Easings';

export class TitleScene extends BaseScene {
  private readonly logo = new Container();

  constructor(ctx: SceneContext) {
    super(ctx, 'title');
    this.layers.ui.addChild(this.logo);
  }

  setup(): void {
    const { width, height } = this.ctx.stage;
    this.layers.background.addChild(new Graphics().rect(0, 0, width, height).fill('#13213a'));
    this.logo.addChild(new Graphics().roundRect(-160, -40, 320, 80, 16).fill('#f2c14e'));
    this.logo.position.set(width * 0.5, height * 0.5 + 40);
    this.logo.alpha = 0;
  }

  // Scene tweens are frozen until the fade-in finished, so this runs visibly.
  start(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.ctx.tweens.to(this.logo, { alpha: 1, y: this.ctx.stage.height * 0.5 }, 0.6, {
        ease: Easings.outCubic,
        onComplete: resolve,
      });
    });
  }

  // Teardown runs paused; the scene tweens would never advance.
  teardown(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.ctx.uiTweens.to(this.logo, { alpha: 0 }, 0.25, { ease: Easings.inQuad, onComplete: resolve });
    });
  }
}
