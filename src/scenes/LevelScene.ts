import { Graphics } from 'pixi.js';
import { BaseScene } from './BaseScene';
import type { SceneContext } from './SceneContext';
import type { SceneParams } from './IScene';

export class LevelScene extends BaseScene {
  private level = 1;
  private elapsed = 0;
  private readonly marker = new Graphics();

  constructor(ctx: SceneContext) {
    super(ctx, 'level');
    this.layers.game.addChild(this.marker);
  }

  get levelNumber(): number {
    return this.level;
  }

  setup(params: SceneParams): void {
    const [level] = params;
    if (typeof level === 'number' && Number.isInteger(level) && level > 0) this.level = level;

    const { width, height } = this.ctx.stage;
    this.layers.background.addChild(new Graphics().rect(0, 0, width, height).fill('#0f2a1d'));
    this.marker.circle(0, 0, 24 + this.level * 4).fill('#6fd08c');
    this.marker.position.set(width * 0.5, height * 0.5);
  }

  update(dt: number): void {
    this.elapsed += dt;
    this.marker.x = this.ctx.stage.width * 0.5 + Math.sin(this.elapsed * 2) * 120;
  }

  teardown(): void {
    console.log(`[LevelScene] leaving level ${this.level} after ${this.elapsed.toFixed(1)}s`);
  }
}
