import { Container } from 'pixi.js';
import type { IScene } from './IScene';
import type { SceneContext } from './SceneContext';

/**
 * Standard layered scene root:
 * background -> game -> effects -> ui
 *
 * Subclasses add whichever of teardown / setup / start they need.
 */
export abstract class BaseScene implements IScene {
  readonly view = new Container();

  protected readonly layers = {
    background: new Container(),
    game: new Container(),
    effects: new Container(),
    ui: new Container(),
  } as const;

  protected readonly ctx: SceneContext;

  constructor(ctx: SceneContext, label: string) {
    this.ctx = ctx;
    this.view.label = label;
    this.view.addChild(this.layers.background, this.layers.game, this.layers.effects, this.layers.ui);
  }

  update(_dt: number): void {
    // Override in subclasses.
  }
}
