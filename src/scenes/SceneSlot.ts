import type { Container } from 'pixi.js';
import type { IScene } from './IScene';

function waitForRemoval(view: Container): Promise<void> {
  if (!view.parent) return Promise.resolve();
  return new Promise<void>((resolve) => {
    const done = (): void => {
      view.off('removed', done);
      view.off('destroyed', done);
      resolve();
    };
    view.once('removed', done);
    view.once('destroyed', done);
  });
}

/**
 * Holds the single active scene inside a display layer.
 */
export class SceneSlot {
  private readonly layer: Container;
  private occupant: IScene | null = null;

  constructor(layer: Container) {
    this.layer = layer;
  }

  get current(): IScene | null {
    return this.occupant;
  }

  get isEmpty(): boolean {
    return this.occupant === null;
  }

  attach(scene: IScene): void {
    if (this.occupant) throw new Error('SceneSlot is occupied; release the current scene first');
    this.layer.addChild(scene.view);
    this.occupant = scene;
  }

  /** Destroys the occupant and resolves once its view left the layer. */
  release(): Promise<void> {
    const scene = this.occupant;
    if (!scene) return Promise.resolve();
    this.occupant = null;

    const removed = waitForRemoval(scene.view);
    scene.view.destroy({ children: true });
    return removed;
  }
}
