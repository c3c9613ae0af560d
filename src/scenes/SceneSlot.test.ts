import { describe, expect, it } from 'vitest';
import { Container } from 'pixi.js';
import { SceneSlot } from './SceneSlot';
import type { IScene } from './IScene';

function scene(): IScene {
  return { view: new Container() };
}

describe('SceneSlot', () => {
  it('attaches a scene view to the layer', () => {
    const layer = new Container();
    const slot = new SceneSlot(layer);
    const a = scene();

    slot.attach(a);

    expect(slot.current).toBe(a);
    expect(slot.isEmpty).toBe(false);
    expect(a.view.parent).toBe(layer);
  });

  it('refuses a second occupant', () => {
    const slot = new SceneSlot(new Container());
    slot.attach(scene());

    expect(() => slot.attach(scene())).toThrow('SceneSlot is occupied; release the current scene first');
  });

  it('destroys the occupant and resolves after it left the layer', async () => {
    const layer = new Container();
    const slot = new SceneSlot(layer);
    const a = scene();
    slot.attach(a);

    const released = slot.release();

    expect(slot.isEmpty).toBe(true);
    await released;
    expect(a.view.destroyed).toBe(true);
    expect(layer.children).toHaveLength(0);
  });

  it('resolves at once when already empty', async () => {
    const slot = new SceneSlot(new Container());

    await expect(slot.release()).resolves.toBeUndefined();
  });

  it('destroys child containers with the scene', async () => {
    const slot = new SceneSlot(new Container());
    const a = scene();
    const child = new Container();
    a.view.addChild(child);
    slot.attach(a);

    await slot.release();

    expect(child.destroyed).toBe(true);
  });
});
