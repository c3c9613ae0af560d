import { afterEach, describe, expect, it, vi } from 'vitest';
import { LevelScene } from './LevelScene';
import { TitleScene } from './TitleScene';
import { createHarness } from '../test/harness';

describe('LevelScene', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('takes the level number from the first param', () => {
    const { ctx } = createHarness();
    const scene = new LevelScene(ctx);

    scene.setup([4]);

    expect(scene.levelNumber).toBe(4);
    expect(scene.view.label).toBe('level');
  });

  it('keeps level 1 for missing or invalid params', () => {
    const { ctx } = createHarness();
    const scene = new LevelScene(ctx);

    scene.setup(['four', 2]);

    expect(scene.levelNumber).toBe(1);
  });

  it('logs the time spent on teardown', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { ctx } = createHarness();
    const scene = new LevelScene(ctx);
    scene.setup([2]);
    scene.update(1.25);

    scene.teardown();

    expect(log).toHaveBeenCalledWith('[LevelScene] leaving level 2 after 1.3s');
  });
});

describe('TitleScene', () => {
  it('finishes start once the logo tween completes', async () => {
    const { ctx } = createHarness();
    const scene = new TitleScene(ctx);
    scene.setup();

    const started = scene.start();
    ctx.tweens.update(0.6);
    await started;

    const logo = scene.view.children[3]?.children[0];
    expect(logo?.alpha).toBe(1);
    expect(logo?.y).toBe(360);
  });

  it('fades the logo out on the pause-exempt tweens during teardown', async () => {
    const { ctx, pause } = createHarness();
    const scene = new TitleScene(ctx);
    scene.setup();
    const started = scene.start();
    ctx.tweens.update(0.6);
    await started;

    pause.setPaused(true);
    const leaving = scene.teardown();
    ctx.uiTweens.update(0.25);
    await leaving;

    expect(scene.view.children[3]?.children[0]?.alpha).toBe(0);
  });
});
