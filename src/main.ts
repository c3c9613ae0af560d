import './app/headless';
import { Ticker } from 'pixi.js';
import { GameApp } from './app/GameApp';
import { SceneCatalog } from './scenes/SceneCatalog';
import { SceneTarget, sceneTemplate } from './scenes/SceneTarget';

// Headless run: a manually driven ticker stands in for requestAnimationFrame.
const FRAME_MS = 1000 / 60;

const catalog = new SceneCatalog()
  .register('scenes/title/scene', async () => {
    const { TitleScene } = await import('./scenes/TitleScene');
    return sceneTemplate((ctx) => new TitleScene(ctx), 'scenes/title/scene');
  })
  .register('scenes/level1/scene', async () => {
    const { LevelScene } = await import('./scenes/LevelScene');
    return sceneTemplate((ctx) => new LevelScene(ctx), 'scenes/level1/scene');
  });

async function main(): Promise<void> {
  const ticker = new Ticker();
  const game = new GameApp({ catalog, ticker, config: { traceLog: true } });
  const timer = setInterval(() => ticker.update(performance.now()), FRAME_MS);

  game.events.on('start-done', () => {
    console.log(`[main] active: ${game.scenes.current?.view.label ?? 'none'}`);
  });

  try {
    await game.start(SceneTarget.identifier('title'));
    await game.scenes.changeScene(SceneTarget.identifier('level1'), [1]);
  } finally {
    clearInterval(timer);
    game.destroy();
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
