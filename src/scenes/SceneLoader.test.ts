import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Container } from 'pixi.js';
import { SceneLoader, type AssetFetcher } from './SceneLoader';
import { SceneCatalog } from './SceneCatalog';
import { SceneTarget, sceneTemplate } from './SceneTarget';
import { SceneLoadError } from './errors';
import type { IScene } from './IScene';
import { createHarness, deferred } from '../test/harness';
import { createTrace } from '../core/log/trace';

function scene(label: string): IScene {
  const view = new Container();
  view.label = label;
  return { view };
}

function createLoader(catalog: SceneCatalog, assets?: AssetFetcher): SceneLoader {
  return new SceneLoader({
    catalog,
    addressing: { base: 'scenes', entry: 'scene' },
    assets,
    trace: createTrace('SceneLoader', false),
  });
}

describe('SceneLoader', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns prebuilt scenes synchronously', () => {
    const { ctx } = createHarness();
    const loader = createLoader(new SceneCatalog());
    const built = scene('built');

    expect(loader.resolve(SceneTarget.built(built), ctx)).toBe(built);
  });

  it('instantiates templates synchronously with the context', () => {
    const { ctx } = createHarness();
    const loader = createLoader(new SceneCatalog());
    const made = scene('made');
    const instantiate = vi.fn(() => made);

    expect(loader.resolve(SceneTarget.template({ instantiate }), ctx)).toBe(made);
    expect(instantiate).toHaveBeenCalledWith(ctx);
  });

  it('loads identifiers in the background and instantiates the template', async () => {
    const { ctx } = createHarness();
    const catalog = new SceneCatalog();
    const made = scene('level1');
    catalog.register('scenes/level1/scene', async () => sceneTemplate(() => made));
    const loader = createLoader(catalog);

    const pending = loader.resolve(SceneTarget.identifier('level1'), ctx);

    expect(pending).toBeInstanceOf(Promise);
    expect(loader.status('level1')).toBe('loading');
    await expect(pending).resolves.toBe(made);
    expect(loader.status('level1')).toBe('loaded');
    expect(loader.progress('level1')).toBe(1);
  });

  it('accepts fully qualified addresses', async () => {
    const catalog = new SceneCatalog();
    const template = sceneTemplate(() => scene('boss'));
    catalog.register('scenes/boss/arena', async () => template);
    const loader = createLoader(catalog);

    await expect(loader.load('scenes/boss/arena')).resolves.toBe(template);
    expect(loader.address('scenes/boss/arena')).toBe('scenes/boss/arena');
  });

  it('caches a loaded template per address', async () => {
    const catalog = new SceneCatalog();
    const load = vi.fn(async () => sceneTemplate(() => scene('menu')));
    catalog.register('scenes/menu/scene', load);
    const loader = createLoader(catalog);

    const first = await loader.preload('menu');
    const second = await loader.load('scenes/menu/scene');

    expect(second).toBe(first);
    expect(load).toHaveBeenCalledTimes(1);
  });

  it('joins a request that is already in flight', async () => {
    const catalog = new SceneCatalog();
    const gate = deferred();
    const load = vi.fn(async () => {
      await gate.promise;
      return sceneTemplate(() => scene('menu'));
    });
    catalog.register('scenes/menu/scene', load);
    const loader = createLoader(catalog);

    const a = loader.load('menu');
    const b = loader.load('menu');
    gate.resolve();

    expect(await a).toBe(await b);
    expect(load).toHaveBeenCalledTimes(1);
  });

  it('records failures and retries on the next request', async () => {
    const catalog = new SceneCatalog();
    const boom = new Error('network down');
    const template = sceneTemplate(() => scene('menu'));
    const load = vi.fn<() => Promise<typeof template>>().mockRejectedValueOnce(boom).mockResolvedValueOnce(template);
    catalog.register('scenes/menu/scene', load);
    const loader = createLoader(catalog);

    const failure = await loader.load('menu').catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(SceneLoadError);
    expect(failure).toMatchObject({ status: 'failed', address: 'scenes/menu/scene', cause: boom });
    expect(loader.status('menu')).toBe('failed');

    await expect(loader.load('menu')).resolves.toBe(template);
    expect(loader.status('menu')).toBe('loaded');
  });

  it('rejects identifiers missing from the catalog as invalid', async () => {
    const loader = createLoader(new SceneCatalog());

    await expect(loader.load('ghost')).rejects.toMatchObject({
      name: 'SceneLoadError',
      status: 'invalid',
      message: 'No scene registered at "scenes/ghost/scene"',
    });
    expect(loader.status('ghost')).toBe('invalid');
  });

  it('reports idle for identifiers never requested', () => {
    const loader = createLoader(new SceneCatalog());

    expect(loader.status('menu')).toBe('idle');
    expect(loader.progress('menu')).toBe(0);
  });

  it('fetches catalog assets first and reports their progress', async () => {
    const catalog = new SceneCatalog();
    catalog.register('scenes/forest/scene', {
      load: async () => sceneTemplate(() => scene('forest')),
      assets: ['forest/bg.png', 'forest/trees.json'],
    });
    const fetched = deferred();
    const assets: AssetFetcher = {
      load: vi.fn(async (_urls: string[], onProgress: (p: number) => void) => {
        onProgress(0.5);
        await fetched.promise;
        onProgress(1);
      }),
    };
    const loader = createLoader(catalog, assets);

    const pending = loader.load('forest');

    expect(assets.load).toHaveBeenCalledWith(['forest/bg.png', 'forest/trees.json'], expect.any(Function));
    expect(loader.progress('forest')).toBe(0.45);
    fetched.resolve();
    await pending;
    expect(loader.progress('forest')).toBe(1);
  });
});
