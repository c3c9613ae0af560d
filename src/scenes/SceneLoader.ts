import { Assets } from 'pixi.js';
import type { Trace } from '../core/log/trace';
import type { IScene } from './IScene';
import type { SceneCatalog, SceneCatalogEntry } from './SceneCatalog';
import type { SceneContext } from './SceneContext';
import { resolveSceneAddress, type SceneAddressing } from './SceneAddress';
import type { SceneTarget, SceneTemplate } from './SceneTarget';
import { SceneLoadError } from './errors';

export type LoadStatus = 'idle' | 'loading' | 'loaded' | 'failed' | 'invalid';

export interface AssetFetcher {
  load(urls: string[], onProgress: (progress: number) => void): Promise<unknown>;
}

const pixiAssets: AssetFetcher = {
  load: (urls, onProgress) => Assets.load(urls, onProgress),
};

// Share of the progress bar taken by asset fetching when an entry has assets.
const ASSET_SHARE = 0.9;

interface LoadRequest {
  readonly address: string;
  status: LoadStatus;
  progress: number;
  template?: SceneTemplate;
  error?: SceneLoadError;
  /** Settles when the request reaches a terminal status. Never rejects. */
  readonly done: Promise<void>;
}

export interface SceneLoaderOptions {
  catalog: SceneCatalog;
  addressing: SceneAddressing;
  assets?: AssetFetcher;
  trace: Trace;
}

/**
 * Turns a SceneTarget into a scene. Built scenes and templates resolve
 * synchronously; identifiers go through a cached background request.
 */
export class SceneLoader {
  private readonly catalog: SceneCatalog;
  private readonly addressing: SceneAddressing;
  private readonly assets: AssetFetcher;
  private readonly trace: Trace;
  private readonly requests = new Map<string, LoadRequest>();

  constructor(opts: SceneLoaderOptions) {
    this.catalog = opts.catalog;
    this.addressing = opts.addressing;
    this.assets = opts.assets ?? pixiAssets;
    this.trace = opts.trace;
  }

  address(id: string): string {
    return resolveSceneAddress(id, this.addressing);
  }

  status(id: string): LoadStatus {
    return this.requests.get(this.address(id))?.status ?? 'idle';
  }

  progress(id: string): number {
    return this.requests.get(this.address(id))?.progress ?? 0;
  }

  resolve(target: SceneTarget, ctx: SceneContext): IScene | Promise<IScene> {
    switch (target.kind) {
      case 'built':
        return target.scene;
      case 'template':
        return target.template.instantiate(ctx);
      case 'identifier':
        return this.load(target.id).then((template) => template.instantiate(ctx));
    }
  }

  /** Starts the background load early; later loads of `id` share the request. */
  preload(id: string): Promise<SceneTemplate> {
    return this.load(id);
  }

  async load(id: string): Promise<SceneTemplate> {
    const req = this.request(this.address(id));
    await req.done;
    if (req.status === 'loaded' && req.template) return req.template;
    throw req.error ?? new SceneLoadError(req.address, 'failed');
  }

  private request(address: string): LoadRequest {
    const existing = this.requests.get(address);
    if (existing && (existing.status === 'loading' || existing.status === 'loaded')) return existing;

    const entry = this.catalog.get(address);
    if (!entry) {
      const invalid: LoadRequest = {
        address,
        status: 'invalid',
        progress: 0,
        error: new SceneLoadError(address, 'invalid'),
        done: Promise.resolve(),
      };
      this.requests.set(address, invalid);
      this.trace(`"${address}" is not in the catalog`);
      return invalid;
    }

    let settle: () => void = () => {};
    const req: LoadRequest = {
      address,
      status: 'loading',
      progress: 0,
      done: new Promise<void>((resolve) => {
        settle = resolve;
      }),
    };
    this.requests.set(address, req);
    this.trace(`loading "${address}"`);
    this.fetch(req, entry).then(settle, settle);
    return req;
  }

  private async fetch(req: LoadRequest, entry: SceneCatalogEntry): Promise<void> {
    try {
      const urls = entry.assets ? [...entry.assets] : [];
      if (urls.length > 0) {
        await this.assets.load(urls, (p) => {
          req.progress = Math.min(1, Math.max(0, p)) * ASSET_SHARE;
        });
      }
      req.template = await entry.load();
      req.progress = 1;
      req.status = 'loaded';
      this.trace(`loaded "${req.address}"`);
    } catch (err) {
      req.status = 'failed';
      req.error = new SceneLoadError(req.address, 'failed', { cause: err });
      console.error(`[SceneLoader] "${req.address}" failed to load`, err);
    }
  }
}
