import type { SceneTemplate } from './SceneTarget';

export type SceneModuleLoader = () => Promise<SceneTemplate>;

export interface SceneCatalogEntry {
  load: SceneModuleLoader;
  /** Asset URLs fetched through PixiJS Assets before the module loads. */
  assets?: readonly string[];
}

/**
 * Address -> lazily loaded scene template. Typically filled with dynamic
 * imports so each scene ships as its own chunk.
 */
export class SceneCatalog {
  private readonly entries = new Map<string, SceneCatalogEntry>();

  register(address: string, entry: SceneCatalogEntry | SceneModuleLoader): this {
    if (this.entries.has(address)) throw new Error(`Scene "${address}" is already registered`);
    this.entries.set(address, typeof entry === 'function' ? { load: entry } : entry);
    return this;
  }

  get(address: string): SceneCatalogEntry | undefined {
    return this.entries.get(address);
  }
}
