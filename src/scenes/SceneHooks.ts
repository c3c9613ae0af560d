import type { IScene, SceneParams } from './IScene';

export type SceneHook = 'teardown' | 'setup' | 'start';

export const SCENE_HOOKS: readonly SceneHook[] = ['teardown', 'setup', 'start'];

export function hasHook(scene: IScene, hook: SceneHook): boolean {
  switch (hook) {
    case 'teardown':
      return typeof scene.teardown === 'function';
    case 'setup':
      return typeof scene.setup === 'function';
    case 'start':
      return typeof scene.start === 'function';
  }
}

/**
 * Awaits the hook when the scene has it. An absent hook still costs the same
 * await, so pipeline timing does not depend on which hooks a scene defines.
 */
export async function invokeHook(scene: IScene, hook: SceneHook, params: SceneParams = []): Promise<void> {
  switch (hook) {
    case 'teardown':
      await scene.teardown?.();
      return;
    case 'setup':
      await scene.setup?.(params);
      return;
    case 'start':
      await scene.start?.();
      return;
  }
}
