import type { IScene } from './IScene';
import type { SceneContext } from './SceneContext';

/** A prebuilt scene resource; instantiating it never suspends. */
export interface SceneTemplate {
  readonly address?: string;
  instantiate(ctx: SceneContext): IScene;
}

export type SceneTarget =
  | { readonly kind: 'built'; readonly scene: IScene }
  | { readonly kind: 'identifier'; readonly id: string }
  | { readonly kind: 'template'; readonly template: SceneTemplate };

export const SceneTarget = {
  built: (scene: IScene): SceneTarget => ({ kind: 'built', scene }),
  identifier: (id: string): SceneTarget => ({ kind: 'identifier', id }),
  template: (template: SceneTemplate): SceneTarget => ({ kind: 'template', template }),
} as const;

export function sceneTemplate(instantiate: (ctx: SceneContext) => IScene, address?: string): SceneTemplate {
  return { address, instantiate };
}

export function describeTarget(target: SceneTarget): string {
  switch (target.kind) {
    case 'built':
      return target.scene.view.label ? `scene "${target.scene.view.label}"` : 'prebuilt scene';
    case 'identifier':
      return `"${target.id}"`;
    case 'template':
      return target.template.address ? `template "${target.template.address}"` : 'template';
  }
}
