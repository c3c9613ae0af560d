export { GameApp, type GameAppOptions } from './app/GameApp';

export { SceneManager, type SceneManagerOptions, type TransitionPhase } from './scenes/SceneManager';
export { SceneLoader, type AssetFetcher, type LoadStatus, type SceneLoaderOptions } from './scenes/SceneLoader';
export { SceneCatalog, type SceneCatalogEntry, type SceneModuleLoader } from './scenes/SceneCatalog';
export { SceneSlot } from './scenes/SceneSlot';
export { SceneEvents, type SceneEventMap, type SceneEventName } from './scenes/SceneEvents';
export { SceneTarget, sceneTemplate, describeTarget, type SceneTemplate } from './scenes/SceneTarget';
export { isQualifiedAddress, resolveSceneAddress, type SceneAddressing } from './scenes/SceneAddress';
export { hasHook, invokeHook, SCENE_HOOKS, type SceneHook } from './scenes/SceneHooks';
export { TransitionGate, type SceneTransition, type TransitionGateOptions } from './scenes/TransitionGate';
export { TransitionClips, type TransitionClip } from './scenes/TransitionClips';
export { BaseScene } from './scenes/BaseScene';
export { SceneLoadError, TransitionBusyError, type SceneLoadFailure } from './scenes/errors';
export type { IScene, SceneParams } from './scenes/IScene';
export type { SceneContext, LoadProgressSource, StageSize } from './scenes/SceneContext';

export { PauseController, type PauseEvents } from './core/pause/PauseController';
export { FrameScheduler } from './core/time/FrameScheduler';
export { TweenManager, type TweenOptions, type TweenProps } from './core/tween/TweenManager';
export { Easings, type EasingFn, type EasingName } from './core/tween/Easings';
export { StateMachine, type TransitionMap } from './core/state/StateMachine';
export {
  loadEnvDirectorConfig,
  type DirectorConfig,
  type ReentryPolicy,
  type TransitionClipName,
} from './core/config/EnvDirectorConfig';
export { createTrace, type Trace } from './core/log/trace';
