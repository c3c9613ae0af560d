import EventEmitter from 'eventemitter3';

export interface SceneEventMap {
  'teardown-done': [];
  'setup-done': [];
  'start-done': [];
  'transition-failed': [error: Error];
}

export type SceneEventName = keyof SceneEventMap;

export class SceneEvents extends EventEmitter<SceneEventMap> {}
