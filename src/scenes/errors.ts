export type SceneLoadFailure = 'failed' | 'invalid';

export class SceneLoadError extends Error {
  readonly address: string;
  readonly status: SceneLoadFailure;

  constructor(address: string, status: SceneLoadFailure, options?: { cause?: unknown }) {
    super(
      status === 'invalid'
        ? `No scene registered at "${address}"`
        : `Scene "${address}" failed to load`,
      options,
    );
    this.name = 'SceneLoadError';
    this.address = address;
    this.status = status;
  }
}

export class TransitionBusyError extends Error {
  readonly target: string;

  constructor(target: string) {
    super(`Cannot change scene to ${target}: a transition is already running`);
    this.name = 'TransitionBusyError';
    this.target = target;
  }
}
