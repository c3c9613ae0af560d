import EventEmitter from 'eventemitter3';

export interface PauseEvents {
  'pause-changed': [paused: boolean];
}

/**
 * Process-wide "does the simulation advance" flag. Scene updates and scene
 * tweens stop while paused; transition playback does not.
 */
export class PauseController extends EventEmitter<PauseEvents> {
  private _paused = false;

  get paused(): boolean {
    return this._paused;
  }

  setPaused(paused: boolean): void {
    if (this._paused === paused) return;
    this._paused = paused;
    this.emit('pause-changed', paused);
  }
}
