import { isEasingName, type EasingName } from '../tween/Easings';

export type TransitionClipName = 'fade' | 'cut';
export type ReentryPolicy = 'reject' | 'queue';

export interface DirectorConfig {
  sceneBase: string;
  sceneEntry: string;

  transitionClip: TransitionClipName;
  transitionDuration: number; // seconds
  transitionEase: EasingName;
  reentry: ReentryPolicy;

  stageWidth: number;
  stageHeight: number;
  curtainColor: string;

  traceLog: boolean;
}

export type EnvSource = Readonly<Record<string, string | undefined>>;

function num(v: unknown, def: number): number {
  if (v === undefined || v === null) return def;
  if (typeof v === 'number') return Number.isFinite(v) ? v : def;

  // Tolerate trailing comments or junk, e.g. "0.5 # seconds".
  const s = String(v).trim();
  if (!s) return def;
  const m = s.match(/-?\d+(\.\d+)?/);
  if (!m) return def;
  const n = Number(m[0]);
  return Number.isFinite(n) ? n : def;
}

function bool(v: unknown, def = false): boolean {
  if (v === undefined || v === null || v === '') return def;
  if (typeof v === 'boolean') return v;
  const s = String(v).trim().toLowerCase();
  return s === '1' || s === 'true' || s === 'yes' || s === 'on';
}

function str(v: unknown, def: string): string {
  if (typeof v !== 'string') return def;
  const s = v.trim();
  return s || def;
}

function oneOf<T extends string>(v: unknown, allowed: readonly T[], def: T): T {
  const s = str(v, def).toLowerCase();
  for (const a of allowed) if (a.toLowerCase() === s) return a;
  return def;
}

function ease(v: unknown, def: EasingName): EasingName {
  const s = str(v, def);
  return isEasingName(s) ? s : def;
}

function trimSlashes(s: string): string {
  return s.replace(/\/+$/, '').replace(/^\/+(?=.)/, '/');
}

export function loadEnvDirectorConfig(env: EnvSource = process.env): DirectorConfig {
  return {
    sceneBase: trimSlashes(str(env.SCENE_BASE, 'scenes')),
    sceneEntry: str(env.SCENE_ENTRY, 'scene'),

    transitionClip: oneOf(env.TRANSITION_CLIP, ['fade', 'cut'], 'fade'),
    transitionDuration: Math.max(0, num(env.TRANSITION_DURATION, 0.35)),
    transitionEase: ease(env.TRANSITION_EASE, 'inOutCubic'),
    reentry: oneOf(env.TRANSITION_REENTRY, ['reject', 'queue'], 'reject'),

    stageWidth: Math.max(1, num(env.STAGE_WIDTH, 1280)),
    stageHeight: Math.max(1, num(env.STAGE_HEIGHT, 720)),
    curtainColor: str(env.CURTAIN_COLOR, '#0b0f1a'),

    traceLog: bool(env.TRACE_LOG, false),
  };
}
