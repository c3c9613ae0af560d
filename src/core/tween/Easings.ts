export type EasingFn = (t: number) => number;

export const Easings = {
  linear: (t: number) => t,

  inQuad: (t: number) => t * t,
  outQuad: (t: number) => 1 - (1 - t) * (1 - t),

  outCubic: (t: number) => 1 - Math.pow(1 - t, 3),
  inCubic: (t: number) => t * t * t,
  inOutCubic: (t: number) => (t < 0.5 ? 4 * t * t * t : 1 - Math.pow(-2 * t + 2, 3) / 2),

  inOutSine: (t: number) => -(Math.cos(Math.PI * t) - 1) / 2,
} satisfies Record<string, EasingFn>;

export type EasingName = keyof typeof Easings;

export function isEasingName(name: string): name is EasingName {
  return Object.prototype.hasOwnProperty.call(Easings, name);
}
