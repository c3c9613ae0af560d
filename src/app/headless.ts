import { JSDOM } from 'jsdom';

// PixiJS reads browser globals while its modules load. Import this module
// ahead of pixi.js in Node entry points; it must not import pixi.js itself.

const BROWSER_GLOBALS = [
  'window',
  'document',
  'navigator',
  'requestAnimationFrame',
  'cancelAnimationFrame',
  'HTMLElement',
  'HTMLCanvasElement',
  'HTMLImageElement',
  'Image',
] as const;

/** Copies the missing browser globals from a jsdom window onto `target`. Existing ones are kept. */
export function installBrowserGlobals(target: object, window = new JSDOM('', { pretendToBeVisual: true }).window): void {
  const source: Record<(typeof BROWSER_GLOBALS)[number], unknown> = {
    window,
    document: window.document,
    navigator: window.navigator,
    requestAnimationFrame: window.requestAnimationFrame.bind(window),
    cancelAnimationFrame: window.cancelAnimationFrame.bind(window),
    HTMLElement: window.HTMLElement,
    HTMLCanvasElement: window.HTMLCanvasElement,
    HTMLImageElement: window.HTMLImageElement,
    Image: window.Image,
  };

  for (const key of BROWSER_GLOBALS) {
    if (key in target) continue;
    Object.defineProperty(target, key, { value: source[key], configurable: true, writable: true });
  }
}

installBrowserGlobals(globalThis);
