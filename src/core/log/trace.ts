export type Trace = (message: string, ...details: unknown[]) => void;

const silent: Trace = () => {};

/**
 * Tagged console tracing. Disabled traces cost one call.
 */
export function createTrace(tag: string, enabled: boolean): Trace {
  if (!enabled) return silent;
  return (message, ...details) => {
    if (details.length === 0) console.log(`[${tag}] ${message}`);
    else console.log(`[${tag}] ${message}`, ...details);
  };
}
