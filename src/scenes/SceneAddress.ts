export interface SceneAddressing {
  base: string;
  entry: string;
}

const SCHEME = /^[a-z][a-z\d+.-]*:\/\//i;

export function isQualifiedAddress(id: string, addressing: SceneAddressing): boolean {
  return SCHEME.test(id) || id.startsWith(`${addressing.base}/`);
}

/**
 * "level1" -> "<base>/level1/<entry>". Qualified addresses pass through.
 */
export function resolveSceneAddress(id: string, addressing: SceneAddressing): string {
  if (isQualifiedAddress(id, addressing)) return id;
  return `${addressing.base}/${id}/${addressing.entry}`;
}
