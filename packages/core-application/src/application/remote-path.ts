export function normalizeRemotePath(p: string): string {
  const segments = remoteSegments(p);
  return segments.length === 0 ? "/" : `/${segments.join("/")}`;
}

export function remoteSegments(p: string): string[] {
  return p
    .replaceAll("\\", "/")
    .split("/")
    .filter((s) => s.length > 0 && s !== ".");
}

export function joinRemote(dir: string, ...names: string[]): string {
  return normalizeRemotePath([dir, ...names].join("/"));
}

export function remoteBaseName(p: string): string {
  const segments = remoteSegments(p);
  return segments[segments.length - 1] ?? "";
}

export function remoteParent(p: string): string {
  const segments = remoteSegments(p);
  return normalizeRemotePath(segments.slice(0, -1).join("/"));
}

/** True when one path equals or contains the other (case-insensitive). */
export function remotePathsOverlap(a: string, b: string): boolean {
  const x = normalizeRemotePath(a).toLowerCase();
  const y = normalizeRemotePath(b).toLowerCase();
  if (x === y || x === "/" || y === "/") return true;
  return x.startsWith(`${y}/`) || y.startsWith(`${x}/`);
}
