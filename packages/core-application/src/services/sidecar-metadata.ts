export const SIDECAR_FILE_NAME = "sync_metadata";

/** stored name -> UTC instant (ms, whole seconds) */
export type SidecarEntries = Map<string, number>;

export type ParsedSidecar = {
  entries: SidecarEntries;
  invalidLines: number;
};

/**
 * Parses `name \t ISO-8601` lines. Lines that do not parse are left out of the map
 * and counted, so a damaged file degrades to "timestamp unknown" for those names.
 */
export function parseSidecar(text: string): ParsedSidecar {
  const entries: SidecarEntries = new Map();
  let invalidLines = 0;

  for (const rawLine of text.split("\n")) {
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
    if (line.trim().length === 0) continue;

    const parts = line.split("\t");
    const [name, iso] = parts;
    if (parts.length !== 2 || !name || !iso) {
      invalidLines++;
      continue;
    }

    const ms = Date.parse(iso);
    if (!Number.isFinite(ms) || !/^\d{4}-\d{2}-\d{2}T/.test(iso)) {
      invalidLines++;
      continue;
    }

    entries.set(name, Math.floor(ms / 1000) * 1000);
  }

  return { entries, invalidLines };
}

export function serializeSidecar(entries: SidecarEntries): string {
  const names = [...entries.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  return names
    .map((name) => `${name}\t${new Date(entries.get(name) ?? 0).toISOString()}\n`)
    .join("");
}
