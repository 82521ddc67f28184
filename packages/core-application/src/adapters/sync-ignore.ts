export const STATE_DIR_NAME = ".dirsync";
export const PARTIAL_SUFFIX = ".dirsync-part";

const IGNORED_NAMES = new Set([STATE_DIR_NAME, ".ds_store", "thumbs.db", "desktop.ini"]);

/**
 * Entry names never synced in either direction: the tool's own state folder,
 * partial transfers, OS clutter and any names the timestamp strategy reserves.
 */
export function createSyncIgnore(reservedNames: readonly string[] = []) {
  const reserved = new Set(reservedNames.map((n) => n.toLowerCase()));

  return (name: string) => {
    const lower = name.toLowerCase();

    if (IGNORED_NAMES.has(lower)) return true;
    if (reserved.has(lower)) return true;

    // transfers in flight
    if (lower.endsWith(PARTIAL_SUFFIX)) return true;

    return false;
  };
}
