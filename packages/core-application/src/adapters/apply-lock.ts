import fs from "node:fs/promises";
import path from "node:path";

import type { RunLock } from "../ports/run-lock";
import { STATE_DIR_NAME } from "./sync-ignore";

export const DEFAULT_LOCK_STALE_MS = 60 * 60 * 1000;

export function applyLockPath(localRoot: string) {
  return path.join(localRoot, STATE_DIR_NAME, "applying.lock");
}

function hasCode(err: unknown, code: string): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === code;
}

async function readLockTime(fp: string): Promise<number | null> {
  try {
    const value = Number((await fs.readFile(fp, "utf-8")).trim());
    return Number.isFinite(value) ? value : null;
  } catch (err) {
    if (hasCode(err, "ENOENT")) return null;
    throw err;
  }
}

/**
 * File lock inside the local root. A lock left behind by a crashed run is taken
 * over once it is older than `staleMs`.
 */
export class NodeApplyLock implements RunLock {
  constructor(
    private readonly staleMs = DEFAULT_LOCK_STALE_MS,
    private readonly now: () => number = Date.now
  ) {}

  async acquire(localRoot: string): Promise<boolean> {
    const fp = applyLockPath(localRoot);
    await fs.mkdir(path.dirname(fp), { recursive: true });

    try {
      await fs.writeFile(fp, String(this.now()), { encoding: "utf-8", flag: "wx" });
      return true;
    } catch (err) {
      if (!hasCode(err, "EEXIST")) throw err;
    }

    const since = await readLockTime(fp);
    if (since !== null && this.now() - since < this.staleMs) return false;

    await fs.writeFile(fp, String(this.now()), "utf-8");
    return true;
  }

  async release(localRoot: string): Promise<void> {
    await fs.rm(applyLockPath(localRoot), { force: true });
  }
}
