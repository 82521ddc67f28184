import type { FileRecord } from "@dirsync/core-domain";
import type { StoredFileEntry } from "../ports/storage-provider";
import type { Logger } from "../ports/logger";
import type { RemoteGateway, RemoteResult } from "../application/remote-gateway";
import { joinRemote } from "../application/remote-path";
import { decodeStoredName, encodeStoredName, truncateToSecond } from "./timestamp-codec";
import { SIDECAR_FILE_NAME, parseSidecar, serializeSidecar, type SidecarEntries } from "./sidecar-metadata";

export type TimestampStrategyKind = "filename" | "sidecar";

/**
 * Per-remote-directory view of the timestamp strategy. Created once per directory per run,
 * it turns raw listings into records and collects what the apply step changed.
 */
export interface DirectoryTimestamps {
  /** `relDir` is the directory relative to the pair root ("" for the root). */
  resolve(entries: StoredFileEntry[], relDir: string): FileRecord[];
  storedNameFor(name: string, mtimeMs: number): string;

  recordUpload(storedName: string, mtimeMs: number): void;
  recordDownload(storedName: string, mtimeMs: number): void;
  recordDelete(storedName: string): void;

  /** Persists per-directory state, if the strategy keeps any. */
  finalize(): Promise<RemoteResult<boolean>>;
}

export interface TimestampStrategy {
  readonly kind: TimestampStrategyKind;

  /** Names owned by the strategy itself, hidden from every listing (lower-case). */
  readonly reservedNames: readonly string[];

  /** `existing` is false for a directory about to be created, which has nothing to read. */
  open(remoteDir: string, existing: boolean): Promise<RemoteResult<DirectoryTimestamps>>;
}

function relPath(relDir: string, name: string): string {
  return relDir ? `${relDir}/${name}` : name;
}

/* ---------------- filename-embedded timestamps ---------------- */

class FilenameDirectoryTimestamps implements DirectoryTimestamps {
  resolve(entries: StoredFileEntry[], relDir: string): FileRecord[] {
    return entries.map((e) => {
      const decoded = decodeStoredName(e.name);
      if (!decoded) {
        return {
          path: relPath(relDir, e.name),
          mtimeMs: truncateToSecond(e.modifiedAtMs),
          sizeBytes: e.sizeBytes,
          storedName: e.name,
          timestampKnown: false,
        };
      }
      return {
        path: relPath(relDir, decoded.name),
        mtimeMs: decoded.mtimeMs,
        sizeBytes: e.sizeBytes,
        storedName: e.name,
        timestampKnown: true,
      };
    });
  }

  storedNameFor(name: string, mtimeMs: number): string {
    return encodeStoredName(name, mtimeMs);
  }

  recordUpload(): void {}
  recordDownload(): void {}
  recordDelete(): void {}

  async finalize(): Promise<RemoteResult<boolean>> {
    return { ok: true, value: false };
  }
}

export class FilenameTimestampStrategy implements TimestampStrategy {
  readonly kind = "filename";
  readonly reservedNames: readonly string[] = [];

  async open(): Promise<RemoteResult<DirectoryTimestamps>> {
    return { ok: true, value: new FilenameDirectoryTimestamps() };
  }
}

/* ---------------- sidecar metadata file ---------------- */

class SidecarDirectoryTimestamps implements DirectoryTimestamps {
  private readonly next: SidecarEntries = new Map();

  constructor(
    private readonly gateway: RemoteGateway,
    private readonly sidecarPath: string,
    private readonly known: SidecarEntries,
    private readonly originalText: string | null
  ) {}

  resolve(entries: StoredFileEntry[], relDir: string): FileRecord[] {
    return entries.map((e) => {
      // names missing from the metadata fall back to the store's own time
      const mtimeMs = this.known.get(e.name) ?? truncateToSecond(e.modifiedAtMs);
      this.next.set(e.name, mtimeMs);
      return {
        path: relPath(relDir, e.name),
        mtimeMs,
        sizeBytes: e.sizeBytes,
        storedName: e.name,
        timestampKnown: true,
      };
    });
  }

  storedNameFor(name: string): string {
    return name;
  }

  recordUpload(storedName: string, mtimeMs: number): void {
    this.next.set(storedName, truncateToSecond(mtimeMs));
  }

  recordDownload(storedName: string, mtimeMs: number): void {
    this.next.set(storedName, truncateToSecond(mtimeMs));
  }

  recordDelete(storedName: string): void {
    this.next.delete(storedName);
  }

  async finalize(): Promise<RemoteResult<boolean>> {
    const text = serializeSidecar(this.next);
    if (text === (this.originalText ?? "")) return { ok: true, value: false };

    const written = await this.gateway.writeText(text, this.sidecarPath);
    return written.ok ? { ok: true, value: true } : written;
  }
}

export class SidecarTimestampStrategy implements TimestampStrategy {
  readonly kind = "sidecar";
  readonly reservedNames: readonly string[] = [SIDECAR_FILE_NAME.toLowerCase()];

  constructor(
    private readonly gateway: RemoteGateway,
    private readonly logger: Logger
  ) {}

  async open(remoteDir: string, existing: boolean): Promise<RemoteResult<DirectoryTimestamps>> {
    const sidecarPath = joinRemote(remoteDir, SIDECAR_FILE_NAME);
    if (!existing) {
      return {
        ok: true,
        value: new SidecarDirectoryTimestamps(this.gateway, sidecarPath, new Map(), null),
      };
    }

    const read = await this.gateway.readText(sidecarPath);
    if (!read.ok) return read;

    const { entries, invalidLines } = parseSidecar(read.value ?? "");
    if (invalidLines > 0) {
      this.logger.warn(`Ignored ${invalidLines} unreadable line(s) in ${sidecarPath}`);
    }

    return {
      ok: true,
      value: new SidecarDirectoryTimestamps(this.gateway, sidecarPath, entries, read.value),
    };
  }
}

export function createTimestampStrategy(
  kind: TimestampStrategyKind,
  gateway: RemoteGateway,
  logger: Logger
): TimestampStrategy {
  return kind === "sidecar"
    ? new SidecarTimestampStrategy(gateway, logger)
    : new FilenameTimestampStrategy();
}
