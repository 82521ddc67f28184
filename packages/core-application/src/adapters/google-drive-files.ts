import { google, type drive_v3 } from "googleapis";
import type { OAuth2Client } from "google-auth-library";

import {
  NetworkError,
  RemoteAuthError,
  RemoteRateLimitedError,
  RemoteServerError,
} from "../application/errors";

/**
 * Constants
 */
export const APP_ROOT_NAME = "dirsync";
export const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";
const GOOGLE_APPS_MIME_PREFIX = "application/vnd.google-apps.";

const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
]);

export type EntryKind = "file" | "folder";

// retries are done by RemoteGateway, which also knows which failures are fatal
export function createDriveClient(auth: OAuth2Client): drive_v3.Drive {
  return google.drive({ version: "v3", auth, retry: false });
}

export function escapeQueryValue(v: string) {
  // Drive queries quote values with single quotes; escape backslashes first
  return v.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

/** Native Google Docs/Sheets/... have no bytes to download and are left alone. */
export function isGoogleAppsFile(mimeType: string | null | undefined): boolean {
  return !!mimeType && mimeType.startsWith(GOOGLE_APPS_MIME_PREFIX) && mimeType !== FOLDER_MIME_TYPE;
}

function kindClause(kind?: EntryKind): string | null {
  if (kind === "folder") return `mimeType = '${FOLDER_MIME_TYPE}'`;
  if (kind === "file") return `mimeType != '${FOLDER_MIME_TYPE}'`;
  return null;
}

export function childrenQuery(parentId: string, kind?: EntryKind, name?: string): string {
  return [
    `'${escapeQueryValue(parentId)}' in parents`,
    name !== undefined ? `name = '${escapeQueryValue(name)}'` : null,
    "trashed = false",
    kindClause(kind),
  ]
    .filter(Boolean)
    .join(" and ");
}

/**
 * Finds a child by name inside parentId, optionally restricted to files or folders.
 */
export async function findChildByName(
  drive: drive_v3.Drive,
  parentId: string,
  name: string,
  kind?: EntryKind
): Promise<drive_v3.Schema$File | null> {
  const res = await drive.files.list({
    q: childrenQuery(parentId, kind, name),
    pageSize: 1,
    fields: "files(id,name,mimeType,modifiedTime,size)",
    spaces: "drive",
  });

  return res.data.files?.[0] ?? null;
}

/**
 * Every child of parentId, following nextPageToken until the listing is exhausted.
 */
export async function listChildren(
  drive: drive_v3.Drive,
  parentId: string,
  kind: EntryKind
): Promise<drive_v3.Schema$File[]> {
  const out: drive_v3.Schema$File[] = [];
  let pageToken: string | undefined = undefined;

  do {
    const res: drive_v3.Schema$FileList = (
      await drive.files.list({
        q: childrenQuery(parentId, kind),
        fields: "nextPageToken, files(id,name,mimeType,modifiedTime,size)",
        spaces: "drive",
        pageSize: 1000,
        pageToken,
      })
    ).data;

    out.push(...(res.files ?? []));
    pageToken = res.nextPageToken ?? undefined;
  } while (pageToken);

  return out;
}

/**
 * Creates a folder and returns its id
 */
export async function createFolder(
  drive: drive_v3.Drive,
  parentId: string,
  name: string
): Promise<string> {
  const res = await drive.files.create({
    requestBody: {
      name,
      mimeType: FOLDER_MIME_TYPE,
      parents: [parentId],
    },
    fields: "id",
  });

  const id = res.data.id;
  if (!id) throw new Error(`Failed to create folder "${name}" in Google Drive`);
  return id;
}

/**
 * Ensures a folder inside the parent and returns its id (never null).
 */
export async function ensureFolder(
  drive: drive_v3.Drive,
  parentId: string,
  name: string
): Promise<string> {
  const found = await findChildByName(drive, parentId, name, "folder");
  if (found?.id) return found.id;

  return createFolder(drive, parentId, name);
}

/**
 * The app's root folder in "My Drive"; every remote path is resolved below it.
 */
export async function ensureAppRootFolder(
  drive: drive_v3.Drive,
  name = APP_ROOT_NAME
): Promise<string> {
  return ensureFolder(drive, "root", name);
}

/**
 * Downloads a file's content as text (alt=media).
 */
export async function downloadText(drive: drive_v3.Drive, fileId: string): Promise<string> {
  const res = await drive.files.get({ fileId, alt: "media" }, { responseType: "stream" });

  const chunks: Buffer[] = [];
  for await (const chunk of res.data) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/**
 * Replaces a file's content in one request; readers see the old or the new version.
 */
export async function uploadText(
  drive: drive_v3.Drive,
  fileId: string,
  content: string,
  mimeType = "text/plain"
): Promise<void> {
  await drive.files.update({
    fileId,
    media: { mimeType, body: content },
  });
}

export async function createTextFile(
  drive: drive_v3.Drive,
  parentId: string,
  name: string,
  content: string,
  mimeType = "text/plain"
): Promise<string> {
  const res = await drive.files.create({
    requestBody: { name, parents: [parentId] },
    media: { mimeType, body: content },
    fields: "id",
  });

  const id = res.data.id;
  if (!id) throw new Error(`Failed to create file "${name}" in Google Drive`);
  return id;
}

/* ---------------- error mapping ---------------- */

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function statusOf(err: Record<string, unknown>): number | undefined {
  const response = err["response"];
  if (isRecord(response) && typeof response["status"] === "number") return response["status"];
  const code = err["code"];
  if (typeof code === "number") return code;
  if (typeof code === "string" && /^\d{3}$/.test(code)) return Number(code);
  return undefined;
}

function retryAfterOf(err: Record<string, unknown>): number | undefined {
  const response = err["response"];
  if (!isRecord(response) || !isRecord(response["headers"])) return undefined;
  const value = Number(response["headers"]["retry-after"]);
  return Number.isFinite(value) && value >= 0 ? value : undefined;
}

function reasonsOf(err: Record<string, unknown>): string[] {
  const errors = err["errors"];
  if (!Array.isArray(errors)) return [];
  return errors
    .map((e: unknown) => (isRecord(e) && typeof e["reason"] === "string" ? e["reason"] : ""))
    .filter(Boolean);
}

/**
 * Maps googleapis/gaxios failures onto the application error classes so retry policy
 * and fatal/transient classification can work on them.
 */
export function toRemoteError(err: unknown, what: string): Error {
  if (!isRecord(err)) return new Error(`${what}: ${String(err)}`);

  const message = typeof err["message"] === "string" ? err["message"] : String(err);
  const status = statusOf(err);
  const reasons = reasonsOf(err);
  const code = typeof err["code"] === "string" ? err["code"] : undefined;

  if (status === 401 || message.includes("invalid_grant")) {
    return new RemoteAuthError(`${what}: ${message}`, err);
  }
  if (status === 429 || (status === 403 && reasons.some((r) => r.toLowerCase().includes("ratelimit")))) {
    return new RemoteRateLimitedError(`${what}: ${message}`, retryAfterOf(err), err);
  }
  if (status !== undefined && status >= 500) {
    return new RemoteServerError(`${what}: ${message}`, status, err);
  }
  if (code && NETWORK_ERROR_CODES.has(code)) {
    return new NetworkError(`${what}: ${message}`, err);
  }

  return err instanceof Error ? err : new Error(`${what}: ${message}`);
}
