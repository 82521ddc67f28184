/**
 * Stored-name codec for stores that do not keep arbitrary modification times.
 *
 * A file uploaded at local instant `t` is stored as `<token>_<name>`, where the token is
 * the UTC instant at second precision in a fixed-width form, e.g.
 * `20240101T093000Z_save.dat`. Decoding is strict: anything that is not exactly a valid
 * token followed by the separator and a non-empty name is reported as undecodable.
 */

export const STORED_NAME_SEPARATOR = "_";
export const TIMESTAMP_TOKEN_LENGTH = 16; // YYYYMMDDTHHMMSSZ

const TOKEN_PATTERN = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/;

export type DecodedStoredName = {
  name: string;
  mtimeMs: number;
};

export function truncateToSecond(ms: number): number {
  return Math.floor(ms / 1000) * 1000;
}

export function sameInstant(a: number, b: number): boolean {
  return truncateToSecond(a) === truncateToSecond(b);
}

function pad(n: number, width: number): string {
  return String(n).padStart(width, "0");
}

export function formatTimestampToken(ms: number): string {
  const d = new Date(truncateToSecond(ms));
  const year = d.getUTCFullYear();
  if (!Number.isFinite(d.getTime()) || year < 0 || year > 9999) {
    throw new RangeError(`Instant out of encodable range: ${ms}`);
  }

  return (
    pad(year, 4) +
    pad(d.getUTCMonth() + 1, 2) +
    pad(d.getUTCDate(), 2) +
    "T" +
    pad(d.getUTCHours(), 2) +
    pad(d.getUTCMinutes(), 2) +
    pad(d.getUTCSeconds(), 2) +
    "Z"
  );
}

export function parseTimestampToken(token: string): number | null {
  const m = TOKEN_PATTERN.exec(token);
  if (!m) return null;

  const [y = 0, mo = 1, d = 1, h = 0, mi = 0, s = 0] = m.slice(1).map(Number);

  // setUTCFullYear keeps years below 100 literal (Date.UTC would map them to 19xx)
  const date = new Date(0);
  date.setUTCFullYear(y, mo - 1, d);
  date.setUTCHours(h, mi, s, 0);
  const ms = date.getTime();

  // rejects 20240230, 25h, 61s... which Date would silently roll over
  if (!Number.isFinite(ms) || formatTimestampToken(ms) !== token) return null;
  return ms;
}

export function encodeStoredName(name: string, mtimeMs: number): string {
  if (name.length === 0 || name.includes("/")) {
    throw new RangeError(`Not a plain file name: "${name}"`);
  }
  return `${formatTimestampToken(mtimeMs)}${STORED_NAME_SEPARATOR}${name}`;
}

export function decodeStoredName(stored: string): DecodedStoredName | null {
  if (stored.length <= TIMESTAMP_TOKEN_LENGTH + 1) return null;
  if (stored[TIMESTAMP_TOKEN_LENGTH] !== STORED_NAME_SEPARATOR) return null;

  const mtimeMs = parseTimestampToken(stored.slice(0, TIMESTAMP_TOKEN_LENGTH));
  if (mtimeMs === null) return null;

  return { name: stored.slice(TIMESTAMP_TOKEN_LENGTH + 1), mtimeMs };
}
