import { describe, expect, it } from "vitest";
import {
  decodeStoredName,
  encodeStoredName,
  formatTimestampToken,
  parseTimestampToken,
  sameInstant,
  truncateToSecond,
} from "./timestamp-codec";

const T = Date.UTC(2024, 0, 1, 9, 30, 0);

describe("truncateToSecond / sameInstant", () => {
  it("drops sub-second precision", () => {
    expect(truncateToSecond(1999)).toBe(1000);
    expect(truncateToSecond(T + 750)).toBe(T);
  });

  it("treats instants within the same second as equal", () => {
    expect(sameInstant(T, T + 999)).toBe(true);
    expect(sameInstant(T - 1, T)).toBe(false);
  });
});

describe("timestamp token", () => {
  it("formats a fixed-width UTC token", () => {
    expect(formatTimestampToken(T + 750)).toBe("20240101T093000Z");
    expect(formatTimestampToken(Date.UTC(1999, 11, 31, 23, 59, 59))).toBe("19991231T235959Z");
  });

  it("parses a token back to the truncated instant", () => {
    expect(parseTimestampToken("20240101T093000Z")).toBe(T);
  });

  it("rejects calendar values that would roll over", () => {
    expect(parseTimestampToken("20240230T000000Z")).toBeNull();
    expect(parseTimestampToken("20240101T250000Z")).toBeNull();
    expect(parseTimestampToken("20241301T000000Z")).toBeNull();
  });

  it("rejects anything that is not exactly a token", () => {
    expect(parseTimestampToken("2024-01-01T09:30:00Z")).toBeNull();
    expect(parseTimestampToken("20240101T093000")).toBeNull();
    expect(parseTimestampToken(" 20240101T093000Z")).toBeNull();
  });

  it("refuses instants outside four-digit years", () => {
    expect(() => formatTimestampToken(Date.UTC(10000, 0, 1))).toThrow(RangeError);
  });
});

describe("stored names", () => {
  it("prefixes the name with the token", () => {
    expect(encodeStoredName("save.dat", T + 750)).toBe("20240101T093000Z_save.dat");
  });

  it("decodes what it encodes, at second precision", () => {
    expect(decodeStoredName(encodeStoredName("save.dat", T + 750))).toEqual({
      name: "save.dat",
      mtimeMs: T,
    });
  });

  it("keeps separators and tokens inside the original name", () => {
    expect(decodeStoredName("20240101T093000Z_my_file.txt")).toEqual({ name: "my_file.txt", mtimeMs: T });
    expect(decodeStoredName(encodeStoredName("20200101T000000Z_x", T))).toEqual({
      name: "20200101T000000Z_x",
      mtimeMs: T,
    });
  });

  it("round-trips early years literally", () => {
    const early = Date.parse("0050-06-15T12:00:00Z");
    expect(encodeStoredName("a", early)).toBe("00500615T120000Z_a");
    expect(decodeStoredName("00500615T120000Z_a")).toEqual({ name: "a", mtimeMs: early });
  });

  it("reports undecodable names as null", () => {
    expect(decodeStoredName("save.dat")).toBeNull();
    expect(decodeStoredName("20240101T093000Z")).toBeNull();
    expect(decodeStoredName("20240101T093000Z_")).toBeNull();
    expect(decodeStoredName("20240101T093000Z-save.dat")).toBeNull();
    expect(decodeStoredName("20240230T093000Z_save.dat")).toBeNull();
  });

  it("refuses names that are not plain file names", () => {
    expect(() => encodeStoredName("", T)).toThrow(RangeError);
    expect(() => encodeStoredName("dir/file", T)).toThrow(RangeError);
  });
});
