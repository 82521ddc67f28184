import { describe, expect, it } from "vitest";

import { childrenQuery, escapeQueryValue, isGoogleAppsFile, toRemoteError } from "./google-drive-files";
import {
  NetworkError,
  RemoteAuthError,
  RemoteRateLimitedError,
  RemoteServerError,
} from "../application/errors";

describe("Drive queries", () => {
  it("escapes quotes and backslashes", () => {
    expect(escapeQueryValue("it's a\\b")).toBe("it\\'s a\\\\b");
  });

  it("builds a children query", () => {
    expect(childrenQuery("p1", "folder", "it's")).toBe(
      "'p1' in parents and name = 'it\\'s' and trashed = false and mimeType = 'application/vnd.google-apps.folder'"
    );
    expect(childrenQuery("p1", "file")).toBe(
      "'p1' in parents and trashed = false and mimeType != 'application/vnd.google-apps.folder'"
    );
  });

  it("recognizes native Google documents", () => {
    expect(isGoogleAppsFile("application/vnd.google-apps.document")).toBe(true);
    expect(isGoogleAppsFile("application/vnd.google-apps.folder")).toBe(false);
    expect(isGoogleAppsFile("text/plain")).toBe(false);
    expect(isGoogleAppsFile(undefined)).toBe(false);
  });
});

describe("toRemoteError", () => {
  it("maps 401 and invalid_grant to authentication errors", () => {
    const err = toRemoteError({ response: { status: 401 }, message: "Unauthorized" }, "Error listing /r");
    expect(err).toBeInstanceOf(RemoteAuthError);
    expect(err.message).toBe("Error listing /r: Unauthorized");

    expect(toRemoteError({ message: "invalid_grant" }, "x")).toBeInstanceOf(RemoteAuthError);
  });

  it("maps rate limiting", () => {
    expect(toRemoteError({ code: 429, message: "slow down" }, "x")).toBeInstanceOf(RemoteRateLimitedError);
    expect(
      toRemoteError({ code: 403, message: "quota", errors: [{ reason: "userRateLimitExceeded" }] }, "x")
    ).toBeInstanceOf(RemoteRateLimitedError);

    const hinted = toRemoteError({ response: { status: 429, headers: { "retry-after": "7" } }, message: "x" }, "x");
    expect(hinted).toMatchObject({ retryAfterSeconds: 7 });
  });

  it("maps server and network failures", () => {
    const server = toRemoteError({ response: { status: 503 }, message: "unavailable" }, "x");
    expect(server).toBeInstanceOf(RemoteServerError);
    expect(server).toMatchObject({ statusCode: 503 });

    expect(toRemoteError({ code: "ECONNRESET", message: "socket hang up" }, "x")).toBeInstanceOf(NetworkError);
  });

  it("leaves other errors as they are", () => {
    const original = new Error("File not found");
    expect(toRemoteError(original, "x")).toBe(original);
    expect(toRemoteError("weird", "Error reading /r").message).toBe("Error reading /r: weird");
  });
});
