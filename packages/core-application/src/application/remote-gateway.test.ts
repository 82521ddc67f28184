import { describe, expect, it } from "vitest";

import { InMemoryStorageProvider } from "../testing";
import { RemoteGateway } from "./remote-gateway";
import { NetworkError, RemoteAuthError, RemoteTimeoutError } from "./errors";
import { defaultNetworkRetryPolicy } from "./default-network-retry-policy";

function delay(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/** Store whose calls take a while; uploads are only counted. */
class SlowProvider extends InMemoryStorageProvider {
  uploadsStarted = 0;
  uploadsFinished = 0;

  async upload(_localPath: string, remotePath: string): Promise<void> {
    this.uploadsStarted++;
    await delay(60);
    this.putFile(remotePath, "uploaded");
    this.uploadsFinished++;
  }

  async list(remoteDir: string) {
    await delay(60);
    return super.list(remoteDir);
  }
}

function gatewayFor(provider: InMemoryStorageProvider) {
  return new RemoteGateway(provider, { sleep: async () => {} });
}

describe("RemoteGateway", () => {
  it("returns values as ok results", async () => {
    const provider = new InMemoryStorageProvider(() => 0);
    provider.putFile("/r/a.txt", "hello");

    const res = await gatewayFor(provider).list("/r");
    expect(res).toEqual({ ok: true, value: [{ name: "a.txt", sizeBytes: 5, modifiedAtMs: 0 }] });
  });

  it("retries transient failures", async () => {
    const provider = new InMemoryStorageProvider();
    provider.fail("readText", "/r/meta", new NetworkError("socket hang up"), 2);

    const res = await gatewayFor(provider).readText("/r/meta");
    expect(res).toEqual({ ok: true, value: null });
    expect(provider.callsOf("readText")).toEqual(["/r/meta", "/r/meta", "/r/meta"]);
  });

  it("reports authentication failures as fatal without retrying", async () => {
    const provider = new InMemoryStorageProvider();
    provider.fail("list", "/r", new RemoteAuthError("token revoked"));

    const res = await gatewayFor(provider).list("/r");
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error).toMatchObject({ kind: "fatal", operation: "list", path: "/r", message: "token revoked" });
    }
    expect(provider.callsOf("list")).toHaveLength(1);
  });

  it("reports other failures as transient", async () => {
    const provider = new InMemoryStorageProvider();
    provider.fail("delete", "/r/a.txt", new Error("permission denied"));

    const res = await gatewayFor(provider).delete("/r/a.txt");
    expect(res).toMatchObject({ ok: false, error: { kind: "transient", message: "permission denied" } });
  });

  it("lets transfers run past the request timeout", async () => {
    const provider = new SlowProvider();
    const gateway = new RemoteGateway(provider, { timeoutMs: 20, sleep: async () => {} });

    const res = await gateway.upload("/tmp/unused", "/r/big.bin");

    expect(res).toEqual({ ok: true, value: undefined });
    expect(provider.uploadsStarted).toBe(1);
    expect(provider.uploadsFinished).toBe(1);
  });

  it("bounds listing calls by the request timeout", async () => {
    const provider = new SlowProvider();
    const gateway = new RemoteGateway(provider, {
      timeoutMs: 20,
      retryPolicy: defaultNetworkRetryPolicy({ maxAttempts: 1 }),
      sleep: async () => {},
    });

    const res = await gateway.list("/r");

    expect(res).toMatchObject({ ok: false, error: { kind: "transient", operation: "list" } });
    if (!res.ok) expect(res.error.cause).toBeInstanceOf(RemoteTimeoutError);
  });
});
