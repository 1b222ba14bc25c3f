import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Logger } from "@mindease/shared";
import { probeServerStatus } from "./statusProbe.js";

const mockFetch = vi.fn();

function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  } satisfies Logger;
}

describe("probeServerStatus", () => {
  const url = "http://localhost:5005/status";

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("reports connected on 200", async () => {
    mockFetch.mockResolvedValueOnce(new Response("{}", { status: 200 }));

    await expect(
      probeServerStatus({ url, timeoutMs: 2000, logger: createMockLogger() }),
    ).resolves.toBe("connected");
  });

  it("reports disconnected on any other status", async () => {
    const log = createMockLogger();
    mockFetch.mockResolvedValueOnce(new Response("", { status: 500 }));

    await expect(
      probeServerStatus({ url, timeoutMs: 2000, logger: log }),
    ).resolves.toBe("disconnected");
    expect(log.warn).toHaveBeenCalledWith(
      "Dialogue server returned non-200 status",
      { url, status: 500 },
    );
  });

  it("reports disconnected when the request fails", async () => {
    const log = createMockLogger();
    mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(
      probeServerStatus({ url, timeoutMs: 2000, logger: log }),
    ).resolves.toBe("disconnected");
    expect(log.error).toHaveBeenCalledOnce();
  });

  it("releases the body without reading it", async () => {
    const cancel = vi.fn();
    const body = new ReadableStream<Uint8Array>({ cancel });
    mockFetch.mockResolvedValueOnce(new Response(body, { status: 200 }));

    await expect(
      probeServerStatus({ url, timeoutMs: 2000, logger: createMockLogger() }),
    ).resolves.toBe("connected");
    expect(cancel).toHaveBeenCalledOnce();
  });
});
