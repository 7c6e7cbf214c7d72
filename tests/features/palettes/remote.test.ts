/**
 * Remote Palette Client Tests
 * fetch is stubbed; nothing leaves the process
 */

import { describe, it, expect } from "vitest";
import { fetchRemotePalette, paletteUrl, parseHexTags } from "@/features/palettes/remote/client";
import { LogLevel } from "@/core/monitoring/core/types";
import { createMemoryLogger } from "../../setup/logging";
import { stubFetch, stubHangingFetch } from "../../setup/network";

const PALETTE_BODY = [
  '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>',
  "<palette>",
  "<colors>",
  "<hex>CAF60D</hex>",
  "<hex>18d33a</hex><hex>FFFFFF</hex>",
  "<title>ignored</title>",
  "<hex>4255EC</hex>",
  "</colors>",
  "</palette>",
].join("\n");


describe("parseHexTags", () => {
  it("takes the first tag of each line, uppercased", () => {
    expect(parseHexTags(PALETTE_BODY)).toEqual(["#CAF60D", "#18D33A", "#4255EC"]);
  });

  it("handles CRLF bodies", () => {
    expect(parseHexTags("<hex>000000</hex>\r\n<hex>ffffff</hex>\r\n")).toEqual(["#000000", "#FFFFFF"]);
  });

  it("ignores malformed tags", () => {
    expect(parseHexTags("<hex>FFF</hex>\n<hex>GGGGGG</hex>\n<hex>12345678</hex>")).toEqual([]);
  });
});

describe("paletteUrl", () => {
  it("addresses the palette api on the service host", () => {
    expect(paletteUrl("www.colourlovers.com", 92095)).toBe("http://www.colourlovers.com/api/palette/92095");
  });
});

describe("fetchRemotePalette", () => {
  const request = { id: 92095, serviceHost: "palettes.test", timeoutMs: 1000 };

  it("returns the colors in line order", async () => {
    const fetchMock = stubFetch(new Response(PALETTE_BODY, { status: 200 }));

    const result = await fetchRemotePalette(request);

    expect(result).toEqual({ success: true, data: ["#CAF60D", "#18D33A", "#4255EC"] });
    expect(fetchMock).toHaveBeenCalledWith(
      "http://palettes.test/api/palette/92095",
      expect.objectContaining({ signal: expect.any(AbortSignal) })
    );
  });

  it("reports non-2xx responses as unavailable", async () => {
    stubFetch(new Response("", { status: 404, statusText: "Not Found" }));

    expect(await fetchRemotePalette(request)).toEqual({
      success: false,
      error: { kind: "SourceUnavailable", message: "HTTP 404: Not Found" },
    });
  });

  it("reports transport errors as unavailable", async () => {
    const cause = new TypeError("fetch failed");
    stubFetch(cause);

    expect(await fetchRemotePalette(request)).toEqual({
      success: false,
      error: { kind: "SourceUnavailable", message: "Palette request failed: fetch failed", cause },
    });
  });

  it("gives up after the timeout", async () => {
    const fetchMock = stubHangingFetch();

    const result = await fetchRemotePalette({ ...request, timeoutMs: 20 });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.kind).toBe("SourceUnavailable");
    expect(result.error.message).toMatch(/^Palette request failed: /);
  });

  it("reports an empty palette as malformed", async () => {
    stubFetch(new Response("<palette></palette>", { status: 200 }));

    expect(await fetchRemotePalette(request)).toEqual({
      success: false,
      error: { kind: "MalformedSource", message: "No colors found for palette 92095" },
    });
  });

  it.each([-1, 1.5])("rejects id %s without a request", async (id) => {
    const fetchMock = stubFetch(new Response(PALETTE_BODY, { status: 200 }));

    const result = await fetchRemotePalette({ ...request, id });

    expect(result.success).toBe(false);
    expect(result.success ? undefined : result.error.kind).toBe("MalformedSource");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("logs the outbound call", async () => {
    stubFetch(new Response(PALETTE_BODY, { status: 200 }));
    const { logger, entries } = createMemoryLogger(LogLevel.DEBUG);

    await fetchRemotePalette({ ...request, logger });

    expect(entries().map((entry) => entry.context)).toEqual([
      { method: "GET", endpoint: "http://palettes.test/api/palette/92095", status: 200, type: "api" },
    ]);
  });
});
