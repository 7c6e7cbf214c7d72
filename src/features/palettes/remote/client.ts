/**
 * Remote Palette Client
 * Fetches a palette by numeric id and scrapes its hex colors
 */

import type { Logger } from "../../../core/monitoring/core/logger";
import type { HexColor } from "../../../core/utils/color";
import { describeError, err, failure, ok, type PaletteFailure, type Result } from "../core/errors";

const HEX_TAG = /<hex>\s*([0-9A-Fa-f]{6})\s*<\/hex>/;

export interface RemotePaletteRequest {
  id: number;
  serviceHost: string;
  timeoutMs: number;
  logger?: Logger;
}

/**
 * Palette service URL for an id
 */
export function paletteUrl(serviceHost: string, id: number): string {
  return `http://${serviceHost}/api/palette/${id}`;
}

/**
 * Collect colors from a line-oriented body
 * Each line contributes at most one color: its first `<hex>RRGGBB</hex>` tag.
 *
 * @example
 * parseHexTags("<hex>CAF60D</hex>\n<hex>18d33a</hex>") // ["#CAF60D", "#18D33A"]
 */
export function parseHexTags(body: string): HexColor[] {
  const colors: HexColor[] = [];
  for (const line of body.split(/\r?\n/)) {
    const match = HEX_TAG.exec(line);
    if (match) {
      colors.push(`#${match[1].toUpperCase()}`);
    }
  }
  return colors;
}

/**
 * GET the palette and extract its colors
 * Never throws: transport problems and empty bodies come back as failures.
 */
export async function fetchRemotePalette(
  request: RemotePaletteRequest
): Promise<Result<HexColor[], PaletteFailure>> {
  const { id, serviceHost, timeoutMs, logger } = request;

  if (!Number.isSafeInteger(id) || id < 0) {
    return err(failure("MalformedSource", `Palette id must be a non-negative integer, got ${id}`));
  }

  const url = paletteUrl(serviceHost, id);
  let body: string;

  try {
    const response = await fetch(url, {
      headers: { Accept: "application/xml, text/plain;q=0.9, */*;q=0.8" },
      signal: AbortSignal.timeout(timeoutMs),
    });
    logger?.api("GET", url, response.status);

    if (!response.ok) {
      return err(failure("SourceUnavailable", `HTTP ${response.status}: ${response.statusText}`));
    }

    body = await response.text();
  } catch (error) {
    return err(failure("SourceUnavailable", `Palette request failed: ${describeError(error)}`, error));
  }

  const colors = parseHexTags(body);
  if (colors.length === 0) {
    return err(failure("MalformedSource", `No colors found for palette ${id}`));
  }

  return ok(colors);
}
