import { describe, it, expect } from "vitest";
import {
  getDefaultPaletteConfig,
  getPaletteConfig,
  PaletteConfigBuilder,
} from "@/features/palettes/core/config";
import { ErrorCode, PaletteConfigError } from "@/features/palettes/core/errors";

describe("Palette Configuration", () => {
  it("starts from defaults", () => {
    expect(getPaletteConfig({})).toEqual({
      serviceHost: "www.colourlovers.com",
      remoteTimeoutMs: 10000,
      imageTimeoutMs: 10000,
      imageSampleSize: 64,
      imageColorCount: 5,
      interpolation: "rgb",
    });
  });

  it("returns independent default copies", () => {
    const config = getDefaultPaletteConfig();
    config.serviceHost = "changed.test";
    expect(getDefaultPaletteConfig().serviceHost).toBe("www.colourlovers.com");
  });

  it("reads PALETTE_* environment variables", () => {
    const config = getPaletteConfig({
      PALETTE_SERVICE_HOST: "palettes.test:8080",
      PALETTE_REMOTE_TIMEOUT_MS: "2500",
      PALETTE_IMAGE_TIMEOUT_MS: "4000",
      PALETTE_IMAGE_SAMPLE_SIZE: "32",
      PALETTE_IMAGE_COLORS: "8",
      PALETTE_INTERPOLATION: "lab",
    });

    expect(config).toEqual({
      serviceHost: "palettes.test:8080",
      remoteTimeoutMs: 2500,
      imageTimeoutMs: 4000,
      imageSampleSize: 32,
      imageColorCount: 8,
      interpolation: "lab",
    });
  });

  it("rejects invalid environment values", () => {
    expect(() => getPaletteConfig({ PALETTE_REMOTE_TIMEOUT_MS: "soon" })).toThrow(PaletteConfigError);
    expect(() => getPaletteConfig({ PALETTE_INTERPOLATION: "hsv" })).toThrow(PaletteConfigError);
    expect(() => getPaletteConfig({ PALETTE_SERVICE_HOST: "http://palettes.test/" })).toThrow(
      /PALETTE_SERVICE_HOST/
    );
  });

  it("tags configuration errors", () => {
    try {
      getPaletteConfig({ PALETTE_IMAGE_COLORS: "1" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PaletteConfigError);
      expect(error).toMatchObject({ code: ErrorCode.INVALID_CONFIG, name: "PaletteConfigError" });
    }
  });

  it("merges overrides over the environment", () => {
    const config = new PaletteConfigBuilder({ PALETTE_REMOTE_TIMEOUT_MS: "2500" })
      .merge({ remoteTimeoutMs: 500, interpolation: undefined })
      .build();

    expect(config.remoteTimeoutMs).toBe(500);
    expect(config.interpolation).toBe("rgb");
  });

  it("validates merged values on build", () => {
    const builder = new PaletteConfigBuilder({}).merge({ imageSampleSize: 0 });
    expect(() => builder.build()).toThrow(PaletteConfigError);
  });
});
