/**
 * Swatch Preview
 * SVG strip of equal-width bars, each labelled with its hex code
 */

import { PREVIEW_COLORS, toHex, type HexColor } from "../../../core/utils/color";

export interface SwatchOptions {
  /** Width of one bar in px (default: 40) */
  barWidth?: number;
  /** Height of the bars in px (default: 120) */
  barHeight?: number;
  /** Space beneath the bars for labels in px (default: 64) */
  labelHeight?: number;
}

const LABEL_FONT_SIZE = 11;

/**
 * Render colors as an SVG document
 *
 * @example
 * renderSwatch(["#FF0000", "#0000FF"]) // '<svg xmlns="http://www.w3.org/2000/svg" width="80" ...'
 */
export function renderSwatch(colors: readonly HexColor[], options: SwatchOptions = {}): string {
  const { barWidth = 40, barHeight = 120, labelHeight = 64 } = options;
  const width = barWidth * colors.length;
  const height = barHeight + labelHeight;

  const bars = colors.map((c, i) => {
    const hex = toHex(c);
    const x = i * barWidth;
    const labelX = x + barWidth / 2;
    const labelY = barHeight + 6;
    return [
      `<rect x="${x}" y="0" width="${barWidth}" height="${barHeight}" fill="${hex}"/>`,
      `<text x="${labelX}" y="${labelY}" transform="rotate(90 ${labelX} ${labelY})" ` +
        `font-family="monospace" font-size="${LABEL_FONT_SIZE}" dominant-baseline="middle" ` +
        `fill="${PREVIEW_COLORS.label}">${hex}</text>`,
    ].join("");
  });

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect width="${width}" height="${height}" fill="${PREVIEW_COLORS.background}"/>`,
    ...bars,
    "</svg>",
  ].join("\n");
}
