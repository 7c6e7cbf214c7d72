import { describe, it, expect } from "vitest";
import { renderSwatch } from "@/features/palettes/preview/swatch";

describe("renderSwatch", () => {
  it("draws one labelled bar per color over a grey background", () => {
    const svg = renderSwatch(["#FF0000", "#0000ff"]);

    expect(svg.split("\n")).toEqual([
      '<svg xmlns="http://www.w3.org/2000/svg" width="80" height="184" viewBox="0 0 80 184">',
      '<rect width="80" height="184" fill="#BFBFBF"/>',
      '<rect x="0" y="0" width="40" height="120" fill="#FF0000"/>' +
        '<text x="20" y="126" transform="rotate(90 20 126)" font-family="monospace" font-size="11" ' +
        'dominant-baseline="middle" fill="#1A1A1A">#FF0000</text>',
      '<rect x="40" y="0" width="40" height="120" fill="#0000FF"/>' +
        '<text x="60" y="126" transform="rotate(90 60 126)" font-family="monospace" font-size="11" ' +
        'dominant-baseline="middle" fill="#1A1A1A">#0000FF</text>',
      "</svg>",
    ]);
  });

  it("honors bar dimensions", () => {
    const svg = renderSwatch(["#000000"], { barWidth: 10, barHeight: 20, labelHeight: 30 });
    expect(svg.split("\n")[0]).toBe('<svg xmlns="http://www.w3.org/2000/svg" width="10" height="50" viewBox="0 0 10 50">');
  });

  it("renders an empty strip for no colors", () => {
    expect(renderSwatch([]).split("\n")).toEqual([
      '<svg xmlns="http://www.w3.org/2000/svg" width="0" height="184" viewBox="0 0 0 184">',
      '<rect width="0" height="184" fill="#BFBFBF"/>',
      "</svg>",
    ]);
  });
});
