import { drawViewBorder, layoutViews } from "@/views/View";
import { RecordingSurface } from "@test/helpers/RecordingSurface";
import { describe, expect, it } from "vitest";

describe("layoutViews", () => {
  it("should give the map view a third of the width and the 3D view two thirds", () => {
    const layout = layoutViews(960, 600, { width: 320, height: 240 });

    expect(layout.topScale).toBe(1);
    expect(layout.top).toEqual({ x: 0, y: 180, width: 321, height: 240 });
    expect(layout.screen).toEqual({ x: 320, y: 60, width: 640, height: 480 });
  });

  it("should scale the map view to the screen", () => {
    const layout = layoutViews(1920, 1080, { width: 320, height: 240 });

    expect(layout.topScale).toBe(2);
    expect(layout.top).toEqual({ x: 0, y: 300, width: 641, height: 480 });
    expect(layout.screen).toEqual({ x: 640, y: 60, width: 1280, height: 960 });
  });
});

describe("drawViewBorder", () => {
  it("should outline the rectangle in the border color", () => {
    const surface = new RecordingSurface();

    drawViewBorder(surface, { x: 1, y: 2, width: 3, height: 4 });

    expect(surface.calls).toEqual([
      { kind: "rect", x: 1, y: 2, width: 3, height: 4, color: { r: 0, g: 50, b: 100 } },
    ]);
  });
});
