import { Colors } from "@/render/Color";
import type { RenderSurface } from "@/render/RenderSurface";
import type { MapSize, ViewRect } from "@/types";

/**
 * Draw the frame around a view's rectangle
 */
export function drawViewBorder(surface: RenderSurface, rect: ViewRect): void {
  surface.drawRect(rect.x, rect.y, rect.width, rect.height, Colors.border());
}

/** Screen rectangles and 2D scale for both views */
export interface ViewLayout {
  readonly top: ViewRect;
  readonly topScale: number;
  readonly screen: ViewRect;
}

/**
 * Split the screen: one third for the top-down map, two thirds for the
 * first-person view, both centred vertically.
 *
 * The first-person view is twice the map view's height, so screens shorter
 * than 2 * (mapHeight * scale) clip it at top and bottom.
 */
export function layoutViews(screenWidth: number, screenHeight: number, map: MapSize): ViewLayout {
  const w = screenWidth / 3;
  const scale = w / map.width;
  const h = map.height * scale;

  return {
    top: centredRect(0, Math.trunc(w + 1), Math.trunc(h), screenHeight),
    topScale: scale,
    screen: centredRect(Math.trunc(w), Math.trunc(w * 2), Math.trunc(h * 2), screenHeight),
  };
}

function centredRect(x: number, width: number, height: number, screenHeight: number): ViewRect {
  return { x, y: Math.trunc((screenHeight - height) / 2), width, height };
}
