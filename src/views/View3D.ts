import { clamp, mapRange } from "@/math/interpolate";
import { Colors } from "@/render/Color";
import type { RenderSurface } from "@/render/RenderSurface";
import type { RayHit, ViewRect, WallSlice } from "@/types";
import { drawViewBorder } from "./View";

/**
 * Turn ray hits into vertical wall slices.
 *
 * - Width: the view width split evenly over the hits. Rays that miss are
 *   absent from `hits`, so the remaining slices widen to fill the view.
 * - Height: linear in distance, full height at 0 and zero at mapWidth.
 * - Brightness: linear in squared distance, 100% at 0 and 0% at mapWidth.
 */
export function computeWallSlices(
  hits: readonly RayHit[],
  rect: ViewRect,
  mapWidth: number
): WallSlice[] {
  if (hits.length === 0) {
    return [];
  }

  const width = Math.floor(rect.width / hits.length);

  return hits.map((hit, i) => {
    const d = hit.perpendicularDistance;
    const height = Math.max(0, Math.trunc(mapRange(d, 0, mapWidth, rect.height, 0)));
    const brightness = Math.trunc(clamp(mapRange(d * d, 0, mapWidth * mapWidth, 100, 0), 0, 100));

    return {
      x: rect.x + i * width,
      y: rect.y + Math.trunc((rect.height - height) / 2),
      width,
      height,
      brightness,
    };
  });
}

/**
 * View3D - first-person projection of the ray hits
 */
export class View3D {
  readonly rect: ViewRect;

  constructor(rect: ViewRect) {
    this.rect = rect;
  }

  draw(surface: RenderSurface, hits: readonly RayHit[], mapWidth: number): void {
    for (const slice of computeWallSlices(hits, this.rect, mapWidth)) {
      surface.drawFilledRect(slice.x, slice.y, slice.width, slice.height, Colors.gray(slice.brightness));
    }

    drawViewBorder(surface, this.rect);
  }
}
