import { Colors } from "@/render/Color";
import type { RenderSurface } from "@/render/RenderSurface";
import type { RayHit, Vector2, ViewRect, Wall } from "@/types";
import { drawViewBorder } from "./View";

/** Number of boundary walls at the start of every wall list */
const BOUNDARY_WALL_COUNT = 4;

/** Ray lines are drawn at 33% gray */
const RAY_BRIGHTNESS = 33;

/**
 * View2D - top-down map with the ray paths of the current frame
 */
export class View2D {
  readonly rect: ViewRect;
  readonly scale: number;

  constructor(rect: ViewRect, scale: number) {
    this.rect = rect;
    this.scale = scale;
  }

  /** Map coordinate to screen pixel */
  toScreen(point: Vector2): Vector2 {
    return {
      x: Math.round(point.x * this.scale + this.rect.x),
      y: Math.round(point.y * this.scale + this.rect.y),
    };
  }

  draw(
    surface: RenderSurface,
    playerPosition: Vector2,
    walls: readonly Wall[],
    hits: readonly RayHit[]
  ): void {
    const from = this.toScreen(playerPosition);
    const rayColor = Colors.gray(RAY_BRIGHTNESS);
    for (const hit of hits) {
      const to = this.toScreen({ x: hit.hitX, y: hit.hitY });
      surface.drawLine(from.x, from.y, to.x, to.y, rayColor);
    }

    // Boundary walls coincide with the view border
    for (const wall of walls.slice(BOUNDARY_WALL_COUNT)) {
      const start = this.toScreen({ x: wall.x1, y: wall.y1 });
      const end = this.toScreen({ x: wall.x2, y: wall.y2 });
      surface.drawLine(start.x, start.y, end.x, end.y, Colors.white());
    }

    drawViewBorder(surface, this.rect);
  }
}
