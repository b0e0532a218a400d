import type { Vector2, Wall } from "@/types";
import { mix } from "./interpolate";
import { Vec2 } from "./Vec2";

/**
 * WallUtils - Pure utility functions for wall segments
 */
export const WallUtils = {
  /**
   * Create a wall between two map points
   */
  create(x1: number, y1: number, x2: number, y2: number): Wall {
    return Object.freeze({ x1, y1, x2, y2 });
  },

  start(wall: Wall): Vector2 {
    return { x: wall.x1, y: wall.y1 };
  },

  end(wall: Wall): Vector2 {
    return { x: wall.x2, y: wall.y2 };
  },

  /**
   * Point at parameter t along the wall (0 = start, 1 = end)
   */
  pointAt(wall: Wall, t: number): Vector2 {
    return { x: mix(wall.x1, wall.x2, t), y: mix(wall.y1, wall.y2, t) };
  },

  /**
   * Get length of wall
   */
  length(wall: Wall): number {
    return Vec2.distance(WallUtils.start(wall), WallUtils.end(wall));
  },
};
