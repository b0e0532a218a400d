import type { Angle, RayWallIntersection, Vector2, Wall } from "@/types";
import { AngleUtils } from "./Angle";
import { Vec2 } from "./Vec2";

/**
 * No hit result constant
 */
const NO_HIT: RayWallIntersection = { hit: false };

/**
 * Calculate intersection between a forward ray and a wall segment
 *
 * Solves the two line equations in normal form:
 * - nw = (y2 - y1, x1 - x2) is the wall normal
 * - nr = (dir.y, -dir.x) is the ray normal
 *
 * A hit needs 0 < tWall < 1 (endpoints excluded) and tRay > 0
 * (a ray starting on the wall does not hit it).
 *
 * @param origin - Ray origin
 * @param direction - Unit ray direction
 * @param wall - Wall segment to test against
 */
export function rayWallIntersect(origin: Vector2, direction: Vector2, wall: Wall): RayWallIntersection {
  const nwx = wall.y2 - wall.y1;
  const nwy = wall.x1 - wall.x2;
  const nrx = direction.y;
  const nry = -direction.x;

  const den = nry * nwx - nrx * nwy;

  // Parallel or coincident lines; exact comparison is intended
  if (den === 0) {
    return NO_HIT;
  }

  const dx = wall.x1 - origin.x;
  const dy = wall.y1 - origin.y;

  const tWall = -(nrx * dx + nry * dy) / den;
  const tRay = -(nwy * dy + nwx * dx) / den;

  if (tWall > 0 && tWall < 1 && tRay > 0) {
    return { hit: true, tWall, tRay };
  }

  return NO_HIT;
}

/**
 * Ray - origin and angle of one slot in a player's ray fan
 *
 * Mutable: the owning player moves the origin and rotates the angle.
 */
export class Ray {
  private _origin: Vector2;
  private _angle: Angle;

  constructor(origin: Vector2, angle: Angle) {
    this._origin = origin;
    this._angle = angle;
  }

  get origin(): Vector2 {
    return this._origin;
  }

  get angle(): Angle {
    return this._angle;
  }

  /** Unit direction vector of this ray */
  get direction(): Vector2 {
    return Vec2.fromAngle(this._angle);
  }

  /** Rotate by a delta in degrees */
  rotate(degrees: number): void {
    this._angle = AngleUtils.addDegrees(this._angle, degrees);
  }

  moveTo(origin: Vector2): void {
    this._origin = origin;
  }

  intersect(wall: Wall): RayWallIntersection {
    return rayWallIntersect(this._origin, this.direction, wall);
  }
}
