import { AngleUtils } from "@/math/Angle";
import { Ray, rayWallIntersect } from "@/math/Ray";
import { Vec2 } from "@/math/Vec2";
import { WallUtils } from "@/math/Wall";
import type { Angle, PlayerConfig, RayHit, Vector2, Wall } from "@/types";
import { DEFAULT_PLAYER_CONFIG } from "@/types";

/**
 * Player - viewpoint that carries a rigid fan of rays
 *
 * Ray i starts at heading - fov/2 + i * fov/numRays. The fan is built once
 * here and afterwards only moved and rotated together with the player.
 */
export class Player {
  private _position: Vector2;
  private _heading: Angle;
  private readonly _rays: readonly Ray[];
  private readonly config: PlayerConfig;

  constructor(
    position: Vector2,
    config: PlayerConfig = DEFAULT_PLAYER_CONFIG,
    heading: Angle = AngleUtils.fromDegrees(0)
  ) {
    this._position = position;
    this._heading = heading;
    this.config = config;

    const first = AngleUtils.subtractDegrees(heading, config.fieldOfView / 2);
    const step = config.fieldOfView / config.numRays;
    const rays: Ray[] = [];
    for (let i = 0; i < config.numRays; i++) {
      rays.push(new Ray(position, AngleUtils.addDegrees(first, i * step)));
    }
    this._rays = rays;
  }

  // =========================================================================
  // Getters
  // =========================================================================

  get position(): Vector2 {
    return this._position;
  }

  get heading(): Angle {
    return this._heading;
  }

  get rays(): readonly Ray[] {
    return this._rays;
  }

  getConfig(): PlayerConfig {
    return this.config;
  }

  // =========================================================================
  // Movement
  // =========================================================================

  /**
   * Check whether moving by a distance keeps the rounded position at least
   * one unit inside the map border. Interior walls are not considered.
   *
   * @param distance - Signed distance along the heading
   */
  canMove(distance: number, mapWidth: number, mapHeight: number): boolean {
    const target = this.positionAfter(distance);
    const x = Math.round(target.x);
    const y = Math.round(target.y);

    if (x < 1 || y < 1) {
      return false;
    }

    if (x >= mapWidth - 1 || y >= mapHeight - 1) {
      return false;
    }

    return true;
  }

  /**
   * Rotate heading and every ray by the same delta
   * @param degrees - Signed rotation
   */
  rotate(degrees: number): void {
    this._heading = AngleUtils.addDegrees(this._heading, degrees);
    for (const ray of this._rays) {
      ray.rotate(degrees);
    }
  }

  /**
   * Move along the current heading; negative distances move backward
   */
  move(distance: number): void {
    this._position = this.positionAfter(distance);
    for (const ray of this._rays) {
      ray.moveTo(this._position);
    }
  }

  private positionAfter(distance: number): Vector2 {
    return Vec2.add(this._position, Vec2.scale(Vec2.fromAngle(this._heading), distance));
  }

  // =========================================================================
  // Hit computation
  // =========================================================================

  /**
   * Nearest wall hit for every ray that hits something.
   *
   * Rays that miss every wall contribute no entry, so the result can be
   * shorter than the ray fan. Ties keep the first wall in list order.
   */
  calcRayHits(walls: readonly Wall[]): RayHit[] {
    const hits: RayHit[] = [];

    for (const ray of this._rays) {
      const direction = ray.direction;
      let nearestWall: Wall | null = null;
      let nearestTRay = Number.POSITIVE_INFINITY;
      let nearestTWall = 0;

      for (const wall of walls) {
        const result = rayWallIntersect(ray.origin, direction, wall);
        if (result.hit && result.tRay < nearestTRay) {
          nearestWall = wall;
          nearestTRay = result.tRay;
          nearestTWall = result.tWall;
        }
      }

      if (nearestWall === null) {
        continue;
      }

      const point = WallUtils.pointAt(nearestWall, nearestTWall);
      hits.push({
        perpendicularDistance:
          nearestTRay * Math.cos(AngleUtils.difference(ray.angle, this._heading)),
        hitX: point.x,
        hitY: point.y,
      });
    }

    return hits;
  }
}
