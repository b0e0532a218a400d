import { RaycastDebugLogger } from "@/debug/RaycastDebugLogger";
import { AngleUtils } from "@/math/Angle";
import type { Player } from "@/player";
import type { RenderSurface } from "@/render";
import type { MapSize, RayHit, Wall } from "@/types";
import type { View2D, View3D } from "@/views";

export interface SceneOptions {
  readonly map: MapSize;
  readonly walls: readonly Wall[];
  readonly player: Player;
  readonly top: View2D;
  readonly screen: View3D;
}

/**
 * Scene - walls, player and the cached ray hits of the last movement
 *
 * Hits are recomputed only on frames where the player actually turned or
 * moved; idle frames redraw the cached hits.
 */
export class Scene {
  readonly map: MapSize;
  readonly walls: readonly Wall[];
  readonly player: Player;
  private readonly top: View2D;
  private readonly screen: View3D;
  private rayHits: readonly RayHit[];

  constructor(options: SceneOptions) {
    this.map = options.map;
    this.walls = options.walls;
    this.player = options.player;
    this.top = options.top;
    this.screen = options.screen;
    this.rayHits = this.player.calcRayHits(this.walls);
  }

  /** Hits from the most recent recomputation */
  getRayHits(): readonly RayHit[] {
    return this.rayHits;
  }

  /**
   * Apply one frame of input.
   *
   * A move the border clamp rejects still counts as movement for the
   * recompute decision.
   *
   * @param rotation - Degrees to turn
   * @param distance - Signed distance along the heading
   * @returns true if the hits were recomputed
   */
  move(rotation: number, distance: number): boolean {
    if (rotation !== 0) {
      this.player.rotate(rotation);
    }

    if (distance !== 0 && this.player.canMove(distance, this.map.width, this.map.height)) {
      this.player.move(distance);
    }

    if (rotation === 0 && distance === 0) {
      return false;
    }

    this.rayHits = this.player.calcRayHits(this.walls);
    RaycastDebugLogger.logFrame({
      position: this.player.position,
      headingDegrees: AngleUtils.toDegrees(this.player.heading),
      rayCount: this.player.rays.length,
      hitCount: this.rayHits.length,
      walls: this.walls,
    });
    return true;
  }

  draw(surface: RenderSurface): void {
    this.top.draw(surface, this.player.position, this.walls, this.rayHits);
    this.screen.draw(surface, this.rayHits, this.map.width);
  }
}
