import { AngleUtils } from "@/math/Angle";
import { Vec2 } from "@/math/Vec2";
import { WallUtils } from "@/math/Wall";
import { Player } from "@/player/Player";
import { DEFAULT_PLAYER_CONFIG } from "@/types";
import { afterEach, describe, expect, it, vi } from "vitest";

const FOUR_RAYS = { numRays: 4, fieldOfView: 60 };

function rayOffsetsInDegrees(player: Player): number[] {
  return player.rays.map((ray) =>
    AngleUtils.toDegrees(AngleUtils.fromRadians(AngleUtils.difference(ray.angle, player.heading)))
  );
}

describe("Player", () => {
  describe("ray fan", () => {
    it("should build the default 320-ray fan", () => {
      const player = new Player({ x: 10, y: 10 });

      expect(player.rays).toHaveLength(320);
      expect(player.getConfig()).toBe(DEFAULT_PLAYER_CONFIG);
    });

    it("should lay rays out from heading - fov/2 in equal steps", () => {
      const player = new Player({ x: 10, y: 10 }, FOUR_RAYS);
      const offsets = rayOffsetsInDegrees(player);

      expect(offsets[0]).toBeCloseTo(-30);
      expect(offsets[1]).toBeCloseTo(-15);
      expect(offsets[2]).toBeCloseTo(0);
      expect(offsets[3]).toBeCloseTo(15);
    });

    it("should start every ray at the player position", () => {
      const player = new Player({ x: 7, y: 9 }, FOUR_RAYS);

      for (const ray of player.rays) {
        expect(ray.origin).toEqual({ x: 7, y: 9 });
      }
    });

    it("should place the fan around a non-zero heading", () => {
      const player = new Player({ x: 0, y: 0 }, FOUR_RAYS, AngleUtils.fromDegrees(90));

      expect(AngleUtils.toDegrees(player.rays[0].angle)).toBeCloseTo(60);
      expect(AngleUtils.toDegrees(player.rays[3].angle)).toBeCloseTo(105);
    });
  });

  describe("rotate", () => {
    it("should turn heading and rays together", () => {
      const player = new Player({ x: 10, y: 10 }, FOUR_RAYS);
      const before = rayOffsetsInDegrees(player);

      player.rotate(90);

      expect(AngleUtils.toDegrees(player.heading)).toBeCloseTo(90);
      expect(AngleUtils.toDegrees(player.rays[0].angle)).toBeCloseTo(60);
      const after = rayOffsetsInDegrees(player);
      after.forEach((offset, i) => expect(offset).toBeCloseTo(before[i]));
    });

    it("should keep the same ray objects", () => {
      const player = new Player({ x: 10, y: 10 }, FOUR_RAYS);
      const rays = player.rays;

      player.rotate(-45);

      expect(player.rays).toBe(rays);
    });

    it("should leave everything unchanged for a zero delta", () => {
      const player = new Player({ x: 10, y: 10 }, FOUR_RAYS);
      const heading = player.heading;

      player.rotate(0);

      expect(player.heading.radians).toBe(heading.radians);
    });
  });

  describe("move", () => {
    it("should move along the heading and carry the rays", () => {
      const player = new Player({ x: 50, y: 50 }, FOUR_RAYS);

      player.move(10);

      expect(player.position).toEqual({ x: 60, y: 50 });
      for (const ray of player.rays) {
        expect(ray.origin).toEqual({ x: 60, y: 50 });
      }
    });

    it("should move backward for a negative distance", () => {
      const player = new Player({ x: 50, y: 50 }, FOUR_RAYS);

      player.move(-10);

      expect(player.position).toEqual({ x: 40, y: 50 });
    });

    it("should follow a rotated heading", () => {
      const player = new Player({ x: 50, y: 50 }, FOUR_RAYS);

      player.rotate(90);
      player.move(10);

      expect(player.position.x).toBeCloseTo(50);
      expect(player.position.y).toBeCloseTo(60);
    });

    it("should leave the position unchanged for a zero delta", () => {
      const player = new Player({ x: 50, y: 50 }, FOUR_RAYS);

      player.move(0);

      expect(player.position).toEqual({ x: 50, y: 50 });
    });
  });

  describe("canMove", () => {
    const W = 320;
    const H = 240;

    it("should allow a move that stays inside the border", () => {
      const player = new Player({ x: 2, y: 2 }, FOUR_RAYS, AngleUtils.fromDegrees(180));
      expect(player.canMove(1, W, H)).toBe(true);
    });

    it("should reject a move whose rounded x falls below 1", () => {
      const player = new Player({ x: 2, y: 2 }, FOUR_RAYS, AngleUtils.fromDegrees(180));
      expect(player.canMove(1.6, W, H)).toBe(false);
    });

    it("should reject a diagonal move past the top-left corner", () => {
      const player = new Player({ x: 2, y: 2 }, FOUR_RAYS, AngleUtils.fromDegrees(225));

      expect(player.canMove(1, W, H)).toBe(true);
      expect(player.canMove(3, W, H)).toBe(false);
    });

    it("should reject reaching width - 1", () => {
      const player = new Player({ x: 317, y: 120 }, FOUR_RAYS);

      expect(player.canMove(1, W, H)).toBe(true);
      expect(player.canMove(2, W, H)).toBe(false);
    });

    it("should reject reaching height - 1", () => {
      const player = new Player({ x: 160, y: 237 }, FOUR_RAYS, AngleUtils.fromDegrees(90));

      expect(player.canMove(1, W, H)).toBe(true);
      expect(player.canMove(2, W, H)).toBe(false);
    });

    it("should check backward moves too", () => {
      const player = new Player({ x: 2, y: 120 }, FOUR_RAYS);
      expect(player.canMove(-1.6, W, H)).toBe(false);
    });

    it("should not move the player", () => {
      const player = new Player({ x: 2, y: 2 }, FOUR_RAYS, AngleUtils.fromDegrees(180));

      player.canMove(1, W, H);

      expect(player.position).toEqual({ x: 2, y: 2 });
    });
  });

  describe("calcRayHits", () => {
    const farWall = WallUtils.create(100, -1000, 100, 1000);

    it("should return one hit per ray that hits a wall", () => {
      const player = new Player({ x: 50, y: 50 }, FOUR_RAYS);
      expect(player.calcRayHits([farWall])).toHaveLength(4);
    });

    it("should omit rays that miss every wall", () => {
      // Only the rays at 0° and 15° reach this short wall
      const shortWall = WallUtils.create(100, 45, 100, 70);
      const player = new Player({ x: 50, y: 50 }, FOUR_RAYS);

      const hits = player.calcRayHits([shortWall]);

      expect(hits).toHaveLength(2);
      expect(hits[0].hitY).toBeCloseTo(50);
      expect(hits[1].hitY).toBeCloseTo(50 + 50 * Math.tan(Math.PI / 12));
    });

    it("should return no hits without walls", () => {
      const player = new Player({ x: 50, y: 50 }, FOUR_RAYS);
      expect(player.calcRayHits([])).toEqual([]);
    });

    it("should keep the nearest wall regardless of list order", () => {
      const near = WallUtils.create(5, -5, 5, 5);
      const far = WallUtils.create(10, -5, 10, 5);
      const player = new Player({ x: 0, y: 0 }, { numRays: 2, fieldOfView: 60 });

      for (const walls of [
        [near, far],
        [far, near],
      ]) {
        const hits = player.calcRayHits(walls);
        expect(hits).toHaveLength(2);
        expect(hits[1]).toEqual({ perpendicularDistance: 5, hitX: 5, hitY: 0 });
      }
    });

    describe("with walls at equal distance", () => {
      // Both walls cross the ray at (5, 0) with tRay = 5 and tWall = 0.5
      const vertical = WallUtils.create(5, -5, 5, 5);
      const diagonal = WallUtils.create(0, 5, 10, -5);
      const oneRayAtZero = { numRays: 1, fieldOfView: 60 };

      afterEach(() => {
        vi.restoreAllMocks();
      });

      it("should take the hit point from the first wall in list order", () => {
        const player = new Player({ x: 0, y: 0 }, oneRayAtZero, AngleUtils.fromDegrees(30));
        const pointAt = vi.spyOn(WallUtils, "pointAt");

        for (const walls of [
          [vertical, diagonal],
          [diagonal, vertical],
        ]) {
          const hits = player.calcRayHits(walls);

          expect(hits).toEqual([{ perpendicularDistance: 5, hitX: 5, hitY: 0 }]);
          expect(pointAt).toHaveBeenCalledTimes(1);
          expect(pointAt).toHaveBeenCalledWith(walls[0], 0.5);
          pointAt.mockClear();
        }
      });
    });

    it("should not correct the center ray", () => {
      const player = new Player({ x: 50, y: 50 }, FOUR_RAYS);

      const center = player.calcRayHits([farWall])[2];

      expect(center.perpendicularDistance).toBe(50);
      expect(center.hitX).toBe(100);
      expect(center.hitY).toBeCloseTo(50);
    });

    it("should report the perpendicular distance for an edge ray", () => {
      const player = new Player({ x: 50, y: 50 }, FOUR_RAYS);
      const position = player.position;

      const edge = player.calcRayHits([farWall])[0];
      const trueDistance = Vec2.distance(position, { x: edge.hitX, y: edge.hitY });

      expect(edge.hitX).toBeCloseTo(100);
      expect(edge.hitY).toBeCloseTo(50 - 50 * Math.tan(Math.PI / 6));
      expect(trueDistance).toBeCloseTo(50 / Math.cos(Math.PI / 6));
      expect(edge.perpendicularDistance).toBeCloseTo(trueDistance * Math.cos(Math.PI / 6));
      expect(edge.perpendicularDistance).toBeLessThan(trueDistance);
    });

    it("should follow the player after a move", () => {
      const player = new Player({ x: 50, y: 50 }, FOUR_RAYS);

      player.move(20);

      expect(player.calcRayHits([farWall])[2].perpendicularDistance).toBe(30);
    });
  });
});
