import { WallUtils } from "@/math/Wall";
import type { MapSize, Wall } from "@/types";

/** Source of uniform numbers in [0, 1) */
export type RandomSource = () => number;

/**
 * The four walls on the map's rectangle: left, top, right, bottom
 */
export function createBoundaryWalls(map: MapSize): Wall[] {
  const w = map.width - 1;
  const h = map.height - 1;

  return [
    WallUtils.create(0, 0, 0, h),
    WallUtils.create(0, 0, w, 0),
    WallUtils.create(w, 0, w, h),
    WallUtils.create(0, h, w, h),
  ];
}

/**
 * Boundary walls followed by randomly placed interior walls.
 * Interior endpoints are integers in [0, width - 1) x [0, height - 1).
 */
export function generateWalls(
  map: MapSize,
  interiorWallCount: number,
  random: RandomSource = Math.random
): Wall[] {
  const walls = createBoundaryWalls(map);
  const w = map.width - 1;
  const h = map.height - 1;
  const randomInt = (max: number) => Math.floor(random() * max);

  for (let i = 0; i < interiorWallCount; i++) {
    walls.push(WallUtils.create(randomInt(w), randomInt(h), randomInt(w), randomInt(h)));
  }

  return walls;
}
