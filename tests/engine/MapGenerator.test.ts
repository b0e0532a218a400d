import { createBoundaryWalls, generateWalls } from "@/engine/MapGenerator";
import { describe, expect, it } from "vitest";

function sequence(values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}

describe("createBoundaryWalls", () => {
  it("should enclose the map in left, top, right, bottom order", () => {
    expect(createBoundaryWalls({ width: 320, height: 240 })).toEqual([
      { x1: 0, y1: 0, x2: 0, y2: 239 },
      { x1: 0, y1: 0, x2: 319, y2: 0 },
      { x1: 319, y1: 0, x2: 319, y2: 239 },
      { x1: 0, y1: 239, x2: 319, y2: 239 },
    ]);
  });
});

describe("generateWalls", () => {
  it("should return only the boundary without interior walls", () => {
    expect(generateWalls({ width: 320, height: 240 }, 0)).toHaveLength(4);
  });

  it("should append interior walls with integer endpoints from the random source", () => {
    const random = sequence([0, 0.5, 0.25, 0.999, 0.1, 0.2, 0.3, 0.4]);

    const walls = generateWalls({ width: 320, height: 240 }, 2, random);

    expect(walls).toHaveLength(6);
    expect(walls[4]).toEqual({ x1: 0, y1: 119, x2: 79, y2: 238 });
    expect(walls[5]).toEqual({ x1: 31, y1: 47, x2: 95, y2: 95 });
  });

  it("should keep interior endpoints inside the map", () => {
    const walls = generateWalls({ width: 50, height: 30 }, 20);

    for (const wall of walls.slice(4)) {
      for (const x of [wall.x1, wall.x2]) {
        expect(Number.isInteger(x)).toBe(true);
        expect(x).toBeGreaterThanOrEqual(0);
        expect(x).toBeLessThan(49);
      }
      for (const y of [wall.y1, wall.y2]) {
        expect(Number.isInteger(y)).toBe(true);
        expect(y).toBeGreaterThanOrEqual(0);
        expect(y).toBeLessThan(29);
      }
    }
  });
});
