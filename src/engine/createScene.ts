import { AngleUtils } from "@/math/Angle";
import { Player } from "@/player";
import type { RaycasterConfig } from "@/types";
import { View2D, View3D, layoutViews } from "@/views";
import { type RandomSource, generateWalls } from "./MapGenerator";
import { Scene } from "./Scene";

/**
 * Build a scene with a freshly generated map and the player at its centre,
 * facing along +x.
 */
export function createScene(
  config: RaycasterConfig,
  screenWidth: number,
  screenHeight: number,
  random: RandomSource = Math.random
): Scene {
  const { map } = config;
  const layout = layoutViews(screenWidth, screenHeight, map);

  return new Scene({
    map,
    walls: generateWalls(map, config.interiorWallCount, random),
    player: new Player(
      { x: map.width / 2, y: map.height / 2 },
      config.player,
      AngleUtils.fromDegrees(0)
    ),
    top: new View2D(layout.top, layout.topScale),
    screen: new View3D(layout.screen),
  });
}
