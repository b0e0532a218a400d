import type { GameOptions } from "@/types";
import Phaser from "phaser";

/**
 * Default game options
 */
export const DEFAULT_GAME_OPTIONS: GameOptions = {
  width: 1280,
  height: 720,
  backgroundColor: 0x000000,
  /** One frame roughly every 10 ms */
  targetFps: 100,
};

/**
 * Creates the Phaser game configuration
 *
 * Canvas renderer: every frame is a few hundred flat rectangles and lines,
 * drawn through a single Graphics object.
 */
export function createGameConfig(
  scenes: Phaser.Types.Scenes.SceneType[],
  options: Partial<GameOptions> = {}
): Phaser.Types.Core.GameConfig {
  const opts = { ...DEFAULT_GAME_OPTIONS, ...options };

  return {
    type: Phaser.CANVAS,
    width: opts.width,
    height: opts.height,
    backgroundColor: opts.backgroundColor,
    parent: "game-container",
    scene: scenes,
    fps: {
      target: opts.targetFps,
      // Fixed timer pacing instead of vsync
      forceSetTimeOut: true,
    },
    scale: {
      mode: Phaser.Scale.FIT,
      autoCenter: Phaser.Scale.CENTER_BOTH,
    },
    render: {
      antialias: false,
      pixelArt: true,
      roundPixels: true,
    },
  };
}
