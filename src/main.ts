import Phaser from "phaser";
import { createGameConfig } from "@/config/gameConfig";
import { createRaycasterConfig } from "@/config";
import { GameScene } from "@/scenes";

/**
 * Main entry point for the raycaster
 * Arrow keys turn and walk, Escape quits
 */
function startGame(): void {
  const scene = new GameScene(createRaycasterConfig());
  new Phaser.Game(createGameConfig([scene]));
}

try {
  startGame();
} catch (error) {
  console.error("[RAYCASTER] Failed to start:", error);
}
