import { ControlState, DebugView, InputManager } from "@/core";
import { RaycastDebugLogger } from "@/debug/RaycastDebugLogger";
import { type Scene, createScene } from "@/engine";
import { AngleUtils } from "@/math/Angle";
import { PhaserSurface } from "@/render";
import type { RaycasterConfig } from "@/types";
import Phaser from "phaser";

/**
 * Main scene: runs one raycaster frame per Phaser update
 *
 * input -> deltas -> Scene.move -> clear -> Scene.draw -> present
 */
export class GameScene extends Phaser.Scene {
  private inputManager!: InputManager;
  private debugView!: DebugView;
  private surface!: PhaserSurface;
  private world!: Scene;
  private readonly config: RaycasterConfig;

  constructor(config: RaycasterConfig) {
    super({ key: "GameScene" });
    this.config = config;
  }

  create(): void {
    const { width, height } = this.scale;

    this.surface = new PhaserSurface(this, width, height);
    this.world = createScene(this.config, width, height);

    // Initialize input manager
    this.inputManager = new InputManager(
      this,
      new ControlState(this.config.rotationStep, this.config.moveStep)
    );

    // Initialize debug view
    this.debugView = new DebugView(this);
    this.debugView.create();

    // Toggle debug with backtick key
    this.inputManager.onKeyPress("Backquote", () => {
      this.debugView.toggle();
    });

    // Toggle raycast debug logging with 'L' key
    this.debugView.setInfo("logging", RaycastDebugLogger.isEnabled());
    this.inputManager.onKeyPress("KeyL", () => {
      RaycastDebugLogger.toggle();
      this.debugView.setInfo("logging", RaycastDebugLogger.isEnabled());
    });

    // Dump raycast logs with 'D' key
    this.inputManager.onKeyPress("KeyD", () => {
      RaycastDebugLogger.dump();
    });

    // Export last log as test setup with 'E' key
    this.inputManager.onKeyPress("KeyE", () => {
      RaycastDebugLogger.exportToConsole();
    });

    this.events.once(Phaser.Scenes.Events.SHUTDOWN, () => {
      this.inputManager.destroy();
      this.debugView.destroy();
      this.surface.destroy();
    });

    console.log(
      `[RAYCASTER] Map ${this.config.map.width}x${this.config.map.height}, ${this.world.walls.length} walls, ${this.config.player.numRays} rays`
    );
  }

  update(): void {
    if (this.inputManager.shouldQuit()) {
      console.log("[RAYCASTER] Quit requested");
      this.game.destroy(true);
      return;
    }

    const { rotation, distance } = this.inputManager.getMovementDeltas();
    this.world.move(rotation, distance);

    this.surface.clear();
    this.world.draw(this.surface);
    this.surface.present();

    const { position, heading, rays } = this.world.player;
    this.debugView.update({
      position: `(${position.x.toFixed(1)}, ${position.y.toFixed(1)})`,
      heading: Math.round(AngleUtils.toDegrees(heading)),
      rays: rays.length,
      hits: this.world.getRayHits().length,
    });
  }
}
