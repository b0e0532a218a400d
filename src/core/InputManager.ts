import type { MovementDeltas } from "@/types";
import type Phaser from "phaser";
import { ControlState, directionForKey } from "./ControlState";

/** Key that ends the program */
const QUIT_KEY = "Escape";

/**
 * Manages keyboard input for the raycaster
 * Arrow keys drive the movement deltas; Escape raises the quit flag
 */
export class InputManager {
  private scene: Phaser.Scene;
  private controls: ControlState;
  private keyCallbacks: Map<string, () => void> = new Map();
  private quitRequested = false;

  constructor(scene: Phaser.Scene, controls: ControlState) {
    this.scene = scene;
    this.controls = controls;

    this.setupInputListeners();
  }

  private setupInputListeners(): void {
    this.scene.input.keyboard?.on("keydown", (event: KeyboardEvent) => {
      this.handleKeyDown(event.code, event.repeat);
    });

    this.scene.input.keyboard?.on("keyup", (event: KeyboardEvent) => {
      this.handleKeyUp(event.code);
    });
  }

  private handleKeyDown(code: string, repeat: boolean): void {
    if (code === QUIT_KEY) {
      this.quitRequested = true;
      return;
    }

    const direction = directionForKey(code);
    if (direction) {
      this.controls.keyDown(direction);
      return;
    }

    // Held keys auto-repeat; toggles fire once per press
    if (repeat) return;
    const callback = this.keyCallbacks.get(code);
    if (callback) callback();
  }

  private handleKeyUp(code: string): void {
    const direction = directionForKey(code);
    if (direction) {
      this.controls.keyUp(direction);
    }
  }

  /** Register a callback for a specific key press */
  onKeyPress(keyCode: string, callback: () => void): void {
    this.keyCallbacks.set(keyCode, callback);
  }

  /** Movement deltas for the current frame */
  getMovementDeltas(): MovementDeltas {
    return this.controls.getDeltas();
  }

  /** Check if the quit key has been pressed */
  shouldQuit(): boolean {
    return this.quitRequested;
  }

  /** Clean up input listeners */
  destroy(): void {
    this.scene.input.keyboard?.off("keydown");
    this.scene.input.keyboard?.off("keyup");
    this.keyCallbacks.clear();
    this.controls.reset();
  }
}
