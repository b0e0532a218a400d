import type { Direction, MovementDeltas } from "@/types";

/**
 * ControlState - turns discrete key events into per-frame deltas
 *
 * Pressing a key sets its delta outright. Releasing a key clears the delta
 * only if it still points that key's way, so releasing Left while Right is
 * the latest press keeps turning right.
 */
export class ControlState {
  private rotation = 0;
  private distance = 0;
  private readonly rotationStep: number;
  private readonly moveStep: number;

  constructor(rotationStep: number, moveStep: number) {
    this.rotationStep = rotationStep;
    this.moveStep = moveStep;
  }

  keyDown(direction: Direction): void {
    switch (direction) {
      case "left":
        this.rotation = -this.rotationStep;
        break;
      case "right":
        this.rotation = this.rotationStep;
        break;
      case "up":
        this.distance = this.moveStep;
        break;
      case "down":
        this.distance = -this.moveStep;
        break;
    }
  }

  keyUp(direction: Direction): void {
    switch (direction) {
      case "left":
        if (this.rotation < 0) this.rotation = 0;
        break;
      case "right":
        if (this.rotation > 0) this.rotation = 0;
        break;
      case "up":
        if (this.distance > 0) this.distance = 0;
        break;
      case "down":
        if (this.distance < 0) this.distance = 0;
        break;
    }
  }

  /** Current deltas to apply this frame */
  getDeltas(): MovementDeltas {
    return { rotation: this.rotation, distance: this.distance };
  }

  reset(): void {
    this.rotation = 0;
    this.distance = 0;
  }
}

/** Keyboard codes of the four directional keys */
const DIRECTION_KEYS: ReadonlyMap<string, Direction> = new Map<string, Direction>([
  ["ArrowLeft", "left"],
  ["ArrowRight", "right"],
  ["ArrowUp", "up"],
  ["ArrowDown", "down"],
]);

/**
 * Direction bound to a KeyboardEvent.code, or null for other keys
 */
export function directionForKey(code: string): Direction | null {
  return DIRECTION_KEYS.get(code) ?? null;
}
