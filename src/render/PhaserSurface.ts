import type { Color } from "@/types";
import type Phaser from "phaser";
import { Colors } from "./Color";
import type { RenderSurface } from "./RenderSurface";

/**
 * RenderSurface backed by a Phaser Graphics object
 *
 * Phaser presents the canvas itself after each scene update, so present()
 * only has to leave the recorded commands in place.
 */
export class PhaserSurface implements RenderSurface {
  private readonly graphics: Phaser.GameObjects.Graphics;
  private readonly width: number;
  private readonly height: number;
  private readonly background: Color;

  constructor(scene: Phaser.Scene, width: number, height: number, background: Color = Colors.black()) {
    this.graphics = scene.add.graphics();
    this.width = width;
    this.height = height;
    this.background = background;
  }

  clear(): void {
    this.graphics.clear();
    this.graphics.fillStyle(Colors.toHex(this.background), 1);
    this.graphics.fillRect(0, 0, this.width, this.height);
  }

  present(): void {
    // Phaser renders the display list after update()
  }

  drawLine(x1: number, y1: number, x2: number, y2: number, color: Color): void {
    this.graphics.lineStyle(1, Colors.toHex(color), 1);
    this.graphics.lineBetween(x1, y1, x2, y2);
  }

  drawFilledRect(x: number, y: number, width: number, height: number, color: Color): void {
    this.graphics.fillStyle(Colors.toHex(color), 1);
    this.graphics.fillRect(x, y, width, height);
  }

  drawRect(x: number, y: number, width: number, height: number, color: Color): void {
    this.graphics.lineStyle(1, Colors.toHex(color), 1);
    this.graphics.strokeRect(x, y, width, height);
  }

  /** Clean up resources */
  destroy(): void {
    this.graphics.destroy();
  }
}
