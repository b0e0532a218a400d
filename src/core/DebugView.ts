import type { DebugInfo, FrameDebugInfo } from "@/types";
import type Phaser from "phaser";

/**
 * One "key: value" line per debug entry, in insertion order
 */
export function formatDebugLines(info: DebugInfo): string[] {
  return Object.entries(info).map(([key, value]) => `${key}: ${value}`);
}

/**
 * Frame values first, then custom entries; a custom entry can override a
 * frame value of the same name
 */
export function buildDebugInfo(
  fps: number,
  frame: FrameDebugInfo,
  customInfo: Readonly<Record<string, string | number | boolean>>
): DebugInfo {
  return { fps: Math.round(fps), ...frame, ...customInfo };
}

/**
 * Debug overlay for displaying runtime information
 */
export class DebugView {
  private scene: Phaser.Scene;
  private textObject: Phaser.GameObjects.Text | null = null;
  private visible = false;
  private customInfo: Record<string, string | number | boolean> = {};

  constructor(scene: Phaser.Scene) {
    this.scene = scene;
  }

  /** Initialize the debug text display */
  create(): void {
    this.textObject = this.scene.add.text(10, 10, "", {
      fontFamily: "JetBrains Mono, monospace",
      fontSize: "14px",
      color: "#00ff88",
      backgroundColor: "rgba(0, 0, 0, 0.7)",
      padding: { x: 8, y: 6 },
    });
    this.textObject.setScrollFactor(0);
    this.textObject.setDepth(9999);
    this.textObject.setVisible(this.visible);
  }

  /** Toggle debug view visibility */
  toggle(): void {
    this.visible = !this.visible;
    this.textObject?.setVisible(this.visible);
  }

  /** Add or update custom debug info */
  setInfo(key: string, value: string | number | boolean): void {
    this.customInfo[key] = value;
  }

  /** Update the debug display */
  update(frame: FrameDebugInfo): void {
    if (!this.visible || !this.textObject) return;

    const info = buildDebugInfo(this.scene.game.loop.actualFps, frame, this.customInfo);
    this.textObject.setText(formatDebugLines(info).join("\n"));
  }

  /** Clean up resources */
  destroy(): void {
    this.textObject?.destroy();
    this.textObject = null;
    this.customInfo = {};
  }
}
