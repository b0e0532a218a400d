import type { Color } from "@/types";

/**
 * RenderSurface - the drawing primitives the views need
 *
 * Coordinates are integer pixels; rectangles are axis-aligned.
 */
export interface RenderSurface {
  /** Wipe the frame to the background color */
  clear(): void;

  /** Show the finished frame */
  present(): void;

  drawLine(x1: number, y1: number, x2: number, y2: number, color: Color): void;

  drawFilledRect(x: number, y: number, width: number, height: number, color: Color): void;

  /** Rectangle outline */
  drawRect(x: number, y: number, width: number, height: number, color: Color): void;
}
