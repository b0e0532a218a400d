import type { Color } from "@/types";

/**
 * Colors - palette and conversions for the render surface
 */
export const Colors = {
  black(): Color {
    return { r: 0x00, g: 0x00, b: 0x00 };
  },

  white(): Color {
    return { r: 0xff, g: 0xff, b: 0xff };
  },

  red(): Color {
    return { r: 0xff, g: 0x00, b: 0x00 };
  },

  green(): Color {
    return { r: 0x00, g: 0xff, b: 0x00 };
  },

  blue(): Color {
    return { r: 0x00, g: 0x00, b: 0xff };
  },

  magenta(): Color {
    return { r: 0xff, g: 0x00, b: 0xff };
  },

  acid(): Color {
    return { r: 0xc6, g: 0xff, b: 0x00 };
  },

  /** Frame drawn around each view */
  border(): Color {
    return { r: 0, g: 50, b: 100 };
  },

  /**
   * Gray level from a brightness percentage (0 = black, 100 = white)
   */
  gray(percent: number): Color {
    const w = Math.min(Math.round((percent / 100) * 255), 255);
    return { r: w, g: w, b: w };
  },

  /**
   * Pack into a 0xRRGGBB number for Phaser
   */
  toHex(color: Color): number {
    return (color.r << 16) | (color.g << 8) | color.b;
  },
};
