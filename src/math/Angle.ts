import type { Angle } from "@/types";

const DEGREES_TO_RADIANS = Math.PI / 180;

/**
 * AngleUtils - Pure utility functions for orientations
 *
 * Angles are built and incremented in degrees but stored in radians.
 * No wraparound: a player spinning in one direction accumulates an
 * ever-growing value, and sin/cos stay correct for any magnitude.
 */
export const AngleUtils = {
  fromDegrees(degrees: number): Angle {
    return { radians: degrees * DEGREES_TO_RADIANS };
  },

  fromRadians(radians: number): Angle {
    return { radians };
  },

  toDegrees(angle: Angle): number {
    return angle.radians / DEGREES_TO_RADIANS;
  },

  /**
   * Angle rotated by a delta in degrees
   */
  addDegrees(angle: Angle, degrees: number): Angle {
    return { radians: angle.radians + degrees * DEGREES_TO_RADIANS };
  },

  subtractDegrees(angle: Angle, degrees: number): Angle {
    return { radians: angle.radians - degrees * DEGREES_TO_RADIANS };
  },

  /**
   * Signed difference a - b, in radians
   */
  difference(a: Angle, b: Angle): number {
    return a.radians - b.radians;
  },

  sin(angle: Angle): number {
    return Math.sin(angle.radians);
  },

  cos(angle: Angle): number {
    return Math.cos(angle.radians);
  },
};
