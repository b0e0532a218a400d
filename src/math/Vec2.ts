import type { Angle, Vector2 } from "@/types";
import { mix } from "./interpolate";

/**
 * Vec2 - Pure utility functions for 2D vector operations
 * All functions are immutable and return new vectors
 */
export const Vec2 = {
  /**
   * Create a new vector
   */
  create(x: number, y: number): Vector2 {
    return { x, y };
  },

  /**
   * Unit vector pointing along an angle (x = cos, y = sin)
   */
  fromAngle(angle: Angle): Vector2 {
    return Vec2.normalize({ x: Math.cos(angle.radians), y: Math.sin(angle.radians) });
  },

  /**
   * Negate a vector
   */
  negate(v: Vector2): Vector2 {
    return { x: -v.x, y: -v.y };
  },

  /**
   * Add two vectors
   */
  add(a: Vector2, b: Vector2): Vector2 {
    return { x: a.x + b.x, y: a.y + b.y };
  },

  /**
   * Subtract vector b from vector a
   */
  subtract(a: Vector2, b: Vector2): Vector2 {
    return { x: a.x - b.x, y: a.y - b.y };
  },

  /**
   * Scale a vector by a scalar
   */
  scale(v: Vector2, scalar: number): Vector2 {
    return { x: v.x * scalar, y: v.y * scalar };
  },

  /**
   * Divide a vector by a scalar
   */
  divide(v: Vector2, divisor: number): Vector2 {
    return { x: v.x / divisor, y: v.y / divisor };
  },

  /**
   * Calculate dot product of two vectors
   */
  dot(a: Vector2, b: Vector2): number {
    return a.x * b.x + a.y * b.y;
  },

  /**
   * Calculate squared length of a vector (faster than length, useful for comparisons)
   */
  lengthSquared(v: Vector2): number {
    return v.x * v.x + v.y * v.y;
  },

  /**
   * Calculate length (magnitude) of a vector
   */
  length(v: Vector2): number {
    return Math.sqrt(Vec2.lengthSquared(v));
  },

  /**
   * Normalize a vector to unit length
   * Returns zero vector if input is zero vector
   */
  normalize(v: Vector2): Vector2 {
    const len = Vec2.length(v);
    if (len === 0) return { x: 0, y: 0 };
    return Vec2.divide(v, len);
  },

  /**
   * Calculate distance between two points
   */
  distance(a: Vector2, b: Vector2): number {
    return Vec2.length(Vec2.subtract(b, a));
  },

  /**
   * Point at parameter t on the line from a to b
   */
  lerp(a: Vector2, b: Vector2, t: number): Vector2 {
    return { x: mix(a.x, b.x, t), y: mix(a.y, b.y, t) };
  },
};
