/**
 * Core type definitions for the raycaster
 */

// =============================================================================
// MATH TYPES
// =============================================================================

/** 2D Vector representation (immutable) */
export interface Vector2 {
  readonly x: number;
  readonly y: number;
}

/**
 * Orientation stored in radians.
 * Never wrapped into [0, 2π): sin/cos are applied to the raw value.
 */
export interface Angle {
  readonly radians: number;
}

/** Wall segment in map coordinates (integer endpoints) */
export interface Wall {
  readonly x1: number;
  readonly y1: number;
  readonly x2: number;
  readonly y2: number;
}

/** Result of a ray-wall intersection test */
export type RayWallIntersection =
  | {
      readonly hit: true;
      readonly tWall: number; // Position along wall, strictly inside (0, 1)
      readonly tRay: number; // Distance along ray, strictly positive
    }
  | { readonly hit: false };

/** Nearest wall hit for one ray in the current frame */
export interface RayHit {
  /** Distance along the heading axis (fisheye corrected) */
  readonly perpendicularDistance: number;
  readonly hitX: number;
  readonly hitY: number;
}

// =============================================================================
// MAP & PLAYER TYPES
// =============================================================================

/** Map dimensions in map units */
export interface MapSize {
  readonly width: number;
  readonly height: number;
}

/** Ray fan configuration for a player */
export interface PlayerConfig {
  readonly numRays: number;
  readonly fieldOfView: number; // degrees
}

/** Default ray fan: 320 rays across 60° */
export const DEFAULT_PLAYER_CONFIG: PlayerConfig = {
  numRays: 320,
  fieldOfView: 60,
};

// =============================================================================
// RENDERING TYPES
// =============================================================================

/** 8-bit RGB color */
export interface Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

/** Screen-space rectangle a view draws into */
export interface ViewRect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/** One vertical wall slice of the first-person view */
export interface WallSlice {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  readonly brightness: number; // percent gray, 0-100
}

// =============================================================================
// INPUT TYPES
// =============================================================================

/** Directional keys consumed by the raycaster */
export type Direction = "left" | "right" | "up" | "down";

/** Per-frame movement deltas derived from held keys */
export interface MovementDeltas {
  readonly rotation: number; // degrees per frame
  readonly distance: number; // map units per frame
}

// =============================================================================
// CONFIG TYPES
// =============================================================================

/** Game configuration options */
export interface GameOptions {
  readonly width: number;
  readonly height: number;
  readonly backgroundColor: number;
  readonly targetFps: number;
}

/** Raycaster configuration */
export interface RaycasterConfig {
  readonly map: MapSize;
  readonly player: PlayerConfig;
  readonly interiorWallCount: number;
  readonly rotationStep: number; // degrees per frame while a turn key is held
  readonly moveStep: number; // map units per frame while a move key is held
}

// =============================================================================
// DEBUG TYPES
// =============================================================================

/** Per-frame values shown in the debug overlay */
export interface FrameDebugInfo {
  position: string;
  heading: number;
  rays: number;
  hits: number;
}

/** Debug information for display */
export interface DebugInfo extends FrameDebugInfo {
  fps: number;
  [key: string]: string | number | boolean;
}
