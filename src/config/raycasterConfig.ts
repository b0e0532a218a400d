import type { RaycasterConfig } from "@/types";
import { DEFAULT_PLAYER_CONFIG } from "@/types";

/**
 * Default raycaster settings: a 320x240 map with six random interior
 * walls and a 320-ray, 60° fan. Steps are applied once per frame.
 */
export const DEFAULT_RAYCASTER_CONFIG: RaycasterConfig = {
  map: { width: 320, height: 240 },
  player: DEFAULT_PLAYER_CONFIG,
  interiorWallCount: 6,
  rotationStep: 0.5,
  moveStep: 0.5,
};

/** Overrides accepted by createRaycasterConfig */
export interface RaycasterConfigOptions {
  map?: Partial<RaycasterConfig["map"]>;
  player?: Partial<RaycasterConfig["player"]>;
  interiorWallCount?: number;
  rotationStep?: number;
  moveStep?: number;
}

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws on the first invalid field.
 */
export function createRaycasterConfig(options: RaycasterConfigOptions = {}): RaycasterConfig {
  const config: RaycasterConfig = {
    map: { ...DEFAULT_RAYCASTER_CONFIG.map, ...options.map },
    player: { ...DEFAULT_RAYCASTER_CONFIG.player, ...options.player },
    interiorWallCount: options.interiorWallCount ?? DEFAULT_RAYCASTER_CONFIG.interiorWallCount,
    rotationStep: options.rotationStep ?? DEFAULT_RAYCASTER_CONFIG.rotationStep,
    moveStep: options.moveStep ?? DEFAULT_RAYCASTER_CONFIG.moveStep,
  };

  validateRaycasterConfig(config);
  return config;
}

export function validateRaycasterConfig(config: RaycasterConfig): void {
  const { map, player } = config;

  // The border clamp needs at least one free cell inside the walls
  if (!Number.isInteger(map.width) || map.width < 3) {
    throw new Error(`map.width must be an integer >= 3, got ${map.width}`);
  }
  if (!Number.isInteger(map.height) || map.height < 3) {
    throw new Error(`map.height must be an integer >= 3, got ${map.height}`);
  }
  if (!Number.isInteger(player.numRays) || player.numRays < 1) {
    throw new Error(`player.numRays must be a positive integer, got ${player.numRays}`);
  }
  if (!(player.fieldOfView > 0 && player.fieldOfView < 180)) {
    throw new Error(`player.fieldOfView must be between 0 and 180 degrees, got ${player.fieldOfView}`);
  }
  if (!Number.isInteger(config.interiorWallCount) || config.interiorWallCount < 0) {
    throw new Error(`interiorWallCount must be a non-negative integer, got ${config.interiorWallCount}`);
  }
  if (!(config.rotationStep > 0)) {
    throw new Error(`rotationStep must be positive, got ${config.rotationStep}`);
  }
  if (!(config.moveStep > 0)) {
    throw new Error(`moveStep must be positive, got ${config.moveStep}`);
  }
}
