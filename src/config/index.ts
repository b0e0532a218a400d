export { DEFAULT_RAYCASTER_CONFIG, createRaycasterConfig, validateRaycasterConfig } from "./raycasterConfig";
export type { RaycasterConfigOptions } from "./raycasterConfig";
