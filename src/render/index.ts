export { Colors } from "./Color";
export { PhaserSurface } from "./PhaserSurface";
export type { RenderSurface } from "./RenderSurface";
