export { createBoundaryWalls, generateWalls } from "./MapGenerator";
export type { RandomSource } from "./MapGenerator";
export { Scene } from "./Scene";
export type { SceneOptions } from "./Scene";
export { createScene } from "./createScene";
