export { drawViewBorder, layoutViews } from "./View";
export type { ViewLayout } from "./View";
export { View2D } from "./View2D";
export { View3D, computeWallSlices } from "./View3D";
