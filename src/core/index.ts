export { ControlState, directionForKey } from "./ControlState";
export { DebugView, buildDebugInfo, formatDebugLines } from "./DebugView";
export { InputManager } from "./InputManager";
