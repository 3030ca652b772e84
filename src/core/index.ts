export { DebugView } from "./DebugView";
export { InputManager } from "./InputManager";
