export type { IGraphics, ILabelLayer, IVisualizerSystem, Unsubscribe } from "./IVisualizerSystem";
export { OrbitRenderSystem } from "./OrbitRenderSystem";
export type { OrbitGraphicsLayers } from "./OrbitRenderSystem";
export { DEFAULT_ORBIT_ANIMATION_CONFIG, OrbitAnimationSystem } from "./OrbitAnimationSystem";
export type {
  OrbitAnimationCallback,
  OrbitAnimationConfig,
  OrbitAnimationEvent,
} from "./OrbitAnimationSystem";
