export {
  brightnessRatio,
  buildPalette,
  DEFAULT_COLOR_RAMP,
  scaleColor,
  stepColor,
} from "./ColorRamp";
export type { ColorRampOptions } from "./ColorRamp";
export { buildEdge, orbitEdges } from "./OrbitEdges";
export type { OrbitEdgeOptions } from "./OrbitEdges";
