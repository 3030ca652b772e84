export {
  angleForResidue,
  DEFAULT_SURFACE_LAYOUT,
  edgePoint,
  layoutForSurface,
  pointForResidue,
  residuePositions,
} from "./CircularLayout";
export type { SurfaceLayoutOptions } from "./CircularLayout";
export { arrowheadFor, DEFAULT_ARROWHEAD } from "./Arrowhead";
export type { ArrowheadOptions } from "./Arrowhead";
