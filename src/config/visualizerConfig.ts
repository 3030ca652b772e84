import type { ArrowheadOptions } from "@/layout/Arrowhead";
import type { SurfaceLayoutOptions } from "@/layout/CircularLayout";
import type { ColorRampOptions } from "@/orbit/ColorRamp";

/**
 * Configuration for drawing and animating an orbit.
 */
export interface VisualizerConfig {
  /** Pause between successive edges, in seconds */
  readonly stepDelay: number;
  readonly layout: SurfaceLayoutOptions;
  readonly arrowhead: ArrowheadOptions;
  readonly colorRamp: ColorRampOptions;
  /** Largest modulus drawn; every residue gets a marker and a label */
  readonly maxDisplayModulus: number;

  readonly markerFillColor: number;
  readonly markerStrokeColor: number;
  readonly markerStrokeWidth: number;
  readonly edgeWidth: number;
  readonly cycleMarkerColor: number;
  readonly cycleMarkerRadius: number;
  readonly cycleMarkerWidth: number;

  readonly labelFontSize: number;
  readonly labelColor: string;

  /** Enable debug logging */
  readonly debug?: boolean;
}

export const DEFAULT_VISUALIZER_CONFIG: VisualizerConfig = {
  stepDelay: 0.1,
  layout: {
    radiusRatio: 0.8,
    markerRadius: 20,
  },
  arrowhead: {
    length: 15,
    spread: Math.PI / 6,
  },
  colorRamp: {
    baseColor: 0xccff99,
    levels: 9,
    minBrightness: 0.3,
    maxBrightness: 1.0,
  },
  maxDisplayModulus: 360,

  markerFillColor: 0x3c3c3c,
  markerStrokeColor: 0xffffff,
  markerStrokeWidth: 2,
  edgeWidth: 4,
  cycleMarkerColor: 0xff6464, // Soft red ring around the cycle entry
  cycleMarkerRadius: 25,
  cycleMarkerWidth: 4,

  labelFontSize: 20,
  labelColor: "#ffffff",

  debug: false,
};

type NestedGroups = "layout" | "arrowhead" | "colorRamp";

export type VisualizerOverrides = Partial<Omit<VisualizerConfig, NestedGroups>> & {
  readonly [K in NestedGroups]?: Partial<VisualizerConfig[K]>;
};

/**
 * Merge overrides into the defaults. Nested option groups merge one level deep.
 */
export function resolveVisualizerConfig(overrides: VisualizerOverrides = {}): VisualizerConfig {
  return {
    ...DEFAULT_VISUALIZER_CONFIG,
    ...overrides,
    layout: { ...DEFAULT_VISUALIZER_CONFIG.layout, ...overrides.layout },
    arrowhead: { ...DEFAULT_VISUALIZER_CONFIG.arrowhead, ...overrides.arrowhead },
    colorRamp: { ...DEFAULT_VISUALIZER_CONFIG.colorRamp, ...overrides.colorRamp },
  };
}
