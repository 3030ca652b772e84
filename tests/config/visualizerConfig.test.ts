import { DEFAULT_VISUALIZER_CONFIG, resolveVisualizerConfig } from "@/config/visualizerConfig";
import { describe, expect, it } from "vitest";

describe("resolveVisualizerConfig", () => {
  it("should return the defaults without overrides", () => {
    expect(resolveVisualizerConfig()).toEqual(DEFAULT_VISUALIZER_CONFIG);
  });

  it("should replace top-level values", () => {
    const config = resolveVisualizerConfig({ stepDelay: 0.25, maxDisplayModulus: 64 });

    expect(config.stepDelay).toBe(0.25);
    expect(config.maxDisplayModulus).toBe(64);
    expect(config.edgeWidth).toBe(4);
  });

  it("should merge nested groups one level deep", () => {
    const config = resolveVisualizerConfig({
      layout: { radiusRatio: 0.5 },
      colorRamp: { levels: 4 },
    });

    expect(config.layout).toEqual({ radiusRatio: 0.5, markerRadius: 20 });
    expect(config.colorRamp.levels).toBe(4);
    expect(config.colorRamp.baseColor).toBe(0xccff99);
    expect(config.arrowhead).toEqual({ length: 15, spread: Math.PI / 6 });
  });
});
