import { Vec2 } from "@/math/Vec2";
import type { Arrowhead, Vector2 } from "@/types";

export interface ArrowheadOptions {
  /** Length of each wing in pixels */
  readonly length: number;
  /** Angle between the shaft and each wing, in radians */
  readonly spread: number;
}

export const DEFAULT_ARROWHEAD: ArrowheadOptions = {
  length: 15,
  spread: Math.PI / 6,
};

/**
 * Wings of an arrowhead pointing at `end`, for a shaft coming from `start`.
 */
export function arrowheadFor(
  start: Vector2,
  end: Vector2,
  options: Partial<ArrowheadOptions> = {}
): Arrowhead {
  const { length, spread } = { ...DEFAULT_ARROWHEAD, ...options };
  const heading = Vec2.heading(start, end);

  // Wings point back along the shaft, so step from the tip by -length
  return {
    tip: end,
    left: Vec2.polar(end, -length, heading + spread),
    right: Vec2.polar(end, -length, heading - spread),
  };
}
