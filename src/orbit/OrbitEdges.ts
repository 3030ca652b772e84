/**
 * OrbitEdges - Turns a generated trajectory into drawable edges
 *
 * The result is a lazy, finite iterable: nothing is computed until it is
 * consumed, and every `for...of` starts again from the first step. This
 * lets the animation pull edges at its own pace and lets a run be replayed.
 */

import { type ArrowheadOptions, arrowheadFor } from "@/layout/Arrowhead";
import { edgePoint, pointForResidue } from "@/layout/CircularLayout";
import type { CycleResult, LayoutConfig, OrbitEdge, TrajectoryStep } from "@/types";
import { buildPalette, type ColorRampOptions, stepColor } from "./ColorRamp";

export interface OrbitEdgeOptions {
  readonly arrowhead?: Partial<ArrowheadOptions>;
  readonly colorRamp?: Partial<ColorRampOptions>;
}

/**
 * Build the edge drawn at `step`, from residue `from` to the residue generated after it.
 */
export function buildEdge(
  step: number,
  from: number,
  to: number,
  modulus: number,
  layout: LayoutConfig,
  palette: readonly number[],
  arrowhead: Partial<ArrowheadOptions> = {}
): OrbitEdge {
  const fromCenter = pointForResidue(from, modulus, layout);
  const toCenter = pointForResidue(to, modulus, layout);
  const start = edgePoint(fromCenter, toCenter, layout.markerRadius);
  const end = edgePoint(toCenter, fromCenter, layout.markerRadius);

  return {
    step,
    from,
    to,
    start,
    end,
    arrowhead: arrowheadFor(start, end, arrowhead),
    color: stepColor(step, palette),
  };
}

export function orbitEdges(
  trajectory: readonly TrajectoryStep[],
  cycle: CycleResult,
  modulus: number,
  layout: LayoutConfig,
  options: OrbitEdgeOptions = {}
): Iterable<OrbitEdge> {
  const palette = buildPalette(options.colorRamp);

  return {
    *[Symbol.iterator](): Iterator<OrbitEdge> {
      for (let i = 0; i < trajectory.length; i++) {
        const current = trajectory[i];
        if (!current) continue;
        // The last visited residue leads back into the cycle
        const next = trajectory[i + 1]?.value ?? cycle.cycleStart;
        yield buildEdge(current.index, current.value, next, modulus, layout, palette, options.arrowhead);
      }
    },
  };
}
