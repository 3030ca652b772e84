/**
 * VisualizationController - Runs one visualization from text input to summary
 *
 * The scene hands it graphics layers, a label layer and the frame clock; the
 * controller parses input, generates the trajectory, lays out the circle and
 * feeds the edge sequence to the animation. Nothing here touches Phaser
 * directly, so a whole run can be driven from tests.
 */

import {
  resolveVisualizerConfig,
  type VisualizerConfig,
  type VisualizerOverrides,
} from "@/config/visualizerConfig";
import { VisualizerDebugLogger } from "@/debug/VisualizerDebugLogger";
import { layoutForSurface, pointForResidue, residuePositions } from "@/layout/CircularLayout";
import { parseLcgInput } from "@/lcg/ParameterParser";
import { generate } from "@/lcg/SequenceEngine";
import { orbitEdges } from "@/orbit/OrbitEdges";
import type { ILabelLayer, IVisualizerSystem, Unsubscribe } from "@/systems/IVisualizerSystem";
import {
  type OrbitAnimationEvent,
  OrbitAnimationSystem,
} from "@/systems/OrbitAnimationSystem";
import { type OrbitGraphicsLayers, OrbitRenderSystem } from "@/systems/OrbitRenderSystem";
import type {
  CycleResult,
  LayoutConfig,
  LcgInputText,
  LcgParameters,
  OrbitEdge,
  SurfaceSize,
} from "@/types";

export const CANVAS_SIZE_MESSAGE = "Cannot determine canvas size.";
export const CYCLE_NOT_FOUND_MESSAGE =
  "Unable to find cycle after too many steps. Please check parameters.";

export function displayLimitMessage(limit: number): string {
  return `Modulus (m) must be at most ${limit} to be displayed.`;
}

/**
 * Text shown when a run finishes.
 */
export function formatCycleSummary(cycle: CycleResult): string {
  return [
    "Random sequence cycle found!",
    `Cycle start value: ${cycle.cycleStart}`,
    `Cycle length: ${cycle.cycleLength}`,
    `Pre-cycle length: ${cycle.tailLength}`,
  ].join("\n");
}

export type VisualizerEvent =
  | {
      readonly type: "run_started";
      readonly params: LcgParameters;
      readonly layout: LayoutConfig;
      readonly edgeCount: number;
    }
  | { readonly type: "edge_drawn"; readonly edge: OrbitEdge }
  | {
      readonly type: "run_completed";
      readonly params: LcgParameters;
      readonly cycle: CycleResult;
      readonly summary: string;
    }
  | { readonly type: "run_rejected"; readonly message: string };

export type VisualizerEventHandler = (event: VisualizerEvent) => void;

interface CurrentRun {
  readonly params: LcgParameters;
  readonly layout: LayoutConfig;
  readonly cycle: CycleResult;
}

export class VisualizationController implements IVisualizerSystem {
  readonly id = "visualization";

  private config: VisualizerConfig;
  private renderSystem: OrbitRenderSystem;
  private animationSystem: OrbitAnimationSystem;
  private labels: ILabelLayer;
  private handlers: Set<VisualizerEventHandler> = new Set();
  private current: CurrentRun | null = null;
  private animationUnsubscribe: Unsubscribe;

  constructor(
    layers: OrbitGraphicsLayers,
    labels: ILabelLayer,
    config: VisualizerOverrides = {}
  ) {
    this.config = resolveVisualizerConfig(config);
    this.renderSystem = new OrbitRenderSystem(layers, this.config);
    this.animationSystem = new OrbitAnimationSystem({ stepDelay: this.config.stepDelay });
    this.labels = labels;

    this.animationUnsubscribe = this.animationSystem.onAnimationEvent((event) =>
      this.handleAnimationEvent(event)
    );
  }

  /**
   * Start a new run, replacing whatever is on screen.
   *
   * @returns true when a run started, false when the input was rejected
   */
  visualize(input: LcgInputText, surface: SurfaceSize): boolean {
    this.reset();

    const parsed = parseLcgInput(input);
    if (!parsed.ok) {
      return this.reject(parsed.message);
    }
    const { params } = parsed;

    if (!(surface.width > 0 && surface.height > 0)) {
      return this.reject(CANVAS_SIZE_MESSAGE);
    }
    if (params.modulus > this.config.maxDisplayModulus) {
      return this.reject(displayLimitMessage(this.config.maxDisplayModulus));
    }

    const layout = layoutForSurface(surface, this.config.layout);
    const result = generate(params);
    VisualizerDebugLogger.logRun(params, layout, result);

    if (result.status === "cycle_not_found") {
      return this.reject(CYCLE_NOT_FOUND_MESSAGE);
    }

    this.drawResidues(params.modulus, layout);

    this.current = { params, layout, cycle: result.cycle };
    this.log(
      `run m=${params.modulus} a=${params.multiplier} c=${params.increment} seed=${params.seed}: ` +
        `${result.trajectory.length} edges`
    );
    this.emit({
      type: "run_started",
      params,
      layout,
      edgeCount: result.trajectory.length,
    });

    const edges = orbitEdges(result.trajectory, result.cycle, params.modulus, layout, {
      arrowhead: this.config.arrowhead,
      colorRamp: this.config.colorRamp,
    });
    this.animationSystem.start(edges);

    return true;
  }

  /**
   * Clear the drawing and abandon any run still animating.
   */
  reset(): void {
    this.animationSystem.stop();
    this.renderSystem.clear();
    this.labels.clear();
    this.current = null;
  }

  isAnimating(): boolean {
    return this.animationSystem.isRunning();
  }

  getEdgeCount(): number {
    return this.renderSystem.getEdgeCount();
  }

  update(deltaTime: number): void {
    this.animationSystem.update(deltaTime);
  }

  dispose(): void {
    this.animationUnsubscribe();
    this.animationSystem.dispose();
    this.renderSystem.dispose();
    this.labels.clear();
    this.handlers.clear();
    this.current = null;
  }

  onEvent(handler: VisualizerEventHandler): Unsubscribe {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  private drawResidues(modulus: number, layout: LayoutConfig): void {
    const positions = residuePositions(modulus, layout);
    this.renderSystem.drawMarkers(positions, layout.markerRadius);
    positions.forEach((position, value) => {
      this.labels.addLabel(String(value), position.x, position.y);
    });
  }

  private handleAnimationEvent(event: OrbitAnimationEvent): void {
    const run = this.current;
    if (!run) return;

    if (event.type === "edge_revealed") {
      this.renderSystem.drawEdge(event.edge);
      VisualizerDebugLogger.logEdgeRevealed();
      this.emit({ type: "edge_drawn", edge: event.edge });
      return;
    }

    const { cycle, params, layout } = run;
    this.renderSystem.drawCycleMarker(pointForResidue(cycle.cycleStart, params.modulus, layout));
    VisualizerDebugLogger.logCompleted();
    this.log(`cycle at ${cycle.cycleStart}: tail=${cycle.tailLength} length=${cycle.cycleLength}`);
    this.emit({ type: "run_completed", params, cycle, summary: formatCycleSummary(cycle) });
  }

  private reject(message: string): false {
    this.log(`rejected: ${message}`);
    this.emit({ type: "run_rejected", message });
    return false;
  }

  private emit(event: VisualizerEvent): void {
    for (const handler of this.handlers) {
      handler(event);
    }
  }

  private log(message: string): void {
    if (this.config.debug) {
      console.log(`[VisualizationController] ${message}`);
    }
  }
}
