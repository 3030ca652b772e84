/**
 * OrbitAnimationSystem - Reveals trajectory edges one at a time
 *
 * Pulls edges from a lazy edge sequence as frame time accumulates. The first
 * edge appears as soon as a run starts, each following edge one `stepDelay`
 * later, and the run completes one `stepDelay` after its last edge.
 */

import type { OrbitEdge } from "@/types";
import type { IVisualizerSystem, Unsubscribe } from "./IVisualizerSystem";

/**
 * Configuration for edge pacing.
 */
export interface OrbitAnimationConfig {
  /** Seconds between successive edges */
  readonly stepDelay: number;
}

export const DEFAULT_ORBIT_ANIMATION_CONFIG: OrbitAnimationConfig = {
  stepDelay: 0.1,
};

export type OrbitAnimationEvent =
  | { readonly type: "edge_revealed"; readonly edge: OrbitEdge }
  | { readonly type: "completed"; readonly edgeCount: number };

export type OrbitAnimationCallback = (event: OrbitAnimationEvent) => void;

interface ActiveRun {
  readonly iterator: Iterator<OrbitEdge>;
  elapsed: number;
  revealed: number;
}

export class OrbitAnimationSystem implements IVisualizerSystem {
  readonly id = "orbit-animation";

  private config: OrbitAnimationConfig;
  private run: ActiveRun | null = null;
  private eventCallbacks: Set<OrbitAnimationCallback> = new Set();

  constructor(config: Partial<OrbitAnimationConfig> = {}) {
    this.config = { ...DEFAULT_ORBIT_ANIMATION_CONFIG, ...config };
  }

  /**
   * Start revealing `edges`, abandoning any run still in progress.
   */
  start(edges: Iterable<OrbitEdge>): void {
    this.run = {
      iterator: edges[Symbol.iterator](),
      elapsed: 0,
      revealed: 0,
    };
    this.advance();
  }

  /**
   * Abandon the current run without completing it.
   */
  stop(): void {
    this.run = null;
  }

  isRunning(): boolean {
    return this.run !== null;
  }

  getRevealedCount(): number {
    return this.run?.revealed ?? 0;
  }

  update(deltaTime: number): void {
    if (!this.run) return;

    this.run.elapsed += deltaTime;

    // A long frame may owe several edges
    while (this.run && this.run.elapsed >= this.config.stepDelay) {
      this.run.elapsed -= this.config.stepDelay;
      this.advance();
    }
  }

  dispose(): void {
    this.run = null;
    this.eventCallbacks.clear();
  }

  /**
   * Subscribe to animation events.
   */
  onAnimationEvent(callback: OrbitAnimationCallback): Unsubscribe {
    this.eventCallbacks.add(callback);
    return () => {
      this.eventCallbacks.delete(callback);
    };
  }

  private advance(): void {
    const run = this.run;
    if (!run) return;

    const next = run.iterator.next();
    if (next.done) {
      this.run = null;
      this.emit({ type: "completed", edgeCount: run.revealed });
      return;
    }

    run.revealed++;
    this.emit({ type: "edge_revealed", edge: next.value });
  }

  private emit(event: OrbitAnimationEvent): void {
    for (const callback of this.eventCallbacks) {
      callback(event);
    }
  }
}
