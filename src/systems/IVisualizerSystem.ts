/**
 * IVisualizerSystem - Interface for frame-driven parts of the visualizer
 *
 * The scene owns the frame loop and forwards elapsed time to each system.
 */

export interface IVisualizerSystem {
  /** Unique identifier for this system */
  readonly id: string;

  /**
   * Per-frame update for time-based logic.
   * @param deltaTime Time since last update in seconds
   */
  update(deltaTime: number): void;

  /**
   * Clean up resources when system is destroyed.
   */
  dispose(): void;
}

/** Call to stop receiving events */
export type Unsubscribe = () => void;

/**
 * Graphics interface for rendering (Phaser-compatible).
 *
 * Phaser.GameObjects.Graphics satisfies this structurally; tests use a recording mock.
 */
export interface IGraphics {
  clear(): void;
  lineStyle(width: number, color: number, alpha?: number): void;
  lineBetween(x1: number, y1: number, x2: number, y2: number): void;
  fillStyle(color: number, alpha?: number): void;
  fillCircle(x: number, y: number, radius: number): void;
  strokeCircle(x: number, y: number, radius: number): void;
}

/**
 * Text layer for residue labels.
 */
export interface ILabelLayer {
  clear(): void;
  addLabel(text: string, x: number, y: number): void;
}
