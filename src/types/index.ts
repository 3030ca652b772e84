/**
 * Core type definitions for the LCG orbit visualizer
 */

// =============================================================================
// MATH TYPES
// =============================================================================

/** 2D Vector representation (immutable) */
export interface Vector2 {
  readonly x: number;
  readonly y: number;
}

// =============================================================================
// GENERATOR TYPES
// =============================================================================

/** Parameters of the recurrence X_{n+1} = (a * X_n + c) mod m */
export interface LcgParameters {
  readonly modulus: number;
  readonly multiplier: number;
  readonly increment: number;
  readonly seed: number;
}

/** One visited residue, in generation order */
export interface TrajectoryStep {
  readonly index: number;
  readonly value: number;
}

/** Where the trajectory closes on itself */
export interface CycleResult {
  /** Steps taken before entering the cycle */
  readonly tailLength: number;
  /** First residue of the cycle (the repeated value) */
  readonly cycleStart: number;
  readonly cycleLength: number;
  /** Step counter at which the repeat was seen (tailLength + cycleLength) */
  readonly detectedAtStep: number;
}

/** Outcome of running the generator until it repeats */
export type GenerationResult =
  | {
      readonly status: "cycle_found";
      readonly trajectory: readonly TrajectoryStep[];
      readonly cycle: CycleResult;
    }
  | {
      readonly status: "cycle_not_found";
      readonly stepsTaken: number;
      readonly stepLimit: number;
    };

// =============================================================================
// LAYOUT TYPES
// =============================================================================

/** Circle the residues are placed on, in canvas coordinates */
export interface LayoutConfig {
  readonly centerX: number;
  readonly centerY: number;
  readonly radius: number;
  /** Radius of each residue marker; edges stop at its boundary */
  readonly markerRadius: number;
}

/** Drawing surface size in pixels */
export interface SurfaceSize {
  readonly width: number;
  readonly height: number;
}

/** Wing endpoints of an arrowhead whose tip sits at an edge's end */
export interface Arrowhead {
  readonly tip: Vector2;
  readonly left: Vector2;
  readonly right: Vector2;
}

/** A trajectory step ready to be drawn */
export interface OrbitEdge {
  readonly step: number;
  /** Residue the edge leaves */
  readonly from: number;
  /** Residue the edge enters */
  readonly to: number;
  /** Trimmed start point (on the boundary of the `from` marker) */
  readonly start: Vector2;
  /** Trimmed end point (on the boundary of the `to` marker) */
  readonly end: Vector2;
  readonly arrowhead: Arrowhead;
  /** 0xRRGGBB */
  readonly color: number;
}

// =============================================================================
// INPUT TYPES
// =============================================================================

/** Raw text typed into the control panel */
export interface LcgInputText {
  readonly modulus: string;
  readonly multiplier: string;
  readonly increment: string;
  readonly seed: string;
}

/** Result of parsing the control panel inputs */
export type ParseResult =
  | { readonly ok: true; readonly params: LcgParameters }
  | { readonly ok: false; readonly field: keyof LcgInputText; readonly message: string };

// =============================================================================
// SHELL TYPES
// =============================================================================

/** Game configuration options */
export interface GameOptions {
  readonly width: number;
  readonly height: number;
  readonly backgroundColor: number;
  readonly forceCanvas: boolean;
}

/** Debug information display */
export interface DebugInfo {
  fps: number;
  objectCount: number;
  [key: string]: string | number | boolean;
}
