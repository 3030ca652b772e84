/**
 * CircularLayout - Places residues 0..m-1 evenly on a circle
 *
 * Residue 0 sits at the top (12 o'clock). Because canvas y grows downwards,
 * increasing angles run clockwise on screen.
 */

import { Vec2 } from "@/math/Vec2";
import type { LayoutConfig, SurfaceSize, Vector2 } from "@/types";

/**
 * Options for deriving a layout from a drawing surface.
 */
export interface SurfaceLayoutOptions {
  /** Circle radius as a fraction of the smaller half-dimension */
  readonly radiusRatio: number;
  readonly markerRadius: number;
}

export const DEFAULT_SURFACE_LAYOUT: SurfaceLayoutOptions = {
  radiusRatio: 0.8,
  markerRadius: 20,
};

/**
 * Angle (radians) of a residue on the circle.
 */
export function angleForResidue(value: number, modulus: number): number {
  return (value / modulus) * 2 * Math.PI - Math.PI / 2;
}

export function pointForResidue(value: number, modulus: number, config: LayoutConfig): Vector2 {
  const center = Vec2.create(config.centerX, config.centerY);
  return Vec2.polar(center, config.radius, angleForResidue(value, modulus));
}

/**
 * Point on the boundary of a circular marker, facing `towards`.
 *
 * Coincident points have no direction; the marker center is returned as is.
 */
export function edgePoint(markerCenter: Vector2, towards: Vector2, markerRadius: number): Vector2 {
  const offset = Vec2.subtract(towards, markerCenter);
  const distance = Vec2.length(offset);
  if (distance === 0) return markerCenter;

  return Vec2.add(markerCenter, Vec2.scale(offset, markerRadius / distance));
}

/**
 * Positions of every residue, indexed by residue.
 */
export function residuePositions(modulus: number, config: LayoutConfig): Vector2[] {
  const positions: Vector2[] = [];
  for (let value = 0; value < modulus; value++) {
    positions.push(pointForResidue(value, modulus, config));
  }
  return positions;
}

/**
 * Center the circle on the surface and size it to fit.
 */
export function layoutForSurface(
  surface: SurfaceSize,
  options: Partial<SurfaceLayoutOptions> = {}
): LayoutConfig {
  const opts = { ...DEFAULT_SURFACE_LAYOUT, ...options };
  const centerX = surface.width / 2;
  const centerY = surface.height / 2;

  return {
    centerX,
    centerY,
    radius: Math.min(centerX, centerY) * opts.radiusRatio,
    markerRadius: opts.markerRadius,
  };
}
