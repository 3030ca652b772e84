import {
  angleForResidue,
  edgePoint,
  layoutForSurface,
  pointForResidue,
  residuePositions,
} from "@/layout";
import { Vec2 } from "@/math/Vec2";
import type { LayoutConfig } from "@/types";
import { describe, expect, it } from "vitest";

const CONFIG: LayoutConfig = { centerX: 100, centerY: 50, radius: 40, markerRadius: 20 };

describe("CircularLayout", () => {
  describe("angleForResidue", () => {
    it("should put residue 0 at -π/2 for any modulus", () => {
      for (const modulus of [1, 7, 360]) {
        expect(angleForResidue(0, modulus)).toBe(-Math.PI / 2);
      }
    });

    it("should step by exactly 2π/m between consecutive residues", () => {
      const modulus = 7;
      for (let value = 0; value < modulus; value++) {
        const step = angleForResidue(value + 1, modulus) - angleForResidue(value, modulus);
        expect(step).toBeCloseTo((2 * Math.PI) / modulus, 12);
      }
    });

    it("should return to the starting angle after m steps", () => {
      const modulus = 11;
      const turn = angleForResidue(modulus, modulus) - angleForResidue(0, modulus);
      expect(turn).toBeCloseTo(2 * Math.PI, 12);
    });
  });

  describe("pointForResidue", () => {
    it("should place residue 0 at the top of the circle", () => {
      for (const modulus of [1, 3, 12, 1000]) {
        const point = pointForResidue(0, modulus, CONFIG);
        expect(point.x).toBeCloseTo(100, 10);
        expect(point.y).toBeCloseTo(10, 10);
      }
    });

    it("should run clockwise in screen coordinates", () => {
      const right = pointForResidue(1, 4, CONFIG);
      const bottom = pointForResidue(2, 4, CONFIG);
      const left = pointForResidue(3, 4, CONFIG);

      expect(right.x).toBeCloseTo(140, 10);
      expect(right.y).toBeCloseTo(50, 10);
      expect(bottom.x).toBeCloseTo(100, 10);
      expect(bottom.y).toBeCloseTo(90, 10);
      expect(left.x).toBeCloseTo(60, 10);
      expect(left.y).toBeCloseTo(50, 10);
    });

    it("should keep every residue at the configured radius", () => {
      const center = Vec2.create(CONFIG.centerX, CONFIG.centerY);
      for (let value = 0; value < 9; value++) {
        expect(Vec2.distance(center, pointForResidue(value, 9, CONFIG))).toBeCloseTo(40, 10);
      }
    });
  });

  describe("edgePoint", () => {
    it("should stop on the marker boundary towards the target", () => {
      const point = edgePoint({ x: 0, y: 0 }, { x: 30, y: 40 }, 20);
      expect(point.x).toBeCloseTo(12, 10);
      expect(point.y).toBeCloseTo(16, 10);
    });

    it("should work in any direction", () => {
      const point = edgePoint({ x: 10, y: 10 }, { x: 10, y: -90 }, 5);
      expect(point.x).toBeCloseTo(10, 10);
      expect(point.y).toBeCloseTo(5, 10);
    });

    it("should return the marker center when both points coincide", () => {
      const center = { x: 7, y: -3 };
      expect(edgePoint(center, { x: 7, y: -3 }, 20)).toEqual(center);
      expect(edgePoint(center, center, 20)).toBe(center);
    });
  });

  describe("residuePositions", () => {
    it("should list one position per residue in order", () => {
      const positions = residuePositions(6, CONFIG);

      expect(positions).toHaveLength(6);
      positions.forEach((position, value) => {
        expect(position).toEqual(pointForResidue(value, 6, CONFIG));
      });
    });
  });

  describe("layoutForSurface", () => {
    it("should center the circle and fit it to the smaller dimension", () => {
      const layout = layoutForSurface({ width: 800, height: 600 });

      expect(layout.centerX).toBe(400);
      expect(layout.centerY).toBe(300);
      expect(layout.radius).toBeCloseTo(240, 10);
      expect(layout.markerRadius).toBe(20);
    });

    it("should apply overrides", () => {
      const layout = layoutForSurface(
        { width: 400, height: 1000 },
        { radiusRatio: 0.5, markerRadius: 10 }
      );

      expect(layout).toEqual({ centerX: 200, centerY: 500, radius: 100, markerRadius: 10 });
    });
  });
});
