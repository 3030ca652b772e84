/**
 * Recording stand-ins for Phaser graphics and text, so render output can be
 * asserted call by call.
 */

import type { IGraphics, ILabelLayer } from "@/systems/IVisualizerSystem";
import { vi } from "vitest";

export type GraphicsCall =
  | { type: "clear" }
  | { type: "lineStyle"; width: number; color: number; alpha?: number }
  | { type: "lineBetween"; x1: number; y1: number; x2: number; y2: number }
  | { type: "fillStyle"; color: number; alpha?: number }
  | { type: "fillCircle"; x: number; y: number; radius: number }
  | { type: "strokeCircle"; x: number; y: number; radius: number };

export interface MockGraphics extends IGraphics {
  calls: GraphicsCall[];
}

export function createMockGraphics(): MockGraphics {
  const calls: GraphicsCall[] = [];
  return {
    calls,
    clear: vi.fn(() => {
      calls.push({ type: "clear" });
    }),
    lineStyle: vi.fn((width: number, color: number, alpha?: number) => {
      calls.push({ type: "lineStyle", width, color, alpha });
    }),
    lineBetween: vi.fn((x1: number, y1: number, x2: number, y2: number) => {
      calls.push({ type: "lineBetween", x1, y1, x2, y2 });
    }),
    fillStyle: vi.fn((color: number, alpha?: number) => {
      calls.push({ type: "fillStyle", color, alpha });
    }),
    fillCircle: vi.fn((x: number, y: number, radius: number) => {
      calls.push({ type: "fillCircle", x, y, radius });
    }),
    strokeCircle: vi.fn((x: number, y: number, radius: number) => {
      calls.push({ type: "strokeCircle", x, y, radius });
    }),
  };
}

export function callsOfType<T extends GraphicsCall["type"]>(
  graphics: MockGraphics,
  type: T
): Extract<GraphicsCall, { type: T }>[] {
  return graphics.calls.filter(
    (call): call is Extract<GraphicsCall, { type: T }> => call.type === type
  );
}

export interface MockLabelLayer extends ILabelLayer {
  labels: Array<{ text: string; x: number; y: number }>;
  clearCount: number;
}

export function createMockLabelLayer(): MockLabelLayer {
  const layer: MockLabelLayer = {
    labels: [],
    clearCount: 0,
    addLabel(text: string, x: number, y: number) {
      layer.labels.push({ text, x, y });
    },
    clear() {
      layer.labels = [];
      layer.clearCount++;
    },
  };
  return layer;
}
