/**
 * OrbitRenderSystem - Draws residue markers, trajectory edges and the cycle marker
 *
 * Markers and edges go to separate graphics layers so edges revealed later
 * still draw above the markers.
 */

import {
  DEFAULT_VISUALIZER_CONFIG,
  type VisualizerConfig,
} from "@/config/visualizerConfig";
import type { OrbitEdge, Vector2 } from "@/types";
import type { IGraphics, IVisualizerSystem } from "./IVisualizerSystem";

export interface OrbitGraphicsLayers {
  readonly markers: IGraphics;
  readonly edges: IGraphics;
}

type OrbitRenderConfig = Pick<
  VisualizerConfig,
  | "markerFillColor"
  | "markerStrokeColor"
  | "markerStrokeWidth"
  | "edgeWidth"
  | "cycleMarkerColor"
  | "cycleMarkerRadius"
  | "cycleMarkerWidth"
>;

export class OrbitRenderSystem implements IVisualizerSystem {
  readonly id = "orbit-render";

  private layers: OrbitGraphicsLayers;
  private config: OrbitRenderConfig;
  private edgeCount = 0;

  constructor(layers: OrbitGraphicsLayers, config: Partial<OrbitRenderConfig> = {}) {
    this.layers = layers;
    this.config = { ...DEFAULT_VISUALIZER_CONFIG, ...config };
  }

  update(_deltaTime: number): void {
    // Drawing happens in response to the animation, not per frame
  }

  dispose(): void {
    this.clear();
  }

  clear(): void {
    this.layers.markers.clear();
    this.layers.edges.clear();
    this.edgeCount = 0;
  }

  /**
   * Draw one filled, outlined marker per residue position.
   */
  drawMarkers(positions: readonly Vector2[], markerRadius: number): void {
    const { markers } = this.layers;

    for (const position of positions) {
      markers.fillStyle(this.config.markerFillColor, 1);
      markers.fillCircle(position.x, position.y, markerRadius);
      markers.lineStyle(this.config.markerStrokeWidth, this.config.markerStrokeColor, 1);
      markers.strokeCircle(position.x, position.y, markerRadius);
    }
  }

  /**
   * Draw an edge shaft and both arrowhead wings in the edge's ramp color.
   */
  drawEdge(edge: OrbitEdge): void {
    const { edges } = this.layers;
    const { start, end, arrowhead } = edge;

    edges.lineStyle(this.config.edgeWidth, edge.color, 1);
    edges.lineBetween(start.x, start.y, end.x, end.y);
    edges.lineBetween(arrowhead.tip.x, arrowhead.tip.y, arrowhead.left.x, arrowhead.left.y);
    edges.lineBetween(arrowhead.tip.x, arrowhead.tip.y, arrowhead.right.x, arrowhead.right.y);

    this.edgeCount++;
  }

  /**
   * Ring the residue where the trajectory re-enters itself.
   */
  drawCycleMarker(center: Vector2): void {
    this.layers.edges.lineStyle(this.config.cycleMarkerWidth, this.config.cycleMarkerColor, 1);
    this.layers.edges.strokeCircle(center.x, center.y, this.config.cycleMarkerRadius);
  }

  getEdgeCount(): number {
    return this.edgeCount;
  }
}
