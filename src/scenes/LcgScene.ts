import { DebugView, InputManager } from "@/core";
import { DEFAULT_VISUALIZER_CONFIG, type VisualizerOverrides } from "@/config/visualizerConfig";
import { VisualizerDebugLogger } from "@/debug/VisualizerDebugLogger";
import type { ILabelLayer } from "@/systems/IVisualizerSystem";
import type { ControlPanel } from "@/ui/ControlPanel";
import {
  VisualizationController,
  type VisualizerEvent,
} from "@/visualization/VisualizationController";
import Phaser from "phaser";

/**
 * Residue labels as centered Phaser text objects.
 */
class TextLabelLayer implements ILabelLayer {
  private scene: Phaser.Scene;
  private style: Phaser.Types.GameObjects.Text.TextStyle;
  private texts: Phaser.GameObjects.Text[] = [];

  constructor(scene: Phaser.Scene, fontSize: number, color: string) {
    this.scene = scene;
    this.style = {
      fontFamily: "JetBrains Mono, monospace",
      fontSize: `${fontSize}px`,
      fontStyle: "bold",
      color,
    };
  }

  addLabel(text: string, x: number, y: number): void {
    const label = this.scene.add.text(x, y, text, this.style).setOrigin(0.5).setDepth(1);
    this.texts.push(label);
  }

  clear(): void {
    for (const text of this.texts) {
      text.destroy();
    }
    this.texts = [];
  }
}

/**
 * The single visualizer screen: residue circle, animated trajectory and
 * cycle summary. Inputs come from the HTML control panel.
 */
export class LcgScene extends Phaser.Scene {
  private panel: ControlPanel;
  private visualizerConfig: VisualizerOverrides;

  private inputManager!: InputManager;
  private debugView!: DebugView;
  private controller!: VisualizationController;
  private unsubscribePanel: (() => void) | null = null;

  constructor(panel: ControlPanel, config: VisualizerOverrides = {}) {
    super({ key: "LcgScene" });
    this.panel = panel;
    this.visualizerConfig = config;
  }

  create(): void {
    const markerGraphics = this.add.graphics().setDepth(0);
    const edgeGraphics = this.add.graphics().setDepth(2);
    const labels = new TextLabelLayer(
      this,
      this.visualizerConfig.labelFontSize ?? DEFAULT_VISUALIZER_CONFIG.labelFontSize,
      this.visualizerConfig.labelColor ?? DEFAULT_VISUALIZER_CONFIG.labelColor
    );

    this.controller = new VisualizationController(
      { markers: markerGraphics, edges: edgeGraphics },
      labels,
      this.visualizerConfig
    );
    this.controller.onEvent((event) => this.handleVisualizerEvent(event));

    this.inputManager = new InputManager(this.input.keyboard, this.game.events);
    this.debugView = new DebugView(this);
    this.debugView.create();

    // Enter visualizes even when focus is outside the form
    this.inputManager.onKeyPress("Enter", () => this.panel.submit());

    // Toggle debug with backtick key
    this.inputManager.onKeyPress("Backquote", () => this.debugView.toggle());

    // Run logging: L toggles, D dumps, E exports the last run as a test case
    this.inputManager.onKeyPress("KeyL", () => VisualizerDebugLogger.toggle());
    this.inputManager.onKeyPress("KeyD", () => VisualizerDebugLogger.dump());
    this.inputManager.onKeyPress("KeyE", () => VisualizerDebugLogger.exportToConsole());

    this.unsubscribePanel = this.panel.onSubmit((input) => {
      this.panel.clearMessage();
      this.controller.visualize(input, {
        width: this.cameras.main.width,
        height: this.cameras.main.height,
      });
    });

    this.events.once(Phaser.Scenes.Events.SHUTDOWN, () => this.handleShutdown());
  }

  update(_time: number, delta: number): void {
    // Phaser reports milliseconds; systems take seconds
    this.controller.update(delta / 1000);

    this.debugView.setInfo("animating", this.controller.isAnimating());
    this.debugView.setInfo("edges", this.controller.getEdgeCount());
    this.debugView.setInfo("logging", VisualizerDebugLogger.isEnabled());
    this.debugView.update();
  }

  private handleVisualizerEvent(event: VisualizerEvent): void {
    switch (event.type) {
      case "run_started":
        this.debugView.setInfo("m", event.params.modulus);
        this.debugView.removeInfo("tail");
        this.debugView.removeInfo("cycle");
        break;
      case "edge_drawn":
        break;
      case "run_completed":
        this.debugView.setInfo("tail", event.cycle.tailLength);
        this.debugView.setInfo("cycle", event.cycle.cycleLength);
        this.panel.showMessage(event.summary);
        break;
      case "run_rejected":
        this.panel.showMessage(event.message, "error");
        break;
    }
  }

  private handleShutdown(): void {
    this.unsubscribePanel?.();
    this.unsubscribePanel = null;
    this.inputManager.destroy();
    this.debugView.destroy();
    this.controller.dispose();
  }
}
