import Phaser from "phaser";
import { createGameConfig } from "@/config/gameConfig";
import { LcgScene } from "@/scenes";
import { ControlPanel } from "@/ui/ControlPanel";

/**
 * Main entry point for the LCG orbit visualizer
 */
function startVisualizer(): void {
  const panel = new ControlPanel();
  const config = createGameConfig([new LcgScene(panel)]);

  new Phaser.Game(config);
  console.log("[main] LCG orbit visualizer started");
}

try {
  startVisualizer();
} catch (error) {
  console.error("[main] Failed to start visualizer:", error);
}
