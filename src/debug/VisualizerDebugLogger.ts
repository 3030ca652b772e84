/**
 * VisualizerDebugLogger - Records visualization runs for reproducing issues
 *
 * Enable this before running the parameters in question; the last run can
 * be exported as a ready-to-paste test case.
 */

import type { GenerationResult, LayoutConfig, LcgParameters } from "@/types";

/**
 * Debug log entry for a single visualization run.
 */
export interface VisualizerDebugLog {
  timestamp: number;
  params: LcgParameters;
  layout: LayoutConfig;
  outcome: GenerationResult["status"];
  trajectory: number[];
  tailLength?: number;
  cycleStart?: number;
  cycleLength?: number;
  stepsTaken?: number;
  edgesRevealed: number;
  completed: boolean;
}

/**
 * Global debug logger instance.
 */
class VisualizerDebugLoggerImpl {
  private enabled = false;
  private logs: VisualizerDebugLog[] = [];
  private maxLogs = 50;
  private lastLog: VisualizerDebugLog | null = null;

  enable(): void {
    this.enabled = true;
    console.log(
      "%c[VISUALIZER DEBUG] Logging enabled. Use VisualizerDebugLogger.dump() to see logs.",
      "color: #00ff00; font-weight: bold"
    );
  }

  disable(): void {
    this.enabled = false;
    console.log("[VISUALIZER DEBUG] Logging disabled.");
  }

  toggle(): void {
    if (this.enabled) {
      this.disable();
    } else {
      this.enable();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Log a generated run before it starts animating.
   */
  logRun(params: LcgParameters, layout: LayoutConfig, result: GenerationResult): void {
    if (!this.enabled) return;

    const log: VisualizerDebugLog = {
      timestamp: Date.now(),
      params: { ...params },
      layout: { ...layout },
      outcome: result.status,
      trajectory: [],
      edgesRevealed: 0,
      completed: false,
    };

    if (result.status === "cycle_found") {
      log.trajectory = result.trajectory.map((step) => step.value);
      log.tailLength = result.cycle.tailLength;
      log.cycleStart = result.cycle.cycleStart;
      log.cycleLength = result.cycle.cycleLength;
    } else {
      log.stepsTaken = result.stepsTaken;
    }

    this.lastLog = log;
    this.logs.push(log);

    // Keep only the last N logs
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    const { modulus, multiplier, increment, seed } = params;
    console.log(
      `%c[VISUALIZER DEBUG] Captured run #${this.logs.length} - m=${modulus}, a=${multiplier}, c=${increment}, seed=${seed}: ${result.status}`,
      "color: #88ff88"
    );
  }

  /**
   * Record that an edge of the current run was drawn.
   */
  logEdgeRevealed(): void {
    if (!this.enabled || !this.lastLog) return;
    this.lastLog.edgesRevealed++;
  }

  /**
   * Record that the current run's animation finished.
   */
  logCompleted(): void {
    if (!this.enabled || !this.lastLog) return;
    this.lastLog.completed = true;
  }

  /**
   * Dump all logs to console.
   */
  dump(): void {
    console.log("%c[VISUALIZER DEBUG] Dumping logs...", "color: #00ff00; font-weight: bold");
    console.log("Total logs:", this.logs.length);

    for (const log of this.logs) {
      console.group(`Run @ ${new Date(log.timestamp).toISOString()}`);
      console.log("Parameters:", log.params);
      console.log("Layout:", log.layout);
      console.log("Outcome:", log.outcome);
      console.log("Trajectory:", log.trajectory);
      if (log.outcome === "cycle_found") {
        console.log("Cycle:", {
          tailLength: log.tailLength,
          cycleStart: log.cycleStart,
          cycleLength: log.cycleLength,
        });
      } else {
        console.log("Steps taken:", log.stepsTaken);
      }
      console.log("Edges revealed:", log.edgesRevealed, log.completed ? "(completed)" : "");
      console.groupEnd();
    }
  }

  getLastLog(): VisualizerDebugLog | null {
    return this.lastLog;
  }

  getAllLogs(): readonly VisualizerDebugLog[] {
    return this.logs;
  }

  clear(): void {
    this.logs = [];
    this.lastLog = null;
    console.log("[VISUALIZER DEBUG] Logs cleared.");
  }

  /**
   * Export last log as a test case (for creating regression tests).
   */
  exportAsTestCase(): string {
    if (!this.lastLog) {
      return "// No log available";
    }

    const { params, trajectory } = this.lastLog;
    const { modulus, multiplier, increment, seed } = params;
    const lines = [
      `it("reproduces m=${modulus}, a=${multiplier}, c=${increment}, seed=${seed}", () => {`,
      `  const result = generate({ modulus: ${modulus}, multiplier: ${multiplier}, increment: ${increment}, seed: ${seed} });`,
    ];

    if (this.lastLog.outcome === "cycle_found") {
      lines.push(
        `  expect(result.status).toBe("cycle_found");`,
        `  if (result.status !== "cycle_found") return;`,
        `  expect(result.trajectory.map((s) => s.value)).toEqual([${trajectory.join(", ")}]);`,
        `  expect(result.cycle.tailLength).toBe(${this.lastLog.tailLength});`,
        `  expect(result.cycle.cycleStart).toBe(${this.lastLog.cycleStart});`,
        `  expect(result.cycle.cycleLength).toBe(${this.lastLog.cycleLength});`
      );
    } else {
      lines.push(`  expect(result.status).toBe("cycle_not_found");`);
    }

    lines.push("});");
    return lines.join("\n");
  }

  /**
   * Print the exported test case to the console.
   */
  exportToConsole(): void {
    console.log("%c[VISUALIZER DEBUG] Test case:", "color: #00ffff; font-weight: bold");
    console.log(this.exportAsTestCase());
  }
}

export const VisualizerDebugLogger = new VisualizerDebugLoggerImpl();

// Expose on window for use from the browser console
if (typeof window !== "undefined") {
  Object.assign(window, { VisualizerDebugLogger });
}
