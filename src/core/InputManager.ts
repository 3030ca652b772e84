/**
 * Event emitter surface used here. Phaser's keyboard plugin and the game's
 * event emitter both satisfy it.
 */
export interface InputEventSource {
  on(event: string, fn: (event: KeyboardEvent) => void): unknown;
  off(event: string, fn: (event: KeyboardEvent) => void): unknown;
}

/**
 * Manages keyboard shortcuts for the visualizer scene
 *
 * Keys typed into form fields, or pressed on a focused button, belong to the
 * control panel and are ignored.
 */
export class InputManager {
  private keyboard: InputEventSource | null;
  private focus: InputEventSource;
  private keyCallbacks: Map<string, () => void> = new Map();
  private keysHeld: Set<string> = new Set();

  /**
   * @param keyboard The scene's keyboard plugin (`scene.input.keyboard`)
   * @param focus Emits "blur" when the window loses focus (`scene.game.events`)
   */
  constructor(keyboard: InputEventSource | null, focus: InputEventSource) {
    this.keyboard = keyboard;
    this.focus = focus;

    this.keyboard?.on("keydown", this.handleKeyDown);
    this.keyboard?.on("keyup", this.handleKeyUp);
    this.focus.on("blur", this.handleBlur);
  }

  private handleKeyDown = (event: KeyboardEvent): void => {
    if (isPanelTarget(event.target)) return;

    // Auto-repeat fires keydown again while held; trigger once per press
    if (this.keysHeld.has(event.code)) return;
    this.keysHeld.add(event.code);

    const callback = this.keyCallbacks.get(event.code);
    if (callback) callback();
  };

  private handleKeyUp = (event: KeyboardEvent): void => {
    this.keysHeld.delete(event.code);
  };

  // Keys released while the window is unfocused never send keyup
  private handleBlur = (): void => {
    this.keysHeld.clear();
  };

  /** Register a callback for a key press (by KeyboardEvent.code) */
  onKeyPress(code: string, callback: () => void): void {
    this.keyCallbacks.set(code, callback);
  }

  /** Clean up */
  destroy(): void {
    this.keyCallbacks.clear();
    this.keysHeld.clear();
    this.keyboard?.off("keydown", this.handleKeyDown);
    this.keyboard?.off("keyup", this.handleKeyUp);
    this.focus.off("blur", this.handleBlur);
  }
}

function isPanelTarget(target: EventTarget | null): boolean {
  return (
    target instanceof HTMLInputElement ||
    target instanceof HTMLTextAreaElement ||
    target instanceof HTMLButtonElement
  );
}
