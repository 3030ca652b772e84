import type { LcgInputText } from "@/types";

/**
 * ControlPanel - The HTML form holding the four generator inputs
 *
 * Expects the markup from index.html: a form `#lcg-controls` with inputs
 * named modulus, multiplier, increment and seed, and a `#lcg-status` element.
 */
export class ControlPanel {
  private form: HTMLFormElement;
  private status: HTMLElement;
  private submitHandlers: Set<(input: LcgInputText) => void> = new Set();

  constructor(root: Document = document) {
    const form = root.getElementById("lcg-controls");
    const status = root.getElementById("lcg-status");
    if (!(form instanceof HTMLFormElement) || !status) {
      throw new Error("Control panel markup (#lcg-controls, #lcg-status) not found");
    }

    this.form = form;
    this.status = status;
    this.form.addEventListener("submit", (event) => {
      event.preventDefault();
      this.submit();
    });
  }

  /** Read the current field values */
  read(): LcgInputText {
    return {
      modulus: this.fieldValue("modulus"),
      multiplier: this.fieldValue("multiplier"),
      increment: this.fieldValue("increment"),
      seed: this.fieldValue("seed"),
    };
  }

  /** Notify listeners as if the Visualize button was pressed */
  submit(): void {
    const input = this.read();
    for (const handler of this.submitHandlers) {
      handler(input);
    }
  }

  onSubmit(handler: (input: LcgInputText) => void): () => void {
    this.submitHandlers.add(handler);
    return () => {
      this.submitHandlers.delete(handler);
    };
  }

  showMessage(message: string, kind: "info" | "error" = "info"): void {
    this.status.textContent = message;
    this.status.dataset.kind = kind;
  }

  clearMessage(): void {
    this.status.textContent = "";
    delete this.status.dataset.kind;
  }

  private fieldValue(name: keyof LcgInputText): string {
    const field = this.form.elements.namedItem(name);
    return field instanceof HTMLInputElement ? field.value : "";
  }
}
