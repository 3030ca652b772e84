/**
 * SequenceEngine - Runs X_{n+1} = (a * X_n + c) mod m until a residue repeats
 *
 * Arithmetic goes through BigInt so that `a * X_n` stays exact for every
 * safe-integer multiplier; only residues in [0, m) come back as numbers.
 */

import type { CycleResult, GenerationResult, LcgParameters, TrajectoryStep } from "@/types";
import { InvalidModulusError, InvalidParameterError } from "./errors";

export interface GenerateOptions {
  /**
   * Abort with `cycle_not_found` once the step counter exceeds this.
   * Defaults to 2 * modulus, which a valid generator never reaches.
   */
  readonly stepLimit?: number;
}

/**
 * Bring any integer into [0, modulus), also for negative input.
 */
export function normalizeResidue(value: number, modulus: number): number {
  const m = BigInt(modulus);
  return Number(((BigInt(value) % m) + m) % m);
}

/**
 * One application of the recurrence. Double modulo keeps the result
 * non-negative when the multiplier or increment is negative.
 */
export function nextResidue(current: number, params: LcgParameters): number {
  const m = BigInt(params.modulus);
  const raw = BigInt(params.multiplier) * BigInt(current) + BigInt(params.increment);
  return Number(((raw % m) + m) % m);
}

function validate(params: LcgParameters): void {
  if (!Number.isSafeInteger(params.modulus) || params.modulus <= 0) {
    throw new InvalidModulusError(params.modulus);
  }
  if (!Number.isSafeInteger(params.multiplier)) {
    throw new InvalidParameterError("multiplier", params.multiplier);
  }
  if (!Number.isSafeInteger(params.increment)) {
    throw new InvalidParameterError("increment", params.increment);
  }
  if (!Number.isSafeInteger(params.seed)) {
    throw new InvalidParameterError("seed", params.seed);
  }
}

/**
 * Generate the trajectory from the (normalized) seed up to, but excluding,
 * the first repeated residue.
 *
 * @throws InvalidModulusError when modulus is not a positive integer
 * @throws InvalidParameterError when any parameter is not a safe integer
 */
export function generate(params: LcgParameters, options: GenerateOptions = {}): GenerationResult {
  validate(params);

  const stepLimit = options.stepLimit ?? 2 * params.modulus;
  // Map preserves insertion order, so its entries are the trajectory
  const firstSeenAt = new Map<number, number>();

  let current = normalizeResidue(params.seed, params.modulus);
  let step = 0;

  while (!firstSeenAt.has(current)) {
    firstSeenAt.set(current, step);
    current = nextResidue(current, params);
    step++;

    if (step > stepLimit) {
      return { status: "cycle_not_found", stepsTaken: step, stepLimit };
    }
  }

  const tailLength = firstSeenAt.get(current) ?? 0;
  const cycle: CycleResult = {
    tailLength,
    cycleStart: current,
    cycleLength: step - tailLength,
    detectedAtStep: step,
  };

  const trajectory: TrajectoryStep[] = [];
  for (const [value, index] of firstSeenAt) {
    trajectory.push({ index, value });
  }

  return { status: "cycle_found", trajectory, cycle };
}
