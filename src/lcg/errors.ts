/**
 * Errors raised when the generator is asked to run on parameters it cannot use.
 *
 * A trajectory that fails to repeat within the safety bound is reported as a
 * `cycle_not_found` result instead (see SequenceEngine).
 */

export class LcgError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LcgError";
  }
}

export class InvalidModulusError extends LcgError {
  readonly modulus: number;

  constructor(modulus: number) {
    super(`Modulus must be a positive integer, got ${modulus}`);
    this.name = "InvalidModulusError";
    this.modulus = modulus;
  }
}

export class InvalidParameterError extends LcgError {
  readonly parameter: string;
  readonly value: number;

  constructor(parameter: string, value: number) {
    super(`${parameter} must be a safe integer, got ${value}`);
    this.name = "InvalidParameterError";
    this.parameter = parameter;
    this.value = value;
  }
}
