import type { LcgInputText, LcgParameters, ParseResult } from "@/types";

/** Labels used in messages shown to the user */
const FIELD_LABELS: Record<keyof LcgInputText, string> = {
  modulus: "Modulus (m)",
  multiplier: "Multiplier (a)",
  increment: "Increment (c)",
  seed: "Seed",
};

const INTEGER_PATTERN = /^[+-]?\d+$/;

// Signed 64-bit range accepted by the text fields
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const SAFE_MIN = BigInt(Number.MIN_SAFE_INTEGER);
const SAFE_MAX = BigInt(Number.MAX_SAFE_INTEGER);

type FieldParse =
  | { readonly ok: true; readonly value: number }
  | { readonly ok: false; readonly reason: "not_integer" }
  | { readonly ok: false; readonly reason: "out_of_range"; readonly negative: boolean };

/**
 * Parse one field as a signed 64-bit decimal integer that also fits the
 * safe integer range. Surrounding whitespace and a leading sign are allowed.
 */
export function parseIntegerField(text: string): FieldParse {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return { ok: false, reason: "not_integer" };
  }

  const value = BigInt(trimmed);
  if (value < INT64_MIN || value > INT64_MAX) {
    return { ok: false, reason: "not_integer" };
  }
  if (value < SAFE_MIN || value > SAFE_MAX) {
    return { ok: false, reason: "out_of_range", negative: value < 0n };
  }

  return { ok: true, value: Number(value) };
}

function rangeMessage(field: keyof LcgInputText): string {
  return `${FIELD_LABELS[field]} must be between ${Number.MIN_SAFE_INTEGER} and ${Number.MAX_SAFE_INTEGER}.`;
}

function integerMessage(field: keyof LcgInputText): string {
  return field === "modulus"
    ? `${FIELD_LABELS.modulus} must be a positive integer.`
    : `${FIELD_LABELS[field]} must be an integer.`;
}

type FieldRead =
  | { readonly ok: true; readonly value: number }
  | Extract<ParseResult, { readonly ok: false }>;

function readField(input: LcgInputText, field: keyof LcgInputText): FieldRead {
  const parsed = parseIntegerField(input[field]);
  if (!parsed.ok) {
    // A negative modulus is not positive, however large
    const outOfRange =
      parsed.reason === "out_of_range" && !(field === "modulus" && parsed.negative);
    const message = outOfRange ? rangeMessage(field) : integerMessage(field);
    return { ok: false, field, message };
  }
  return parsed;
}

/**
 * Parse the four control panel inputs, reporting the first invalid field.
 * The seed is returned as typed; the engine normalizes it.
 */
export function parseLcgInput(input: LcgInputText): ParseResult {
  const modulus = readField(input, "modulus");
  if (!modulus.ok) return modulus;
  if (modulus.value <= 0) {
    return { ok: false, field: "modulus", message: integerMessage("modulus") };
  }

  const multiplier = readField(input, "multiplier");
  if (!multiplier.ok) return multiplier;

  const increment = readField(input, "increment");
  if (!increment.ok) return increment;

  const seed = readField(input, "seed");
  if (!seed.ok) return seed;

  const params: LcgParameters = {
    modulus: modulus.value,
    multiplier: multiplier.value,
    increment: increment.value,
    seed: seed.value,
  };
  return { ok: true, params };
}
