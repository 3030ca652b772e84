export { generate, nextResidue, normalizeResidue } from "./SequenceEngine";
export type { GenerateOptions } from "./SequenceEngine";
export { parseIntegerField, parseLcgInput } from "./ParameterParser";
export { InvalidModulusError, InvalidParameterError, LcgError } from "./errors";
