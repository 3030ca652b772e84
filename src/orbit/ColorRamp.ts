/**
 * ColorRamp - Repeating brightness ramp for trajectory edges
 *
 * Consecutive edges get progressively darker shades of one base color,
 * wrapping every `levels` steps so long trajectories stay legible.
 */

export interface ColorRampOptions {
  /** Brightest color, 0xRRGGBB */
  readonly baseColor: number;
  /** Number of shades before the ramp repeats */
  readonly levels: number;
  readonly minBrightness: number;
  readonly maxBrightness: number;
}

export const DEFAULT_COLOR_RAMP: ColorRampOptions = {
  baseColor: 0xccff99,
  levels: 9,
  minBrightness: 0.3,
  maxBrightness: 1.0,
};

/**
 * Brightness factor of shade `level` (1-based): linear from max towards min.
 */
export function brightnessRatio(
  level: number,
  levels: number,
  minBrightness: number,
  maxBrightness: number
): number {
  const progress = level / levels;
  return maxBrightness - progress * (maxBrightness - minBrightness);
}

function scaleChannel(channel: number, ratio: number): number {
  return Math.min(255, Math.max(0, Math.floor(channel * ratio)));
}

/**
 * Multiply each RGB channel of a 0xRRGGBB color by `ratio`.
 */
export function scaleColor(color: number, ratio: number): number {
  const r = scaleChannel((color >> 16) & 0xff, ratio);
  const g = scaleChannel((color >> 8) & 0xff, ratio);
  const b = scaleChannel(color & 0xff, ratio);
  return (r << 16) | (g << 8) | b;
}

export function buildPalette(options: Partial<ColorRampOptions> = {}): readonly number[] {
  const opts = { ...DEFAULT_COLOR_RAMP, ...options };
  const palette: number[] = [];
  for (let level = 1; level <= opts.levels; level++) {
    const ratio = brightnessRatio(level, opts.levels, opts.minBrightness, opts.maxBrightness);
    palette.push(scaleColor(opts.baseColor, ratio));
  }
  return palette;
}

const DEFAULT_PALETTE = buildPalette();

export function stepColor(step: number, palette: readonly number[] = DEFAULT_PALETTE): number {
  return palette[step % palette.length] ?? DEFAULT_COLOR_RAMP.baseColor;
}
