import { HarvestError } from "../errors.js";

export interface ScrollDelayOptions {
  meanMs: number;
  stddevMs: number;
  minMs: number;
  maxMs: number;
}

export type RandomSource = () => number;

const MAX_REDRAWS = 64;

function gaussian(mean: number, stddev: number, random: RandomSource): number {
  // Box-Muller; 1 - u keeps the logarithm away from zero.
  const u1 = 1 - random();
  const u2 = random();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + z * stddev;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Draws from a normal distribution truncated to [minMs, maxMs] by redrawing.
 * When redrawing cannot land inside the bounds the clamped mean is returned.
 */
export function sampleTruncatedNormal(options: ScrollDelayOptions, random: RandomSource = Math.random): number {
  assertDelayBounds(options);
  const { meanMs, stddevMs, minMs, maxMs } = options;

  if (stddevMs > 0 && Number.isFinite(stddevMs) && Number.isFinite(meanMs)) {
    for (let draw = 0; draw < MAX_REDRAWS; draw += 1) {
      const sample = gaussian(meanMs, stddevMs, random);
      if (sample >= minMs && sample <= maxMs) {
        return sample;
      }
    }
  }

  return clamp(Number.isFinite(meanMs) ? meanMs : minMs, minMs, maxMs);
}

export function assertDelayBounds(options: ScrollDelayOptions): void {
  const { minMs, maxMs } = options;
  if (!(Number.isFinite(minMs) && Number.isFinite(maxMs) && minMs <= maxMs)) {
    throw new HarvestError("config_error", "Scroll delay bounds must be finite with min <= max", { minMs, maxMs });
  }
}

export function createScrollDelaySampler(
  options: ScrollDelayOptions,
  random: RandomSource = Math.random,
): () => number {
  assertDelayBounds(options);
  return () => sampleTruncatedNormal(options, random);
}
