import { describe, expect, it } from "vitest";
import {
  createScrollDelaySampler,
  type RandomSource,
  sampleTruncatedNormal,
  type ScrollDelayOptions,
} from "../src/maintenance/delay.js";

function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    // mulberry32
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function sequence(values: number[]): RandomSource {
  let position = 0;
  return () => {
    const value = values[position % values.length];
    position += 1;
    return value;
  };
}

describe("sampleTruncatedNormal", () => {
  const configurations: ScrollDelayOptions[] = [
    { meanMs: 500, stddevMs: 150, minMs: 200, maxMs: 5000 },
    { meanMs: 500, stddevMs: 5000, minMs: 200, maxMs: 600 },
    { meanMs: 10_000, stddevMs: 10, minMs: 200, maxMs: 5000 },
    { meanMs: -100, stddevMs: 50, minMs: 0, maxMs: 10 },
    { meanMs: 300, stddevMs: 0, minMs: 400, maxMs: 450 },
    { meanMs: 300, stddevMs: 40, minMs: 300, maxMs: 300 },
  ];

  it.each(configurations)("stays within bounds for %o", (options) => {
    const random = seededRandom(options.meanMs + options.stddevMs);
    for (let draw = 0; draw < 2000; draw += 1) {
      const sample = sampleTruncatedNormal(options, random);
      expect(sample).toBeGreaterThanOrEqual(options.minMs);
      expect(sample).toBeLessThanOrEqual(options.maxMs);
    }
  });

  it("redraws out-of-bounds samples", () => {
    // u1 = 1 - 0.999999 gives a large |z|; u1 = 1 - 0 gives z = 0, i.e. the mean.
    const random = sequence([0.999999, 0, 0, 0]);
    const options = { meanMs: 500, stddevMs: 150, minMs: 200, maxMs: 600 };

    expect(sampleTruncatedNormal(options, random)).toBe(500);
  });

  it("falls back to the clamped mean when redrawing cannot succeed", () => {
    expect(sampleTruncatedNormal({ meanMs: 9000, stddevMs: 0, minMs: 200, maxMs: 5000 })).toBe(5000);
    expect(sampleTruncatedNormal({ meanMs: 9000, stddevMs: 1, minMs: 200, maxMs: 5000 }, () => 0)).toBe(5000);
  });

  it("rejects inverted bounds when the sampler is created", () => {
    expect(() => createScrollDelaySampler({ meanMs: 500, stddevMs: 150, minMs: 600, maxMs: 200 })).toThrowError(
      expect.objectContaining({ code: "config_error" }),
    );
  });
});
