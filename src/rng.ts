import type { RandomSource } from "./types.js";

// xorshift128 seeded from a single 32-bit value.
export function createSeededRandom(seed: number): RandomSource {
  let s0 = seed >>> 0;
  let s1 = (seed ^ 0xdeadbeef) >>> 0;
  let s2 = (seed ^ 0x12345678) >>> 0;
  let s3 = (seed ^ 0xcafebabe) >>> 0;

  return () => {
    const t = s1 << 9;
    const r = s0 ^ t;
    s0 = s1;
    s1 = s2;
    s2 = s3;
    s3 = s3 ^ (s3 >>> 11) ^ (r ^ (r >>> 8));
    return (s3 >>> 0) / 0x100000000;
  };
}

export function pickIndex(random: RandomSource, length: number): number {
  return Math.min(length - 1, Math.floor(random() * length));
}
