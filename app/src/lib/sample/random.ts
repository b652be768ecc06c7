export type RandomSource = () => number;

/** mulberry32: small 32-bit generator, uniform in [0, 1). */
export const createRandom = (seed: number): RandomSource => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

export const randomInt = (random: RandomSource, min: number, max: number): number =>
  min + Math.floor(random() * (max - min + 1));

export const randomChoice = <T>(random: RandomSource, values: readonly T[]): T => {
  if (values.length === 0) {
    throw new Error("Cannot choose from an empty list.");
  }
  return values[Math.floor(random() * values.length)];
};

export const randomUniform = (random: RandomSource, min: number, max: number): number =>
  min + (max - min) * random();
