const MASK_64 = (1n << 64n) - 1n;
const TWO_TO_64 = 1n << 64n;
const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n;
const MIX_MULTIPLIER_1 = 0xbf58476d1ce4e5b9n;
const MIX_MULTIPLIER_2 = 0x94d049bb133111ebn;

/** Immutable SplitMix64 cursor; every draw returns a new one. */
export interface Rng {
  readonly algorithm: 'splitmix64';
  readonly state: bigint;
}

const mask64 = (value: bigint): bigint => value & MASK_64;

const mix = (value: bigint): bigint => {
  let word = mask64((value ^ (value >> 30n)) * MIX_MULTIPLIER_1);
  word = mask64((word ^ (word >> 27n)) * MIX_MULTIPLIER_2);
  return word ^ (word >> 31n);
};

export const createRng = (seed: bigint): Rng => ({
  algorithm: 'splitmix64',
  state: mask64(seed),
});

export const stepRng = (rng: Rng): readonly [bigint, Rng] => {
  const nextState = mask64(rng.state + GOLDEN_GAMMA);
  return [mix(nextState), { algorithm: rng.algorithm, state: nextState }] as const;
};

export const nextInt = (rng: Rng, min: number, max: number): readonly [number, Rng] => {
  if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) {
    throw new RangeError('nextInt bounds must be safe integers');
  }

  if (min > max) {
    throw new RangeError(`nextInt requires min <= max, received min=${min}, max=${max}`);
  }

  const range = BigInt(max) - BigInt(min) + 1n;
  // Draws at or above threshold fall in the incomplete final block.
  const threshold = TWO_TO_64 - (TWO_TO_64 % range);
  let cursor = rng;

  while (true) {
    const [raw, nextRng] = stepRng(cursor);
    cursor = nextRng;

    if (raw < threshold) {
      return [min + Number(raw % range), cursor] as const;
    }
  }
};
