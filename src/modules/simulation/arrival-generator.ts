/** One simulated player arrival. */
export interface ArrivalEvent {
  arrivalTime: number;
  rating: number;
  form: number;
}

export interface ArrivalGeneratorOptions {
  playerCount: number;
  /** Arrivals are spread uniformly over [0, durationSeconds). */
  durationSeconds: number;
  /** Omit for a wall-clock seed. */
  seed?: number;
}

export const MIN_RATING = 1000;
export const MAX_RATING = 3000;
export const MIN_FORM = -10;
export const MAX_FORM = 10;

const LCG_MODULUS = 2 ** 32;

/**
 * Seeded random number generator (returns values in [0, 1)).
 * Linear congruential generator with the Numerical Recipes constants.
 */
export function createSeededRandom(seed: number): () => number {
  let state = ((Math.trunc(seed) % LCG_MODULUS) + LCG_MODULUS) % LCG_MODULUS;
  return () => {
    // Math.imul keeps the multiply exact in 32 bits; >>> 0 maps back to unsigned.
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / LCG_MODULUS;
  };
}

/** Integer in [min, max], both inclusive. */
function randomInt(rng: () => number, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

/** Random arrivals sorted by arrival time (stable for equal times). */
export function generateArrivals(options: ArrivalGeneratorOptions): ArrivalEvent[] {
  const rng = createSeededRandom(options.seed ?? Date.now());
  const events: ArrivalEvent[] = [];
  for (let i = 0; i < options.playerCount; i++) {
    events.push({
      arrivalTime: rng() * options.durationSeconds,
      rating: randomInt(rng, MIN_RATING, MAX_RATING),
      form: randomInt(rng, MIN_FORM, MAX_FORM),
    });
  }
  return events.sort((a, b) => a.arrivalTime - b.arrivalTime);
}
