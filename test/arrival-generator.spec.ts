import {
  createSeededRandom,
  generateArrivals,
  MAX_FORM,
  MAX_RATING,
  MIN_FORM,
  MIN_RATING,
} from '../src/modules/simulation/arrival-generator';

describe('createSeededRandom', () => {
  it('starts from the LCG increment for seed 0', () => {
    const rng = createSeededRandom(0);
    expect(rng()).toBe(1013904223 / 2 ** 32);
  });

  it('repeats the sequence for the same seed', () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);
    const seqA = Array.from({ length: 5 }, () => a());
    const seqB = Array.from({ length: 5 }, () => b());
    expect(seqA).toEqual(seqB);
  });

  it('differs across seeds', () => {
    expect(createSeededRandom(1)()).not.toBe(createSeededRandom(2)());
  });

  it('stays in [0, 1) including for negative seeds', () => {
    const rng = createSeededRandom(-12345);
    for (let i = 0; i < 1000; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});

describe('generateArrivals', () => {
  const options = { playerCount: 200, durationSeconds: 240, seed: 42 };

  it('generates the requested number of events sorted by time', () => {
    const events = generateArrivals(options);
    expect(events).toHaveLength(200);
    for (let i = 1; i < events.length; i++) {
      expect(events[i].arrivalTime).toBeGreaterThanOrEqual(events[i - 1].arrivalTime);
    }
  });

  it('keeps every value within its range', () => {
    for (const e of generateArrivals(options)) {
      expect(e.arrivalTime).toBeGreaterThanOrEqual(0);
      expect(e.arrivalTime).toBeLessThan(240);
      expect(Number.isInteger(e.rating)).toBe(true);
      expect(e.rating).toBeGreaterThanOrEqual(MIN_RATING);
      expect(e.rating).toBeLessThanOrEqual(MAX_RATING);
      expect(Number.isInteger(e.form)).toBe(true);
      expect(e.form).toBeGreaterThanOrEqual(MIN_FORM);
      expect(e.form).toBeLessThanOrEqual(MAX_FORM);
    }
  });

  it('is reproducible for a given seed', () => {
    expect(generateArrivals(options)).toEqual(generateArrivals(options));
  });

  it('returns nothing for zero players', () => {
    expect(generateArrivals({ ...options, playerCount: 0 })).toEqual([]);
  });
});
