/**
 * Source of uniform floats in [0, 1). Injected into the generator so a run
 * can be reproduced from a seed.
 */
export interface RandomSource {
    next(): number;
}

export const mathRandom: RandomSource = { next: () => Math.random() };

/** mulberry32: small, fast, 32-bit state. Not for anything security related. */
export function seededRandom(seed: number): RandomSource {
    let state = seed >>> 0;
    return {
        next() {
            state = (state + 0x6d2b79f5) >>> 0;
            let t = state;
            t = Math.imul(t ^ (t >>> 15), t | 1);
            t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
            return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
        },
    };
}

/** Integer in [min, max], both ends inclusive. */
export function randomInt(rng: RandomSource, min: number, max: number): number {
    if (max < min) throw new RangeError(`randomInt: max ${max} < min ${min}`);
    return min + Math.floor(rng.next() * (max - min + 1));
}

/** Float in [min, max). */
export function randomFloat(rng: RandomSource, min: number, max: number): number {
    return min + rng.next() * (max - min);
}

export function pickOne<T>(rng: RandomSource, items: readonly T[]): T {
    const item = items[randomInt(rng, 0, items.length - 1)];
    if (item === undefined) throw new RangeError('pickOne: cannot pick from an empty list');
    return item;
}
