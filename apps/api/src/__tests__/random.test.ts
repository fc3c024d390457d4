import { describe, test, expect } from 'vitest';
import { pickOne, randomFloat, randomInt, seededRandom, type RandomSource } from '../snapshots/random';
import { occupancyRange } from '../snapshots/generator';

const fixed = (value: number): RandomSource => ({ next: () => value });

describe('seededRandom', () => {
    test('same seed gives the same sequence', () => {
        const a = seededRandom(1234);
        const b = seededRandom(1234);
        const seqA = Array.from({ length: 10 }, () => a.next());
        const seqB = Array.from({ length: 10 }, () => b.next());
        expect(seqA).toEqual(seqB);
    });

    test('values stay in [0, 1)', () => {
        const rng = seededRandom(99);
        for (let i = 0; i < 1000; i++) {
            const v = rng.next();
            expect(v).toBeGreaterThanOrEqual(0);
            expect(v).toBeLessThan(1);
        }
    });
});

describe('randomInt', () => {
    test('both ends are reachable', () => {
        expect(randomInt(fixed(0), 4, 9)).toBe(4);
        expect(randomInt(fixed(0.999999), 4, 9)).toBe(9);
    });

    test('single-value range', () => {
        expect(randomInt(fixed(0.7), 0, 0)).toBe(0);
    });

    test('inverted range throws', () => {
        expect(() => randomInt(fixed(0.5), 3, 2)).toThrow(RangeError);
    });
});

describe('randomFloat', () => {
    test('maps [0, 1) onto [min, max)', () => {
        expect(randomFloat(fixed(0), 10000, 30000)).toBe(10000);
        expect(randomFloat(fixed(0.5), 10000, 30000)).toBe(20000);
    });
});

describe('pickOne', () => {
    test('picks by position', () => {
        expect(pickOne(fixed(0), ['a', 'b', 'c'])).toBe('a');
        expect(pickOne(fixed(0.5), ['a', 'b', 'c'])).toBe('b');
        expect(pickOne(fixed(0.99), ['a', 'b', 'c'])).toBe('c');
    });

    test('empty list throws', () => {
        expect(() => pickOne(fixed(0), [])).toThrow(RangeError);
    });
});

describe('occupancyRange', () => {
    test.each([
        { capacity: 10, expected: [4, 9] },
        { capacity: 100, expected: [40, 90] },
        { capacity: 3, expected: [1, 2] },
        { capacity: 2, expected: [0, 1] },
        { capacity: 1, expected: [0, 0] },
    ])('capacity $capacity → $expected', ({ capacity, expected }) => {
        expect(occupancyRange(capacity)).toEqual(expected);
    });
});
