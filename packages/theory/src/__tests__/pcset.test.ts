import { chroma, pcset, pcsetDegrees, pcsetNearest, pcsetSteps } from '../pcset';

const MAJOR = '101011010101';
const range = (from: number, to: number): number[] =>
    Array.from({ length: to - from + 1 }, (_, i) => from + i);

describe('Pcset', () => {
    describe('pcset()', () => {
        test('From MIDI numbers', () => {
            expect(pcset([62, 63, 60, 65, 70, 72])).toEqual([0, 2, 3, 5, 10]);
        });

        test('From a chroma string', () => {
            expect(pcset('100100100101')).toEqual([0, 3, 6, 9, 11]);
            expect(pcset(MAJOR)).toEqual([0, 2, 4, 5, 7, 9, 11]);
        });

        test('[EDGE] Negative MIDI numbers wrap', () => {
            expect(chroma(-1)).toBe(11);
            expect(pcset([-1, 61])).toEqual([1, 11]);
        });

        test('[EDGE] Empty sources', () => {
            expect(pcset([])).toEqual([]);
            expect(pcset('')).toEqual([]);
            expect(pcset('000000000000')).toEqual([]);
        });
    });

    describe('pcsetNearest()', () => {
        test('Snaps to the closest member, ties upward', () => {
            expect(range(0, 12).map(pcsetNearest([0, 5, 7])))
                .toEqual([0, 0, 0, 5, 5, 5, 7, 7, 7, 7, 12, 12, 12]);
        });

        test('Chroma string source', () => {
            expect(range(36, 47).map(pcsetNearest('100101010010')))
                .toEqual([36, 36, 39, 39, 41, 41, 43, 43, 43, 46, 46, 48]);
        });

        test('Fractional input is rounded first', () => {
            const nearest = pcsetNearest([0, 5, 7]);
            expect(nearest(60.4)).toBe(60);
            expect(nearest(64.6)).toBe(65);
            expect(nearest(-0.4)).toBe(0);
        });

        test('[EDGE] Non-finite input finds nothing', () => {
            const nearest = pcsetNearest([0, 5, 7]);
            expect(nearest(NaN)).toBeUndefined();
            expect(nearest(Infinity)).toBeUndefined();
        });

        test('[EDGE] Empty set finds nothing', () => {
            expect(pcsetNearest([])(60)).toBeUndefined();
        });
    });

    describe('pcsetSteps()', () => {
        test('Walks the set from the tonic', () => {
            const major = pcsetSteps(MAJOR, 60);
            expect(range(0, 7).map(major)).toEqual([60, 62, 64, 65, 67, 69, 71, 72]);
            expect(range(-8, -1).map(major)).toEqual([47, 48, 50, 52, 53, 55, 57, 59]);
        });

        test('Captures a copy of the set', () => {
            const notes = [0, 2, 4];
            const steps = pcsetSteps(notes, 60);
            notes.push(1);
            expect(steps(1)).toBe(62);
            expect(steps(3)).toBe(72);
        });

        test('[EDGE] Non-integer steps have no note', () => {
            const major = pcsetSteps(MAJOR, 60);
            expect(major(NaN)).toBeUndefined();
            expect(major(1.5)).toBeUndefined();
            expect(major(Infinity)).toBeUndefined();
        });

        test('[EDGE] Empty set', () => {
            expect(pcsetSteps([], 60)(0)).toBeUndefined();
        });
    });

    describe('pcsetDegrees()', () => {
        test('1-indexed with no degree 0', () => {
            const major = pcsetDegrees(MAJOR, 60);
            expect([1, 2, 3, 8].map(major)).toEqual([60, 62, 64, 72]);
            expect(major(0)).toBeUndefined();
            expect([-1, -2, -7].map(major)).toEqual([59, 57, 48]);
        });

        test('[EDGE] Non-integer degrees have no note', () => {
            const major = pcsetDegrees(MAJOR, 60);
            expect(major(NaN)).toBeUndefined();
            expect(major(2.5)).toBeUndefined();
        });
    });
});
