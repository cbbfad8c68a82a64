import { FIFTHS, FIFTHS_TO_STEPS, LETTERS, SIZES, STEPS_TO_OCTS } from './constants';
import type {
    Coordinates,
    Direction,
    IntervalCoordinates,
    NoteCoordinates,
    PitchClassCoordinates,
    PitchInfo,
} from './types';

/**
 * Pitch <-> line-of-fifths coordinates.
 *
 * Every note and interval operation funnels through `coordinatesFromPitch`
 * and `pitchFromCoordinates`; the two must stay exact inverses.
 */

// ============================================================================
// Integer helpers
// ============================================================================

/**
 * Modulo that is never negative.
 */
export function mod(n: number, m: number): number {
    return ((n % m) + m) % m;
}

/**
 * Apply a direction without producing -0.
 */
export function signed(dir: Direction, n: number): number {
    return dir === 1 ? n : 0 - n;
}

// ============================================================================
// ENCODE: Pitch → Coordinates
// ============================================================================

export function pitchClassCoordinates(step: number, alt: number, dir: Direction = 1): PitchClassCoordinates {
    return { kind: 'pitchClass', fifths: signed(dir, FIFTHS[step] + 7 * alt) };
}

export function noteCoordinates(step: number, alt: number, oct: number): NoteCoordinates {
    return {
        kind: 'note',
        fifths: FIFTHS[step] + 7 * alt,
        octaves: oct - STEPS_TO_OCTS[step] - 4 * alt,
    };
}

export function intervalCoordinates(step: number, alt: number, oct: number, dir: Direction): IntervalCoordinates {
    const { fifths, octaves } = noteCoordinates(step, alt, oct);
    return {
        kind: 'interval',
        fifths: signed(dir, fifths),
        octaves: signed(dir, octaves),
        direction: dir,
    };
}

/**
 * Encodes a pitch. The variant follows the fields present:
 * no `oct` → pitch class, `oct` → note, `oct` + `dir` → interval.
 *
 * @example
 * coordinatesFromPitch({ step: 5, alt: 0, oct: 4 }) // A4
 * // => { kind: 'note', fifths: 3, octaves: 3 }
 */
export function coordinatesFromPitch(pitch: PitchInfo): Coordinates {
    const { step, alt, oct, dir } = pitch;
    if (oct === undefined) {
        return pitchClassCoordinates(step, alt, dir);
    }
    return dir === undefined
        ? noteCoordinates(step, alt, oct)
        : intervalCoordinates(step, alt, oct, dir);
}

// ============================================================================
// DECODE: Coordinates → Pitch
// ============================================================================

function decodeFifths(fifths: number): { step: number; alt: number } {
    const step = FIFTHS_TO_STEPS[mod(fifths + 1, 7)];
    // floor, not truncation: negative fifths must round toward -Infinity
    const alt = Math.floor((fifths + 1) / 7);
    return { step, alt };
}

function invalidCoordinates(coord: never): never {
    throw new Error(`Invalid coordinates: ${JSON.stringify(coord)}`);
}

/**
 * Decodes coordinates back to step/alteration form.
 *
 * @example
 * pitchFromCoordinates({ kind: 'pitchClass', fifths: 7 }) // => { step: 0, alt: 1 } (C#)
 */
export function pitchFromCoordinates(coord: Coordinates): PitchInfo {
    switch (coord.kind) {
        case 'pitchClass':
            return decodeFifths(coord.fifths);
        case 'note': {
            const { step, alt } = decodeFifths(coord.fifths);
            return { step, alt, oct: coord.octaves + 4 * alt + STEPS_TO_OCTS[step] };
        }
        case 'interval': {
            const dir = coord.direction;
            const { step, alt } = decodeFifths(signed(dir, coord.fifths));
            const oct = signed(dir, coord.octaves) + 4 * alt + STEPS_TO_OCTS[step];
            return { step, alt, oct, dir };
        }
        default:
            return invalidCoordinates(coord);
    }
}

// ============================================================================
// Names & Measures
// ============================================================================

export function stepToLetter(step: number): string {
    return LETTERS.charAt(step);
}

export function altToAcc(alt: number): string {
    return alt < 0 ? 'b'.repeat(-alt) : '#'.repeat(alt);
}

export function accToAlt(acc: string): number {
    let alt = 0;
    for (const char of acc) {
        if (char === '#') alt++;
        else if (char === 'b') alt--;
    }
    return alt;
}

/**
 * Note-style name of a pitch ("C#4", "Bb"). Direction is ignored.
 */
export function pitchName(pitch: PitchInfo): string {
    const { step, alt, oct } = pitch;
    if (!Number.isInteger(step) || step < 0 || step > 6) return '';
    const pc = stepToLetter(step) + altToAcc(alt);
    return oct === undefined ? pc : pc + oct;
}

export function pitchChroma(pitch: PitchInfo): number {
    return mod(SIZES[pitch.step] + pitch.alt, 12);
}

/**
 * Semitones above C0 (signed for intervals). Pitch classes sit 100 octaves down.
 */
export function pitchHeight(pitch: PitchInfo): number {
    const { step, alt, oct, dir = 1 } = pitch;
    return signed(dir, SIZES[step] + alt + 12 * (oct === undefined ? -100 : oct));
}

export function pitchMidi(pitch: PitchInfo): number | null {
    const height = pitchHeight(pitch);
    return pitch.oct !== undefined && height >= -12 && height <= 115 ? height + 12 : null;
}

/**
 * Structural check for step/alteration objects.
 */
export function isPitch(value: unknown): value is PitchInfo {
    return value !== null
        && typeof value === 'object'
        && 'step' in value
        && typeof value.step === 'number'
        && 'alt' in value
        && typeof value.alt === 'number';
}
