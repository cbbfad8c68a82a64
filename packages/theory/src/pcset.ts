import { roundMidi } from './midi';
import { mod } from './pitch';

/**
 * Pitch-class sets.
 * A pcset is the ascending list of distinct chromas (0-11) present in a
 * collection of MIDI notes, or the positions of '1' in a chroma string
 * such as "101011010101".
 */

export type PcsetSource = readonly number[] | string;

// ============================================================================
// Construction
// ============================================================================

/**
 * Chroma (0-11) of a MIDI number.
 */
export function chroma(midi: number): number {
    return mod(midi, 12);
}

function pcsetFromChroma(chromaString: string): number[] {
    const pcset: number[] = [];
    const length = Math.min(chromaString.length, 12);
    for (let i = 0; i < length; i++) {
        if (chromaString.charAt(i) === '1') pcset.push(i);
    }
    return pcset;
}

function pcsetFromMidi(notes: readonly number[]): number[] {
    const unique = new Set(notes.map(chroma));
    return [...unique].sort((a, b) => a - b);
}

/**
 * Build a pcset from MIDI numbers or a chroma string.
 *
 * @example
 * pcset([62, 63, 60, 65, 70, 72]) // => [0, 2, 3, 5, 10]
 * pcset('100100100101') // => [0, 3, 6, 9, 11]
 */
export function pcset(notes: PcsetSource): number[] {
    return typeof notes === 'string' ? pcsetFromChroma(notes) : pcsetFromMidi(notes);
}

// ============================================================================
// Lookups (factories capture a frozen copy of the set)
// ============================================================================

/**
 * Returns a function that snaps a MIDI number to the nearest note of the set.
 * Ties go upward. Fractional input is rounded first; non-finite input and an
 * empty set never find anything.
 *
 * @example
 * const nearest = pcsetNearest([0, 5, 7]);
 * [0, 1, 2, 3, 4].map(nearest); // => [0, 0, 0, 5, 5]
 */
export function pcsetNearest(notes: PcsetSource): (midi: number) => number | undefined {
    const set: ReadonlySet<number> = new Set(pcset(notes));

    return (midi: number) => {
        if (set.size === 0 || !Number.isFinite(midi)) return undefined;
        const rounded = roundMidi(midi);
        const ch = chroma(rounded);
        for (let i = 0; i < 12; i++) {
            if (set.has(mod(ch + i, 12))) return rounded + i;
            if (set.has(mod(ch - i, 12))) return rounded - i;
        }
        return undefined;
    };
}

/**
 * Returns a function that maps a step index to a MIDI number, walking the set
 * from `tonic`. Step 0 is the tonic; negative steps go down. Non-integer
 * steps have no note.
 *
 * @example
 * const major = pcsetSteps('101011010101', 60);
 * [0, 1, 2, -1].map(major); // => [60, 62, 64, 59]
 */
export function pcsetSteps(notes: PcsetSource, tonic: number): (step: number) => number | undefined {
    const set: readonly number[] = Object.freeze(pcset(notes));
    const len = set.length;

    return (step: number) => {
        if (len === 0 || !Number.isInteger(step)) return undefined;
        const index = mod(step, len);
        // floor: step -1 belongs to the octave below
        const octaves = Math.floor(step / len);
        return set[index] + octaves * 12 + tonic;
    };
}

/**
 * Same as `pcsetSteps` but 1-indexed like scale degrees: degree 1 is the
 * tonic, degree 0 does not exist and degree -1 is one step below the tonic.
 *
 * @example
 * const major = pcsetDegrees('101011010101', 60);
 * [1, 2, 0, -1].map(major); // => [60, 62, undefined, 59]
 */
export function pcsetDegrees(notes: PcsetSource, tonic: number): (degree: number) => number | undefined {
    const steps = pcsetSteps(notes, tonic);

    return (degree: number) => {
        if (degree === 0 || !Number.isInteger(degree)) return undefined;
        return steps(degree > 0 ? degree - 1 : degree);
    };
}
