import { LETTERS, PITCH_CLASS_HEIGHT_BASE, SIZES } from './constants';
import { NameCache } from './cache';
import { freqToMidi, midiToFreq, midiToNoteName } from './midi';
import {
    accToAlt,
    mod,
    noteCoordinates,
    pitchClassCoordinates,
    pitchFromCoordinates,
    pitchName,
} from './pitch';
import { tokenizeNote } from './tokenize';
import type { NoteCoordinates, NoteInfo, PitchClassCoordinates, PitchInfo } from './types';

/**
 * Note names: parsing, spelling and ordering.
 * Transposition and distance live in `distance.ts` since they need intervals.
 */

const NO_NOTE: NoteInfo = Object.freeze({
    empty: true,
    name: '',
    pc: '',
    letter: '',
    step: 0,
    acc: '',
    alt: 0,
    chroma: 0,
    height: 0,
    midi: null,
    freq: null,
});

// ============================================================================
// PARSE: Name → NoteInfo
// ============================================================================

/**
 * Parse a note name without touching any cache.
 * Returns the empty note for unknown letters or trailing text.
 *
 * @example
 * parseNote('C#4') // => { name: 'C#4', pc: 'C#', alt: 1, oct: 4, midi: 61, ... }
 * parseNote('C4 major') // => { empty: true, ... }
 */
export function parseNote(noteName: string): NoteInfo {
    const [letter, acc, octStr, rest] = tokenizeNote(noteName);
    if (letter === '' || rest !== '') return NO_NOTE;

    const oct = octStr === '' ? undefined : Number(octStr);
    // a lone "-" is no octave
    if (oct !== undefined && !Number.isSafeInteger(oct)) return NO_NOTE;

    const step = LETTERS.indexOf(letter);
    const alt = accToAlt(acc);
    const semitones = SIZES[step] + alt;
    const height = oct === undefined
        ? mod(semitones, 12) + PITCH_CLASS_HEIGHT_BASE
        : semitones + 12 * (oct + 1);
    const midi = oct !== undefined && height >= 0 && height <= 127 ? height : null;

    return Object.freeze({
        empty: false,
        name: letter + acc + octStr,
        pc: letter + acc,
        letter,
        step,
        acc,
        alt,
        oct,
        chroma: mod(semitones, 12),
        height,
        midi,
        freq: oct === undefined ? null : midiToFreq(height),
        coord: oct === undefined ? pitchClassCoordinates(step, alt) : noteCoordinates(step, alt, oct),
    });
}

// ============================================================================
// CACHE: Memoized lookups
// ============================================================================

/**
 * Create an independent note cache. `get` uses a shared module-level one.
 */
export function createNoteCache(): NameCache<NoteInfo> {
    return new NameCache(parseNote);
}

const NOTE_CACHE = createNoteCache();

/**
 * Get note properties. Names are memoized by their exact spelling.
 * A `PitchInfo` is named first and then looked up.
 *
 * @example
 * get('C4').midi // => 60
 * get({ step: 1, alt: -1, oct: 3 }).name // => 'Db3'
 */
export function get(src: string | PitchInfo): NoteInfo {
    return NOTE_CACHE.get(typeof src === 'string' ? src : pitchName(src));
}

/**
 * Note at the given pitch-class or note coordinates.
 */
export function fromCoordinates(coord: PitchClassCoordinates | NoteCoordinates): NoteInfo {
    return get(pitchFromCoordinates(coord));
}

// ============================================================================
// Accessors
// ============================================================================

/**
 * @example name('fx4') // => 'F##4'
 */
export const name = (note: string): string => get(note).name;

/**
 * @example pitchClass('Ab5') // => 'Ab'
 */
export const pitchClass = (note: string): string => get(note).pc;

export const accidentals = (note: string): string => get(note).acc;

export const octave = (note: string): number | null => get(note).oct ?? null;

export const midi = (note: string): number | null => get(note).midi;

export const freq = (note: string): number | null => get(note).freq;

export function chroma(note: string): number | null {
    const info = get(note);
    return info.empty ? null : info.chroma;
}

// ============================================================================
// Spelling
// ============================================================================

/**
 * @example fromMidi(61) // => 'Db4'
 */
export const fromMidi = (midiNumber: number): string => midiToNoteName(midiNumber);

/**
 * @example fromMidiSharps(61) // => 'C#4'
 */
export const fromMidiSharps = (midiNumber: number): string => midiToNoteName(midiNumber, { sharps: true });

/**
 * Nearest note to a frequency in Hz.
 * @example fromFreq(440) // => 'A4'
 */
export const fromFreq = (hz: number): string => midiToNoteName(freqToMidi(hz));

export const fromFreqSharps = (hz: number): string => midiToNoteName(freqToMidi(hz), { sharps: true });

/**
 * Respell with as few accidentals as possible. Sharps stay sharps and
 * flats stay flats.
 *
 * @example
 * simplify('C###') // => 'D#'
 * simplify('B#4') // => 'C5'
 */
export function simplify(noteName: string): string {
    const note = get(noteName);
    if (note.empty) return '';
    return midiToNoteName(note.midi ?? note.chroma, {
        sharps: note.alt > 0,
        pitchClass: note.midi === null,
    });
}

/**
 * Enharmonic respelling. Without `destName`, sharps become flats and flats
 * become sharps. The octave follows the sounding pitch (B#3 → C4).
 * Returns '' when the destination does not sound the same.
 *
 * @example
 * enharmonic('C#') // => 'Db'
 * enharmonic('F2', 'E#') // => 'E#2'
 */
export function enharmonic(noteName: string, destName?: string): string {
    const src = get(noteName);
    if (src.empty) return '';

    const dest = get(destName ?? midiToNoteName(src.midi ?? src.chroma, {
        sharps: src.alt < 0,
        pitchClass: true,
    }));
    if (dest.empty || dest.chroma !== src.chroma) return '';
    if (src.oct === undefined) return dest.pc;

    // chroma of the letters before alteration; outside 0-11 means the spelling crossed C
    const srcChroma = src.chroma - src.alt;
    const destChroma = dest.chroma - dest.alt;
    const destOctOffset = srcChroma > 11 || destChroma < 0
        ? -1
        : srcChroma < 0 || destChroma > 11 ? 1 : 0;

    return dest.pc + (src.oct + destOctOffset);
}

/**
 * Move a note along the line of fifths, keeping its octave coordinate.
 *
 * @example transposeFifths('G', 3) // => 'E'
 */
export function transposeFifths(noteName: string, fifths: number): string {
    const { coord } = get(noteName);
    if (coord === undefined || !Number.isInteger(fifths)) return '';
    return fromCoordinates({ ...coord, fifths: coord.fifths + fifths }).name;
}

// ============================================================================
// Lists
// ============================================================================

const NATURALS: readonly string[] = LETTERS.split('');

/**
 * Valid note names among `items`, normalized. Defaults to the naturals.
 *
 * @example names(['fx', 'bb', 12]) // => ['F##', 'Bb']
 */
export function names(items?: readonly unknown[]): string[] {
    if (items === undefined) return [...NATURALS];
    return items
        .filter((item): item is string => typeof item === 'string')
        .map((item) => get(item))
        .filter((note) => !note.empty)
        .map((note) => note.name);
}

export type NoteComparator = (a: NoteInfo, b: NoteInfo) => number;

export const ascending: NoteComparator = (a, b) => a.height - b.height;
export const descending: NoteComparator = (a, b) => b.height - a.height;

/**
 * Sort note names, dropping the invalid ones.
 *
 * @example sortedNames(['c2', 'c5', 'c1', 'nope']) // => ['C1', 'C2', 'C5']
 */
export function sortedNames(notes: readonly string[], comparator: NoteComparator = ascending): string[] {
    return notes
        .map((note) => get(note))
        .filter((note) => !note.empty)
        .sort(comparator)
        .map((note) => note.name);
}

/**
 * Ascending and without repeated names.
 */
export function sortedUniqNames(notes: readonly string[]): string[] {
    return sortedNames(notes, ascending).filter((note, i, all) => i === 0 || note !== all[i - 1]);
}
