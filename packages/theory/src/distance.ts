import * as Interval from './interval';
import * as Note from './note';
import type { IntervalCoordinates, NoteCoordinates, NoteInfo, PitchClassCoordinates } from './types';

/**
 * Operations between notes and intervals: transposition and distance.
 * Both are coordinate arithmetic: note + interval = note, note - note = interval.
 */

type NoteLike = string | NoteInfo;

const toNote = (note: NoteLike): NoteInfo => (typeof note === 'string' ? Note.get(note) : note);

/**
 * Transpose a note by an interval name or interval coordinates.
 * Pitch classes stay pitch classes.
 *
 * @example
 * transpose('D', '3M') // => 'F#'
 * transpose('C4', '-2m') // => 'B3'
 */
export function transpose(noteName: string, interval: string | IntervalCoordinates): string {
    const note = Note.get(noteName);
    const ivl = typeof interval === 'string' ? Interval.get(interval).coord : interval;
    if (note.coord === undefined || ivl === undefined) return '';

    const coord: PitchClassCoordinates | NoteCoordinates = note.coord.kind === 'pitchClass'
        ? { kind: 'pitchClass', fifths: note.coord.fifths + ivl.fifths }
        : { kind: 'note', fifths: note.coord.fifths + ivl.fifths, octaves: note.coord.octaves + ivl.octaves };
    return Note.fromCoordinates(coord).name;
}

/**
 * @example ['C', 'D'].map(transposeBy('5P')) // => ['G', 'A']
 */
export const transposeBy = (interval: string) => (noteName: string): string => transpose(noteName, interval);

/**
 * @example ['1P', '5P'].map(transposeFrom('C')) // => ['C', 'G']
 */
export const transposeFrom = (noteName: string) => (interval: string): string => transpose(noteName, interval);

/**
 * Interval between two notes. Pitch classes give the ascending interval
 * within an octave. Same-pitch spellings whose letter goes down (Fb4 → E4)
 * are reported descending.
 *
 * @example
 * distance('C4', 'G4') // => '5P'
 * distance('G', 'C') // => '4P'
 */
export function distance(fromNote: NoteLike, toNoteName: NoteLike): string {
    const from = toNote(fromNote);
    const to = toNote(toNoteName);
    if (from.coord === undefined || to.coord === undefined) return '';

    const fifths = to.coord.fifths - from.coord.fifths;
    const octaves = from.coord.kind === 'note' && to.coord.kind === 'note'
        ? to.coord.octaves - from.coord.octaves
        : 0 - Math.floor((fifths * 7) / 12);

    const forceDescending = to.height === from.height
        && to.midi !== null
        && from.oct === to.oct
        && from.step > to.step;

    return Interval.fromCoordinates({ kind: 'note', fifths, octaves }, forceDescending).name;
}
