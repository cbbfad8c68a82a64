/**
 * Shared value types.
 * Coordinates are a tagged union: every variant carries `fifths`, notes add
 * `octaves`, intervals add `direction`.
 */

/**
 * 1 = ascending, -1 = descending.
 */
export type Direction = 1 | -1;

export interface PitchClassCoordinates {
    readonly kind: 'pitchClass';
    readonly fifths: number;
}

export interface NoteCoordinates {
    readonly kind: 'note';
    readonly fifths: number;
    readonly octaves: number;
}

/**
 * Interval coordinates are signed: a descending interval stores the
 * negated fifths and octaves of its ascending counterpart.
 */
export interface IntervalCoordinates {
    readonly kind: 'interval';
    readonly fifths: number;
    readonly octaves: number;
    readonly direction: Direction;
}

export type Coordinates = PitchClassCoordinates | NoteCoordinates | IntervalCoordinates;

/**
 * Step/alteration decomposition.
 * - pitch class: no `oct`, no `dir`
 * - note: `oct` only
 * - interval: `oct` and `dir`
 */
export interface PitchInfo {
    /** 0..6, indexes C D E F G A B */
    readonly step: number;
    /** Sharps (+) or flats (-) */
    readonly alt: number;
    readonly oct?: number;
    readonly dir?: Direction;
}

export type Quality = 'dddd' | 'ddd' | 'dd' | 'd' | 'm' | 'M' | 'P' | 'A' | 'AA' | 'AAA' | 'AAAA';

export type IntervalType = 'perfectable' | 'majorable';

export interface NoteInfo {
    readonly empty: boolean;
    readonly name: string;
    /** Pitch class: letter plus accidentals */
    readonly pc: string;
    readonly letter: string;
    readonly step: number;
    readonly acc: string;
    readonly alt: number;
    readonly oct?: number;
    /** 0..11 */
    readonly chroma: number;
    /** Semitone ordering key, defined with or without octave */
    readonly height: number;
    readonly midi: number | null;
    readonly freq: number | null;
    readonly coord?: PitchClassCoordinates | NoteCoordinates;
}

export interface IntervalInfo {
    readonly empty: boolean;
    readonly name: string;
    readonly num: number;
    readonly q: Quality | '';
    readonly type: IntervalType | '';
    readonly step: number;
    readonly alt: number;
    readonly dir: Direction;
    /** Octave-reduced number; 8 and -8 stay as they are */
    readonly simple: number;
    readonly semitones: number;
    /** 0..11 */
    readonly chroma: number;
    /** Extra octaves beyond the first */
    readonly oct: number;
    readonly coord?: IntervalCoordinates;
}
