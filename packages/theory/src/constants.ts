import type { Quality } from './types';

/**
 * Line-of-fifths constants.
 * Every note and interval is encoded as a position on the line of fifths
 * (F=-1, C=0, G=1, D=2 ...) plus an octave count.
 */

// ============================================================================
// SECTION 1: Directions
// ============================================================================
export const DIRECTION = {
    ASCENDING: 1,
    DESCENDING: -1,
} as const;

// ============================================================================
// SECTION 2: Letter Tables (indexed by step, C=0 ... B=6)
// ============================================================================
export const LETTERS = 'CDEFGAB';

// Fifths of C D E F G A B
export const FIFTHS: readonly number[] = [0, 2, 4, -1, 1, 3, 5];

// Octaves spanned by each step when reached by fifths
export const STEPS_TO_OCTS: readonly number[] = FIFTHS.map((fifths) => Math.floor((fifths * 7) / 12));

// Inverse of FIFTHS after shifting by +1: F C G D A E B
export const FIFTHS_TO_STEPS: readonly number[] = [3, 0, 4, 1, 5, 2, 6];

// Semitones of each unaltered step above C
export const SIZES: readonly number[] = [0, 2, 4, 5, 7, 9, 11];

// Interval type per step: P = perfectable, M = majorable
export const TYPES = 'PMMPPMM';

// ============================================================================
// SECTION 3: Semitone Spellings (indexed by chroma)
// ============================================================================
export const SHARPS: readonly string[] = ['C', 'C#', 'D', 'D#', 'E', 'F', 'F#', 'G', 'G#', 'A', 'A#', 'B'];
export const FLATS: readonly string[] = ['C', 'Db', 'D', 'Eb', 'E', 'F', 'Gb', 'G', 'Ab', 'A', 'Bb', 'B'];

// Interval number and quality picked for each semitone count
export const SEMITONE_NUMBERS: readonly number[] = [1, 2, 2, 3, 3, 4, 5, 5, 6, 6, 7, 7];
export const SEMITONE_QUALITIES: readonly Quality[] = ['P', 'm', 'M', 'm', 'M', 'P', 'd', 'P', 'm', 'M', 'm', 'M'];

// ============================================================================
// SECTION 4: Tuning & Ranges
// ============================================================================
export const A4_TUNING = 440;
export const A4_MIDI = 69;
export const MIDI_MIN = 0;
export const MIDI_MAX = 127;

// Octave base for notes without octave: sorts every pitch class below any real note
export const PITCH_CLASS_HEIGHT_BASE = -12 * 99;
