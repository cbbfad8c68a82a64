import { SEMITONE_NUMBERS, SEMITONE_QUALITIES, SIZES, TYPES } from './constants';
import { intervalCoordinates, mod, pitchFromCoordinates, signed } from './pitch';
import { tokenizeInterval } from './tokenize';
import type {
    Coordinates,
    Direction,
    IntervalCoordinates,
    IntervalInfo,
    IntervalType,
    NoteCoordinates,
    PitchInfo,
    Quality,
} from './types';

/**
 * Intervals: parsing, naming and arithmetic.
 *
 * Names come in two notations, both accepted everywhere:
 * - tonal: number then quality ("4P", "-2m", "9AA")
 * - shorthand: quality then number ("P4", "m-2")
 * Output is always tonal.
 */

const QUALITIES: ReadonlySet<string> = new Set<Quality>(['dddd', 'ddd', 'dd', 'd', 'm', 'M', 'P', 'A', 'AA', 'AAA', 'AAAA']);

const NO_INTERVAL: IntervalInfo = Object.freeze({
    empty: true,
    name: '',
    num: 0,
    q: '',
    type: '',
    step: 0,
    alt: 0,
    dir: 1,
    simple: 0,
    semitones: 0,
    chroma: 0,
    oct: 0,
});

function isQuality(value: string): value is Quality {
    return QUALITIES.has(value);
}

function typeOfStep(step: number): IntervalType {
    return TYPES.charAt(step) === 'M' ? 'majorable' : 'perfectable';
}

// ============================================================================
// Quality <-> Alteration
// ============================================================================

/**
 * Semitones a quality moves away from the major/perfect size.
 * Diminished goes one further on majorable numbers (d3 is a minor third minus one).
 */
function qualityToAlt(type: IntervalType, q: Quality): number {
    switch (q) {
        case 'M':
        case 'P':
            return 0;
        case 'm':
            return -1;
        case 'A':
        case 'AA':
        case 'AAA':
        case 'AAAA':
            return q.length;
        default:
            return type === 'perfectable' ? -q.length : -(q.length + 1);
    }
}

function altToQuality(type: IntervalType, alt: number): string {
    if (alt === 0) return type === 'majorable' ? 'M' : 'P';
    if (alt === -1 && type === 'majorable') return 'm';
    if (alt > 0) return 'A'.repeat(alt);
    return 'd'.repeat(type === 'perfectable' ? -alt : -alt - 1);
}

// ============================================================================
// PARSE: Name → IntervalInfo
// ============================================================================

/**
 * Parse an interval name in either notation.
 * Returns the empty interval for unknown names, the number 0, and qualities
 * that do not fit the number (P3, M4, m5).
 *
 * @example
 * parseInterval('P4') // => { name: '4P', num: 4, q: 'P', semitones: 5, ... }
 * parseInterval('P3') // => { empty: true, ... }
 */
export function parseInterval(intervalName: string): IntervalInfo {
    const [numStr, qStr] = tokenizeInterval(intervalName);
    if (numStr === '' || !isQuality(qStr)) return NO_INTERVAL;

    const num = Number(numStr);
    if (num === 0 || !Number.isSafeInteger(num)) return NO_INTERVAL;

    const q = qStr;
    const step = (Math.abs(num) - 1) % 7;
    const type = typeOfStep(step);
    if (type === 'majorable' && q === 'P') return NO_INTERVAL;
    if (type === 'perfectable' && (q === 'M' || q === 'm')) return NO_INTERVAL;

    const alt = qualityToAlt(type, q);
    const dir: Direction = num < 0 ? -1 : 1;
    const simple = Math.abs(num) === 8 ? num : signed(dir, step + 1);
    const oct = Math.floor((Math.abs(num) - 1) / 7);

    return Object.freeze({
        empty: false,
        name: `${num}${q}`,
        num,
        q,
        type,
        step,
        alt,
        dir,
        simple,
        semitones: signed(dir, SIZES[step] + alt + 12 * oct),
        chroma: mod(signed(dir, SIZES[step] + alt), 12),
        oct,
        coord: intervalCoordinates(step, alt, oct, dir),
    });
}

/**
 * Interval name of a pitch that carries a direction and octave.
 * Pitches without them have no interval name ('').
 *
 * @example
 * pitchToIntervalName({ step: 1, alt: -1, oct: 0, dir: -1 }) // => '-2m'
 */
export function pitchToIntervalName(pitch: PitchInfo): string {
    const { step, alt, oct, dir } = pitch;
    if (oct === undefined || dir === undefined) return '';

    const calcNum = step + 1 + 7 * oct;
    // descending pitch-class unison: there is no interval number 0
    const num = calcNum === 0 ? step + 1 : calcNum;
    const d = dir < 0 ? '-' : '';
    return d + num + altToQuality(typeOfStep(step), alt);
}

/**
 * Get interval properties from a name or a directed pitch.
 *
 * @example
 * get('P4').semitones // => 5
 * get({ step: 4, alt: 0, oct: 0, dir: 1 }).name // => '5P'
 */
export function get(src: string | PitchInfo): IntervalInfo {
    return parseInterval(typeof src === 'string' ? src : pitchToIntervalName(src));
}

/**
 * Interval spanning the given coordinates. The direction is recomputed from
 * the size (descending when below unison) unless `forceDescending` is set.
 */
export function fromCoordinates(coord: Coordinates, forceDescending: boolean = false): IntervalInfo {
    const fifths = coord.fifths;
    const octaves = coord.kind === 'pitchClass' ? 0 : coord.octaves;
    const descending = forceDescending || fifths * 7 + octaves * 12 < 0;

    return get(pitchFromCoordinates({
        kind: 'interval',
        fifths,
        octaves,
        direction: descending ? -1 : 1,
    }));
}

// ============================================================================
// Accessors
// ============================================================================

const NATURAL_NAMES: readonly string[] = ['1P', '2M', '3M', '4P', '5P', '6m', '7m'];

/**
 * One interval per diatonic number: 1P 2M 3M 4P 5P 6m 7m.
 */
export const names = (): string[] => [...NATURAL_NAMES];

/**
 * @example name('P4') // => '4P'
 */
export const name = (interval: string): string => get(interval).name;

export const num = (interval: string): number => get(interval).num;

export const quality = (interval: string): Quality | '' => get(interval).q;

export const semitones = (interval: string): number => get(interval).semitones;

// ============================================================================
// Transformations
// ============================================================================

/**
 * Reduce a compound interval to within an octave, keeping the sign.
 * Octaves stay octaves.
 *
 * @example
 * simplify('9M') // => '2M'
 * simplify('-8P') // => '-8P'
 */
export function simplify(intervalName: string): string {
    const i = get(intervalName);
    return i.empty ? '' : `${i.simple}${i.q}`;
}

/**
 * Invert an interval within its octave span.
 *
 * @example
 * invert('3m') // => '6M'
 * invert('9M') // => '14m'
 */
export function invert(intervalName: string): string {
    const i = get(intervalName);
    if (i.empty) return '';

    const step = (7 - i.step) % 7;
    const alt = i.type === 'perfectable' ? -i.alt : -(i.alt + 1);
    return get({ step, alt, oct: i.oct, dir: i.dir }).name;
}

/**
 * Canonical interval for a semitone count. Several names share a size; the
 * pick is fixed (6 → '5d', never '4A'). Non-integer counts give ''.
 *
 * @example
 * fromSemitones(7) // => '5P'
 * fromSemitones(-13) // => '-9m'
 */
export function fromSemitones(semitoneCount: number): string {
    if (!Number.isInteger(semitoneCount)) return '';
    const d = semitoneCount < 0 ? -1 : 1;
    const n = Math.abs(semitoneCount);
    const c = n % 12;
    const o = Math.floor(n / 12);
    return `${d * (SEMITONE_NUMBERS[c] + 7 * o)}${SEMITONE_QUALITIES[c]}`;
}

/**
 * Move an interval along the line of fifths, keeping its octaves.
 *
 * @example transposeFifths('4P', 1) // => '8P'
 */
export function transposeFifths(intervalName: string, fifths: number): string {
    const { coord } = get(intervalName);
    if (coord === undefined || !Number.isInteger(fifths)) return '';
    return fromCoordinates({ ...coord, fifths: coord.fifths + fifths }).name;
}

// ============================================================================
// Arithmetic
// ============================================================================

type CoordinateOperation = (a: IntervalCoordinates, b: IntervalCoordinates) => NoteCoordinates;

/**
 * Lift a coordinate operation to interval names. Undefined when either
 * operand does not parse.
 */
function combinator(fn: CoordinateOperation): (a: string, b: string) => string | undefined {
    return (a, b) => {
        const coordA = get(a).coord;
        const coordB = get(b).coord;
        if (coordA === undefined || coordB === undefined) return undefined;
        return fromCoordinates(fn(coordA, coordB)).name;
    };
}

/**
 * @example add('3m', '5P') // => '7m'
 */
export const add = combinator((a, b) => ({
    kind: 'note',
    fifths: a.fifths + b.fifths,
    octaves: a.octaves + b.octaves,
}));

/**
 * Fix the first operand of `add`.
 *
 * @example ['1P', '2M', '3M'].map(addTo('5P')) // => ['5P', '6M', '7M']
 */
export const addTo = (interval: string) => (other: string): string | undefined => add(interval, other);

/**
 * @example
 * subtract('5P', '3M') // => '3m'
 * subtract('3M', '5P') // => '-3m'
 */
export const subtract = combinator((a, b) => ({
    kind: 'note',
    fifths: a.fifths - b.fifths,
    octaves: a.octaves - b.octaves,
}));
