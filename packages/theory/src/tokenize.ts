/**
 * Lexers for note and interval names.
 * They only split a string into tokens; validation happens in the resolvers.
 */

export type NoteTokens = [letter: string, acc: string, oct: string, rest: string];
export type IntervalTokens = [num: string, quality: string];

// letter, accidentals (x = double sharp), octave, trailing text
const NOTE_REGEX = /^([a-gA-G]?)(x+|[#b]*)(-?\d*)\s*(.*)$/;

// tonal notation: number before quality ("4P", "-2m")
const INTERVAL_TONAL_REGEX = '([-+]?\\d+)(d{1,4}|m|M|P|A{1,4})';
// shorthand notation: quality before number ("P4", "m-2")
const INTERVAL_SHORTHAND_REGEX = '(AA|A|P|M|m|d|dd)([-+]?\\d+)';
const INTERVAL_REGEX = new RegExp(`^(?:${INTERVAL_TONAL_REGEX}|${INTERVAL_SHORTHAND_REGEX})$`);

const NO_NOTE_TOKENS: NoteTokens = ['', '', '', ''];
const NO_INTERVAL_TOKENS: IntervalTokens = ['', ''];

/**
 * Split a note name into letter, accidentals, octave and trailing text.
 * The letter is upper-cased and every "x" becomes "##".
 *
 * @example
 * tokenizeNote('fx4') // => ['F', '##', '4', '']
 * tokenizeNote('C4 major') // => ['C', '', '4', 'major']
 */
export function tokenizeNote(text: string): NoteTokens {
    if (typeof text !== 'string') return NO_NOTE_TOKENS;
    const match = NOTE_REGEX.exec(text);
    if (!match) return NO_NOTE_TOKENS;
    return [match[1].toUpperCase(), match[2].replace(/x/g, '##'), match[3], match[4]];
}

/**
 * Split an interval name into number and quality, whatever the notation.
 *
 * @example
 * tokenizeInterval('P4') // => ['4', 'P']
 * tokenizeInterval('-2m') // => ['-2', 'm']
 */
export function tokenizeInterval(text: string): IntervalTokens {
    if (typeof text !== 'string') return NO_INTERVAL_TOKENS;
    const match = INTERVAL_REGEX.exec(text);
    if (!match) return NO_INTERVAL_TOKENS;
    return match[1] !== undefined ? [match[1], match[2]] : [match[4], match[3]];
}
