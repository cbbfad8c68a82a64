// =============================================================================
// fifthline - MIDI Utilities
// =============================================================================

import { A4_MIDI, A4_TUNING, FLATS, MIDI_MAX, MIDI_MIN, SHARPS } from './constants'
import { accToAlt, mod } from './pitch'
import { tokenizeNote } from './tokenize'

export interface MidiToNoteNameOptions {
  /** Spell black keys with sharps instead of flats */
  sharps?: boolean
  /** Leave the octave out */
  pitchClass?: boolean
}

// C D E F G A B
const LETTER_SEMITONES: Record<string, number> = { C: 0, D: 2, E: 4, F: 5, G: 7, A: 9, B: 11 }

/**
 * Round half away from zero (2.5 → 3, -2.5 → -3).
 */
export function roundMidi(value: number): number {
  const rounded = Math.sign(value) * Math.round(Math.abs(value))
  return rounded === 0 ? 0 : rounded
}

/**
 * Whether a value is an integer MIDI note number (0-127).
 */
export function isMidi(value: number): boolean {
  return Number.isInteger(value) && value >= MIDI_MIN && value <= MIDI_MAX
}

/**
 * Convert a number, numeric string or note name to a MIDI number.
 * Returns null when the result falls outside 0-127.
 *
 * @example
 * toMidi('C4') // => 60
 * toMidi('60') // => 60
 * toMidi(128) // => null
 */
export function toMidi(value: number | string): number | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null
    const midi = roundMidi(value)
    return isMidi(midi) ? midi : null
  }

  const text = value.trim()
  if (text === '') return null
  if (/^[-+]?\d+(\.\d+)?$/.test(text)) return toMidi(Number(text))

  const [letter, acc, oct, rest] = tokenizeNote(text)
  if (letter === '' || oct === '' || rest !== '') return null
  return toMidi(LETTER_SEMITONES[letter] + accToAlt(acc) + 12 * (parseInt(oct, 10) + 1))
}

/**
 * Convert a MIDI number (may be fractional) to frequency in Hz.
 */
export function midiToFreq(midi: number, tuning: number = A4_TUNING): number {
  return tuning * Math.pow(2, (midi - A4_MIDI) / 12)
}

const L2 = Math.log(2)
const L440 = Math.log(A4_TUNING)

/**
 * Convert a frequency in Hz to a MIDI number, rounded to two decimals.
 *
 * @example
 * freqToMidi(220) // => 57
 * freqToMidi(261.62) // => 60
 */
export function freqToMidi(freq: number): number {
  const value = (12 * (Math.log(freq) - L440)) / L2 + A4_MIDI
  return Math.round(value * 100) / 100
}

/**
 * Convert a MIDI number to a note name.
 * Fractional values are rounded; non-finite or out-of-range values give ''.
 *
 * @example
 * midiToNoteName(61) // => 'Db4'
 * midiToNoteName(61, { sharps: true }) // => 'C#4'
 * midiToNoteName(61, { pitchClass: true }) // => 'Db'
 */
export function midiToNoteName(midi: number, options: MidiToNoteNameOptions = {}): string {
  if (!Number.isFinite(midi)) return ''
  const rounded = roundMidi(midi)
  if (!isMidi(rounded)) return ''

  const names = options.sharps === true ? SHARPS : FLATS
  const pc = names[mod(rounded, 12)]
  if (options.pitchClass === true) return pc

  const octave = Math.floor(rounded / 12) - 1
  return `${pc}${octave}`
}
