/**
 * @fifthline/theory
 *
 * Note and interval names on the line of fifths.
 */

import * as IntervalCore from './interval';
import * as NoteCore from './note';
import { distance, transpose, transposeBy, transposeFrom } from './distance';

export * from './types';
export * from './constants';
export { NameCache } from './cache';
export { tokenizeNote, tokenizeInterval } from './tokenize';
export type { NoteTokens, IntervalTokens } from './tokenize';
export type { MidiToNoteNameOptions } from './midi';
export type { PcsetSource } from './pcset';
export type { NoteComparator } from './note';

export * as Pitch from './pitch';
export * as Midi from './midi';
export * as Pcset from './pcset';

export const Note = Object.freeze({ ...NoteCore, transpose, transposeBy, transposeFrom, distance });
export const Interval = Object.freeze({ ...IntervalCore, distance });

export { distance, transpose, transposeBy, transposeFrom };
