// Manual verification script: prints a handful of resolutions side by side
// with the expected values. Exit code is 1 when any check fails.

import { Interval, Midi, Note, Pcset } from './index';

let failures = 0;

function check(title: string, expected: unknown, got: unknown): void {
    const pass = JSON.stringify(expected) === JSON.stringify(got);
    if (!pass) failures++;
    console.log(title);
    console.log(`  Expected: ${JSON.stringify(expected)}`);
    console.log(`  Got:      ${JSON.stringify(got)}`);
    console.log(`  ${pass ? '✓ PASS' : '✗ FAIL'}\n`);
}

console.log('🧪 Line-of-fifths: Manual Verification\n');

check('TEST 1: Note properties (Db4)', [61, 1, 'Db'], [
    Note.midi('Db4'),
    Note.chroma('Db4'),
    Note.pitchClass('Db4'),
]);

check('TEST 2: Transpose C major triad up a fourth', ['F4', 'A4', 'C5'],
    ['C4', 'E4', 'G4'].map(Note.transposeBy('4P')));

check('TEST 3: Distance between enharmonic spellings (Fb4 → E4)', '-2d', Note.distance('Fb4', 'E4'));

check('TEST 4: Interval arithmetic (3m + 5P, 3M - 5P)', ['7m', '-3m'], [
    Interval.add('3m', '5P'),
    Interval.subtract('3M', '5P'),
]);

check('TEST 5: Inversions', ['7m', '6M', '5d'], ['2M', '3m', '4A'].map(Interval.invert));

check('TEST 6: MIDI spelling', ['Db4', 'C#4', 'Db'], [
    Midi.midiToNoteName(61),
    Midi.midiToNoteName(61, { sharps: true }),
    Midi.midiToNoteName(61, { pitchClass: true }),
]);

check('TEST 7: Major scale degrees from C4', [60, 62, 64, 65, 67, 69, 71, 72],
    [1, 2, 3, 4, 5, 6, 7, 8].map(Pcset.pcsetDegrees('101011010101', 60)));

if (failures === 0) {
    console.log('✅ All checks passed!');
} else {
    console.log(`❌ ${failures} check(s) failed`);
    process.exitCode = 1;
}
