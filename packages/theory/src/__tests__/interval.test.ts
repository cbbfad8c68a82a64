import * as Interval from '../interval';

const split = (names: string): string[] => names.split(' ');

describe('Interval', () => {
    describe('get()', () => {
        test('Interval properties', () => {
            expect(Interval.get('P4')).toEqual({
                empty: false,
                name: '4P',
                num: 4,
                q: 'P',
                type: 'perfectable',
                step: 3,
                alt: 0,
                dir: 1,
                simple: 4,
                semitones: 5,
                chroma: 5,
                oct: 0,
                coord: { kind: 'interval', fifths: -1, octaves: 1, direction: 1 },
            });
        });

        test('Descending compound interval', () => {
            const i = Interval.get('-9m');
            expect(i.name).toBe('-9m');
            expect(i.dir).toBe(-1);
            expect(i.type).toBe('majorable');
            expect(i.alt).toBe(-1);
            expect(i.oct).toBe(1);
            expect(i.simple).toBe(-2);
            expect(i.semitones).toBe(-13);
            expect(i.chroma).toBe(11);
        });

        test('Shorthand notation', () => {
            expect(Interval.name('d5')).toBe('5d');
            expect(Interval.num('d5')).toBe(5);
            expect(Interval.quality('d5')).toBe('d');
            expect(Interval.semitones('d5')).toBe(6);
            expect(Interval.name('m-2')).toBe('-2m');
            expect(Interval.name('+4P')).toBe('4P');
        });

        test('Diminished digs one semitone further on majorable numbers', () => {
            expect(Interval.semitones('3d')).toBe(2);
            expect(Interval.semitones('3dd')).toBe(1);
            expect(Interval.semitones('4d')).toBe(4);
            expect(Interval.semitones('4dd')).toBe(3);
            expect(Interval.semitones('6AA')).toBe(11);
        });

        test('Octaves stay octaves', () => {
            expect(Interval.get('8P').simple).toBe(8);
            expect(Interval.get('-8P').simple).toBe(-8);
            expect(Interval.get('15P').simple).toBe(1);
        });

        test('[EDGE] Invalid combinations', () => {
            for (const name of ['P3', '3P', 'M4', '1M', 'm5', '2P']) {
                expect(Interval.get(name).empty).toBe(true);
            }
        });

        test('[EDGE] Unparseable names', () => {
            for (const name of ['', '0P', '-0P', 'C4', 'P', '4', 'AAA4', '4X']) {
                const i = Interval.get(name);
                expect(i.empty).toBe(true);
                expect(i.name).toBe('');
                expect(i.coord).toBeUndefined();
            }
        });

        test('Accepts a directed pitch', () => {
            expect(Interval.get({ step: 4, alt: 0, oct: 0, dir: 1 }).name).toBe('5P');
            expect(Interval.get({ step: 1, alt: -1, oct: 1, dir: -1 }).name).toBe('-9m');
            expect(Interval.get({ step: 1, alt: 0, oct: 0 }).empty).toBe(true);
        });

        test('Name round trip', () => {
            for (const name of split('1P 4P -5d 13M -9m 8A 12dd 2AAA')) {
                expect(Interval.name(Interval.get(name).name)).toBe(name);
            }
        });
    });

    describe('pitchToIntervalName()', () => {
        test('[EDGE] Descending pitch-class unison never numbers 0', () => {
            expect(Interval.pitchToIntervalName({ step: 6, alt: 1, oct: -1, dir: -1 })).toBe('-7A');
        });
    });

    describe('names()', () => {
        test('Natural interval list', () => {
            expect(Interval.names()).toEqual(split('1P 2M 3M 4P 5P 6m 7m'));
        });
    });

    describe('simplify()', () => {
        test('Simple intervals are unchanged', () => {
            expect(split('1P 2M 3M 4P 5P 6M 7M').map(Interval.simplify)).toEqual(split('1P 2M 3M 4P 5P 6M 7M'));
            expect(split('-1P -2M -3M -4P -5P -6M -7M').map(Interval.simplify)).toEqual(split('-1P -2M -3M -4P -5P -6M -7M'));
        });

        test('Compound intervals are reduced', () => {
            expect(split('8P 9M 10M 11P 12P 13M 14M').map(Interval.simplify)).toEqual(split('8P 2M 3M 4P 5P 6M 7M'));
            expect(split('-8P -9M -10M -11P -12P -13M -14M').map(Interval.simplify)).toEqual(split('-8P -2M -3M -4P -5P -6M -7M'));
            expect(split('1d 1P 1A 8d 8P 8A 15d 15P 15A').map(Interval.simplify)).toEqual(split('1d 1P 1A 8d 8P 8A 1d 1P 1A'));
        });

        test('Idempotent', () => {
            for (const name of split('9M -13m 15P 8d 22A -2M')) {
                const once = Interval.simplify(name);
                expect(Interval.simplify(once)).toBe(once);
            }
        });

        test('[EDGE] Invalid interval', () => {
            expect(Interval.simplify('P3')).toBe('');
        });
    });

    describe('invert()', () => {
        test('Inverts qualities and numbers', () => {
            expect(split('1P 2M 3M 4P 5P 6M 7M').map(Interval.invert)).toEqual(split('1P 7m 6m 5P 4P 3m 2m'));
            expect(split('1d 2m 3m 4d 5d 6m 7m').map(Interval.invert)).toEqual(split('1A 7M 6M 5A 4A 3M 2M'));
            expect(split('1A 2A 3A 4A 5A 6A 7A').map(Interval.invert)).toEqual(split('1d 7d 6d 5d 4d 3d 2d'));
            expect(split('-1P -2M -3M -4P -5P -6M -7M').map(Interval.invert)).toEqual(split('-1P -7m -6m -5P -4P -3m -2m'));
            expect(split('8P 9M 10M 11P 12P 13M 14M').map(Interval.invert)).toEqual(split('8P 14m 13m 12P 11P 10m 9m'));
        });

        test('Inverting twice gives the same interval', () => {
            for (const name of split('1P 2M 3M 4P 5P 6M 7M 2m 5d 4A -3m')) {
                expect(Interval.invert(Interval.invert(name))).toBe(name);
            }
        });

        test('[EDGE] Invalid interval', () => {
            expect(Interval.invert('blah')).toBe('');
        });
    });

    describe('fromSemitones()', () => {
        test('Ascending', () => {
            expect([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11].map(Interval.fromSemitones))
                .toEqual(split('1P 2m 2M 3m 3M 4P 5d 5P 6m 6M 7m 7M'));
            expect([12, 13, 14, 15, 16, 17, 18, 19, 20, 21, 22, 23].map(Interval.fromSemitones))
                .toEqual(split('8P 9m 9M 10m 10M 11P 12d 12P 13m 13M 14m 14M'));
        });

        test('Descending', () => {
            expect([-0, -1, -2, -3, -4, -5, -6, -7, -8, -9, -10, -11].map(Interval.fromSemitones))
                .toEqual(split('1P -2m -2M -3m -3M -4P -5d -5P -6m -6M -7m -7M'));
            expect([-12, -13, -14, -15, -16, -17, -18, -19, -20, -21, -22, -23].map(Interval.fromSemitones))
                .toEqual(split('-8P -9m -9M -10m -10M -11P -12d -12P -13m -13M -14m -14M'));
        });

        test('Fifths', () => {
            expect(Interval.fromSemitones(7)).toBe('5P');
            expect(Interval.fromSemitones(-7)).toBe('-5P');
        });

        test('[EDGE] Non-integer counts have no interval', () => {
            expect([NaN, Infinity, -Infinity, 2.5].map(Interval.fromSemitones)).toEqual(['', '', '', '']);
        });
    });

    describe('add()', () => {
        test('Adds intervals', () => {
            expect(Interval.add('3m', '5P')).toBe('7m');
            expect(Interval.names().map((n) => Interval.add('5P', n))).toEqual(split('5P 6M 7M 8P 9M 10m 11P'));
            expect(Interval.names().map(Interval.addTo('5P'))).toEqual(split('5P 6M 7M 8P 9M 10m 11P'));
        });

        test('Commutes', () => {
            const names = split('1P 2m 3M 4A 5P 6m 7M 9M -3m -8P');
            for (const a of names) {
                for (const b of names) {
                    expect(Interval.add(a, b)).toBe(Interval.add(b, a));
                }
            }
        });

        test('Direction comes from the result', () => {
            expect(Interval.add('-5P', '3M')).toBe('-3m');
            expect(Interval.add('-3M', '5P')).toBe('3m');
        });

        test('[EDGE] Invalid operand gives no result', () => {
            expect(Interval.add('3m', 'blah')).toBeUndefined();
            expect(Interval.add('P3', '5P')).toBeUndefined();
        });
    });

    describe('subtract()', () => {
        test('Subtracts intervals', () => {
            expect(Interval.subtract('5P', '3M')).toBe('3m');
            expect(Interval.subtract('3M', '5P')).toBe('-3m');
            expect(Interval.names().map((n) => Interval.subtract('5P', n))).toEqual(split('5P 4P 3m 2M 1P -2m -3m'));
        });

        test('Subtracting an interval from itself gives a unison', () => {
            for (const name of split('2m 3M 5P 9M -6m 4A')) {
                expect(Interval.subtract(name, name)).toBe('1P');
            }
        });

        test('[EDGE] Invalid operand gives no result', () => {
            expect(Interval.subtract('', '3M')).toBeUndefined();
        });
    });

    describe('transposeFifths()', () => {
        test('Moves along the line of fifths', () => {
            expect(Interval.transposeFifths('4P', 1)).toBe('8P');
            expect([0, 1, 2, 3, 4].map((fifths) => Interval.transposeFifths('1P', fifths)).join(' '))
                .toBe('1P 5P 9M 13M 17M');
        });

        test('Direction flips when crossing the unison', () => {
            expect([0, -1, -2, -3, -4].map((fifths) => Interval.transposeFifths('1P', fifths)).join(' '))
                .toBe('1P -5P -9M -13M -17M');
        });

        test('[EDGE] Invalid interval', () => {
            expect(Interval.transposeFifths('X', 1)).toBe('');
        });

        test('[EDGE] Non-integer fifths', () => {
            expect(Interval.transposeFifths('4P', 0.5)).toBe('');
            expect(Interval.transposeFifths('4P', NaN)).toBe('');
        });
    });
});
