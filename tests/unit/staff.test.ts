import { describe, expect, it } from 'vitest';

import { NoClefError } from '../../src/core/errors.js';
import { Point } from '../../src/core/point.js';
import { PositionedObject } from '../../src/core/positioned-object.js';
import { BaseUnit } from '../../src/core/units.js';
import { BarLine, isBarLine } from '../../src/western/bar-line.js';
import { Clef } from '../../src/western/clef.js';
import {
  KeySignature,
  keySignatureClefOffset,
  keySignatureStaffPositions,
  keySignatureType
} from '../../src/western/key-signature.js';
import { isStaff, Staff } from '../../src/western/staff.js';
import { COMMON_TIME, CUT_TIME, numericMeter, parseMeter, TimeSignature } from '../../src/western/time-signature.js';

const at = (value: number) => BaseUnit.of(value);

function makeStaff(length = 200, y = 0, parent?: PositionedObject): Staff {
  return new Staff(Point.of(0, y), parent, at(length), { lineSpacing: at(10) });
}

describe('staff geometry', () => {
  it('measures in staff spaces', () => {
    const staff = makeStaff();
    expect(staff.unit(1).baseValue).toBe(10);
    expect(staff.height.baseValue).toBe(40);
    expect(staff.centerY.baseValue).toBe(20);
    expect(staff.barlineExtent.map((y) => y.baseValue)).toEqual([0, 40]);
  });

  it('requires a positive whole number of lines', () => {
    expect(() => new Staff(Point.of(0, 0), undefined, at(100), { lineCount: 0 })).toThrow(RangeError);
    expect(() => new Staff(Point.of(0, 0), undefined, at(100), { lineCount: 2.5 })).toThrow(RangeError);
  });

  it('finds ledger lines above and below the staff', () => {
    const staff = makeStaff();
    expect(staff.ledgersNeededForY(staff.unit(-3))).toEqual([-3, -2, -1]);
    expect(staff.ledgersNeededForY(staff.unit(-1.5))).toEqual([-1]);
    expect(staff.ledgersNeededForY(staff.unit(7))).toEqual([7, 6, 5]);
    expect(staff.ledgersNeededForY(staff.unit(2))).toEqual([]);
    expect(staff.ledgersNeededForY(staff.unit(4))).toEqual([]);
  });

  it('tells ledger positions from spaces and staff positions', () => {
    const staff = makeStaff();
    expect(staff.yInsideStaff(staff.unit(4))).toBe(true);
    expect(staff.yInsideStaff(staff.unit(4.5))).toBe(false);
    expect(staff.yOnLedger(staff.unit(-1))).toBe(true);
    expect(staff.yOnLedger(staff.unit(-1.5))).toBe(false);
    expect(staff.yOnLedger(staff.unit(2))).toBe(false);
  });
});

describe('staff modifier index', () => {
  it('finds the active clef at and after its position', () => {
    const staff = makeStaff();
    const treble = new Clef(at(10), staff, 'treble');
    const bass = new Clef(at(50), staff, 'bass');

    expect(staff.activeClefAt(at(5))).toBeUndefined();
    expect(staff.activeClefAt(at(10))).toBe(treble);
    expect(staff.activeClefAt(at(49))).toBe(treble);
    expect(staff.activeClefAt(at(50))).toBe(bass);
    expect(staff.activeClefAt(at(200))).toBe(bass);
  });

  it('picks the clef with the greatest position at or before every x', () => {
    const staff = makeStaff();
    const positions = [0, 30, 75];
    const clefs = positions.map((x) => new Clef(at(x), staff, 'bass'));
    for (let x = 0; x <= 200; x += 5) {
      const index = positions.filter((position) => position <= x).length - 1;
      expect(staff.activeClefAt(at(x))).toBe(clefs[index]);
    }
  });

  it('lets the later clef in tree order win at a shared position', () => {
    const staff = makeStaff();
    new Clef(at(10), staff, 'treble');
    const second = new Clef(at(10), staff, 'alto');
    expect(staff.activeClefAt(at(10))).toBe(second);
  });

  it('rebuilds the index when modifiers are added', () => {
    const staff = makeStaff();
    expect(staff.activeKeySignatureAt(at(100))).toBeUndefined();
    expect(staff.modifiers.isBuilt).toBe(true);

    const key = new KeySignature(at(20), staff, 3);
    expect(staff.modifiers.isBuilt).toBe(false);
    expect(staff.activeKeySignatureAt(at(100))).toBe(key);
  });

  it('separates active and exact time signature lookups', () => {
    const staff = makeStaff();
    const time = new TimeSignature(at(30), staff, '3/4');
    expect(staff.activeTimeSignatureAt(at(40))).toBe(time);
    expect(staff.timeSignatureExactlyAt(at(40))).toBeUndefined();
    expect(staff.timeSignatureExactlyAt(at(30))).toBe(time);
  });

  it('lists modifier positions once each, ascending', () => {
    const staff = makeStaff();
    new TimeSignature(at(80), staff, 'C');
    new Clef(at(0), staff, 'treble');
    new KeySignature(at(0), staff, -2);
    new Clef(at(40), staff, 'bass');
    expect(staff.modifiers.positions().map((x) => x.value)).toEqual([0, 40, 80]);
  });

  it('reports middle C under the active clef', () => {
    const staff = makeStaff();
    new Clef(at(10), staff, 'treble');
    new Clef(at(50), staff, 'bass');
    new Clef(at(90), staff, 'percussion');

    expect(staff.middleCAt(at(10))?.value).toBe(5);
    expect(staff.middleCAt(at(60))?.value).toBe(-1);
    expect(staff.middleCAt(at(95))).toBeUndefined();
  });

  it('throws when no clef is active', () => {
    const staff = makeStaff();
    new Clef(at(10), staff, 'treble');

    let caught: unknown;
    try {
      staff.middleCAt(at(5));
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(NoClefError);
    if (caught instanceof NoClefError) {
      expect(caught.staffX).toBe(5);
    }
  });

  it('measures the distance to the next modifier of the same kind', () => {
    const staff = makeStaff();
    const treble = new Clef(at(10), staff, 'treble');
    const key = new KeySignature(at(20), staff, 1);
    const bass = new Clef(at(50), staff, 'bass');

    expect(treble.breakableLength.value).toBe(40);
    expect(bass.breakableLength.value).toBe(150);
    expect(key.breakableLength.value).toBe(180);

    const laterKey = new KeySignature(at(120), staff, 0);
    expect(key.breakableLength.value).toBe(100);
    expect(laterKey.breakableLength.value).toBe(80);
  });
});

describe('key signatures', () => {
  it('classifies keys by fifths', () => {
    expect(keySignatureType(3)).toEqual({ fifths: 3, accidental: 'sharp', count: 3 });
    expect(keySignatureType(-4)).toEqual({ fifths: -4, accidental: 'flat', count: 4 });
    expect(keySignatureType(0)).toEqual({ fifths: 0, accidental: undefined, count: 0 });
    expect(() => keySignatureType(8)).toThrow(RangeError);
    expect(() => keySignatureType(1.5)).toThrow(RangeError);
  });

  it('shifts accidentals by clef', () => {
    expect(keySignatureClefOffset(5)).toBe(0);
    expect(keySignatureClefOffset(-1)).toBe(1);
    expect(keySignatureClefOffset(2)).toBe(0.5);
    expect(keySignatureClefOffset(1)).toBe(-0.5);
  });

  it('places sharps and flats on the staff', () => {
    expect(keySignatureStaffPositions(keySignatureType(4), 5)).toEqual([0, 1.5, -0.5, 1]);
    expect(keySignatureStaffPositions(keySignatureType(2), -1)).toEqual([1, 2.5]);
    expect(keySignatureStaffPositions(keySignatureType(-3), 2)).toEqual([2.5, 1, 3]);
    expect(keySignatureStaffPositions(keySignatureType(-1), undefined)).toEqual([2]);
  });

  it('sums accidental widths', () => {
    const staff = makeStaff();
    expect(new KeySignature(at(0), staff, 3).visualWidth.value).toBe(3);
    expect(new KeySignature(at(0), staff, -3).visualWidth.value).toBe(2.625);
    expect(new KeySignature(at(0), staff, 0).visualWidth.value).toBe(0);
  });
});

describe('time signatures', () => {
  it('parses meters', () => {
    expect(parseMeter('12/8')).toEqual({ upper: ['timeSig1', 'timeSig2'], lower: ['timeSig8'] });
    expect(parseMeter(' 3 / 4 ')).toEqual({ upper: ['timeSig3'], lower: ['timeSig4'] });
    expect(parseMeter('C')).toBe(COMMON_TIME);
    expect(parseMeter('C|')).toBe(CUT_TIME);
    expect(() => parseMeter('0/4')).toThrow(RangeError);
    expect(() => parseMeter('waltz')).toThrow(RangeError);
    expect(numericMeter({ beats: 6, beatType: 8 })).toEqual({ upper: ['timeSig6'], lower: ['timeSig8'] });
  });

  it('is as wide as its wider row', () => {
    const staff = makeStaff();
    expect(new TimeSignature(at(0), staff, '12/8').visualWidth.value).toBe(3);
    expect(new TimeSignature(at(0), staff, '4/4').visualWidth.value).toBe(1.75);
    expect(new TimeSignature(at(0), staff, { beats: 11, beatType: 4 }).visualWidth.value).toBe(2.5);
  });
});

describe('bar lines', () => {
  it('hangs from the highest staff and allows a break', () => {
    const container = new PositionedObject(Point.of(0, 0));
    const lower = makeStaff(200, 80, container);
    const upper = makeStaff(200, 0, container);
    const bar = new BarLine(at(60), [lower, upper]);

    expect(bar.parent).toBe(upper);
    expect(bar.isBreakOpportunity).toBe(true);
    expect(bar.closesLine).toBe(true);
    expect(isBarLine(bar)).toBe(true);
    expect(isStaff(bar)).toBe(false);
    expect(isStaff(upper)).toBe(true);
    expect(isBarLine(container)).toBe(false);
    expect(bar.staves).toEqual([lower, upper]);
  });

  it('needs a staff', () => {
    expect(() => new BarLine(at(0), [])).toThrow(RangeError);
  });
});
