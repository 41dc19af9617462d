import type { Line } from '../core/flowable.js';
import type { MusicFont } from '../core/music-font.js';
import { Point } from '../core/point.js';
import { PositionedObject, type ObjectKind } from '../core/positioned-object.js';
import type { RenderSurface } from '../core/render-surface.js';
import { ZERO, type Unit } from '../core/units.js';
import type { Staff } from './staff.js';

export type KeyAccidental = 'sharp' | 'flat';

/** A key described by its position on the circle of fifths. Negative counts are flats. */
export interface KeySignatureType {
  readonly fifths: number;
  readonly accidental: KeyAccidental | undefined;
  readonly count: number;
}

const ACCIDENTAL_GLYPHS: Readonly<Record<KeyAccidental, string>> = {
  sharp: 'accidentalSharp',
  flat: 'accidentalFlat'
};

// Treble-clef staff positions in order of appearance.
const SHARP_POSITIONS = [0, 1.5, -0.5, 1, 2.5, 0.5, 2] as const;
const FLAT_POSITIONS = [2, 0.5, 2.5, 1, 3.5, 1.5, 4.5] as const;

const TREBLE_MIDDLE_C = 5;

export function keySignatureType(fifths: number): KeySignatureType {
  if (!Number.isInteger(fifths) || fifths < -7 || fifths > 7) {
    throw new RangeError(`Key signature fifths must be an integer from -7 to 7, got ${fifths}.`);
  }
  if (fifths === 0) {
    return { fifths, accidental: undefined, count: 0 };
  }
  return { fifths, accidental: fifths > 0 ? 'sharp' : 'flat', count: Math.abs(fifths) };
}

/**
 * Offset, in staff spaces, from treble accidental positions to those of a clef
 * with middle C at `middleC`. Octaves fold so accidentals stay on the staff.
 */
export function keySignatureClefOffset(middleC: number): number {
  let diff = middleC - TREBLE_MIDDLE_C;
  while (diff < -1) {
    diff += 3.5;
  }
  return diff;
}

/** Staff positions of each accidental for a key under a clef with middle C at `middleC`. */
export function keySignatureStaffPositions(keyType: KeySignatureType, middleC: number | undefined): number[] {
  const table = keyType.accidental === 'flat' ? FLAT_POSITIONS : SHARP_POSITIONS;
  const offset = middleC === undefined ? 0 : keySignatureClefOffset(middleC);
  return table.slice(0, keyType.count).map((position) => position + offset);
}

/**
 * A key signature. Breakable until the next key signature on its staff and
 * redrawn in the fringe of every line it covers.
 */
export class KeySignature extends PositionedObject {
  readonly keyType: KeySignatureType;
  private readonly _staff: Staff;

  constructor(posX: Unit, staff: Staff, keyType: KeySignatureType | number) {
    super(new Point(posX, ZERO), staff);
    this.keyType = typeof keyType === 'number' ? keySignatureType(keyType) : keyType;
    this._staff = staff;
  }

  override get kind(): ObjectKind {
    return 'key-signature';
  }

  get staff(): Staff {
    return this._staff;
  }

  override get musicFont(): MusicFont {
    return this._staff.musicFont;
  }

  get glyphNames(): string[] {
    const accidental = this.keyType.accidental;
    return accidental ? Array.from({ length: this.keyType.count }, () => ACCIDENTAL_GLYPHS[accidental]) : [];
  }

  /** Sum of the accidental widths. */
  get visualWidth(): Unit {
    return this.musicFont.boundingRectOf(this.glyphNames).width;
  }

  override get breakableLength(): Unit {
    return this._staff.distanceToNextOfType(this);
  }

  override renderComplete(surface: RenderSurface, pos: Point, line?: Line): void {
    const staffX = this._staff.descendantPosX(this);
    const layoutPosX = this._staff.staffPosXForLine(line);
    if (staffX.isCloseTo(layoutPosX)) {
      this.drawAtFringe(surface, pos, line);
      return;
    }
    this.drawAccidentals(surface, pos, staffX);
  }

  override renderSpanningContinuation(surface: RenderSurface, pos: Point, line: Line, _objectX: Unit): void {
    this.drawAtFringe(surface, pos, line);
  }

  override renderAfterBreak(surface: RenderSurface, pos: Point, line: Line, _objectX: Unit): void {
    this.drawAtFringe(surface, pos, line);
  }

  private drawAtFringe(surface: RenderSurface, pos: Point, line: Line | undefined): void {
    const edge = this._staff.fringeLayoutAt(line).keySignature ?? ZERO;
    this.drawAccidentals(surface, pos.translate(edge, 0), this._staff.staffPosXForLine(line));
  }

  /** `clefX` is the staff position whose clef decides accidental heights. */
  private drawAccidentals(surface: RenderSurface, pos: Point, clefX: Unit): void {
    const accidental = this.keyType.accidental;
    if (!accidental) {
      return;
    }
    const glyphName = ACCIDENTAL_GLYPHS[accidental];
    const middleC = this._staff.middleCAt(clefX);
    const advance = this.musicFont.glyphRect(glyphName).width;
    keySignatureStaffPositions(this.keyType, middleC?.value).forEach((position, index) => {
      const at = pos.translate(advance.times(index), this._staff.unit(position));
      surface.drawGlyphs(at, this.musicFont, [glyphName], 'key-signature');
    });
  }
}

export function isKeySignature(node: PositionedObject): node is KeySignature {
  return node.kind === 'key-signature';
}
