import type { Line } from '../core/flowable.js';
import { MusicText } from '../core/music-text.js';
import { Point } from '../core/point.js';
import type { ObjectKind, PositionedObject } from '../core/positioned-object.js';
import type { RenderSurface } from '../core/render-surface.js';
import { ZERO, type Unit } from '../core/units.js';
import type { Staff } from './staff.js';

export type ClefTypeName = 'treble' | 'bass' | 'alto' | 'tenor' | 'percussion';

/** Glyph and staff geometry of one clef. Staff positions count down from the top line in staff spaces. */
export interface ClefType {
  readonly name: ClefTypeName;
  readonly glyphName: string;
  readonly staffPosition: number;
  /** Undefined for clefs that do not map staff positions to pitches. */
  readonly middleCStaffPosition: number | undefined;
}

export const CLEF_TYPES: Readonly<Record<ClefTypeName, ClefType>> = {
  treble: { name: 'treble', glyphName: 'gClef', staffPosition: 3, middleCStaffPosition: 5 },
  bass: { name: 'bass', glyphName: 'fClef', staffPosition: 1, middleCStaffPosition: -1 },
  alto: { name: 'alto', glyphName: 'cClef', staffPosition: 2, middleCStaffPosition: 2 },
  tenor: { name: 'tenor', glyphName: 'cClef', staffPosition: 1, middleCStaffPosition: 1 },
  percussion: { name: 'percussion', glyphName: 'unpitchedPercussionClef1', staffPosition: 2, middleCStaffPosition: undefined }
};

export function resolveClefType(clefType: ClefTypeName | ClefType): ClefType {
  return typeof clefType === 'string' ? CLEF_TYPES[clefType] : clefType;
}

/**
 * A clef. Breakable until the next clef on its staff, so it reappears at the
 * start of every line it covers.
 */
export class Clef extends MusicText {
  readonly clefType: ClefType;
  private readonly _staff: Staff;

  constructor(posX: Unit, staff: Staff, clefType: ClefTypeName | ClefType) {
    const resolved = resolveClefType(clefType);
    super(new Point(posX, staff.unit(resolved.staffPosition)), staff, resolved.glyphName);
    this.clefType = resolved;
    this._staff = staff;
  }

  override get kind(): ObjectKind {
    return 'clef';
  }

  get staff(): Staff {
    return this._staff;
  }

  /** Middle C's staff position, in the staff's unit, or undefined for unpitched clefs. */
  get middleCStaffPosition(): Unit | undefined {
    const position = this.clefType.middleCStaffPosition;
    return position === undefined ? undefined : this._staff.unit(position);
  }

  override get breakableLength(): Unit {
    return this._staff.distanceToNextOfType(this);
  }

  override renderComplete(surface: RenderSurface, pos: Point, line?: Line): void {
    const layoutPosX = this._staff.staffPosXForLine(line);
    if (this._staff.descendantPosX(this).isCloseTo(layoutPosX)) {
      this.drawAtFringe(surface, pos, line);
      return;
    }
    surface.drawGlyphs(pos, this.musicFont, this.glyphNames, 'clef');
  }

  override renderSpanningContinuation(surface: RenderSurface, pos: Point, line: Line, _objectX: Unit): void {
    this.drawAtFringe(surface, pos, line);
  }

  override renderAfterBreak(surface: RenderSurface, pos: Point, line: Line, _objectX: Unit): void {
    this.drawAtFringe(surface, pos, line);
  }

  private drawAtFringe(surface: RenderSurface, pos: Point, line: Line | undefined): void {
    const edge = this._staff.fringeLayoutAt(line).clef ?? ZERO;
    surface.drawGlyphs(pos.translate(edge, 0), this.musicFont, this.glyphNames, 'clef');
  }
}

export function isClef(node: PositionedObject): node is Clef {
  return node.kind === 'clef';
}
