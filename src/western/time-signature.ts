import type { Line } from '../core/flowable.js';
import type { MusicFont } from '../core/music-font.js';
import { Point } from '../core/point.js';
import { PositionedObject, type ObjectKind } from '../core/positioned-object.js';
import type { RenderSurface } from '../core/render-surface.js';
import { Unit, ZERO } from '../core/units.js';
import type { Staff } from './staff.js';

/** Time signature content as two rows of glyphs. A symbol meter has an empty lower row. */
export interface Meter {
  readonly upper: readonly string[];
  readonly lower: readonly string[];
}

/** Numeric time signature, e.g. `{ beats: 6, beatType: 8 }`. */
export interface NumericMeter {
  beats: number;
  beatType: number;
}

export const COMMON_TIME: Meter = { upper: ['timeSigCommon'], lower: [] };
export const CUT_TIME: Meter = { upper: ['timeSigCutCommon'], lower: [] };

/** Parse `"n/d"`, `"C"` or `"C|"` into a meter. */
export function parseMeter(text: string): Meter {
  const trimmed = text.trim();
  if (trimmed === 'C') {
    return COMMON_TIME;
  }
  if (trimmed === 'C|') {
    return CUT_TIME;
  }
  const match = /^(\d+)\s*\/\s*(\d+)$/.exec(trimmed);
  if (!match?.[1] || !match[2]) {
    throw new RangeError(`Unsupported meter '${text}'. Expected "n/d", "C" or "C|".`);
  }
  return numericMeter({ beats: Number(match[1]), beatType: Number(match[2]) });
}

export function numericMeter(meter: NumericMeter): Meter {
  if (!isPositiveInteger(meter.beats) || !isPositiveInteger(meter.beatType)) {
    throw new RangeError(`Meter needs positive integer beats and beat type, got ${meter.beats}/${meter.beatType}.`);
  }
  return { upper: digitGlyphs(meter.beats), lower: digitGlyphs(meter.beatType) };
}

function digitGlyphs(value: number): string[] {
  return [...String(value)].map((digit) => `timeSig${digit}`);
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function resolveMeter(meter: Meter | NumericMeter | string): Meter {
  if (typeof meter === 'string') {
    return parseMeter(meter);
  }
  return 'beats' in meter ? numericMeter(meter) : meter;
}

/**
 * A time signature. Not breakable; when it sits at a line start it is drawn at
 * the time-signature fringe edge.
 */
export class TimeSignature extends PositionedObject {
  readonly meter: Meter;
  private readonly _staff: Staff;

  constructor(posX: Unit, staff: Staff, meter: Meter | NumericMeter | string) {
    super(new Point(posX, ZERO), staff);
    this.meter = resolveMeter(meter);
    this._staff = staff;
  }

  override get kind(): ObjectKind {
    return 'time-signature';
  }

  get staff(): Staff {
    return this._staff;
  }

  override get musicFont(): MusicFont {
    return this._staff.musicFont;
  }

  /** Width of the wider row. */
  get visualWidth(): Unit {
    const font = this.musicFont;
    return Unit.max(font.boundingRectOf(this.meter.upper).width, font.boundingRectOf(this.meter.lower).width);
  }

  override renderComplete(surface: RenderSurface, pos: Point, line?: Line): void {
    let origin = pos;
    if (this._staff.descendantPosX(this).isCloseTo(this._staff.staffPosXForLine(line))) {
      origin = pos.translate(this._staff.fringeLayoutAt(line).timeSignature ?? ZERO, 0);
    }
    const staff = this._staff;
    if (this.meter.lower.length === 0) {
      this.drawRow(surface, origin, this.meter.upper, staff.centerY);
      return;
    }
    this.drawRow(surface, origin, this.meter.upper, staff.unit(1));
    this.drawRow(surface, origin, this.meter.lower, staff.unit(3));
  }

  private drawRow(surface: RenderSurface, origin: Point, glyphNames: readonly string[], y: Unit): void {
    const rowWidth = this.musicFont.boundingRectOf(glyphNames).width;
    const inset = this.visualWidth.minus(rowWidth).dividedBy(2);
    surface.drawGlyphs(origin.translate(inset, y), this.musicFont, glyphNames, 'time-signature');
  }
}

export function isTimeSignature(node: PositionedObject): node is TimeSignature {
  return node.kind === 'time-signature';
}
