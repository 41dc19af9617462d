import { NoClefError } from '../core/errors.js';
import type { Line } from '../core/flowable.js';
import type { GlyphMetricsProvider } from '../core/glyph-metrics.js';
import { MusicFont } from '../core/music-font.js';
import type { Point } from '../core/point.js';
import { PositionedObject, type ObjectKind } from '../core/positioned-object.js';
import type { RenderSurface } from '../core/render-surface.js';
import { makeUnitKind, Mm, ZERO, type Unit, type UnitKind, type UnitLike } from '../core/units.js';
import type { Clef } from './clef.js';
import type { KeySignature } from './key-signature.js';
import {
  computeIsolatedFringeLayout,
  fringePosXForLine,
  registerFringeControllers,
  resolveFringeLayoutOptions,
  type FringeLayoutOptions,
  type ResolvedFringeLayoutOptions,
  type StaffFringeLayout
} from './staff-fringe-layout.js';
import type { StaffGroup } from './staff-group.js';
import { exactlyAt, lastAtOrBefore, StaffModifierIndex } from './staff-modifier-index.js';
import type { TimeSignature } from './time-signature.js';

export interface StaffOptions {
  /** Distance between adjacent staff lines. Defines the staff unit. */
  lineSpacing?: Unit;
  lineCount?: number;
  musicFontFamily?: string;
  glyphMetrics?: GlyphMetricsProvider;
  fringe?: FringeLayoutOptions;
}

export const DEFAULT_LINE_SPACING = Mm.of(1.75);
export const DEFAULT_LINE_COUNT = 5;
export const DEFAULT_MUSIC_FONT_FAMILY = 'Bravura';
const DEFAULT_STAFF_LINE_THICKNESS = 0.13;

let nextStaffId = 1;

/**
 * A set of horizontal staff lines running along a flowable's timeline.
 *
 * The staff owns the index of its clefs, key signatures and time signatures
 * and answers which of them is active at any x. At each line start it draws
 * its lines from the left edge of its fringe.
 */
export class Staff extends PositionedObject {
  readonly id: string;
  readonly lineCount: number;
  readonly unitKind: UnitKind;
  readonly fringeOptions: ResolvedFringeLayoutOptions;
  readonly modifiers: StaffModifierIndex;
  private readonly _length: Unit;
  private readonly _font: MusicFont;
  private readonly fringeCache = new Map<Line | null, StaffFringeLayout>();
  private _group: StaffGroup | undefined;

  constructor(pos: Point, parent: PositionedObject | undefined, length: Unit, options: StaffOptions = {}) {
    super(pos, parent);
    this.id = `staff-${nextStaffId++}`;
    this.lineCount = options.lineCount ?? DEFAULT_LINE_COUNT;
    if (!Number.isInteger(this.lineCount) || this.lineCount < 1) {
      throw new RangeError(`A staff needs a positive whole number of lines, got ${this.lineCount}.`);
    }
    this.unitKind = makeUnitKind(this.id, options.lineSpacing ?? DEFAULT_LINE_SPACING);
    this._length = length;
    this._font = new MusicFont(options.musicFontFamily ?? DEFAULT_MUSIC_FONT_FAMILY, this.unitKind, options.glyphMetrics);
    this.fringeOptions = resolveFringeLayoutOptions(options.fringe);
    this.modifiers = new StaffModifierIndex(this);
  }

  override get kind(): ObjectKind {
    return 'staff';
  }

  override get musicFont(): MusicFont {
    return this._font;
  }

  /** A length in this staff's unit, where 1 is the distance between adjacent lines. */
  unit(value: UnitLike): Unit {
    return this.unitKind.of(value);
  }

  get length(): Unit {
    return this._length;
  }

  override get breakableLength(): Unit {
    return this._length;
  }

  /** Distance from the top line to the bottom line. */
  get height(): Unit {
    return this.unit(this.lineCount - 1);
  }

  get centerY(): Unit {
    return this.height.dividedBy(2);
  }

  /** Top and bottom y of bar lines crossing this staff. */
  get barlineExtent(): readonly [Unit, Unit] {
    return [this.unitKind.zero, this.height];
  }

  get group(): StaffGroup | undefined {
    return this._group;
  }

  /** Called by `StaffGroup` when this staff joins or leaves it. */
  assignGroup(group: StaffGroup | undefined): void {
    this._group = group;
    this.fringeCache.clear();
  }

  /** Margin-controller key this staff registers under when it is not grouped. */
  get layoutKey(): string {
    return `fringe:${this.id}`;
  }

  activeClefAt(x: Unit): Clef | undefined {
    return lastAtOrBefore(this.modifiers.clefs, x);
  }

  activeKeySignatureAt(x: Unit): KeySignature | undefined {
    return lastAtOrBefore(this.modifiers.keySignatures, x);
  }

  activeTimeSignatureAt(x: Unit): TimeSignature | undefined {
    return lastAtOrBefore(this.modifiers.timeSignatures, x);
  }

  timeSignatureExactlyAt(x: Unit): TimeSignature | undefined {
    return exactlyAt(this.modifiers.timeSignatures, x);
  }

  /** Staff position of middle C under the clef active at `x`. Undefined for unpitched clefs. */
  middleCAt(x: Unit): Unit | undefined {
    const clef = this.activeClefAt(x);
    if (!clef) {
      throw new NoClefError(x.baseValue);
    }
    return clef.middleCStaffPosition;
  }

  /**
   * Distance from `node` to the next descendant of the same kind, or to the
   * staff end when there is none.
   */
  distanceToNextOfType(node: PositionedObject): Unit {
    const start = this.descendantPosX(node);
    let closest: Unit | undefined;
    for (const other of this.descendants()) {
      if (other === node || other.kind !== node.kind) {
        continue;
      }
      const x = this.descendantPosX(other);
      if (x.gt(start) && (!closest || x.lt(closest))) {
        closest = x;
      }
    }
    return (closest ?? this._length).minus(start);
  }

  yInsideStaff(y: Unit): boolean {
    return y.ge(0) && y.le(this.height);
  }

  yOnLedger(y: Unit): boolean {
    return !this.yInsideStaff(y) && Number.isInteger(this.unit(y).value);
  }

  /** Staff positions of the ledger lines a notehead at `y` needs, outermost first. */
  ledgersNeededForY(y: Unit): number[] {
    const start = Math.trunc(this.unit(y).value);
    const ledgers: number[] = [];
    if (start < 0) {
      for (let position = start; position < 0; position += 1) {
        ledgers.push(position);
      }
    } else if (start > this.lineCount - 1) {
      for (let position = start; position > this.lineCount - 1; position -= 1) {
        ledgers.push(position);
      }
    }
    return ledgers;
  }

  /** Staff x whose modifiers shape the fringe on `line`; zero outside any line. */
  staffPosXForLine(line: Line | undefined): Unit {
    return fringePosXForLine(this, line?.flowableX);
  }

  /** Fringe edges on `line`, aligned with the group when the staff has one. */
  fringeLayoutAt(line?: Line): StaffFringeLayout {
    if (this._group) {
      return this._group.fringeLayoutAt(this, line);
    }
    return this.isolatedFringeLayoutAt(line);
  }

  /** Fringe edges on `line` ignoring any group. */
  isolatedFringeLayoutAt(line?: Line): StaffFringeLayout {
    const key = line ?? null;
    const cached = this.fringeCache.get(key);
    if (cached) {
      return cached;
    }
    const layout = computeIsolatedFringeLayout(this, this.staffPosXForLine(line));
    this.fringeCache.set(key, layout);
    return layout;
  }

  /**
   * Draw the staff lines for one slice. `clipStartX` is the offset into the
   * staff where the slice begins; `clipWidth` defaults to the rest of the staff.
   */
  renderSlice(surface: RenderSurface, pos: Point, clipStartX: Unit | undefined, clipWidth: Unit | undefined, line: Line | undefined): void {
    const fringe = this.fringeLayoutAt(line);
    const width = clipWidth ?? this._length.minus(clipStartX ?? ZERO);
    const thickness = this._font.engravingDefault('staffLineThickness', DEFAULT_STAFF_LINE_THICKNESS);
    const segments: Array<[Point, Point]> = [];
    for (let index = 0; index < this.lineCount; index += 1) {
      const y = this.unit(index);
      segments.push([pos.translate(fringe.staff, y), pos.translate(width, y)]);
    }
    surface.drawLines(segments, thickness, 'staff-lines');
  }

  override renderComplete(surface: RenderSurface, pos: Point, line?: Line): void {
    this.renderSlice(surface, pos, undefined, undefined, line);
  }

  override renderBeforeBreak(surface: RenderSurface, pos: Point, line: Line, flowableX: Unit): void {
    this.renderSlice(surface, pos, ZERO, line.endX.minus(flowableX), line);
  }

  override renderSpanningContinuation(surface: RenderSurface, pos: Point, line: Line, objectX: Unit): void {
    this.renderSlice(surface, pos, objectX, line.length, line);
  }

  override renderAfterBreak(surface: RenderSurface, pos: Point, line: Line, objectX: Unit): void {
    this.renderSlice(surface, pos, objectX, undefined, line);
  }

  override preRender(): void {
    this.invalidateLayout();
  }

  override registerLayoutControllers(): void {
    if (this._group) {
      this._group.registerLayoutControllers();
      return;
    }
    const flowable = this.flowable;
    if (flowable) {
      registerFringeControllers(flowable, this.layoutKey, [this]);
    }
  }

  override postRender(): void {
    this.invalidateLayout();
  }

  /** Drop the modifier index and every fringe layout that depends on it. */
  invalidateLayout(): void {
    this.modifiers.invalidate();
    this.fringeCache.clear();
    this._group?.invalidate();
  }

  protected override onDescendantChanged(_changed: PositionedObject): void {
    this.invalidateLayout();
  }
}

export function isStaff(node: PositionedObject): node is Staff {
  return node.kind === 'staff';
}
