import type { Flowable } from '../core/flowable.js';
import { BaseUnit, POSITION_TOLERANCE, Unit, ZERO } from '../core/units.js';
import type { Staff } from './staff.js';

/**
 * Horizontal edges of a staff's fringe, relative to where breakable content
 * starts on the line. Edges are negative or zero. A layer with nothing active
 * has no edge.
 */
export interface StaffFringeLayout {
  /** Staff x the layout was computed for. */
  readonly posXInStaff: Unit;
  readonly staff: Unit;
  readonly clef: Unit | undefined;
  readonly keySignature: Unit | undefined;
  readonly timeSignature: Unit | undefined;
}

/** Fringe paddings in staff spaces. */
export interface FringeLayoutOptions {
  rightPadding?: number;
  staffLeftPadding?: number;
  keySignatureLeftPadding?: number;
  timeSignatureLeftPadding?: number;
}

/** A time-signature margin applies only to a line starting at the time signature. */
const TIME_CONTROLLER_EXTENT = BaseUnit.of(POSITION_TOLERANCE);

export type ResolvedFringeLayoutOptions = Required<FringeLayoutOptions>;

export const DEFAULT_FRINGE_LAYOUT_OPTIONS: ResolvedFringeLayoutOptions = {
  rightPadding: 0,
  staffLeftPadding: 0.5,
  keySignatureLeftPadding: 0.5,
  timeSignatureLeftPadding: 0.5
};

export function resolveFringeLayoutOptions(options: FringeLayoutOptions = {}): ResolvedFringeLayoutOptions {
  return {
    rightPadding: options.rightPadding ?? DEFAULT_FRINGE_LAYOUT_OPTIONS.rightPadding,
    staffLeftPadding: options.staffLeftPadding ?? DEFAULT_FRINGE_LAYOUT_OPTIONS.staffLeftPadding,
    keySignatureLeftPadding: options.keySignatureLeftPadding ?? DEFAULT_FRINGE_LAYOUT_OPTIONS.keySignatureLeftPadding,
    timeSignatureLeftPadding: options.timeSignatureLeftPadding ?? DEFAULT_FRINGE_LAYOUT_OPTIONS.timeSignatureLeftPadding
  };
}

/**
 * Lay out one staff's fringe at staff x `posX`, ignoring any group.
 *
 * Layers are walked right to left from zero: trailing padding, the time
 * signature placed exactly at `posX`, the active key signature, the active
 * clef and finally the staff's own left padding.
 */
export function computeIsolatedFringeLayout(staff: Staff, posX: Unit, includeTimeSignature = true): StaffFringeLayout {
  const options = staff.fringeOptions;
  let current = staff.unitKind.zero.minus(options.rightPadding);

  let timeSignature: Unit | undefined;
  const activeTime = includeTimeSignature ? staff.timeSignatureExactlyAt(posX) : undefined;
  if (activeTime) {
    current = current.minus(activeTime.visualWidth);
    timeSignature = current;
    current = current.minus(options.timeSignatureLeftPadding);
  }

  let keySignature: Unit | undefined;
  const activeKey = staff.activeKeySignatureAt(posX);
  if (activeKey) {
    current = current.minus(activeKey.visualWidth);
    keySignature = current;
    current = current.minus(options.keySignatureLeftPadding);
  }

  let clef: Unit | undefined;
  const activeClef = staff.activeClefAt(posX);
  if (activeClef) {
    current = current.minus(activeClef.boundingRect.width);
    clef = current;
  }

  return {
    posXInStaff: posX,
    staff: current.minus(options.staffLeftPadding),
    clef,
    keySignature,
    timeSignature
  };
}

/**
 * Shift a layout so its staff edge lands on `basis`. Clef and key-signature
 * edges move with it; the time-signature edge stays put.
 */
export function alignFringeLayout(layout: StaffFringeLayout, basis: Unit): StaffFringeLayout {
  if (layout.staff.equals(basis)) {
    return layout;
  }
  const delta = basis.minus(layout.staff);
  return {
    posXInStaff: layout.posXInStaff,
    staff: basis.to(layout.staff.kind),
    clef: layout.clef?.plus(delta),
    keySignature: layout.keySignature?.plus(delta),
    timeSignature: layout.timeSignature
  };
}

/** Align a set of isolated layouts to their widest staff edge. */
export function alignFringeLayouts<K>(layouts: ReadonlyMap<K, StaffFringeLayout>): Map<K, StaffFringeLayout> {
  let basis: Unit | undefined;
  for (const layout of layouts.values()) {
    basis = basis ? Unit.min(basis, layout.staff) : layout.staff;
  }
  const aligned = new Map<K, StaffFringeLayout>();
  for (const [key, layout] of layouts) {
    aligned.set(key, basis ? alignFringeLayout(layout, basis) : layout);
  }
  return aligned;
}

/** A staff's x position for a line's fringe lookup, clamped to the staff start. */
export function fringePosXForLine(staff: Staff, lineFlowableX: Unit | undefined): Unit {
  const flowable = staff.flowable;
  if (lineFlowableX === undefined || !flowable) {
    return ZERO;
  }
  const posX = lineFlowableX.minus(flowable.descendantPosX(staff));
  return posX.lt(0) ? ZERO : posX;
}

/**
 * Register margin controllers for the staves sharing `layoutKey` on `flowable`.
 *
 * At each modifier position, `layoutKey` reserves the aligned fringe width
 * without time signatures. Where a time signature sits, `<layoutKey>:time`
 * reserves the extra width it adds, but only for a line starting at that
 * position: elsewhere the time signature is drawn in the line's content.
 */
export function registerFringeControllers(flowable: Flowable, layoutKey: string, staves: readonly Staff[]): void {
  clearFringeControllers(flowable, layoutKey);
  const timeKey = timeLayoutKey(layoutKey);

  for (const flowableX of controllerPositions(flowable, staves)) {
    const base = new Map<Staff, StaffFringeLayout>();
    const full = new Map<Staff, StaffFringeLayout>();
    for (const staff of staves) {
      const posX = fringePosXForLine(staff, flowableX);
      base.set(staff, computeIsolatedFringeLayout(staff, posX, false));
      full.set(staff, computeIsolatedFringeLayout(staff, posX));
    }

    const baseWidth = widestFringe(base);
    flowable.addMarginController({ flowableX, marginWidth: baseWidth, layoutKey });
    const extra = widestFringe(full).minus(baseWidth);
    if (extra.gt(0)) {
      flowable.addMarginController({ flowableX, marginWidth: extra, layoutKey: timeKey, extent: TIME_CONTROLLER_EXTENT });
    }
  }
}

/** Remove what `registerFringeControllers` registered under `layoutKey`. */
export function clearFringeControllers(flowable: Flowable, layoutKey: string): void {
  flowable.removeMarginControllers(layoutKey);
  flowable.removeMarginControllers(timeLayoutKey(layoutKey));
}

function timeLayoutKey(layoutKey: string): string {
  return `${layoutKey}:time`;
}

/** Width of the widest staff edge, in base units. */
function widestFringe(layouts: ReadonlyMap<Staff, StaffFringeLayout>): Unit {
  let widest = ZERO;
  for (const layout of layouts.values()) {
    widest = Unit.max(widest, layout.staff.negate().to(BaseUnit));
  }
  return widest;
}

/** Flowable x of every staff start and modifier, ascending, without duplicates. */
function controllerPositions(flowable: Flowable, staves: readonly Staff[]): Unit[] {
  const positions: Unit[] = [];
  for (const staff of staves) {
    const staffX = flowable.descendantPosX(staff);
    positions.push(staffX);
    for (const x of staff.modifiers.positions()) {
      positions.push(staffX.plus(x));
    }
  }
  positions.sort((left, right) => left.compare(right));
  return positions.filter((x, index) => index === 0 || !x.isCloseTo(positions[index - 1] ?? x));
}
