import { TypeConversionError } from './errors.js';

/** Anything a unit can be constructed from or combined with. */
export type UnitLike = number | Unit;

/**
 * A named length scale with a fixed ratio to the base unit.
 * One base unit is 1/72 inch (a typographic point).
 */
export class UnitKind {
  readonly name: string;
  /** Base units per one unit of this kind. */
  readonly ratio: number;

  constructor(name: string, ratio: number) {
    if (!Number.isFinite(ratio) || ratio <= 0) {
      throw new RangeError(`Unit kind '${name}' needs a positive finite ratio, got ${ratio}.`);
    }
    this.name = name;
    this.ratio = ratio;
  }

  /** A zero-length value in this kind. */
  get zero(): Unit {
    return new Unit(0, this);
  }

  /**
   * Construct a value in this kind.
   * Numbers are stored as-is; units are converted from their own kind.
   */
  of(value: UnitLike): Unit {
    return this.from(value);
  }

  /** Validating constructor for values of unknown shape. */
  from(value: unknown): Unit {
    if (typeof value === 'number' && Number.isFinite(value)) {
      return new Unit(value, this);
    }
    if (value instanceof Unit) {
      return value.kind === this ? value : new Unit(convertValue(value.value, value.kind, this), this);
    }
    throw new TypeConversionError(value, this.name);
  }

  toString(): string {
    return this.name;
  }
}

/** Convert a raw value between two unit kinds. */
export function convertValue(value: number, source: UnitKind, target: UnitKind): number {
  if (source === target || source.ratio === target.ratio) {
    return value;
  }
  return (value * source.ratio) / target.ratio;
}

/**
 * An immutable scalar length tagged with its unit kind.
 *
 * Every binary operation converts the right operand into the left operand's
 * kind first; results always carry the left operand's kind.
 */
export class Unit {
  readonly value: number;
  readonly kind: UnitKind;

  constructor(value: number, kind: UnitKind) {
    this.value = value;
    this.kind = kind;
  }

  /** The value expressed in base units. */
  get baseValue(): number {
    return this.value * this.kind.ratio;
  }

  /** Value rounded for messages and diagnostics. */
  get displayValue(): number {
    return Math.round(this.value * 1e6) / 1e6;
  }

  /** Re-express this length in another kind. */
  to(kind: UnitKind): Unit {
    return kind.of(this);
  }

  plus(other: UnitLike): Unit {
    return new Unit(this.value + this.operand(other), this.kind);
  }

  minus(other: UnitLike): Unit {
    return new Unit(this.value - this.operand(other), this.kind);
  }

  times(other: UnitLike): Unit {
    return new Unit(this.value * this.operand(other), this.kind);
  }

  dividedBy(other: UnitLike): Unit {
    return new Unit(this.value / this.operand(other), this.kind);
  }

  negate(): Unit {
    return new Unit(-this.value, this.kind);
  }

  abs(): Unit {
    return new Unit(Math.abs(this.value), this.kind);
  }

  /** Negative, zero or positive as this is less than, equal to or greater than `other`. */
  compare(other: UnitLike): number {
    const right = this.operand(other);
    if (this.value < right) return -1;
    if (this.value > right) return 1;
    return 0;
  }

  lt(other: UnitLike): boolean {
    return this.value < this.operand(other);
  }

  le(other: UnitLike): boolean {
    return this.value <= this.operand(other);
  }

  gt(other: UnitLike): boolean {
    return this.value > this.operand(other);
  }

  ge(other: UnitLike): boolean {
    return this.value >= this.operand(other);
  }

  equals(other: UnitLike): boolean {
    return this.value === this.operand(other);
  }

  /** Equal within `tolerance` base units. Use for positions reached by different sums. */
  isCloseTo(other: UnitLike, tolerance: number = POSITION_TOLERANCE): boolean {
    return Math.abs(this.value - this.operand(other)) * this.kind.ratio <= tolerance;
  }

  /** Less than, or within the position tolerance of, `other`. */
  leOrClose(other: UnitLike): boolean {
    return this.le(other) || this.isCloseTo(other);
  }

  toString(): string {
    return `${this.displayValue} ${this.kind.name}`;
  }

  /** The smaller of two lengths, keeping the winner's own kind. */
  static min(left: Unit, right: Unit): Unit {
    return right.lt(left) ? right : left;
  }

  /** The larger of two lengths, keeping the winner's own kind. */
  static max(left: Unit, right: Unit): Unit {
    return right.gt(left) ? right : left;
  }

  private operand(other: UnitLike): number {
    return this.kind.of(other).value;
  }
}

/** Base units within which two timeline positions count as the same place. */
export const POSITION_TOLERANCE = 1e-6;

/** Base unit, 1/72 inch. */
export const BaseUnit = new UnitKind('unit', 1);
/** Output-space unit handed to render backends; identical in scale to the base unit. */
export const GraphicUnit = new UnitKind('graphic-unit', 1);
export const Inch = new UnitKind('inch', 72);
export const Mm = new UnitKind('mm', 72 / 25.4);

/** Shared zero in base units. */
export const ZERO = BaseUnit.zero;

/** Create a unit kind scaled relative to an existing length, e.g. one staff space. */
export function makeUnitKind(name: string, size: Unit): UnitKind {
  return new UnitKind(name, size.baseValue);
}
