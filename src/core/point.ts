import { BaseUnit, type Unit, type UnitKind, type UnitLike } from './units.js';

/** Two-dimensional position. Components keep whatever unit kinds they were given. */
export class Point {
  readonly x: Unit;
  readonly y: Unit;

  constructor(x: Unit, y: Unit) {
    this.x = x;
    this.y = y;
  }

  /** Build a point with both components in one kind. */
  static of(x: UnitLike, y: UnitLike, kind: UnitKind = BaseUnit): Point {
    return new Point(kind.of(x), kind.of(y));
  }

  plus(other: Point): Point {
    return new Point(this.x.plus(other.x), this.y.plus(other.y));
  }

  minus(other: Point): Point {
    return new Point(this.x.minus(other.x), this.y.minus(other.y));
  }

  /** Offset by raw lengths along each axis. */
  translate(dx: UnitLike, dy: UnitLike): Point {
    return new Point(this.x.plus(dx), this.y.plus(dy));
  }

  withX(x: Unit): Point {
    return new Point(x, this.y);
  }

  withY(y: Unit): Point {
    return new Point(this.x, y);
  }

  to(kind: UnitKind): Point {
    return new Point(this.x.to(kind), this.y.to(kind));
  }

  equals(other: Point): boolean {
    return this.x.equals(other.x) && this.y.equals(other.y);
  }

  toString(): string {
    return `Point(${this.x}, ${this.y})`;
  }
}

export const ORIGIN = Point.of(0, 0);
