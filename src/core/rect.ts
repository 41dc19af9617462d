import type { Point } from './point.js';
import { BaseUnit, type Unit, type UnitKind, type UnitLike } from './units.js';

/** Axis-aligned rectangle anchored at its top-left corner. */
export class Rect {
  readonly x: Unit;
  readonly y: Unit;
  readonly width: Unit;
  readonly height: Unit;

  constructor(x: Unit, y: Unit, width: Unit, height: Unit) {
    this.x = x;
    this.y = y;
    this.width = width;
    this.height = height;
  }

  static of(x: UnitLike, y: UnitLike, width: UnitLike, height: UnitLike, kind: UnitKind = BaseUnit): Rect {
    return new Rect(kind.of(x), kind.of(y), kind.of(width), kind.of(height));
  }

  get right(): Unit {
    return this.x.plus(this.width);
  }

  get bottom(): Unit {
    return this.y.plus(this.height);
  }

  offset(by: Point): Rect {
    return new Rect(this.x.plus(by.x), this.y.plus(by.y), this.width, this.height);
  }
}
