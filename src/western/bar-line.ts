import type { Line } from '../core/flowable.js';
import { mapBetween } from '../core/mapping.js';
import { Point } from '../core/point.js';
import { PositionedObject, type ObjectKind } from '../core/positioned-object.js';
import type { RenderSurface } from '../core/render-surface.js';
import { ZERO, type Unit } from '../core/units.js';
import type { Staff } from './staff.js';

const DEFAULT_THIN_BARLINE_THICKNESS = 0.16;

/**
 * A vertical line from the top of the highest staff to the bottom of the
 * lowest one. Lines may end at a bar line, which then closes that line.
 */
export class BarLine extends PositionedObject {
  readonly staves: readonly Staff[];
  private readonly highest: Staff;
  private readonly lowest: Staff;

  constructor(posX: Unit, staves: readonly Staff[]) {
    const list = [...staves];
    const first = list[0];
    if (!first) {
      throw new RangeError('A bar line needs at least one staff.');
    }
    const byHeight = [...list].sort((left, right) => mapBetween(first, left).y.compare(mapBetween(first, right).y));
    const highest = byHeight[0] ?? first;
    super(new Point(posX, ZERO), highest);
    this.staves = list;
    this.highest = highest;
    this.lowest = byHeight[byHeight.length - 1] ?? first;
  }

  override get kind(): ObjectKind {
    return 'bar-line';
  }

  override get isBreakOpportunity(): boolean {
    return true;
  }

  override get closesLine(): boolean {
    return true;
  }

  override renderComplete(surface: RenderSurface, pos: Point, _line?: Line): void {
    const font = this.highest.musicFont;
    const thickness = font.engravingDefault('thinBarlineThickness', DEFAULT_THIN_BARLINE_THICKNESS);
    const [top] = this.highest.barlineExtent;
    const [, bottom] = this.lowest.barlineExtent;
    const lowestOffset = mapBetween(this.highest, this.lowest);
    const from = pos.translate(0, top);
    const to = pos.translate(0, lowestOffset.y.plus(bottom));
    surface.drawLines([[from, to]], thickness, 'bar-line');
  }
}

export function isBarLine(node: PositionedObject): node is BarLine {
  return node.kind === 'bar-line';
}
