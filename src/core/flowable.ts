import type { Diagnostic } from './diagnostics.js';
import { LayoutOverflowError } from './errors.js';
import { marginNeededAt, type MarginController } from './layout-controllers.js';
import type { Page } from './page.js';
import { Point } from './point.js';
import { PositionedObject, type ObjectKind } from './positioned-object.js';
import { BaseUnit, Mm, ZERO, type Unit } from './units.js';

/** Line-breaking state of a flowable. */
export type FlowableState = 'unbroken' | 'breaking' | 'broken';

/** How a breakable object's extent meets one line. */
export type SliceKind = 'complete' | 'before-break' | 'spanning-continuation' | 'after-break';

/** Flowable configuration. */
export interface FlowableOptions {
  /** Vertical gap between consecutive lines. */
  yPadding?: Unit;
  /** How far back from the greedy line end a break opportunity is accepted. */
  breakThreshold?: Unit;
}

export const DEFAULT_FLOWABLE_Y_PADDING = Mm.of(5);
export const DEFAULT_BREAK_THRESHOLD = Mm.of(5);

/**
 * One line segment of a broken flowable.
 *
 * Timeline content from `flowableX` to `endX` is drawn on page `pageIndex`
 * with `flowableX` placed at `origin`. `marginLeft` is the space reserved
 * immediately left of the origin.
 */
export class Line {
  readonly index: number;
  readonly flowableX: Unit;
  readonly length: Unit;
  readonly pageIndex: number;
  readonly origin: Point;
  readonly marginLeft: Unit;

  constructor(index: number, flowableX: Unit, length: Unit, pageIndex: number, origin: Point, marginLeft: Unit) {
    this.index = index;
    this.flowableX = flowableX;
    this.length = length;
    this.pageIndex = pageIndex;
    this.origin = origin;
    this.marginLeft = marginLeft;
  }

  get endX(): Unit {
    return this.flowableX.plus(this.length);
  }
}

/** A position in a flowable's unbroken timeline space. */
export interface TimelinePosition {
  readonly flowable: Flowable;
  readonly x: Unit;
  readonly y: Unit;
}

/** A timeline position resolved onto the page and line that draws it. */
export interface PagePosition {
  readonly page: Page;
  readonly line: Line;
  /** Page-relative point, measured from the live-area origin. */
  readonly point: Point;
}

/** One planned render call for a breakable object. */
export interface SlicePlan {
  readonly kind: SliceKind;
  readonly line: Line;
  /** Offset into the object where this slice starts. */
  readonly objectX: Unit;
}

/**
 * A continuous horizontal timeline that wraps across lines and pages.
 *
 * Descendants are positioned in timeline space. Breaking walks the timeline
 * from zero, giving each line as much content as fits after the leading
 * margin its active controllers demand, and requests pages from the
 * document as each one fills up.
 */
export class Flowable extends PositionedObject {
  readonly yPadding: Unit;
  readonly breakThreshold: Unit;
  private _length: Unit;
  private _height: Unit;
  private readonly controllers: MarginController[] = [];
  private readonly explicitBreakOpportunities: Unit[] = [];
  private _state: FlowableState = 'unbroken';
  private _lines: Line[] = [];
  private brokenAtRevision = -1;

  constructor(pos: Point, parent: PositionedObject | undefined, length: Unit, height: Unit, options: FlowableOptions = {}) {
    super(pos, parent);
    this._length = length;
    this._height = height;
    this.yPadding = options.yPadding ?? DEFAULT_FLOWABLE_Y_PADDING;
    this.breakThreshold = options.breakThreshold ?? DEFAULT_BREAK_THRESHOLD;
  }

  override get kind(): ObjectKind {
    return 'flowable';
  }

  get length(): Unit {
    return this._length;
  }

  set length(value: Unit) {
    this._length = value;
    this.invalidate();
  }

  get height(): Unit {
    return this._height;
  }

  set height(value: Unit) {
    this._height = value;
    this.invalidate();
  }

  get state(): FlowableState {
    return this._state;
  }

  get marginControllers(): readonly MarginController[] {
    return this.controllers;
  }

  /** Lines covering the whole timeline, breaking first when stale. */
  get lines(): readonly Line[] {
    this.ensureBroken();
    return this._lines;
  }

  addMarginController(controller: MarginController): void {
    this.controllers.push(controller);
    this.invalidate();
  }

  /** Drop every controller registered under `layoutKey`. */
  removeMarginControllers(layoutKey: string): void {
    let removed = false;
    for (let index = this.controllers.length - 1; index >= 0; index -= 1) {
      if (this.controllers[index]?.layoutKey === layoutKey) {
        this.controllers.splice(index, 1);
        removed = true;
      }
    }
    if (removed) {
      this.invalidate();
    }
  }

  /** Declare a timeline position where a line may end early. */
  addBreakOpportunity(flowableX: Unit): void {
    this.explicitBreakOpportunities.push(flowableX);
    this.invalidate();
  }

  /** Explicit break opportunities plus those declared by descendants, ascending. */
  breakOpportunities(): Unit[] {
    const result = [...this.explicitBreakOpportunities];
    for (const descendant of this.descendants()) {
      if (descendant.isBreakOpportunity) {
        result.push(this.descendantPosX(descendant));
      }
    }
    return result.sort((left, right) => left.compare(right));
  }

  /** Margin a line starting at `x` must reserve. */
  marginNeededAt(x: Unit): Unit {
    return marginNeededAt(this.controllers, x);
  }

  /** Return to the unbroken state; the next line query re-breaks. */
  invalidate(): void {
    this._state = 'unbroken';
    this._lines = [];
  }

  override preRender(): void {
    this.invalidate();
  }

  timelinePosition(node: PositionedObject): TimelinePosition {
    const pos = this.descendantPos(node);
    return { flowable: this, x: pos.x, y: pos.y };
  }

  /** The line drawing timeline position `x`; the end of the timeline belongs to the last line. */
  lineAt(x: Unit): Line | undefined {
    const lines = this.lines;
    for (let index = lines.length - 1; index >= 0; index -= 1) {
      const line = lines[index];
      if (!line) {
        continue;
      }
      if (line.flowableX.le(x)) {
        const isLast = index === lines.length - 1;
        return x.lt(line.endX) || (isLast && x.le(line.endX)) ? line : undefined;
      }
    }
    return undefined;
  }

  /** Resolve a timeline position onto its page. */
  timelineToPage(pos: TimelinePosition): PagePosition {
    if (pos.flowable !== this) {
      throw new RangeError('Timeline position belongs to a different flowable.');
    }
    const line = this.lineAt(pos.x);
    if (!line) {
      throw new RangeError(`Timeline position x=${pos.x} lies outside the flowable.`);
    }
    const page = this.pageForLine(line);
    const point = line.origin.translate(pos.x.minus(line.flowableX), pos.y);
    return { page, line, point };
  }

  /** Document-space point for a timeline position. */
  timelineToDocument(pos: TimelinePosition): Point {
    const resolved = this.timelineToPage(pos);
    return resolved.page.pos.plus(resolved.point);
  }

  pageForLine(line: Line): Page {
    const page = this.page;
    if (!page) {
      throw new Error('Flowable is not placed on a page.');
    }
    return page.document.pages.get(line.pageIndex);
  }

  /**
   * Decide which slice render each line needs for an object spanning
   * `[start, start + length)` of the timeline.
   *
   * With `closesLine`, a zero-length object at a line's end is drawn on that
   * line instead of at the start of the next one.
   */
  planSlices(start: Unit, length: Unit, closesLine = false): SlicePlan[] {
    const lines = this.lines;
    const end = start.plus(length);
    const plans: SlicePlan[] = [];
    const closing = closesLine && length.isCloseTo(0);

    lines.forEach((line, index) => {
      const isLast = index === lines.length - 1;
      const closesThis = closing && start.isCloseTo(line.endX);
      const closedPrevious = closing && index > 0 && start.isCloseTo(line.flowableX);
      const startsHere =
        closesThis ||
        (!closedPrevious && start.ge(line.flowableX) && (start.lt(line.endX) || (isLast && start.le(line.endX))));
      if (startsHere) {
        const kind: SliceKind = end.le(line.endX) || isLast ? 'complete' : 'before-break';
        plans.push({ kind, line, objectX: ZERO });
        return;
      }
      if (start.lt(line.flowableX) && end.gt(line.flowableX)) {
        const kind: SliceKind = end.gt(line.endX) && !isLast ? 'spanning-continuation' : 'after-break';
        plans.push({ kind, line, objectX: line.flowableX.minus(start) });
      }
    });

    return plans;
  }

  /** Non-fatal findings about the current controller set. */
  layoutDiagnostics(): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    for (const controller of this.controllers) {
      if (controller.flowableX.gt(this._length)) {
        diagnostics.push({
          code: 'MARGIN_CONTROLLER_OUTSIDE_FLOWABLE',
          severity: 'info',
          message: `Margin controller '${controller.layoutKey}' at x=${controller.flowableX} lies beyond the flowable length ${this._length}.`,
          source: { flowableX: controller.flowableX.baseValue }
        });
      }
    }
    return diagnostics;
  }

  protected override onDescendantChanged(_changed: PositionedObject): void {
    this.invalidate();
  }

  /** Break into lines now unless the current lines are still valid. */
  ensureBroken(): void {
    const document = this.page?.document;
    if (this._state === 'broken' && (!document || document.revision === this.brokenAtRevision)) {
      return;
    }
    this._state = 'breaking';
    try {
      this._lines = this.breakLines();
      this._state = 'broken';
      this.brokenAtRevision = document?.revision ?? -1;
    } catch (error) {
      this.invalidate();
      throw error;
    }
  }

  /** Greedy line breaking over the whole timeline. */
  private breakLines(): Line[] {
    const startPage = this.page;
    if (!startPage) {
      throw new Error('Flowable must be placed on a page before it can be broken into lines.');
    }
    const document = startPage.document;
    const paper = startPage.paper;
    const liveWidth = BaseUnit.of(paper.liveWidth);
    const liveHeight = BaseUnit.of(paper.liveHeight);
    const height = BaseUnit.of(this._height);
    const length = BaseUnit.of(this._length);
    const gap = BaseUnit.of(this.yPadding);

    if (height.gt(liveHeight)) {
      throw new LayoutOverflowError(
        `Flowable height ${height} exceeds the page live height ${liveHeight}.`,
        0,
        liveHeight.baseValue,
        height.baseValue
      );
    }

    const start = startPage.descendantPos(this);
    const opportunities = this.breakOpportunities().map((x) => BaseUnit.of(x));
    const lines: Line[] = [];
    let pageIndex = startPage.index;
    let x = BaseUnit.zero;
    let lineX = BaseUnit.of(start.x);
    let lineY = BaseUnit.of(start.y);

    if (lineY.plus(height).gt(liveHeight)) {
      pageIndex += 1;
      document.pages.get(pageIndex);
      lineX = BaseUnit.zero;
      lineY = BaseUnit.zero;
    }

    for (;;) {
      const margin = BaseUnit.of(this.marginNeededAt(x));
      const available = liveWidth.minus(lineX).minus(margin);
      if (available.le(0)) {
        throw new LayoutOverflowError(
          `Line starting at flowable x=${x} needs a ${margin} margin but only ${liveWidth.minus(lineX)} is available.`,
          x.baseValue,
          liveWidth.minus(lineX).baseValue,
          margin.baseValue
        );
      }

      const remaining = length.minus(x);
      const lineLength = remaining.le(available) ? remaining : this.chooseLineLength(x, available, opportunities);
      lines.push(new Line(lines.length, x, lineLength, pageIndex, new Point(lineX.plus(margin), lineY), margin));
      x = x.plus(lineLength);
      if (x.ge(length)) {
        break;
      }

      lineX = BaseUnit.zero;
      lineY = lineY.plus(height).plus(gap);
      if (lineY.plus(height).gt(liveHeight)) {
        pageIndex += 1;
        document.pages.get(pageIndex);
        lineY = BaseUnit.zero;
      }
    }

    return lines;
  }

  /** Longest line that fits, pulled back to the last break opportunity within the threshold. */
  private chooseLineLength(x: Unit, available: Unit, opportunities: readonly Unit[]): Unit {
    const greedyEnd = x.plus(available);
    const lowest = greedyEnd.minus(this.breakThreshold);
    let chosen: Unit | undefined;
    for (const opportunity of opportunities) {
      if (opportunity.gt(x) && opportunity.gt(lowest) && opportunity.le(greedyEnd)) {
        chosen = opportunity;
      }
    }
    return chosen ? chosen.minus(x) : available;
  }
}

export function isFlowable(node: PositionedObject): node is Flowable {
  return node.kind === 'flowable';
}
