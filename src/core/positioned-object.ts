import type { Flowable, Line } from './flowable.js';
import type { MusicFont } from './music-font.js';
import type { Page } from './page.js';
import { ORIGIN, Point } from './point.js';
import type { RenderSurface } from './render-surface.js';
import { ZERO, type Unit, type UnitLike } from './units.js';

/**
 * Closed set of object variants.
 * Layout code branches on this instead of probing for marker properties.
 */
export type ObjectKind =
  | 'object'
  | 'page'
  | 'flowable'
  | 'staff'
  | 'music-text'
  | 'clef'
  | 'key-signature'
  | 'time-signature'
  | 'bar-line';

/**
 * A node in the ownership tree.
 *
 * Positions are local to the parent. Document-space position is the sum of
 * local positions up to the root page, except that a `Flowable` ancestor
 * re-routes its descendants through its line layout.
 */
export class PositionedObject {
  private _pos: Point;
  private _parent: PositionedObject | undefined;
  private readonly _children: PositionedObject[] = [];

  constructor(pos: Point, parent?: PositionedObject) {
    this._pos = pos;
    this._parent = undefined;
    if (parent) {
      this.parent = parent;
    }
  }

  /**
   * Variant tag. A getter rather than a field so it is already correct while
   * base constructors run and notify ancestors.
   */
  get kind(): ObjectKind {
    return 'object';
  }

  get pos(): Point {
    return this._pos;
  }

  set pos(value: Point) {
    this._pos = value;
    this.notifyAncestors(this);
  }

  get x(): Unit {
    return this._pos.x;
  }

  set x(value: Unit) {
    this.pos = this._pos.withX(value);
  }

  get y(): Unit {
    return this._pos.y;
  }

  set y(value: Unit) {
    this.pos = this._pos.withY(value);
  }

  get parent(): PositionedObject | undefined {
    return this._parent;
  }

  /** Re-parent this object. Former and new ancestors are both notified. */
  set parent(value: PositionedObject | undefined) {
    if (value === this._parent) {
      return;
    }
    if (value && (value === this || value.hasAncestor(this))) {
      throw new RangeError('Re-parenting would create a cycle in the object tree.');
    }
    this.detach();
    if (value) {
      this._parent = value;
      value._children.push(this);
      this.notifyAncestors(this);
    }
  }

  get children(): readonly PositionedObject[] {
    return this._children;
  }

  /** The tree's top node. */
  get root(): PositionedObject {
    let current: PositionedObject = this;
    while (current._parent) {
      current = current._parent;
    }
    return current;
  }

  /** Nearest page at or above this object. */
  get page(): Page | undefined {
    return isPageNode(this) ? this : this.firstAncestor(isPageNode);
  }

  /** Nearest flowable strictly above this object. */
  get flowable(): Flowable | undefined {
    return this.firstAncestor(isFlowableNode);
  }

  /** Music font used by glyphs inside this object, if this object supplies one. */
  get musicFont(): MusicFont | undefined {
    return undefined;
  }

  /** Timeline extent this object occupies when placed inside a flowable. */
  get breakableLength(): Unit {
    return ZERO;
  }

  /** Whether a flowable may end a line at this object's timeline position. */
  get isBreakOpportunity(): boolean {
    return false;
  }

  /** When a line ends exactly here, draw this object on that line rather than the next. */
  get closesLine(): boolean {
    return false;
  }

  /** Ancestors from the parent up to the root. */
  *ancestors(): IterableIterator<PositionedObject> {
    let current = this._parent;
    while (current) {
      yield current;
      current = current._parent;
    }
  }

  hasAncestor(candidate: PositionedObject): boolean {
    for (const ancestor of this.ancestors()) {
      if (ancestor === candidate) {
        return true;
      }
    }
    return false;
  }

  firstAncestor<T extends PositionedObject>(predicate: (node: PositionedObject) => node is T): T | undefined {
    for (const ancestor of this.ancestors()) {
      if (predicate(ancestor)) {
        return ancestor;
      }
    }
    return undefined;
  }

  /** All descendants in depth-first pre-order. */
  descendants(): PositionedObject[] {
    const result: PositionedObject[] = [];
    const walk = (node: PositionedObject): void => {
      for (const child of node._children) {
        result.push(child);
        walk(child);
      }
    };
    walk(this);
    return result;
  }

  /** Position of `descendant` relative to this object, summed through the tree. */
  descendantPos(descendant: PositionedObject): Point {
    let pos = ORIGIN;
    let current: PositionedObject | undefined = descendant;
    while (current && current !== this) {
      pos = pos.plus(current._pos);
      current = current._parent;
    }
    if (current !== this) {
      throw new RangeError('Object is not a descendant of this node.');
    }
    return pos;
  }

  descendantPosX(descendant: PositionedObject): Unit {
    return this.descendantPos(descendant).x;
  }

  /** Remove this subtree from its parent. Former ancestors are notified. */
  detach(): void {
    const former = this._parent;
    if (!former) {
      return;
    }
    const index = former._children.indexOf(this);
    if (index >= 0) {
      former._children.splice(index, 1);
    }
    this._parent = undefined;
    former.onDescendantChanged(this);
    for (const ancestor of former.ancestors()) {
      ancestor.onDescendantChanged(this);
    }
  }

  /** Move by a relative offset. */
  moveBy(dx: UnitLike, dy: UnitLike): void {
    this.pos = this._pos.translate(dx, dy);
  }

  /** Called before layout of every render pass. */
  preRender(): void {}

  /** Called after every object's `preRender`, before flowables are broken into lines. */
  registerLayoutControllers(): void {}

  /** Called after every render pass, including failed ones. */
  postRender(): void {}

  /** Draw the whole object, which fits on one line or lives outside any flowable. */
  renderComplete(_surface: RenderSurface, _pos: Point, _line?: Line): void {}

  /** Draw the part of the object from its start to the end of `line`. */
  renderBeforeBreak(surface: RenderSurface, pos: Point, line: Line, _flowableX: Unit): void {
    this.renderComplete(surface, pos, line);
  }

  /** Draw a middle part of an object that started before `line` and ends after it. */
  renderSpanningContinuation(_surface: RenderSurface, _pos: Point, _line: Line, _objectX: Unit): void {}

  /** Draw the final part of an object that started before `line`. */
  renderAfterBreak(_surface: RenderSurface, _pos: Point, _line: Line, _objectX: Unit): void {}

  /** Hook for ancestors; `changed` was added, removed or moved somewhere below. */
  protected onDescendantChanged(_changed: PositionedObject): void {}

  private notifyAncestors(changed: PositionedObject): void {
    for (const ancestor of this.ancestors()) {
      ancestor.onDescendantChanged(changed);
    }
  }
}

function isPageNode(node: PositionedObject): node is Page {
  return node.kind === 'page';
}

function isFlowableNode(node: PositionedObject): node is Flowable {
  return node.kind === 'flowable';
}
