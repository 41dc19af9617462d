import type { Document } from './document.js';
import type { Paper } from './paper.js';
import { Point } from './point.js';
import { PositionedObject, type ObjectKind } from './positioned-object.js';
import { Rect } from './rect.js';
import type { Unit } from './units.js';

/** The side a page lies on when printed and bound. */
export type PageSide = 'left' | 'right';

/**
 * A document page.
 *
 * Pages are tree roots. A page's position is the top-left corner of its live
 * area in document space, so children are placed relative to the margins.
 * Pages are created by the document's page supplier, never directly.
 */
export class Page extends PositionedObject {
  readonly document: Document;
  readonly index: number;
  readonly paper: Paper;

  constructor(pos: Point, document: Document, index: number, paper: Paper) {
    super(pos);
    this.document = document;
    this.index = index;
    this.paper = paper;
  }

  override get kind(): ObjectKind {
    return 'page';
  }

  /** The first page is a right-hand page; sides alternate from there. */
  get side(): PageSide {
    return this.index % 2 === 0 ? 'right' : 'left';
  }

  /** Left margin including the gutter when the gutter is on the left. */
  get fullMarginLeft(): Unit {
    return this.side === 'right' ? this.paper.margins.left.plus(this.paper.gutter) : this.paper.margins.left;
  }

  /** Right margin including the gutter when the gutter is on the right. */
  get fullMarginRight(): Unit {
    return this.side === 'right' ? this.paper.margins.right : this.paper.margins.right.plus(this.paper.gutter);
  }

  /** Paper rectangle relative to the live-area origin. */
  get boundingRect(): Rect {
    return new Rect(this.fullMarginLeft.negate(), this.paper.margins.top.negate(), this.paper.width, this.paper.height);
  }

  /** Paper rectangle in document space. */
  get documentBoundingRect(): Rect {
    return this.boundingRect.offset(this.pos);
  }

  get rightMarginX(): Unit {
    return this.paper.liveWidth;
  }

  get centerX(): Unit {
    return this.paper.liveWidth.dividedBy(2);
  }
}

export function isPage(node: PositionedObject): node is Page {
  return node.kind === 'page';
}
