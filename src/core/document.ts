import { Page } from './page.js';
import { A4, type Paper } from './paper.js';
import { Point } from './point.js';
import type { PositionedObject } from './positioned-object.js';
import { Mm, type Unit } from './units.js';

/** Document-level configuration. */
export interface DocumentOptions {
  paper?: Paper;
  /** Horizontal gap between consecutive pages in document space. */
  pageGap?: Unit;
}

/** Default horizontal gap between laid-out pages. */
export const DEFAULT_PAGE_GAP = Mm.of(10);

/**
 * Lazily creates pages on request.
 * Pages are laid out left to right in document space, separated by the page gap.
 */
export class PageSupplier {
  private readonly document: Document;
  private readonly pages: Page[] = [];

  constructor(document: Document) {
    this.document = document;
  }

  /** Number of pages created so far. */
  get length(): number {
    return this.pages.length;
  }

  /** Return page `index`, creating it and every page before it when missing. */
  get(index: number): Page {
    if (!Number.isInteger(index) || index < 0) {
      throw new RangeError(`Invalid page index ${index}.`);
    }
    while (this.pages.length <= index) {
      this.pages.push(this.createPage(this.pages.length));
    }
    const page = this.pages[index];
    if (!page) {
      throw new RangeError(`Page ${index} could not be created.`);
    }
    return page;
  }

  *[Symbol.iterator](): IterableIterator<Page> {
    yield* this.pages;
  }

  /** Drop every page. Objects parented to them stay attached to the old roots. */
  reset(): void {
    this.pages.length = 0;
  }

  private createPage(index: number): Page {
    const paper = this.document.paper;
    const gap = this.document.pageGap;
    const pageX = paper.width.plus(gap).times(index);
    // Provisional side for the margin; `Page.side` derives the same rule.
    const marginLeft = index % 2 === 0 ? paper.margins.left.plus(paper.gutter) : paper.margins.left;
    return new Page(new Point(pageX.plus(marginLeft), paper.margins.top), this.document, index, paper);
  }
}

/** Global document: paper geometry plus the pages content is laid out on. */
export class Document {
  readonly pages: PageSupplier;
  readonly pageGap: Unit;
  private _paper: Paper;
  private _revision = 0;

  constructor(options: DocumentOptions = {}) {
    this._paper = options.paper ?? A4;
    this.pageGap = options.pageGap ?? DEFAULT_PAGE_GAP;
    this.pages = new PageSupplier(this);
  }

  get paper(): Paper {
    return this._paper;
  }

  /**
   * Geometry revision. Changes whenever paper geometry changes so that cached
   * line layouts can detect staleness.
   */
  get revision(): number {
    return this._revision;
  }

  /**
   * Replace the paper. Existing pages are rebuilt with the new geometry and
   * their children are moved onto the replacements.
   */
  setPaper(paper: Paper): void {
    const previous = [...this.pages];
    this._paper = paper;
    this._revision += 1;
    this.pages.reset();
    for (const oldPage of previous) {
      const replacement = this.pages.get(oldPage.index);
      for (const child of [...oldPage.children]) {
        child.parent = replacement;
      }
    }
  }

  /** Every object below every page, pages first, in depth-first order. */
  allObjects(): PositionedObject[] {
    const result: PositionedObject[] = [];
    for (const page of this.pages) {
      result.push(page, ...page.descendants());
    }
    return result;
  }
}
