import type { MusicFont } from './music-font.js';
import type { Page } from './page.js';
import type { Point } from './point.js';
import { GraphicUnit, type Unit } from './units.js';

/** Page size and live-area offset, in graphic units, handed to backends. */
export interface PageGeometry {
  index: number;
  width: number;
  height: number;
  liveLeft: number;
  liveTop: number;
  liveWidth: number;
  liveHeight: number;
}

/** One path drawing instruction in paper coordinates. */
export interface PathCommand {
  op: 'move' | 'line';
  x: number;
  y: number;
}

/** A stroked path. Coordinates are graphic units from the paper's top-left corner. */
export interface PathPrimitive {
  pageIndex: number;
  className: string;
  thickness: number;
  commands: PathCommand[];
}

/** A run of music glyphs placed at its baseline origin. */
export interface GlyphPrimitive {
  pageIndex: number;
  className: string;
  x: number;
  y: number;
  text: string;
  glyphNames: string[];
  fontFamily: string;
  fontSize: number;
}

/**
 * Drawing backend collaborator. Layout never draws itself; it hands final
 * page geometry to one of these.
 */
export interface RenderBackend {
  beginPage(page: PageGeometry): void;
  drawPath(path: PathPrimitive): void;
  drawGlyphs(glyphs: GlyphPrimitive): void;
  endPage(pageIndex: number): void;
}

function graphic(length: Unit): number {
  return length.to(GraphicUnit).value;
}

/** Describe a page for a backend. */
export function pageGeometry(page: Page): PageGeometry {
  return {
    index: page.index,
    width: graphic(page.paper.width),
    height: graphic(page.paper.height),
    liveLeft: graphic(page.fullMarginLeft),
    liveTop: graphic(page.paper.margins.top),
    liveWidth: graphic(page.paper.liveWidth),
    liveHeight: graphic(page.paper.liveHeight)
  };
}

/**
 * Per-page drawing handle given to render methods.
 * Accepts live-area-relative points and emits paper-relative primitives.
 */
export class RenderSurface {
  readonly page: Page;
  private readonly backend: RenderBackend;
  private readonly geometry: PageGeometry;

  constructor(backend: RenderBackend, page: Page) {
    this.backend = backend;
    this.page = page;
    this.geometry = pageGeometry(page);
  }

  /** Stroke independent straight segments as one path. */
  drawLines(segments: ReadonlyArray<readonly [Point, Point]>, thickness: Unit, className: string): void {
    if (segments.length === 0) {
      return;
    }
    const commands: PathCommand[] = [];
    for (const [from, to] of segments) {
      commands.push({ op: 'move', ...this.toPaper(from) });
      commands.push({ op: 'line', ...this.toPaper(to) });
    }
    this.backend.drawPath({
      pageIndex: this.page.index,
      className,
      thickness: graphic(thickness),
      commands
    });
  }

  /** Draw a glyph run with its origin at `pos`. */
  drawGlyphs(pos: Point, font: MusicFont, glyphNames: readonly string[], className: string): void {
    if (glyphNames.length === 0) {
      return;
    }
    const { x, y } = this.toPaper(pos);
    this.backend.drawGlyphs({
      pageIndex: this.page.index,
      className,
      x,
      y,
      text: font.text(glyphNames),
      glyphNames: [...glyphNames],
      fontFamily: font.family,
      fontSize: graphic(font.emSize)
    });
  }

  private toPaper(point: Point): { x: number; y: number } {
    return {
      x: graphic(point.x) + this.geometry.liveLeft,
      y: graphic(point.y) + this.geometry.liveTop
    };
  }
}
