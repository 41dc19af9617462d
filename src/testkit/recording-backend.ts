import type { GlyphPrimitive, PageGeometry, PathPrimitive, RenderBackend } from '../core/render-surface.js';

/** One recorded backend call, in call order. */
export type RecordedCall =
  | { type: 'beginPage'; page: PageGeometry }
  | { type: 'path'; path: PathPrimitive }
  | { type: 'glyphs'; glyphs: GlyphPrimitive }
  | { type: 'endPage'; pageIndex: number };

/** Backend that keeps every primitive for assertions instead of drawing. */
export class RecordingBackend implements RenderBackend {
  readonly calls: RecordedCall[] = [];

  beginPage(page: PageGeometry): void {
    this.calls.push({ type: 'beginPage', page });
  }

  drawPath(path: PathPrimitive): void {
    this.calls.push({ type: 'path', path });
  }

  drawGlyphs(glyphs: GlyphPrimitive): void {
    this.calls.push({ type: 'glyphs', glyphs });
  }

  endPage(pageIndex: number): void {
    this.calls.push({ type: 'endPage', pageIndex });
  }

  get pages(): PageGeometry[] {
    return this.calls.flatMap((call) => (call.type === 'beginPage' ? [call.page] : []));
  }

  /** Paths with `className`, or all paths. */
  paths(className?: string): PathPrimitive[] {
    return this.calls.flatMap((call) =>
      call.type === 'path' && (className === undefined || call.path.className === className) ? [call.path] : []
    );
  }

  /** Glyph runs with `className`, or all runs. */
  glyphs(className?: string): GlyphPrimitive[] {
    return this.calls.flatMap((call) =>
      call.type === 'glyphs' && (className === undefined || call.glyphs.className === className) ? [call.glyphs] : []
    );
  }
}
