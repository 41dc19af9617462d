import { defaultGlyphMetrics, type GlyphMetricsProvider } from './glyph-metrics.js';
import type { PositionedObject } from './positioned-object.js';
import { Rect } from './rect.js';
import type { Unit, UnitKind } from './units.js';

/** SMuFL fonts are designed on a 4-staff-space em. */
const STAFF_SPACES_PER_EM = 4;

/**
 * A music font bound to a unit kind, normally the staff unit of the staff
 * using it. Glyph geometry comes from the metrics provider and is returned
 * in that unit.
 */
export class MusicFont {
  readonly family: string;
  readonly unit: UnitKind;
  readonly metrics: GlyphMetricsProvider;

  constructor(family: string, unit: UnitKind, metrics: GlyphMetricsProvider = defaultGlyphMetrics()) {
    this.family = family;
    this.unit = unit;
    this.metrics = metrics;
  }

  /** Font size: one em. */
  get emSize(): Unit {
    return this.unit.of(STAFF_SPACES_PER_EM);
  }

  glyphRect(glyphName: string): Rect {
    const box = this.metrics.boundingBox(glyphName);
    return Rect.of(box.x, box.y, box.width, box.height, this.unit);
  }

  /**
   * Bounds of glyphs set side by side, each advancing by its own width.
   * An empty run has zero size.
   */
  boundingRectOf(glyphNames: readonly string[]): Rect {
    if (glyphNames.length === 0) {
      return Rect.of(0, 0, 0, 0, this.unit);
    }
    let width = 0;
    let top = Number.POSITIVE_INFINITY;
    let bottom = Number.NEGATIVE_INFINITY;
    let left = 0;
    glyphNames.forEach((name, index) => {
      const box = this.metrics.boundingBox(name);
      if (index === 0) {
        left = box.x;
      }
      width += box.width;
      top = Math.min(top, box.y);
      bottom = Math.max(bottom, box.y + box.height);
    });
    return Rect.of(left, top, width, bottom - top, this.unit);
  }

  /** Drawable text for a glyph run. */
  text(glyphNames: readonly string[]): string {
    return glyphNames.map((name) => this.metrics.codepoint(name)).join('');
  }

  /** An engraving default in this font's unit, or the fallback when the table has none. */
  engravingDefault(name: string, fallback: number): Unit {
    return this.unit.of(this.metrics.engravingDefault(name) ?? fallback);
  }
}

/** Nearest music font at or above `node`. */
export function findMusicFont(node: PositionedObject | undefined): MusicFont | undefined {
  for (let current = node; current; current = current.parent) {
    const font = current.musicFont;
    if (font) {
      return font;
    }
  }
  return undefined;
}
