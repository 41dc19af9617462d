import type { Line } from './flowable.js';
import { findMusicFont, type MusicFont } from './music-font.js';
import type { Point } from './point.js';
import { PositionedObject, type ObjectKind } from './positioned-object.js';
import type { Rect } from './rect.js';
import type { RenderSurface } from './render-surface.js';

/**
 * A run of music-font glyphs.
 *
 * Without an explicit font, the parent or one of its ancestors must supply one
 * (a staff does).
 */
export class MusicText extends PositionedObject {
  private _glyphNames: string[];
  private readonly _font: MusicFont;

  constructor(pos: Point, parent: PositionedObject | undefined, glyphNames: string | readonly string[], font?: MusicFont) {
    super(pos, parent);
    const resolved = font ?? findMusicFont(parent);
    if (!resolved) {
      throw new Error('MusicText needs a font or an ancestor with a music font.');
    }
    this._font = resolved;
    this._glyphNames = typeof glyphNames === 'string' ? [glyphNames] : [...glyphNames];
    // Fail early on glyphs the font cannot measure.
    this._font.boundingRectOf(this._glyphNames);
  }

  override get kind(): ObjectKind {
    return 'music-text';
  }

  override get musicFont(): MusicFont {
    return this._font;
  }

  get glyphNames(): readonly string[] {
    return this._glyphNames;
  }

  set glyphNames(value: readonly string[]) {
    this._font.boundingRectOf(value);
    this._glyphNames = [...value];
  }

  /** Bounds relative to this object's position. */
  get boundingRect(): Rect {
    return this._font.boundingRectOf(this._glyphNames);
  }

  override renderComplete(surface: RenderSurface, pos: Point, _line?: Line): void {
    surface.drawGlyphs(pos, this._font, this._glyphNames, 'music-text');
  }
}
