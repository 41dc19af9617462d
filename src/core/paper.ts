import { Mm, type Unit } from './units.js';

/** Margins around a page's live area. */
export interface PaperMargins {
  top: Unit;
  right: Unit;
  bottom: Unit;
  left: Unit;
}

/**
 * Physical page geometry.
 * The gutter is added to the inner margin: left on right-hand pages, right on left-hand pages.
 */
export class Paper {
  readonly width: Unit;
  readonly height: Unit;
  readonly margins: PaperMargins;
  readonly gutter: Unit;

  constructor(width: Unit, height: Unit, margins: PaperMargins, gutter: Unit = Mm.zero) {
    this.width = width;
    this.height = height;
    this.margins = margins;
    this.gutter = gutter;
  }

  /** Usable width between margins, excluding the gutter. */
  get liveWidth(): Unit {
    return this.width.minus(this.margins.left).minus(this.margins.right).minus(this.gutter);
  }

  get liveHeight(): Unit {
    return this.height.minus(this.margins.top).minus(this.margins.bottom);
  }

  /** Copy with selected fields replaced. */
  with(changes: Partial<{ width: Unit; height: Unit; margins: Partial<PaperMargins>; gutter: Unit }>): Paper {
    return new Paper(
      changes.width ?? this.width,
      changes.height ?? this.height,
      { ...this.margins, ...changes.margins },
      changes.gutter ?? this.gutter
    );
  }
}

/** Uniform margins in one length. */
export function uniformMargins(size: Unit): PaperMargins {
  return { top: size, right: size, bottom: size, left: size };
}

/** ISO A4 with 20 mm margins. */
export const A4 = new Paper(Mm.of(210), Mm.of(297), uniformMargins(Mm.of(20)));
/** US Letter with 20 mm margins. */
export const LETTER = new Paper(Mm.of(215.9), Mm.of(279.4), uniformMargins(Mm.of(20)));
