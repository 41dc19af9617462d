import { readFileSync } from 'node:fs';

import { GlyphMetricsError, UnknownGlyphError } from './errors.js';

/**
 * Glyph bounds in font units (staff spaces), y pointing down, relative to the
 * glyph's drawing origin on its baseline.
 */
export interface GlyphBoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Source of glyph geometry for one music font. */
export interface GlyphMetricsProvider {
  readonly fontName: string;
  hasGlyph(glyphName: string): boolean;
  boundingBox(glyphName: string): GlyphBoundingBox;
  /** The glyph's text, ready to be drawn in the font. */
  codepoint(glyphName: string): string;
  engravingDefault(name: string): number | undefined;
}

/** One validated glyph entry. */
interface GlyphEntry {
  text: string;
  box: GlyphBoundingBox;
}

/** Path of the bundled metrics table, relative to this module in both `src/` and `dist/`. */
const DEFAULT_METRICS_URL = new URL('../../data/glyph-metrics.json', import.meta.url);

let defaultTable: GlyphMetricsTable | undefined;

/** SMuFL-style metadata table: per-glyph codepoint and NE/SW bounding-box corners. */
export class GlyphMetricsTable implements GlyphMetricsProvider {
  readonly fontName: string;
  private readonly glyphs: ReadonlyMap<string, GlyphEntry>;
  private readonly engravingDefaults: ReadonlyMap<string, number>;

  private constructor(fontName: string, glyphs: Map<string, GlyphEntry>, engravingDefaults: Map<string, number>) {
    this.fontName = fontName;
    this.glyphs = glyphs;
    this.engravingDefaults = engravingDefaults;
  }

  /** Validate parsed JSON into a metrics table. */
  static parse(input: unknown, source: string): GlyphMetricsTable {
    if (!isRecord(input)) {
      throw new GlyphMetricsError(source, 'metrics must be a JSON object');
    }

    const fontName = input.fontName;
    if (typeof fontName !== 'string' || fontName.trim() === '') {
      throw new GlyphMetricsError(source, "missing or invalid 'fontName'");
    }

    const rawGlyphs = input.glyphs;
    if (!isRecord(rawGlyphs)) {
      throw new GlyphMetricsError(source, "'glyphs' must be an object");
    }

    const glyphs = new Map<string, GlyphEntry>();
    for (const [name, raw] of Object.entries(rawGlyphs)) {
      glyphs.set(name, parseGlyphEntry(source, name, raw));
    }

    const engravingDefaults = new Map<string, number>();
    const rawDefaults = input.engravingDefaults;
    if (rawDefaults !== undefined) {
      if (!isRecord(rawDefaults)) {
        throw new GlyphMetricsError(source, "'engravingDefaults' must be an object");
      }
      for (const [name, value] of Object.entries(rawDefaults)) {
        if (typeof value !== 'number' || !Number.isFinite(value)) {
          throw new GlyphMetricsError(source, `engraving default '${name}' must be a number`);
        }
        engravingDefaults.set(name, value);
      }
    }

    return new GlyphMetricsTable(fontName, glyphs, engravingDefaults);
  }

  hasGlyph(glyphName: string): boolean {
    return this.glyphs.has(glyphName);
  }

  boundingBox(glyphName: string): GlyphBoundingBox {
    return this.entry(glyphName).box;
  }

  codepoint(glyphName: string): string {
    return this.entry(glyphName).text;
  }

  engravingDefault(name: string): number | undefined {
    return this.engravingDefaults.get(name);
  }

  private entry(glyphName: string): GlyphEntry {
    const entry = this.glyphs.get(glyphName);
    if (!entry) {
      throw new UnknownGlyphError(glyphName);
    }
    return entry;
  }
}

/** Read and validate a metrics table from disk. */
export function loadGlyphMetrics(file: string | URL): GlyphMetricsTable {
  const source = typeof file === 'string' ? file : file.pathname;
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(file, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new GlyphMetricsError(source, `unreadable metrics file (${reason})`);
  }
  return GlyphMetricsTable.parse(parsed, source);
}

/** The bundled table, loaded once per process. */
export function defaultGlyphMetrics(): GlyphMetricsTable {
  defaultTable ??= loadGlyphMetrics(DEFAULT_METRICS_URL);
  return defaultTable;
}

function parseGlyphEntry(source: string, name: string, raw: unknown): GlyphEntry {
  if (!isRecord(raw)) {
    throw new GlyphMetricsError(source, `glyph '${name}' must be an object`);
  }
  const codepoint = raw.codepoint;
  if (typeof codepoint !== 'string' || !/^U\+[0-9A-Fa-f]{4,6}$/.test(codepoint)) {
    throw new GlyphMetricsError(source, `glyph '${name}' has an invalid codepoint`);
  }
  const ne = readPair(source, name, raw, 'bBoxNE');
  const sw = readPair(source, name, raw, 'bBoxSW');
  if (ne[0] < sw[0] || ne[1] < sw[1]) {
    throw new GlyphMetricsError(source, `glyph '${name}' has an inverted bounding box`);
  }
  return {
    text: String.fromCodePoint(Number.parseInt(codepoint.slice(2), 16)),
    box: {
      x: sw[0],
      y: -ne[1],
      width: ne[0] - sw[0],
      height: ne[1] - sw[1]
    }
  };
}

function readPair(source: string, name: string, raw: Record<string, unknown>, key: string): [number, number] {
  const value = raw[key];
  if (!Array.isArray(value) || value.length !== 2) {
    throw new GlyphMetricsError(source, `glyph '${name}' needs a two-number '${key}'`);
  }
  const [first, second]: unknown[] = value;
  if (typeof first !== 'number' || typeof second !== 'number') {
    throw new GlyphMetricsError(source, `glyph '${name}' needs a two-number '${key}'`);
  }
  return [first, second];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
