/** Raised when a unit is built from something that is neither a number nor a unit. */
export class TypeConversionError extends Error {
  readonly value: unknown;
  readonly targetKind: string;

  constructor(value: unknown, targetKind: string) {
    super(`Cannot convert ${describeValue(value)} to ${targetKind}.`);
    this.name = 'TypeConversionError';
    this.value = value;
    this.targetKind = targetKind;
  }
}

/** Raised when mapping between two positioned objects that share no ancestor. */
export class DisjointTreeError extends Error {
  constructor(message = 'Objects do not share a common ancestor.') {
    super(message);
    this.name = 'DisjointTreeError';
  }
}

/** Raised when a staff position query needs a clef and none is active. */
export class NoClefError extends Error {
  /** Staff-relative x of the failed query, in base units. */
  readonly staffX: number;

  constructor(staffX: number) {
    super(`No clef is active at staff position x=${staffX}.`);
    this.name = 'NoClefError';
    this.staffX = staffX;
  }
}

/** Raised when the line breaker cannot fit content onto a page. */
export class LayoutOverflowError extends Error {
  /** Timeline position where layout stalled, in base units. */
  readonly flowableX: number;
  readonly availableWidth: number;
  readonly neededWidth: number;

  constructor(message: string, flowableX: number, availableWidth: number, neededWidth: number) {
    super(message);
    this.name = 'LayoutOverflowError';
    this.flowableX = flowableX;
    this.availableWidth = availableWidth;
    this.neededWidth = neededWidth;
  }
}

/** Raised for a malformed glyph metrics table. */
export class GlyphMetricsError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`Glyph metrics error in ${source}: ${message}`);
    this.name = 'GlyphMetricsError';
    this.source = source;
  }
}

/** Raised when a glyph name is missing from the metrics table. */
export class UnknownGlyphError extends Error {
  readonly glyphName: string;

  constructor(glyphName: string) {
    super(`Unknown glyph '${glyphName}'.`);
    this.name = 'UnknownGlyphError';
    this.glyphName = glyphName;
  }
}

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'string') {
    return `string '${value}'`;
  }
  if (typeof value === 'number') {
    return `non-finite number ${value}`;
  }
  return typeof value;
}
