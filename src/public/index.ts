export { render, renderToSVGPages } from './api.js';
export type { RenderPagesResult, RenderResult } from './api.js';

export { BaseUnit, GraphicUnit, Inch, makeUnitKind, Mm, POSITION_TOLERANCE, Unit, UnitKind, ZERO, convertValue } from '../core/units.js';
export type { UnitLike } from '../core/units.js';
export { ORIGIN, Point } from '../core/point.js';
export { Rect } from '../core/rect.js';
export {
  DisjointTreeError,
  GlyphMetricsError,
  LayoutOverflowError,
  NoClefError,
  TypeConversionError,
  UnknownGlyphError
} from '../core/errors.js';
export { hasErrors } from '../core/diagnostics.js';
export type { Diagnostic, DiagnosticSeverity, DiagnosticSource } from '../core/diagnostics.js';
export { PositionedObject } from '../core/positioned-object.js';
export type { ObjectKind } from '../core/positioned-object.js';
export { commonAncestor, mapBetween, mapToDocument, timelineX } from '../core/mapping.js';
export { A4, LETTER, Paper, uniformMargins } from '../core/paper.js';
export type { PaperMargins } from '../core/paper.js';
export { isPage, Page } from '../core/page.js';
export type { PageSide } from '../core/page.js';
export { DEFAULT_PAGE_GAP, Document, PageSupplier } from '../core/document.js';
export type { DocumentOptions } from '../core/document.js';
export {
  DEFAULT_BREAK_THRESHOLD,
  DEFAULT_FLOWABLE_Y_PADDING,
  Flowable,
  isFlowable,
  Line
} from '../core/flowable.js';
export type {
  FlowableOptions,
  FlowableState,
  PagePosition,
  SliceKind,
  SlicePlan,
  TimelinePosition
} from '../core/flowable.js';
export { isControllerActiveAt, marginNeededAt, resolveActiveControllers } from '../core/layout-controllers.js';
export type { MarginController } from '../core/layout-controllers.js';
export { defaultGlyphMetrics, GlyphMetricsTable, loadGlyphMetrics } from '../core/glyph-metrics.js';
export type { GlyphBoundingBox, GlyphMetricsProvider } from '../core/glyph-metrics.js';
export { findMusicFont, MusicFont } from '../core/music-font.js';
export { MusicText } from '../core/music-text.js';
export { pageGeometry, RenderSurface } from '../core/render-surface.js';
export type { GlyphPrimitive, PageGeometry, PathCommand, PathPrimitive, RenderBackend } from '../core/render-surface.js';
export { renderDocument } from '../core/render-pass.js';
export type { RenderPassResult } from '../core/render-pass.js';

export { DEFAULT_LINE_COUNT, DEFAULT_LINE_SPACING, DEFAULT_MUSIC_FONT_FAMILY, isStaff, Staff } from '../western/staff.js';
export type { StaffOptions } from '../western/staff.js';
export { StaffGroup } from '../western/staff-group.js';
export { StaffModifierIndex } from '../western/staff-modifier-index.js';
export type { ModifierEntry } from '../western/staff-modifier-index.js';
export {
  alignFringeLayout,
  computeIsolatedFringeLayout,
  DEFAULT_FRINGE_LAYOUT_OPTIONS
} from '../western/staff-fringe-layout.js';
export type { FringeLayoutOptions, StaffFringeLayout } from '../western/staff-fringe-layout.js';
export { Clef, CLEF_TYPES, isClef } from '../western/clef.js';
export type { ClefType, ClefTypeName } from '../western/clef.js';
export { isKeySignature, KeySignature, keySignatureType } from '../western/key-signature.js';
export type { KeyAccidental, KeySignatureType } from '../western/key-signature.js';
export { COMMON_TIME, CUT_TIME, isTimeSignature, numericMeter, parseMeter, TimeSignature } from '../western/time-signature.js';
export type { Meter, NumericMeter } from '../western/time-signature.js';
export { BarLine, isBarLine } from '../western/bar-line.js';

export { DEFAULT_SVG_SCALE, VexFlowSvgBackend } from '../vexflow/svg-backend.js';
export type { SvgRenderOptions } from '../vexflow/svg-backend.js';
