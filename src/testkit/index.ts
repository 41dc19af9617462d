export { RecordingBackend } from './recording-backend.js';
export type { RecordedCall } from './recording-backend.js';
export {
  extractSvgStrokes,
  extractSvgTexts,
  horizontalSegments,
  segmentsFromPathData,
  verticalSegments
} from './svg-geometry.js';
export type { SvgSegment, SvgStroke, SvgText } from './svg-geometry.js';
export { FRINGE_EDGES, LayoutFixtureError, loadLayoutFixtures, parseLayoutFixture } from './layout-fixtures.js';
export type {
  FixtureExpectation,
  FixtureStaff,
  FixtureStatus,
  FringeEdgeName,
  LayoutFixture,
  LayoutFixtureRecord
} from './layout-fixtures.js';
export { buildFixtureScene, executeLayoutFixture } from './layout-fixture-execution.js';
export type { EdgeMismatch, FixtureScene, LayoutFixtureResult } from './layout-fixture-execution.js';
