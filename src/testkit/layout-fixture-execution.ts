import { Document } from '../core/document.js';
import { Flowable } from '../core/flowable.js';
import { Point } from '../core/point.js';
import { BaseUnit, type Unit } from '../core/units.js';
import { Clef } from '../western/clef.js';
import { KeySignature } from '../western/key-signature.js';
import { Staff } from '../western/staff.js';
import type { StaffFringeLayout } from '../western/staff-fringe-layout.js';
import { StaffGroup } from '../western/staff-group.js';
import { TimeSignature } from '../western/time-signature.js';
import { FRINGE_EDGES, type FringeEdgeName, type LayoutFixture } from './layout-fixtures.js';

/** Objects built from a fixture. */
export interface FixtureScene {
  document: Document;
  flowable: Flowable;
  staves: Map<string, Staff>;
  group: StaffGroup | undefined;
}

export interface EdgeMismatch {
  staff: string;
  edge: FringeEdgeName;
  expected: number | null;
  actual: number | null;
}

export interface LayoutFixtureResult {
  fixtureId: string;
  pass: boolean;
  mismatches: EdgeMismatch[];
}

const FLOWABLE_HEIGHT = 100;
const DEFAULT_TOLERANCE = 1e-9;

/** Build a document with one flowable holding the fixture's staves. */
export function buildFixtureScene(fixture: LayoutFixture): FixtureScene {
  const document = new Document();
  const length = BaseUnit.of(fixture.staffLength);
  const flowable = new Flowable(Point.of(0, 0), document.pages.get(0), length, BaseUnit.of(FLOWABLE_HEIGHT));
  const staves = new Map<string, Staff>();

  for (const staffFixture of fixture.staves) {
    const staff = new Staff(Point.of(0, staffFixture.y), flowable, length, { lineSpacing: BaseUnit.of(fixture.lineSpacing) });
    staffFixture.clefs.forEach((clef) => new Clef(BaseUnit.of(clef.x), staff, clef.type));
    staffFixture.keySignatures.forEach((key) => new KeySignature(BaseUnit.of(key.x), staff, key.fifths));
    staffFixture.timeSignatures.forEach((time) => new TimeSignature(BaseUnit.of(time.x), staff, time.meter));
    staves.set(staffFixture.id, staff);
  }

  let group: StaffGroup | undefined;
  if (fixture.group) {
    group = new StaffGroup(fixture.group.flatMap((id) => staves.get(id) ?? []));
  }
  return { document, flowable, staves, group };
}

/** Compare each expected edge with the staff's fringe layout outside any line. */
export function executeLayoutFixture(fixture: LayoutFixture, tolerance = DEFAULT_TOLERANCE): LayoutFixtureResult {
  const scene = buildFixtureScene(fixture);
  const mismatches: EdgeMismatch[] = [];

  for (const expectation of fixture.expect) {
    const staff = scene.staves.get(expectation.staff);
    if (!staff) {
      continue;
    }
    const layout = staff.fringeLayoutAt();
    for (const edge of FRINGE_EDGES) {
      const expected = expectation.edges[edge];
      if (expected === undefined) {
        continue;
      }
      const actual = edgeValue(staff, layout, edge);
      const matches =
        expected === null || actual === null ? expected === actual : Math.abs(expected - actual) <= tolerance;
      if (!matches) {
        mismatches.push({ staff: expectation.staff, edge, expected, actual });
      }
    }
  }

  return { fixtureId: fixture.id, pass: mismatches.length === 0, mismatches };
}

/** An edge in staff spaces, or null when absent. */
function edgeValue(staff: Staff, layout: StaffFringeLayout, edge: FringeEdgeName): number | null {
  const value: Unit | undefined = {
    staff: layout.staff,
    clef: layout.clef,
    key_signature: layout.keySignature,
    time_signature: layout.timeSignature
  }[edge];
  return value === undefined ? null : staff.unit(value).value;
}
