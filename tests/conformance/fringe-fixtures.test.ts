import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { executeLayoutFixture } from '../../src/testkit/layout-fixture-execution.js';
import { LayoutFixtureError, loadLayoutFixtures, parseLayoutFixture } from '../../src/testkit/layout-fixtures.js';

const FIXTURE_ROOT = path.resolve('fixtures/fringe');

describe('fringe layout fixtures', () => {
  const tempDirs: string[] = [];

  afterEach(async () => {
    await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  it('loads every fixture sorted by id', async () => {
    const records = await loadLayoutFixtures(FIXTURE_ROOT);
    expect(records.map((record) => record.fixture.id)).toEqual([
      'alto-three-flats',
      'clef-after-start',
      'group-independent-time-signatures',
      'group-treble-bass',
      'treble-only',
      'treble-two-sharps',
      'treble-two-sharps-four-four'
    ]);
  });

  it('matches every expected edge in active fixtures', async () => {
    const records = await loadLayoutFixtures(FIXTURE_ROOT);
    const results = records
      .filter((record) => record.fixture.status === 'active')
      .map((record) => executeLayoutFixture(record.fixture));

    expect(results.length).toBe(7);
    for (const result of results) {
      expect(result.mismatches, result.fixtureId).toEqual([]);
      expect(result.pass).toBe(true);
    }
  });

  it('reports mismatching edges', () => {
    const fixture = parseLayoutFixture('inline.yaml', {
      id: 'wrong-clef',
      staves: [{ id: 'only', clefs: [{ x: 0, type: 'treble' }] }],
      expect: [{ staff: 'only', edges: { clef: -2, key_signature: null } }]
    });
    const result = executeLayoutFixture(fixture);
    expect(result.pass).toBe(false);
    expect(result.mismatches).toEqual([{ staff: 'only', edge: 'clef', expected: -2, actual: -2.75 }]);
  });

  it('applies defaults to optional fields', () => {
    const fixture = parseLayoutFixture('inline.yaml', {
      id: 'defaults',
      staves: [{ id: 'only' }],
      expect: [{ staff: 'only', edges: { staff: -0.5 } }]
    });
    expect(fixture).toEqual({
      id: 'defaults',
      status: 'active',
      lineSpacing: 10,
      staffLength: 200,
      staves: [{ id: 'only', y: 0, clefs: [], keySignatures: [], timeSignatures: [] }],
      expect: [{ staff: 'only', edges: { staff: -0.5 } }]
    });
  });

  it('rejects fixtures naming unknown staves or clefs', () => {
    expect(() =>
      parseLayoutFixture('bad.yaml', {
        id: 'bad',
        staves: [{ id: 'only' }],
        expect: [{ staff: 'other', edges: { staff: 0 } }]
      })
    ).toThrow("Fixture error in bad.yaml: expect #1 names unknown staff 'other'");
    expect(() =>
      parseLayoutFixture('bad.yaml', {
        id: 'bad',
        staves: [{ id: 'only', clefs: [{ x: 0, type: 'soprano' }] }],
        expect: [{ staff: 'only', edges: { staff: 0 } }]
      })
    ).toThrow("Fixture error in bad.yaml: clefs #1 has unknown clef type 'soprano'");
  });

  it('raises a fixture error for malformed files', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'fringe-fixtures-'));
    tempDirs.push(dir);
    await writeFile(path.join(dir, 'broken.yaml'), 'id: broken\nstaves: []\nexpect: []\n', 'utf8');

    await expect(loadLayoutFixtures(dir)).rejects.toBeInstanceOf(LayoutFixtureError);
    await expect(loadLayoutFixtures(dir)).rejects.toThrow("'staves' must be a non-empty list");
  });
});
