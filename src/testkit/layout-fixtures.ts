import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';

import { CLEF_TYPES, type ClefTypeName } from '../western/clef.js';

/** Fixture activation status in the fringe suite. */
export type FixtureStatus = 'active' | 'skip';

/** Fringe edges a fixture can assert, named as in the YAML files. */
export const FRINGE_EDGES = ['staff', 'clef', 'key_signature', 'time_signature'] as const;
export type FringeEdgeName = (typeof FRINGE_EDGES)[number];

export interface FixtureClef {
  x: number;
  type: ClefTypeName;
}

export interface FixtureKeySignature {
  x: number;
  fifths: number;
}

export interface FixtureTimeSignature {
  x: number;
  meter: string;
}

/** One staff of a fixture scene. Positions are base units. */
export interface FixtureStaff {
  id: string;
  y: number;
  clefs: FixtureClef[];
  keySignatures: FixtureKeySignature[];
  timeSignatures: FixtureTimeSignature[];
}

/** Expected fringe edges, in staff spaces, for one staff. `null` means the edge is absent. */
export interface FixtureExpectation {
  staff: string;
  edges: Partial<Record<FringeEdgeName, number | null>>;
}

/** A validated fringe fixture. */
export interface LayoutFixture {
  id: string;
  description?: string;
  status: FixtureStatus;
  /** Staff line spacing in base units. */
  lineSpacing: number;
  staffLength: number;
  staves: FixtureStaff[];
  group?: string[];
  expect: FixtureExpectation[];
}

export interface LayoutFixtureRecord {
  filePath: string;
  fixture: LayoutFixture;
}

/** Validation error for malformed fringe fixtures. */
export class LayoutFixtureError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Fixture error in ${filePath}: ${message}`);
    this.name = 'LayoutFixtureError';
    this.filePath = filePath;
  }
}

const FIXTURE_SUFFIXES = ['.yaml', '.yml'];
const DEFAULT_LINE_SPACING = 10;
const DEFAULT_STAFF_LENGTH = 200;

/** Load and validate every fixture under `rootDir`, sorted by id. */
export async function loadLayoutFixtures(rootDir: string): Promise<LayoutFixtureRecord[]> {
  const files = await findFixtureFiles(rootDir);
  const records: LayoutFixtureRecord[] = [];
  for (const filePath of files) {
    const raw = await readFile(filePath, 'utf8');
    let parsed: unknown;
    try {
      parsed = parseYaml(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new LayoutFixtureError(filePath, `invalid YAML (${reason})`);
    }
    records.push({ filePath, fixture: parseLayoutFixture(filePath, parsed) });
  }
  records.sort((left, right) => left.fixture.id.localeCompare(right.fixture.id));
  return records;
}

/** Validate parsed YAML into a fixture. */
export function parseLayoutFixture(filePath: string, input: unknown): LayoutFixture {
  if (!isRecord(input)) {
    throw new LayoutFixtureError(filePath, 'fixture must be a YAML object');
  }

  const id = readRequiredString(filePath, input, 'id');
  const statusRaw = readOptionalString(filePath, input, 'status') ?? 'active';
  if (statusRaw !== 'active' && statusRaw !== 'skip') {
    throw new LayoutFixtureError(filePath, "'status' must be 'active' or 'skip'");
  }

  const stavesRaw = input.staves;
  if (!Array.isArray(stavesRaw) || stavesRaw.length === 0) {
    throw new LayoutFixtureError(filePath, "'staves' must be a non-empty list");
  }
  const staves = stavesRaw.map((raw: unknown, index) => parseStaff(filePath, raw, index));
  const staffIds = new Set(staves.map((staff) => staff.id));
  if (staffIds.size !== staves.length) {
    throw new LayoutFixtureError(filePath, 'staff ids must be unique');
  }

  const fixture: LayoutFixture = {
    id,
    status: statusRaw,
    lineSpacing: readOptionalNumber(filePath, input, 'line_spacing') ?? DEFAULT_LINE_SPACING,
    staffLength: readOptionalNumber(filePath, input, 'staff_length') ?? DEFAULT_STAFF_LENGTH,
    staves,
    expect: parseExpectations(filePath, input.expect, staffIds)
  };

  const description = readOptionalString(filePath, input, 'description');
  if (description !== undefined) {
    fixture.description = description;
  }
  if (input.group !== undefined && input.group !== null) {
    fixture.group = parseGroup(filePath, input.group, staffIds);
  }
  return fixture;
}

async function findFixtureFiles(rootDir: string): Promise<string[]> {
  const matches: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
        continue;
      }
      if (FIXTURE_SUFFIXES.some((suffix) => entry.name.endsWith(suffix))) {
        matches.push(fullPath);
      }
    }
  }

  await walk(rootDir);
  return matches;
}

function parseStaff(filePath: string, raw: unknown, index: number): FixtureStaff {
  if (!isRecord(raw)) {
    throw new LayoutFixtureError(filePath, `staff #${index + 1} must be an object`);
  }
  return {
    id: readRequiredString(filePath, raw, 'id'),
    y: readOptionalNumber(filePath, raw, 'y') ?? 0,
    clefs: readList(filePath, raw, 'clefs', (item, where) => ({
      x: readRequiredNumber(filePath, item, 'x', where),
      type: readClefType(filePath, item, where)
    })),
    keySignatures: readList(filePath, raw, 'key_signatures', (item, where) => ({
      x: readRequiredNumber(filePath, item, 'x', where),
      fifths: readRequiredNumber(filePath, item, 'fifths', where)
    })),
    timeSignatures: readList(filePath, raw, 'time_signatures', (item, where) => ({
      x: readRequiredNumber(filePath, item, 'x', where),
      meter: readRequiredString(filePath, item, 'meter', where)
    }))
  };
}

function parseGroup(filePath: string, raw: unknown, staffIds: ReadonlySet<string>): string[] {
  if (!Array.isArray(raw)) {
    throw new LayoutFixtureError(filePath, "'group' must be a list of staff ids");
  }
  return raw.map((value: unknown) => {
    if (typeof value !== 'string' || !staffIds.has(value)) {
      throw new LayoutFixtureError(filePath, `'group' names unknown staff '${String(value)}'`);
    }
    return value;
  });
}

function parseExpectations(filePath: string, raw: unknown, staffIds: ReadonlySet<string>): FixtureExpectation[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new LayoutFixtureError(filePath, "'expect' must be a non-empty list");
  }
  return raw.map((item: unknown, index) => {
    const where = `expect #${index + 1}`;
    if (!isRecord(item)) {
      throw new LayoutFixtureError(filePath, `${where} must be an object`);
    }
    const staff = readRequiredString(filePath, item, 'staff', where);
    if (!staffIds.has(staff)) {
      throw new LayoutFixtureError(filePath, `${where} names unknown staff '${staff}'`);
    }
    const edgesRaw = item.edges;
    if (!isRecord(edgesRaw)) {
      throw new LayoutFixtureError(filePath, `${where} needs an 'edges' object`);
    }
    const edges: Partial<Record<FringeEdgeName, number | null>> = {};
    for (const [name, value] of Object.entries(edgesRaw)) {
      const edge = FRINGE_EDGES.find((candidate) => candidate === name);
      if (!edge) {
        throw new LayoutFixtureError(filePath, `${where} has unknown edge '${name}'`);
      }
      if (value !== null && (typeof value !== 'number' || !Number.isFinite(value))) {
        throw new LayoutFixtureError(filePath, `${where} edge '${name}' must be a number or null`);
      }
      edges[edge] = value;
    }
    return { staff, edges };
  });
}

function readList<T>(
  filePath: string,
  obj: Record<string, unknown>,
  key: string,
  parseItem: (item: Record<string, unknown>, where: string) => T
): T[] {
  const value = obj[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new LayoutFixtureError(filePath, `'${key}' must be a list`);
  }
  return value.map((item: unknown, index) => {
    const where = `${key} #${index + 1}`;
    if (!isRecord(item)) {
      throw new LayoutFixtureError(filePath, `${where} must be an object`);
    }
    return parseItem(item, where);
  });
}

function readClefType(filePath: string, obj: Record<string, unknown>, where: string): ClefTypeName {
  const value = readRequiredString(filePath, obj, 'type', where);
  const known = Object.values(CLEF_TYPES).find((clefType) => clefType.name === value);
  if (!known) {
    throw new LayoutFixtureError(filePath, `${where} has unknown clef type '${value}'`);
  }
  return known.name;
}

function readRequiredString(filePath: string, obj: Record<string, unknown>, key: string, where?: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new LayoutFixtureError(filePath, `${prefix(where)}missing or invalid '${key}'`);
  }
  return value;
}

function readOptionalString(filePath: string, obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new LayoutFixtureError(filePath, `'${key}' must be a string`);
  }
  return value;
}

function readRequiredNumber(filePath: string, obj: Record<string, unknown>, key: string, where?: string): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new LayoutFixtureError(filePath, `${prefix(where)}missing or invalid '${key}'`);
  }
  return value;
}

function readOptionalNumber(filePath: string, obj: Record<string, unknown>, key: string): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new LayoutFixtureError(filePath, `'${key}' must be a number`);
  }
  return value;
}

function prefix(where: string | undefined): string {
  return where ? `${where}: ` : '';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
