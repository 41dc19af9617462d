import { describe, expect, it } from 'vitest';

import { hasErrors } from '../../src/core/diagnostics.js';
import { Document } from '../../src/core/document.js';
import { LayoutOverflowError } from '../../src/core/errors.js';
import { Flowable } from '../../src/core/flowable.js';
import { MusicFont } from '../../src/core/music-font.js';
import { MusicText } from '../../src/core/music-text.js';
import { Paper, uniformMargins } from '../../src/core/paper.js';
import { Point } from '../../src/core/point.js';
import { PositionedObject } from '../../src/core/positioned-object.js';
import type { PathPrimitive } from '../../src/core/render-surface.js';
import { BaseUnit, makeUnitKind } from '../../src/core/units.js';
import { render } from '../../src/public/api.js';
import { RecordingBackend } from '../../src/testkit/recording-backend.js';
import { BarLine } from '../../src/western/bar-line.js';
import { Clef } from '../../src/western/clef.js';
import { KeySignature } from '../../src/western/key-signature.js';
import { Staff } from '../../src/western/staff.js';
import { TimeSignature } from '../../src/western/time-signature.js';

const at = (value: number) => BaseUnit.of(value);

/** Paper 300 x 200 with 10-unit margins: live area 280 x 180 starting at (10, 10). */
function makeDocument(): Document {
  return new Document({
    paper: new Paper(at(300), at(200), uniformMargins(at(10))),
    pageGap: at(20)
  });
}

function makeScene(length: number): { document: Document; flowable: Flowable; staff: Staff } {
  const document = makeDocument();
  const flowable = new Flowable(Point.of(0, 0), document.pages.get(0), at(length), at(40), {
    yPadding: at(10),
    breakThreshold: at(5)
  });
  const staff = new Staff(Point.of(0, 0), flowable, at(length), { lineSpacing: at(10) });
  return { document, flowable, staff };
}

/** Each move/line pair of a path as [x1, y1, x2, y2]. */
function segments(path: PathPrimitive | undefined): number[][] {
  const commands = path?.commands ?? [];
  const result: number[][] = [];
  for (let index = 0; index + 1 < commands.length; index += 2) {
    const from = commands[index];
    const to = commands[index + 1];
    if (from && to) {
      result.push([from.x, from.y, to.x, to.y]);
    }
  }
  return result;
}

class PostRenderCounter extends PositionedObject {
  postRenderCalls = 0;

  override postRender(): void {
    this.postRenderCalls += 1;
  }
}

describe('render pass', () => {
  it('draws a staff broken across three lines with its clef repeated at each start', () => {
    const { document, flowable, staff } = makeScene(500);
    new Clef(at(0), staff, 'treble');
    const backend = new RecordingBackend();

    const result = render(document, backend);

    expect(result).toEqual({ pageCount: 1, diagnostics: [] });
    expect(flowable.lines.map((line) => [line.flowableX.value, line.length.value, line.origin.x.value, line.origin.y.value])).toEqual([
      [0, 247.5, 32.5, 0],
      [247.5, 247.5, 32.5, 50],
      [495, 5, 32.5, 100]
    ]);

    const staffPaths = backend.paths('staff-lines');
    expect(staffPaths.map((path) => path.thickness)).toEqual([1.25, 1.25, 1.25]);
    expect(segments(staffPaths[0])).toEqual([
      [10, 10, 290, 10],
      [10, 20, 290, 20],
      [10, 30, 290, 30],
      [10, 40, 290, 40],
      [10, 50, 290, 50]
    ]);
    expect(segments(staffPaths[1])[0]).toEqual([10, 60, 290, 60]);
    expect(segments(staffPaths[2])).toEqual([
      [10, 110, 47.5, 110],
      [10, 120, 47.5, 120],
      [10, 130, 47.5, 130],
      [10, 140, 47.5, 140],
      [10, 150, 47.5, 150]
    ]);

    const clefs = backend.glyphs('clef');
    expect(clefs.map((glyph) => [glyph.x, glyph.y])).toEqual([
      [15, 40],
      [15, 90],
      [15, 140]
    ]);
    expect(clefs[0]).toMatchObject({ text: '\uE050', glyphNames: ['gClef'], fontFamily: 'Bravura', fontSize: 40 });
  });

  it('opens and closes every page around the drawing calls', () => {
    const { document, staff } = makeScene(100);
    new Clef(at(0), staff, 'treble');
    const backend = new RecordingBackend();

    render(document, backend);

    expect(backend.calls.map((call) => call.type)).toEqual(['beginPage', 'path', 'glyphs', 'endPage']);
    expect(backend.pages[0]).toEqual({
      index: 0,
      width: 300,
      height: 200,
      liveLeft: 10,
      liveTop: 10,
      liveWidth: 280,
      liveHeight: 180
    });
  });

  it('draws key signature accidentals in the fringe at their clef heights', () => {
    const { document, staff } = makeScene(200);
    new Clef(at(0), staff, 'treble');
    new KeySignature(at(0), staff, 2);
    const backend = new RecordingBackend();

    render(document, backend);

    expect(backend.glyphs('clef').map((glyph) => [glyph.x, glyph.y])).toEqual([[15, 40]]);
    expect(backend.glyphs('key-signature').map((glyph) => [glyph.x, glyph.y, glyph.glyphNames[0]])).toEqual([
      [47.5, 10, 'accidentalSharp'],
      [57.5, 25, 'accidentalSharp']
    ]);
    expect(segments(backend.paths('staff-lines')[0])[0]).toEqual([10, 10, 267.5, 10]);
  });

  it('draws a time signature at the line start in two rows', () => {
    const { document, flowable, staff } = makeScene(200);
    new Clef(at(0), staff, 'treble');
    new TimeSignature(at(0), staff, '4/4');
    const backend = new RecordingBackend();

    render(document, backend);

    expect(flowable.lines[0]?.marginLeft.value).toBe(55);
    expect(backend.glyphs('time-signature').map((glyph) => [glyph.x, glyph.y, glyph.text])).toEqual([
      [47.5, 20, '\uE084'],
      [47.5, 40, '\uE084']
    ]);
    expect(backend.glyphs('clef').map((glyph) => [glyph.x, glyph.y])).toEqual([[15, 40]]);
  });

  it('draws bar lines across the staff height', () => {
    const { document, staff } = makeScene(200);
    new Clef(at(0), staff, 'treble');
    new BarLine(at(100), [staff]);
    const backend = new RecordingBackend();

    render(document, backend);

    const bars = backend.paths('bar-line');
    expect(bars.map((path) => path.thickness)).toEqual([1.875]);
    expect(segments(bars[0])).toEqual([[142.5, 10, 142.5, 50]]);
  });

  it('ends a line with the bar line it breaks at', () => {
    const { document, flowable, staff } = makeScene(500);
    new Clef(at(0), staff, 'treble');
    new BarLine(at(245), [staff]);
    const backend = new RecordingBackend();

    render(document, backend);

    expect(flowable.lines.map((line) => [line.flowableX.value, line.length.value])).toEqual([
      [0, 245],
      [245, 247.5],
      [492.5, 7.5]
    ]);
    expect(backend.paths('bar-line').map(segments)).toEqual([[[287.5, 10, 287.5, 50]]]);
  });

  it('starts every staff at the live edge when a time signature sits just before a break', () => {
    const { document, flowable, staff } = makeScene(500);
    new Clef(at(0), staff, 'treble');
    new TimeSignature(at(240), staff, '4/4');
    const backend = new RecordingBackend();

    render(document, backend);

    expect(flowable.lines.map((line) => [line.flowableX.value, line.marginLeft.value])).toEqual([
      [0, 32.5],
      [247.5, 32.5],
      [495, 32.5]
    ]);
    expect(backend.paths('staff-lines').map((path) => path.commands[0]?.x)).toEqual([10, 10, 10]);
    expect(backend.glyphs('time-signature').map((glyph) => [glyph.x, glyph.y])).toEqual([
      [282.5, 20],
      [282.5, 40]
    ]);
  });

  it('draws objects outside flowables at their page position', () => {
    const document = makeDocument();
    const font = new MusicFont('Bravura', makeUnitKind('loose-text', at(10)));
    new MusicText(Point.of(20, 30), document.pages.get(0), 'noteheadBlack', font);
    const backend = new RecordingBackend();

    render(document, backend);

    expect(backend.glyphs('music-text').map((glyph) => [glyph.x, glyph.y, glyph.text])).toEqual([[30, 40, '\uE0A4']]);
  });

  it('warns about objects placed past the end of their flowable', () => {
    const { document, flowable } = makeScene(100);
    new PositionedObject(Point.of(150, 0), flowable);

    const result = render(document, new RecordingBackend());

    expect(result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.severity])).toEqual([
      ['OBJECT_OUTSIDE_FLOWABLE', 'warning']
    ]);
    expect(result.diagnostics[0]?.source).toEqual({ flowableX: 150, objectKind: 'object' });
    expect(hasErrors(result.diagnostics)).toBe(false);
  });

  it('reports an empty document', () => {
    const backend = new RecordingBackend();
    const result = render(new Document(), backend);
    expect(result.pageCount).toBe(0);
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['EMPTY_DOCUMENT']);
    expect(backend.calls).toEqual([]);
  });

  it('clears staff layout caches after the pass', () => {
    const { document, staff } = makeScene(100);
    new Clef(at(0), staff, 'treble');
    render(document, new RecordingBackend());
    expect(staff.modifiers.isBuilt).toBe(false);
  });

  it('runs post-render hooks when layout fails', () => {
    const document = makeDocument();
    const flowable = new Flowable(Point.of(0, 0), document.pages.get(0), at(100), at(300));
    const counter = new PostRenderCounter(Point.of(0, 0), flowable);

    expect(() => render(document, new RecordingBackend())).toThrow(LayoutOverflowError);
    expect(counter.postRenderCalls).toBe(1);
  });
});
