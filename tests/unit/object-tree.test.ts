import { describe, expect, it } from 'vitest';

import { Document } from '../../src/core/document.js';
import { DisjointTreeError } from '../../src/core/errors.js';
import { Flowable } from '../../src/core/flowable.js';
import { commonAncestor, mapBetween, mapToDocument, timelineX } from '../../src/core/mapping.js';
import { Paper, uniformMargins } from '../../src/core/paper.js';
import { Point } from '../../src/core/point.js';
import { PositionedObject } from '../../src/core/positioned-object.js';
import { BaseUnit } from '../../src/core/units.js';

function smallDocument(): Document {
  return new Document({
    paper: new Paper(BaseUnit.of(300), BaseUnit.of(200), uniformMargins(BaseUnit.of(10))),
    pageGap: BaseUnit.of(20)
  });
}

describe('positioned object tree', () => {
  it('tracks parents and children when re-parenting', () => {
    const root = new PositionedObject(Point.of(0, 0));
    const first = new PositionedObject(Point.of(1, 1), root);
    const second = new PositionedObject(Point.of(2, 2), root);
    const child = new PositionedObject(Point.of(3, 3), first);

    expect(root.children).toEqual([first, second]);
    child.parent = second;
    expect(first.children).toEqual([]);
    expect(second.children).toEqual([child]);
    expect(child.root).toBe(root);
    expect(root.descendants()).toEqual([first, second, child]);
  });

  it('refuses to create a cycle', () => {
    const root = new PositionedObject(Point.of(0, 0));
    const child = new PositionedObject(Point.of(0, 0), root);
    expect(() => {
      root.parent = child;
    }).toThrow(RangeError);
    expect(() => {
      root.parent = root;
    }).toThrow(RangeError);
  });

  it('sums local positions down to a descendant', () => {
    const root = new PositionedObject(Point.of(100, 100));
    const middle = new PositionedObject(Point.of(5, 5), root);
    const leaf = new PositionedObject(Point.of(10, 20), middle);
    const pos = root.descendantPos(leaf);
    expect(pos.x.value).toBe(15);
    expect(pos.y.value).toBe(25);
    expect(() => middle.descendantPos(root)).toThrow(RangeError);
  });

  it('detaches a subtree', () => {
    const root = new PositionedObject(Point.of(0, 0));
    const child = new PositionedObject(Point.of(0, 0), root);
    child.detach();
    expect(child.parent).toBeUndefined();
    expect(root.children).toEqual([]);
  });
});

describe('coordinate mapping', () => {
  it('maps objects on a page into document space', () => {
    const document = smallDocument();
    const outer = new PositionedObject(Point.of(5, 5), document.pages.get(0));
    const inner = new PositionedObject(Point.of(10, 20), outer);

    const pos = mapToDocument(inner);
    expect(pos.x.value).toBe(25);
    expect(pos.y.value).toBe(35);
    expect(mapBetween(outer, inner).equals(Point.of(10, 20))).toBe(true);
    expect(mapBetween(inner, outer).equals(Point.of(-10, -20))).toBe(true);
  });

  it('maps between pages through document space', () => {
    const document = smallDocument();
    const first = new PositionedObject(Point.of(15, 25), document.pages.get(0));
    const second = new PositionedObject(Point.of(0, 0), document.pages.get(1));

    // Page 0 live area starts at (10, 10); page 1 at (300 + 20 + 10, 10).
    const offset = mapBetween(first, second);
    expect(offset.x.value).toBe(305);
    expect(offset.y.value).toBe(-25);
  });

  it('throws for objects in unrelated trees', () => {
    const document = smallDocument();
    const placed = new PositionedObject(Point.of(0, 0), document.pages.get(0));
    const loose = new PositionedObject(Point.of(0, 0));
    expect(() => mapBetween(placed, loose)).toThrow(DisjointTreeError);
    expect(commonAncestor(placed, loose)).toBeUndefined();
  });

  it('measures timeline distance for objects on different lines', () => {
    const document = smallDocument();
    const flowable = new Flowable(Point.of(0, 0), document.pages.get(0), BaseUnit.of(500), BaseUnit.of(40), {
      yPadding: BaseUnit.of(10)
    });
    const early = new PositionedObject(Point.of(10, 0), flowable);
    const late = new PositionedObject(Point.of(300, 0), flowable);

    expect(flowable.lines.length).toBe(2);
    expect(mapBetween(early, late).x.value).toBe(290);
    expect(timelineX(late).value).toBe(300);

    // The second line starts at timeline x 280, 40 + 10 below the first.
    const pos = mapToDocument(late);
    expect(pos.x.value).toBe(30);
    expect(pos.y.value).toBe(60);
  });

  it('re-breaks the flowable when a descendant moves', () => {
    const document = smallDocument();
    const flowable = new Flowable(Point.of(0, 0), document.pages.get(0), BaseUnit.of(100), BaseUnit.of(40));
    const child = new PositionedObject(Point.of(10, 0), flowable);

    expect(flowable.lines.length).toBe(1);
    expect(flowable.state).toBe('broken');
    child.moveBy(5, 0);
    expect(flowable.state).toBe('unbroken');
    expect(child.x.value).toBe(15);
  });
});
