import { DisjointTreeError } from './errors.js';
import { isFlowable } from './flowable.js';
import { isPage } from './page.js';
import { ORIGIN, type Point } from './point.js';
import type { PositionedObject } from './positioned-object.js';
import type { Unit } from './units.js';

/**
 * Document-space position of `node`.
 * Nodes inside a flowable are resolved through the line that draws them.
 */
export function mapToDocument(node: PositionedObject): Point {
  const flowable = node.flowable;
  if (flowable) {
    return flowable.timelineToDocument(flowable.timelinePosition(node));
  }
  let pos = ORIGIN;
  for (let current: PositionedObject | undefined = node; current; current = current.parent) {
    pos = pos.plus(current.pos);
  }
  return pos;
}

/**
 * Offset from `source` to `destination`.
 *
 * When the two nodes meet at or inside a flowable, the offset is measured in
 * the flowable's unbroken timeline, so objects that wrap onto different lines
 * keep their logical distance. Otherwise both are mapped into document space.
 */
export function mapBetween(source: PositionedObject, destination: PositionedObject): Point {
  if (source === destination) {
    return ORIGIN;
  }
  const ancestor = commonAncestor(source, destination);
  if (!ancestor) {
    if (shareDocument(source, destination)) {
      return mapToDocument(destination).minus(mapToDocument(source));
    }
    throw new DisjointTreeError();
  }

  const meetsInsideFlowable = isFlowable(ancestor) || ancestor.flowable !== undefined;
  const crossesFlowable = source.flowable !== undefined || destination.flowable !== undefined;
  if (meetsInsideFlowable || !crossesFlowable) {
    return ancestor.descendantPos(destination).minus(ancestor.descendantPos(source));
  }
  return mapToDocument(destination).minus(mapToDocument(source));
}

/** A node's offset along its owning flowable's timeline. */
export function timelineX(node: PositionedObject): Unit {
  const flowable = node.flowable;
  if (!flowable) {
    throw new RangeError('Object is not inside a flowable.');
  }
  return flowable.descendantPosX(node);
}

/** Deepest node that is `left`, `right` or an ancestor of both. */
export function commonAncestor(left: PositionedObject, right: PositionedObject): PositionedObject | undefined {
  const leftChain = new Set<PositionedObject>([left, ...left.ancestors()]);
  if (leftChain.has(right)) {
    return right;
  }
  for (const ancestor of right.ancestors()) {
    if (leftChain.has(ancestor)) {
      return ancestor;
    }
  }
  return undefined;
}

/** True when both nodes hang from pages of the same document. */
function shareDocument(left: PositionedObject, right: PositionedObject): boolean {
  const leftRoot = left.root;
  const rightRoot = right.root;
  return isPage(leftRoot) && isPage(rightRoot) && leftRoot.document === rightRoot.document;
}
