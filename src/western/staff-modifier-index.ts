import type { PositionedObject } from '../core/positioned-object.js';
import type { Unit } from '../core/units.js';
import { isClef, type Clef } from './clef.js';
import { isKeySignature, type KeySignature } from './key-signature.js';
import { isTimeSignature, type TimeSignature } from './time-signature.js';

/** A modifier and its x position relative to the staff. */
export interface ModifierEntry<T> {
  readonly x: Unit;
  readonly element: T;
}

interface ModifierLists {
  clefs: ModifierEntry<Clef>[];
  keySignatures: ModifierEntry<KeySignature>[];
  timeSignatures: ModifierEntry<TimeSignature>[];
}

/**
 * Per-staff lists of clefs, key signatures and time signatures, sorted by
 * position. Built on first query and dropped by `invalidate()`.
 */
export class StaffModifierIndex {
  private readonly owner: PositionedObject;
  private lists: ModifierLists | undefined;

  constructor(owner: PositionedObject) {
    this.owner = owner;
  }

  get isBuilt(): boolean {
    return this.lists !== undefined;
  }

  get clefs(): readonly ModifierEntry<Clef>[] {
    return this.build().clefs;
  }

  get keySignatures(): readonly ModifierEntry<KeySignature>[] {
    return this.build().keySignatures;
  }

  get timeSignatures(): readonly ModifierEntry<TimeSignature>[] {
    return this.build().timeSignatures;
  }

  /** Every modifier position, ascending, without duplicates. */
  positions(): Unit[] {
    const all = [...this.clefs, ...this.keySignatures, ...this.timeSignatures].map((entry) => entry.x);
    all.sort((left, right) => left.compare(right));
    return all.filter((x, index) => index === 0 || !x.isCloseTo(all[index - 1] ?? x));
  }

  invalidate(): void {
    this.lists = undefined;
  }

  private build(): ModifierLists {
    if (this.lists) {
      return this.lists;
    }
    const lists: ModifierLists = { clefs: [], keySignatures: [], timeSignatures: [] };
    for (const node of this.owner.descendants()) {
      if (isClef(node)) {
        lists.clefs.push(this.entry(node));
      } else if (isKeySignature(node)) {
        lists.keySignatures.push(this.entry(node));
      } else if (isTimeSignature(node)) {
        lists.timeSignatures.push(this.entry(node));
      }
    }
    // Stable sort keeps tree order for modifiers at the same position.
    lists.clefs.sort(byPosition);
    lists.keySignatures.sort(byPosition);
    lists.timeSignatures.sort(byPosition);
    this.lists = lists;
    return lists;
  }

  private entry<T extends PositionedObject>(element: T): ModifierEntry<T> {
    return { x: this.owner.descendantPosX(element), element };
  }
}

function byPosition<T>(left: ModifierEntry<T>, right: ModifierEntry<T>): number {
  return left.x.compare(right.x);
}

/** The last entry at or before `x` (within the position tolerance), scanning from the end. */
export function lastAtOrBefore<T>(entries: readonly ModifierEntry<T>[], x: Unit): T | undefined {
  for (let index = entries.length - 1; index >= 0; index -= 1) {
    const entry = entries[index];
    if (entry && entry.x.leOrClose(x)) {
      return entry.element;
    }
  }
  return undefined;
}

/** The last entry at `x`, within the position tolerance. */
export function exactlyAt<T>(entries: readonly ModifierEntry<T>[], x: Unit): T | undefined {
  for (let index = entries.length - 1; index >= 0; index -= 1) {
    const entry = entries[index];
    if (entry?.x.isCloseTo(x)) {
      return entry.element;
    }
  }
  return undefined;
}
