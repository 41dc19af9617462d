import type { Flowable, Line } from '../core/flowable.js';
import type { Staff } from './staff.js';
import { alignFringeLayouts, clearFringeControllers, registerFringeControllers, type StaffFringeLayout } from './staff-fringe-layout.js';

let nextGroupId = 1;

/**
 * Staves whose fringes start at the same x on every line.
 *
 * Aligned layouts are computed for all members at once and cached per line.
 * Any member's change drops the whole cache.
 */
export class StaffGroup {
  readonly id: string;
  private readonly members: Staff[] = [];
  private readonly cache = new Map<Line | null, Map<Staff, StaffFringeLayout>>();
  private controllersRegistered = false;

  constructor(staves: readonly Staff[] = []) {
    this.id = `group-${nextGroupId++}`;
    staves.forEach((staff) => this.addStaff(staff));
  }

  get staves(): readonly Staff[] {
    return this.members;
  }

  get layoutKey(): string {
    return `fringe:${this.id}`;
  }

  addStaff(staff: Staff): void {
    if (this.members.includes(staff)) {
      return;
    }
    staff.group?.removeStaff(staff);
    const flowable = staff.flowable;
    if (flowable) {
      clearFringeControllers(flowable, staff.layoutKey);
    }
    this.members.push(staff);
    staff.assignGroup(this);
    this.invalidate();
  }

  removeStaff(staff: Staff): void {
    const index = this.members.indexOf(staff);
    if (index < 0) {
      return;
    }
    this.members.splice(index, 1);
    staff.assignGroup(undefined);
    const flowable = staff.flowable;
    if (flowable) {
      clearFringeControllers(flowable, this.layoutKey);
    }
    this.invalidate();
  }

  /** Aligned fringe edges for `staff` on `line`. */
  fringeLayoutAt(staff: Staff, line?: Line): StaffFringeLayout {
    if (!this.members.includes(staff)) {
      throw new RangeError(`Staff ${staff.id} is not a member of ${this.id}.`);
    }
    const key = line ?? null;
    let aligned = this.cache.get(key);
    if (!aligned) {
      const isolated = new Map<Staff, StaffFringeLayout>();
      for (const member of this.members) {
        isolated.set(member, member.isolatedFringeLayoutAt(line));
      }
      aligned = alignFringeLayouts(isolated);
      this.cache.set(key, aligned);
    }
    const layout = aligned.get(staff);
    if (!layout) {
      throw new RangeError(`No aligned fringe layout for staff ${staff.id}.`);
    }
    return layout;
  }

  invalidate(): void {
    this.cache.clear();
    this.controllersRegistered = false;
  }

  /** Register one controller set per flowable the members live in. Repeated calls in a pass are no-ops. */
  registerLayoutControllers(): void {
    if (this.controllersRegistered) {
      return;
    }
    const byFlowable = new Map<Flowable, Staff[]>();
    for (const staff of this.members) {
      const flowable = staff.flowable;
      if (!flowable) {
        continue;
      }
      const list = byFlowable.get(flowable) ?? [];
      list.push(staff);
      byFlowable.set(flowable, list);
    }
    for (const [flowable, staves] of byFlowable) {
      registerFringeControllers(flowable, this.layoutKey, staves);
    }
    this.controllersRegistered = true;
  }
}
