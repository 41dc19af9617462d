import { describe, expect, it } from 'vitest';

import {
  isControllerActiveAt,
  marginNeededAt,
  resolveActiveControllers,
  type MarginController
} from '../../src/core/layout-controllers.js';
import { BaseUnit } from '../../src/core/units.js';

function controller(x: number, width: number, layoutKey: string, extent?: number): MarginController {
  const base = { flowableX: BaseUnit.of(x), marginWidth: BaseUnit.of(width), layoutKey };
  return extent === undefined ? base : { ...base, extent: BaseUnit.of(extent) };
}

describe('margin controllers', () => {
  it('applies from its position onwards', () => {
    const open = controller(50, 10, 'a');
    expect(isControllerActiveAt(open, BaseUnit.of(49))).toBe(false);
    expect(isControllerActiveAt(open, BaseUnit.of(50))).toBe(true);
    expect(isControllerActiveAt(open, BaseUnit.of(5000))).toBe(true);
  });

  it('stops applying at the end of its extent', () => {
    const bounded = controller(50, 10, 'a', 20);
    expect(isControllerActiveAt(bounded, BaseUnit.of(69))).toBe(true);
    expect(isControllerActiveAt(bounded, BaseUnit.of(70))).toBe(false);
  });

  it('lets later controllers of one key supersede earlier ones', () => {
    const controllers = [controller(0, 30, 'a'), controller(100, 12, 'a')];
    expect(marginNeededAt(controllers, BaseUnit.of(99)).value).toBe(30);
    expect(marginNeededAt(controllers, BaseUnit.of(100)).value).toBe(12);
  });

  it('prefers the wider controller at the same position', () => {
    const narrow = controller(0, 5, 'a');
    const wide = controller(0, 8, 'a');
    expect(resolveActiveControllers([narrow, wide], BaseUnit.of(0)).get('a')).toBe(wide);
    expect(resolveActiveControllers([wide, narrow], BaseUnit.of(0)).get('a')).toBe(wide);
  });

  it('adds widths across keys', () => {
    const controllers = [controller(0, 30, 'a'), controller(0, 15, 'b', 10), controller(40, 7, 'c')];
    expect(marginNeededAt(controllers, BaseUnit.of(0)).value).toBe(45);
    expect(marginNeededAt(controllers, BaseUnit.of(10)).value).toBe(30);
    expect(marginNeededAt(controllers, BaseUnit.of(40)).value).toBe(37);
  });

  it('needs no margin without controllers', () => {
    expect(marginNeededAt([], BaseUnit.of(0)).value).toBe(0);
  });
});
