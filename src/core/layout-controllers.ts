import { ZERO, type Unit } from './units.js';

/**
 * Declares leading space a line must reserve when it starts at or after
 * `flowableX`.
 *
 * Controllers sharing a `layoutKey` supersede each other in timeline order,
 * so only the latest active one per key counts. Widths from different keys add up.
 */
export interface MarginController {
  readonly flowableX: Unit;
  readonly marginWidth: Unit;
  readonly layoutKey: string;
  /** When set, the controller stops applying at `flowableX + extent`. */
  readonly extent?: Unit;
}

/** True when `controller` applies to a line starting at `x`. */
export function isControllerActiveAt(controller: MarginController, x: Unit): boolean {
  if (!controller.flowableX.leOrClose(x)) {
    return false;
  }
  if (controller.extent === undefined) {
    return true;
  }
  return x.lt(controller.flowableX.plus(controller.extent));
}

/**
 * For each layout key, pick the active controller with the greatest position
 * (the widest on ties).
 */
export function resolveActiveControllers(
  controllers: readonly MarginController[],
  x: Unit
): Map<string, MarginController> {
  const active = new Map<string, MarginController>();
  for (const controller of controllers) {
    if (!isControllerActiveAt(controller, x)) {
      continue;
    }
    const current = active.get(controller.layoutKey);
    if (
      !current ||
      controller.flowableX.gt(current.flowableX) ||
      (controller.flowableX.equals(current.flowableX) && controller.marginWidth.gt(current.marginWidth))
    ) {
      active.set(controller.layoutKey, controller);
    }
  }
  return active;
}

/** Total leading margin a line starting at `x` must reserve. */
export function marginNeededAt(controllers: readonly MarginController[], x: Unit): Unit {
  let total = ZERO;
  for (const controller of resolveActiveControllers(controllers, x).values()) {
    total = total.plus(controller.marginWidth);
  }
  return total;
}
