import type { Diagnostic } from './diagnostics.js';
import type { Document } from './document.js';
import { isFlowable, type Flowable } from './flowable.js';
import type { Page } from './page.js';
import type { PositionedObject } from './positioned-object.js';
import { pageGeometry, RenderSurface, type RenderBackend } from './render-surface.js';

/** Outcome of one render pass. */
export interface RenderPassResult {
  pageCount: number;
  diagnostics: Diagnostic[];
}

/**
 * Lay out and draw a whole document.
 *
 * Pre-render hooks run first, then layout controllers are registered and every
 * flowable is broken into lines. Objects are then drawn page by page, broken
 * objects once per line they touch. Post-render hooks always run, even when
 * layout or drawing fails.
 */
export function renderDocument(document: Document, backend: RenderBackend): RenderPassResult {
  const diagnostics: Diagnostic[] = [];
  try {
    const objects = document.allObjects();
    objects.forEach((object) => object.preRender());
    objects.forEach((object) => object.registerLayoutControllers());
    for (const flowable of objects.filter(isFlowable)) {
      // Breaking may request pages, so it has to happen before pages are opened.
      flowable.ensureBroken();
      diagnostics.push(...flowable.layoutDiagnostics());
    }

    const pages = [...document.pages];
    if (pages.length === 0) {
      diagnostics.push({ code: 'EMPTY_DOCUMENT', severity: 'info', message: 'The document has no pages to render.' });
      return { pageCount: 0, diagnostics };
    }

    const surfaces = new Map<number, RenderSurface>();
    for (const page of pages) {
      surfaces.set(page.index, new RenderSurface(backend, page));
      backend.beginPage(pageGeometry(page));
    }
    for (const page of pages) {
      for (const object of page.descendants()) {
        renderObject(object, page, surfaces, diagnostics);
      }
    }
    pages.forEach((page) => backend.endPage(page.index));
    return { pageCount: pages.length, diagnostics };
  } finally {
    document.allObjects().forEach((object) => object.postRender());
  }
}

function renderObject(
  object: PositionedObject,
  page: Page,
  surfaces: ReadonlyMap<number, RenderSurface>,
  diagnostics: Diagnostic[]
): void {
  if (isFlowable(object)) {
    return;
  }
  const flowable = object.flowable;
  if (!flowable) {
    object.renderComplete(surfaceFor(surfaces, page.index), page.descendantPos(object));
    return;
  }
  renderInFlowable(object, flowable, surfaces, diagnostics);
}

function renderInFlowable(
  object: PositionedObject,
  flowable: Flowable,
  surfaces: ReadonlyMap<number, RenderSurface>,
  diagnostics: Diagnostic[]
): void {
  const start = flowable.timelinePosition(object);
  const plans = flowable.planSlices(start.x, object.breakableLength, object.closesLine);
  if (plans.length === 0) {
    diagnostics.push({
      code: 'OBJECT_OUTSIDE_FLOWABLE',
      severity: 'warning',
      message: `A ${object.kind} at flowable x=${start.x} starts beyond the flowable length ${flowable.length} and was not drawn.`,
      source: { flowableX: start.x.baseValue, objectKind: object.kind }
    });
    return;
  }

  for (const plan of plans) {
    const { line } = plan;
    const surface = surfaceFor(surfaces, line.pageIndex);
    const startPos = line.origin.translate(start.x.minus(line.flowableX), start.y);
    switch (plan.kind) {
      case 'complete':
        object.renderComplete(surface, startPos, line);
        break;
      case 'before-break':
        object.renderBeforeBreak(surface, startPos, line, start.x);
        break;
      case 'spanning-continuation':
        object.renderSpanningContinuation(surface, line.origin.translate(0, start.y), line, plan.objectX);
        break;
      case 'after-break':
        object.renderAfterBreak(surface, line.origin.translate(0, start.y), line, plan.objectX);
        break;
    }
  }
}

function surfaceFor(surfaces: ReadonlyMap<number, RenderSurface>, pageIndex: number): RenderSurface {
  const surface = surfaces.get(pageIndex);
  if (!surface) {
    throw new RangeError(`Page ${pageIndex} was not opened for rendering.`);
  }
  return surface;
}
