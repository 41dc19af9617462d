import type { Diagnostic } from '../core/diagnostics.js';
import type { Document } from '../core/document.js';
import { renderDocument } from '../core/render-pass.js';
import type { RenderBackend } from '../core/render-surface.js';
import { VexFlowSvgBackend, type SvgRenderOptions } from '../vexflow/svg-backend.js';

/** Page-oriented rendering output used by string/SVG workflows. */
export interface RenderPagesResult {
  pages: string[];
  diagnostics: Diagnostic[];
}

/** Backend-agnostic render output. */
export interface RenderResult {
  pageCount: number;
  diagnostics: Diagnostic[];
}

/** Lay out the document and render every page to SVG markup. */
export function renderToSVGPages(document: Document, options: SvgRenderOptions = {}): RenderPagesResult {
  const backend = new VexFlowSvgBackend(options);
  try {
    const result = renderDocument(document, backend);
    return { pages: backend.pages, diagnostics: result.diagnostics };
  } finally {
    backend.dispose();
  }
}

/** Lay out the document and hand every page to a caller-supplied backend. */
export function render(document: Document, backend: RenderBackend): RenderResult {
  return renderDocument(document, backend);
}
