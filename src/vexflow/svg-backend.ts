import { JSDOM } from 'jsdom';
import { Renderer } from 'vexflow';

import type { GlyphPrimitive, PageGeometry, PathPrimitive, RenderBackend } from '../core/render-surface.js';
import { ensureDomGlobals } from './render-dom.js';

/** SVG output options. */
export interface SvgRenderOptions {
  /** Output pixels per base unit. */
  scale?: number;
  /** Page fill; pages are transparent when unset. */
  background?: string;
}

export const DEFAULT_SVG_SCALE = 1;

type VexFlowContext = ReturnType<Renderer['getContext']>;

interface OpenPage {
  host: HTMLDivElement;
  context: VexFlowContext;
}

/**
 * Draws pages through VexFlow's SVG render context on a private JSDOM
 * document. Each finished page becomes one SVG string.
 */
export class VexFlowSvgBackend implements RenderBackend {
  private readonly dom = new JSDOM('<!doctype html><html><body></body></html>');
  private readonly scale: number;
  private readonly background: string | undefined;
  private readonly open = new Map<number, OpenPage>();
  private readonly finished = new Map<number, string>();

  constructor(options: SvgRenderOptions = {}) {
    this.scale = options.scale ?? DEFAULT_SVG_SCALE;
    if (!Number.isFinite(this.scale) || this.scale <= 0) {
      throw new RangeError(`SVG scale must be a positive number, got ${this.scale}.`);
    }
    this.background = options.background;
  }

  /** Finished pages in page order. */
  get pages(): string[] {
    return [...this.finished.entries()].sort(([left], [right]) => left - right).map(([, svg]) => svg);
  }

  beginPage(page: PageGeometry): void {
    const document = this.dom.window.document;
    const host = document.createElement('div');
    document.body.appendChild(host);
    this.withDomGlobals(() => {
      const renderer = new Renderer(host, Renderer.Backends.SVG);
      renderer.resize(page.width * this.scale, page.height * this.scale);
      const context = renderer.getContext();
      if (this.background) {
        context.setFillStyle(this.background);
        context.fillRect(0, 0, page.width * this.scale, page.height * this.scale);
      }
      this.open.set(page.index, { host, context });
    });
  }

  drawPath(path: PathPrimitive): void {
    const { context } = this.page(path.pageIndex);
    this.withDomGlobals(() => {
      context.openGroup(path.className);
      context.setLineWidth(path.thickness * this.scale);
      context.beginPath();
      for (const command of path.commands) {
        if (command.op === 'move') {
          context.moveTo(command.x * this.scale, command.y * this.scale);
        } else {
          context.lineTo(command.x * this.scale, command.y * this.scale);
        }
      }
      context.stroke();
      context.closeGroup();
    });
  }

  drawGlyphs(glyphs: GlyphPrimitive): void {
    const { context } = this.page(glyphs.pageIndex);
    this.withDomGlobals(() => {
      context.openGroup(glyphs.className);
      context.save();
      context.setFont(glyphs.fontFamily, glyphs.fontSize * this.scale);
      context.fillText(glyphs.text, glyphs.x * this.scale, glyphs.y * this.scale);
      context.restore();
      context.closeGroup();
    });
  }

  endPage(pageIndex: number): void {
    const { host } = this.page(pageIndex);
    this.finished.set(pageIndex, host.innerHTML);
    host.remove();
    this.open.delete(pageIndex);
  }

  /** Release the JSDOM window. The backend cannot draw afterwards. */
  dispose(): void {
    this.open.clear();
    this.dom.window.close();
  }

  private page(pageIndex: number): OpenPage {
    const page = this.open.get(pageIndex);
    if (!page) {
      throw new RangeError(`Page ${pageIndex} is not open.`);
    }
    return page;
  }

  private withDomGlobals(draw: () => void): void {
    const restore = ensureDomGlobals(this.dom.window.document);
    try {
      draw();
    } finally {
      restore();
    }
  }
}
