import { JSDOM } from 'jsdom';

/** A straight stroke between two points, in SVG coordinate space. */
export interface SvgSegment {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

/** One stroked path with its straight segments. */
export interface SvgStroke {
  index: number;
  groupClass?: string;
  strokeWidth?: number;
  segments: SvgSegment[];
}

/** One text run with its anchor position. */
export interface SvgText {
  index: number;
  groupClass?: string;
  text: string;
  x: number;
  y: number;
  fontFamily?: string;
}

/** Supported SVG path command letters and numbers used by our lightweight parser. */
const PATH_TOKEN_PATTERN = /[MmLlHhVvZz]|[-+]?(?:\d+\.?\d*|\.\d+)(?:e[-+]?\d+)?/g;

/**
 * Extract the straight segments of every `<path>` matched by `selector`.
 * Only move/line commands are understood; curves end the parse of that path.
 */
export function extractSvgStrokes(svgMarkup: string, selector: string): SvgStroke[] {
  return withSvgDocument(svgMarkup, (document) =>
    [...document.querySelectorAll(selector)]
      .filter((element) => element.tagName.toLowerCase() === 'path')
      .map((element, index) => {
        const stroke: SvgStroke = { index, segments: segmentsFromPathData(element.getAttribute('d')) };
        const groupClass = enclosingGroupClass(element);
        if (groupClass !== undefined) {
          stroke.groupClass = groupClass;
        }
        const strokeWidth = readNumber(element.getAttribute('stroke-width'));
        if (strokeWidth !== undefined) {
          stroke.strokeWidth = strokeWidth;
        }
        return stroke;
      })
  );
}

/** Extract every `<text>` matched by `selector`. */
export function extractSvgTexts(svgMarkup: string, selector = 'text'): SvgText[] {
  return withSvgDocument(svgMarkup, (document) => {
    const results: SvgText[] = [];
    [...document.querySelectorAll(selector)].forEach((element, index) => {
      const x = readNumber(element.getAttribute('x'));
      const y = readNumber(element.getAttribute('y'));
      if (x === undefined || y === undefined) {
        return;
      }
      const text: SvgText = { index, text: element.textContent ?? '', x, y };
      const groupClass = enclosingGroupClass(element);
      if (groupClass !== undefined) {
        text.groupClass = groupClass;
      }
      const fontFamily = element.getAttribute('font-family');
      if (fontFamily) {
        text.fontFamily = fontFamily;
      }
      results.push(text);
    });
    return results;
  });
}

/** Segments with equal y at both ends. */
export function horizontalSegments(strokes: readonly SvgStroke[]): SvgSegment[] {
  return strokes.flatMap((stroke) => stroke.segments).filter((segment) => segment.y1 === segment.y2);
}

/** Segments with equal x at both ends. */
export function verticalSegments(strokes: readonly SvgStroke[]): SvgSegment[] {
  return strokes.flatMap((stroke) => stroke.segments).filter((segment) => segment.x1 === segment.x2);
}

/** Parse move/line path data into segments. Each line command yields one segment from the pen position. */
export function segmentsFromPathData(pathData: string | null): SvgSegment[] {
  if (!pathData) {
    return [];
  }
  const tokens = pathData.match(PATH_TOKEN_PATTERN);
  if (!tokens) {
    return [];
  }

  const segments: SvgSegment[] = [];
  let cursorX = 0;
  let cursorY = 0;
  let startX = 0;
  let startY = 0;
  let command = '';
  let index = 0;

  const readValue = (): number | undefined => {
    const token = tokens[index];
    if (!token || isCommandToken(token)) {
      return undefined;
    }
    index += 1;
    return Number.parseFloat(token);
  };

  const lineTo = (x: number, y: number): void => {
    segments.push({ x1: cursorX, y1: cursorY, x2: x, y2: y });
    cursorX = x;
    cursorY = y;
  };

  while (index < tokens.length) {
    const token = tokens[index];
    if (!token) {
      break;
    }
    if (isCommandToken(token)) {
      command = token;
      index += 1;
    } else if (!command) {
      // Malformed data with no leading command.
      break;
    }

    const relative = command === command.toLowerCase();
    switch (command.toUpperCase()) {
      case 'M': {
        const x = readValue();
        const y = readValue();
        if (x === undefined || y === undefined) {
          return segments;
        }
        cursorX = relative ? cursorX + x : x;
        cursorY = relative ? cursorY + y : y;
        startX = cursorX;
        startY = cursorY;
        // Further pairs after a move are implicit line commands.
        command = relative ? 'l' : 'L';
        break;
      }
      case 'L': {
        const x = readValue();
        const y = readValue();
        if (x === undefined || y === undefined) {
          return segments;
        }
        lineTo(relative ? cursorX + x : x, relative ? cursorY + y : y);
        break;
      }
      case 'H': {
        const x = readValue();
        if (x === undefined) {
          return segments;
        }
        lineTo(relative ? cursorX + x : x, cursorY);
        break;
      }
      case 'V': {
        const y = readValue();
        if (y === undefined) {
          return segments;
        }
        lineTo(cursorX, relative ? cursorY + y : y);
        break;
      }
      case 'Z':
        lineTo(startX, startY);
        command = '';
        break;
      default:
        return segments;
    }
  }

  return segments;
}

function withSvgDocument<T>(svgMarkup: string, read: (document: Document) => T): T {
  const dom = new JSDOM(svgMarkup);
  try {
    return read(dom.window.document);
  } finally {
    dom.window.close();
  }
}

/** Class attribute of the nearest `<g>` around `element`. */
function enclosingGroupClass(element: Element): string | undefined {
  const group = element.closest('g');
  return group?.getAttribute('class') ?? undefined;
}

function isCommandToken(token: string): boolean {
  return /^[A-Za-z]$/.test(token);
}

function readNumber(value: string | null): number | undefined {
  if (value === null || value.trim() === '') {
    return undefined;
  }
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}
