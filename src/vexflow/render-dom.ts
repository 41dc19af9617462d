/**
 * Install the DOM globals VexFlow's SVG context reads while it builds
 * elements, and return a function that puts the previous bindings back.
 */
export function ensureDomGlobals(ownerDocument: Document): () => void {
  const g = globalThis as Record<string, unknown>;
  const ownerWindow = ownerDocument.defaultView;
  if (!ownerWindow) {
    return () => {
      // Nothing was installed.
    };
  }

  const bindings: Record<string, unknown> = {
    document: ownerDocument,
    window: ownerWindow,
    HTMLElement: ownerWindow.HTMLElement,
    SVGElement: ownerWindow.SVGElement,
    Node: ownerWindow.Node
  };
  const previous = new Map<string, unknown>();
  for (const [key, value] of Object.entries(bindings)) {
    previous.set(key, g[key]);
    g[key] = value;
  }

  return () => {
    for (const [key, value] of previous) {
      restoreGlobal(g, key, value);
    }
  };
}

/** Restore one global binding to its previous state. */
function restoreGlobal(target: Record<string, unknown>, key: string, previous: unknown): void {
  if (previous === undefined) {
    delete target[key];
    return;
  }

  target[key] = previous;
}
