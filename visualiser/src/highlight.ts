export type HighlightTag = "focused" | "incoming" | "outgoing" | "none";

interface Edge {
  from: string;
  to: string;
}

/**
 * Tag every node relative to the focused one. A node on both sides of a
 * 2-cycle with the focus is tagged incoming.
 */
export function classify(
  focused: string | null,
  nodeIds: Iterable<string>,
  edges: Iterable<Edge>,
): Map<string, HighlightTag> {
  const tags = new Map<string, HighlightTag>();
  for (const id of nodeIds) tags.set(id, "none");
  if (focused === null || !tags.has(focused)) return tags;

  const incoming = new Set<string>();
  const outgoing = new Set<string>();
  for (const e of edges) {
    if (e.from === e.to) continue;
    if (e.to === focused) incoming.add(e.from);
    if (e.from === focused) outgoing.add(e.to);
  }

  for (const id of tags.keys()) {
    if (id === focused) tags.set(id, "focused");
    else if (incoming.has(id)) tags.set(id, "incoming");
    else if (outgoing.has(id)) tags.set(id, "outgoing");
  }
  return tags;
}

export function classifyEdge(edge: Edge, focused: string | null): HighlightTag {
  if (focused === null || edge.from === edge.to) return "none";
  if (edge.to === focused) return "incoming";
  if (edge.from === focused) return "outgoing";
  return "none";
}

/** Holds at most one focused node. */
export class FocusTracker {
  private current: string | null = null;

  get focused(): string | null {
    return this.current;
  }

  /** Focus `id`; focusing the focused node again clears the focus. Returns the new focus. */
  toggle(id: string): string | null {
    this.current = this.current === id ? null : id;
    return this.current;
  }

  clear(): void {
    this.current = null;
  }
}
