import type { DependencyGraph, PackageId } from "./types.js";
import { compareIds, dependenciesOf, dependentsOf, hasPackage, packageIds } from "./types.js";

/** Packages whose state changed in one propagation, with their new state */
export type SelectionChanges = ReadonlyMap<PackageId, boolean>;

export type SelectionListener = (changes: SelectionChanges) => void;

const NO_CHANGES: SelectionChanges = new Map();

/**
 * Selection state over one dependency graph.
 *
 * Selecting a package selects everything it depends on; deselecting one deselects
 * everything that depends on it. Listeners run once per propagation while the
 * propagation guard is still held, so a listener (e.g. a checkbox binding that
 * echoes programmatic changes back as toggles) cannot start a second chain.
 */
export class SelectionController {
  private state = new Map<PackageId, boolean>();
  private listeners = new Set<SelectionListener>();
  private propagating = false;

  constructor(
    private graph: DependencyGraph,
    initial: Iterable<PackageId> = [],
  ) {
    for (const id of packageIds(graph)) this.state.set(id, false);
    this.restore(initial);
  }

  isSelected(id: PackageId): boolean {
    return this.state.get(id) ?? false;
  }

  /** Selected identifiers in lexicographic order; the form that gets persisted. */
  selected(): PackageId[] {
    const ids: PackageId[] = [];
    for (const [id, on] of this.state) {
      if (on) ids.push(id);
    }
    return ids.sort(compareIds);
  }

  onChange(listener: SelectionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Entry point for one user-initiated checkbox change. */
  toggle(id: PackageId, checked: boolean): SelectionChanges {
    return checked ? this.select(id) : this.deselect(id);
  }

  select(id: PackageId): SelectionChanges {
    if (!hasPackage(this.graph, id)) return NO_CHANGES;
    return this.propagate((changes) => {
      this.walk(id, (p) => dependenciesOf(this.graph, p), true, changes);
    });
  }

  deselect(id: PackageId): SelectionChanges {
    if (!hasPackage(this.graph, id)) return NO_CHANGES;
    return this.propagate((changes) => {
      this.walk(id, (p) => dependentsOf(this.graph, p), false, changes);
    });
  }

  selectAll(): SelectionChanges {
    return this.propagate((changes) => {
      for (const id of this.state.keys()) this.set(id, true, changes);
    });
  }

  deselectAll(): SelectionChanges {
    return this.propagate((changes) => {
      for (const id of this.state.keys()) this.set(id, false, changes);
    });
  }

  /**
   * Select the given identifiers (and their dependencies) in one batch.
   * Identifiers unknown to the graph are skipped.
   */
  restore(ids: Iterable<PackageId>): SelectionChanges {
    const known = [...ids].filter((id) => hasPackage(this.graph, id));
    if (known.length === 0) return NO_CHANGES;
    return this.propagate((changes) => {
      const visited = new Set<PackageId>();
      for (const id of known) {
        this.walk(id, (p) => dependenciesOf(this.graph, p), true, changes, visited);
      }
    });
  }

  /**
   * Swap in a freshly scanned graph. Selection survives only for identifiers
   * still present; listeners are not notified of dropped ones.
   */
  rebuild(graph: DependencyGraph): SelectionChanges {
    const previous = this.selected();
    const state = new Map<PackageId, boolean>();
    for (const id of packageIds(graph)) state.set(id, this.state.get(id) ?? false);
    this.graph = graph;
    this.state = state;
    // Only dependencies the new graph pulls in show up as changes
    return this.restore(previous);
  }

  private propagate(apply: (changes: Map<PackageId, boolean>) => void): SelectionChanges {
    if (this.propagating) return NO_CHANGES;
    this.propagating = true;
    try {
      const changes = new Map<PackageId, boolean>();
      apply(changes);
      if (changes.size > 0) {
        for (const listener of [...this.listeners]) listener(changes);
      }
      return changes;
    } finally {
      this.propagating = false;
    }
  }

  /** Explicit work stack; each package is processed once per call. */
  private walk(
    start: PackageId,
    next: (id: PackageId) => ReadonlySet<PackageId>,
    value: boolean,
    changes: Map<PackageId, boolean>,
    visited: Set<PackageId> = new Set(),
  ): void {
    const stack: PackageId[] = [start];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || visited.has(current)) continue;
      visited.add(current);
      this.set(current, value, changes);
      for (const n of next(current)) {
        if (!visited.has(n)) stack.push(n);
      }
    }
  }

  private set(id: PackageId, value: boolean, changes: Map<PackageId, boolean>): void {
    if (this.state.get(id) === value) return;
    this.state.set(id, value);
    changes.set(id, value);
  }
}
