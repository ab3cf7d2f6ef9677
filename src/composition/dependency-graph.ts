/**
 * Dependency graph helpers
 * A dependency map is `id -> ids it depends on`. Edges naming ids outside the
 * node list are ignored by every helper here; validation reports them.
 */

export type DependencyMap = Readonly<Record<string, readonly string[]>>;

function knownDependencies(id: string, dependencies: DependencyMap, known: ReadonlySet<string>): string[] {
  return (dependencies[id] ?? []).filter((dep) => known.has(dep));
}

/**
 * Dependency ids (and dependency map keys) that name no node
 */
export function unknownReferences(nodes: readonly string[], dependencies: DependencyMap): string[] {
  const known = new Set(nodes);
  const unknown = new Set<string>();
  for (const [id, deps] of Object.entries(dependencies)) {
    if (!known.has(id)) {
      unknown.add(id);
    }
    for (const dep of deps) {
      if (!known.has(dep)) {
        unknown.add(dep);
      }
    }
  }
  return [...unknown];
}

/**
 * First cycle found, as a closed path (`[a, b, a]`), or null when acyclic
 */
export function findCycle(nodes: readonly string[], dependencies: DependencyMap): string[] | null {
  const known = new Set(nodes);
  const state = new Map<string, 'visiting' | 'done'>();
  const stack: string[] = [];

  const visit = (id: string): string[] | null => {
    state.set(id, 'visiting');
    stack.push(id);
    for (const dep of knownDependencies(id, dependencies, known)) {
      const depState = state.get(dep);
      if (depState === 'visiting') {
        return [...stack.slice(stack.indexOf(dep)), dep];
      }
      if (depState === undefined) {
        const cycle = visit(dep);
        if (cycle) {
          return cycle;
        }
      }
    }
    stack.pop();
    state.set(id, 'done');
    return null;
  };

  for (const id of nodes) {
    if (!state.has(id)) {
      const cycle = visit(id);
      if (cycle) {
        return cycle;
      }
    }
  }
  return null;
}

/**
 * Whether `from` depends on `to`, directly or transitively
 */
export function dependsOn(from: string, to: string, dependencies: DependencyMap): boolean {
  const seen = new Set<string>();
  const pending = [...(dependencies[from] ?? [])];
  while (pending.length > 0) {
    const id = pending.pop();
    if (id === undefined || seen.has(id)) {
      continue;
    }
    if (id === to) {
      return true;
    }
    seen.add(id);
    pending.push(...(dependencies[id] ?? []));
  }
  return false;
}

/**
 * Weakly connected components, each listed in node order, ordered by their first node
 */
export function weakComponents(nodes: readonly string[], dependencies: DependencyMap): string[][] {
  const known = new Set(nodes);
  const neighbours = new Map<string, Set<string>>(nodes.map((id) => [id, new Set<string>()]));
  for (const id of nodes) {
    for (const dep of knownDependencies(id, dependencies, known)) {
      neighbours.get(id)?.add(dep);
      neighbours.get(dep)?.add(id);
    }
  }

  const componentOf = new Map<string, number>();
  let count = 0;
  for (const start of nodes) {
    if (componentOf.has(start)) {
      continue;
    }
    const pending = [start];
    componentOf.set(start, count);
    while (pending.length > 0) {
      const id = pending.pop();
      if (id === undefined) {
        break;
      }
      for (const next of neighbours.get(id) ?? []) {
        if (!componentOf.has(next)) {
          componentOf.set(next, count);
          pending.push(next);
        }
      }
    }
    count++;
  }

  const components: string[][] = Array.from({ length: count }, () => []);
  for (const id of nodes) {
    components[componentOf.get(id) ?? 0].push(id);
  }
  return components;
}

export function isWeaklyConnected(nodes: readonly string[], dependencies: DependencyMap): boolean {
  return weakComponents(nodes, dependencies).length <= 1;
}

/**
 * Dependency-respecting order. Among ready nodes the one earliest in `nodes`
 * goes first. Members of a group are emitted together, in node order, once
 * every dependency of every member outside the group is emitted. Nodes left
 * over by a cycle are appended in node order.
 */
export function topologicalOrder(
  nodes: readonly string[],
  dependencies: DependencyMap,
  groupOf: (id: string) => string | undefined = () => undefined
): string[] {
  const known = new Set(nodes);

  // Collapse groups into units
  const units: string[][] = [];
  const unitOf = new Map<string, number>();
  const unitByGroup = new Map<string, number>();
  for (const id of nodes) {
    const group = groupOf(id);
    const existing = group === undefined ? undefined : unitByGroup.get(group);
    if (existing !== undefined) {
      units[existing].push(id);
      unitOf.set(id, existing);
      continue;
    }
    units.push([id]);
    unitOf.set(id, units.length - 1);
    if (group !== undefined) {
      unitByGroup.set(group, units.length - 1);
    }
  }

  const unitDeps = units.map((members, index) => {
    const deps = new Set<number>();
    for (const id of members) {
      for (const dep of knownDependencies(id, dependencies, known)) {
        const depUnit = unitOf.get(dep);
        if (depUnit !== undefined && depUnit !== index) {
          deps.add(depUnit);
        }
      }
    }
    return deps;
  });

  const emitted = new Set<number>();
  const order: string[] = [];
  let progress = true;
  while (progress) {
    progress = false;
    // Units are created in node order, so the first ready unit has the highest priority
    for (let index = 0; index < units.length; index++) {
      if (emitted.has(index) || ![...unitDeps[index]].every((dep) => emitted.has(dep))) {
        continue;
      }
      emitted.add(index);
      order.push(...units[index]);
      progress = true;
      break;
    }
  }

  for (let index = 0; index < units.length; index++) {
    if (!emitted.has(index)) {
      order.push(...units[index]);
    }
  }
  return order;
}
