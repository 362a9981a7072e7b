// src/compiler/graph.ts
import crypto from 'crypto';
import {
  CyclicDependencyError,
  DuplicateUnitError,
  UnknownDependencyError
} from '../errors';
import { ParamValue, ResourceUnit, UnitOutputs, UnitParams } from './ir';

/**
 * A validated, acyclic set of resource units. `order` lists every unit after
 * all of its dependencies; independent units keep their declaration order.
 */
export class ResourceGraph {
  readonly units: readonly ResourceUnit[];
  readonly order: readonly ResourceUnit[];
  private readonly byName: Map<string, ResourceUnit>;

  constructor(units: ResourceUnit[], order: ResourceUnit[]) {
    this.units = units;
    this.order = order;
    this.byName = new Map(units.map((u) => [u.name, u]));
  }

  get names(): string[] {
    return this.order.map((u) => u.name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): ResourceUnit | undefined {
    return this.byName.get(name);
  }

  dependenciesOf(name: string): ResourceUnit[] {
    const unit = this.byName.get(name);
    if (!unit) return [];
    return unit.dependsOn.flatMap((dep) => {
      const d = this.byName.get(dep);
      return d ? [d] : [];
    });
  }

  transitiveDependenciesOf(name: string): ResourceUnit[] {
    const seen = new Set<string>();
    const stack = [name];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      for (const dep of this.dependenciesOf(current)) {
        if (!seen.has(dep.name)) {
          seen.add(dep.name);
          stack.push(dep.name);
        }
      }
    }
    return this.order.filter((u) => seen.has(u.name));
  }

  /** Reverse topological order: dependents before their dependencies. */
  reverseOrder(): ResourceUnit[] {
    return [...this.order].reverse();
  }
}

// Walks dependency edges among the units Kahn's algorithm could not remove
// until a name repeats; every remaining unit has a remaining dependency, so
// the walk always closes a cycle.
function findCycle(
  remaining: ResourceUnit[],
  byName: Map<string, ResourceUnit>,
  index: Map<string, number>
): string[] {
  const left = new Set(remaining.map((u) => u.name));
  const path: string[] = [];
  const position = new Map<string, number>();
  let current: ResourceUnit | undefined = remaining[0];

  while (current && !position.has(current.name)) {
    position.set(current.name, path.length);
    path.push(current.name);
    const next: string | undefined = current.dependsOn.find((d) => left.has(d));
    current = next === undefined ? undefined : byName.get(next);
  }

  const cycle = current ? path.slice(position.get(current.name) ?? 0) : path;
  let start = 0;
  cycle.forEach((name, i) => {
    if ((index.get(name) ?? 0) < (index.get(cycle[start]) ?? 0)) start = i;
  });
  return [...cycle.slice(start), ...cycle.slice(0, start)];
}

export function buildResourceGraph(declarations: ResourceUnit[]): ResourceGraph {
  const byName = new Map<string, ResourceUnit>();
  const index = new Map<string, number>();

  declarations.forEach((unit, i) => {
    if (byName.has(unit.name)) {
      throw new DuplicateUnitError(unit.name);
    }
    byName.set(unit.name, unit);
    index.set(unit.name, i);
  });

  for (const unit of declarations) {
    for (const dep of unit.dependsOn) {
      if (!byName.has(dep)) {
        throw new UnknownDependencyError(unit.name, dep);
      }
    }
  }

  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();
  for (const unit of declarations) {
    const deps = new Set(unit.dependsOn);
    inDegree.set(unit.name, deps.size);
    for (const dep of deps) {
      const list = dependents.get(dep) ?? [];
      list.push(unit.name);
      dependents.set(dep, list);
    }
  }

  const ready = declarations.filter((u) => inDegree.get(u.name) === 0);
  const order: ResourceUnit[] = [];

  while (ready.length > 0) {
    // lowest declaration index first
    ready.sort((a, b) => (index.get(a.name) ?? 0) - (index.get(b.name) ?? 0));
    const next = ready.shift();
    if (!next) break;
    order.push(next);

    for (const dependent of dependents.get(next.name) ?? []) {
      const remaining = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, remaining);
      if (remaining === 0) {
        const unit = byName.get(dependent);
        if (unit) ready.push(unit);
      }
    }
  }

  if (order.length < declarations.length) {
    const placed = new Set(order.map((u) => u.name));
    const remaining = declarations.filter((u) => !placed.has(u.name));
    throw new CyclicDependencyError(findCycle(remaining, byName, index));
  }

  return new ResourceGraph([...declarations], order);
}

function canonicalize(value: ParamValue): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = canonicalize(value[key]);
    }
    return sorted;
  }
  return value;
}

/** Hash of everything that decides whether a unit must be re-created. */
export function configHash(unit: ResourceUnit): string {
  const canonical = JSON.stringify({
    kind: unit.kind,
    params: canonicalize(unit.params),
    dependsOn: [...unit.dependsOn].sort()
  });
  return crypto.createHash('sha256').update(canonical).digest('hex').slice(0, 16);
}

/**
 * Hash of what the provider actually receives for a unit: its params with
 * references substituted and the outputs of its dependencies.
 */
export function inputsHash(
  params: UnitParams,
  dependencyOutputs: Record<string, UnitOutputs>
): string {
  const outputs: Record<string, ParamValue> = {};
  for (const [dep, values] of Object.entries(dependencyOutputs)) outputs[dep] = values;
  const canonical = JSON.stringify({
    params: canonicalize(params),
    dependencyOutputs: canonicalize(outputs)
  });
  return crypto.createHash('sha256').update(canonical).digest('hex').slice(0, 16);
}
