/**
 * Prerequisite Graph - resolves the transitive closure of a request and
 * orders it so every capability comes after its prerequisites.
 *
 * Nodes live in an array; edges are index lists in both directions.
 */

import type {
  Capability,
  CapabilityLookup,
  CapabilityReference,
  CapabilityStore,
  CompositionIssue,
} from '../types.js';
import { errorMessage, issue } from './errors.js';
import { combineConstraints } from './versions.js';

// =============================================================================
// Graph
// =============================================================================

export interface GraphNode {
  index: number;
  capability: Capability;
  /** Present when the capability was listed in the request */
  reference?: CapabilityReference;
}

export type TopologicalResult =
  | { ok: true; order: number[] }
  | { ok: false; cycle: number[] };

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class PrerequisiteGraph {
  private readonly nodeList: GraphNode[] = [];
  private readonly indexByName = new Map<string, number>();
  /** dependent -> prerequisites */
  private readonly requires: number[][] = [];
  /** prerequisite -> dependents */
  private readonly dependents: number[][] = [];

  get size(): number {
    return this.nodeList.length;
  }

  /** Nodes in appearance order */
  get nodes(): readonly GraphNode[] {
    return this.nodeList;
  }

  addNode(capability: Capability, reference?: CapabilityReference): GraphNode {
    const existing = this.indexByName.get(capability.name);
    if (existing !== undefined) {
      throw new Error(`Capability '${capability.name}' is already in the graph`);
    }
    const node: GraphNode = reference
      ? { index: this.nodeList.length, capability, reference }
      : { index: this.nodeList.length, capability };
    this.nodeList.push(node);
    this.indexByName.set(capability.name, node.index);
    this.requires.push([]);
    this.dependents.push([]);
    return node;
  }

  indexOf(name: string): number | undefined {
    return this.indexByName.get(name);
  }

  node(index: number): GraphNode {
    const node = this.nodeList[index];
    if (!node) {
      throw new RangeError(`No graph node at index ${index}`);
    }
    return node;
  }

  /** Record that `dependent` requires `prerequisite` */
  addEdge(prerequisite: number, dependent: number): void {
    if (!this.requires[dependent].includes(prerequisite)) {
      this.requires[dependent].push(prerequisite);
      this.dependents[prerequisite].push(dependent);
    }
  }

  prerequisitesOf(index: number): readonly number[] {
    return this.requires[index];
  }

  dependentsOf(index: number): readonly number[] {
    return this.dependents[index];
  }

  /**
   * Kahn's algorithm. Among ready nodes the smallest name goes first, so the
   * order does not depend on the order capabilities were requested in.
   */
  topologicalSort(): TopologicalResult {
    const remaining = this.requires.map(edges => edges.length);
    const ready = remaining.flatMap((count, index) => (count === 0 ? [index] : []));
    const order: number[] = [];
    const byName = (a: number, b: number) =>
      compareNames(this.nodeList[a].capability.name, this.nodeList[b].capability.name);

    while (ready.length > 0) {
      ready.sort(byName);
      const next = ready.shift();
      if (next === undefined) break;
      order.push(next);
      for (const dependent of this.dependents[next]) {
        remaining[dependent] -= 1;
        if (remaining[dependent] === 0) {
          ready.push(dependent);
        }
      }
    }

    if (order.length === this.size) {
      return { ok: true, order };
    }
    return { ok: false, cycle: this.findCycle(new Set(order)) };
  }

  /**
   * Walk unsorted "requires" edges from the earliest-appearing unsorted node
   * until a node repeats. The returned path starts and ends on that node.
   */
  private findCycle(sorted: Set<number>): number[] {
    const start = this.nodeList.findIndex(node => !sorted.has(node.index));
    const path: number[] = [];
    const position = new Map<number, number>();
    let current = start;

    while (!position.has(current)) {
      position.set(current, path.length);
      path.push(current);
      const candidates = this.requires[current].filter(index => !sorted.has(index));
      if (candidates.length === 0) return path;
      current = Math.min(...candidates);
    }
    return [...path.slice(position.get(current)), current];
  }
}

// =============================================================================
// Building
// =============================================================================

export interface GraphBuildOptions {
  /** Fetch prerequisites that were not listed (default true) */
  includePrerequisites?: boolean;
  /** Run the lookups of one discovery round concurrently (default true) */
  parallelLookups?: boolean;
}

export type GraphBuildResult =
  | { ok: true; graph: PrerequisiteGraph }
  | { ok: false; errors: CompositionIssue[] };

/** One constraint placed on a capability name */
interface Demand {
  constraint?: string;
  /** Capability declaring the prerequisite; absent when the name was listed */
  requiredBy?: string;
}

interface PendingLookup {
  name: string;
  /** Every constraint on the name, combined */
  constraint: string;
  demands: Demand[];
}

interface Selection {
  constraint: string;
  capability: Capability;
}

interface Traversal {
  /** Names reachable from the request, in appearance order */
  order: string[];
  demands: Map<string, Demand[]>;
}

type LookupOutcome = CapabilityLookup | { ok: false; reason: 'failure'; message: string };

async function lookup(store: CapabilityStore, item: PendingLookup): Promise<LookupOutcome> {
  try {
    return await store.resolve(item.name, item.constraint || undefined);
  } catch (error) {
    return { ok: false, reason: 'failure', message: errorMessage(error) };
  }
}

async function lookupAll(
  store: CapabilityStore,
  items: PendingLookup[],
  parallel: boolean
): Promise<LookupOutcome[]> {
  if (parallel) {
    return Promise.all(items.map(item => lookup(store, item)));
  }
  const outcomes: LookupOutcome[] = [];
  for (const item of items) {
    outcomes.push(await lookup(store, item));
  }
  return outcomes;
}

function requirersOf(demands: readonly Demand[]): string[] {
  return [...new Set(demands.flatMap(d => (d.requiredBy === undefined ? [] : [d.requiredBy])))].sort();
}

function describeDemand(demand: Demand): string {
  const source = demand.requiredBy === undefined ? 'the capabilities list' : `'${demand.requiredBy}'`;
  return `${demand.constraint ?? '*'} from ${source}`;
}

function lookupFailure(item: PendingLookup, outcome: Exclude<LookupOutcome, { ok: true }>): CompositionIssue {
  const requirers = requirersOf(item.demands);
  const listed = item.demands.some(d => d.requiredBy === undefined);
  switch (outcome.reason) {
    case 'not_found':
      if (!listed && requirers.length > 0) {
        const [requiredBy] = requirers;
        return issue(
          'COMP-003',
          `Capability '${requiredBy}' requires '${item.name}', which is not available`,
          `Add a definition of '${item.name}' to the capability search path, or remove '${requiredBy}'`,
          { capabilities: [...requirers, item.name] }
        );
      }
      return issue(
        'COMP-008',
        `Capability '${item.name}' not found`,
        `Check the spelling of '${item.name}' or add its definition to the capability search path`,
        { capabilities: [...requirers, item.name] }
      );
    case 'version_mismatch': {
      const constrained = item.demands
        .filter(d => combineConstraints([d.constraint]) !== '')
        .sort((a, b) => compareNames(describeDemand(a), describeDemand(b)));
      const constrainers = requirersOf(constrained);
      let message = outcome.message;
      if (constrained.length > 1) {
        message =
          `No version of '${item.name}' satisfies every constraint: ` +
          `${constrained.map(describeDemand).join(', ')} (available: ${outcome.available.join(', ')})`;
      } else if (constrainers.length === 1) {
        message = `${outcome.message}, required by '${constrainers[0]}'`;
      }
      return issue(
        'COMP-005',
        message,
        constrained.length > 1
          ? `Use constraints that one available version satisfies together: ${outcome.available.join(', ')}`
          : `Use a constraint matching one of the available versions: ${outcome.available.join(', ')}`,
        { capabilities: [...constrainers, item.name] }
      );
    }
    case 'failure':
      return issue(
        'COMP-011',
        `Capability store failed while resolving '${item.name}': ${outcome.message}`,
        'Check that the capability store is reachable and retry',
        { capabilities: [...requirers, item.name] }
      );
  }
}

/**
 * Walk from the listed capabilities through the prerequisites of the
 * versions selected so far, collecting every constraint placed on each name.
 */
function traverse(references: readonly CapabilityReference[], selections: ReadonlyMap<string, Selection>): Traversal {
  const order: string[] = [];
  const demands = new Map<string, Demand[]>();
  const demand = (name: string, entry: Demand) => {
    const existing = demands.get(name);
    if (existing) {
      existing.push(entry);
      return;
    }
    demands.set(name, [entry]);
    order.push(name);
  };

  for (const reference of references) {
    demand(reference.name, reference.version !== undefined ? { constraint: reference.version } : {});
  }
  // order grows while it is walked
  for (let i = 0; i < order.length; i++) {
    const capability = selections.get(order[i])?.capability;
    if (!capability) continue;
    for (const prerequisite of capability.prerequisites) {
      demand(
        prerequisite.name,
        prerequisite.version !== undefined
          ? { constraint: prerequisite.version, requiredBy: capability.name }
          : { requiredBy: capability.name }
      );
    }
  }
  return { order, demands };
}

function assemble(
  references: readonly CapabilityReference[],
  { order, demands }: Traversal,
  selections: ReadonlyMap<string, Selection>
): PrerequisiteGraph {
  const graph = new PrerequisiteGraph();
  const referenceByName = new Map<string, CapabilityReference>();
  for (const reference of references) {
    if (!referenceByName.has(reference.name)) referenceByName.set(reference.name, reference);
  }
  for (const name of order) {
    const selection = selections.get(name);
    if (selection) graph.addNode(selection.capability, referenceByName.get(name));
  }
  for (const name of order) {
    const target = graph.indexOf(name);
    if (target === undefined) continue;
    for (const { requiredBy } of demands.get(name) ?? []) {
      const dependent = requiredBy === undefined ? undefined : graph.indexOf(requiredBy);
      if (dependent !== undefined) graph.addEdge(target, dependent);
    }
  }
  return graph;
}

/**
 * Resolve the listed capabilities and their prerequisites into a graph.
 *
 * Each name resolves to the highest version satisfying every constraint
 * placed on it, whatever order the constraints were found in. Selecting a
 * version can change the prerequisites below it, so discovery repeats until
 * no name needs another lookup, or fails with COMP-005 when the selections
 * come back to an earlier state. A name is looked up once per distinct set of
 * constraints. Stops at the first round that produced a failure and reports
 * every failure of it.
 */
export async function buildPrerequisiteGraph(
  references: readonly CapabilityReference[],
  store: CapabilityStore,
  options: GraphBuildOptions = {}
): Promise<GraphBuildResult> {
  const includePrerequisites = options.includePrerequisites ?? true;
  const parallel = options.parallelLookups ?? true;
  const listed = new Set(references.map(reference => reference.name));
  const selections = new Map<string, Selection>();
  const cache = new Map<string, LookupOutcome>();
  const states = new Set<string>();

  for (;;) {
    const traversal = traverse(references, selections);
    const errors: CompositionIssue[] = [];
    const toFetch: PendingLookup[] = [];
    const state = traversal.order.map(name => `${name}@${selections.get(name)?.constraint ?? '?'}`).join(' ');
    const repeated = states.has(state);
    states.add(state);

    for (const name of traversal.order) {
      const demands = traversal.demands.get(name) ?? [];
      if (!includePrerequisites && !listed.has(name)) {
        for (const requiredBy of requirersOf(demands)) {
          errors.push(issue(
            'COMP-003',
            `Capability '${requiredBy}' requires '${name}', which is not in the capabilities list`,
            `Add '${name}' to capabilities list`,
            { capabilities: [requiredBy, name] }
          ));
        }
        continue;
      }
      const constraint = combineConstraints(demands.map(d => d.constraint));
      if (selections.get(name)?.constraint === constraint) continue;

      if (repeated) {
        errors.push(issue(
          'COMP-005',
          `Version constraints on '${name}' do not settle: each selected version changes what is required of it`,
          `Pin '${name}' to one version in the capabilities list`,
          { capabilities: [...requirersOf(demands), name] }
        ));
        continue;
      }
      toFetch.push({ name, constraint, demands });
    }

    if (errors.length > 0) {
      return { ok: false, errors };
    }
    if (toFetch.length === 0) {
      return { ok: true, graph: assemble(references, traversal, selections) };
    }

    const key = (item: PendingLookup) => `${item.name}\n${item.constraint}`;
    const uncached = toFetch.filter(item => !cache.has(key(item)));
    const fetched = await lookupAll(store, uncached, parallel);
    uncached.forEach((item, i) => cache.set(key(item), fetched[i]));

    for (const item of toFetch) {
      const outcome = cache.get(key(item));
      if (outcome === undefined) continue;
      if (outcome.ok) {
        selections.set(item.name, { constraint: item.constraint, capability: outcome.capability });
      } else {
        errors.push(lookupFailure(item, outcome));
      }
    }

    if (errors.length > 0) {
      return { ok: false, errors };
    }
  }
}

/**
 * Describe a cycle returned by `topologicalSort`.
 */
export function cycleIssue(graph: PrerequisiteGraph, cycle: readonly number[]): CompositionIssue {
  const names = cycle.map(index => graph.node(index).capability.name);
  const [first, second] = names;
  return issue(
    'COMP-004',
    `Circular dependency: ${names.join(' → ')}`,
    `Break the cycle by removing a prerequisite along it, e.g. '${first}' requiring '${second ?? first}'`,
    { capabilities: [...new Set(names)], path: names }
  );
}
