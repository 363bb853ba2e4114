// src/graph.ts
// Block dependency graphs: scheduling (topological order) and diagnostics (DOT)

// ============ Graph Projection ============

export interface SignalEdge {
  from: string; // producer block
  to: string; // consumer block
  signal: string;
  /** The consumer declares a delay, so the edge does not constrain ordering. */
  delayed: boolean;
}

export interface SignalGraph {
  nodes: string[];
  edges: SignalEdge[];
}

// ============ DiGraph Implementation ============

export type SortResult =
  | { ok: true; order: string[] }
  | { ok: false; cycleNode: string };

/**
 * Directed multigraph over block names with labeled edges.
 */
export class DiGraph {
  private readonly adjacency = new Map<string, SignalEdge[]>();
  private readonly reverseAdj = new Map<string, SignalEdge[]>();

  /**
   * Add a node. Insertion order is the tie-break order of `topologicalSort`.
   */
  addNode(name: string): void {
    if (this.adjacency.has(name)) return;
    this.adjacency.set(name, []);
    this.reverseAdj.set(name, []);
  }

  addEdge(edge: SignalEdge): void {
    this.addNode(edge.from);
    this.addNode(edge.to);
    this.successorEdges(edge.from).push(edge);
    this.predecessorEdges(edge.to).push(edge);
  }

  get nodes(): string[] {
    return [...this.adjacency.keys()];
  }

  get edges(): SignalEdge[] {
    return [...this.adjacency.values()].flat();
  }

  inDegree(name: string): number {
    return this.reverseAdj.get(name)?.length ?? 0;
  }

  outDegree(name: string): number {
    return this.adjacency.get(name)?.length ?? 0;
  }

  successors(name: string): string[] {
    return this.successorEdges(name).map((e) => e.to);
  }

  predecessors(name: string): string[] {
    return this.predecessorEdges(name).map((e) => e.from);
  }

  /**
   * Kahn's algorithm. `initial` orders the nodes that are ready from the
   * start; nodes released later keep insertion order. On failure, returns a
   * node lying on a cycle.
   */
  topologicalSort(initial?: (ready: string[]) => string[]): SortResult {
    const inDegree = new Map<string, number>();
    for (const name of this.adjacency.keys()) {
      inDegree.set(name, this.inDegree(name));
    }

    let queue: string[] = [];
    for (const [name, deg] of inDegree) {
      if (deg === 0) queue.push(name);
    }
    if (initial) queue = initial(queue);

    const order: string[] = [];
    while (queue.length > 0) {
      const node = queue.shift();
      if (node === undefined) break;
      order.push(node);
      for (const next of this.successors(node)) {
        const deg = (inDegree.get(next) ?? 0) - 1;
        inDegree.set(next, deg);
        if (deg === 0) queue.push(next);
      }
    }

    if (order.length === this.adjacency.size) {
      return { ok: true, order };
    }

    const remaining = new Set([...inDegree].filter(([, deg]) => deg > 0).map(([name]) => name));
    return { ok: false, cycleNode: this.findCycleNode(remaining) };
  }

  isDAG(): boolean {
    return this.topologicalSort().ok;
  }

  toSignalGraph(): SignalGraph {
    return { nodes: this.nodes, edges: this.edges };
  }

  /**
   * Every node left after Kahn's algorithm has a predecessor that was also
   * left, so walking predecessors must revisit a node; the first revisited
   * node is on a cycle.
   */
  private findCycleNode(remaining: Set<string>): string {
    const [start] = remaining;
    if (start === undefined) {
      throw new Error('findCycleNode called on a graph without cycles');
    }
    const seen = new Set<string>();
    let current = start;
    while (!seen.has(current)) {
      seen.add(current);
      const pred = this.predecessors(current).find((p) => remaining.has(p));
      if (pred === undefined) break;
      current = pred;
    }
    return current;
  }

  private successorEdges(name: string): SignalEdge[] {
    let edges = this.adjacency.get(name);
    if (!edges) {
      edges = [];
      this.adjacency.set(name, edges);
    }
    return edges;
  }

  private predecessorEdges(name: string): SignalEdge[] {
    let edges = this.reverseAdj.get(name);
    if (!edges) {
      edges = [];
      this.reverseAdj.set(name, edges);
    }
    return edges;
  }
}

// ============ DOT Export ============

function quote(id: string): string {
  return `"${id.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Render a graph in Graphviz DOT form. Delayed edges are dashed.
 */
export function toDot(graph: SignalGraph, name = 'simulation'): string {
  const lines: string[] = [`digraph ${quote(name)} {`];
  for (const node of graph.nodes) {
    lines.push(`  ${quote(node)};`);
  }
  for (const edge of graph.edges) {
    const attrs = [`label=${quote(edge.signal)}`];
    if (edge.delayed) attrs.push('style=dashed');
    lines.push(`  ${quote(edge.from)} -> ${quote(edge.to)} [${attrs.join(', ')}];`);
  }
  lines.push('}');
  return lines.join('\n');
}
