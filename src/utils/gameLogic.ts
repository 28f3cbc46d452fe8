import { Color, Coloring, Edge, NodeId, PuzzleDescription, RegionNode } from '../types';
import { MalformedGraphError } from '../types/errors';
import { colorsEqual, compareColors } from './colorUtils';
import { debugLog, LogLevel } from './debugUtils';

interface MutableNode {
  id: NodeId;
  color: Color;
  neighbors: Set<NodeId>;
}

/**
 * Immutable snapshot of a puzzle: regions, their colors and which regions touch.
 * Every transition returns a new snapshot; the receiver is never modified.
 */
export class RegionGraph {
  private readonly nodes: ReadonlyMap<NodeId, RegionNode>;

  private constructor(nodes: Map<NodeId, RegionNode>) {
    this.nodes = nodes;
  }

  /**
   * Wrap already validated nodes. Callers outside this module go through buildPuzzle.
   */
  static fromNodes(nodes: Iterable<RegionNode>): RegionGraph {
    const map = new Map<NodeId, RegionNode>();
    for (const node of nodes) {
      map.set(node.id, node);
    }
    return new RegionGraph(map);
  }

  /** Number of live regions */
  get size(): number {
    return this.nodes.size;
  }

  get isSolved(): boolean {
    return this.nodes.size === 1;
  }

  get edgeCount(): number {
    let total = 0;
    for (const node of this.nodes.values()) {
      total += node.neighbors.size;
    }
    return total / 2;
  }

  /** Live ids in ascending order */
  ids(): NodeId[] {
    return Array.from(this.nodes.keys()).sort((a, b) => a - b);
  }

  has(id: NodeId): boolean {
    return this.nodes.has(id);
  }

  getNode(id: NodeId): RegionNode | undefined {
    return this.nodes.get(id);
  }

  colorOf(id: NodeId): Color | undefined {
    return this.nodes.get(id)?.color;
  }

  neighborsOf(id: NodeId): NodeId[] {
    const node = this.nodes.get(id);
    return node ? Array.from(node.neighbors).sort((a, b) => a - b) : [];
  }

  /** Distinct colors among live regions, ordered by index */
  colors(): Color[] {
    const byIndex = new Map<number, Color>();
    for (const node of this.nodes.values()) {
      byIndex.set(node.color.index, node.color);
    }
    return Array.from(byIndex.values()).sort(compareColors);
  }

  /** Every edge once, as [smaller, larger] pairs in ascending order */
  edges(): Edge[] {
    const result: Edge[] = [];
    for (const id of this.ids()) {
      for (const neighbor of this.neighborsOf(id)) {
        if (id < neighbor) {
          result.push([id, neighbor]);
        }
      }
    }
    return result;
  }

  /** True while two adjacent regions share a color */
  hasPendingMerges(): boolean {
    for (const node of this.nodes.values()) {
      for (const neighbor of node.neighbors) {
        const other = this.nodes.get(neighbor);
        if (other && colorsEqual(other.color, node.color)) {
          return true;
        }
      }
    }
    return false;
  }

  /**
   * Set a region's color, then merge every region reachable from it through
   * regions of the new color. The recolored id survives the merge.
   */
  recolor(id: NodeId, color: Color): RegionGraph {
    const working = this.toMutable();
    const recolored = working.get(id);
    if (!recolored) {
      throw new RangeError(`Unknown region ${id}`);
    }

    recolored.color = color;
    mergeComponent(working, id);
    return RegionGraph.fromMutable(working);
  }

  /**
   * Merge every same-colored connected component into its smallest id.
   * Returns the same snapshot when nothing is pending, so repeated calls are no-ops.
   */
  collapse(): RegionGraph {
    if (!this.hasPendingMerges()) {
      return this;
    }

    const working = this.toMutable();
    for (const id of this.ids()) {
      if (working.has(id)) {
        mergeComponent(working, id);
      }
    }
    return RegionGraph.fromMutable(working);
  }

  /** Description with ids renumbered 0..size-1 in ascending id order */
  toDescription(): PuzzleDescription {
    const ordered = Array.from(this.nodes.values()).sort((a, b) => a.id - b.id);
    const position = new Map(ordered.map((node, index) => [node.id, index]));
    const edges: Edge[] = [];
    for (const [a, b] of this.edges()) {
      const from = position.get(a);
      const to = position.get(b);
      if (from !== undefined && to !== undefined) {
        edges.push([from, to]);
      }
    }
    return {
      nodeCount: ordered.length,
      edges,
      colors: ordered.map(node => node.color),
    };
  }

  private toMutable(): Map<NodeId, MutableNode> {
    const copy = new Map<NodeId, MutableNode>();
    for (const node of this.nodes.values()) {
      copy.set(node.id, { id: node.id, color: node.color, neighbors: new Set(node.neighbors) });
    }
    return copy;
  }

  private static fromMutable(working: Map<NodeId, MutableNode>): RegionGraph {
    const frozen = new Map<NodeId, RegionNode>();
    for (const node of working.values()) {
      frozen.set(node.id, { id: node.id, color: node.color, neighbors: node.neighbors });
    }
    return new RegionGraph(frozen);
  }
}

/**
 * Regions reachable from `start` using only edges between regions of start's color
 */
function sameColorComponent(nodes: ReadonlyMap<NodeId, { color: Color; neighbors: ReadonlySet<NodeId> }>, start: NodeId): Set<NodeId> {
  const component = new Set<NodeId>();
  const origin = nodes.get(start);
  if (!origin) {
    return component;
  }

  const stack: NodeId[] = [start];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || component.has(current)) continue;

    const node = nodes.get(current);
    if (!node || !colorsEqual(node.color, origin.color)) continue;

    component.add(current);
    for (const neighbor of node.neighbors) {
      if (!component.has(neighbor)) {
        stack.push(neighbor);
      }
    }
  }

  return component;
}

// Fold the same-color component of `survivor` into it, in place
function mergeComponent(working: Map<NodeId, MutableNode>, survivor: NodeId): void {
  const component = sameColorComponent(working, survivor);
  if (component.size <= 1) {
    return;
  }

  const kept = working.get(survivor);
  if (!kept) {
    return;
  }

  const external = new Set<NodeId>();
  for (const id of component) {
    const node = working.get(id);
    if (!node) continue;
    for (const neighbor of node.neighbors) {
      if (!component.has(neighbor)) {
        external.add(neighbor);
      }
    }
  }

  for (const id of component) {
    if (id !== survivor) {
      working.delete(id);
    }
  }

  for (const neighborId of external) {
    const neighbor = working.get(neighborId);
    if (!neighbor) continue;
    for (const id of component) {
      neighbor.neighbors.delete(id);
    }
    neighbor.neighbors.add(survivor);
  }

  kept.neighbors = external;
}

export interface BuildPuzzleOptions {
  // Merge adjacent same-colored regions right away (default true)
  collapse?: boolean;
}

function colorForId(coloring: Coloring, id: NodeId): Color | undefined {
  return 'get' in coloring ? coloring.get(id) : coloring[id];
}

function coloringIds(coloring: Coloring): NodeId[] {
  return 'get' in coloring ? Array.from(coloring.keys()) : coloring.map((_, index) => index);
}

/**
 * Build a puzzle from a node count, an undirected adjacency and a coloring.
 * Node ids are 0..nodeCount-1.
 */
export function buildPuzzle(
  nodeCount: number,
  adjacency: Iterable<Edge>,
  coloring: Coloring,
  options: BuildPuzzleOptions = {}
): RegionGraph {
  if (!Number.isInteger(nodeCount) || nodeCount <= 0) {
    throw new MalformedGraphError(`node count must be a positive integer, got ${nodeCount}`);
  }

  const isKnown = (id: NodeId) => Number.isInteger(id) && id >= 0 && id < nodeCount;

  for (const id of coloringIds(coloring)) {
    if (!isKnown(id)) {
      throw new MalformedGraphError(`coloring references unknown node ${id}`);
    }
  }

  const nodes = new Map<NodeId, MutableNode>();
  for (let id = 0; id < nodeCount; id++) {
    const color = colorForId(coloring, id);
    if (!color) {
      throw new MalformedGraphError(`node ${id} has no color`);
    }
    nodes.set(id, { id, color, neighbors: new Set() });
  }

  for (const [a, b] of adjacency) {
    if (!isKnown(a) || !isKnown(b)) {
      throw new MalformedGraphError(`edge (${a}, ${b}) references an unknown node`);
    }
    if (a === b) {
      throw new MalformedGraphError(`node ${a} cannot touch itself`);
    }
    nodes.get(a)?.neighbors.add(b);
    nodes.get(b)?.neighbors.add(a);
  }

  const reached = new Set<NodeId>();
  const stack: NodeId[] = [0];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || reached.has(current)) continue;
    reached.add(current);
    nodes.get(current)?.neighbors.forEach(n => stack.push(n));
  }
  if (reached.size !== nodeCount) {
    throw new MalformedGraphError(`graph is disconnected (${reached.size} of ${nodeCount} nodes reachable from node 0)`);
  }

  const graph = RegionGraph.fromNodes(nodes.values());
  if (options.collapse === false) {
    return graph;
  }

  const collapsed = graph.collapse();
  if (collapsed !== graph) {
    debugLog('graph', `Merged adjacent same-colored regions: ${nodeCount} -> ${collapsed.size}`, undefined, LogLevel.DEBUG);
  }
  return collapsed;
}

/**
 * Build a puzzle from its in-memory description
 */
export function buildPuzzleFromDescription(description: PuzzleDescription, options?: BuildPuzzleOptions): RegionGraph {
  return buildPuzzle(description.nodeCount, description.edges, description.colors, options);
}
