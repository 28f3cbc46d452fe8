import { Edge, NodeId } from '../types';

type Adjacency = Map<NodeId, Set<NodeId>>;

const edgeKey = (a: NodeId, b: NodeId): string => (a < b ? `${a}-${b}` : `${b}-${a}`);

function buildAdjacency(edges: Iterable<Edge>): Adjacency {
  const adjacency: Adjacency = new Map();
  const link = (a: NodeId, b: NodeId) => {
    const around = adjacency.get(a) ?? new Set<NodeId>();
    around.add(b);
    adjacency.set(a, around);
  };
  for (const [a, b] of edges) {
    // Loops never affect planarity
    if (a === b) continue;
    link(a, b);
    link(b, a);
  }
  return adjacency;
}

function countEdges(adjacency: Adjacency): number {
  let total = 0;
  adjacency.forEach(around => {
    total += around.size;
  });
  return total / 2;
}

// Euler's bound for simple planar graphs
const exceedsEulerBound = (vertices: number, edges: number): boolean => vertices >= 3 && edges > 3 * vertices - 6;

/**
 * Split the graph into biconnected blocks (Tarjan, edge stack)
 */
function biconnectedBlocks(adjacency: Adjacency): Edge[][] {
  const discovered = new Map<NodeId, number>();
  const low = new Map<NodeId, number>();
  const stack: Edge[] = [];
  const blocks: Edge[][] = [];
  let time = 0;

  const visit = (u: NodeId, parent: NodeId | null): void => {
    discovered.set(u, time);
    low.set(u, time);
    time++;

    for (const v of adjacency.get(u) ?? []) {
      const discV = discovered.get(v);
      if (discV === undefined) {
        stack.push([u, v]);
        visit(v, u);
        low.set(u, Math.min(low.get(u) ?? 0, low.get(v) ?? 0));

        if ((low.get(v) ?? 0) >= (discovered.get(u) ?? 0)) {
          const block: Edge[] = [];
          for (let edge = stack.pop(); edge; edge = stack.pop()) {
            block.push(edge);
            if (edge[0] === u && edge[1] === v) break;
          }
          blocks.push(block);
        }
      } else if (v !== parent && discV < (discovered.get(u) ?? 0)) {
        stack.push([u, v]);
        low.set(u, Math.min(low.get(u) ?? 0, discV));
      }
    }
  };

  for (const vertex of adjacency.keys()) {
    if (!discovered.has(vertex)) {
      visit(vertex, null);
    }
  }

  return blocks;
}

// A cycle through the edge (u, v): the shortest other path from v back to u
function cycleThrough(adjacency: Adjacency, u: NodeId, v: NodeId): NodeId[] {
  const parent = new Map<NodeId, NodeId>([[v, v]]);
  const queue: NodeId[] = [v];
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    for (const next of adjacency.get(current) ?? []) {
      if (parent.has(next) || (current === v && next === u)) continue;
      parent.set(next, current);
      if (next === u) {
        const cycle: NodeId[] = [u];
        for (let step = current; step !== v; step = parent.get(step) ?? v) {
          cycle.push(step);
        }
        cycle.push(v);
        return cycle;
      }
      queue.push(next);
    }
  }
  return [];
}

interface Fragment {
  attachments: NodeId[];
  // Non-embedded vertices of the fragment (empty for a chord)
  interior: Set<NodeId>;
  chord?: Edge;
}

function findFragments(adjacency: Adjacency, embeddedVertices: Set<NodeId>, embeddedEdges: Set<string>): Fragment[] {
  const fragments: Fragment[] = [];

  for (const [a, around] of adjacency) {
    if (!embeddedVertices.has(a)) continue;
    for (const b of around) {
      if (a < b && embeddedVertices.has(b) && !embeddedEdges.has(edgeKey(a, b))) {
        fragments.push({ attachments: [a, b], interior: new Set(), chord: [a, b] });
      }
    }
  }

  const assigned = new Set<NodeId>();
  for (const start of adjacency.keys()) {
    if (embeddedVertices.has(start) || assigned.has(start)) continue;

    const interior = new Set<NodeId>();
    const attachments = new Set<NodeId>();
    const stack: NodeId[] = [start];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || interior.has(current)) continue;
      interior.add(current);
      assigned.add(current);
      for (const next of adjacency.get(current) ?? []) {
        if (embeddedVertices.has(next)) {
          attachments.add(next);
        } else if (!interior.has(next)) {
          stack.push(next);
        }
      }
    }
    fragments.push({ attachments: Array.from(attachments), interior });
  }

  return fragments;
}

// Path through the fragment between two of its attachments
function fragmentPath(adjacency: Adjacency, fragment: Fragment): NodeId[] {
  if (fragment.chord) {
    return [fragment.chord[0], fragment.chord[1]];
  }

  const from = fragment.attachments[0];
  const parent = new Map<NodeId, NodeId>();
  const queue: NodeId[] = [];
  for (const next of adjacency.get(from) ?? []) {
    if (fragment.interior.has(next) && !parent.has(next)) {
      parent.set(next, from);
      queue.push(next);
    }
  }

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    for (const next of adjacency.get(current) ?? []) {
      if (next !== from && fragment.attachments.includes(next)) {
        const path: NodeId[] = [next];
        for (let step: NodeId = current; step !== from; step = parent.get(step) ?? from) {
          path.push(step);
        }
        path.push(from);
        return path.reverse();
      }
      if (fragment.interior.has(next) && !parent.has(next)) {
        parent.set(next, current);
        queue.push(next);
      }
    }
  }

  return [];
}

// Split `face` along a path whose ends lie on it
function splitFace(face: NodeId[], path: NodeId[]): [NodeId[], NodeId[]] {
  const start = path[0];
  const end = path[path.length - 1];
  const inner = path.slice(1, -1);
  const i = face.indexOf(start);
  const j = face.indexOf(end);

  const walk = (from: number, to: number): NodeId[] => {
    const result: NodeId[] = [];
    for (let k = from; ; k = (k + 1) % face.length) {
      result.push(face[k]);
      if (k === to) break;
    }
    return result;
  };

  return [
    [...walk(i, j), ...inner.slice().reverse()],
    [...walk(j, i), ...inner],
  ];
}

/**
 * Demoucron-Malgrange-Pertuiset embedding of one biconnected block
 */
function isBlockPlanar(blockEdges: Edge[]): boolean {
  const adjacency = buildAdjacency(blockEdges);
  const vertexCount = adjacency.size;
  const edgeCount = countEdges(adjacency);

  if (vertexCount <= 4) return true;
  if (exceedsEulerBound(vertexCount, edgeCount)) return false;

  const [u, v] = blockEdges[0];
  const cycle = cycleThrough(adjacency, u, v);
  if (cycle.length < 3) return true;

  const embeddedVertices = new Set<NodeId>(cycle);
  const embeddedEdges = new Set<string>(cycle.map((node, index) => edgeKey(node, cycle[(index + 1) % cycle.length])));
  let faces: NodeId[][] = [cycle, cycle.slice()];

  while (embeddedEdges.size < edgeCount) {
    const fragments = findFragments(adjacency, embeddedVertices, embeddedEdges);
    if (fragments.length === 0) break;

    let chosen: { fragment: Fragment; face: number } | null = null;
    for (const fragment of fragments) {
      const admissible = faces
        .map((face, index) => ({ face, index }))
        .filter(({ face }) => fragment.attachments.every(vertex => face.includes(vertex)))
        .map(({ index }) => index);

      if (admissible.length === 0) return false;
      if (admissible.length === 1) {
        chosen = { fragment, face: admissible[0] };
        break;
      }
      if (!chosen) {
        chosen = { fragment, face: admissible[0] };
      }
    }
    if (!chosen) return false;

    const path = fragmentPath(adjacency, chosen.fragment);
    if (path.length < 2) return false;

    const [first, second] = splitFace(faces[chosen.face], path);
    faces = [...faces.slice(0, chosen.face), first, second, ...faces.slice(chosen.face + 1)];
    path.forEach(node => embeddedVertices.add(node));
    for (let k = 0; k + 1 < path.length; k++) {
      embeddedEdges.add(edgeKey(path[k], path[k + 1]));
    }
  }

  return true;
}

/**
 * Whether the graph can be drawn in the plane without crossing edges.
 * A graph is planar exactly when every biconnected block is.
 */
export function isPlanar(adjacency: Iterable<Edge>): boolean {
  const graph = buildAdjacency(adjacency);
  if (exceedsEulerBound(graph.size, countEdges(graph))) {
    return false;
  }
  return biconnectedBlocks(graph).every(isBlockPlanar);
}
