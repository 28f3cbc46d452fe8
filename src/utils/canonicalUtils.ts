import { CanonicalMode } from '../types/settings';
import { RegionGraph } from './gameLogic';

/**
 * Labeled encoding of a snapshot: ids with their colors, then edges. Two
 * separately built snapshots with the same regions share a key.
 */
export function structureKey(graph: RegionGraph): string {
  const nodes = graph.ids().map(id => `${id}:${graph.colorOf(id)?.index ?? -1}`).join(',');
  const edges = graph.edges().map(([a, b]) => `${a}-${b}`).join(',');
  return `${nodes}|${edges}`;
}

/**
 * Memo of signatures keyed by structure. Entries are never invalidated, so one
 * cache can be shared by independent solver and generator runs.
 */
export class SignatureCache {
  private readonly entries: Record<CanonicalMode, Map<string, string>> = {
    [CanonicalMode.Exact]: new Map(),
    [CanonicalMode.Fuzzy]: new Map(),
  };

  hits = 0;
  misses = 0;

  get size(): number {
    return this.entries[CanonicalMode.Exact].size + this.entries[CanonicalMode.Fuzzy].size;
  }

  get(graph: RegionGraph, mode: CanonicalMode): string | undefined {
    const found = this.entries[mode].get(structureKey(graph));
    if (found === undefined) {
      this.misses++;
    } else {
      this.hits++;
    }
    return found;
  }

  set(graph: RegionGraph, mode: CanonicalMode, signature: string): void {
    this.entries[mode].set(structureKey(graph), signature);
  }
}

interface CompactGraph {
  colors: number[];
  adjacency: number[][];
  edges: [number, number][];
}

function toCompact(graph: RegionGraph): CompactGraph {
  const ids = graph.ids();
  const position = new Map(ids.map((id, index) => [id, index]));
  const colors = ids.map(id => graph.colorOf(id)?.index ?? -1);
  const adjacency = ids.map(id =>
    graph.neighborsOf(id)
      .map(n => position.get(n))
      .filter((p): p is number => p !== undefined)
  );
  const edges: [number, number][] = [];
  adjacency.forEach((neighbors, u) => {
    for (const v of neighbors) {
      if (u < v) edges.push([u, v]);
    }
  });
  return { colors, adjacency, edges };
}

const countDistinct = (labels: number[]): number => new Set(labels).size;

function rankKeys(keys: string[]): number[] {
  const ordered = Array.from(new Set(keys)).sort();
  const rank = new Map(ordered.map((key, index) => [key, index]));
  return keys.map(key => rank.get(key) ?? 0);
}

/**
 * Color refinement: relabel every node by (own label, sorted neighbor labels)
 * until the partition stops splitting. Bounded by the node count.
 */
export function refineLabels(labels: number[], adjacency: number[][]): number[] {
  let current = labels;
  let classes = countDistinct(current);

  for (let round = 0; round < labels.length; round++) {
    const keys = current.map((label, v) => {
      const around = adjacency[v].map(u => current[u]).sort((a, b) => a - b);
      return `${label}|${around.join(',')}`;
    });
    const next = rankKeys(keys);
    const nextClasses = countDistinct(next);
    current = next;
    if (nextClasses === classes) break;
    classes = nextClasses;
  }

  return current;
}

function encodeDiscrete(labels: number[], compact: CompactGraph): string {
  const order = labels.map((label, v) => ({ label, v })).sort((a, b) => a.label - b.label);
  const rank = new Array<number>(labels.length);
  order.forEach(({ v }, index) => {
    rank[v] = index;
  });

  const colorPart = order.map(({ v }) => compact.colors[v]).join(',');
  const edgePart = compact.edges
    .map(([u, v]) => (rank[u] < rank[v] ? [rank[u], rank[v]] : [rank[v], rank[u]]))
    .sort((a, b) => a[0] - b[0] || a[1] - b[1])
    .map(([a, b]) => `${a}-${b}`)
    .join(',');

  return `${labels.length};${colorPart};${edgePart}`;
}

// Individualize each member of the first ambiguous cell in turn and keep the smallest leaf
function smallestCertificate(labels: number[], compact: CompactGraph): string {
  const refined = refineLabels(labels, compact.adjacency);
  if (countDistinct(refined) === refined.length) {
    return encodeDiscrete(refined, compact);
  }

  const counts = new Map<number, number>();
  refined.forEach(label => counts.set(label, (counts.get(label) ?? 0) + 1));
  const target = Math.min(...Array.from(counts.entries()).filter(([, count]) => count > 1).map(([label]) => label));

  let best: string | null = null;
  for (let v = 0; v < refined.length; v++) {
    if (refined[v] !== target) continue;
    const individualized = refined.map((l, u) => (u === v ? 2 * l : 2 * l + 1));
    const certificate = smallestCertificate(individualized, compact);
    if (best === null || certificate < best) {
      best = certificate;
    }
  }

  return best ?? encodeDiscrete(refined, compact);
}

/**
 * Canonical form of the colored graph: equal for two snapshots exactly when
 * they are isomorphic with colors preserved. Ignores region ids.
 */
export function exactSignature(graph: RegionGraph): string {
  const compact = toCompact(graph);
  return smallestCertificate(compact.colors.slice(), compact);
}

/**
 * One-pass histogram of (color, degree, neighbor colors) per region.
 *
 * Cheaper than exactSignature, but two different states can share a fuzzy
 * signature. A solver deduplicating on it may skip a distinct state and
 * return a longer solution than necessary.
 */
export function fuzzySignature(graph: RegionGraph): string {
  const entries = graph.ids().map(id => {
    const around = graph.neighborsOf(id)
      .map(n => graph.colorOf(n)?.index ?? -1)
      .sort((a, b) => a - b);
    return `${graph.colorOf(id)?.index ?? -1}:${around.length}:${around.join('.')}`;
  });
  entries.sort();
  return `${graph.size};${graph.edgeCount};${entries.join('/')}`;
}

export function canonicalSignature(
  graph: RegionGraph,
  mode: CanonicalMode = CanonicalMode.Exact,
  cache?: SignatureCache
): string {
  const cached = cache?.get(graph, mode);
  if (cached !== undefined) {
    return cached;
  }

  const signature = mode === CanonicalMode.Exact ? exactSignature(graph) : fuzzySignature(graph);
  cache?.set(graph, mode, signature);
  return signature;
}
