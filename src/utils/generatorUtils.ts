import { Color, Edge, Move, PuzzleDescription } from '../types';
import { UnsolvableError } from '../types/errors';
import { CanonicalMode, GeneratorSettings, SearchStrategy, defaultGeneratorSettings } from '../types/settings';
import { SignatureCache, canonicalSignature } from './canonicalUtils';
import { firstColors } from './colorUtils';
import { debugLog, LogLevel } from './debugUtils';
import { RegionGraph, buildPuzzle } from './gameLogic';
import { isPlanar } from './planarityUtils';
import { colorCountHeuristic } from './hintUtils';
import { greedySolution, searchPuzzle } from './solverUtils';

export interface HardestPuzzleRecord {
  // The instance as enumerated, before adjacent same-colored regions merge
  description: PuzzleDescription;
  puzzle: RegionGraph;
  moveCount: number;
  solution: Move[];
}

export interface Topology {
  mask: number;
  edges: Edge[];
}

export interface GeneratorProgress {
  topologiesSeen: number;
  instancesSolved: number;
  bestMoveCount: number;
}

export interface FindHardestOptions extends Partial<GeneratorSettings> {
  signatureCache?: SignatureCache;
  onProgress?: (progress: GeneratorProgress) => void;
}

/**
 * Keeps the instance with the largest optimal move count. Ties keep the one
 * offered first.
 */
export class HardestPuzzleTracker {
  private current: HardestPuzzleRecord | null = null;

  get record(): HardestPuzzleRecord | null {
    return this.current;
  }

  get bestMoveCount(): number {
    return this.current ? this.current.moveCount : -1;
  }

  offer(candidate: HardestPuzzleRecord): boolean {
    if (candidate.moveCount <= this.bestMoveCount) {
      return false;
    }
    this.current = candidate;
    return true;
  }
}

/** Every unordered pair of node ids, in lexicographic order */
export function allPairs(nodeCount: number): Edge[] {
  const pairs: Edge[] = [];
  for (let a = 0; a < nodeCount; a++) {
    for (let b = a + 1; b < nodeCount; b++) {
      pairs.push([a, b]);
    }
  }
  return pairs;
}

/**
 * Lazily yield every simple graph on `nodeCount` labeled nodes, one per edge
 * subset, in mask order. Pass `startMask` to resume an interrupted run.
 */
export function* enumerateTopologies(nodeCount: number, options: { startMask?: number } = {}): Generator<Topology> {
  const pairs = allPairs(nodeCount);
  const total = 2 ** pairs.length;

  for (let mask = options.startMask ?? 0; mask < total; mask++) {
    const edges: Edge[] = [];
    pairs.forEach((pair, bit) => {
      // Division instead of bit shifts keeps masks past 31 bits exact
      if (Math.floor(mask / 2 ** bit) % 2 === 1) {
        edges.push(pair);
      }
    });
    yield { mask, edges };
  }
}

/**
 * Lazily yield colorings of `nodeCount` nodes that use exactly `colorCount`
 * colors, one per relabeling of the colors: node 0 takes the first color and
 * every node takes either a color already used or the next unused one.
 */
export function* enumerateColorings(nodeCount: number, colorCount: number): Generator<Color[]> {
  const palette = firstColors(colorCount);
  const assignment: number[] = new Array<number>(nodeCount).fill(0);

  function* extend(position: number, used: number): Generator<Color[]> {
    // Not enough nodes left to introduce the remaining colors
    if (colorCount - used > nodeCount - position) {
      return;
    }
    if (position === nodeCount) {
      yield assignment.map(index => palette[index]);
      return;
    }
    const limit = Math.min(used + 1, colorCount);
    for (let color = 0; color < limit; color++) {
      assignment[position] = color;
      yield* extend(position + 1, Math.max(used, color + 1));
    }
  }

  if (nodeCount >= 1 && colorCount >= 1 && colorCount <= nodeCount) {
    yield* extend(0, 0);
  }
}

const describeInstance = (nodeCount: number, edges: readonly Edge[], colors: readonly Color[]): string =>
  `${nodeCount} nodes, edges [${edges.map(([a, b]) => `${a}-${b}`).join(' ')}], colors [${colors.map(c => c.name).join(' ')}]`;

export function isConnected(nodeCount: number, edges: readonly Edge[]): boolean {
  if (nodeCount <= 1) return true;

  const adjacency = Array.from({ length: nodeCount }, (): number[] => []);
  for (const [a, b] of edges) {
    adjacency[a].push(b);
    adjacency[b].push(a);
  }

  const reached = new Set<number>([0]);
  const stack = [0];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) continue;
    for (const next of adjacency[current]) {
      if (!reached.has(next)) {
        reached.add(next);
        stack.push(next);
      }
    }
  }
  return reached.size === nodeCount;
}

/**
 * Search every connected planar puzzle with `nodeCount` regions and exactly
 * `colorCount` colors for the one whose optimal solution is longest.
 */
export function findHardest(nodeCount: number, colorCount: number, options: FindHardestOptions = {}): HardestPuzzleRecord | null {
  if (!Number.isInteger(nodeCount) || nodeCount < 1) {
    throw new RangeError(`Node count must be a positive integer, got ${nodeCount}`);
  }
  if (!Number.isInteger(colorCount) || colorCount < 1 || colorCount > nodeCount) {
    throw new RangeError(`Color count must be between 1 and ${nodeCount}, got ${colorCount}`);
  }

  const solverSettings = options.solver ?? defaultGeneratorSettings.solver;
  if (solverSettings.strategy === SearchStrategy.DepthFirst) {
    throw new RangeError('Depth-first search does not give minimal move counts');
  }
  const fuzzyInstances = options.fuzzyInstances ?? defaultGeneratorSettings.fuzzyInstances;
  const cache = options.signatureCache ?? new SignatureCache();
  const tracker = new HardestPuzzleTracker();
  // Instance signatures already evaluated; their result cannot beat the record
  const evaluated = new Set<string>();
  const progress: GeneratorProgress = { topologiesSeen: 0, instancesSolved: 0, bestMoveCount: -1 };
  const instanceMode = fuzzyInstances ? CanonicalMode.Fuzzy : CanonicalMode.Exact;

  debugLog('generator', `Searching for hardest ${nodeCount}-node puzzle with ${colorCount} colors`, { fuzzyInstances });

  for (const { edges } of enumerateTopologies(nodeCount)) {
    if (!isConnected(nodeCount, edges) || !isPlanar(edges)) continue;
    progress.topologiesSeen++;

    for (const colors of enumerateColorings(nodeCount, colorCount)) {
      const puzzle = buildPuzzle(nodeCount, edges, colors);
      const signature = canonicalSignature(puzzle, instanceMode, cache);
      if (evaluated.has(signature)) continue;
      evaluated.add(signature);
      progress.instancesSolved++;

      // Only a strictly longer solution matters: skip when a quick solution
      // already fits, and stop the search at the current best otherwise
      const bound = tracker.bestMoveCount;
      if (bound >= 0 && colorCountHeuristic(puzzle) <= bound) {
        if (greedySolution(puzzle).length <= bound) continue;

        const bounded = searchPuzzle(puzzle, { ...solverSettings, maxDepth: bound }, { signatureCache: cache });
        if (bounded.status === 'solved') continue;
        if (bounded.status === 'exhausted') {
          throw new UnsolvableError(`Bounded search exhausted on ${describeInstance(nodeCount, edges, colors)}`);
        }
      }

      const result = searchPuzzle(puzzle, { ...solverSettings, maxDepth: undefined }, { signatureCache: cache });
      if (result.status !== 'solved') {
        throw new UnsolvableError(`Search exhausted on ${describeInstance(nodeCount, edges, colors)}`);
      }

      const description: PuzzleDescription = { nodeCount, edges, colors };
      if (tracker.offer({ description, puzzle, moveCount: result.moves.length, solution: result.moves })) {
        progress.bestMoveCount = result.moves.length;
        debugLog('generator', `New hardest puzzle: ${result.moves.length} moves`, description, LogLevel.DEBUG);
      }
    }

    options.onProgress?.({ ...progress });
  }

  const record = tracker.record;
  debugLog('generator', `Finished: ${record ? `${record.moveCount} moves` : 'no puzzle found'}`, progress);
  return record;
}
