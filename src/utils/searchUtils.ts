/**
 * Generic shortest-path search over any state space with goal states.
 *
 * The problem decides how states look; the solver only needs a key for
 * deduplication, a goal test, the moves out of a state and the state a move
 * leads to. Breadth-first search is minimal for unit-cost moves; best-first
 * search is minimal when the estimate never overestimates. Depth-first search
 * only promises some solution.
 */

import { SearchStrategy } from '../types/settings';
import { MinHeap } from './priorityQueue';

export interface SearchProblem<TState, TMove> {
  // Equal keys are treated as the same state
  keyOf: (state: TState) => string;
  isGoal: (state: TState) => boolean;
  movesFrom: (state: TState) => Iterable<TMove>;
  follow: (state: TState, move: TMove) => TState;
  // Remaining-cost estimate for best-first search; zero when omitted
  estimate?: (state: TState) => number;
}

export interface SearchOptions {
  strategy: SearchStrategy;
  maxDepth?: number;
}

export interface SearchStats {
  expanded: number;
  generated: number;
  duplicates: number;
  timeMs: number;
}

export type SearchResult<TMove> =
  | { status: 'solved'; moves: TMove[]; stats: SearchStats }
  | { status: 'bound-exceeded'; stats: SearchStats }
  | { status: 'exhausted'; stats: SearchStats };

interface SearchNode<TState, TMove> {
  state: TState;
  key: string;
  depth: number;
  parent: SearchNode<TState, TMove> | null;
  move: TMove | null;
}

interface RankedNode<TState, TMove> extends SearchNode<TState, TMove> {
  priority: number;
  sequence: number;
}

function pathTo<TState, TMove>(node: SearchNode<TState, TMove>): TMove[] {
  const moves: TMove[] = [];
  for (let current: SearchNode<TState, TMove> | null = node; current; current = current.parent) {
    if (current.move !== null) {
      moves.push(current.move);
    }
  }
  return moves.reverse();
}

function breadthFirst<TState, TMove>(
  problem: SearchProblem<TState, TMove>,
  start: TState,
  maxDepth: number | undefined,
  stats: SearchStats
): SearchResult<TMove> {
  const root: SearchNode<TState, TMove> = { state: start, key: problem.keyOf(start), depth: 0, parent: null, move: null };
  if (problem.isGoal(start)) {
    return { status: 'solved', moves: [], stats };
  }

  const visited = new Set<string>([root.key]);
  const queue: SearchNode<TState, TMove>[] = [root];
  let head = 0;
  let boundHit = false;

  while (head < queue.length) {
    const node = queue[head++];
    stats.expanded++;

    if (maxDepth !== undefined && node.depth >= maxDepth) {
      boundHit = true;
      continue;
    }

    for (const move of problem.movesFrom(node.state)) {
      const state = problem.follow(node.state, move);
      stats.generated++;
      const child: SearchNode<TState, TMove> = { state, key: '', depth: node.depth + 1, parent: node, move };

      // Every state at a lower depth was expanded already, so the first goal is minimal
      if (problem.isGoal(state)) {
        return { status: 'solved', moves: pathTo(child), stats };
      }

      child.key = problem.keyOf(state);
      if (visited.has(child.key)) {
        stats.duplicates++;
        continue;
      }
      visited.add(child.key);
      queue.push(child);
    }
  }

  return boundHit ? { status: 'bound-exceeded', stats } : { status: 'exhausted', stats };
}

function bestFirst<TState, TMove>(
  problem: SearchProblem<TState, TMove>,
  start: TState,
  maxDepth: number | undefined,
  stats: SearchStats
): SearchResult<TMove> {
  const estimate = problem.estimate ?? (() => 0);
  const frontier = new MinHeap<RankedNode<TState, TMove>>(
    (a, b) => a.priority - b.priority || b.depth - a.depth || a.sequence - b.sequence
  );
  // Lowest depth at which each key has been reached
  const bestDepth = new Map<string, number>();
  let sequence = 0;
  let boundHit = false;

  const rootKey = problem.keyOf(start);
  bestDepth.set(rootKey, 0);
  frontier.push({ state: start, key: rootKey, depth: 0, parent: null, move: null, priority: estimate(start), sequence: sequence++ });

  for (let node = frontier.pop(); node; node = frontier.pop()) {
    const recorded = bestDepth.get(node.key);
    if (recorded !== undefined && recorded < node.depth) {
      // Superseded by a shallower copy of the same state
      continue;
    }

    if (problem.isGoal(node.state)) {
      return { status: 'solved', moves: pathTo(node), stats };
    }

    stats.expanded++;
    if (maxDepth !== undefined && node.depth >= maxDepth) {
      boundHit = true;
      continue;
    }

    for (const move of problem.movesFrom(node.state)) {
      const state = problem.follow(node.state, move);
      stats.generated++;
      const depth = node.depth + 1;
      const key = problem.keyOf(state);

      const previous = bestDepth.get(key);
      if (previous !== undefined && previous <= depth) {
        stats.duplicates++;
        continue;
      }

      bestDepth.set(key, depth);
      frontier.push({ state, key, depth, parent: node, move, priority: depth + estimate(state), sequence: sequence++ });
    }
  }

  return boundHit ? { status: 'bound-exceeded', stats } : { status: 'exhausted', stats };
}

// Same goal test and visited set as breadthFirst, newest node first
function depthFirst<TState, TMove>(
  problem: SearchProblem<TState, TMove>,
  start: TState,
  maxDepth: number | undefined,
  stats: SearchStats
): SearchResult<TMove> {
  if (problem.isGoal(start)) {
    return { status: 'solved', moves: [], stats };
  }

  const root: SearchNode<TState, TMove> = { state: start, key: problem.keyOf(start), depth: 0, parent: null, move: null };
  const visited = new Set<string>([root.key]);
  const stack: SearchNode<TState, TMove>[] = [root];
  let boundHit = false;

  for (let node = stack.pop(); node; node = stack.pop()) {
    stats.expanded++;

    if (maxDepth !== undefined && node.depth >= maxDepth) {
      boundHit = true;
      continue;
    }

    for (const move of problem.movesFrom(node.state)) {
      const state = problem.follow(node.state, move);
      stats.generated++;
      const child: SearchNode<TState, TMove> = { state, key: '', depth: node.depth + 1, parent: node, move };

      if (problem.isGoal(state)) {
        return { status: 'solved', moves: pathTo(child), stats };
      }

      child.key = problem.keyOf(state);
      if (visited.has(child.key)) {
        stats.duplicates++;
        continue;
      }
      visited.add(child.key);
      stack.push(child);
    }
  }

  return boundHit ? { status: 'bound-exceeded', stats } : { status: 'exhausted', stats };
}

function runStrategy<TState, TMove>(
  problem: SearchProblem<TState, TMove>,
  start: TState,
  options: SearchOptions,
  stats: SearchStats
): SearchResult<TMove> {
  switch (options.strategy) {
    case SearchStrategy.BestFirst:
      return bestFirst(problem, start, options.maxDepth, stats);
    case SearchStrategy.DepthFirst:
      return depthFirst(problem, start, options.maxDepth, stats);
    case SearchStrategy.BreadthFirst:
      return breadthFirst(problem, start, options.maxDepth, stats);
  }
}

/**
 * Search from `start` for a move list that reaches a goal state (the shortest
 * one unless the strategy is depth-first)
 */
export function search<TState, TMove>(
  problem: SearchProblem<TState, TMove>,
  start: TState,
  options: SearchOptions
): SearchResult<TMove> {
  const startTime = Date.now();
  const stats: SearchStats = { expanded: 0, generated: 0, duplicates: 0, timeMs: 0 };

  const result = runStrategy(problem, start, options, stats);

  stats.timeMs = Date.now() - startTime;
  return result;
}
