import { Move } from '../types';
import { UnsolvableError } from '../types/errors';
import { CanonicalMode, HeuristicName, SearchStrategy, SolverSettings, defaultSolverSettings } from '../types/settings';
import { SignatureCache, canonicalSignature } from './canonicalUtils';
import { debugLog, LogLevel } from './debugUtils';
import { RegionGraph } from './gameLogic';
import { applyMove, getValidMoves } from './gameUtils';
import { combineHeuristics } from './hintUtils';
import { SearchProblem, SearchResult, search } from './searchUtils';

export interface SolveOptions {
  // Shared memo for signatures; a fresh one is used per call when omitted
  signatureCache?: SignatureCache;
}

/**
 * The flood-fill puzzle expressed as a search problem
 */
export function createPuzzleProblem(settings: SolverSettings, cache: SignatureCache): SearchProblem<RegionGraph, Move> {
  const problem: SearchProblem<RegionGraph, Move> = {
    keyOf: graph => canonicalSignature(graph, settings.canonicalMode, cache),
    isGoal: graph => graph.isSolved,
    movesFrom: graph => getValidMoves(graph),
    follow: (graph, move) => applyMove(graph, move),
  };

  if (settings.strategy === SearchStrategy.BestFirst) {
    problem.estimate = combineHeuristics(settings.heuristics);
  }

  return problem;
}

/**
 * Search for a shortest move list. With `settings.maxDepth` set, a puzzle that
 * needs more moves comes back as 'bound-exceeded' rather than an error.
 */
export function searchPuzzle(
  puzzle: RegionGraph,
  settings: SolverSettings = defaultSolverSettings,
  options: SolveOptions = {}
): SearchResult<Move> {
  const cache = options.signatureCache ?? new SignatureCache();
  const problem = createPuzzleProblem(settings, cache);
  return search(problem, puzzle.collapse(), { strategy: settings.strategy, maxDepth: settings.maxDepth });
}

/**
 * Solve a puzzle and return one move list. It is minimal for breadth-first
 * search, and for best-first search when every heuristic in use is admissible;
 * both also need exact signatures.
 */
export function solve(
  puzzle: RegionGraph,
  strategy: SearchStrategy = defaultSolverSettings.strategy,
  heuristics: HeuristicName[] = defaultSolverSettings.heuristics,
  options: SolveOptions & { canonicalMode?: CanonicalMode } = {}
): Move[] {
  const settings: SolverSettings = {
    strategy,
    heuristics,
    canonicalMode: options.canonicalMode ?? defaultSolverSettings.canonicalMode,
  };

  const result = searchPuzzle(puzzle, settings, options);
  if (result.status === 'solved') {
    debugLog('solver', `Solved ${puzzle.size}-region puzzle in ${result.moves.length} moves`, result.stats, LogLevel.DEBUG);
    return result.moves;
  }

  debugLog('solver', 'Search exhausted without reaching a single region', result.stats, LogLevel.ERROR);
  throw new UnsolvableError();
}

/**
 * Quick, not necessarily minimal, solution: always take the move that leaves
 * the fewest colors, then the fewest regions. Every step merges or removes a
 * color, so it always finishes.
 */
export function greedySolution(puzzle: RegionGraph): Move[] {
  const moves: Move[] = [];
  let state = puzzle.collapse();

  while (!state.isSolved) {
    let best: { move: Move; next: RegionGraph } | null = null;
    for (const move of getValidMoves(state)) {
      const next = applyMove(state, move);
      if (
        !best ||
        next.colors().length < best.next.colors().length ||
        (next.colors().length === best.next.colors().length && next.size < best.next.size)
      ) {
        best = { move, next };
      }
    }
    if (!best) {
      throw new UnsolvableError('No valid move from an unsolved state');
    }
    moves.push(best.move);
    state = best.next;
  }

  return moves;
}
