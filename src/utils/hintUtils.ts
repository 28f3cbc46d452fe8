import { HeuristicName } from '../types/settings';
import { RegionGraph } from './gameLogic';
import { getValidMoves } from './gameUtils';
import { debugLog, LogLevel } from './debugUtils';

export type Heuristic = (graph: RegionGraph) => number;

export interface HeuristicEntry {
  estimate: Heuristic;
  // Never overestimates the remaining move count
  admissible: boolean;
}

/**
 * Lower bound from the palette: a move removes at most one color from the
 * board, so at least (distinct colors - 1) moves remain.
 */
export function colorCountHeuristic(graph: RegionGraph): number {
  return Math.max(0, graph.colors().length - 1);
}

/**
 * Largest drop in edge count any single move achieves from this state
 */
export function maxEdgeReduction(graph: RegionGraph): number {
  const before = graph.edgeCount;
  let best = 0;
  for (const move of getValidMoves(graph)) {
    const after = graph.recolor(move.nodeId, move.color).edgeCount;
    best = Math.max(best, before - after);
  }
  return best;
}

/**
 * Remaining edges divided by the best reduction available now. Later moves can
 * remove more edges than the best move today, so this may overestimate.
 */
export function maxEdgeReductionHeuristic(graph: RegionGraph): number {
  const edges = graph.edgeCount;
  if (edges === 0) {
    return 0;
  }
  const reduction = maxEdgeReduction(graph);
  return reduction > 0 ? Math.ceil(edges / reduction) : edges;
}

export const HEURISTICS: Record<HeuristicName, HeuristicEntry> = {
  [HeuristicName.ColorCount]: { estimate: colorCountHeuristic, admissible: true },
  [HeuristicName.MaxEdgeReduction]: { estimate: maxEdgeReductionHeuristic, admissible: false },
};

export function isAdmissibleSet(names: readonly HeuristicName[]): boolean {
  return names.every(name => HEURISTICS[name].admissible);
}

/**
 * Combine the enabled estimators by taking their maximum. An empty set
 * estimates zero everywhere.
 */
export function combineHeuristics(names: readonly HeuristicName[]): Heuristic {
  const unique = Array.from(new Set(names));

  if (!isAdmissibleSet(unique)) {
    debugLog(
      'heuristics',
      'Non-admissible heuristic enabled; best-first results may not be minimal',
      unique.filter(name => !HEURISTICS[name].admissible),
      LogLevel.WARN
    );
  }

  const estimators = unique.map(name => HEURISTICS[name].estimate);
  return (graph: RegionGraph) => estimators.reduce((best, estimate) => Math.max(best, estimate(graph)), 0);
}
