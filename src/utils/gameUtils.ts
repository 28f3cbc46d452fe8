import { Move } from '../types';
import { InvalidMoveError } from '../types/errors';
import { colorsEqual } from './colorUtils';
import { RegionGraph } from './gameLogic';

/**
 * Reason a move cannot be applied to the graph, or null when it can
 */
function invalidMoveReason(graph: RegionGraph, move: Move): string | null {
  const current = graph.colorOf(move.nodeId);
  if (current === undefined) {
    return `region ${move.nodeId} is not live`;
  }
  if (colorsEqual(current, move.color)) {
    return `region ${move.nodeId} is already ${move.color.name}`;
  }
  return null;
}

export function isValidMove(graph: RegionGraph, move: Move): boolean {
  return invalidMoveReason(graph, move) === null;
}

/**
 * Apply a single recolor-and-collapse move, returning the next snapshot.
 * No-op moves and unknown regions are rejected before any collapse runs.
 */
export function applyMove(graph: RegionGraph, move: Move): RegionGraph {
  const reason = invalidMoveReason(graph, move);
  if (reason !== null) {
    throw new InvalidMoveError(move, reason);
  }
  return graph.recolor(move.nodeId, move.color);
}

/**
 * Replay a move list from the given state
 */
export function applyMoves(graph: RegionGraph, moves: readonly Move[]): RegionGraph {
  return moves.reduce((state, move) => applyMove(state, move), graph);
}

/**
 * Returns every move worth trying from this state: for each pair of live
 * regions with different colors, recolor one to the other's color.
 * Ordered by region id, then color index.
 */
export function getValidMoves(graph: RegionGraph): Move[] {
  const palette = graph.colors();
  const valid: Move[] = [];

  for (const nodeId of graph.ids()) {
    const current = graph.colorOf(nodeId);
    for (const color of palette) {
      if (current !== undefined && !colorsEqual(current, color)) {
        valid.push({ nodeId, color });
      }
    }
  }

  return valid;
}
