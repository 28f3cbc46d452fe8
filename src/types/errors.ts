import { Move } from './index';

/**
 * Base class for every error raised by the puzzle engine
 */
export class PuzzleEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A move that targets an unknown node or recolors a node to its own color.
 * Always recoverable: the caller rejects the move and carries on.
 */
export class InvalidMoveError extends PuzzleEngineError {
  readonly move: Move;

  constructor(move: Move, reason: string) {
    super(`Invalid move (node ${move.nodeId} -> ${move.color.name}): ${reason}`);
    this.move = move;
  }
}

/**
 * Raised while building a puzzle when the description breaks a graph invariant
 */
export class MalformedGraphError extends PuzzleEngineError {
  readonly reason: string;

  constructor(reason: string) {
    super(`Malformed puzzle graph: ${reason}`);
    this.reason = reason;
  }
}

/**
 * The search ran out of states without reaching a single region. Points at a
 * collapse or move-generation defect, so it is surfaced and never retried.
 */
export class UnsolvableError extends PuzzleEngineError {
  constructor(message: string = 'Search exhausted without reaching a single region') {
    super(message);
  }
}
