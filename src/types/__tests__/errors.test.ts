import { describe, it, expect } from 'vitest';
import { InvalidMoveError, MalformedGraphError, PuzzleEngineError, UnsolvableError } from '../errors';
import { colorAt } from '../../utils/colorUtils';

describe('engine errors', () => {
  it('carries the rejected move', () => {
    const move = { nodeId: 4, color: colorAt(1) };
    const error = new InvalidMoveError(move, 'region 4 is not live');

    expect(error).toBeInstanceOf(PuzzleEngineError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('InvalidMoveError');
    expect(error.move).toBe(move);
    expect(error.message).toBe('Invalid move (node 4 -> green): region 4 is not live');
  });

  it('carries the reason a graph was rejected', () => {
    const error = new MalformedGraphError('node 2 has no color');

    expect(error).toBeInstanceOf(PuzzleEngineError);
    expect(error.name).toBe('MalformedGraphError');
    expect(error.reason).toBe('node 2 has no color');
    expect(error.message).toBe('Malformed puzzle graph: node 2 has no color');
  });

  it('defaults the unsolvable message', () => {
    const error = new UnsolvableError();

    expect(error).toBeInstanceOf(PuzzleEngineError);
    expect(error.name).toBe('UnsolvableError');
    expect(error.message).toBe('Search exhausted without reaching a single region');
    expect(new UnsolvableError('custom').message).toBe('custom');
  });
});
