/**
 * Tests for the puzzle callables with Firestore and the logger mocked
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpsError } from 'firebase-functions/v2/https';

const { mockGet, mockSet, mockDoc, mockCollection } = vi.hoisted(() => {
  const mockGet = vi.fn();
  const mockSet = vi.fn();
  const mockDoc = vi.fn(() => ({ get: mockGet, set: mockSet }));
  const mockCollection = vi.fn(() => ({ doc: mockDoc }));
  return { mockGet, mockSet, mockDoc, mockCollection };
});

vi.mock('firebase-admin', () => ({
  initializeApp: vi.fn(),
  firestore: vi.fn(() => ({ collection: mockCollection })),
}));

vi.mock('firebase-functions/v2', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import {
  fetchHardestPuzzleHandler,
  generateHardestPuzzleHandler,
  parseHardestPayload,
  parseSolvePayload,
  readLimit,
  solvePuzzleHandler,
} from '../index';
import { SearchStrategy } from '../../../src/types/settings';

const auth = { uid: 'test-user-123' };

const validStored = {
  algoScore: 1,
  nodeCount: 3,
  colorCount: 2,
  description: {
    nodeCount: 3,
    edges: [{ a: 0, b: 1 }, { a: 1, b: 2 }],
    colors: ['red', 'green', 'red'],
  },
  actions: [{ nodeId: 1, color: 'red' }],
  generatedAt: '2025-01-15T12:00:00Z',
};

beforeEach(() => {
  vi.clearAllMocks();
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('solvePuzzle', () => {
  it('returns the move list and its rendering', async () => {
    const result = await solvePuzzleHandler({
      data: { nodeCount: 3, edges: [[0, 1], [1, 2]], colors: ['red', 'green', 'red'] },
    });

    expect(result).toEqual({
      success: true,
      moveCount: 1,
      moves: [{ nodeId: 1, color: 'red' }],
      lines: ['1. Set node 1 to Red', 'Total: 1 move'],
    });
  });

  it('honors the requested strategy and heuristics', async () => {
    const result = await solvePuzzleHandler({
      data: {
        nodeCount: 5,
        edges: [[0, 1], [0, 2], [0, 3], [0, 4]],
        colors: ['red', 'green', 'blue', 'yellow', 'purple'],
        strategy: 'bestFirst',
        heuristics: ['colorCount'],
      },
      auth,
    });

    expect(result.moveCount).toBe(4);
    expect(result.lines[4]).toBe('Total: 4 moves');
  });

  it('rejects a malformed payload', async () => {
    await expect(solvePuzzleHandler({ data: null })).rejects.toBeInstanceOf(HttpsError);
    await expect(solvePuzzleHandler({ data: { nodeCount: 0, edges: [], colors: [] } })).rejects.toMatchObject({
      code: 'invalid-argument',
    });
    await expect(
      solvePuzzleHandler({ data: { nodeCount: 2, edges: [[0, 1]], colors: ['red', 'magenta'] } })
    ).rejects.toMatchObject({ code: 'invalid-argument', message: 'Unknown color: magenta' });
    await expect(
      solvePuzzleHandler({ data: { nodeCount: 2, edges: [[0, 1]], colors: ['red', 'green'], strategy: 'dfs' } })
    ).rejects.toMatchObject({ code: 'invalid-argument', message: 'Unknown strategy: dfs' });
  });

  it('maps graph errors to invalid-argument', async () => {
    await expect(
      solvePuzzleHandler({ data: { nodeCount: 3, edges: [[0, 1]], colors: ['red', 'green', 'blue'] } })
    ).rejects.toMatchObject({
      code: 'invalid-argument',
      message: 'Malformed puzzle graph: graph is disconnected (2 of 3 nodes reachable from node 0)',
    });
  });
});

describe('payload parsing', () => {
  it('fills in solver defaults', () => {
    const payload = parseSolvePayload({ nodeCount: 2, edges: [[0, 1]], colors: ['red', 'color-7'] });

    expect(payload.strategy).toBe('breadthFirst');
    expect(payload.heuristics).toEqual(['colorCount']);
    expect(payload.colors.map(c => c.index)).toEqual([0, 7]);
  });

  it('accepts depth-first search', () => {
    const payload = parseSolvePayload({ nodeCount: 2, edges: [[0, 1]], colors: ['red', 'green'], strategy: 'depthFirst' });
    expect(payload.strategy).toBe(SearchStrategy.DepthFirst);
  });

  it('rejects edges that are not pairs', () => {
    expect(() => parseSolvePayload({ nodeCount: 2, edges: [[0, 1, 2]], colors: ['red', 'green'] })).toThrow(HttpsError);
    expect(() => parseSolvePayload({ nodeCount: 2, edges: [{ a: 0, b: 1 }], colors: ['red', 'green'] })).toThrow(HttpsError);
  });

  it('enforces the generator limits from the environment', () => {
    expect(parseHardestPayload({ nodeCount: 5, colorCount: 4 })).toEqual({ nodeCount: 5, colorCount: 4, fuzzy: false });
    expect(() => parseHardestPayload({ nodeCount: 7, colorCount: 2 })).toThrow('"nodeCount" must be an integer between 1 and 6.');
    expect(() => parseHardestPayload({ nodeCount: 3, colorCount: 4 })).toThrow('"colorCount" must be an integer between 1 and 3.');
    expect(() => parseHardestPayload({ nodeCount: 3, colorCount: 2, fuzzy: 'yes' })).toThrow(HttpsError);

    vi.stubEnv('HARDEST_MAX_NODES', '8');
    vi.stubEnv('HARDEST_MAX_COLORS', '2');
    expect(parseHardestPayload({ nodeCount: 7, colorCount: 2, fuzzy: true })).toEqual({ nodeCount: 7, colorCount: 2, fuzzy: true });
    expect(() => parseHardestPayload({ nodeCount: 7, colorCount: 3 })).toThrow('"colorCount" must be an integer between 1 and 2.');
  });

  it('falls back on invalid limits', () => {
    vi.stubEnv('TEST_LIMIT', 'abc');
    expect(readLimit('TEST_LIMIT', 6)).toBe(6);
    vi.stubEnv('TEST_LIMIT', '0');
    expect(readLimit('TEST_LIMIT', 6)).toBe(6);
    vi.stubEnv('TEST_LIMIT', '4');
    expect(readLimit('TEST_LIMIT', 6)).toBe(4);
    expect(readLimit('UNSET_TEST_LIMIT', 5)).toBe(5);
  });
});

describe('generateHardestPuzzle', () => {
  it('requires authentication', async () => {
    await expect(generateHardestPuzzleHandler({ data: { nodeCount: 3, colorCount: 3 } })).rejects.toMatchObject({
      code: 'unauthenticated',
    });
    expect(mockSet).not.toHaveBeenCalled();
  });

  it('stores and returns the hardest puzzle', async () => {
    mockSet.mockResolvedValue(undefined);

    const result = await generateHardestPuzzleHandler({ data: { nodeCount: 3, colorCount: 3 }, auth });

    expect(mockCollection).toHaveBeenCalledWith('hardestPuzzles');
    expect(mockDoc).toHaveBeenCalledWith('3-3');
    expect(mockSet).toHaveBeenCalledWith(result.data);
    expect(result.success).toBe(true);
    expect(result.data.algoScore).toBe(2);
    expect(result.data.actions).toHaveLength(2);
    expect(result.data.colorCount).toBe(3);
    expect(result.data.generatedAt).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/);
  });

  it('reports storage failures as internal errors', async () => {
    mockSet.mockRejectedValue(new Error('write failed'));

    await expect(generateHardestPuzzleHandler({ data: { nodeCount: 2, colorCount: 2 }, auth })).rejects.toMatchObject({
      code: 'internal',
      message: 'Internal server error generating puzzle',
    });
  });
});

describe('fetchHardestPuzzle', () => {
  it('returns a stored puzzle', async () => {
    mockGet.mockResolvedValue({ exists: true, data: () => validStored });

    const result = await fetchHardestPuzzleHandler({ data: { nodeCount: 3, colorCount: 2 } });

    expect(mockCollection).toHaveBeenCalledWith('hardestPuzzles');
    expect(mockDoc).toHaveBeenCalledWith('3-2');
    expect(result).toEqual({ success: true, data: validStored });
  });

  it('throws not-found when nothing is stored', async () => {
    mockGet.mockResolvedValue({ exists: false, data: () => undefined });

    await expect(fetchHardestPuzzleHandler({ data: { nodeCount: 3, colorCount: 2 } })).rejects.toMatchObject({
      code: 'not-found',
      message: 'Hardest puzzle not found for 3-2',
    });
  });

  it('throws internal when the stored shape is wrong', async () => {
    mockGet.mockResolvedValue({ exists: true, data: () => ({ ...validStored, actions: 'none' }) });

    await expect(fetchHardestPuzzleHandler({ data: { nodeCount: 3, colorCount: 2 } })).rejects.toMatchObject({
      code: 'internal',
      message: 'Invalid puzzle data format found.',
    });
  });

  it('wraps Firestore failures', async () => {
    mockGet.mockRejectedValue(new Error('Firestore connection failed'));

    await expect(fetchHardestPuzzleHandler({ data: { nodeCount: 3, colorCount: 2 } })).rejects.toMatchObject({
      code: 'internal',
      message: 'Internal server error fetching puzzle',
    });
  });

  it('validates the payload before reading', async () => {
    await expect(fetchHardestPuzzleHandler({ data: { nodeCount: 'three', colorCount: 2 } })).rejects.toMatchObject({
      code: 'invalid-argument',
    });
    expect(mockGet).not.toHaveBeenCalled();
  });
});
