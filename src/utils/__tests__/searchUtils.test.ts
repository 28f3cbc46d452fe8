import { describe, it, expect } from 'vitest';
import { SearchStrategy } from '../../types/settings';
import { MinHeap } from '../priorityQueue';
import { SearchProblem, search } from '../searchUtils';

type Step = 'inc' | 'dbl';

// Reach `goal` from a number with +1 and *2, never passing 20
function counterProblem(goal: number): SearchProblem<number, Step> {
  return {
    keyOf: n => String(n),
    isGoal: n => n === goal,
    movesFrom: n => (['inc', 'dbl'] as const).filter(step => (step === 'inc' ? n + 1 : n * 2) <= 20),
    follow: (n, step) => (step === 'inc' ? n + 1 : n * 2),
  };
}

const replay = (start: number, steps: Step[]) =>
  steps.reduce((n, step) => (step === 'inc' ? n + 1 : n * 2), start);

describe('MinHeap', () => {
  it('pops in comparator order', () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    [5, 1, 4, 1, 3, 9, 2].forEach(n => heap.push(n));

    expect(heap.size).toBe(7);
    expect(heap.peek()).toBe(1);

    const popped: number[] = [];
    for (let n = heap.pop(); n !== undefined; n = heap.pop()) {
      popped.push(n);
    }
    expect(popped).toEqual([1, 1, 2, 3, 4, 5, 9]);
    expect(heap.pop()).toBeUndefined();
  });
});

describe.each([SearchStrategy.BreadthFirst, SearchStrategy.BestFirst])('search (%s)', strategy => {
  it('finds a shortest move list', () => {
    const result = search(counterProblem(10), 1, { strategy });

    expect(result.status).toBe('solved');
    if (result.status === 'solved') {
      expect(result.moves).toHaveLength(4);
      expect(replay(1, result.moves)).toBe(10);
      expect(result.stats.generated).toBeGreaterThan(0);
    }
  });

  it('returns no moves when the start is a goal', () => {
    const result = search(counterProblem(3), 3, { strategy });

    expect(result.status).toBe('solved');
    if (result.status === 'solved') {
      expect(result.moves).toEqual([]);
    }
  });

  it('reports a bound miss as an outcome', () => {
    expect(search(counterProblem(10), 1, { strategy, maxDepth: 3 }).status).toBe('bound-exceeded');
    expect(search(counterProblem(10), 1, { strategy, maxDepth: 4 }).status).toBe('solved');
  });

  it('reports exhaustion when no goal is reachable', () => {
    const result = search(counterProblem(100), 1, { strategy });

    expect(result.status).toBe('exhausted');
    expect(result.stats.duplicates).toBeGreaterThan(0);
  });
});

describe('best-first search', () => {
  it('stays minimal with an admissible estimate', () => {
    const problem: SearchProblem<number, Step> = {
      ...counterProblem(16),
      // Doubling at most halves the gap, so this never overestimates
      estimate: n => (n >= 16 ? 0 : Math.ceil(Math.log2(16 / n))),
    };
    const result = search(problem, 1, { strategy: SearchStrategy.BestFirst });

    expect(result.status).toBe('solved');
    if (result.status === 'solved') {
      expect(result.moves).toHaveLength(4);
      expect(replay(1, result.moves)).toBe(16);
    }
  });
});

describe('search (depthFirst)', () => {
  const strategy = SearchStrategy.DepthFirst;

  it('finds a solution, not necessarily a shortest one', () => {
    const result = search(counterProblem(10), 1, { strategy });

    expect(result.status).toBe('solved');
    if (result.status === 'solved') {
      // Follows the newest branch (doubling) until it dead-ends at 20
      expect(result.moves).toEqual(['inc', 'dbl', 'dbl', 'inc', 'inc']);
      expect(replay(1, result.moves)).toBe(10);
    }
  });

  it('returns no moves when the start is a goal', () => {
    const result = search(counterProblem(3), 3, { strategy });
    expect(result.status === 'solved' && result.moves).toEqual([]);
  });

  it('respects the depth bound', () => {
    expect(search(counterProblem(10), 1, { strategy, maxDepth: 3 }).status).toBe('bound-exceeded');
  });

  it('reports exhaustion when no goal is reachable', () => {
    expect(search(counterProblem(100), 1, { strategy }).status).toBe('exhausted');
  });
});
