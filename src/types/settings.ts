/**
 * Breadth-first and best-first return minimal move lists; depth-first finds
 * some solution, usually not a minimal one.
 */
export enum SearchStrategy {
  BreadthFirst = 'breadthFirst',
  BestFirst = 'bestFirst',
  DepthFirst = 'depthFirst'
}

export enum HeuristicName {
  ColorCount = 'colorCount',
  MaxEdgeReduction = 'maxEdgeReduction'
}

/**
 * Exact signatures never merge distinct states; fuzzy ones are cheaper but can
 * collide, which may hide a shorter solution from the solver.
 */
export enum CanonicalMode {
  Exact = 'exact',
  Fuzzy = 'fuzzy'
}

export interface SolverSettings {
  strategy: SearchStrategy;
  heuristics: HeuristicName[];
  canonicalMode: CanonicalMode;
  // Children deeper than this are never generated
  maxDepth?: number;
}

export const defaultSolverSettings: SolverSettings = {
  strategy: SearchStrategy.BreadthFirst,
  heuristics: [HeuristicName.ColorCount],
  canonicalMode: CanonicalMode.Exact,
};

export interface GeneratorSettings {
  solver: SolverSettings;
  // Skip instances whose fuzzy signature was already seen (may miss instances)
  fuzzyInstances: boolean;
}

export const defaultGeneratorSettings: GeneratorSettings = {
  solver: defaultSolverSettings,
  fuzzyInstances: false,
};
