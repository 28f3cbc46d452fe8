export { TileColor, allColors } from './types';
export type { Color, Coloring, Edge, Move, NodeId, PuzzleDescription, RegionNode } from './types';
export { PuzzleEngineError, InvalidMoveError, MalformedGraphError, UnsolvableError } from './types/errors';
export {
  SearchStrategy,
  HeuristicName,
  CanonicalMode,
  defaultSolverSettings,
  defaultGeneratorSettings,
} from './types/settings';
export type { SolverSettings, GeneratorSettings } from './types/settings';

export { colorAt, firstColors, colorFromTile, parseColor, colorsEqual, compareColors, getTileColor } from './utils/colorUtils';
export { RegionGraph, buildPuzzle, buildPuzzleFromDescription } from './utils/gameLogic';
export type { BuildPuzzleOptions } from './utils/gameLogic';
export { isValidMove, applyMove, applyMoves, getValidMoves } from './utils/gameUtils';
export { SignatureCache, canonicalSignature, exactSignature, fuzzySignature, structureKey } from './utils/canonicalUtils';
export { HEURISTICS, colorCountHeuristic, maxEdgeReductionHeuristic, combineHeuristics, isAdmissibleSet } from './utils/hintUtils';
export type { Heuristic, HeuristicEntry } from './utils/hintUtils';
export { search } from './utils/searchUtils';
export type { SearchProblem, SearchOptions, SearchResult, SearchStats } from './utils/searchUtils';
export { solve, searchPuzzle, greedySolution, createPuzzleProblem } from './utils/solverUtils';
export type { SolveOptions } from './utils/solverUtils';
export { isPlanar } from './utils/planarityUtils';
export { findHardest, enumerateTopologies, enumerateColorings, HardestPuzzleTracker, isConnected } from './utils/generatorUtils';
export type { FindHardestOptions, GeneratorProgress, HardestPuzzleRecord, Topology } from './utils/generatorUtils';
export { colorToEmoji, colorToName, formatMove, formatSolution, describePuzzle, generateShareText } from './utils/shareUtils';
export type { SectionNamer } from './utils/shareUtils';
export { PuzzleName, getPuzzle, isPuzzleName, puzzleNames } from './utils/puzzles';
export type { NamedPuzzle } from './utils/puzzles';
