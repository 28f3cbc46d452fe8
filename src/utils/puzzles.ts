import { Edge, NodeId, TileColor } from '../types';
import { colorFromTile } from './colorUtils';
import { RegionGraph, buildPuzzle } from './gameLogic';
import { SectionNamer } from './shareUtils';

export enum PuzzleName {
  ThreeThree = '3-3'
}

interface Section {
  name: string;
  color: TileColor;
}

interface CatalogEntry {
  sections: Section[];
  touching: Edge[];
}

export interface NamedPuzzle {
  name: PuzzleName;
  puzzle: RegionGraph;
  sectionName: SectionNamer;
}

// Section ids are positions in `sections`
const catalog: Record<PuzzleName, CatalogEntry> = {
  [PuzzleName.ThreeThree]: {
    sections: [
      { name: 'top', color: TileColor.Yellow },
      { name: 'top band', color: TileColor.Green },
      { name: 'top left', color: TileColor.Orange },
      { name: 'center', color: TileColor.Blue },
      { name: 'top right', color: TileColor.Orange },
      { name: 'middle left', color: TileColor.Yellow },
      { name: 'middle right', color: TileColor.Yellow },
      { name: 'bottom left', color: TileColor.Orange },
      { name: 'bottom right', color: TileColor.Orange },
      { name: 'bottom band', color: TileColor.Green },
      { name: 'bottom', color: TileColor.Yellow },
    ],
    touching: [
      [0, 1], [0, 2], [0, 4],
      [1, 3],
      [2, 3], [2, 5],
      [3, 4], [3, 5], [3, 6], [3, 7], [3, 8], [3, 9],
      [4, 6],
      [5, 7],
      [6, 8],
      [7, 10],
      [8, 10],
      [9, 10],
    ],
  },
};

export const puzzleNames = (): PuzzleName[] => Object.values(PuzzleName);

export function isPuzzleName(value: unknown): value is PuzzleName {
  return puzzleNames().some(name => name === value);
}

/**
 * Build a catalog puzzle. Merges keep the recolored id, so `sectionName`
 * stays valid for every move of a solution.
 */
export function getPuzzle(name: PuzzleName): NamedPuzzle {
  const { sections, touching } = catalog[name];
  const puzzle = buildPuzzle(sections.length, touching, sections.map(section => colorFromTile(section.color)));
  const sectionName = (id: NodeId): string | undefined => sections[id]?.name;
  return { name, puzzle, sectionName };
}
